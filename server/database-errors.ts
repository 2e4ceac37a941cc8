import {
  ConflictError,
  ReferentialIntegrityError,
  UniqueConstraintError,
  ValidationError,
  isDealershipError,
} from "./errors";

export interface PostgresError extends Error {
  code: string;
  constraint?: string;
  detail?: string;
  column?: string;
  table?: string;
}

export type DatabaseAction = "write" | "delete";

// Constraint names as drizzle-kit generates them: <table>_<column>_unique for
// column-level unique(), the explicit name for uniqueIndex().
const UNIQUE_CONSTRAINTS: Record<string, { resource: string; field: string }> = {
  brands_name_unique: { resource: "brand", field: "name" },
  brands_slug_unique: { resource: "brand", field: "slug" },
  uq_car_models_brand_name: { resource: "car model", field: "name" },
  categories_name_unique: { resource: "category", field: "name" },
  categories_slug_unique: { resource: "category", field: "slug" },
  features_name_unique: { resource: "feature", field: "name" },
  cars_stock_number_unique: { resource: "car", field: "stock number" },
  cars_vin_unique: { resource: "car", field: "VIN" },
  cars_slug_unique: { resource: "car", field: "slug" },
  uq_rental_rates_car_type: { resource: "rental rate", field: "rate type" },
  blog_posts_slug_unique: { resource: "blog post", field: "slug" },
};

// Partial unique indexes that only a concurrent writer can trip
const CONFLICT_CONSTRAINTS: Record<string, string> = {
  uq_car_images_main: "Another main image was set for this car at the same time. Please retry.",
  uq_sales_car_open: "This car already has an open or completed sale.",
};

export function isPostgresError(error: unknown): error is PostgresError {
  return error instanceof Error && "code" in error && typeof error.code === "string";
}

/**
 * Translates a Postgres error into the domain error it stands for.
 * Anything that is not a recognised Postgres error is returned unchanged.
 */
export function mapDatabaseError(error: unknown, action: DatabaseAction = "write"): unknown {
  if (isDealershipError(error) || !isPostgresError(error)) {
    return error;
  }

  switch (error.code) {
    case "23505": {
      const constraint = error.constraint ?? "";
      if (constraint in CONFLICT_CONSTRAINTS) {
        return new ConflictError(CONFLICT_CONSTRAINTS[constraint]);
      }
      const target = UNIQUE_CONSTRAINTS[constraint] ?? { resource: "record", field: "value" };
      return new UniqueConstraintError(target.resource, target.field);
    }
    case "23503":
      return action === "delete"
        ? new ReferentialIntegrityError("The record is still referenced by other records and cannot be deleted.")
        : new ValidationError(
            "Invalid reference: the referenced record does not exist.",
            error.detail ? [error.detail] : undefined
          );
    case "23502":
      return new ValidationError(error.column ? `Missing required field: ${error.column}` : "Missing required field.");
    case "22001":
      return new ValidationError("A value is too long for its field.");
    case "22003":
      return new ValidationError("A number is out of range for its field.");
    case "23514":
      return new ValidationError("A value violates a data constraint.", error.constraint ? [error.constraint] : undefined);
    case "40001":
    case "40P01":
      return new ConflictError();
    default:
      return error;
  }
}

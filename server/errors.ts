/**
 * Domain errors raised by the storage layer and rendered by `handleApiError`.
 * Every error carries the HTTP status and machine code it is reported with.
 */
export class DealershipError extends Error {
  readonly status: number;
  readonly code: string;
  readonly errors?: string[];

  constructor(message: string, status: number, code: string, errors?: string[]) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
    if (errors && errors.length > 0) {
      this.errors = errors;
    }
  }
}

export class ValidationError extends DealershipError {
  constructor(message: string, errors?: string[]) {
    super(message, 400, "VALIDATION_ERROR", errors);
  }
}

export class NotFoundError extends DealershipError {
  readonly resource: string;

  constructor(resource: string, id?: string) {
    super(id ? `${resource} ${id} not found` : `${resource} not found`, 404, "NOT_FOUND");
    this.resource = resource;
  }
}

export class UniqueConstraintError extends DealershipError {
  readonly field: string;

  constructor(resource: string, field: string, value?: string) {
    const suffix = value !== undefined ? ` "${value}"` : "";
    super(`A ${resource} with this ${field}${suffix} already exists.`, 409, "UNIQUE_VIOLATION");
    this.field = field;
  }
}

export class ReferentialIntegrityError extends DealershipError {
  constructor(message: string) {
    super(message, 409, "FOREIGN_KEY_VIOLATION");
  }
}

export class InvalidTransitionError extends DealershipError {
  readonly from: string;
  readonly to: string;

  constructor(entity: string, from: string, to: string, detail?: string) {
    const base = `Cannot move ${entity} from "${from}" to "${to}"`;
    super(detail ? `${base}: ${detail}` : `${base}.`, 409, "INVALID_TRANSITION");
    this.from = from;
    this.to = to;
  }
}

export class ConflictError extends DealershipError {
  constructor(message: string = "The record was changed by a concurrent request. Please retry.") {
    super(message, 409, "CONFLICT");
  }
}

export function isDealershipError(error: unknown): error is DealershipError {
  return error instanceof DealershipError;
}

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

const NODE_ENVIRONMENTS = ["development", "production", "test"];

export function validateEnvironment(env: NodeJS.ProcessEnv = process.env): ValidationResult {
  const isProduction = env.NODE_ENV === "production";
  const result: ValidationResult = { isValid: true, errors: [], warnings: [] };

  if (env.NODE_ENV && !NODE_ENVIRONMENTS.includes(env.NODE_ENV)) {
    result.warnings.push(`NODE_ENV "${env.NODE_ENV}" is not one of ${NODE_ENVIRONMENTS.join(", ")}`);
  }

  const databaseUrl = env.DATABASE_URL || env.POSTGRES_URL;
  if (!databaseUrl) {
    const hasPgVariables = !!(env.PGHOST && env.PGUSER && env.PGDATABASE);
    if (env.PGHOST && !hasPgVariables) {
      result.errors.push("PGHOST is set but PGUSER or PGDATABASE is missing");
    } else if (!hasPgVariables) {
      if (isProduction) {
        result.errors.push("DATABASE_URL is required in production");
      } else {
        result.warnings.push("DATABASE_URL missing - will use in-memory storage (data lost on restart)");
      }
    }
  } else {
    try {
      new URL(databaseUrl);
    } catch {
      result.errors.push("DATABASE_URL is not a valid URL");
    }
  }

  const port = env.PORT;
  if (port && (!Number.isInteger(Number(port)) || Number(port) <= 0)) {
    result.errors.push("PORT must be a positive integer");
  }

  result.isValid = result.errors.length === 0;
  return result;
}

/** Prints the outcome of {@link validateEnvironment} and aborts start-up on errors. */
export function enforceEnvironment(result: ValidationResult, isProduction = process.env.NODE_ENV === "production"): void {
  if (result.errors.length > 0) {
    console.error("\n❌ STARTUP FAILED:");
    result.errors.forEach(error => console.error(`  • ${error}`));
    throw new Error(`Environment validation failed: ${result.errors.join("; ")}`);
  }

  if (result.warnings.length > 0) {
    console.warn("\n⚠️ WARNINGS:");
    result.warnings.forEach(warning => console.warn(`  • ${warning}`));
    if (isProduction) {
      console.warn("Consider addressing these warnings for optimal production operation.\n");
    } else {
      console.warn("These warnings are acceptable in development mode.\n");
    }
  }
}

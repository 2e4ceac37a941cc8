import type { Request, Response, NextFunction, RequestHandler } from "express";
import { ZodError } from "zod";
import { fromZodError } from "zod-validation-error";
import { mapDatabaseError } from "./database-errors";
import { isDealershipError } from "./errors";
import { sendDomainError, sendError, sendValidationError } from "./response-utils";

export type AsyncRouteHandler = (req: Request, res: Response, next: NextFunction) => Promise<void | Response>;

/**
 * Renders any error thrown by a route as the standard error envelope.
 * Domain errors keep their status and code; anything unrecognised is logged
 * and reported as a 500 without internals.
 */
export function handleApiError(error: unknown, operation: string, res: Response): void {
  if (error instanceof ZodError) {
    const errorMessage = fromZodError(error).toString();
    console.error(`[VALIDATION ERROR] ${operation}:`, errorMessage);
    sendValidationError(res, [errorMessage]);
    return;
  }

  const mapped = mapDatabaseError(error);
  if (isDealershipError(mapped)) {
    if (mapped.code === "CONFLICT") {
      console.warn(`[CONFLICT] ${operation}: ${mapped.message}`);
    }
    sendDomainError(res, mapped);
    return;
  }

  console.error(`Unexpected error during ${operation}:`, error);
  sendError(res, 500, "INTERNAL_ERROR", `Failed to ${operation}. Please try again later.`);
}

export function asyncRoute(operation: string, handler: AsyncRouteHandler): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      await handler(req, res, next);
    } catch (error) {
      handleApiError(error, operation, res);
    }
  };
}

import type { Response } from "express";
import type { DealershipError } from "./errors";

export interface SuccessEnvelope<T> {
  success: true;
  data: T;
  message?: string;
}

/** `code` is one of the machine codes carried by {@link DealershipError}, or `NOT_FOUND` / `INTERNAL_ERROR`. */
export interface ErrorEnvelope {
  success: false;
  message: string;
  code: string;
  errors?: string[];
}

export interface Page<T> {
  items: T[];
  pagination: {
    offset: number;
    limit: number;
    total: number;
    hasMore: boolean;
  };
}

export function successEnvelope<T>(data: T, message?: string): SuccessEnvelope<T> {
  return message ? { success: true, data, message } : { success: true, data };
}

export function errorEnvelope(message: string, code: string, errors?: string[]): ErrorEnvelope {
  return errors && errors.length > 0
    ? { success: false, message, code, errors }
    : { success: false, message, code };
}

export function sendSuccess<T>(res: Response, data: T, message?: string, status = 200): Response {
  return res.status(status).json(successEnvelope(data, message));
}

export function sendCreated<T>(res: Response, data: T, message: string): Response {
  return sendSuccess(res, data, message, 201);
}

export function sendDeleted(res: Response, message: string): Response {
  return sendSuccess(res, null, message);
}

export function sendPage<T>(res: Response, items: T[], window: { offset: number; limit: number }, total: number): Response {
  const page: Page<T> = {
    items,
    pagination: {
      offset: window.offset,
      limit: window.limit,
      total,
      hasMore: window.offset + items.length < total,
    },
  };
  return sendSuccess(res, page);
}

export function sendError(res: Response, status: number, code: string, message: string, errors?: string[]): Response {
  return res.status(status).json(errorEnvelope(message, code, errors));
}

export function sendDomainError(res: Response, error: DealershipError): Response {
  return sendError(res, error.status, error.code, error.message, error.errors);
}

export function sendValidationError(res: Response, errors: string[]): Response {
  return sendError(res, 400, "VALIDATION_ERROR", "Validation failed", errors);
}

export function sendNotFound(res: Response, resource: string): Response {
  return sendError(res, 404, "NOT_FOUND", `${resource} not found`);
}

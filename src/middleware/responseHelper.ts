// src/middleware/responseHelper.ts
import { Response } from "express";
import { ZodError } from "zod";

/**
 * Error bodies share one shape; success bodies are resource specific.
 */
export interface ApiErrorResponse {
  ok: false;
  error: string;
  details?: FieldError[];
}

export interface FieldError {
  field: string;
  message: string;
}

export const MAX_ERROR_MESSAGE_LENGTH = 200;

/**
 * Send an error response.
 */
export function sendError(
  res: Response,
  error: string,
  statusCode: number = 400,
  details?: FieldError[]
): Response {
  const response: ApiErrorResponse = {
    ok: false,
    error,
  };

  if (details) {
    response.details = details;
  }

  return res.status(statusCode).json(response);
}

/**
 * Send a not found response.
 */
export function sendNotFound(res: Response, message: string = "Resource not found"): Response {
  return sendError(res, message, 404);
}

/**
 * Flatten zod issues into one entry per offending field.
 */
export function toFieldErrors(error: ZodError): FieldError[] {
  return error.errors.map((e) => ({
    field: e.path.length > 0 ? e.path.join(".") : "body",
    message: e.message,
  }));
}

/**
 * Send a validation error response (422, field-level details).
 */
export function sendValidationError(res: Response, error: ZodError): Response {
  return sendError(res, "Validation failed", 422, toFieldErrors(error));
}

/**
 * Send a server error response. Messages are cut short; stacks never leave.
 */
export function sendServerError(res: Response, message: string = "Internal server error"): Response {
  return sendError(res, truncateMessage(message), 500);
}

export function truncateMessage(message: string, max: number = MAX_ERROR_MESSAGE_LENGTH): string {
  return message.length > max ? message.slice(0, max) : message;
}

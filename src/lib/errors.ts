/**
 * Standardized error responses for API endpoints
 * Maps domain, validation and Restate failures onto one response shape
 */

import type { Context } from "hono";
import { z } from "zod";
import { RaffleError } from "./raffle/errors.js";
import { RestateError, RestateTimeoutError } from "./restate-client.js";
import { createLogger } from "./logger.js";

const logger = createLogger("errors");

// ============================================================
// Error Types
// ============================================================

/**
 * Standard API error response format
 */
export interface ApiErrorResponse {
  error: string;
  code?: string;
  details?: unknown;
}

/**
 * HTTP status codes we use
 */
export type HttpErrorCode = 400 | 401 | 403 | 404 | 409 | 500 | 502 | 503 | 504;

const HTTP_ERROR_CODES: readonly HttpErrorCode[] = [
  400, 401, 403, 404, 409, 500, 502, 503, 504,
];

/**
 * Error codes for machine-readable error identification
 */
export const ErrorCodes = {
  // Validation errors
  VALIDATION_FAILED: "VALIDATION_FAILED",
  INVALID_INPUT: "INVALID_INPUT",

  // Authentication/Authorization
  UNAUTHORIZED: "UNAUTHORIZED",
  ADMIN_REQUIRED: "ADMIN_REQUIRED",

  // Resource errors
  NOT_FOUND: "NOT_FOUND",
  CONFLICT: "CONFLICT",

  // Server errors
  INTERNAL_ERROR: "INTERNAL_ERROR",
  TIMEOUT: "TIMEOUT",
  UPSTREAM_ERROR: "UPSTREAM_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ============================================================
// Error Response Helpers
// ============================================================

/**
 * Create a standardized error response
 */
export function createErrorResponse(
  error: string,
  code?: string,
  details?: unknown
): ApiErrorResponse {
  const response: ApiErrorResponse = { error };
  if (code) response.code = code;
  if (details) response.details = details;
  return response;
}

function isHttpErrorCode(statusCode: number): statusCode is HttpErrorCode {
  return HTTP_ERROR_CODES.some((code) => code === statusCode);
}

/**
 * Map status code to a status Hono accepts for error responses
 */
export function toHttpStatusCode(statusCode: number): HttpErrorCode {
  return isHttpErrorCode(statusCode) ? statusCode : 500;
}

/**
 * Error code for a status relayed from Restate without a domain code
 */
export function codeForStatus(statusCode: number): ErrorCode {
  switch (statusCode) {
    case 400:
      return ErrorCodes.INVALID_INPUT;
    case 401:
      return ErrorCodes.UNAUTHORIZED;
    case 404:
      return ErrorCodes.NOT_FOUND;
    case 409:
      return ErrorCodes.CONFLICT;
    default:
      return ErrorCodes.UPSTREAM_ERROR;
  }
}

// ============================================================
// Error Response Factories
// ============================================================

/**
 * Handle Zod validation errors
 */
export function handleZodError(c: Context, error: z.ZodError) {
  const details = error.errors.map((e) => ({
    path: e.path.join("."),
    message: e.message,
  }));

  return c.json(
    createErrorResponse("Validation failed", ErrorCodes.VALIDATION_FAILED, details),
    400
  );
}

/**
 * Handle domain errors raised in-process
 */
export function handleRaffleError(c: Context, error: RaffleError) {
  return c.json(
    createErrorResponse(error.message, error.code, error.details),
    error.status
  );
}

/**
 * Handle Restate errors
 */
export function handleRestateError(
  c: Context,
  error: RestateError | RestateTimeoutError
) {
  if (error instanceof RestateTimeoutError) {
    return c.json(createErrorResponse("Request timed out", ErrorCodes.TIMEOUT), 504);
  }

  return c.json(
    createErrorResponse(
      error.message,
      error.code ?? codeForStatus(error.statusCode),
      error.details
    ),
    toHttpStatusCode(error.statusCode)
  );
}

/**
 * Handle generic errors
 */
export function handleGenericError(
  c: Context,
  error: unknown,
  defaultMessage = "Internal server error"
) {
  const message = error instanceof Error ? error.message : defaultMessage;

  logger.error({ err: error }, "Unhandled error");

  return c.json(createErrorResponse(message, ErrorCodes.INTERNAL_ERROR), 500);
}

/**
 * Handle any error type and return appropriate response
 */
export function handleError(
  c: Context,
  error: unknown,
  defaultMessage = "An error occurred"
) {
  if (error instanceof z.ZodError) {
    return handleZodError(c, error);
  }

  if (error instanceof SyntaxError) {
    return badRequest(c, "Invalid JSON body");
  }

  if (error instanceof RaffleError) {
    return handleRaffleError(c, error);
  }

  if (error instanceof RestateTimeoutError || error instanceof RestateError) {
    return handleRestateError(c, error);
  }

  return handleGenericError(c, error, defaultMessage);
}

// ============================================================
// Specific Error Responses
// ============================================================

/**
 * Unauthorized response
 */
export function unauthorized(c: Context, message = "Unauthorized") {
  return c.json(createErrorResponse(message, ErrorCodes.UNAUTHORIZED), 401);
}

/**
 * Admin secret not configured on this server
 */
export function adminUnavailable(c: Context) {
  return c.json(
    createErrorResponse("Admin endpoints are disabled", ErrorCodes.ADMIN_REQUIRED),
    503
  );
}

/**
 * Bad request response
 */
export function badRequest(c: Context, message: string, details?: unknown) {
  return c.json(createErrorResponse(message, ErrorCodes.INVALID_INPUT, details), 400);
}

/**
 * Restate ingress client with timeouts and error handling
 * Used by the HTTP and SSE servers to reach the raffle objects
 */

import { config } from "./config.js";
import { decodeRaffleError } from "./raffle/errors.js";
import { createLogger } from "./logger.js";

const logger = createLogger("restate-client");

/**
 * Virtual objects reachable through the ingress
 */
export type RestateService =
  | "Raffle"
  | "RandomnessCoordinator"
  | "Account"
  | "Automation";

/**
 * Custom error that preserves HTTP status code from Restate, and the domain
 * code and details when the handler failed with a raffle error
 */
export class RestateError extends Error {
  statusCode: number;
  code?: string;
  details?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number,
    code?: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "RestateError";
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

/**
 * Timeout error for Restate calls
 */
export class RestateTimeoutError extends Error {
  constructor(service: string, method: string, timeoutMs: number) {
    super(`Restate call to ${service}.${method} timed out after ${timeoutMs}ms`);
    this.name = "RestateTimeoutError";
  }
}

/**
 * Pull the message out of an ingress error body, falling back to the raw text
 */
export function extractErrorMessage(body: string): string {
  try {
    const parsed: unknown = JSON.parse(body);
    if (
      parsed &&
      typeof parsed === "object" &&
      "message" in parsed &&
      typeof parsed.message === "string"
    ) {
      return parsed.message;
    }
  } catch {
    // Not JSON; use the body as is
  }
  return body;
}

/**
 * Build the RestateError for a failed ingress response body
 */
export function toRestateError(body: string, statusCode: number): RestateError {
  const message = extractErrorMessage(body);
  const payload = decodeRaffleError(message);
  if (payload) {
    return new RestateError(payload.message, statusCode, payload.code, payload.details);
  }
  return new RestateError(message, statusCode);
}

/**
 * Call a virtual object handler through the Restate ingress.
 * Throws RestateError on failure, RestateTimeoutError on timeout.
 */
export async function callRestate<T = unknown>(
  service: RestateService,
  key: string,
  method: string,
  payload: unknown = {},
  options?: { timeoutMs?: number }
): Promise<T> {
  const timeoutMs = options?.timeoutMs ?? config.restate.defaultTimeoutMs;
  const url = `${config.restate.ingressUrl}/${service}/${encodeURIComponent(key)}/${method}`;

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify(payload),
      signal: controller.signal,
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw toRestateError(errorText, response.status);
    }

    return (await response.json()) as T;
  } catch (error) {
    if (error instanceof Error && error.name === "AbortError") {
      throw new RestateTimeoutError(service, method, timeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Call Restate ingress API, returning null on error (for non-critical calls)
 */
export async function callRestateSafe<T = unknown>(
  service: RestateService,
  key: string,
  method: string,
  payload: unknown = {},
  options?: { timeoutMs?: number }
): Promise<T | null> {
  try {
    return await callRestate<T>(service, key, method, payload, options);
  } catch (error) {
    if (error instanceof RestateTimeoutError) {
      logger.warn({ service, method }, error.message);
    } else if (error instanceof RestateError) {
      logger.warn(
        { service, method, statusCode: error.statusCode },
        `Restate error: ${error.message}`
      );
    } else {
      logger.error({ err: error, service, method }, "Failed to call Restate");
    }
    return null;
  }
}

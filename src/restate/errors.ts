import * as restate from "@restatedev/restate-sdk";
import {
  decodeRaffleError,
  encodeRaffleError,
  RaffleError,
} from "../lib/raffle/errors.js";

/**
 * Turn a domain failure into a TerminalError so Restate surfaces it to the
 * caller instead of retrying. Domain errors travel as their encoded payload
 * so the code and details reach the HTTP edge. Bad input (RangeError) is
 * terminal too. Anything else is returned unchanged and stays retryable.
 */
export function asTerminalError(error: unknown): unknown {
  if (error instanceof restate.TerminalError) {
    return error;
  }
  if (error instanceof RaffleError) {
    return new restate.TerminalError(encodeRaffleError(error), {
      errorCode: error.status,
    });
  }
  if (error instanceof RangeError) {
    return new restate.TerminalError(error.message, { errorCode: 400 });
  }
  return error;
}

/**
 * Rebuild the domain error carried by a TerminalError from another object.
 * Anything that does not carry one is returned unchanged.
 */
export function fromTerminalError(error: unknown): unknown {
  if (!(error instanceof restate.TerminalError)) {
    return error;
  }
  const payload = decodeRaffleError(error.message);
  if (!payload) {
    return error;
  }
  return new RaffleError(payload.message, payload.code, payload.status, payload.details);
}

/**
 * Human-readable message of a TerminalError, unwrapping an encoded domain error
 */
export function terminalErrorMessage(error: restate.TerminalError): string {
  return decodeRaffleError(error.message)?.message ?? error.message;
}

/**
 * Domain errors raised by the raffle core and its collaborators.
 * Each carries a machine-readable code and the HTTP status it maps to.
 */

import type { RaffleState } from "./types.js";

export const RaffleErrorCodes = {
  INSUFFICIENT_DEPOSIT: "INSUFFICIENT_DEPOSIT",
  ROUND_NOT_OPEN: "ROUND_NOT_OPEN",
  UPKEEP_NOT_NEEDED: "UPKEEP_NOT_NEEDED",
  NO_DRAW_PENDING: "NO_DRAW_PENDING",
  REQUEST_ID_MISMATCH: "REQUEST_ID_MISMATCH",
  MISSING_RANDOM_WORD: "MISSING_RANDOM_WORD",
  PAYOUT_FAILED: "PAYOUT_FAILED",
  INDEX_OUT_OF_RANGE: "INDEX_OUT_OF_RANGE",
  NONEXISTENT_REQUEST: "NONEXISTENT_REQUEST",
  INSUFFICIENT_FUNDS: "INSUFFICIENT_FUNDS",
  PAYOUT_REJECTED: "PAYOUT_REJECTED",
} as const;

export type RaffleErrorCode =
  (typeof RaffleErrorCodes)[keyof typeof RaffleErrorCodes];

export type RaffleErrorStatus = 400 | 404 | 409 | 502;

export class RaffleError extends Error {
  readonly code: RaffleErrorCode;
  readonly status: RaffleErrorStatus;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: RaffleErrorCode,
    status: RaffleErrorStatus,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "RaffleError";
    this.code = code;
    this.status = status;
    this.details = details;
  }
}

export class InsufficientDepositError extends RaffleError {
  constructor(amount: bigint, entranceFee: bigint) {
    super(
      `Deposit ${amount} is below the entrance fee ${entranceFee}`,
      RaffleErrorCodes.INSUFFICIENT_DEPOSIT,
      400,
      { amount: amount.toString(), entranceFee: entranceFee.toString() }
    );
    this.name = "InsufficientDepositError";
  }
}

/**
 * Also raised while a winner's payout is in flight: the round already reads
 * OPEN then, but takes no entries until the payout settles or rolls back.
 */
export class RoundNotOpenError extends RaffleError {
  constructor(state: RaffleState, settling = false) {
    super(
      settling
        ? `Raffle is not open (state: ${state}, payout in progress)`
        : `Raffle is not open (state: ${state})`,
      RaffleErrorCodes.ROUND_NOT_OPEN,
      409,
      settling ? { state, settling } : { state }
    );
    this.name = "RoundNotOpenError";
  }
}

/**
 * Draw requested while the upkeep predicate is false.
 * Carries the observed snapshot for diagnostics.
 */
export class UpkeepNotNeededError extends RaffleError {
  readonly balance: bigint;
  readonly participantCount: number;
  readonly state: RaffleState;

  constructor(balance: bigint, participantCount: number, state: RaffleState) {
    super(
      `Upkeep not needed (balance: ${balance}, players: ${participantCount}, state: ${state})`,
      RaffleErrorCodes.UPKEEP_NOT_NEEDED,
      409,
      { balance: balance.toString(), participantCount, state }
    );
    this.name = "UpkeepNotNeededError";
    this.balance = balance;
    this.participantCount = participantCount;
    this.state = state;
  }
}

export class NoDrawPendingError extends RaffleError {
  constructor(requestId: string) {
    super(
      `No draw is pending; cannot fulfill request ${requestId}`,
      RaffleErrorCodes.NO_DRAW_PENDING,
      409,
      { requestId }
    );
    this.name = "NoDrawPendingError";
  }
}

export class RequestIdMismatchError extends RaffleError {
  constructor(requestId: string, pendingRequestId: string | undefined) {
    super(
      `Request ${requestId} does not match pending request ${pendingRequestId ?? "none"}`,
      RaffleErrorCodes.REQUEST_ID_MISMATCH,
      409,
      { requestId, pendingRequestId }
    );
    this.name = "RequestIdMismatchError";
  }
}

export class MissingRandomWordError extends RaffleError {
  constructor(requestId: string) {
    super(
      `Fulfillment for request ${requestId} carried no random words`,
      RaffleErrorCodes.MISSING_RANDOM_WORD,
      400,
      { requestId }
    );
    this.name = "MissingRandomWordError";
  }
}

export class PayoutFailedError extends RaffleError {
  constructor(winner: string, prize: bigint, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Payout of ${prize} to ${winner} failed: ${reason}`,
      RaffleErrorCodes.PAYOUT_FAILED,
      502,
      { winner, prize: prize.toString(), reason }
    );
    this.name = "PayoutFailedError";
    this.cause = cause;
  }
}

export class IndexOutOfRangeError extends RaffleError {
  constructor(index: number, length: number) {
    super(
      `Index ${index} is out of range (${length} players)`,
      RaffleErrorCodes.INDEX_OUT_OF_RANGE,
      404,
      { index, length }
    );
    this.name = "IndexOutOfRangeError";
  }
}

export class NonexistentRequestError extends RaffleError {
  constructor(requestId: string) {
    super(
      "nonexistent request",
      RaffleErrorCodes.NONEXISTENT_REQUEST,
      404,
      { requestId }
    );
    this.name = "NonexistentRequestError";
  }
}

export class InsufficientFundsError extends RaffleError {
  constructor(balance: bigint, amount: bigint) {
    super(
      `Insufficient funds: balance ${balance}, needed ${amount}`,
      RaffleErrorCodes.INSUFFICIENT_FUNDS,
      400,
      { balance: balance.toString(), amount: amount.toString() }
    );
    this.name = "InsufficientFundsError";
  }
}

export class PayoutRejectedError extends RaffleError {
  constructor(account: string) {
    super(
      `Account ${account} does not accept payouts`,
      RaffleErrorCodes.PAYOUT_REJECTED,
      409,
      { account }
    );
    this.name = "PayoutRejectedError";
  }
}

// ============================================================
// Wire form
// ============================================================

/**
 * What survives of a RaffleError after it crosses a process boundary as
 * plain text (a Restate terminal error message, an ingress error body)
 */
export interface RaffleErrorPayload {
  message: string;
  code: RaffleErrorCode;
  status: RaffleErrorStatus;
  details?: Record<string, unknown>;
}

const RAFFLE_ERROR_CODES: readonly string[] = Object.values(RaffleErrorCodes);
const RAFFLE_ERROR_STATUSES: readonly RaffleErrorStatus[] = [400, 404, 409, 502];

function isRaffleErrorCode(value: unknown): value is RaffleErrorCode {
  return typeof value === "string" && RAFFLE_ERROR_CODES.includes(value);
}

function isRaffleErrorStatus(value: unknown): value is RaffleErrorStatus {
  return RAFFLE_ERROR_STATUSES.some((status) => status === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function encodeRaffleError(error: RaffleError): string {
  const payload: RaffleErrorPayload = {
    message: error.message,
    code: error.code,
    status: error.status,
  };
  if (error.details) payload.details = error.details;
  return JSON.stringify(payload);
}

/**
 * Inverse of encodeRaffleError. Returns null for any text it did not produce.
 */
export function decodeRaffleError(text: string): RaffleErrorPayload | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (
    !isRecord(parsed) ||
    typeof parsed.message !== "string" ||
    !isRaffleErrorCode(parsed.code) ||
    !isRaffleErrorStatus(parsed.status)
  ) {
    return null;
  }

  const payload: RaffleErrorPayload = {
    message: parsed.message,
    code: parsed.code,
    status: parsed.status,
  };
  if (isRecord(parsed.details)) payload.details = parsed.details;
  return payload;
}

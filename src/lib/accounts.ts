/**
 * Participant account balances
 * Deposits for entries are debited here and prizes are credited back.
 */

import {
  InsufficientFundsError,
  PayoutRejectedError,
} from "./raffle/errors.js";

export interface AccountState {
  /** Decimal string, smallest currency unit */
  balance: string;
  /** When false, the account refuses prize payouts */
  acceptsPayouts: boolean;
  /** Unix ms of the last change */
  lastUpdated?: number;
}

export function emptyAccount(): AccountState {
  return { balance: "0", acceptsPayouts: true };
}

function requirePositive(amount: bigint): void {
  if (amount <= 0n) {
    throw new RangeError("Amount must be positive");
  }
}

export function creditAccount(
  state: AccountState,
  amount: bigint,
  now: number
): AccountState {
  requirePositive(amount);
  return {
    ...state,
    balance: (BigInt(state.balance) + amount).toString(),
    lastUpdated: now,
  };
}

export function debitAccount(
  state: AccountState,
  amount: bigint,
  now: number
): AccountState {
  requirePositive(amount);
  const balance = BigInt(state.balance);
  if (balance < amount) {
    throw new InsufficientFundsError(balance, amount);
  }
  return { ...state, balance: (balance - amount).toString(), lastUpdated: now };
}

/**
 * Credit a prize, unless the account has opted out of receiving payouts
 */
export function receivePayout(
  account: string,
  state: AccountState,
  amount: bigint,
  now: number
): AccountState {
  if (!state.acceptsPayouts) {
    throw new PayoutRejectedError(account);
  }
  return creditAccount(state, amount, now);
}

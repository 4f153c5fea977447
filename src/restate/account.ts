import * as restate from "@restatedev/restate-sdk";
import {
  creditAccount,
  debitAccount,
  emptyAccount,
  receivePayout,
  type AccountState,
} from "../lib/accounts.js";
import { parseAmount } from "../lib/amount.js";
import { createLogger } from "../lib/logger.js";
import { asTerminalError } from "./errors.js";

const logger = createLogger("account");

// State keys
const STATE_KEY = "state";

/**
 * Helper to get current time deterministically in Restate context
 */
async function getCurrentTime(ctx: restate.ObjectContext): Promise<number> {
  return ctx.run("get_time", () => Date.now());
}

async function loadAccount(ctx: restate.ObjectContext): Promise<AccountState> {
  return (await ctx.get<AccountState>(STATE_KEY)) ?? emptyAccount();
}

function toAmount(value: string): bigint {
  try {
    return parseAmount(value);
  } catch (error) {
    throw asTerminalError(error);
  }
}

/**
 * Account virtual object - one participant's balance
 * Keyed by player id; the raffle debits entries and credits prizes here
 */
export const accountObject = restate.object({
  name: "Account",
  handlers: {
    /**
     * Current balance and payout preference
     */
    getBalance: async (
      ctx: restate.ObjectContext,
      _input: Record<string, never>
    ): Promise<AccountState> => {
      return loadAccount(ctx);
    },

    /**
     * Fund the account (development faucet, admin only through the API)
     */
    deposit: async (
      ctx: restate.ObjectContext,
      input: { amount: string }
    ): Promise<{ balance: string }> => {
      const state = await loadAccount(ctx);
      const now = await getCurrentTime(ctx);

      let next: AccountState;
      try {
        next = creditAccount(state, toAmount(input.amount), now);
      } catch (error) {
        throw asTerminalError(error);
      }

      ctx.set(STATE_KEY, next);
      logger.info({ account: ctx.key, amount: input.amount }, "Deposit credited");
      return { balance: next.balance };
    },

    /**
     * Take an entry deposit out of the account
     */
    debit: async (
      ctx: restate.ObjectContext,
      input: { amount: string }
    ): Promise<{ balance: string }> => {
      const state = await loadAccount(ctx);
      const now = await getCurrentTime(ctx);

      let next: AccountState;
      try {
        next = debitAccount(state, toAmount(input.amount), now);
      } catch (error) {
        throw asTerminalError(error);
      }

      ctx.set(STATE_KEY, next);
      return { balance: next.balance };
    },

    /**
     * Credit a prize. Fails terminally when the account refuses payouts.
     */
    receivePayout: async (
      ctx: restate.ObjectContext,
      input: { amount: string }
    ): Promise<{ balance: string }> => {
      const state = await loadAccount(ctx);
      const now = await getCurrentTime(ctx);

      let next: AccountState;
      try {
        next = receivePayout(ctx.key, state, toAmount(input.amount), now);
      } catch (error) {
        logger.warn(
          { account: ctx.key, amount: input.amount, err: error },
          "Payout refused"
        );
        throw asTerminalError(error);
      }

      ctx.set(STATE_KEY, next);
      logger.info({ account: ctx.key, amount: input.amount }, "Payout received");
      return { balance: next.balance };
    },

    /**
     * Opt in or out of receiving payouts
     */
    setAcceptsPayouts: async (
      ctx: restate.ObjectContext,
      input: { acceptsPayouts: boolean }
    ): Promise<AccountState> => {
      const state = await loadAccount(ctx);
      const now = await getCurrentTime(ctx);
      const next: AccountState = {
        ...state,
        acceptsPayouts: input.acceptsPayouts,
        lastUpdated: now,
      };
      ctx.set(STATE_KEY, next);
      return next;
    },
  },
});

export type AccountObject = typeof accountObject;

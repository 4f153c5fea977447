import * as restate from "@restatedev/restate-sdk";
import {
  BufferedEventSink,
  Raffle,
  RAFFLE_STATE_CODES,
  Round,
  type DrawOutcome,
  type RaffleDeps,
  type RaffleSettings,
  type RaffleState,
  type RoundRecord,
  type UpkeepCheck,
} from "../lib/raffle/index.js";
import {
  enterRequestSchema,
  fulfillRandomWordsSchema,
  raffleConfigSchema,
  validateInput,
  type RaffleConfigInput,
} from "../lib/schemas.js";
import { publishRaffleEvent } from "../lib/nats.js";
import { createLogger } from "../lib/logger.js";
import { config } from "../lib/config.js";
import { accountObject } from "./account.js";
import { asTerminalError, fromTerminalError } from "./errors.js";
import { randomnessCoordinatorObject } from "./randomness-coordinator.js";
import type { z } from "zod";

const logger = createLogger("raffle");

// State keys
const STATE_KEY = "round";
const COORDINATOR_KEY = "coordinator";

export interface RaffleStatus {
  raffleId: string;
  state: RaffleState;
  stateCode: number;
  entranceFee: string;
  interval: number;
  lastDrawTimestamp: number;
  players: string[];
  numberOfPlayers: number;
  balance: string;
  recentWinner: string | null;
  pendingRequestId: string | null;
  requestConfirmations: number;
  numWords: number;
}

export interface DrawOutcomeRecord {
  requestId: string;
  winner: string;
  winnerIndex: number;
  prize: string;
}

/**
 * Current time in unix seconds, journaled so replays see the same value
 */
async function getBlockTime(ctx: restate.ObjectContext): Promise<number> {
  return ctx.run("get_time", () => Math.floor(Date.now() / 1000));
}

async function loadRecord(ctx: restate.ObjectContext): Promise<RoundRecord> {
  const record = await ctx.get<RoundRecord>(STATE_KEY);
  if (!record) {
    throw new restate.TerminalError("Raffle not initialized", {
      errorCode: 404,
    });
  }
  return record;
}

async function loadCoordinatorKey(ctx: restate.ObjectContext): Promise<string> {
  return (
    (await ctx.get<string>(COORDINATOR_KEY)) ?? config.randomness.coordinatorKey
  );
}

/**
 * Gateways backed by the RandomnessCoordinator and Account objects
 */
function restateGateways(
  ctx: restate.ObjectContext,
  coordinatorKey: string
): Pick<RaffleDeps, "randomness" | "payouts"> {
  return {
    randomness: {
      requestRandomWords: async (request) => {
        const { requestId } = await ctx
          .objectClient(randomnessCoordinatorObject, coordinatorKey)
          .requestRandomWords({ ...request, consumer: ctx.key });
        return requestId;
      },
    },
    payouts: {
      transfer: async (recipient, amount) => {
        try {
          await ctx
            .objectClient(accountObject, recipient)
            .receivePayout({ amount: amount.toString() });
        } catch (error) {
          throw fromTerminalError(error);
        }
      },
    },
  };
}

/**
 * Rebuild the raffle for one invocation. Events are buffered and only
 * published by publishEvents once the new state has been set.
 */
async function loadRaffle(
  ctx: restate.ObjectContext,
  events: BufferedEventSink
): Promise<Raffle> {
  const record = await loadRecord(ctx);
  const coordinatorKey = await loadCoordinatorKey(ctx);
  const now = await getBlockTime(ctx);
  return Raffle.fromRecord(record, {
    ...restateGateways(ctx, coordinatorKey),
    events,
    clock: () => now,
  });
}

/**
 * Publish buffered notifications as a single journaled side effect
 */
async function publishEvents(
  ctx: restate.ObjectContext,
  events: BufferedEventSink
): Promise<void> {
  const drained = events.drain();
  if (drained.length === 0) return;

  const raffleId = ctx.key;
  await ctx.run("publish_raffle_events", async () => {
    for (const event of drained) {
      await publishRaffleEvent(raffleId, event);
    }
  });
}

function parseOrReject<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown
): T {
  const result = validateInput(schema, input);
  if (!result.success) {
    const message = result.error.errors
      .map((e) => (e.path.length > 0 ? `${e.path.join(".")}: ${e.message}` : e.message))
      .join("; ");
    throw new restate.TerminalError(message, { errorCode: 400 });
  }
  return result.data;
}

function toStatus(raffleId: string, round: Round): RaffleStatus {
  return {
    raffleId,
    state: round.state,
    stateCode: RAFFLE_STATE_CODES[round.state],
    entranceFee: round.entranceFee.toString(),
    interval: round.interval,
    lastDrawTimestamp: round.lastDrawTimestamp,
    players: [...round.ledger.players()],
    numberOfPlayers: round.ledger.count,
    balance: round.ledger.poolBalance.toString(),
    recentWinner: round.recentWinner ?? null,
    pendingRequestId: round.pendingRequestId ?? null,
    requestConfirmations: round.settings.requestConfirmations,
    numWords: round.settings.numWords,
  };
}

function toOutcomeRecord(outcome: DrawOutcome): DrawOutcomeRecord {
  return { ...outcome, prize: outcome.prize.toString() };
}

async function readRound(ctx: restate.ObjectContext): Promise<Round> {
  return Round.fromRecord(await loadRecord(ctx));
}

// Define the Raffle virtual object
export const raffleObject = restate.object({
  name: "Raffle",
  handlers: {
    /**
     * Create the round. Calling it again on an initialized raffle returns
     * the existing configuration and changes nothing.
     */
    initialize: async (
      ctx: restate.ObjectContext,
      input: RaffleConfigInput
    ): Promise<{ created: boolean; status: RaffleStatus }> => {
      const existing = await ctx.get<RoundRecord>(STATE_KEY);
      if (existing) {
        return { created: false, status: toStatus(ctx.key, Round.fromRecord(existing)) };
      }

      const raffleConfig = parseOrReject(raffleConfigSchema, input ?? {});
      const settings: RaffleSettings = {
        entranceFee: BigInt(raffleConfig.entranceFee),
        interval: raffleConfig.interval,
        keyHash: raffleConfig.keyHash,
        subscriptionId: raffleConfig.subscriptionId,
        callbackGasLimit: raffleConfig.callbackGasLimit,
        requestConfirmations: raffleConfig.requestConfirmations,
        numWords: raffleConfig.numWords,
      };

      const now = await getBlockTime(ctx);
      let round: Round;
      try {
        round = Round.create(settings, now);
      } catch (error) {
        throw asTerminalError(error);
      }

      ctx.set(STATE_KEY, round.toRecord());
      ctx.set(COORDINATOR_KEY, raffleConfig.coordinatorKey);

      logger.info(
        {
          raffleId: ctx.key,
          entranceFee: raffleConfig.entranceFee,
          interval: raffleConfig.interval,
          coordinator: raffleConfig.coordinatorKey,
        },
        "Raffle initialized"
      );

      return { created: true, status: toStatus(ctx.key, round) };
    },

    /**
     * Join the current round. The round guards run before the participant's
     * account is debited, so a rejected entry never moves funds.
     */
    enter: async (
      ctx: restate.ObjectContext,
      input: { player: string; amount: string }
    ): Promise<{ index: number; numberOfPlayers: number; balance: string }> => {
      const request = parseOrReject(enterRequestSchema, input);
      const amount = BigInt(request.amount);
      const events = new BufferedEventSink();
      const raffle = await loadRaffle(ctx, events);

      let index: number;
      try {
        index = await raffle.enterFunded(request.player, amount, async (player, debited) => {
          await ctx.objectClient(accountObject, player).debit({ amount: debited.toString() });
        });
      } catch (error) {
        throw asTerminalError(error);
      }

      ctx.set(STATE_KEY, raffle.toRecord());
      await publishEvents(ctx, events);

      logger.debug(
        { raffleId: ctx.key, player: request.player, index },
        "Entry recorded"
      );

      return {
        index,
        numberOfPlayers: raffle.round.ledger.count,
        balance: raffle.round.ledger.poolBalance.toString(),
      };
    },

    checkUpkeep: async (
      ctx: restate.ObjectContext,
      input: { checkData?: string }
    ): Promise<UpkeepCheck> => {
      const raffle = await loadRaffle(ctx, new BufferedEventSink());
      return raffle.checkUpkeep(input?.checkData);
    },

    /**
     * Start a draw. The upkeep predicate is evaluated again here, so a
     * stale or forged call fails with UpkeepNotNeeded.
     */
    performUpkeep: async (
      ctx: restate.ObjectContext,
      _input: { performData?: string }
    ): Promise<{ requestId: string }> => {
      const events = new BufferedEventSink();
      const raffle = await loadRaffle(ctx, events);

      let requestId: string;
      try {
        requestId = await raffle.requestDraw();
      } catch (error) {
        throw asTerminalError(error);
      }

      ctx.set(STATE_KEY, raffle.toRecord());
      await publishEvents(ctx, events);

      logger.info({ raffleId: ctx.key, requestId }, "Draw requested");
      return { requestId };
    },

    /**
     * Randomness callback. Ingress-private: only the coordinator calls it.
     */
    fulfillRandomWords: restate.handlers.object.exclusive(
      { ingressPrivate: true },
      async (
        ctx: restate.ObjectContext,
        input: { requestId: string; randomWords: string[] }
      ): Promise<DrawOutcomeRecord> => {
        const request = parseOrReject(fulfillRandomWordsSchema, input);
        const events = new BufferedEventSink();
        const raffle = await loadRaffle(ctx, events);

        let outcome: DrawOutcome;
        try {
          outcome = await raffle.fulfillRandomWords(
            request.requestId,
            request.randomWords.map((word) => BigInt(word))
          );
        } catch (error) {
          logger.error(
            { raffleId: ctx.key, requestId: request.requestId, err: error },
            "Fulfillment rejected"
          );
          throw asTerminalError(error);
        }

        ctx.set(STATE_KEY, raffle.toRecord());
        await publishEvents(ctx, events);

        logger.info(
          {
            raffleId: ctx.key,
            requestId: outcome.requestId,
            winner: outcome.winner,
            prize: outcome.prize.toString(),
          },
          "Winner picked"
        );
        return toOutcomeRecord(outcome);
      }
    ),

    // ============================================================
    // Read-only accessors
    // ============================================================

    getState: async (
      ctx: restate.ObjectContext,
      _input: Record<string, never>
    ): Promise<RaffleStatus> => {
      return toStatus(ctx.key, await readRound(ctx));
    },

    getEntranceFee: async (
      ctx: restate.ObjectContext,
      _input: Record<string, never>
    ): Promise<{ entranceFee: string }> => {
      const round = await readRound(ctx);
      return { entranceFee: round.entranceFee.toString() };
    },

    getPlayer: async (
      ctx: restate.ObjectContext,
      input: { index: number }
    ): Promise<{ index: number; player: string }> => {
      const round = await readRound(ctx);
      try {
        return { index: input.index, player: round.ledger.playerAt(input.index) };
      } catch (error) {
        throw asTerminalError(error);
      }
    },

    getRecentWinner: async (
      ctx: restate.ObjectContext,
      _input: Record<string, never>
    ): Promise<{ recentWinner: string | null }> => {
      const round = await readRound(ctx);
      return { recentWinner: round.recentWinner ?? null };
    },

    getRaffleState: async (
      ctx: restate.ObjectContext,
      _input: Record<string, never>
    ): Promise<{ state: RaffleState; code: number }> => {
      const round = await readRound(ctx);
      return { state: round.state, code: RAFFLE_STATE_CODES[round.state] };
    },

    getNumberOfPlayers: async (
      ctx: restate.ObjectContext,
      _input: Record<string, never>
    ): Promise<{ numberOfPlayers: number }> => {
      const round = await readRound(ctx);
      return { numberOfPlayers: round.ledger.count };
    },

    getLatestTimestamp: async (
      ctx: restate.ObjectContext,
      _input: Record<string, never>
    ): Promise<{ timestamp: number }> => {
      const round = await readRound(ctx);
      return { timestamp: round.lastDrawTimestamp };
    },

    getInterval: async (
      ctx: restate.ObjectContext,
      _input: Record<string, never>
    ): Promise<{ interval: number }> => {
      const round = await readRound(ctx);
      return { interval: round.interval };
    },

    getRequestConfirmations: async (
      ctx: restate.ObjectContext,
      _input: Record<string, never>
    ): Promise<{ requestConfirmations: number }> => {
      const round = await readRound(ctx);
      return { requestConfirmations: round.settings.requestConfirmations };
    },

    getNumWords: async (
      ctx: restate.ObjectContext,
      _input: Record<string, never>
    ): Promise<{ numWords: number }> => {
      const round = await readRound(ctx);
      return { numWords: round.settings.numWords };
    },

    /**
     * Pool balance held for the current round
     */
    getBalance: async (
      ctx: restate.ObjectContext,
      _input: Record<string, never>
    ): Promise<{ balance: string }> => {
      const round = await readRound(ctx);
      return { balance: round.ledger.poolBalance.toString() };
    },
  },
});

export type RaffleObject = typeof raffleObject;

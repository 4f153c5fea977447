import * as restate from "@restatedev/restate-sdk";
import {
  generateRandomWords,
  RandomnessCoordinator,
  type CoordinatorRecord,
  type PendingRandomnessRequest,
} from "../lib/randomness.js";
import type { RandomWordsRequest } from "../lib/raffle/types.js";
import { createLogger } from "../lib/logger.js";
import { config } from "../lib/config.js";
import { asTerminalError, terminalErrorMessage } from "./errors.js";
import type { RaffleObject } from "./raffle.js";

const logger = createLogger("randomness-coordinator");

// State keys
const STATE_KEY = "coordinator";

// Typed reference; importing the object itself would be circular
const Raffle: RaffleObject = { name: "Raffle" };

export interface FulfillmentResult {
  requestId: string;
  success: boolean;
  winner?: string;
  error?: string;
}

async function getCurrentTime(ctx: restate.ObjectContext): Promise<number> {
  return ctx.run("get_time", () => Date.now());
}

async function loadCoordinator(
  ctx: restate.ObjectContext
): Promise<RandomnessCoordinator> {
  const record = await ctx.get<CoordinatorRecord>(STATE_KEY);
  return new RandomnessCoordinator(record ?? undefined);
}

/**
 * RandomnessCoordinator virtual object - the randomness oracle
 *
 * Hands out request ids immediately and answers each request later with
 * a delayed self-call, once the requested confirmations have "passed".
 * Each request is answered at most once: it is consumed before the
 * consumer is called back, and a rejected callback is not retried.
 */
export const randomnessCoordinatorObject = restate.object({
  name: "RandomnessCoordinator",
  handlers: {
    requestRandomWords: async (
      ctx: restate.ObjectContext,
      input: RandomWordsRequest & { consumer: string }
    ): Promise<{ requestId: string }> => {
      const coordinator = await loadCoordinator(ctx);
      const now = await getCurrentTime(ctx);

      const { consumer, ...params } = input;
      let request: PendingRandomnessRequest;
      try {
        request = coordinator.request(consumer, params, now);
      } catch (error) {
        throw asTerminalError(error);
      }

      ctx.set(STATE_KEY, coordinator.toRecord());

      const delayMs =
        config.randomness.confirmationDelayMs * request.requestConfirmations;
      ctx
        .objectSendClient(randomnessCoordinatorObject, ctx.key, { delay: delayMs })
        .fulfillRandomWords({ requestId: request.requestId });

      logger.info(
        {
          coordinator: ctx.key,
          consumer,
          requestId: request.requestId,
          numWords: request.numWords,
          delayMs,
        },
        "Randomness requested"
      );

      return { requestId: request.requestId };
    },

    /**
     * Answer a pending request with freshly generated words. Ingress-private:
     * only the delayed self-send from requestRandomWords reaches it.
     */
    fulfillRandomWords: restate.handlers.object.exclusive(
      { ingressPrivate: true },
      async (
        ctx: restate.ObjectContext,
        input: { requestId: string }
      ): Promise<FulfillmentResult> => {
        const coordinator = await loadCoordinator(ctx);

        let request: PendingRandomnessRequest;
        try {
          request = coordinator.consume(input.requestId);
        } catch (error) {
          throw asTerminalError(error);
        }

        const randomWords = await ctx.run("generate_random_words", () =>
          generateRandomWords(request.numWords).map((word) => word.toString())
        );

        ctx.set(STATE_KEY, coordinator.toRecord());

        try {
          const outcome = await ctx
            .objectClient(Raffle, request.consumer)
            .fulfillRandomWords({ requestId: request.requestId, randomWords });

          logger.info(
            { requestId: request.requestId, consumer: request.consumer, winner: outcome.winner },
            "Randomness fulfilled"
          );
          return { requestId: request.requestId, success: true, winner: outcome.winner };
        } catch (error) {
          if (error instanceof restate.TerminalError) {
            logger.error(
              { requestId: request.requestId, consumer: request.consumer, err: error },
              "Consumer rejected fulfillment"
            );
            return {
              requestId: request.requestId,
              success: false,
              error: terminalErrorMessage(error),
            };
          }
          throw error;
        }
      }
    ),

    getPendingRequests: async (
      ctx: restate.ObjectContext,
      _input: Record<string, never>
    ): Promise<{ pending: PendingRandomnessRequest[] }> => {
      const coordinator = await loadCoordinator(ctx);
      return { pending: coordinator.pendingRequests() };
    },
  },
});

export type RandomnessCoordinatorObject = typeof randomnessCoordinatorObject;

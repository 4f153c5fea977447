import * as restate from "@restatedev/restate-sdk";
import {
  initialAutomationStatus,
  isCurrentPoll,
  recordPoll,
  runUpkeepTick,
  startAutomation,
  stopAutomation,
  type AutomationStatus,
  type RejectionClassifier,
} from "../lib/automation.js";
import type { AutomationGateway } from "../lib/raffle/index.js";
import { automationStartSchema } from "../lib/schemas.js";
import { createLogger } from "../lib/logger.js";
import { config } from "../lib/config.js";
import { raffleObject } from "./raffle.js";
import { terminalErrorMessage } from "./errors.js";

export type { AutomationStatus } from "../lib/automation.js";

const logger = createLogger("automation");

// State keys
const STATE_KEY = "status";

async function getCurrentTime(ctx: restate.ObjectContext): Promise<number> {
  return ctx.run("get_time", () => Date.now());
}

async function loadStatus(ctx: restate.ObjectContext): Promise<AutomationStatus> {
  return (
    (await ctx.get<AutomationStatus>(STATE_KEY)) ??
    initialAutomationStatus(config.automation.pollIntervalMs)
  );
}

/**
 * The keyed Raffle object seen through the check/perform contract
 */
function raffleGateway(ctx: restate.ObjectContext): AutomationGateway {
  const raffle = ctx.objectClient(raffleObject, ctx.key);
  return {
    checkUpkeep: (checkData) => raffle.checkUpkeep({ checkData }),
    performUpkeep: async (performData) => {
      const { requestId } = await raffle.performUpkeep({ performData });
      logger.debug({ raffleId: ctx.key, requestId }, "Draw requested by keeper");
    },
  };
}

// Terminal failures from the raffle are final for this tick; anything else retries
const terminalRejection: RejectionClassifier = (error) =>
  error instanceof restate.TerminalError ? terminalErrorMessage(error) : undefined;

/**
 * Automation virtual object - the upkeep keeper for one raffle
 * Keyed by raffle id. While active it polls checkUpkeep on a delayed
 * self-send loop and calls performUpkeep whenever a draw is due.
 */
export const automationObject = restate.object({
  name: "Automation",
  handlers: {
    start: async (
      ctx: restate.ObjectContext,
      input: { pollIntervalMs?: number }
    ): Promise<AutomationStatus> => {
      const parsed = automationStartSchema.safeParse(input ?? {});
      if (!parsed.success) {
        throw new restate.TerminalError(
          parsed.error.errors.map((e) => e.message).join("; "),
          { errorCode: 400 }
        );
      }

      const status = startAutomation(await loadStatus(ctx), parsed.data.pollIntervalMs);
      ctx.set(STATE_KEY, status);

      ctx
        .objectSendClient(automationObject, ctx.key)
        .poll({ generation: status.generation });

      logger.info(
        { raffleId: ctx.key, pollIntervalMs: status.pollIntervalMs },
        "Automation started"
      );
      return status;
    },

    stop: async (
      ctx: restate.ObjectContext,
      _input: Record<string, never>
    ): Promise<AutomationStatus> => {
      const status = stopAutomation(await loadStatus(ctx));
      ctx.set(STATE_KEY, status);
      logger.info({ raffleId: ctx.key }, "Automation stopped");
      return status;
    },

    /**
     * One keeper tick, then the next one is scheduled. Ticks from a chain
     * that start/stop has since replaced do nothing.
     */
    poll: restate.handlers.object.exclusive(
      { ingressPrivate: true },
      async (
        ctx: restate.ObjectContext,
        input: { generation: number }
      ): Promise<{ polled: boolean; performed: boolean }> => {
        const status = await loadStatus(ctx);
        if (!isCurrentPoll(status, input.generation)) {
          return { polled: false, performed: false };
        }

        const now = await getCurrentTime(ctx);
        const outcome = await runUpkeepTick(
          raffleGateway(ctx),
          logger.child({ raffleId: ctx.key }),
          terminalRejection
        );

        ctx.set(STATE_KEY, recordPoll(status, outcome, now));

        ctx
          .objectSendClient(automationObject, ctx.key, {
            delay: status.pollIntervalMs,
          })
          .poll({ generation: status.generation });

        return { polled: true, performed: outcome.kind === "performed" };
      }
    ),

    getStatus: async (
      ctx: restate.ObjectContext,
      _input: Record<string, never>
    ): Promise<AutomationStatus> => {
      return loadStatus(ctx);
    },
  },
});

export type AutomationObject = typeof automationObject;

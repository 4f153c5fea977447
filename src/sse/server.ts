/**
 * SSE (Server-Sent Events) server for raffle notifications
 * Bootstraps from Restate, then forwards NATS messages
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import { streamSSE } from "hono/streaming";
import {
  decodeMessage,
  safeUnsubscribe,
  subscribeRaffleEvents,
} from "../lib/nats.js";
import { isRaffleStreamEvent } from "../lib/events.js";
import { callRestateSafe } from "../lib/restate-client.js";
import { corsOptions } from "../lib/cors-config.js";
import { raffleIdSchema } from "../lib/schemas.js";
import { handleZodError } from "../lib/errors.js";
import { config } from "../lib/config.js";
import { createLogger } from "../lib/logger.js";
import type { RaffleStatus } from "../restate/raffle.js";

const sseApp = new Hono();
const logger = createLogger("sse");

sseApp.use("*", cors(corsOptions(["GET", "OPTIONS"], ["Content-Type", "Cache-Control"])));

// Health check endpoint
sseApp.get("/health", (c) => c.json({ status: "ok", service: "sse" }));

/**
 * Raffle notification stream.
 * Sends a "connected" snapshot first, then one SSE event per notification,
 * named after its type (RaffleEnter, RequestedRaffleWinner, WinnerPicked).
 */
sseApp.get("/events/:raffleId", async (c) => {
  const parsed = raffleIdSchema.safeParse(c.req.param("raffleId"));
  if (!parsed.success) return handleZodError(c, parsed.error);
  const raffleId = parsed.data;

  return streamSSE(c, async (stream) => {
    // 1. Send initial state from Restate (bootstrap)
    const status = await callRestateSafe<RaffleStatus>(
      "Raffle",
      raffleId,
      "getState",
      {},
      { timeoutMs: config.restate.apiTimeoutMs }
    );

    await stream.writeSSE({
      event: "connected",
      data: JSON.stringify({ raffleId, status, serverTime: Date.now() }),
    });

    // 2. Subscribe to NATS
    let subscription: Awaited<ReturnType<typeof subscribeRaffleEvents>>;
    try {
      subscription = await subscribeRaffleEvents(raffleId);
    } catch (error) {
      logger.error({ err: error, raffleId }, "Cannot stream raffle events");
      await stream.writeSSE({
        event: "error",
        data: JSON.stringify({ error: "Event stream unavailable" }),
      });
      return;
    }

    // 3. Forward messages until the client goes away
    const forward = async () => {
      for await (const msg of subscription) {
        try {
          const event = decodeMessage(msg.data);
          if (!isRaffleStreamEvent(event)) {
            logger.warn({ raffleId, subject: msg.subject }, "Dropping malformed event");
            continue;
          }
          await stream.writeSSE({ event: event.type, data: JSON.stringify(event) });
        } catch (err) {
          logger.error({ err, raffleId }, "Error forwarding raffle event");
        }
      }
    };

    forward().catch((err: unknown) => {
      logger.error({ err, raffleId }, "SSE forwarding error");
    });

    // 4. Handle cleanup on disconnect
    stream.onAbort(() => {
      logger.info({ raffleId }, "Client disconnected");
      safeUnsubscribe(subscription);
    });

    // Keep connection open
    while (!c.req.raw.signal.aborted) {
      await stream.sleep(1000);
    }
    safeUnsubscribe(subscription);
  });
});

export default sseApp;

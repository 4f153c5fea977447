/**
 * NATS pub/sub for raffle notifications
 * Publishing is fire-and-forget; the SSE server subscribes per raffle
 */

import { connect } from "@nats-io/transport-node";
import type { NatsConnection, Subscription } from "@nats-io/nats-core";
import { getRaffleTopic, type RaffleStreamEvent } from "./events.js";
import type { RaffleEvent } from "./raffle/types.js";
import { createLogger } from "./logger.js";
import { config } from "./config.js";

const logger = createLogger("nats");
const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

// Shared connection; concurrent callers await the same attempt
let natsConnection: NatsConnection | null = null;
let connectionPromise: Promise<NatsConnection> | null = null;

/**
 * Get the NATS connection (creates if needed)
 */
export async function getNatsConnection(): Promise<NatsConnection> {
  if (natsConnection) return natsConnection;
  if (connectionPromise) return connectionPromise;

  connectionPromise = (async () => {
    try {
      const conn = await connect({
        servers: config.nats.url,
        maxReconnectAttempts: config.nats.maxReconnectAttempts,
      });

      conn
        .closed()
        .then((err) => {
          logger.info({ err }, "NATS connection closed");
          natsConnection = null;
          connectionPromise = null;
        })
        .catch((err: unknown) => {
          logger.warn({ err }, "NATS close handler failed");
        });

      logger.info({ url: config.nats.url }, "Connected to NATS");
      natsConnection = conn;
      return conn;
    } catch (error) {
      logger.error({ err: error }, "Failed to connect to NATS");
      connectionPromise = null;
      throw error;
    }
  })();

  return connectionPromise;
}

/**
 * Drain and close the shared connection, if one was opened
 */
export async function closeNatsConnection(): Promise<void> {
  const conn = natsConnection;
  if (!conn) return;
  natsConnection = null;
  connectionPromise = null;
  await conn.drain();
}

/**
 * Publish a raffle notification.
 *
 * Observers are best effort: a missed notification is recovered by reading
 * the raffle state, so publish failures are logged and never fail the
 * raffle operation that produced them.
 */
export async function publishRaffleEvent(
  raffleId: string,
  event: RaffleEvent
): Promise<void> {
  if (!config.nats.publishEvents) return;

  const message: RaffleStreamEvent = {
    ...event,
    raffleId,
    serverTime: Date.now(),
  };

  try {
    const conn = await getNatsConnection();
    conn.publish(getRaffleTopic(raffleId), textEncoder.encode(JSON.stringify(message)));
  } catch (error) {
    logger.error(
      { err: error, raffleId, type: event.type },
      "Failed to publish raffle event"
    );
  }
}

/**
 * Subscribe to one raffle's notifications
 */
export async function subscribeRaffleEvents(
  raffleId: string
): Promise<Subscription> {
  try {
    const conn = await getNatsConnection();
    const topic = getRaffleTopic(raffleId);
    const subscription = conn.subscribe(topic);
    logger.debug({ raffleId, topic }, "Subscribed to raffle events");
    return subscription;
  } catch (error) {
    logger.error({ err: error, raffleId }, "Failed to subscribe to raffle events");
    throw error;
  }
}

/**
 * Safely unsubscribe from a subscription
 */
export function safeUnsubscribe(subscription: Subscription | null): void {
  if (subscription) {
    try {
      subscription.unsubscribe();
    } catch (error) {
      logger.warn({ err: error }, "Error unsubscribing");
    }
  }
}

/**
 * Decode a JSON message payload
 */
export function decodeMessage(data: Uint8Array): unknown {
  try {
    return JSON.parse(textDecoder.decode(data));
  } catch (error) {
    logger.error({ err: error }, "Failed to decode NATS message");
    throw error;
  }
}

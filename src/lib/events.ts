import type { RaffleEvent } from "./raffle/types.js";

/**
 * Notification as published for observers
 */
export type RaffleStreamEvent = RaffleEvent & {
  raffleId: string;
  /** Unix ms at publish time */
  serverTime: number;
};

export function getRaffleTopic(raffleId: string): string {
  return `raffle.${raffleId}.events`;
}

const RAFFLE_EVENT_TYPES: ReadonlySet<string> = new Set([
  "RaffleEnter",
  "RequestedRaffleWinner",
  "WinnerPicked",
]);

/**
 * Shallow check of a decoded notification: a known type and a raffle id
 */
export function isRaffleStreamEvent(value: unknown): value is RaffleStreamEvent {
  return (
    typeof value === "object" &&
    value !== null &&
    "type" in value &&
    typeof value.type === "string" &&
    RAFFLE_EVENT_TYPES.has(value.type) &&
    "raffleId" in value &&
    typeof value.raffleId === "string"
  );
}

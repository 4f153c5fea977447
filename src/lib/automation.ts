/**
 * Upkeep keeper bookkeeping: the poll loop's state transitions and one tick
 * of check-then-perform against a raffle. The Restate Automation object
 * persists the status and schedules the ticks.
 */

import type { Logger } from "pino";
import { RaffleError } from "./raffle/errors.js";
import type { AutomationGateway } from "./raffle/gateways.js";
import { EMPTY_PERFORM_DATA } from "./raffle/upkeep.js";

export interface AutomationStatus {
  active: boolean;
  /** Bumped on every start/stop; polls from older chains are dropped */
  generation: number;
  pollIntervalMs: number;
  performed: number;
  lastPolledAt?: number;
  lastPerformedAt?: number;
  lastError?: string;
}

export type PollOutcome =
  | { kind: "idle" }
  | { kind: "performed" }
  | { kind: "rejected"; error: string };

/**
 * Message of a failure the keeper records and moves past, or undefined for
 * one it should surface
 */
export type RejectionClassifier = (error: unknown) => string | undefined;

export const domainRejection: RejectionClassifier = (error) =>
  error instanceof RaffleError ? error.message : undefined;

export function initialAutomationStatus(pollIntervalMs: number): AutomationStatus {
  return { active: false, generation: 0, pollIntervalMs, performed: 0 };
}

export function startAutomation(
  current: AutomationStatus,
  pollIntervalMs?: number
): AutomationStatus {
  return {
    ...current,
    active: true,
    generation: current.generation + 1,
    pollIntervalMs: pollIntervalMs ?? current.pollIntervalMs,
  };
}

export function stopAutomation(current: AutomationStatus): AutomationStatus {
  return { ...current, active: false, generation: current.generation + 1 };
}

/**
 * A poll runs only for the live chain of an active keeper
 */
export function isCurrentPoll(status: AutomationStatus, generation: number): boolean {
  return status.active && status.generation === generation;
}

/**
 * Check upkeep and perform it when needed. A perform rejected by the raffle
 * (its check went stale in between) is logged and reported, never retried.
 */
export async function runUpkeepTick(
  target: AutomationGateway,
  log: Pick<Logger, "info" | "warn">,
  classify: RejectionClassifier = domainRejection
): Promise<PollOutcome> {
  try {
    const check = await target.checkUpkeep(EMPTY_PERFORM_DATA);
    if (!check.upkeepNeeded) {
      return { kind: "idle" };
    }
    await target.performUpkeep(check.performData);
    log.info("Upkeep performed");
    return { kind: "performed" };
  } catch (error) {
    const message = classify(error);
    if (message === undefined) {
      throw error;
    }
    log.warn({ err: error }, "Upkeep attempt rejected");
    return { kind: "rejected", error: message };
  }
}

export function recordPoll(
  status: AutomationStatus,
  outcome: PollOutcome,
  now: number
): AutomationStatus {
  const performed = outcome.kind === "performed";
  return {
    ...status,
    lastPolledAt: now,
    lastPerformedAt: performed ? now : status.lastPerformedAt,
    performed: performed ? status.performed + 1 : status.performed,
    lastError: outcome.kind === "rejected" ? outcome.error : undefined,
  };
}

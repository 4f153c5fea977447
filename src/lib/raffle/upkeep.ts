import { UpkeepNotNeededError } from "./errors.js";
import type { Round } from "./round.js";
import type { RaffleState, UpkeepCheck } from "./types.js";

/**
 * performData returned by checkUpkeep. The raffle never reads it back.
 */
export const EMPTY_PERFORM_DATA = "0x";

/**
 * What the upkeep predicate looks at
 */
export interface UpkeepSnapshot {
  state: RaffleState;
  lastDrawTimestamp: number;
  interval: number;
  participantCount: number;
  balance: bigint;
}

/**
 * Predicate result with each condition broken out
 */
export interface UpkeepEvaluation {
  upkeepNeeded: boolean;
  isOpen: boolean;
  timePassed: boolean;
  hasPlayers: boolean;
  hasBalance: boolean;
}

export function snapshotRound(round: Round): UpkeepSnapshot {
  return {
    state: round.state,
    lastDrawTimestamp: round.lastDrawTimestamp,
    interval: round.interval,
    participantCount: round.ledger.count,
    balance: round.ledger.poolBalance,
  };
}

/**
 * A draw may start only when all four hold:
 * 1. the round is OPEN
 * 2. more than `interval` seconds have passed since the last draw (strict)
 * 3. at least one participant
 * 4. a non-zero balance
 */
export function evaluateUpkeep(
  snapshot: UpkeepSnapshot,
  now: number
): UpkeepEvaluation {
  const isOpen = snapshot.state === "OPEN";
  const timePassed = now - snapshot.lastDrawTimestamp > snapshot.interval;
  const hasPlayers = snapshot.participantCount > 0;
  const hasBalance = snapshot.balance > 0n;

  return {
    upkeepNeeded: isOpen && timePassed && hasPlayers && hasBalance,
    isOpen,
    timePassed,
    hasPlayers,
    hasBalance,
  };
}

/**
 * Automation-facing check. checkData is accepted for interface
 * compatibility and ignored.
 */
export function checkUpkeep(
  round: Round,
  now: number,
  _checkData: string = EMPTY_PERFORM_DATA
): UpkeepCheck {
  const { upkeepNeeded } = evaluateUpkeep(snapshotRound(round), now);
  return { upkeepNeeded, performData: EMPTY_PERFORM_DATA };
}

/**
 * Re-evaluate at the start of a draw request; a stale trigger fails here
 */
export function assertUpkeepNeeded(round: Round, now: number): void {
  const snapshot = snapshotRound(round);
  if (!evaluateUpkeep(snapshot, now).upkeepNeeded) {
    throw new UpkeepNotNeededError(
      snapshot.balance,
      snapshot.participantCount,
      snapshot.state
    );
  }
}

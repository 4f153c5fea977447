/**
 * Raffle core types
 * Shared by the round state machine, the draw coordinator and the gateways
 */

// ============================================================
// Round State
// ============================================================

/**
 * Lifecycle state of a round.
 * OPEN accepts entries and may be drawn; CALCULATING waits for randomness.
 */
export type RaffleState = "OPEN" | "CALCULATING";

/**
 * Numeric codes for RaffleState, as reported by getRaffleState
 */
export const RAFFLE_STATE_CODES: Record<RaffleState, number> = {
  OPEN: 0,
  CALCULATING: 1,
};

// ============================================================
// Configuration
// ============================================================

/**
 * Immutable round configuration, fixed when the raffle is created
 */
export interface RaffleSettings {
  /** Minimum deposit per entry, in the smallest currency unit */
  entranceFee: bigint;
  /** Seconds that must pass (strictly) between draws */
  interval: number;
  /** Randomness lane identifier passed through to the gateway */
  keyHash: string;
  /** Gateway subscription that pays for randomness requests */
  subscriptionId: string;
  /** Resource budget for the fulfillment callback */
  callbackGasLimit: number;
  /** Confirmations the gateway waits before fulfilling */
  requestConfirmations: number;
  /** Random words requested per draw */
  numWords: number;
}

/**
 * JSON-safe form of RaffleSettings (amounts as decimal strings)
 */
export interface RaffleSettingsRecord {
  entranceFee: string;
  interval: number;
  keyHash: string;
  subscriptionId: string;
  callbackGasLimit: number;
  requestConfirmations: number;
  numWords: number;
}

// ============================================================
// Persisted Round
// ============================================================

/**
 * Durable representation of a round.
 * Timestamps are unix seconds; amounts are decimal strings.
 */
export interface RoundRecord {
  state: RaffleState;
  settings: RaffleSettingsRecord;
  lastDrawTimestamp: number;
  participants: string[];
  poolBalance: string;
  pendingRequestId?: string;
  recentWinner?: string;
}

// ============================================================
// Randomness
// ============================================================

/**
 * Parameters of a single randomness request
 */
export interface RandomWordsRequest {
  keyHash: string;
  subscriptionId: string;
  requestConfirmations: number;
  callbackGasLimit: number;
  numWords: number;
}

// ============================================================
// Upkeep
// ============================================================

/**
 * Result of checkUpkeep, in the shape the automation actor expects
 */
export interface UpkeepCheck {
  upkeepNeeded: boolean;
  performData: string;
}

// ============================================================
// Draw Outcome & Notifications
// ============================================================

export interface DrawOutcome {
  requestId: string;
  winner: string;
  winnerIndex: number;
  prize: bigint;
}

export type RaffleEvent =
  | { type: "RaffleEnter"; player: string; amount: string }
  | { type: "RequestedRaffleWinner"; requestId: string }
  | {
      type: "WinnerPicked";
      winner: string;
      requestId: string;
      winnerIndex: number;
      prize: string;
    };

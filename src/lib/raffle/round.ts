import { EntryLedger, type LedgerSnapshot } from "./entry-ledger.js";
import {
  InsufficientDepositError,
  NoDrawPendingError,
  RequestIdMismatchError,
  RoundNotOpenError,
} from "./errors.js";
import type {
  RaffleSettings,
  RaffleSettingsRecord,
  RaffleState,
  RandomWordsRequest,
  RoundRecord,
} from "./types.js";

/**
 * Everything a failed draw operation needs to put back
 */
export interface RoundCheckpoint {
  state: RaffleState;
  lastDrawTimestamp: number;
  pendingRequestId?: string;
  recentWinner?: string;
  ledger: LedgerSnapshot;
}

export function settingsToRecord(settings: RaffleSettings): RaffleSettingsRecord {
  return { ...settings, entranceFee: settings.entranceFee.toString() };
}

export function settingsFromRecord(record: RaffleSettingsRecord): RaffleSettings {
  return { ...record, entranceFee: BigInt(record.entranceFee) };
}

/**
 * Round state machine.
 *
 * OPEN --openDraw/recordRequest--> CALCULATING --settleDraw--> OPEN
 *
 * Owns the round configuration, the lifecycle state and the entry ledger.
 * Every mutation goes through a method here; callers never touch fields.
 */
export class Round {
  readonly settings: RaffleSettings;
  readonly ledger: EntryLedger;
  private _state: RaffleState;
  private _lastDrawTimestamp: number;
  private _pendingRequestId?: string;
  private _recentWinner?: string;
  private _settling = false;

  private constructor(
    settings: RaffleSettings,
    state: RaffleState,
    lastDrawTimestamp: number,
    ledger: EntryLedger,
    pendingRequestId?: string,
    recentWinner?: string
  ) {
    this.settings = settings;
    this._state = state;
    this._lastDrawTimestamp = lastDrawTimestamp;
    this.ledger = ledger;
    this._pendingRequestId = pendingRequestId;
    this._recentWinner = recentWinner;
  }

  /**
   * Fresh round: OPEN, no participants, empty pool
   */
  static create(settings: RaffleSettings, now: number): Round {
    if (settings.entranceFee <= 0n) {
      throw new RangeError("Entrance fee must be positive");
    }
    if (!Number.isInteger(settings.interval) || settings.interval <= 0) {
      throw new RangeError("Interval must be a positive number of seconds");
    }
    return new Round({ ...settings }, "OPEN", now, new EntryLedger());
  }

  static fromRecord(record: RoundRecord): Round {
    return new Round(
      settingsFromRecord(record.settings),
      record.state,
      record.lastDrawTimestamp,
      new EntryLedger(record.participants, BigInt(record.poolBalance)),
      record.pendingRequestId,
      record.recentWinner
    );
  }

  toRecord(): RoundRecord {
    const record: RoundRecord = {
      state: this._state,
      settings: settingsToRecord(this.settings),
      lastDrawTimestamp: this._lastDrawTimestamp,
      participants: [...this.ledger.players()],
      poolBalance: this.ledger.poolBalance.toString(),
    };
    if (this._pendingRequestId !== undefined) {
      record.pendingRequestId = this._pendingRequestId;
    }
    if (this._recentWinner !== undefined) {
      record.recentWinner = this._recentWinner;
    }
    return record;
  }

  get state(): RaffleState {
    return this._state;
  }

  get lastDrawTimestamp(): number {
    return this._lastDrawTimestamp;
  }

  get pendingRequestId(): string | undefined {
    return this._pendingRequestId;
  }

  get recentWinner(): string | undefined {
    return this._recentWinner;
  }

  /**
   * True between settleDraw and finishSettlement, while the prize is moving
   */
  get settling(): boolean {
    return this._settling;
  }

  get entranceFee(): bigint {
    return this.settings.entranceFee;
  }

  get interval(): number {
    return this.settings.interval;
  }

  /**
   * Randomness parameters sent with every draw request
   */
  randomWordsRequest(): RandomWordsRequest {
    const { keyHash, subscriptionId, requestConfirmations, callbackGasLimit, numWords } =
      this.settings;
    return { keyHash, subscriptionId, requestConfirmations, callbackGasLimit, numWords };
  }

  // ============================================================
  // Entries
  // ============================================================

  /**
   * Entry guard. State is checked before the amount.
   */
  assertCanEnter(amount: bigint): void {
    this.assertOpen();
    if (amount < this.settings.entranceFee) {
      throw new InsufficientDepositError(amount, this.settings.entranceFee);
    }
  }

  /**
   * Accept a deposit. The whole amount joins the pool; nothing above the fee
   * is refunded.
   */
  enter(player: string, amount: bigint): number {
    this.assertCanEnter(amount);
    return this.ledger.add(player, amount);
  }

  // ============================================================
  // Draw transitions
  // ============================================================

  /**
   * OPEN -> CALCULATING. The request id is attached separately once the
   * randomness gateway has issued one.
   */
  openDraw(): void {
    this.assertOpen();
    this._state = "CALCULATING";
  }

  recordRequest(requestId: string): void {
    if (this._state !== "CALCULATING") {
      throw new RoundNotOpenError(this._state);
    }
    if (this._pendingRequestId !== undefined) {
      throw new RequestIdMismatchError(requestId, this._pendingRequestId);
    }
    this._pendingRequestId = requestId;
  }

  /**
   * Fulfillment guard: a draw must be pending, and for this exact request
   */
  assertPending(requestId: string): void {
    if (this._state !== "CALCULATING") {
      throw new NoDrawPendingError(requestId);
    }
    if (this._pendingRequestId !== requestId) {
      throw new RequestIdMismatchError(requestId, this._pendingRequestId);
    }
  }

  /**
   * CALCULATING -> OPEN. Records the winner, clears the round and returns the
   * prize (the pool as it stood before clearing). The round stays closed to
   * entries and draws until finishSettlement or restore.
   */
  settleDraw(winner: string, now: number): bigint {
    if (this._settling) {
      throw new RoundNotOpenError(this._state, true);
    }
    const prize = this.ledger.poolBalance;
    this._settling = true;
    this._recentWinner = winner;
    this._state = "OPEN";
    this._pendingRequestId = undefined;
    this._lastDrawTimestamp = now;
    this.ledger.clear();
    return prize;
  }

  finishSettlement(): void {
    this._settling = false;
  }

  private assertOpen(): void {
    if (this._settling || this._state !== "OPEN") {
      throw new RoundNotOpenError(this._state, this._settling);
    }
  }

  // ============================================================
  // Rollback
  // ============================================================

  checkpoint(): RoundCheckpoint {
    return {
      state: this._state,
      lastDrawTimestamp: this._lastDrawTimestamp,
      pendingRequestId: this._pendingRequestId,
      recentWinner: this._recentWinner,
      ledger: this.ledger.snapshot(),
    };
  }

  restore(checkpoint: RoundCheckpoint): void {
    this._settling = false;
    this._state = checkpoint.state;
    this._lastDrawTimestamp = checkpoint.lastDrawTimestamp;
    this._pendingRequestId = checkpoint.pendingRequestId;
    this._recentWinner = checkpoint.recentWinner;
    this.ledger.restore(checkpoint.ledger);
  }
}

import { IndexOutOfRangeError } from "./errors.js";

/**
 * Point-in-time copy of a ledger, used for rollback
 */
export interface LedgerSnapshot {
  participants: readonly string[];
  poolBalance: bigint;
}

/**
 * Participants and accepted deposits of the current round.
 *
 * Entry order is the index space for winner selection, so participants are
 * append-only until the round is cleared. The same identity may hold several
 * slots.
 */
export class EntryLedger {
  private participants: string[];
  private pool: bigint;

  constructor(participants: readonly string[] = [], poolBalance = 0n) {
    this.participants = [...participants];
    this.pool = poolBalance;
  }

  /**
   * Append an entry and add its deposit to the pool.
   * Returns the slot index the entry occupies.
   */
  add(player: string, amount: bigint): number {
    this.participants.push(player);
    this.pool += amount;
    return this.participants.length - 1;
  }

  /**
   * Participant at a slot; fails for anything that is not an existing index
   */
  playerAt(index: number): string {
    if (!Number.isInteger(index) || index < 0 || index >= this.participants.length) {
      throw new IndexOutOfRangeError(index, this.participants.length);
    }
    return this.participants[index];
  }

  get count(): number {
    return this.participants.length;
  }

  get poolBalance(): bigint {
    return this.pool;
  }

  players(): readonly string[] {
    return this.participants;
  }

  /**
   * Empty the round: no participants, nothing in the pool
   */
  clear(): void {
    this.participants = [];
    this.pool = 0n;
  }

  snapshot(): LedgerSnapshot {
    return { participants: [...this.participants], poolBalance: this.pool };
  }

  restore(snapshot: LedgerSnapshot): void {
    this.participants = [...snapshot.participants];
    this.pool = snapshot.poolBalance;
  }
}

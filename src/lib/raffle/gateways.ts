/**
 * Interfaces the raffle core consumes and exposes.
 * Implementations live with the runtime (Restate objects) or in tests.
 */

import type { RaffleEvent, RandomWordsRequest, UpkeepCheck } from "./types.js";

/**
 * Randomness oracle. Returns a request id immediately; the words arrive
 * later through the coordinator's fulfillRandomWords callback.
 */
export interface RandomnessGateway {
  requestRandomWords(request: RandomWordsRequest): Promise<string>;
}

/**
 * Moves the prize to the winner. Rejects when the recipient cannot take it.
 */
export interface PayoutGateway {
  transfer(recipient: string, amount: bigint): Promise<void>;
}

/**
 * Receives notifications for off-chain observers
 */
export interface RaffleEventSink {
  emit(event: RaffleEvent): void;
}

/**
 * Check/perform contract offered to the automation actor
 */
export interface AutomationGateway {
  checkUpkeep(checkData: string): Promise<UpkeepCheck>;
  performUpkeep(performData: string): Promise<void>;
}

/**
 * Collects events so they can be published once an operation has committed
 */
export class BufferedEventSink implements RaffleEventSink {
  private events: RaffleEvent[] = [];

  emit(event: RaffleEvent): void {
    this.events.push(event);
  }

  drain(): RaffleEvent[] {
    const drained = this.events;
    this.events = [];
    return drained;
  }
}

/**
 * Randomness coordinator bookkeeping
 * Issues request ids, tracks pending requests and draws random words.
 * The Restate RandomnessCoordinator object persists this between calls.
 */

import crypto from "node:crypto";
import { NonexistentRequestError } from "./raffle/errors.js";
import type { RandomWordsRequest } from "./raffle/types.js";

/** Random words are 256-bit unsigned integers */
export const RANDOM_WORD_BYTES = 32;

export const MAX_NUM_WORDS = 500;

export interface PendingRandomnessRequest extends RandomWordsRequest {
  requestId: string;
  /** Key of the raffle that receives the callback */
  consumer: string;
  /** Unix ms */
  requestedAt: number;
}

export interface CoordinatorRecord {
  nextRequestId: number;
  pending: Record<string, PendingRandomnessRequest>;
}

export function emptyCoordinatorRecord(): CoordinatorRecord {
  return { nextRequestId: 1, pending: {} };
}

/**
 * Draw `numWords` uniformly random 256-bit words
 */
export function generateRandomWords(numWords: number): bigint[] {
  if (!Number.isInteger(numWords) || numWords < 1 || numWords > MAX_NUM_WORDS) {
    throw new RangeError(`numWords must be between 1 and ${MAX_NUM_WORDS}`);
  }
  const words: bigint[] = [];
  for (let i = 0; i < numWords; i++) {
    const hex = crypto.randomBytes(RANDOM_WORD_BYTES).toString("hex");
    words.push(BigInt(`0x${hex}`));
  }
  return words;
}

export class RandomnessCoordinator {
  private nextRequestId: number;
  private readonly pending: Map<string, PendingRandomnessRequest>;

  constructor(record: CoordinatorRecord = emptyCoordinatorRecord()) {
    this.nextRequestId = record.nextRequestId;
    this.pending = new Map(Object.entries(record.pending));
  }

  /**
   * Register a request and return it with its freshly issued id.
   * Ids are sequential and start at 1.
   */
  request(
    consumer: string,
    params: RandomWordsRequest,
    now: number
  ): PendingRandomnessRequest {
    if (
      !Number.isInteger(params.numWords) ||
      params.numWords < 1 ||
      params.numWords > MAX_NUM_WORDS
    ) {
      throw new RangeError(`numWords must be between 1 and ${MAX_NUM_WORDS}`);
    }

    const requestId = String(this.nextRequestId);
    this.nextRequestId += 1;

    const request: PendingRandomnessRequest = {
      ...params,
      requestId,
      consumer,
      requestedAt: now,
    };
    this.pending.set(requestId, request);
    return request;
  }

  /**
   * Remove and return a pending request. Each id can be consumed once.
   */
  consume(requestId: string): PendingRandomnessRequest {
    const request = this.pending.get(requestId);
    if (!request) {
      throw new NonexistentRequestError(requestId);
    }
    this.pending.delete(requestId);
    return request;
  }

  isPending(requestId: string): boolean {
    return this.pending.has(requestId);
  }

  pendingRequests(): PendingRandomnessRequest[] {
    return [...this.pending.values()];
  }

  toRecord(): CoordinatorRecord {
    return {
      nextRequestId: this.nextRequestId,
      pending: Object.fromEntries(this.pending),
    };
  }
}

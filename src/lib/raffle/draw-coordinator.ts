import { MissingRandomWordError, PayoutFailedError } from "./errors.js";
import type {
  PayoutGateway,
  RaffleEventSink,
  RandomnessGateway,
} from "./gateways.js";
import type { Round } from "./round.js";
import type { DrawOutcome } from "./types.js";
import { assertUpkeepNeeded } from "./upkeep.js";

export interface DrawCoordinatorDeps {
  randomness: RandomnessGateway;
  payouts: PayoutGateway;
  events?: RaffleEventSink;
}

/**
 * Map a random word onto a participant slot.
 *
 * Plain modulo: when the word space is not a multiple of the participant
 * count, lower slots are very slightly favoured. Accepted, not corrected.
 */
export function selectWinnerIndex(randomWord: bigint, participantCount: number): number {
  if (!Number.isInteger(participantCount) || participantCount <= 0) {
    throw new RangeError("Cannot select a winner from an empty round");
  }
  if (randomWord < 0n) {
    throw new RangeError("Random word must be non-negative");
  }
  return Number(randomWord % BigInt(participantCount));
}

/**
 * Two-phase draw over a single round.
 *
 * Phase 1 (requestDraw): OPEN -> CALCULATING, ask the gateway for randomness.
 * Phase 2 (fulfillRandomWords): pick the winner, reset the round, then pay.
 *
 * The payout is the last step, after every bookkeeping change. If it fails,
 * the bookkeeping is restored and the round stays CALCULATING. While the
 * payout is in flight the round reads as reset but refuses entries and draws,
 * so a rollback never discards an accepted entry.
 */
export class DrawCoordinator {
  private readonly round: Round;
  private readonly deps: DrawCoordinatorDeps;

  constructor(round: Round, deps: DrawCoordinatorDeps) {
    this.round = round;
    this.deps = deps;
  }

  async requestDraw(now: number): Promise<string> {
    assertUpkeepNeeded(this.round, now);

    const checkpoint = this.round.checkpoint();
    this.round.openDraw();

    let requestId: string;
    try {
      requestId = await this.deps.randomness.requestRandomWords(
        this.round.randomWordsRequest()
      );
    } catch (error) {
      this.round.restore(checkpoint);
      throw error;
    }

    this.round.recordRequest(requestId);
    this.deps.events?.emit({ type: "RequestedRaffleWinner", requestId });
    return requestId;
  }

  /**
   * Only the first word is used; any extra words are ignored.
   */
  async fulfillRandomWords(
    requestId: string,
    randomWords: readonly bigint[],
    now: number
  ): Promise<DrawOutcome> {
    this.round.assertPending(requestId);

    const randomWord = randomWords[0];
    if (randomWord === undefined) {
      throw new MissingRandomWordError(requestId);
    }

    const winnerIndex = selectWinnerIndex(randomWord, this.round.ledger.count);
    const winner = this.round.ledger.playerAt(winnerIndex);

    const checkpoint = this.round.checkpoint();
    const prize = this.round.settleDraw(winner, now);

    try {
      await this.deps.payouts.transfer(winner, prize);
    } catch (error) {
      this.round.restore(checkpoint);
      throw new PayoutFailedError(winner, prize, error);
    }
    this.round.finishSettlement();

    this.deps.events?.emit({
      type: "WinnerPicked",
      winner,
      requestId,
      winnerIndex,
      prize: prize.toString(),
    });

    return { requestId, winner, winnerIndex, prize };
  }
}

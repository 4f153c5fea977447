import { DrawCoordinator } from "./draw-coordinator.js";
import type {
  AutomationGateway,
  PayoutGateway,
  RaffleEventSink,
  RandomnessGateway,
} from "./gateways.js";
import { Round } from "./round.js";
import type {
  DrawOutcome,
  RaffleSettings,
  RoundRecord,
  UpkeepCheck,
} from "./types.js";
import { checkUpkeep, EMPTY_PERFORM_DATA } from "./upkeep.js";

/**
 * Unix time in seconds
 */
export type Clock = () => number;

/**
 * Takes an entry's deposit from the participant's own balance
 */
export type EntryDebit = (player: string, amount: bigint) => Promise<void>;

export interface RaffleDeps {
  randomness: RandomnessGateway;
  payouts: PayoutGateway;
  events?: RaffleEventSink;
  clock: Clock;
}

/**
 * The raffle as its callers see it: entry, the automation check/perform
 * pair and the randomness callback, over one Round. Read-only projections
 * live on the Round itself.
 */
export class Raffle implements AutomationGateway {
  readonly round: Round;
  private readonly coordinator: DrawCoordinator;
  private readonly deps: RaffleDeps;

  constructor(round: Round, deps: RaffleDeps) {
    this.round = round;
    this.deps = deps;
    this.coordinator = new DrawCoordinator(round, deps);
  }

  static create(settings: RaffleSettings, deps: RaffleDeps): Raffle {
    return new Raffle(Round.create(settings, deps.clock()), deps);
  }

  static fromRecord(record: RoundRecord, deps: RaffleDeps): Raffle {
    return new Raffle(Round.fromRecord(record), deps);
  }

  toRecord(): RoundRecord {
    return this.round.toRecord();
  }

  enter(player: string, amount: bigint): number {
    const index = this.round.enter(player, amount);
    this.deps.events?.emit({
      type: "RaffleEnter",
      player,
      amount: amount.toString(),
    });
    return index;
  }

  /**
   * Entry paid from an external balance. The round guards run before the
   * debit, so a rejected entry never moves funds.
   */
  async enterFunded(player: string, amount: bigint, debit: EntryDebit): Promise<number> {
    this.round.assertCanEnter(amount);
    await debit(player, amount);
    return this.enter(player, amount);
  }

  async checkUpkeep(checkData: string = EMPTY_PERFORM_DATA): Promise<UpkeepCheck> {
    return checkUpkeep(this.round, this.deps.clock(), checkData);
  }

  /**
   * performData is ignored; the predicate is re-checked inside requestDraw
   */
  async performUpkeep(_performData: string = EMPTY_PERFORM_DATA): Promise<void> {
    await this.requestDraw();
  }

  requestDraw(): Promise<string> {
    return this.coordinator.requestDraw(this.deps.clock());
  }

  fulfillRandomWords(
    requestId: string,
    randomWords: readonly bigint[]
  ): Promise<DrawOutcome> {
    return this.coordinator.fulfillRandomWords(
      requestId,
      randomWords,
      this.deps.clock()
    );
  }
}

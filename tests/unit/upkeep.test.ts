import { describe, it, expect } from "vitest";
import {
  assertUpkeepNeeded,
  checkUpkeep,
  evaluateUpkeep,
  Round,
  UpkeepNotNeededError,
  type UpkeepSnapshot,
} from "../../src/lib/raffle/index.js";
import { ENTRANCE_FEE, INTERVAL, T0, testSettings } from "../helpers/in-process.js";

const due: UpkeepSnapshot = {
  state: "OPEN",
  lastDrawTimestamp: T0,
  interval: INTERVAL,
  participantCount: 1,
  balance: ENTRANCE_FEE,
};

describe("evaluateUpkeep", () => {
  it("is needed when all four conditions hold", () => {
    expect(evaluateUpkeep(due, T0 + INTERVAL + 1)).toEqual({
      upkeepNeeded: true,
      isOpen: true,
      timePassed: true,
      hasPlayers: true,
      hasBalance: true,
    });
  });

  it("is not needed while calculating", () => {
    const result = evaluateUpkeep({ ...due, state: "CALCULATING" }, T0 + INTERVAL + 1);
    expect(result.upkeepNeeded).toBe(false);
    expect(result.isOpen).toBe(false);
  });

  it("requires strictly more than the interval to have passed", () => {
    expect(evaluateUpkeep(due, T0 + INTERVAL).upkeepNeeded).toBe(false);
    expect(evaluateUpkeep(due, T0 + INTERVAL - 1).upkeepNeeded).toBe(false);
    expect(evaluateUpkeep(due, T0 + INTERVAL + 1).upkeepNeeded).toBe(true);
  });

  it("is not needed without players", () => {
    const result = evaluateUpkeep({ ...due, participantCount: 0 }, T0 + INTERVAL + 1);
    expect(result.upkeepNeeded).toBe(false);
    expect(result.hasPlayers).toBe(false);
  });

  it("is not needed with an empty balance", () => {
    const result = evaluateUpkeep({ ...due, balance: 0n }, T0 + INTERVAL + 1);
    expect(result.upkeepNeeded).toBe(false);
    expect(result.hasBalance).toBe(false);
  });
});

describe("checkUpkeep", () => {
  it("returns empty performData whatever checkData is", () => {
    const round = Round.create(testSettings(), T0);
    round.enter("alice", ENTRANCE_FEE);
    expect(checkUpkeep(round, T0 + INTERVAL + 1, "0x1234")).toEqual({
      upkeepNeeded: true,
      performData: "0x",
    });
    expect(checkUpkeep(round, T0 + 1)).toEqual({
      upkeepNeeded: false,
      performData: "0x",
    });
  });
});

describe("assertUpkeepNeeded", () => {
  it("reports balance, players and state when a draw is not due", () => {
    const round = Round.create(testSettings(), T0);
    round.enter("alice", ENTRANCE_FEE);

    let caught: unknown;
    try {
      assertUpkeepNeeded(round, T0 + 10);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(UpkeepNotNeededError);
    if (caught instanceof UpkeepNotNeededError) {
      expect(caught.balance).toBe(ENTRANCE_FEE);
      expect(caught.participantCount).toBe(1);
      expect(caught.state).toBe("OPEN");
      expect(caught.details).toEqual({
        balance: "10000000000000000",
        participantCount: 1,
        state: "OPEN",
      });
    }
  });
});

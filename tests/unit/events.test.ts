import { describe, it, expect } from "vitest";
import { getRaffleTopic, isRaffleStreamEvent } from "../../src/lib/events.js";

describe("raffle notifications", () => {
  it("publishes each raffle on its own subject", () => {
    expect(getRaffleTopic("demo")).toBe("raffle.demo.events");
  });

  it("recognizes published notifications", () => {
    expect(
      isRaffleStreamEvent({
        type: "WinnerPicked",
        winner: "D",
        requestId: "1",
        winnerIndex: 3,
        prize: "40000000000000000",
        raffleId: "demo",
        serverTime: 1,
      })
    ).toBe(true);
  });

  it("rejects unknown types and missing raffle ids", () => {
    expect(isRaffleStreamEvent({ type: "Unknown", raffleId: "demo" })).toBe(false);
    expect(isRaffleStreamEvent({ type: "RaffleEnter", player: "a" })).toBe(false);
    expect(isRaffleStreamEvent(null)).toBe(false);
    expect(isRaffleStreamEvent("RaffleEnter")).toBe(false);
  });
});

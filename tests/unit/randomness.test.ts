import { describe, it, expect } from "vitest";
import {
  generateRandomWords,
  MAX_NUM_WORDS,
  RandomnessCoordinator,
} from "../../src/lib/randomness.js";
import { NonexistentRequestError } from "../../src/lib/raffle/index.js";

const params = {
  keyHash: `0x${"00".repeat(32)}`,
  subscriptionId: "1",
  requestConfirmations: 3,
  callbackGasLimit: 500_000,
  numWords: 1,
};

describe("RandomnessCoordinator", () => {
  it("issues sequential request ids starting at 1", () => {
    const coordinator = new RandomnessCoordinator();
    expect(coordinator.request("raffle-a", params, 100).requestId).toBe("1");
    expect(coordinator.request("raffle-b", params, 200).requestId).toBe("2");
    expect(coordinator.pendingRequests().map((r) => r.consumer)).toEqual([
      "raffle-a",
      "raffle-b",
    ]);
  });

  it("consumes a request exactly once", () => {
    const coordinator = new RandomnessCoordinator();
    coordinator.request("raffle-a", params, 100);

    expect(coordinator.consume("1")).toEqual({
      ...params,
      requestId: "1",
      consumer: "raffle-a",
      requestedAt: 100,
    });
    expect(coordinator.isPending("1")).toBe(false);
    expect(() => coordinator.consume("1")).toThrow(NonexistentRequestError);
    expect(() => coordinator.consume("99")).toThrow("nonexistent request");
  });

  it("continues numbering after being restored from its record", () => {
    const first = new RandomnessCoordinator();
    first.request("raffle-a", params, 100);
    first.request("raffle-a", params, 100);
    first.consume("1");

    const record = JSON.parse(JSON.stringify(first.toRecord()));
    const restored = new RandomnessCoordinator(record);

    expect(restored.isPending("2")).toBe(true);
    expect(restored.request("raffle-a", params, 300).requestId).toBe("3");
  });

  it("rejects word counts outside 1..MAX_NUM_WORDS", () => {
    const coordinator = new RandomnessCoordinator();
    expect(() => coordinator.request("raffle-a", { ...params, numWords: 0 }, 1)).toThrow(
      RangeError
    );
    expect(() =>
      coordinator.request("raffle-a", { ...params, numWords: MAX_NUM_WORDS + 1 }, 1)
    ).toThrow(RangeError);
    expect(coordinator.pendingRequests()).toEqual([]);
  });
});

describe("generateRandomWords", () => {
  it("draws the requested number of 256-bit words", () => {
    const words = generateRandomWords(3);
    expect(words).toHaveLength(3);
    for (const word of words) {
      expect(word).toBeGreaterThanOrEqual(0n);
      expect(word).toBeLessThan(2n ** 256n);
    }
  });

  it("rejects a count of zero", () => {
    expect(() => generateRandomWords(0)).toThrow(RangeError);
  });
});

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { EntryLedger, IndexOutOfRangeError } from "../../src/lib/raffle/index.js";

describe("EntryLedger", () => {
  it("starts empty", () => {
    const ledger = new EntryLedger();
    expect(ledger.count).toBe(0);
    expect(ledger.poolBalance).toBe(0n);
    expect(ledger.players()).toEqual([]);
  });

  it("appends entries in order and returns their slot", () => {
    const ledger = new EntryLedger();
    expect(ledger.add("alice", 5n)).toBe(0);
    expect(ledger.add("bob", 7n)).toBe(1);
    expect(ledger.add("alice", 5n)).toBe(2);

    expect(ledger.players()).toEqual(["alice", "bob", "alice"]);
    expect(ledger.poolBalance).toBe(17n);
    expect(ledger.playerAt(1)).toBe("bob");
  });

  it("rejects indexes outside the participant list", () => {
    const ledger = new EntryLedger(["alice"], 1n);
    expect(() => ledger.playerAt(1)).toThrow(IndexOutOfRangeError);
    expect(() => ledger.playerAt(-1)).toThrow(IndexOutOfRangeError);
    expect(() => ledger.playerAt(0.5)).toThrow(IndexOutOfRangeError);
    expect(() => new EntryLedger().playerAt(0)).toThrow(
      "Index 0 is out of range (0 players)"
    );
  });

  it("clears participants and pool together", () => {
    const ledger = new EntryLedger(["alice", "bob"], 20n);
    ledger.clear();
    expect(ledger.count).toBe(0);
    expect(ledger.poolBalance).toBe(0n);
  });

  it("restores a snapshot taken before later entries", () => {
    const ledger = new EntryLedger(["alice"], 10n);
    const snapshot = ledger.snapshot();
    ledger.add("bob", 10n);
    ledger.clear();

    ledger.restore(snapshot);
    expect(ledger.players()).toEqual(["alice"]);
    expect(ledger.poolBalance).toBe(10n);
  });

  it("keeps the pool equal to the sum of accepted deposits", () => {
    fc.assert(
      fc.property(
        fc.array(
          fc.record({
            player: fc.constantFrom("alice", "bob", "carol"),
            amount: fc.bigInt({ min: 1n, max: 10n ** 20n }),
          }),
          { maxLength: 50 }
        ),
        (entries) => {
          const ledger = new EntryLedger();
          entries.forEach(({ player, amount }, i) => {
            expect(ledger.add(player, amount)).toBe(i);
          });
          const total = entries.reduce((sum, e) => sum + e.amount, 0n);
          expect(ledger.count).toBe(entries.length);
          expect(ledger.poolBalance).toBe(total);
          expect(ledger.players()).toEqual(entries.map((e) => e.player));
        }
      )
    );
  });
});

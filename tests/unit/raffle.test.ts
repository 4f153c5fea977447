import { describe, it, expect, vi } from "vitest";
import {
  InsufficientDepositError,
  InsufficientFundsError,
  RoundNotOpenError,
} from "../../src/lib/raffle/index.js";
import { createHarness, ENTRANCE_FEE, INTERVAL, T0 } from "../helpers/in-process.js";

describe("Raffle.enterFunded", () => {
  it("debits the participant and then records the entry", async () => {
    const h = createHarness();
    const order: string[] = [];
    const debit = vi.fn(async (player: string, amount: bigint) => {
      order.push(`debit ${player} ${amount}`);
      expect(h.raffle.round.ledger.count).toBe(0);
    });

    const index = await h.raffle.enterFunded("alice", ENTRANCE_FEE, debit);

    expect(index).toBe(0);
    expect(order).toEqual(["debit alice 10000000000000000"]);
    expect(h.raffle.round.ledger.players()).toEqual(["alice"]);
    expect(h.events.drain()).toEqual([
      { type: "RaffleEnter", player: "alice", amount: "10000000000000000" },
    ]);
  });

  it("checks the round before touching the participant's funds", async () => {
    const h = createHarness();
    h.raffle.enter("alice", ENTRANCE_FEE);
    h.clock.now = T0 + INTERVAL + 1;
    await h.raffle.requestDraw();
    const debit = vi.fn(async () => {});

    await expect(h.raffle.enterFunded("bob", ENTRANCE_FEE, debit)).rejects.toBeInstanceOf(
      RoundNotOpenError
    );
    expect(debit).not.toHaveBeenCalled();
    expect(h.raffle.round.ledger.players()).toEqual(["alice"]);
  });

  it("checks the amount before touching the participant's funds", async () => {
    const h = createHarness();
    const debit = vi.fn(async () => {});

    await expect(
      h.raffle.enterFunded("bob", ENTRANCE_FEE - 1n, debit)
    ).rejects.toBeInstanceOf(InsufficientDepositError);
    expect(debit).not.toHaveBeenCalled();
  });

  it("records nothing when the debit fails", async () => {
    const h = createHarness();
    const debit = vi.fn(async () => {
      throw new InsufficientFundsError(0n, ENTRANCE_FEE);
    });

    await expect(h.raffle.enterFunded("bob", ENTRANCE_FEE, debit)).rejects.toThrow(
      "Insufficient funds: balance 0, needed 10000000000000000"
    );
    expect(h.raffle.round.ledger.count).toBe(0);
    expect(h.raffle.round.ledger.poolBalance).toBe(0n);
    expect(h.events.drain()).toEqual([]);
  });
});

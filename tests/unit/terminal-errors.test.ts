import { describe, it, expect } from "vitest";
import * as restate from "@restatedev/restate-sdk";
import {
  asTerminalError,
  fromTerminalError,
  terminalErrorMessage,
} from "../../src/restate/errors.js";
import {
  decodeRaffleError,
  InsufficientDepositError,
  PayoutFailedError,
  PayoutRejectedError,
  RaffleError,
  RoundNotOpenError,
} from "../../src/lib/raffle/index.js";

describe("asTerminalError", () => {
  it("maps domain errors to terminal errors carrying their HTTP status", () => {
    const mapped = asTerminalError(new RoundNotOpenError("CALCULATING"));
    expect(mapped).toBeInstanceOf(restate.TerminalError);
    if (mapped instanceof restate.TerminalError) {
      expect(mapped.code).toBe(409);
      expect(decodeRaffleError(mapped.message)).toEqual({
        message: "Raffle is not open (state: CALCULATING)",
        code: "ROUND_NOT_OPEN",
        status: 409,
        details: { state: "CALCULATING" },
      });
    }

    const deposit = asTerminalError(new InsufficientDepositError(1n, 2n));
    expect(deposit instanceof restate.TerminalError && deposit.code).toBe(400);

    const payout = asTerminalError(new PayoutFailedError("D", 4n, new Error("refused")));
    expect(payout instanceof restate.TerminalError && payout.code).toBe(502);
  });

  it("treats bad input as terminal", () => {
    const mapped = asTerminalError(new RangeError("Amount must be positive"));
    expect(mapped instanceof restate.TerminalError && mapped.code).toBe(400);
    expect(mapped instanceof restate.TerminalError && mapped.message).toBe(
      "Amount must be positive"
    );
  });

  it("leaves other errors retryable", () => {
    const transient = new Error("connection reset");
    expect(asTerminalError(transient)).toBe(transient);
  });

  it("passes terminal errors through", () => {
    const terminal = new restate.TerminalError("gone", { errorCode: 404 });
    expect(asTerminalError(terminal)).toBe(terminal);
  });
});

describe("fromTerminalError", () => {
  it("rebuilds the domain error sent by another object", () => {
    const rebuilt = fromTerminalError(asTerminalError(new PayoutRejectedError("D")));

    expect(rebuilt).toBeInstanceOf(RaffleError);
    if (rebuilt instanceof RaffleError) {
      expect(rebuilt.message).toBe("Account D does not accept payouts");
      expect(rebuilt.code).toBe("PAYOUT_REJECTED");
      expect(rebuilt.status).toBe(409);
      expect(rebuilt.details).toEqual({ account: "D" });
    }

    const wrapped = new PayoutFailedError("D", 4n, rebuilt);
    expect(wrapped.message).toBe(
      "Payout of 4 to D failed: Account D does not accept payouts"
    );
  });

  it("leaves plain terminal errors and other failures alone", () => {
    const terminal = new restate.TerminalError("Raffle not initialized", { errorCode: 404 });
    expect(fromTerminalError(terminal)).toBe(terminal);

    const transient = new Error("connection reset");
    expect(fromTerminalError(transient)).toBe(transient);
  });
});

describe("terminalErrorMessage", () => {
  it("unwraps encoded domain errors", () => {
    const mapped = asTerminalError(new RoundNotOpenError("CALCULATING"));
    expect(mapped instanceof restate.TerminalError && terminalErrorMessage(mapped)).toBe(
      "Raffle is not open (state: CALCULATING)"
    );
  });

  it("returns other messages unchanged", () => {
    const terminal = new restate.TerminalError("Raffle not initialized", { errorCode: 404 });
    expect(terminalErrorMessage(terminal)).toBe("Raffle not initialized");
  });
});

describe("decodeRaffleError", () => {
  it("returns null for text it did not produce", () => {
    expect(decodeRaffleError("Raffle not initialized")).toBeNull();
    expect(decodeRaffleError(JSON.stringify({ message: "x", code: "CONFLICT", status: 409 }))).toBeNull();
    expect(
      decodeRaffleError(JSON.stringify({ message: "x", code: "ROUND_NOT_OPEN", status: 418 }))
    ).toBeNull();
  });
});

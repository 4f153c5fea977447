import { describe, it, expect } from "vitest";
import {
  enterRequestSchema,
  formatZodError,
  fulfillRandomWordsSchema,
  playerIndexSchema,
  positiveAmountSchema,
  raffleConfigSchema,
  validateInput,
} from "../../src/lib/schemas.js";

describe("raffleConfigSchema", () => {
  it("fills omitted settings from configuration defaults", () => {
    expect(raffleConfigSchema.parse({ interval: 300 })).toEqual({
      entranceFee: "10000000000000000",
      interval: 300,
      keyHash: `0x${"0".repeat(64)}`,
      subscriptionId: "1",
      callbackGasLimit: 500000,
      requestConfirmations: 3,
      numWords: 1,
      coordinatorKey: "default",
    });
  });

  it("rejects a zero entrance fee and a fractional interval", () => {
    expect(raffleConfigSchema.safeParse({ entranceFee: "0" }).success).toBe(false);
    expect(raffleConfigSchema.safeParse({ interval: 1.5 }).success).toBe(false);
  });
});

describe("amount schemas", () => {
  it("rejects non-numeric amounts without throwing", () => {
    expect(positiveAmountSchema.safeParse("abc").success).toBe(false);
    expect(positiveAmountSchema.safeParse("0").success).toBe(false);
    expect(positiveAmountSchema.safeParse("1").success).toBe(true);
  });
});

describe("request schemas", () => {
  it("accepts a valid entry", () => {
    expect(
      enterRequestSchema.parse({ player: "alice", amount: "10000000000000000" })
    ).toEqual({ player: "alice", amount: "10000000000000000" });
  });

  it("rejects player ids with unsupported characters", () => {
    expect(enterRequestSchema.safeParse({ player: "a b", amount: "1" }).success).toBe(false);
  });

  it("coerces player indexes from path params", () => {
    expect(playerIndexSchema.parse("3")).toBe(3);
    expect(playerIndexSchema.safeParse("-1").success).toBe(false);
    expect(playerIndexSchema.safeParse("1.5").success).toBe(false);
  });

  it("allows an empty word list so the raffle can report it", () => {
    expect(fulfillRandomWordsSchema.parse({ requestId: "1", randomWords: [] })).toEqual({
      requestId: "1",
      randomWords: [],
    });
  });
});

describe("validation helpers", () => {
  it("formats failures with their paths", () => {
    const result = validateInput(enterRequestSchema, { player: "alice", amount: "x" });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodError(result.error)).toEqual({
        error: "Validation failed",
        code: "VALIDATION_FAILED",
        details: [
          { path: "amount", message: "Amount must be a non-negative integer string" },
        ],
      });
    }
  });
});

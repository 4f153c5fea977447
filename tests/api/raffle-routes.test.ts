import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("../../src/lib/restate-client.js", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../../src/lib/restate-client.js")>();
  return { ...actual, callRestate: vi.fn() };
});

import app from "../../src/api/server.js";
import {
  callRestate,
  RestateError,
  RestateTimeoutError,
  toRestateError,
} from "../../src/lib/restate-client.js";
import {
  encodeRaffleError,
  RoundNotOpenError,
  UpkeepNotNeededError,
  type RaffleError,
} from "../../src/lib/raffle/index.js";

const mockedCall = vi.mocked(callRestate);
const ADMIN = { "x-admin-secret": "test-secret" };
const JSON_HEADERS = { "Content-Type": "application/json" };

function post(path: string, body?: unknown, headers: Record<string, string> = {}) {
  return app.request(path, {
    method: "POST",
    headers: { ...JSON_HEADERS, ...headers },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
}

/**
 * The error callRestate raises when a handler fails with a domain error
 */
function rejectedByHandler(error: RaffleError): RestateError {
  const body = JSON.stringify({ code: error.status, message: encodeRaffleError(error) });
  return toRestateError(body, error.status);
}

beforeEach(() => {
  mockedCall.mockReset();
});

describe("GET /health", () => {
  it("reports ok", async () => {
    const res = await app.request("/health");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok" });
  });
});

describe("POST /api/raffle/:id/enter", () => {
  it("forwards a valid entry to the raffle object", async () => {
    mockedCall.mockResolvedValue({ index: 0, numberOfPlayers: 1, balance: "10000000000000000" });

    const res = await post("/api/raffle/demo/enter", {
      player: "alice",
      amount: "10000000000000000",
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      index: 0,
      numberOfPlayers: 1,
      balance: "10000000000000000",
    });
    expect(mockedCall).toHaveBeenCalledWith(
      "Raffle",
      "demo",
      "enter",
      { player: "alice", amount: "10000000000000000" },
      { timeoutMs: 15000 }
    );
  });

  it("rejects a malformed amount before calling Restate", async () => {
    const res = await post("/api/raffle/demo/enter", { player: "alice", amount: "0.01" });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Validation failed",
      code: "VALIDATION_FAILED",
      details: [
        { path: "amount", message: "Amount must be a non-negative integer string" },
      ],
    });
    expect(mockedCall).not.toHaveBeenCalled();
  });

  it("relays a rejected entry with its domain code and details", async () => {
    mockedCall.mockRejectedValue(rejectedByHandler(new RoundNotOpenError("CALCULATING")));

    const res = await post("/api/raffle/demo/enter", {
      player: "alice",
      amount: "10000000000000000",
    });

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({
      error: "Raffle is not open (state: CALCULATING)",
      code: "ROUND_NOT_OPEN",
      details: { state: "CALCULATING" },
    });
  });

  it("falls back to a status code for errors without a domain code", async () => {
    mockedCall.mockRejectedValue(
      toRestateError(JSON.stringify({ code: 404, message: "Raffle not initialized" }), 404)
    );

    const res = await post("/api/raffle/demo/enter", {
      player: "alice",
      amount: "10000000000000000",
    });

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: "Raffle not initialized",
      code: "NOT_FOUND",
    });
  });

  it("answers 504 when Restate times out", async () => {
    mockedCall.mockRejectedValue(new RestateTimeoutError("Raffle", "enter", 15000));

    const res = await post("/api/raffle/demo/enter", {
      player: "alice",
      amount: "10000000000000000",
    });

    expect(res.status).toBe(504);
    expect(await res.json()).toEqual({ error: "Request timed out", code: "TIMEOUT" });
  });

  it("answers 400 for a body that is not JSON", async () => {
    const res = await app.request("/api/raffle/demo/enter", {
      method: "POST",
      headers: JSON_HEADERS,
      body: "{not json",
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Invalid JSON body",
      code: "INVALID_INPUT",
    });
  });
});

describe("POST /api/raffle/:id/initialize", () => {
  it("requires the admin secret", async () => {
    const res = await post("/api/raffle/demo/initialize", { interval: 300 });
    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({
      error: "Invalid admin secret",
      code: "UNAUTHORIZED",
    });

    const wrong = await post("/api/raffle/demo/initialize", { interval: 300 }, {
      "x-admin-secret": "not-the-secret",
    });
    expect(wrong.status).toBe(401);
    expect(mockedCall).not.toHaveBeenCalled();
  });

  it("initializes with defaults filled in", async () => {
    mockedCall.mockResolvedValue({ created: true, status: { raffleId: "demo" } });

    const res = await post("/api/raffle/demo/initialize", { interval: 300 }, ADMIN);

    expect(res.status).toBe(201);
    expect(mockedCall).toHaveBeenCalledWith(
      "Raffle",
      "demo",
      "initialize",
      {
        entranceFee: "10000000000000000",
        interval: 300,
        keyHash: `0x${"0".repeat(64)}`,
        subscriptionId: "1",
        callbackGasLimit: 500000,
        requestConfirmations: 3,
        numWords: 1,
        coordinatorKey: "default",
      },
      { timeoutMs: 15000 }
    );
  });

  it("answers 200 when the raffle already exists", async () => {
    mockedCall.mockResolvedValue({ created: false, status: { raffleId: "demo" } });
    const res = await post("/api/raffle/demo/initialize", undefined, ADMIN);
    expect(res.status).toBe(200);
  });
});

describe("raffle reads", () => {
  it("returns the status snapshot", async () => {
    const status = {
      raffleId: "demo",
      state: "OPEN",
      stateCode: 0,
      entranceFee: "10000000000000000",
      interval: 300,
      lastDrawTimestamp: 1_700_000_000,
      players: [],
      numberOfPlayers: 0,
      balance: "0",
      recentWinner: null,
      pendingRequestId: null,
      requestConfirmations: 3,
      numWords: 1,
    };
    mockedCall.mockResolvedValue(status);

    const res = await app.request("/api/raffle/demo/status");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual(status);
    expect(mockedCall).toHaveBeenCalledWith("Raffle", "demo", "getState", {}, {
      timeoutMs: 15000,
    });
  });

  it("passes the player index as a number", async () => {
    mockedCall.mockResolvedValue({ index: 2, player: "carol" });

    const res = await app.request("/api/raffle/demo/players/2");

    expect(res.status).toBe(200);
    expect(mockedCall).toHaveBeenCalledWith("Raffle", "demo", "getPlayer", { index: 2 }, {
      timeoutMs: 15000,
    });
  });

  it("rejects a negative player index", async () => {
    const res = await app.request("/api/raffle/demo/players/-1");
    expect(res.status).toBe(400);
    expect(mockedCall).not.toHaveBeenCalled();
  });

  it("maps an out-of-range index to 404", async () => {
    mockedCall.mockRejectedValue(
      new RestateError("Index 9 is out of range (4 players)", 404)
    );

    const res = await app.request("/api/raffle/demo/players/9");

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: "Index 9 is out of range (4 players)",
      code: "NOT_FOUND",
    });
  });
});

describe("upkeep", () => {
  it("checks upkeep with empty check data by default", async () => {
    mockedCall.mockResolvedValue({ upkeepNeeded: false, performData: "0x" });

    const res = await app.request("/api/raffle/demo/upkeep");

    expect(await res.json()).toEqual({ upkeepNeeded: false, performData: "0x" });
    expect(mockedCall).toHaveBeenCalledWith(
      "Raffle",
      "demo",
      "checkUpkeep",
      { checkData: "0x" },
      { timeoutMs: 15000 }
    );
  });

  it("reports the observed round when upkeep is not needed", async () => {
    mockedCall.mockRejectedValue(rejectedByHandler(new UpkeepNotNeededError(0n, 0, "OPEN")));

    const res = await post("/api/raffle/demo/upkeep");

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({
      error: "Upkeep not needed (balance: 0, players: 0, state: OPEN)",
      code: "UPKEEP_NOT_NEEDED",
      details: { balance: "0", participantCount: 0, state: "OPEN" },
    });
  });

  it("performs upkeep and reports the request id", async () => {
    mockedCall.mockResolvedValue({ requestId: "1" });

    const res = await post("/api/raffle/demo/upkeep");

    expect(res.status).toBe(202);
    expect(await res.json()).toEqual({ requestId: "1" });
    expect(mockedCall).toHaveBeenCalledWith(
      "Raffle",
      "demo",
      "performUpkeep",
      { performData: "0x" },
      { timeoutMs: 15000 }
    );
  });
});

describe("automation", () => {
  it("starts the keeper with the requested poll interval", async () => {
    mockedCall.mockResolvedValue({ active: true, generation: 1, pollIntervalMs: 5000, performed: 0 });

    const res = await post("/api/raffle/demo/automation/start", { pollIntervalMs: 5000 }, ADMIN);

    expect(res.status).toBe(200);
    expect(mockedCall).toHaveBeenCalledWith(
      "Automation",
      "demo",
      "start",
      { pollIntervalMs: 5000 },
      { timeoutMs: 15000 }
    );
  });

  it("rejects a poll interval below the minimum", async () => {
    const res = await post("/api/raffle/demo/automation/start", { pollIntervalMs: 10 }, ADMIN);
    expect(res.status).toBe(400);
    expect(mockedCall).not.toHaveBeenCalled();
  });
});

describe("accounts", () => {
  it("deposits into an account with the admin secret", async () => {
    mockedCall.mockResolvedValue({ balance: "100" });

    const res = await post("/api/accounts/alice/deposit", { amount: "100" }, ADMIN);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ balance: "100" });
    expect(mockedCall).toHaveBeenCalledWith(
      "Account",
      "alice",
      "deposit",
      { amount: "100" },
      { timeoutMs: 15000 }
    );
  });

  it("returns the account with its address", async () => {
    mockedCall.mockResolvedValue({ balance: "100", acceptsPayouts: true });

    const res = await app.request("/api/accounts/alice");

    expect(await res.json()).toEqual({
      address: "alice",
      balance: "100",
      acceptsPayouts: true,
    });
  });
});

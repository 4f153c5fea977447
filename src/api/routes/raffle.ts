import { Hono, type Context } from "hono";
import { adminGuard } from "../middleware/admin-guard.js";
import { callRestate } from "../../lib/restate-client.js";
import {
  automationStartSchema,
  enterRequestSchema,
  performUpkeepSchema,
  playerIndexSchema,
  raffleConfigSchema,
  raffleIdSchema,
} from "../../lib/schemas.js";
import { handleError, handleZodError } from "../../lib/errors.js";
import { EMPTY_PERFORM_DATA, type UpkeepCheck } from "../../lib/raffle/index.js";
import { config } from "../../lib/config.js";
import type { RaffleStatus } from "../../restate/raffle.js";
import type { AutomationStatus } from "../../lib/automation.js";

const raffleRouter = new Hono();

const RESTATE_TIMEOUT = config.restate.apiTimeoutMs;

/**
 * Read a JSON body; an empty body counts as {}
 */
async function readJson(c: Context): Promise<unknown> {
  const text = await c.req.text();
  if (text.trim() === "") return {};
  return JSON.parse(text);
}

/**
 * Create a raffle round (admin only). Omitted settings take defaults.
 */
raffleRouter.post("/:id/initialize", adminGuard, async (c) => {
  try {
    const raffleId = raffleIdSchema.safeParse(c.req.param("id"));
    if (!raffleId.success) return handleZodError(c, raffleId.error);

    const body = raffleConfigSchema.safeParse(await readJson(c));
    if (!body.success) return handleZodError(c, body.error);

    const result = await callRestate<{ created: boolean; status: RaffleStatus }>(
      "Raffle",
      raffleId.data,
      "initialize",
      body.data,
      { timeoutMs: RESTATE_TIMEOUT }
    );
    return c.json(result, result.created ? 201 : 200);
  } catch (error) {
    return handleError(c, error, "Failed to initialize raffle");
  }
});

/**
 * Enter the current round with a deposit debited from the player's account
 */
raffleRouter.post("/:id/enter", async (c) => {
  try {
    const raffleId = raffleIdSchema.safeParse(c.req.param("id"));
    if (!raffleId.success) return handleZodError(c, raffleId.error);

    const body = enterRequestSchema.safeParse(await readJson(c));
    if (!body.success) return handleZodError(c, body.error);

    const result = await callRestate<{
      index: number;
      numberOfPlayers: number;
      balance: string;
    }>("Raffle", raffleId.data, "enter", body.data, {
      timeoutMs: RESTATE_TIMEOUT,
    });
    return c.json(result);
  } catch (error) {
    return handleError(c, error, "Failed to enter raffle");
  }
});

raffleRouter.get("/:id/status", async (c) => {
  try {
    const raffleId = raffleIdSchema.safeParse(c.req.param("id"));
    if (!raffleId.success) return handleZodError(c, raffleId.error);

    const status = await callRestate<RaffleStatus>(
      "Raffle",
      raffleId.data,
      "getState",
      {},
      { timeoutMs: RESTATE_TIMEOUT }
    );
    return c.json(status);
  } catch (error) {
    return handleError(c, error, "Failed to get raffle status");
  }
});

raffleRouter.get("/:id/players/:index", async (c) => {
  try {
    const raffleId = raffleIdSchema.safeParse(c.req.param("id"));
    if (!raffleId.success) return handleZodError(c, raffleId.error);

    const index = playerIndexSchema.safeParse(c.req.param("index"));
    if (!index.success) return handleZodError(c, index.error);

    const result = await callRestate<{ index: number; player: string }>(
      "Raffle",
      raffleId.data,
      "getPlayer",
      { index: index.data },
      { timeoutMs: RESTATE_TIMEOUT }
    );
    return c.json(result);
  } catch (error) {
    return handleError(c, error, "Failed to get player");
  }
});

/**
 * Automation check. Safe to poll; never changes state.
 */
raffleRouter.get("/:id/upkeep", async (c) => {
  try {
    const raffleId = raffleIdSchema.safeParse(c.req.param("id"));
    if (!raffleId.success) return handleZodError(c, raffleId.error);

    const result = await callRestate<UpkeepCheck>(
      "Raffle",
      raffleId.data,
      "checkUpkeep",
      { checkData: c.req.query("checkData") ?? EMPTY_PERFORM_DATA },
      { timeoutMs: RESTATE_TIMEOUT }
    );
    return c.json(result);
  } catch (error) {
    return handleError(c, error, "Failed to check upkeep");
  }
});

/**
 * Trigger a draw. Anyone may call it; the raffle re-checks the predicate
 * and answers 409 when no draw is due.
 */
raffleRouter.post("/:id/upkeep", async (c) => {
  try {
    const raffleId = raffleIdSchema.safeParse(c.req.param("id"));
    if (!raffleId.success) return handleZodError(c, raffleId.error);

    const body = performUpkeepSchema.safeParse(await readJson(c));
    if (!body.success) return handleZodError(c, body.error);

    const result = await callRestate<{ requestId: string }>(
      "Raffle",
      raffleId.data,
      "performUpkeep",
      body.data,
      { timeoutMs: RESTATE_TIMEOUT }
    );
    return c.json(result, 202);
  } catch (error) {
    return handleError(c, error, "Failed to perform upkeep");
  }
});

// ============================================================
// Automation
// ============================================================

raffleRouter.post("/:id/automation/start", adminGuard, async (c) => {
  try {
    const raffleId = raffleIdSchema.safeParse(c.req.param("id"));
    if (!raffleId.success) return handleZodError(c, raffleId.error);

    const body = automationStartSchema.safeParse(await readJson(c));
    if (!body.success) return handleZodError(c, body.error);

    const status = await callRestate<AutomationStatus>(
      "Automation",
      raffleId.data,
      "start",
      body.data,
      { timeoutMs: RESTATE_TIMEOUT }
    );
    return c.json(status);
  } catch (error) {
    return handleError(c, error, "Failed to start automation");
  }
});

raffleRouter.post("/:id/automation/stop", adminGuard, async (c) => {
  try {
    const raffleId = raffleIdSchema.safeParse(c.req.param("id"));
    if (!raffleId.success) return handleZodError(c, raffleId.error);

    const status = await callRestate<AutomationStatus>(
      "Automation",
      raffleId.data,
      "stop",
      {},
      { timeoutMs: RESTATE_TIMEOUT }
    );
    return c.json(status);
  } catch (error) {
    return handleError(c, error, "Failed to stop automation");
  }
});

raffleRouter.get("/:id/automation", async (c) => {
  try {
    const raffleId = raffleIdSchema.safeParse(c.req.param("id"));
    if (!raffleId.success) return handleZodError(c, raffleId.error);

    const status = await callRestate<AutomationStatus>(
      "Automation",
      raffleId.data,
      "getStatus",
      {},
      { timeoutMs: RESTATE_TIMEOUT }
    );
    return c.json(status);
  } catch (error) {
    return handleError(c, error, "Failed to get automation status");
  }
});

export default raffleRouter;

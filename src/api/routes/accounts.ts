import { Hono } from "hono";
import { adminGuard } from "../middleware/admin-guard.js";
import { callRestate } from "../../lib/restate-client.js";
import {
  acceptsPayoutsSchema,
  depositSchema,
  playerIdSchema,
} from "../../lib/schemas.js";
import { handleError, handleZodError } from "../../lib/errors.js";
import type { AccountState } from "../../lib/accounts.js";
import { config } from "../../lib/config.js";

const accountsRouter = new Hono();

const RESTATE_TIMEOUT = config.restate.apiTimeoutMs;

/**
 * Fund an account (admin only, development faucet)
 */
accountsRouter.post("/:address/deposit", adminGuard, async (c) => {
  try {
    const address = playerIdSchema.safeParse(c.req.param("address"));
    if (!address.success) return handleZodError(c, address.error);

    const body = depositSchema.safeParse(await c.req.json());
    if (!body.success) return handleZodError(c, body.error);

    const result = await callRestate<{ balance: string }>(
      "Account",
      address.data,
      "deposit",
      body.data,
      { timeoutMs: RESTATE_TIMEOUT }
    );
    return c.json(result);
  } catch (error) {
    return handleError(c, error, "Failed to deposit");
  }
});

/**
 * Opt an account in or out of payouts (admin only)
 */
accountsRouter.post("/:address/payouts", adminGuard, async (c) => {
  try {
    const address = playerIdSchema.safeParse(c.req.param("address"));
    if (!address.success) return handleZodError(c, address.error);

    const body = acceptsPayoutsSchema.safeParse(await c.req.json());
    if (!body.success) return handleZodError(c, body.error);

    const result = await callRestate<AccountState>(
      "Account",
      address.data,
      "setAcceptsPayouts",
      body.data,
      { timeoutMs: RESTATE_TIMEOUT }
    );
    return c.json(result);
  } catch (error) {
    return handleError(c, error, "Failed to update account");
  }
});

accountsRouter.get("/:address", async (c) => {
  try {
    const address = playerIdSchema.safeParse(c.req.param("address"));
    if (!address.success) return handleZodError(c, address.error);

    const account = await callRestate<AccountState>(
      "Account",
      address.data,
      "getBalance",
      {},
      { timeoutMs: RESTATE_TIMEOUT }
    );
    return c.json({ address: address.data, ...account });
  } catch (error) {
    return handleError(c, error, "Failed to get account");
  }
});

export default accountsRouter;

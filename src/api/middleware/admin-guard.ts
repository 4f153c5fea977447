/**
 * Admin secret check for operator endpoints
 * Compares the x-admin-secret header against ADMIN_SECRET
 */

import crypto from "node:crypto";
import type { Context, Next } from "hono";
import { adminUnavailable, unauthorized } from "../../lib/errors.js";
import { config } from "../../lib/config.js";
import { createLogger } from "../../lib/logger.js";

const logger = createLogger("admin-guard");

export const ADMIN_SECRET_HEADER = "x-admin-secret";

function secretsMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

export async function adminGuard(c: Context, next: Next) {
  const expected = config.security.adminSecret;
  if (!expected) {
    return adminUnavailable(c);
  }

  const provided = c.req.header(ADMIN_SECRET_HEADER);
  if (!provided || !secretsMatch(provided, expected)) {
    logger.warn({ path: c.req.path }, "Rejected admin request");
    return unauthorized(c, "Invalid admin secret");
  }

  await next();
}

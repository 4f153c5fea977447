/**
 * Logging configuration using pino
 * Pretty output in development when pino-pretty is installed
 */

import { createRequire } from "node:module";
import pino, { type Logger } from "pino";
import { config } from "./config.js";

const require = createRequire(import.meta.url);

function resolvePrettyTransport(): string | undefined {
  if (config.server.isProduction || config.server.nodeEnv === "test") {
    return undefined;
  }
  try {
    return require.resolve("pino-pretty");
  } catch {
    return undefined;
  }
}

const prettyTarget = resolvePrettyTransport();

export const logger = pino({
  level: config.server.logLevel,
  base: { service: "upkeep-raffle" },
  transport: prettyTarget
    ? { target: prettyTarget, options: { colorize: true } }
    : undefined,
});

/**
 * Child logger for a module, optionally bound to extra fields (e.g. raffleId)
 */
export function createLogger(
  module: string,
  bindings: Record<string, unknown> = {}
): Logger {
  return logger.child({ module, ...bindings });
}

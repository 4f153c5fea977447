/**
 * Startup checks for the raffle backend.
 * config.ts silently falls back to defaults on bad values; this reports them.
 */

import { z } from "zod";
import { config } from "./config.js";
import { createLogger } from "./logger.js";

const logger = createLogger("startup");

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

const port = z.coerce.number().int().min(1).max(65535);
const positiveInt = z.coerce.number().int().positive();

/**
 * Settings read by config.ts, validated when present
 */
const envSchema = z.object({
  NATS_URL: z.string().regex(/^(nats|tls|wss?):\/\//, "must be a nats:// or ws(s):// URL").optional(),
  RESTATE_INGRESS_URL: z.string().url().optional(),
  API_PORT: port.optional(),
  SSE_PORT: port.optional(),
  RESTATE_PORT: port.optional(),
  RAFFLE_ENTRANCE_FEE: z
    .string()
    .regex(/^\d+$/, "must be an integer amount in the smallest unit")
    .refine((v) => !/^\d+$/.test(v) || BigInt(v) > 0n, "must be positive")
    .optional(),
  RAFFLE_INTERVAL_SECS: positiveInt.optional(),
  RAFFLE_KEY_HASH: z
    .string()
    .regex(/^0x[0-9a-fA-F]{64}$/, "must be 0x followed by 64 hex digits")
    .optional(),
  RAFFLE_CALLBACK_GAS_LIMIT: positiveInt.optional(),
  RANDOMNESS_COORDINATOR_KEY: z
    .string()
    .regex(/^[A-Za-z0-9_-]{1,64}$/, "must be 1-64 letters, digits, '-' or '_'")
    .optional(),
  RANDOMNESS_CONFIRMATION_DELAY_MS: z.coerce.number().int().min(0).optional(),
  AUTOMATION_POLL_INTERVAL_MS: z.coerce
    .number()
    .int()
    .min(config.automation.minPollIntervalMs)
    .max(config.automation.maxPollIntervalMs)
    .optional(),
});

// Without these a production deployment talks to localhost or has no admin
const REQUIRED_IN_PRODUCTION = [
  "NATS_URL",
  "RESTATE_INGRESS_URL",
  "CORS_ORIGINS",
  "ADMIN_SECRET",
] as const;

// Defaults that are fine locally but rarely what a deployment wants
const RECOMMENDED_IN_PRODUCTION = [
  "RAFFLE_ENTRANCE_FEE",
  "RAFFLE_INTERVAL_SECS",
  "RANDOMNESS_COORDINATOR_KEY",
] as const;

/**
 * Check an environment. Empty values count as unset, as they do in config.ts.
 */
export function validateEnvironment(
  env: Record<string, string | undefined> = process.env
): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const production = env.NODE_ENV === "production";

  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    for (const issue of parsed.error.errors) {
      const name = issue.path.join(".");
      errors.push(`Invalid value for ${name}: "${present[name] ?? ""}" - ${issue.message}`);
    }
  }

  if (production) {
    for (const name of REQUIRED_IN_PRODUCTION) {
      if (present[name] === undefined) errors.push(`Missing required env var: ${name}`);
    }
    for (const name of RECOMMENDED_IN_PRODUCTION) {
      if (present[name] === undefined) warnings.push(`Using default for ${name}`);
    }
  }

  if (parsed.success) {
    const ports = [
      parsed.data.API_PORT ?? config.server.apiPort,
      parsed.data.SSE_PORT ?? config.server.ssePort,
      parsed.data.RESTATE_PORT ?? config.server.restatePort,
    ];
    if (new Set(ports).size !== ports.length) {
      errors.push("Port conflict: API_PORT, SSE_PORT and RESTATE_PORT must differ");
    }

    const pollMs = parsed.data.AUTOMATION_POLL_INTERVAL_MS ?? config.automation.pollIntervalMs;
    const intervalSecs = parsed.data.RAFFLE_INTERVAL_SECS ?? config.raffle.defaultIntervalSecs;
    if (pollMs > intervalSecs * 1000) {
      warnings.push(
        `AUTOMATION_POLL_INTERVAL_MS (${pollMs}) exceeds RAFFLE_INTERVAL_SECS (${intervalSecs}s); draws will run late`
      );
    }
  }

  return { valid: errors.length === 0, errors, warnings };
}

/**
 * Validate, log the outcome and the raffle defaults. Exits in production
 * when the environment is invalid.
 */
export function validateStartup(): void {
  const result = validateEnvironment();

  for (const warning of result.warnings) logger.warn(warning);
  for (const error of result.errors) logger.error(error);

  if (!result.valid) {
    if (config.server.isProduction) {
      logger.fatal("Startup validation failed in production mode. Exiting.");
      process.exit(1);
    }
    logger.warn("Startup validation failed, continuing in development mode");
  }

  logger.info(
    {
      environment: config.server.nodeEnv,
      natsUrl: config.nats.url,
      restateUrl: config.restate.ingressUrl,
      publishEvents: config.nats.publishEvents,
      raffle: {
        entranceFee: config.raffle.defaultEntranceFee.toString(),
        intervalSecs: config.raffle.defaultIntervalSecs,
        requestConfirmations: config.raffle.requestConfirmations,
      },
      randomness: {
        coordinator: config.randomness.coordinatorKey,
        confirmationDelayMs: config.randomness.confirmationDelayMs,
      },
      automationPollMs: config.automation.pollIntervalMs,
    },
    "Raffle configuration"
  );
}

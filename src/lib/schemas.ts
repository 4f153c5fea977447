/**
 * Zod schemas for input validation
 * Shared by the HTTP routes and the Restate handlers
 */

import { z } from "zod";
import { config } from "./config.js";
import { MAX_NUM_WORDS } from "./randomness.js";

// ============================================================
// Common Schemas
// ============================================================

const identifierSchema = (label: string) =>
  z
    .string()
    .min(1, `${label} is required`)
    .max(100, `${label} too long`)
    .regex(/^[a-zA-Z0-9_-]+$/, `Invalid ${label.toLowerCase()} format`);

/**
 * Raffle ID schema (the Restate object key)
 */
export const raffleIdSchema = identifierSchema("Raffle ID");

/**
 * Participant identity, also the key of their Account object
 */
export const playerIdSchema = identifierSchema("Player ID");

/**
 * Non-negative integer amount in the smallest unit, as a decimal string
 */
export const amountSchema = z
  .string()
  .regex(/^\d+$/, "Amount must be a non-negative integer string")
  .max(78, "Amount too large");

/**
 * Amount that must be greater than zero
 */
export const positiveAmountSchema = amountSchema.refine(
  (value) => /^\d+$/.test(value) && BigInt(value) > 0n,
  "Amount must be greater than zero"
);

/**
 * Player slot index from a path parameter
 */
export const playerIndexSchema = z.coerce
  .number()
  .int("Index must be an integer")
  .min(0, "Index must be >= 0");

// ============================================================
// Raffle Configuration Schemas
// ============================================================

/**
 * Raffle initialization schema. Omitted fields take configured defaults.
 */
export const raffleConfigSchema = z.object({
  entranceFee: positiveAmountSchema.default(
    config.raffle.defaultEntranceFee.toString()
  ),
  interval: z
    .number()
    .int("Interval must be an integer")
    .min(1, "Interval must be at least 1 second")
    .max(365 * 24 * 60 * 60, "Interval cannot exceed one year")
    .default(config.raffle.defaultIntervalSecs),
  keyHash: z
    .string()
    .regex(/^0x[0-9a-fA-F]{64}$/, "Key hash must be 32 bytes of hex")
    .default(config.raffle.keyHash),
  subscriptionId: z
    .string()
    .regex(/^\d+$/, "Subscription ID must be numeric")
    .default(config.raffle.subscriptionId),
  callbackGasLimit: z
    .number()
    .int()
    .min(1)
    .max(2_500_000)
    .default(config.raffle.callbackGasLimit),
  requestConfirmations: z
    .number()
    .int()
    .min(1)
    .max(200)
    .default(config.raffle.requestConfirmations),
  numWords: z
    .number()
    .int()
    .min(1)
    .max(MAX_NUM_WORDS)
    .default(config.raffle.numWords),
  coordinatorKey: identifierSchema("Coordinator key").default(
    config.randomness.coordinatorKey
  ),
});

export type RaffleConfigInput = z.input<typeof raffleConfigSchema>;
export type RaffleConfig = z.infer<typeof raffleConfigSchema>;

// ============================================================
// Raffle Operation Schemas
// ============================================================

/**
 * Entry request schema
 */
export const enterRequestSchema = z.object({
  player: playerIdSchema,
  amount: amountSchema,
});

export type EnterRequest = z.infer<typeof enterRequestSchema>;

/**
 * performUpkeep request schema
 */
export const performUpkeepSchema = z.object({
  performData: z.string().max(1024).default("0x"),
});

/**
 * Randomness callback schema
 */
export const fulfillRandomWordsSchema = z.object({
  requestId: z.string().regex(/^\d+$/, "Invalid request ID"),
  randomWords: z.array(amountSchema).max(MAX_NUM_WORDS),
});

export type FulfillRandomWordsRequest = z.infer<typeof fulfillRandomWordsSchema>;

// ============================================================
// Account & Automation Schemas
// ============================================================

export const depositSchema = z.object({
  amount: positiveAmountSchema,
});

export const acceptsPayoutsSchema = z.object({
  acceptsPayouts: z.boolean(),
});

export const automationStartSchema = z.object({
  pollIntervalMs: z
    .number()
    .int()
    .min(config.automation.minPollIntervalMs)
    .max(config.automation.maxPollIntervalMs)
    .optional(),
});

// ============================================================
// Validation Helpers
// ============================================================

/**
 * Validate and parse input with schema
 * Returns { success: true, data } or { success: false, error }
 */
export function validateInput<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown
): { success: true; data: T } | { success: false; error: z.ZodError } {
  const result = schema.safeParse(input);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Format Zod error for API response
 */
export function formatZodError(error: z.ZodError): {
  error: string;
  code: string;
  details: Array<{ path: string; message: string }>;
} {
  return {
    error: "Validation failed",
    code: "VALIDATION_FAILED",
    details: error.errors.map((e) => ({
      path: e.path.join("."),
      message: e.message,
    })),
  };
}

/**
 * Unified configuration for the application
 * Centralizes all constants and environment variables
 */

// ============================================================
// Environment Variable Parsing Helpers
// ============================================================

function envString(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

function envNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

function envBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === "true" || value === "1";
}

function envBigInt(key: string, defaultValue: bigint): bigint {
  const value = process.env[key];
  if (!value || !/^\d+$/.test(value)) return defaultValue;
  return BigInt(value);
}

// ============================================================
// Server Configuration
// ============================================================

export const server = {
  /** API server port */
  apiPort: envNumber("API_PORT", 3003),
  /** SSE server port */
  ssePort: envNumber("SSE_PORT", 3004),
  /** Restate endpoint port */
  restatePort: envNumber("RESTATE_PORT", 9080),
  /** Log level */
  logLevel: envString("LOG_LEVEL", "info"),
  /** Node environment */
  nodeEnv: envString("NODE_ENV", "development"),
  /** Is production */
  isProduction: envString("NODE_ENV", "development") === "production",
} as const;

// ============================================================
// NATS Configuration
// ============================================================

export const nats = {
  /** NATS server URL */
  url: envString("NATS_URL", "nats://localhost:4222"),
  /** Max reconnection attempts (-1 for infinite) */
  maxReconnectAttempts: -1,
  /** Publish raffle notifications */
  publishEvents: envBoolean("PUBLISH_EVENTS", true),
} as const;

// ============================================================
// Restate Configuration
// ============================================================

export const restate = {
  /** Restate ingress URL */
  ingressUrl: envString("RESTATE_INGRESS_URL", "http://localhost:8080"),
  /** Default request timeout (ms) */
  defaultTimeoutMs: envNumber("RESTATE_TIMEOUT_MS", 30000),
  /** API request timeout (ms) */
  apiTimeoutMs: envNumber("RESTATE_API_TIMEOUT_MS", 15000),
} as const;

// ============================================================
// Raffle Configuration
// ============================================================

export const raffle = {
  /** Default entrance fee in the smallest unit (0.01 with 18 decimals) */
  defaultEntranceFee: envBigInt("RAFFLE_ENTRANCE_FEE", 10_000_000_000_000_000n),
  /** Default seconds between draws */
  defaultIntervalSecs: envNumber("RAFFLE_INTERVAL_SECS", 30),
  /** Randomness lane passed to the coordinator */
  keyHash: envString("RAFFLE_KEY_HASH", `0x${"0".repeat(64)}`),
  /** Randomness subscription */
  subscriptionId: envString("RAFFLE_SUBSCRIPTION_ID", "1"),
  /** Resource budget for the fulfillment callback */
  callbackGasLimit: envNumber("RAFFLE_CALLBACK_GAS_LIMIT", 500000),
  /** Confirmations before fulfillment */
  requestConfirmations: 3,
  /** One winner, one word */
  numWords: 1,
} as const;

// ============================================================
// Randomness Coordinator Configuration
// ============================================================

export const randomness = {
  /** Key of the RandomnessCoordinator object raffles register with */
  coordinatorKey: envString("RANDOMNESS_COORDINATOR_KEY", "default"),
  /** Delay per confirmation before the coordinator fulfills (ms) */
  confirmationDelayMs: envNumber("RANDOMNESS_CONFIRMATION_DELAY_MS", 2000),
} as const;

// ============================================================
// Automation Configuration
// ============================================================

export const automation = {
  /** Default poll interval for the upkeep keeper (ms) */
  pollIntervalMs: envNumber("AUTOMATION_POLL_INTERVAL_MS", 10000),
  /** Lowest poll interval accepted (ms) */
  minPollIntervalMs: 1000,
  /** Highest poll interval accepted (ms) */
  maxPollIntervalMs: 60 * 60 * 1000, // 1 hour
} as const;

// ============================================================
// Security Configuration
// ============================================================

const DEFAULT_CORS_ORIGINS: string[] = [
  "http://localhost:3005",
  "http://localhost:3003",
  "http://127.0.0.1:3005",
  "http://127.0.0.1:3003",
];

export const security = {
  /** Admin secret for protected endpoints */
  adminSecret: process.env.ADMIN_SECRET,
  /** CORS allowed origins */
  corsOrigins: process.env.CORS_ORIGINS?.split(",") || DEFAULT_CORS_ORIGINS,
} as const;

// ============================================================
// Full Config Export
// ============================================================

export const config = {
  server,
  nats,
  restate,
  raffle,
  randomness,
  automation,
  security,
} as const;

export default config;

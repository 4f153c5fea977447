#!/usr/bin/env tsx
/**
 * Initialize a demo raffle, fund a few accounts and start its keeper
 * Usage: npm run init-raffle -- [raffleId]
 */
import "../lib/env-loader.js";
import { callRestate } from "../lib/restate-client.js";
import { formatUnits } from "../lib/amount.js";
import { config } from "../lib/config.js";
import { createLogger } from "../lib/logger.js";
import type { RaffleStatus } from "../restate/raffle.js";

const logger = createLogger("init-raffle");

const DEMO_ACCOUNTS = ["alice", "bob", "carol"];

async function initRaffle(): Promise<void> {
  const raffleId =
    process.argv[2] ||
    process.env.RAFFLE_ID ||
    `demo-raffle-${Math.floor(Date.now() / 1000)}`;

  const raffleConfig = {
    entranceFee: config.raffle.defaultEntranceFee.toString(),
    interval: config.raffle.defaultIntervalSecs,
  };

  logger.info({ raffleId, ...raffleConfig }, "Initializing raffle");

  const { status } = await callRestate<{ created: boolean; status: RaffleStatus }>(
    "Raffle",
    raffleId,
    "initialize",
    raffleConfig
  );

  // Enough for ten entries each
  const funding = (config.raffle.defaultEntranceFee * 10n).toString();
  for (const account of DEMO_ACCOUNTS) {
    await callRestate("Account", account, "deposit", { amount: funding });
  }

  await callRestate("Automation", raffleId, "start", {});

  console.log(`
Raffle initialized: ${raffleId}
  Entrance fee:  ${formatUnits(BigInt(status.entranceFee))} (${status.entranceFee})
  Interval:      ${status.interval}s
  Funded:        ${DEMO_ACCOUNTS.join(", ")}
  Keeper:        started

Enter with:
  curl -X POST localhost:${config.server.apiPort}/api/raffle/${raffleId}/enter \\
    -H 'content-type: application/json' \\
    -d '{"player":"alice","amount":"${status.entranceFee}"}'
`);
}

initRaffle().catch((error: unknown) => {
  logger.error({ err: error }, "Failed to initialize raffle");
  console.log(`
Make sure:
1. Restate is running
2. The worker is registered:
   restate deployments register http://localhost:${config.server.restatePort}
`);
  process.exit(1);
});

import "../lib/env-loader.js";
import * as restate from "@restatedev/restate-sdk";
import { accountObject } from "./account.js";
import { automationObject } from "./automation.js";
import { raffleObject } from "./raffle.js";
import { randomnessCoordinatorObject } from "./randomness-coordinator.js";
import { config } from "../lib/config.js";
import { createLogger } from "../lib/logger.js";

const logger = createLogger("restate-server");

// Create Restate server with services
restate.serve({
  services: [raffleObject, randomnessCoordinatorObject, accountObject, automationObject],
  port: config.server.restatePort,
});

logger.info({ port: config.server.restatePort }, "Restate endpoint listening");

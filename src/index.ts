/**
 * Single-process deployment: API and SSE servers plus the Restate endpoint
 */

import "./lib/env-loader.js";
import { serve, type ServerType } from "@hono/node-server";
import apiApp from "./api/server.js";
import sseApp from "./sse/server.js";
import "./restate/server.js";
import { config } from "./lib/config.js";
import { createLogger } from "./lib/logger.js";
import { closeNatsConnection } from "./lib/nats.js";
import { validateStartup } from "./lib/startup.js";

const logger = createLogger("main");

validateStartup();

function listen(
  name: string,
  app: { fetch: (request: Request) => Response | Promise<Response> },
  port: number
): ServerType {
  return serve({ fetch: app.fetch, port }, (info) => {
    logger.info({ port: info.port }, `${name} server listening`);
  });
}

const servers = [
  listen("API", apiApp, config.server.apiPort),
  listen("SSE", sseApp, config.server.ssePort),
];

logger.info(
  {
    register: `restate deployments register http://localhost:${config.server.restatePort}`,
    initRaffle: "npm run init-raffle -- demo",
    watch: `curl -N http://localhost:${config.server.ssePort}/events/demo`,
  },
  "Raffle backend started"
);

async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, "Shutting down");
  await Promise.all(
    servers.map(
      (server) => new Promise<void>((resolve) => server.close(() => resolve()))
    )
  );
  await closeNatsConnection();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, "Shutdown failed");
      process.exit(1);
    });
  });
}

/**
 * Shared CORS settings for the API and SSE servers
 */

import type { cors } from "hono/cors";
import { config } from "./config.js";

type CorsOptions = NonNullable<Parameters<typeof cors>[0]>;

export function getAllowedOrigins(): string[] {
  return config.security.corsOrigins;
}

export function corsOptions(
  allowMethods: string[],
  allowHeaders: string[] = ["Content-Type", "Accept"]
): CorsOptions {
  return {
    origin: getAllowedOrigins(),
    allowMethods,
    allowHeaders,
    exposeHeaders: ["Content-Type"],
    credentials: true,
  };
}

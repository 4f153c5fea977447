/**
 * Development .env support. Entry points import this before anything reads
 * config.ts. Files are applied in order (`ENV_FILE`, or `.env.local` then
 * `.env`); the first file to set a key wins and the real environment always
 * wins over any file. Does nothing in production.
 */

import fs from "node:fs";
import path from "node:path";

const LINE = /^\s*(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*?)\s*$/;

/**
 * KEY=value pairs of one file. Quoted values are kept verbatim; unquoted ones
 * lose a trailing ` # comment`.
 */
export function parseEnvFile(contents: string): Array<[string, string]> {
  const entries: Array<[string, string]> = [];
  for (const line of contents.split(/\r?\n/)) {
    const match = LINE.exec(line);
    if (!match) continue;
    const [, key = "", raw = ""] = match;
    const quote = raw[0];
    if ((quote === '"' || quote === "'") && raw.length > 1 && raw.endsWith(quote)) {
      entries.push([key, raw.slice(1, -1)]);
    } else {
      entries.push([key, raw.replace(/(^|\s+)#.*$/, "")]);
    }
  }
  return entries;
}

export function applyEnvFile(
  entries: Array<[string, string]>,
  env: Record<string, string | undefined>
): string[] {
  const applied: string[] = [];
  for (const [key, value] of entries) {
    if (env[key] !== undefined) continue;
    env[key] = value;
    applied.push(key);
  }
  return applied;
}

function envFiles(): string[] {
  if (process.env.ENV_FILE) return [process.env.ENV_FILE];
  return [".env.local", ".env"].map((name) => path.join(process.cwd(), name));
}

if (process.env.NODE_ENV !== "production") {
  for (const file of envFiles()) {
    if (!fs.existsSync(file)) continue;
    try {
      applyEnvFile(parseEnvFile(fs.readFileSync(file, "utf8")), process.env);
    } catch (error) {
      // pino is configured from the environment being loaded here
      console.warn(`Could not load ${file}:`, error);
    }
  }
}

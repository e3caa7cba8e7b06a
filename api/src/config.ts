/**
 * Environment configuration
 *
 * Read once at startup by main.ts. Values come from `process.env`
 * (optionally filled from a .env file by dotenv).
 */

import { parseLevel, type LogLevel } from "./logger.ts";
import { parseIntSafe } from "./shared/utils.ts";

export type StoreDriver = "memory" | "postgres";

export interface AppConfig {
  port: number;
  env: string;
  logLevel: LogLevel;
  store:
    | { driver: "memory" }
    | { driver: "postgres"; databaseUrl: string; poolSize: number };
}

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
  }
}

// Unset means the fallback; anything set must be a plain decimal integer
function readInt(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
  problems: string[],
): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  if (!/^\d+$/.test(raw)) {
    problems.push(`${key} must be an integer (got ${raw})`);
    return fallback;
  }
  return parseIntSafe(raw) ?? fallback;
}

/**
 * Build the app config from an environment map
 * @throws ConfigError listing every invalid or missing variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const problems: string[] = [];

  const port = readInt(env, "PORT", 8000, problems);
  if (port < 1 || port > 65535) {
    problems.push(`PORT must be between 1 and 65535 (got ${env.PORT})`);
  }

  const poolSize = readInt(env, "DB_POOL_SIZE", 10, problems);
  if (poolSize < 1) {
    problems.push(`DB_POOL_SIZE must be positive (got ${env.DB_POOL_SIZE})`);
  }

  const rawDriver = env.STORE_DRIVER?.trim() || "memory";
  let driver: StoreDriver = "memory";
  if (rawDriver === "memory" || rawDriver === "postgres") {
    driver = rawDriver;
  } else {
    problems.push(`STORE_DRIVER must be "memory" or "postgres" (got ${rawDriver})`);
  }

  const databaseUrl = env.DATABASE_URL?.trim() || "";
  if (driver === "postgres" && !databaseUrl) {
    problems.push("DATABASE_URL is required when STORE_DRIVER=postgres");
  }

  let logLevel: LogLevel = "info";
  if (env.LOG_LEVEL) {
    const parsed = parseLevel(env.LOG_LEVEL);
    if (parsed) {
      logLevel = parsed;
    } else {
      problems.push(`LOG_LEVEL must be info, warn or error (got ${env.LOG_LEVEL})`);
    }
  }

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  return {
    port,
    env: env.ENV || "development",
    logLevel,
    store: driver === "postgres"
      ? { driver, databaseUrl, poolSize }
      : { driver },
  };
}

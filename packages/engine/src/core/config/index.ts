/**
 * Engine Configuration
 *
 * Loads configuration from environment variables with sensible defaults.
 * All config is validated at startup — fail fast if misconfigured.
 */

import { LOG_LEVELS, type LogLevel } from "@arbor/contracts";

export type StoreDriver = "memory" | "postgres";

export interface ArborConfig {
  store: {
    driver: StoreDriver;
  };
  database: {
    /** Required when store.driver is "postgres" */
    url: string | null;
  };
  accessControl: {
    /**
     * When false, every permission check passes. Intended for trusted
     * single-user deployments only.
     */
    enabled: boolean;
  };
  logging: {
    level: LogLevel;
  };
}

function parseBoolean(name: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === "") return fallback;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  throw new Error(`${name} must be a boolean ("true" or "false"), got "${value}"`);
}

function parseLogLevel(value: string | undefined): LogLevel {
  const level = (value ?? "info").trim().toLowerCase();
  const match = LOG_LEVELS.find((l) => l === level);
  if (!match) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got "${value}"`);
  }
  return match;
}

function parseStoreDriver(value: string | undefined): StoreDriver {
  const driver = (value ?? "memory").trim().toLowerCase();
  if (driver === "memory" || driver === "postgres") return driver;
  throw new Error(`ARBOR_STORE must be "memory" or "postgres", got "${value}"`);
}

/**
 * Loads configuration from the environment (process.env by default).
 * Throws immediately if a variable is malformed or a required one is missing.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ArborConfig {
  const driver = parseStoreDriver(env.ARBOR_STORE);
  const databaseUrl = env.DATABASE_URL || null;

  if (driver === "postgres" && !databaseUrl) {
    throw new Error(
      "DATABASE_URL environment variable is required when ARBOR_STORE=postgres."
    );
  }

  return {
    store: { driver },
    database: { url: databaseUrl },
    accessControl: {
      enabled: parseBoolean("ARBOR_ACCESS_CONTROL_ENABLED", env.ARBOR_ACCESS_CONTROL_ENABLED, true),
    },
    logging: {
      level: parseLogLevel(env.LOG_LEVEL),
    },
  };
}

/** Defaults used when the engine is created without explicit config */
export function defaultConfig(): ArborConfig {
  return loadConfig({});
}

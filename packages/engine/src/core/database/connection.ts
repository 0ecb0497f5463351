/**
 * Database Connection
 *
 * Establishes and manages the PostgreSQL connection via Drizzle ORM.
 * Provides the raw postgres.js client for migrations and the Drizzle
 * instance for the folder store.
 */

import { drizzle, type PostgresJsDatabase } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import type { ArborConfig } from "../config/index.js";

/** The raw postgres.js client instance */
let sqlClient: postgres.Sql | null = null;

/** The Drizzle ORM instance */
let drizzleInstance: PostgresJsDatabase | null = null;

export interface DatabaseHandle {
  sql: postgres.Sql;
  db: PostgresJsDatabase;
}

/**
 * Initializes the database connection.
 * Call once at application startup.
 */
export function initDatabase(config: ArborConfig): DatabaseHandle {
  if (!config.database.url) {
    throw new Error("Cannot initialize database: DATABASE_URL is not configured.");
  }
  const client = postgres(config.database.url);
  const db = drizzle(client);
  sqlClient = client;
  drizzleInstance = db;

  return { sql: client, db };
}

/**
 * Returns the active connection.
 * Throws if initDatabase() hasn't been called.
 */
export function getDatabase(): DatabaseHandle {
  if (!drizzleInstance || !sqlClient) {
    throw new Error(
      "Database not initialized. Call initDatabase() at startup."
    );
  }
  return { sql: sqlClient, db: drizzleInstance };
}

/**
 * Closes the database connection gracefully.
 * Call on application shutdown.
 */
export async function closeDatabase(): Promise<void> {
  if (sqlClient) {
    await sqlClient.end();
    sqlClient = null;
    drizzleInstance = null;
  }
}

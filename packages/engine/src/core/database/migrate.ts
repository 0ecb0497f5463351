/**
 * Migration Runner
 *
 * Creates the engine tables. Idempotent: each table is created only if it
 * does not exist yet, and existing tables are never altered or dropped.
 *
 * Both tables cascade on folder deletion, so removing a folder row also
 * removes its descendants and their ACL entries at the database level.
 */

import { createLogger } from "../logging/index.js";
import { getDatabase, type DatabaseHandle } from "./connection.js";
import { ACL_ENTRIES_TABLE, FOLDERS_TABLE } from "./schema.js";

const logger = createLogger("migrate");

/**
 * Checks whether a table exists in the public schema.
 */
async function tableExists(pgSql: DatabaseHandle["sql"], tableName: string): Promise<boolean> {
  const rows = await pgSql.unsafe(
    `SELECT 1 FROM information_schema.tables WHERE table_schema = 'public' AND table_name = $1 LIMIT 1`,
    [tableName]
  );
  return rows.length > 0;
}

/**
 * Runs the engine migrations against the initialized database.
 * Returns the names of the tables that were created.
 */
export async function runArborMigrations(): Promise<string[]> {
  const { sql: pgSql } = getDatabase();
  const created: string[] = [];

  if (!(await tableExists(pgSql, FOLDERS_TABLE))) {
    await pgSql.unsafe(`
      CREATE TABLE ${FOLDERS_TABLE} (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        name VARCHAR(32) NOT NULL,
        parent_id UUID REFERENCES ${FOLDERS_TABLE}(id) ON DELETE CASCADE,
        notes TEXT NOT NULL DEFAULT '',
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        CONSTRAINT arbor_folders_sibling_name UNIQUE (parent_id, name)
      )
    `);
    await pgSql.unsafe(
      `CREATE INDEX idx_arbor_folders_parent ON ${FOLDERS_TABLE}(parent_id)`
    );
    created.push(FOLDERS_TABLE);
    logger.info("Created table", { table: FOLDERS_TABLE });
  }

  if (!(await tableExists(pgSql, ACL_ENTRIES_TABLE))) {
    await pgSql.unsafe(`
      CREATE TABLE ${ACL_ENTRIES_TABLE} (
        folder_id UUID NOT NULL REFERENCES ${FOLDERS_TABLE}(id) ON DELETE CASCADE,
        agent_key VARCHAR(160) NOT NULL,
        permissions VARCHAR(6) NOT NULL CHECK (permissions ~ '^v?l?a?d?c?m?$' AND permissions <> ''),
        PRIMARY KEY (folder_id, agent_key)
      )
    `);
    await pgSql.unsafe(
      `CREATE INDEX idx_arbor_acl_entries_agent ON ${ACL_ENTRIES_TABLE}(agent_key)`
    );
    created.push(ACL_ENTRIES_TABLE);
    logger.info("Created table", { table: ACL_ENTRIES_TABLE });
  }

  return created;
}

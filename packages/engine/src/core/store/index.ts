/**
 * Store Factory
 *
 * Builds the FolderStore named by configuration. The PostgreSQL store
 * connects and runs its migrations before it is returned.
 */

import type { FolderStore } from "@arbor/contracts";
import type { ArborConfig } from "../config/index.js";
import { closeDatabase, initDatabase } from "../database/connection.js";
import { runArborMigrations } from "../database/migrate.js";
import { MemoryFolderStore } from "./memory-store.js";
import { PostgresFolderStore } from "./postgres-store.js";

export async function createStoreFromConfig(config: ArborConfig): Promise<FolderStore> {
  switch (config.store.driver) {
    case "memory":
      return new MemoryFolderStore();
    case "postgres": {
      const { db } = initDatabase(config);
      await runArborMigrations();
      return new PostgresFolderStore(db, { onClose: closeDatabase });
    }
  }
}

export { MemoryFolderStore } from "./memory-store.js";
export { PostgresFolderStore } from "./postgres-store.js";
export type { PostgresStoreOptions, TransactionalDatabase } from "./postgres-store.js";

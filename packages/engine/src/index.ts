/**
 * @arbor/engine
 *
 * Public API of the folder access-control engine.
 */

// Engine
export { createAclEngine } from "./engine.js";
export type { AclEngineOptions } from "./engine.js";

// Configuration
export { loadConfig, defaultConfig } from "./core/config/index.js";
export type { ArborConfig, StoreDriver } from "./core/config/index.js";

// Stores
export {
  createStoreFromConfig,
  MemoryFolderStore,
  PostgresFolderStore,
} from "./core/store/index.js";
export type { PostgresStoreOptions, TransactionalDatabase } from "./core/store/index.js";
export { initDatabase, getDatabase, closeDatabase } from "./core/database/connection.js";
export { runArborMigrations } from "./core/database/migrate.js";

// Identity directory
export { MemoryIdentityDirectory } from "./core/directory/memory-directory.js";

// Paths
export { parseFolderPath, formatFolderPath } from "./core/hierarchy/path.js";

// Logging & observability
export { createLogger } from "./core/logging/index.js";
export {
  captureException,
  captureMessage,
  flushObservability,
  getObservabilityProvider,
  setObservabilityProvider,
  resetObservability,
  ConsoleObservabilityProvider,
} from "./core/observability/index.js";
export type {
  ObservabilityProvider,
  ObservabilitySeverity,
  ObservabilityContext,
} from "./core/observability/index.js";

/**
 * Engine Context
 *
 * Everything an engine operation needs, scoped to one store transaction.
 * Built by createAclEngine for each call; the operation modules never
 * open transactions themselves.
 */

import type { FolderStoreTransaction, IdentityDirectory, Logger } from "@arbor/contracts";
import type { ArborConfig } from "./config/index.js";

export interface EngineContext {
  tx: FolderStoreTransaction;
  config: ArborConfig;
  directory: IdentityDirectory | null;
  logger: Logger;
}

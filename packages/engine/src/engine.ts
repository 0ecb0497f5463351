/**
 * ACL Engine
 *
 * The single entry point for folder and permission operations. Every call
 * goes through the same pipeline:
 *
 *   1. Open a store transaction
 *   2. Build the engine context (transaction, config, directory, logger)
 *   3. Run the operation (checked variants test permissions first)
 *   4. Log the outcome with its duration
 *
 * Expected failures (ArborError) propagate unchanged. Anything else is
 * logged, captured by the observability provider and rethrown.
 */

import {
  ArborError,
  Permission,
  toPermissionSet,
  type AclEngine,
  type AgentRef,
  type Folder,
  type FolderMember,
  type FolderStore,
  type IdentityDirectory,
  type Logger,
  type Requester,
} from "@arbor/contracts";
import { defaultConfig, type ArborConfig } from "./core/config/index.js";
import type { EngineContext } from "./core/context.js";
import { createLogger, logOperation } from "./core/logging/index.js";
import { captureException } from "./core/observability/index.js";
import { agentKeyFor } from "./core/agents/resolve.js";
import {
  allowedFolderIds,
  checkAllowed,
  copyAcl,
  effectivePermissions,
  formatAclText,
  requireAllowed,
  toAclSnapshot,
  writeAclEntry,
} from "./core/acl/resolver.js";
import { folderPath, loadRootFolder, requireFolder } from "./core/hierarchy/tree.js";
import {
  createSubFolder,
  lookupFolder,
  makeDirectory,
  removeDirectory,
} from "./core/hierarchy/folders.js";
import {
  filterMembers,
  memberAllowed,
  requireMemberAllowed,
  requireMemberSave,
} from "./core/members/index.js";

export interface AclEngineOptions {
  store: FolderStore;

  /** Resolves agent keys given as strings. Optional when callers pass objects. */
  directory?: IdentityDirectory | null;

  config?: ArborConfig;

  logger?: Logger;
}

export function createAclEngine(options: AclEngineOptions): AclEngine {
  const { store } = options;
  const config = options.config ?? defaultConfig();
  const directory = options.directory ?? null;
  const logger = options.logger ?? createLogger("acl-engine", config.logging.level);

  async function run<T>(operation: string, fn: (ctx: EngineContext) => Promise<T>): Promise<T> {
    const startTime = performance.now();

    try {
      const result = await store.transaction((tx) => fn({ tx, config, directory, logger }));
      logOperation(logger, operation, Math.round(performance.now() - startTime), true);
      return result;
    } catch (error) {
      const durationMs = Math.round(performance.now() - startTime);
      const errorMessage = error instanceof Error ? error.message : String(error);
      logOperation(logger, operation, durationMs, false, errorMessage);

      if (!(error instanceof ArborError)) {
        logger.error("Engine operation failed", {
          operation,
          store: store.name,
          error: errorMessage,
          stack: error instanceof Error ? error.stack : undefined,
        });
        if (error instanceof Error) {
          captureException(error, { operation, store: store.name });
        }
      }
      throw error;
    }
  }

  return {
    // -- Hierarchy -----------------------------------------------------------

    getRootFolder: () => run("getRootFolder", (ctx) => loadRootFolder(ctx)),

    getFolderNoCheck: (path, workingFolder) =>
      run("getFolderNoCheck", (ctx) => lookupFolder(ctx, path, workingFolder)),

    getFolder: (requester, path, workingFolder) =>
      run("getFolder", (ctx) => lookupFolder(ctx, path, workingFolder, { requester })),

    getFolderPath: (folder) =>
      run("getFolderPath", async (ctx) => folderPath(ctx, await requireFolder(ctx, folder))),

    listSubFolders: (folder) =>
      run("listSubFolders", async (ctx) => {
        const current = await requireFolder(ctx, folder);
        return ctx.tx.listChildren(current.id);
      }),

    mkdirNoCheck: (path, workingFolder) =>
      run("mkdirNoCheck", (ctx) => makeDirectory(ctx, path, workingFolder)),

    mkdir: (requester, path, workingFolder) =>
      run("mkdir", (ctx) => makeDirectory(ctx, path, workingFolder, { requester })),

    makeSubFolderNoCheck: (parent: Folder, name: string, admin?: AgentRef) =>
      run("makeSubFolderNoCheck", async (ctx) => {
        const current = await requireFolder(ctx, parent);
        const adminKey = admin === undefined ? null : await agentKeyFor(admin, ctx.directory);
        return createSubFolder(ctx, current, name, adminKey);
      }),

    rmdirNoCheck: (path, workingFolder) =>
      run("rmdirNoCheck", (ctx) => removeDirectory(ctx, path, workingFolder)),

    rmdir: (requester, path, workingFolder) =>
      run("rmdir", (ctx) => removeDirectory(ctx, path, workingFolder, { requester })),

    // -- ACL -----------------------------------------------------------------

    getAcl: (folder) =>
      run("getAcl", async (ctx) => {
        const current = await requireFolder(ctx, folder);
        return toAclSnapshot(await ctx.tx.getAclEntries(current.id));
      }),

    getAclText: (folder) =>
      run("getAclText", async (ctx) => {
        const current = await requireFolder(ctx, folder);
        return formatAclText(toAclSnapshot(await ctx.tx.getAclEntries(current.id)));
      }),

    isAllowed: (requester, action, folder) =>
      run("isAllowed", (ctx) => checkAllowed(ctx, requester, action, folder)),

    assertAllowed: (requester, action, folder) =>
      run("assertAllowed", (ctx) => requireAllowed(ctx, requester, action, folder)),

    getEffectivePermissions: (requester, folder) =>
      run("getEffectivePermissions", (ctx) => effectivePermissions(ctx, requester, folder)),

    setPermissionsNoCheck: (folder, agent, permissions) =>
      run("setPermissionsNoCheck", async (ctx) => {
        const set = toPermissionSet(permissions);
        const agentKey = await agentKeyFor(agent, ctx.directory);
        await writeAclEntry(ctx, folder, agentKey, set);
      }),

    setPermissions: (requester: Requester, folder, agent, permissions) =>
      run("setPermissions", async (ctx) => {
        const set = toPermissionSet(permissions);
        const agentKey = await agentKeyFor(agent, ctx.directory);
        const current = await requireFolder(ctx, folder);
        await requireAllowed(ctx, requester, Permission.MANAGE, current);
        await writeAclEntry(ctx, current, agentKey, set);
      }),

    clearAclNoCheck: (folder) =>
      run("clearAclNoCheck", async (ctx) => {
        const current = await requireFolder(ctx, folder);
        await ctx.tx.clearAcl(current.id);
      }),

    copyAclNoCheck: (target, source) =>
      run("copyAclNoCheck", async (ctx) => {
        const to = await requireFolder(ctx, target);
        const from = await requireFolder(ctx, source);
        await copyAcl(ctx, to, from);
      }),

    getAllowedFolderIds: (requester, action) =>
      run("getAllowedFolderIds", (ctx) => allowedFolderIds(ctx, requester, action)),

    // -- Folder members ------------------------------------------------------

    isMemberAllowed: (requester, member, action) =>
      run("isMemberAllowed", (ctx) => memberAllowed(ctx, requester, member, action)),

    assertMemberAllowed: (requester, member, action) =>
      run("assertMemberAllowed", (ctx) => requireMemberAllowed(ctx, requester, member, action)),

    assertMemberSaveAllowed: (requester, member) =>
      run("assertMemberSaveAllowed", (ctx) => requireMemberSave(ctx, requester, member)),

    assertMemberDeleteAllowed: (requester, member) =>
      run("assertMemberDeleteAllowed", (ctx) =>
        requireMemberAllowed(ctx, requester, member, Permission.DELETE)
      ),

    filterAllowedMembers: <T extends FolderMember>(
      members: readonly T[],
      requester: Requester,
      action: Permission = Permission.VIEW
    ) => run("filterAllowedMembers", (ctx) => filterMembers(ctx, members, requester, action)),

    close: () => store.close(),
  };
}

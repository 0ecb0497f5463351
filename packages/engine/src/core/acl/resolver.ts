/**
 * ACL Resolver
 *
 * Answers "may this requester perform this action on this folder?".
 *
 * Evaluation logic:
 *   1. Access control disabled in config → allowed
 *   2. Requester is a superuser → allowed
 *   3. Any agent key the requester resolves to has an entry granting
 *      the action → allowed
 *   4. Otherwise → denied
 *
 * There are no deny entries: the effective permission set is the union of
 * every matching entry, and a missing entry is the same as an empty one.
 */

import {
  PermissionDeniedError,
  PermissionSet,
  type AclSnapshot,
  type Folder,
  type Permission,
  type Requester,
} from "@arbor/contracts";
import type { EngineContext } from "../context.js";
import { hasValidName, requesterName, resolveAgentKeys } from "../agents/resolve.js";
import { folderPath, requireFolder } from "../hierarchy/tree.js";

/**
 * True when the requester skips ACL evaluation entirely. An identity with
 * a malformed name is never treated as a superuser.
 */
export function bypassesAcl(ctx: EngineContext, requester: Requester): boolean {
  if (!ctx.config.accessControl.enabled) return true;
  return hasValidName(requester) && requester.superuser;
}

/** Frozen agent → codes record, keys sorted */
export function toAclSnapshot(entries: ReadonlyMap<string, PermissionSet>): AclSnapshot {
  const snapshot: Record<string, string> = {};
  for (const key of [...entries.keys()].sort()) {
    const permissions = entries.get(key);
    if (permissions && !permissions.isEmpty()) {
      snapshot[key] = permissions.encode();
    }
  }
  return Object.freeze(snapshot);
}

/** One "  <agent> <codes>" line per entry */
export function formatAclText(snapshot: AclSnapshot): string {
  return Object.entries(snapshot)
    .map(([agent, codes]) => `  ${agent} ${codes}\n`)
    .join("");
}

export async function checkAllowed(
  ctx: EngineContext,
  requester: Requester,
  action: Permission,
  folder: Folder
): Promise<boolean> {
  if (bypassesAcl(ctx, requester)) {
    return true;
  }

  const entries = await ctx.tx.getAclEntries(folder.id);
  return resolveAgentKeys(requester).some((key) => entries.get(key)?.has(action) ?? false);
}

export async function effectivePermissions(
  ctx: EngineContext,
  requester: Requester,
  folder: Folder
): Promise<PermissionSet> {
  if (bypassesAcl(ctx, requester)) {
    return PermissionSet.ALL;
  }

  const entries = await ctx.tx.getAclEntries(folder.id);
  let merged = PermissionSet.NONE;
  for (const key of resolveAgentKeys(requester)) {
    const permissions = entries.get(key);
    if (permissions) {
      merged = merged.union(permissions);
    }
  }
  return merged;
}

/**
 * @throws PermissionDeniedError naming the requester, action and folder path
 */
export async function requireAllowed(
  ctx: EngineContext,
  requester: Requester,
  action: Permission,
  folder: Folder
): Promise<void> {
  if (await checkAllowed(ctx, requester, action, folder)) {
    return;
  }

  const path = await folderPath(ctx, folder);
  const name = requesterName(requester);
  ctx.logger.warn("Permission denied", { requester: name, action, folderPath: path });
  throw new PermissionDeniedError(name, action, path);
}

// ---------------------------------------------------------------------------
// Mutations (unchecked core; checked variants wrap these)
// ---------------------------------------------------------------------------

/** Sets one entry; an empty set removes the entry instead of storing "". */
export async function writeAclEntry(
  ctx: EngineContext,
  folder: Folder,
  agentKey: string,
  permissions: PermissionSet
): Promise<void> {
  const current = await requireFolder(ctx, folder);

  if (permissions.isEmpty()) {
    await ctx.tx.deleteAclEntry(current.id, agentKey);
  } else {
    await ctx.tx.putAclEntry(current.id, agentKey, permissions);
  }
}

/** Replaces target's ACL with a value copy of source's */
export async function copyAcl(ctx: EngineContext, target: Folder, source: Folder): Promise<void> {
  const entries = await ctx.tx.getAclEntries(source.id);
  await ctx.tx.clearAcl(target.id);
  for (const [agentKey, permissions] of entries) {
    if (!permissions.isEmpty()) {
      await ctx.tx.putAclEntry(target.id, agentKey, permissions);
    }
  }
}

export async function allowedFolderIds(
  ctx: EngineContext,
  requester: Requester,
  action: Permission
): Promise<Set<string>> {
  if (bypassesAcl(ctx, requester)) {
    return new Set(await ctx.tx.listFolderIds());
  }
  return new Set(await ctx.tx.findFolderIdsGranting(resolveAgentKeys(requester), action));
}

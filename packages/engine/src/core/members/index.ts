/**
 * Folder Members
 *
 * Permission guards for external objects that live in a folder. An object
 * declares membership through its `folderId`; its access is exactly the
 * access its folder grants.
 *
 *   saving a new object      → ADD on its folder
 *   saving an existing one   → CHANGE on its folder
 *   deleting                 → DELETE on its folder
 *   listing                  → VIEW (default) on each object's folder
 */

import {
  FolderNotFoundError,
  Permission,
  type Folder,
  type FolderMember,
  type Requester,
} from "@arbor/contracts";
import type { EngineContext } from "../context.js";
import { allowedFolderIds, bypassesAcl, checkAllowed, requireAllowed } from "../acl/resolver.js";

async function memberFolder(ctx: EngineContext, member: FolderMember): Promise<Folder> {
  const folder = await ctx.tx.findFolderById(member.folderId);
  if (!folder) {
    throw new FolderNotFoundError(member.folderId, "referenced by a folder member");
  }
  return folder;
}

/** A member whose folder no longer exists is never allowed. */
export async function memberAllowed(
  ctx: EngineContext,
  requester: Requester,
  member: FolderMember,
  action: Permission
): Promise<boolean> {
  const folder = await ctx.tx.findFolderById(member.folderId);
  if (!folder) {
    return false;
  }
  return checkAllowed(ctx, requester, action, folder);
}

export async function requireMemberAllowed(
  ctx: EngineContext,
  requester: Requester,
  member: FolderMember,
  action: Permission
): Promise<void> {
  const folder = await memberFolder(ctx, member);
  await requireAllowed(ctx, requester, action, folder);
}

export async function requireMemberSave(
  ctx: EngineContext,
  requester: Requester,
  member: FolderMember
): Promise<void> {
  const isNew = member.id === undefined || member.id === null;
  await requireMemberAllowed(ctx, requester, member, isNew ? Permission.ADD : Permission.CHANGE);
}

export async function filterMembers<T extends FolderMember>(
  ctx: EngineContext,
  members: readonly T[],
  requester: Requester,
  action: Permission
): Promise<T[]> {
  if (bypassesAcl(ctx, requester)) {
    return [...members];
  }
  const allowed = await allowedFolderIds(ctx, requester, action);
  return members.filter((m) => allowed.has(m.folderId));
}

/**
 * Folder Hierarchy Operations
 *
 * Path lookup, creation and removal. Each checked operation is a thin
 * wrapper that runs the resolver test and then delegates to the unchecked
 * core, all inside the caller's transaction.
 *
 * Removal cascades: a removed folder takes all of its descendants (and
 * their ACL entries) with it, so no folder stays stored while unreachable.
 */

import {
  FolderAlreadyExistsError,
  FolderNotFoundError,
  Permission,
  PermissionSet,
  type Folder,
  type Requester,
} from "@arbor/contracts";
import type { EngineContext } from "../context.js";
import { copyAcl, requireAllowed } from "../acl/resolver.js";
import { creatorKey } from "../agents/resolve.js";
import { formatFolderPath, parseFolderPath, splitTargetPath, validateFolderName } from "./path.js";
import { collectDescendantIds, folderPath, loadRootFolder } from "./tree.js";

/**
 * Walks from the root through `segments`.
 *
 * When `access` is given, the requester must hold LIST on every folder
 * descended from; the target itself is not checked.
 *
 * @throws FolderNotFoundError naming the first missing folder
 * @throws PermissionDeniedError if a folder on the way is not listable
 */
export async function descend(
  ctx: EngineContext,
  segments: readonly string[],
  path: string,
  access?: { requester: Requester }
): Promise<Folder> {
  let current = await loadRootFolder(ctx);

  for (let i = 0; i < segments.length; i++) {
    if (access) {
      await requireAllowed(ctx, access.requester, Permission.LIST, current);
    }

    const child = await ctx.tx.findChild(current.id, segments[i]);
    if (!child) {
      throw new FolderNotFoundError(
        formatFolderPath(segments.slice(0, i + 1)),
        `while resolving "${path}"`
      );
    }
    current = child;
  }

  return current;
}

export async function lookupFolder(
  ctx: EngineContext,
  path: string,
  workingFolder?: string,
  access?: { requester: Requester }
): Promise<Folder> {
  return descend(ctx, parseFolderPath(path, workingFolder), path, access);
}

/**
 * Creates `name` under `parent` with a copy of the parent's ACL. When
 * `adminKey` is given, that agent is additionally granted ALL.
 *
 * @throws FolderAlreadyExistsError if the parent already has a child named `name`
 */
export async function createSubFolder(
  ctx: EngineContext,
  parent: Folder,
  name: string,
  adminKey: string | null
): Promise<Folder> {
  const parentPath = await folderPath(ctx, parent);
  const path = parentPath === "/" ? `/${name}` : `${parentPath}/${name}`;
  validateFolderName(name, path);

  if (await ctx.tx.findChild(parent.id, name)) {
    throw new FolderAlreadyExistsError(path);
  }

  const folder = await ctx.tx.insertFolder({ name, parentId: parent.id });
  await copyAcl(ctx, folder, parent);
  if (adminKey !== null) {
    await ctx.tx.putAclEntry(folder.id, adminKey, PermissionSet.ALL);
  }

  ctx.logger.debug("Folder created", { path, folderId: folder.id });
  return folder;
}

export async function makeDirectory(
  ctx: EngineContext,
  path: string,
  workingFolder: string | undefined,
  access?: { requester: Requester }
): Promise<Folder> {
  const target = splitTargetPath(path, workingFolder);
  const parent = await descend(ctx, target.parent, path);

  if (!access) {
    return createSubFolder(ctx, parent, target.name, null);
  }

  await requireAllowed(ctx, access.requester, Permission.ADD, parent);
  return createSubFolder(ctx, parent, target.name, creatorKey(access.requester));
}

export async function removeDirectory(
  ctx: EngineContext,
  path: string,
  workingFolder: string | undefined,
  access?: { requester: Requester }
): Promise<void> {
  const target = splitTargetPath(path, workingFolder);
  const parent = await descend(ctx, target.parent, path);

  if (access) {
    await requireAllowed(ctx, access.requester, Permission.DELETE, parent);
  }

  const folder = await ctx.tx.findChild(parent.id, target.name);
  if (!folder) {
    throw new FolderNotFoundError(
      formatFolderPath([...target.parent, target.name]),
      `while resolving "${path}"`
    );
  }

  const descendants = await collectDescendantIds(ctx, folder.id);
  await ctx.tx.deleteFolders([...descendants.reverse(), folder.id]);

  ctx.logger.debug("Folder removed", {
    path: formatFolderPath([...target.parent, target.name]),
    removedCount: descendants.length + 1,
  });
}

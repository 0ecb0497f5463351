/**
 * Tree Navigation
 *
 * Store-backed primitives shared by the hierarchy and ACL modules:
 * root bootstrap, lookup by id, path derivation and descendant collection.
 */

import {
  ANY_USER_KEY,
  FolderNotFoundError,
  PermissionSet,
  type Folder,
} from "@arbor/contracts";
import type { EngineContext } from "../context.js";
import { formatFolderPath } from "./path.js";

/** ACL the root folder is created with */
export const ROOT_DEFAULT_ACL: ReadonlyMap<string, PermissionSet> = new Map([
  [ANY_USER_KEY, PermissionSet.READ],
]);

export async function loadRootFolder(ctx: EngineContext): Promise<Folder> {
  return ctx.tx.ensureRootFolder(ROOT_DEFAULT_ACL);
}

/**
 * Re-reads a folder by id so mutations never act on a removed folder.
 *
 * @throws FolderNotFoundError if the folder no longer exists
 */
export async function requireFolder(ctx: EngineContext, folder: Folder): Promise<Folder> {
  const current = await ctx.tx.findFolderById(folder.id);
  if (!current) {
    throw new FolderNotFoundError(folder.name === "" ? "/" : folder.name, `id ${folder.id}`);
  }
  return current;
}

/** Absolute path of a folder, built by walking parent references */
export async function folderPath(ctx: EngineContext, folder: Folder): Promise<string> {
  const names: string[] = [];
  let current: Folder | null = folder;

  while (current && current.parentId !== null) {
    names.unshift(current.name);
    current = await ctx.tx.findFolderById(current.parentId);
  }

  return formatFolderPath(names);
}

/**
 * Ids of every folder below `folderId`, breadth-first.
 * The folder itself is not included.
 */
export async function collectDescendantIds(
  ctx: EngineContext,
  folderId: string
): Promise<string[]> {
  const descendants: string[] = [];
  let currentLevel = [folderId];

  while (currentLevel.length > 0) {
    const nextLevel: string[] = [];
    for (const id of currentLevel) {
      const children = await ctx.tx.listChildren(id);
      nextLevel.push(...children.map((c) => c.id));
    }
    descendants.push(...nextLevel);
    currentLevel = nextLevel;
  }

  return descendants;
}

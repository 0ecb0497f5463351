/**
 * Folder Store Contract
 *
 * The persistence boundary. The engine performs every operation inside
 * `transaction()`, so a checked operation's permission test and its
 * mutation see one consistent state; implementations must make a
 * transaction atomic with respect to concurrent ones and discard all of
 * its writes when the callback rejects.
 */

import type { Folder } from "./folder.js";
import type { Permission, PermissionSet } from "./permission.js";

export interface NewFolder {
  name: string;
  parentId: string;
  notes?: string;
}

/** Operations available inside a store transaction */
export interface FolderStoreTransaction {
  /**
   * Returns the root folder, creating it with `defaultAcl` if it does not
   * exist yet. Must be safe against concurrent first calls.
   */
  ensureRootFolder(defaultAcl: ReadonlyMap<string, PermissionSet>): Promise<Folder>;

  findFolderById(id: string): Promise<Folder | null>;

  findChild(parentId: string, name: string): Promise<Folder | null>;

  /** Children of a folder, sorted by name */
  listChildren(parentId: string): Promise<Folder[]>;

  insertFolder(folder: NewFolder): Promise<Folder>;

  /** Deletes the folders and every ACL entry they own */
  deleteFolders(ids: readonly string[]): Promise<void>;

  getAclEntries(folderId: string): Promise<Map<string, PermissionSet>>;

  /** Upserts one entry. Callers never pass an empty set. */
  putAclEntry(folderId: string, agentKey: string, permissions: PermissionSet): Promise<void>;

  deleteAclEntry(folderId: string, agentKey: string): Promise<void>;

  clearAcl(folderId: string): Promise<void>;

  /** Ids of folders whose ACL grants `permission` to any of `agentKeys` */
  findFolderIdsGranting(agentKeys: readonly string[], permission: Permission): Promise<string[]>;

  listFolderIds(): Promise<string[]>;
}

export interface FolderStore {
  /** Human-readable driver name, for logs */
  readonly name: string;

  /** Runs `fn` atomically. Not reentrant: never call from inside `fn`. */
  transaction<T>(fn: (tx: FolderStoreTransaction) => Promise<T>): Promise<T>;

  /** Releases connections (no-op for in-process stores) */
  close(): Promise<void>;
}

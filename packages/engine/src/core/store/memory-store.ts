/**
 * In-Memory Folder Store
 *
 * A FolderStore held entirely in process memory. Used by tests and by
 * embedders that do not need durability.
 *
 * Transactions are serialized (whole-tree lock). A transaction reads the
 * committed state directly and copies it on its first write; the copy
 * replaces the committed state only when the callback resolves, so a
 * rejected transaction leaves nothing behind.
 */

import { randomUUID } from "node:crypto";
import {
  ROOT_FOLDER_ID,
  type Folder,
  type FolderStore,
  type FolderStoreTransaction,
  type NewFolder,
  type Permission,
  type PermissionSet,
} from "@arbor/contracts";

export interface MemoryState {
  folders: Map<string, Folder>;
  /** folderId → (agentKey → permissions) */
  acl: Map<string, Map<string, PermissionSet>>;
}

export function emptyMemoryState(): MemoryState {
  return { folders: new Map(), acl: new Map() };
}

function cloneState(state: MemoryState): MemoryState {
  const acl = new Map<string, Map<string, PermissionSet>>();
  for (const [folderId, entries] of state.acl) {
    acl.set(folderId, new Map(entries));
  }
  return { folders: new Map(state.folders), acl };
}

function byName(a: Folder, b: Folder): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

export class MemoryStoreTransaction implements FolderStoreTransaction {
  private state: MemoryState;
  private copied = false;

  constructor(committed: MemoryState) {
    this.state = committed;
  }

  /** The written state, or null if the transaction only read */
  changes(): MemoryState | null {
    return this.copied ? this.state : null;
  }

  private writable(): MemoryState {
    if (!this.copied) {
      this.state = cloneState(this.state);
      this.copied = true;
    }
    return this.state;
  }

  async ensureRootFolder(defaultAcl: ReadonlyMap<string, PermissionSet>): Promise<Folder> {
    const existing = this.state.folders.get(ROOT_FOLDER_ID);
    if (existing) return existing;

    const root: Folder = Object.freeze({ id: ROOT_FOLDER_ID, name: "", parentId: null, notes: "" });
    const state = this.writable();
    state.folders.set(root.id, root);
    state.acl.set(root.id, new Map(defaultAcl));
    return root;
  }

  async findFolderById(id: string): Promise<Folder | null> {
    return this.state.folders.get(id) ?? null;
  }

  async findChild(parentId: string, name: string): Promise<Folder | null> {
    for (const folder of this.state.folders.values()) {
      if (folder.parentId === parentId && folder.name === name) {
        return folder;
      }
    }
    return null;
  }

  async listChildren(parentId: string): Promise<Folder[]> {
    return [...this.state.folders.values()]
      .filter((f) => f.parentId === parentId)
      .sort(byName);
  }

  async insertFolder(input: NewFolder): Promise<Folder> {
    if (await this.findChild(input.parentId, input.name)) {
      throw new Error(`Duplicate folder name "${input.name}" under parent ${input.parentId}`);
    }
    const folder: Folder = Object.freeze({
      id: randomUUID(),
      name: input.name,
      parentId: input.parentId,
      notes: input.notes ?? "",
    });
    const state = this.writable();
    state.folders.set(folder.id, folder);
    state.acl.set(folder.id, new Map());
    return folder;
  }

  async deleteFolders(ids: readonly string[]): Promise<void> {
    if (ids.length === 0) return;
    const state = this.writable();
    for (const id of ids) {
      state.folders.delete(id);
      state.acl.delete(id);
    }
  }

  async getAclEntries(folderId: string): Promise<Map<string, PermissionSet>> {
    return new Map(this.state.acl.get(folderId) ?? []);
  }

  async putAclEntry(folderId: string, agentKey: string, permissions: PermissionSet): Promise<void> {
    if (!this.state.folders.has(folderId)) {
      throw new Error(`Cannot write ACL entry: folder ${folderId} does not exist`);
    }
    const state = this.writable();
    let entries = state.acl.get(folderId);
    if (!entries) {
      entries = new Map();
      state.acl.set(folderId, entries);
    }
    entries.set(agentKey, permissions);
  }

  async deleteAclEntry(folderId: string, agentKey: string): Promise<void> {
    if (!this.state.acl.get(folderId)?.has(agentKey)) return;
    this.writable().acl.get(folderId)?.delete(agentKey);
  }

  async clearAcl(folderId: string): Promise<void> {
    if (!this.state.acl.get(folderId)?.size) return;
    this.writable().acl.get(folderId)?.clear();
  }

  async findFolderIdsGranting(
    agentKeys: readonly string[],
    permission: Permission
  ): Promise<string[]> {
    const ids: string[] = [];
    for (const [folderId, entries] of this.state.acl) {
      if (agentKeys.some((key) => entries.get(key)?.has(permission) ?? false)) {
        ids.push(folderId);
      }
    }
    return ids;
  }

  async listFolderIds(): Promise<string[]> {
    return [...this.state.folders.keys()];
  }
}

export class MemoryFolderStore implements FolderStore {
  readonly name = "memory";

  private state: MemoryState = emptyMemoryState();
  private tail: Promise<void> = Promise.resolve();

  transaction<T>(fn: (tx: FolderStoreTransaction) => Promise<T>): Promise<T> {
    const run = this.tail.then(async () => {
      const tx = new MemoryStoreTransaction(this.state);
      const result = await fn(tx);
      this.state = tx.changes() ?? this.state;
      return result;
    });
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  async close(): Promise<void> {
    // nothing to release
  }
}

/**
 * PostgreSQL Folder Store
 *
 * FolderStore backed by the arbor_folders / arbor_acl_entries tables via
 * Drizzle ORM. Every engine operation runs in one serializable transaction,
 * so a permission check and the mutation it guards cannot interleave with
 * a concurrent change. A transaction that loses a serialization conflict
 * or a deadlock (SQLSTATE 40001 / 40P01) is run again from the start, up
 * to `maxAttempts` times in total.
 */

import { and, asc, eq, inArray, like } from "drizzle-orm";
import type { PgDatabase, PgTransactionConfig } from "drizzle-orm/pg-core";
import type { PostgresJsQueryResultHKT } from "drizzle-orm/postgres-js";
import {
  FolderIdSchema,
  PERMISSION_CODES,
  PermissionSet,
  ROOT_FOLDER_ID,
  type Folder,
  type FolderStore,
  type FolderStoreTransaction,
  type NewFolder,
  type Permission,
} from "@arbor/contracts";
import { aclEntries, folders, type FolderRow } from "../database/schema.js";
import { createLogger } from "../logging/index.js";

const logger = createLogger("postgres-store");

/** A Drizzle database or transaction handle */
export type Executor = PgDatabase<PostgresJsQueryResultHKT>;

/** The part of a Drizzle database the store opens transactions on */
export interface TransactionalDatabase {
  transaction<T>(fn: (tx: Executor) => Promise<T>, config?: PgTransactionConfig): Promise<T>;
}

export interface PostgresStoreOptions {
  /** Called by close(), e.g. to end the connection pool */
  onClose?: () => Promise<void>;

  /** Attempts per transaction, the first included (default 3) */
  maxAttempts?: number;
}

/** SQLSTATEs after which a transaction is safe to run again */
const RETRYABLE_SQLSTATES: ReadonlySet<string> = new Set(["40001", "40P01"]);

export function isRetryableTransactionError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string" &&
    RETRYABLE_SQLSTATES.has(error.code)
  );
}

/** Ids that are not UUIDs cannot match a row; the column type would reject them. */
function isFolderId(id: string): boolean {
  return FolderIdSchema.safeParse(id).success;
}

/** Maps a row to the frozen Folder value the engine works with */
export function toFolder(row: FolderRow): Folder {
  return Object.freeze({
    id: row.id,
    name: row.name,
    parentId: row.parentId,
    notes: row.notes,
  });
}

export class PostgresStoreTransaction implements FolderStoreTransaction {
  constructor(private readonly db: Executor) {}

  async ensureRootFolder(defaultAcl: ReadonlyMap<string, PermissionSet>): Promise<Folder> {
    const inserted = await this.db
      .insert(folders)
      .values({ id: ROOT_FOLDER_ID, name: "", parentId: null })
      .onConflictDoNothing()
      .returning();

    if (inserted.length > 0) {
      for (const [agentKey, permissions] of defaultAcl) {
        await this.putAclEntry(ROOT_FOLDER_ID, agentKey, permissions);
      }
    }

    const root = await this.findFolderById(ROOT_FOLDER_ID);
    if (!root) {
      throw new Error("Root folder could not be created");
    }
    return root;
  }

  async findFolderById(id: string): Promise<Folder | null> {
    if (!isFolderId(id)) return null;
    const [row] = await this.db.select().from(folders).where(eq(folders.id, id)).limit(1);
    return row ? toFolder(row) : null;
  }

  async findChild(parentId: string, name: string): Promise<Folder | null> {
    if (!isFolderId(parentId)) return null;
    const [row] = await this.db
      .select()
      .from(folders)
      .where(and(eq(folders.parentId, parentId), eq(folders.name, name)))
      .limit(1);
    return row ? toFolder(row) : null;
  }

  async listChildren(parentId: string): Promise<Folder[]> {
    if (!isFolderId(parentId)) return [];
    const rows = await this.db
      .select()
      .from(folders)
      .where(eq(folders.parentId, parentId))
      .orderBy(asc(folders.name));
    return rows.map(toFolder);
  }

  async insertFolder(input: NewFolder): Promise<Folder> {
    const [row] = await this.db
      .insert(folders)
      .values({ name: input.name, parentId: input.parentId, notes: input.notes ?? "" })
      .returning();
    if (!row) {
      throw new Error(`Insert of folder "${input.name}" returned no row`);
    }
    return toFolder(row);
  }

  async deleteFolders(ids: readonly string[]): Promise<void> {
    if (ids.length === 0) return;
    await this.db.delete(aclEntries).where(inArray(aclEntries.folderId, [...ids]));
    await this.db.delete(folders).where(inArray(folders.id, [...ids]));
  }

  async getAclEntries(folderId: string): Promise<Map<string, PermissionSet>> {
    if (!isFolderId(folderId)) return new Map();
    const rows = await this.db
      .select()
      .from(aclEntries)
      .where(eq(aclEntries.folderId, folderId));
    return new Map(rows.map((r) => [r.agentKey, PermissionSet.decode(r.permissions)]));
  }

  async putAclEntry(folderId: string, agentKey: string, permissions: PermissionSet): Promise<void> {
    const codes = permissions.encode();
    await this.db
      .insert(aclEntries)
      .values({ folderId, agentKey, permissions: codes })
      .onConflictDoUpdate({
        target: [aclEntries.folderId, aclEntries.agentKey],
        set: { permissions: codes },
      });
  }

  async deleteAclEntry(folderId: string, agentKey: string): Promise<void> {
    await this.db
      .delete(aclEntries)
      .where(and(eq(aclEntries.folderId, folderId), eq(aclEntries.agentKey, agentKey)));
  }

  async clearAcl(folderId: string): Promise<void> {
    await this.db.delete(aclEntries).where(eq(aclEntries.folderId, folderId));
  }

  async findFolderIdsGranting(
    agentKeys: readonly string[],
    permission: Permission
  ): Promise<string[]> {
    if (agentKeys.length === 0) return [];
    const rows = await this.db
      .selectDistinct({ folderId: aclEntries.folderId })
      .from(aclEntries)
      .where(
        and(
          inArray(aclEntries.agentKey, [...agentKeys]),
          like(aclEntries.permissions, `%${PERMISSION_CODES[permission]}%`)
        )
      );
    return rows.map((r) => r.folderId);
  }

  async listFolderIds(): Promise<string[]> {
    const rows = await this.db.select({ id: folders.id }).from(folders);
    return rows.map((r) => r.id);
  }
}

export class PostgresFolderStore implements FolderStore {
  readonly name = "postgres";

  private readonly onClose: () => Promise<void>;
  private readonly maxAttempts: number;

  constructor(
    private readonly db: TransactionalDatabase,
    options: PostgresStoreOptions = {}
  ) {
    this.onClose = options.onClose ?? (async () => {});
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
  }

  async transaction<T>(fn: (tx: FolderStoreTransaction) => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.db.transaction((tx) => fn(new PostgresStoreTransaction(tx)), {
          isolationLevel: "serializable",
        });
      } catch (error) {
        if (attempt >= this.maxAttempts || !isRetryableTransactionError(error)) {
          throw error;
        }
        logger.info("Retrying transaction after a serialization failure", {
          attempt,
          maxAttempts: this.maxAttempts,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  async close(): Promise<void> {
    await this.onClose();
  }
}

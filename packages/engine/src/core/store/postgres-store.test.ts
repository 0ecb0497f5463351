/**
 * PostgreSQL Folder Store — Test Suite
 *
 * Runs the store against a fake Drizzle handle that records each query
 * builder chain and answers with queued rows. No database is contacted.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { SQL } from "drizzle-orm";
import { PgDialect, type PgTransactionConfig } from "drizzle-orm/pg-core";
import { Permission, PermissionSet, ROOT_FOLDER_ID } from "@arbor/contracts";
import { aclEntries, folders, type FolderRow } from "../database/schema.js";
import {
  PostgresFolderStore,
  PostgresStoreTransaction,
  isRetryableTransactionError,
  type Executor,
  type TransactionalDatabase,
} from "./postgres-store.js";

// ---------------------------------------------------------------------------
// Fake Drizzle handle
// ---------------------------------------------------------------------------

interface BuilderCall {
  method: string;
  args: unknown[];
}

interface Statement {
  kind: "select" | "selectDistinct" | "insert" | "delete";
  calls: BuilderCall[];
}

class FakeQuery implements PromiseLike<unknown[]> {
  constructor(
    private readonly statement: Statement,
    private readonly rows: unknown[]
  ) {}

  private record(method: string, args: unknown[]): this {
    this.statement.calls.push({ method, args });
    return this;
  }

  from(...args: unknown[]) { return this.record("from", args); }
  where(...args: unknown[]) { return this.record("where", args); }
  limit(...args: unknown[]) { return this.record("limit", args); }
  orderBy(...args: unknown[]) { return this.record("orderBy", args); }
  values(...args: unknown[]) { return this.record("values", args); }
  onConflictDoNothing(...args: unknown[]) { return this.record("onConflictDoNothing", args); }
  onConflictDoUpdate(...args: unknown[]) { return this.record("onConflictDoUpdate", args); }
  returning(...args: unknown[]) { return this.record("returning", args); }

  then<R1 = unknown[], R2 = never>(
    onFulfilled?: ((value: unknown[]) => R1 | PromiseLike<R1>) | null,
    onRejected?: ((reason: unknown) => R2 | PromiseLike<R2>) | null
  ): PromiseLike<R1 | R2> {
    return Promise.resolve(this.rows).then(onFulfilled, onRejected);
  }
}

class FakeExecutor {
  readonly statements: Statement[] = [];
  private readonly queued: unknown[][] = [];

  /** Queues the rows returned by the next statements, in order */
  respond(...results: unknown[][]): void {
    this.queued.push(...results);
  }

  select(...args: unknown[]) { return this.start("select", args); }
  selectDistinct(...args: unknown[]) { return this.start("selectDistinct", args); }
  insert(...args: unknown[]) { return this.start("insert", args); }
  delete(...args: unknown[]) { return this.start("delete", args); }

  call(statement: number, method: string): unknown[] | undefined {
    return this.statements[statement]?.calls.find((c) => c.method === method)?.args;
  }

  private start(kind: Statement["kind"], args: unknown[]): FakeQuery {
    const statement: Statement = { kind, calls: [{ method: kind, args }] };
    this.statements.push(statement);
    return new FakeQuery(statement, this.queued.shift() ?? []);
  }
}

function transactionOn(fake: FakeExecutor): PostgresStoreTransaction {
  return new PostgresStoreTransaction(fake as unknown as Executor);
}

function folderRow(overrides: Partial<FolderRow> = {}): FolderRow {
  return {
    id: ROOT_FOLDER_ID,
    name: "",
    parentId: null,
    notes: "",
    createdAt: new Date("2026-01-01T00:00:00Z"),
    ...overrides,
  };
}

const FOLDER_ID = "6f1c2a3b-4d5e-4f60-8a7b-9c0d1e2f3a4b";

// ---------------------------------------------------------------------------
// PostgresStoreTransaction
// ---------------------------------------------------------------------------

describe("PostgresStoreTransaction", () => {
  let fake: FakeExecutor;
  let tx: PostgresStoreTransaction;

  beforeEach(() => {
    fake = new FakeExecutor();
    tx = transactionOn(fake);
  });

  describe("ensureRootFolder", () => {
    const defaultAcl = new Map([
      ["group:anyuser", PermissionSet.READ],
      ["group:admins", PermissionSet.ALL],
    ]);

    it("seeds the default ACL when the root row is inserted", async () => {
      fake.respond([folderRow()], [], [], [folderRow()]);

      const root = await tx.ensureRootFolder(defaultAcl);

      expect(root).toEqual({ id: ROOT_FOLDER_ID, name: "", parentId: null, notes: "" });
      expect(fake.statements.map((s) => s.kind)).toEqual(["insert", "insert", "insert", "select"]);
      expect(fake.call(0, "insert")).toEqual([folders]);
      expect(fake.call(0, "onConflictDoNothing")).toEqual([]);
      expect(fake.call(1, "insert")).toEqual([aclEntries]);
      expect(fake.call(1, "values")).toEqual([
        { folderId: ROOT_FOLDER_ID, agentKey: "group:anyuser", permissions: "vl" },
      ]);
      expect(fake.call(2, "values")).toEqual([
        { folderId: ROOT_FOLDER_ID, agentKey: "group:admins", permissions: "vladcm" },
      ]);
    });

    it("leaves the ACL alone when the root already exists", async () => {
      fake.respond([], [folderRow()]);

      await tx.ensureRootFolder(defaultAcl);

      expect(fake.statements.map((s) => s.kind)).toEqual(["insert", "select"]);
    });

    it("throws when the root cannot be read back", async () => {
      fake.respond([], []);

      await expect(tx.ensureRootFolder(defaultAcl)).rejects.toThrow(
        "Root folder could not be created"
      );
    });
  });

  describe("putAclEntry", () => {
    it("upserts on the folder and agent key", async () => {
      await tx.putAclEntry(FOLDER_ID, "alice", PermissionSet.decode("alv"));

      expect(fake.call(0, "insert")).toEqual([aclEntries]);
      expect(fake.call(0, "values")).toEqual([
        { folderId: FOLDER_ID, agentKey: "alice", permissions: "vla" },
      ]);
      expect(fake.call(0, "onConflictDoUpdate")).toEqual([
        { target: [aclEntries.folderId, aclEntries.agentKey], set: { permissions: "vla" } },
      ]);
    });
  });

  describe("deleteFolders", () => {
    it("deletes ACL entries before the folders", async () => {
      await tx.deleteFolders([FOLDER_ID]);

      expect(fake.statements.map((s) => s.kind)).toEqual(["delete", "delete"]);
      expect(fake.call(0, "delete")).toEqual([aclEntries]);
      expect(fake.call(1, "delete")).toEqual([folders]);
    });

    it("issues nothing for an empty id list", async () => {
      await tx.deleteFolders([]);

      expect(fake.statements).toEqual([]);
    });
  });

  describe("findFolderIdsGranting", () => {
    it("matches the permission letter with LIKE over the given agent keys", async () => {
      fake.respond([{ folderId: FOLDER_ID }, { folderId: ROOT_FOLDER_ID }]);

      const ids = await tx.findFolderIdsGranting(["alice", "group:anyuser"], Permission.ADD);

      expect(ids).toEqual([FOLDER_ID, ROOT_FOLDER_ID]);
      expect(fake.statements[0]?.kind).toBe("selectDistinct");

      const condition = fake.call(0, "where")?.[0];
      expect(condition).toBeInstanceOf(SQL);
      if (!(condition instanceof SQL)) return;

      const query = new PgDialect().sqlToQuery(condition);
      expect(query.params).toEqual(["alice", "group:anyuser", "%a%"]);
      expect(query.sql).toMatch(/"permissions" like \$3/);
    });

    it("returns no ids for no agent keys without querying", async () => {
      expect(await tx.findFolderIdsGranting([], Permission.VIEW)).toEqual([]);
      expect(fake.statements).toEqual([]);
    });
  });

  describe("folder id guard", () => {
    it("finds no folder for an id that is not a UUID", async () => {
      expect(await tx.findFolderById("not-a-uuid")).toBeNull();
      expect(await tx.findChild("42", "docs")).toBeNull();
      expect(await tx.listChildren("42")).toEqual([]);
      expect((await tx.getAclEntries("42")).size).toBe(0);
      expect(fake.statements).toEqual([]);
    });

    it("queries for a UUID", async () => {
      fake.respond([folderRow({ id: FOLDER_ID, name: "docs", parentId: ROOT_FOLDER_ID })]);

      const folder = await tx.findFolderById(FOLDER_ID);

      expect(folder?.name).toBe("docs");
      expect(fake.call(0, "limit")).toEqual([1]);
    });
  });

  it("decodes stored codes into permission sets", async () => {
    fake.respond([{ folderId: FOLDER_ID, agentKey: "alice", permissions: "vl" }]);

    const entries = await tx.getAclEntries(FOLDER_ID);

    expect(entries.get("alice")?.encode()).toBe("vl");
  });
});

// ---------------------------------------------------------------------------
// PostgresFolderStore.transaction
// ---------------------------------------------------------------------------

class FakeDatabase implements TransactionalDatabase {
  readonly configs: Array<PgTransactionConfig | undefined> = [];
  private readonly failures: unknown[] = [];

  /** Makes the next transactions throw these errors, one each */
  failWith(...errors: unknown[]): void {
    this.failures.push(...errors);
  }

  async transaction<T>(
    fn: (tx: Executor) => Promise<T>,
    config?: PgTransactionConfig
  ): Promise<T> {
    this.configs.push(config);
    const result = await fn(new FakeExecutor() as unknown as Executor);
    const failure = this.failures.shift();
    if (failure !== undefined) throw failure;
    return result;
  }
}

function sqlError(code: string): Error & { code: string } {
  return Object.assign(new Error(`SQLSTATE ${code}`), { code });
}

describe("PostgresFolderStore.transaction", () => {
  let db: FakeDatabase;
  let runs: number;
  const work = async () => {
    runs++;
    return "done";
  };

  beforeEach(() => {
    db = new FakeDatabase();
    runs = 0;
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  it("runs at serializable isolation", async () => {
    const store = new PostgresFolderStore(db);

    expect(await store.transaction(work)).toBe("done");
    expect(db.configs).toEqual([{ isolationLevel: "serializable" }]);
  });

  it("runs again after a serialization failure", async () => {
    db.failWith(sqlError("40001"));
    const store = new PostgresFolderStore(db);

    expect(await store.transaction(work)).toBe("done");
    expect(runs).toBe(2);
    expect(db.configs).toHaveLength(2);
  });

  it("runs again after a deadlock", async () => {
    db.failWith(sqlError("40P01"));
    const store = new PostgresFolderStore(db);

    expect(await store.transaction(work)).toBe("done");
    expect(runs).toBe(2);
  });

  it("gives up after maxAttempts", async () => {
    db.failWith(sqlError("40001"), sqlError("40001"), sqlError("40001"));
    const store = new PostgresFolderStore(db, { maxAttempts: 2 });

    await expect(store.transaction(work)).rejects.toThrow("SQLSTATE 40001");
    expect(runs).toBe(2);
  });

  it("does not retry other errors", async () => {
    db.failWith(sqlError("23505"));
    const store = new PostgresFolderStore(db);

    await expect(store.transaction(work)).rejects.toThrow("SQLSTATE 23505");
    expect(runs).toBe(1);
  });

  it("calls onClose on close", async () => {
    const onClose = vi.fn().mockResolvedValue(undefined);
    const store = new PostgresFolderStore(db, { onClose });

    await store.close();

    expect(onClose).toHaveBeenCalledOnce();
  });
});

describe("isRetryableTransactionError", () => {
  it("accepts serialization failures and deadlocks only", () => {
    expect(isRetryableTransactionError(sqlError("40001"))).toBe(true);
    expect(isRetryableTransactionError({ code: "40P01" })).toBe(true);
    expect(isRetryableTransactionError(sqlError("22P02"))).toBe(false);
    expect(isRetryableTransactionError(new Error("connection reset"))).toBe(false);
    expect(isRetryableTransactionError(null)).toBe(false);
  });
});

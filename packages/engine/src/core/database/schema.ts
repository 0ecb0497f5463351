/**
 * Table Schemas
 *
 * Drizzle definitions of the two engine tables. The DDL that creates them
 * lives in migrate.ts; keep both in step.
 *
 *   arbor_folders      one row per folder; parent_id is null for the root
 *   arbor_acl_entries  one row per (folder, agent key); permissions hold
 *                      canonical codes ("vladcm"), never ""
 */

import {
  pgTable,
  primaryKey,
  text,
  timestamp,
  unique,
  uuid,
  varchar,
} from "drizzle-orm/pg-core";

export const FOLDERS_TABLE = "arbor_folders";
export const ACL_ENTRIES_TABLE = "arbor_acl_entries";

export const folders = pgTable(
  FOLDERS_TABLE,
  {
    id: uuid("id").primaryKey().defaultRandom(),
    name: varchar("name", { length: 32 }).notNull(),
    parentId: uuid("parent_id"),
    notes: text("notes").notNull().default(""),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (t) => ({
    siblingName: unique("arbor_folders_sibling_name").on(t.parentId, t.name),
  })
);

export const aclEntries = pgTable(
  ACL_ENTRIES_TABLE,
  {
    folderId: uuid("folder_id").notNull(),
    agentKey: varchar("agent_key", { length: 160 }).notNull(),
    permissions: varchar("permissions", { length: 6 }).notNull(),
  },
  (t) => ({
    pk: primaryKey({ columns: [t.folderId, t.agentKey] }),
  })
);

export type FolderRow = typeof folders.$inferSelect;
export type AclEntryRow = typeof aclEntries.$inferSelect;

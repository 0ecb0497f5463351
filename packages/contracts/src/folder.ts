/**
 * Folder Definitions
 *
 * A folder is one node of the tree. Its ACL is stored separately and read
 * through the engine, so a Folder value never goes stale with respect to
 * permissions.
 */

import { z } from "zod";

/** Well-known id of the root folder. The store creates it lazily. */
export const ROOT_FOLDER_ID = "00000000-0000-0000-0000-000000000000";

/** Folder ids are UUIDs; the root uses the nil UUID */
export const FolderIdSchema = z
  .string()
  .regex(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i, "Folder ids are UUIDs");

/** Folder names are capped at this many characters */
export const MAX_FOLDER_NAME_LENGTH = 32;

export interface Folder {
  readonly id: string;

  /** Unique among siblings; "" for the root */
  readonly name: string;

  /** null only for the root */
  readonly parentId: string | null;

  /** Free-form description */
  readonly notes: string;
}

/**
 * Read-only view of a folder's ACL: agent key → canonical permission codes,
 * with keys in sorted order.
 */
export type AclSnapshot = Readonly<Record<string, string>>;

/**
 * An external object that lives in exactly one folder.
 * Objects without an id are treated as not yet saved.
 */
export interface FolderMember {
  id?: string | null;
  folderId: string;
}

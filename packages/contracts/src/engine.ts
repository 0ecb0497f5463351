/**
 * Engine Contract
 *
 * The public surface of the access-control engine. Most mutations come in
 * two forms: a "NoCheck" form for trusted callers, and a checked form that
 * takes the requester first and throws PermissionDeniedError, without
 * side effects, when the requester lacks the required permission.
 *
 * Paths are slash-delimited from the root ("/projects/alpha"); a relative
 * path is resolved against `workingFolder` (default "/").
 */

import type { Agent, Requester } from "./identity.js";
import type { AclSnapshot, Folder, FolderMember } from "./folder.js";
import type { Permission, PermissionSet } from "./permission.js";

/** An agent object or its key ("alice", "group:editors") */
export type AgentRef = Agent | string;

export interface AclEngine {
  // -- Hierarchy -------------------------------------------------------------

  /** Returns the root folder, creating it on first access. */
  getRootFolder(): Promise<Folder>;

  getFolderNoCheck(path: string, workingFolder?: string): Promise<Folder>;

  /** Like getFolderNoCheck, but every folder descended from must be listable. */
  getFolder(requester: Requester, path: string, workingFolder?: string): Promise<Folder>;

  /** Absolute path of a folder, derived by walking its parents */
  getFolderPath(folder: Folder): Promise<string>;

  listSubFolders(folder: Folder): Promise<Folder[]>;

  /** Creates a folder whose ACL starts as a copy of its parent's. */
  mkdirNoCheck(path: string, workingFolder?: string): Promise<Folder>;

  /** Requires ADD on the parent; the requester also gets ALL on the new folder. */
  mkdir(requester: Requester, path: string, workingFolder?: string): Promise<Folder>;

  /** Folder-relative creation; `admin`, when given, gets ALL on the new folder. */
  makeSubFolderNoCheck(parent: Folder, name: string, admin?: AgentRef): Promise<Folder>;

  /** Removes a folder and all of its descendants. */
  rmdirNoCheck(path: string, workingFolder?: string): Promise<void>;

  /** Requires DELETE on the parent of the target. */
  rmdir(requester: Requester, path: string, workingFolder?: string): Promise<void>;

  // -- ACL -------------------------------------------------------------------

  getAcl(folder: Folder): Promise<AclSnapshot>;

  /** One "  <agent> <codes>" line per entry, sorted by agent */
  getAclText(folder: Folder): Promise<string>;

  isAllowed(requester: Requester, action: Permission, folder: Folder): Promise<boolean>;

  assertAllowed(requester: Requester, action: Permission, folder: Folder): Promise<void>;

  /** Union of every permission set that applies to the requester */
  getEffectivePermissions(requester: Requester, folder: Folder): Promise<PermissionSet>;

  /** Passing an empty set removes the agent's entry. */
  setPermissionsNoCheck(
    folder: Folder,
    agent: AgentRef,
    permissions: PermissionSet | string
  ): Promise<void>;

  /** Requires MANAGE on the folder. */
  setPermissions(
    requester: Requester,
    folder: Folder,
    agent: AgentRef,
    permissions: PermissionSet | string
  ): Promise<void>;

  clearAclNoCheck(folder: Folder): Promise<void>;

  /** Replaces `target`'s ACL with a copy of `source`'s. */
  copyAclNoCheck(target: Folder, source: Folder): Promise<void>;

  /** Ids of every folder on which the requester holds `action` */
  getAllowedFolderIds(requester: Requester, action: Permission): Promise<Set<string>>;

  // -- Folder members --------------------------------------------------------

  isMemberAllowed(requester: Requester, member: FolderMember, action: Permission): Promise<boolean>;

  assertMemberAllowed(requester: Requester, member: FolderMember, action: Permission): Promise<void>;

  /** ADD on the member's folder for a new member, CHANGE for an existing one */
  assertMemberSaveAllowed(requester: Requester, member: FolderMember): Promise<void>;

  assertMemberDeleteAllowed(requester: Requester, member: FolderMember): Promise<void>;

  /** Keeps the members whose folder grants `action` (default VIEW). */
  filterAllowedMembers<T extends FolderMember>(
    members: readonly T[],
    requester: Requester,
    action?: Permission
  ): Promise<T[]>;

  /** Releases the underlying store. */
  close(): Promise<void>;
}

/**
 * @arbor/contracts
 *
 * Public API: the shared boundary between the engine and the systems that
 * embed it (identity stores, persistence drivers, request adapters).
 */

// Permissions
export type { PermissionCode, PermissionPresetName } from "./permission.js";
export {
  PERMISSIONS,
  PERMISSION_CODES,
  PERMISSION_PRESETS,
  Permission,
  PermissionSet,
  PermissionCodeSchema,
  isPermission,
  toPermissionSet,
} from "./permission.js";

// Agent keys
export type { AgentKind, ParsedAgentKey } from "./agent.js";
export {
  GROUP_KEY_PREFIX,
  ANY_USER_GROUP,
  AUTH_USER_GROUP,
  ANY_USER_KEY,
  AUTH_USER_KEY,
  RESERVED_GROUP_NAMES,
  AgentNameSchema,
  AgentKeySchema,
  identityKey,
  groupKey,
  parseAgentKey,
  isSpecialGroupKey,
  isReservedGroupName,
  assertGroupNameAllowed,
} from "./agent.js";

// Identities
export type {
  Identity,
  Group,
  Agent,
  Requester,
  IdentityInput,
  IdentityDirectory,
} from "./identity.js";
export { IdentityInputSchema } from "./identity.js";

// Folders
export type { Folder, AclSnapshot, FolderMember } from "./folder.js";
export { ROOT_FOLDER_ID, MAX_FOLDER_NAME_LENGTH, FolderIdSchema } from "./folder.js";

// Persistence
export type { FolderStore, FolderStoreTransaction, NewFolder } from "./store.js";

// Engine
export type { AclEngine, AgentRef } from "./engine.js";

// Logging
export type { Logger, LogLevel } from "./context.js";
export { LOG_LEVELS } from "./context.js";

// Errors
export type { ArborErrorCode } from "./errors.js";
export {
  ArborError,
  FolderNotFoundError,
  FolderAlreadyExistsError,
  PermissionDeniedError,
  InvalidPermissionCodeError,
  ReservedAgentNameError,
  InvalidFolderPathError,
  AgentNotFoundError,
} from "./errors.js";

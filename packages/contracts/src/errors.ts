/**
 * Error Definitions
 *
 * Every failure the engine reports is an ArborError. The `code` field lets
 * adapters map errors to transport-level responses without instanceof
 * chains:
 *   folder_not_found        → 404
 *   folder_already_exists   → 409
 *   permission_denied       → 403
 *   invalid_permission_code → 400
 *   reserved_agent_name     → 400
 *   invalid_folder_path     → 400
 *   agent_not_found         → 404
 */

export type ArborErrorCode =
  | "folder_not_found"
  | "folder_already_exists"
  | "permission_denied"
  | "invalid_permission_code"
  | "reserved_agent_name"
  | "invalid_folder_path"
  | "agent_not_found";

/** Base class for all engine errors */
export class ArborError extends Error {
  public readonly code: ArborErrorCode;

  constructor(code: ArborErrorCode, message: string) {
    super(message);
    this.name = "ArborError";
    this.code = code;
  }
}

/** A path segment or target folder does not resolve. */
export class FolderNotFoundError extends ArborError {
  public readonly path: string;

  constructor(path: string, detail?: string) {
    super(
      "folder_not_found",
      detail ? `Folder "${path}" does not exist (${detail})` : `Folder "${path}" does not exist`
    );
    this.name = "FolderNotFoundError";
    this.path = path;
  }
}

/** mkdir target collides with an existing sibling. */
export class FolderAlreadyExistsError extends ArborError {
  public readonly path: string;

  constructor(path: string) {
    super("folder_already_exists", `Folder "${path}" already exists`);
    this.name = "FolderAlreadyExistsError";
    this.path = path;
  }
}

/**
 * A checked operation's permission test failed.
 * Carries the acting identity, the required action and the folder path
 * so callers can render a diagnostic.
 */
export class PermissionDeniedError extends ArborError {
  public readonly identityName: string;
  public readonly action: string;
  public readonly folderPath: string;

  constructor(identityName: string, action: string, folderPath: string) {
    super(
      "permission_denied",
      `Permission denied: user "${identityName}" does not have ${action} permission for folder "${folderPath}"`
    );
    this.name = "PermissionDeniedError";
    this.identityName = identityName;
    this.action = action;
    this.folderPath = folderPath;
  }
}

/** A permission-set string contains characters outside the code alphabet. */
export class InvalidPermissionCodeError extends ArborError {
  public readonly invalidCodes: string[];

  constructor(text: string, invalidCodes: string[]) {
    super(
      "invalid_permission_code",
      `Invalid permission string "${text}": unknown code(s) ${invalidCodes.map((c) => `"${c}"`).join(", ")}`
    );
    this.name = "InvalidPermissionCodeError";
    this.invalidCodes = invalidCodes;
  }
}

/** Attempt to create a group using a special-group name. */
export class ReservedAgentNameError extends ArborError {
  public readonly agentName: string;

  constructor(agentName: string) {
    super("reserved_agent_name", `Group name "${agentName}" is reserved`);
    this.name = "ReservedAgentNameError";
    this.agentName = agentName;
  }
}

/** A path or folder name that cannot name a creatable/removable folder. */
export class InvalidFolderPathError extends ArborError {
  public readonly path: string;

  constructor(path: string, reason: string) {
    super("invalid_folder_path", `Invalid folder path "${path}": ${reason}`);
    this.name = "InvalidFolderPathError";
    this.path = path;
  }
}

/** An agent key names an identity or group the directory does not know. */
export class AgentNotFoundError extends ArborError {
  public readonly agentKey: string;

  constructor(agentKey: string) {
    super("agent_not_found", `Agent "${agentKey}" does not exist`);
    this.name = "AgentNotFoundError";
    this.agentKey = agentKey;
  }
}

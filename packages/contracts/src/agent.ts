/**
 * Agent Keys
 *
 * An ACL maps agent keys to permission sets. An identity's key is its bare
 * name; a group's key is "group:" + the group name. Two special groups
 * exist without being stored anywhere: "group:anyuser" matches every
 * requester (guests included) and "group:authuser" matches every active,
 * logged-in identity. Their membership is computed per check.
 */

import { z } from "zod";
import { ReservedAgentNameError } from "./errors.js";

export const GROUP_KEY_PREFIX = "group:";

export const ANY_USER_GROUP = "anyuser";
export const AUTH_USER_GROUP = "authuser";

export const ANY_USER_KEY = `${GROUP_KEY_PREFIX}${ANY_USER_GROUP}`;
export const AUTH_USER_KEY = `${GROUP_KEY_PREFIX}${AUTH_USER_GROUP}`;

/** Group names no persisted group may use */
export const RESERVED_GROUP_NAMES: readonly string[] = [ANY_USER_GROUP, AUTH_USER_GROUP];

/** Identity and group names: letters, digits and @ . + - _ */
export const AgentNameSchema = z
  .string()
  .min(1, "Agent names cannot be empty")
  .max(150, "Agent names are limited to 150 characters")
  .regex(/^[A-Za-z0-9@.+_-]+$/, "Agent names may only contain letters, digits and @ . + - _");

/** An identity name, or "group:" followed by a group name */
export const AgentKeySchema = z
  .string()
  .refine(
    (key) => AgentNameSchema.safeParse(parseAgentKey(key).name).success,
    "Agent keys are an identity name or \"group:\" followed by a group name"
  );

export type AgentKind = "identity" | "group";

export interface ParsedAgentKey {
  kind: AgentKind;
  name: string;
}

export function identityKey(name: string): string {
  return name;
}

export function groupKey(name: string): string {
  return `${GROUP_KEY_PREFIX}${name}`;
}

export function parseAgentKey(key: string): ParsedAgentKey {
  if (key.startsWith(GROUP_KEY_PREFIX)) {
    return { kind: "group", name: key.slice(GROUP_KEY_PREFIX.length) };
  }
  return { kind: "identity", name: key };
}

export function isSpecialGroupKey(key: string): boolean {
  return key === ANY_USER_KEY || key === AUTH_USER_KEY;
}

export function isReservedGroupName(name: string): boolean {
  return RESERVED_GROUP_NAMES.includes(name);
}

/**
 * Throws ReservedAgentNameError if a group store is about to create a
 * group that would shadow a special group.
 */
export function assertGroupNameAllowed(name: string): void {
  if (isReservedGroupName(name)) {
    throw new ReservedAgentNameError(name);
  }
}

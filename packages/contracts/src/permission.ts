/**
 * Permission Definitions
 *
 * The six folder permissions and the immutable PermissionSet value built
 * from them. A set's canonical string form is the one-letter codes of its
 * members in enumeration order ("vladcm"); that string is what the
 * persistence layer stores.
 */

import { z } from "zod";
import { InvalidPermissionCodeError } from "./errors.js";

/** All permissions, in canonical serialization order. */
export const PERMISSIONS = ["view", "list", "add", "delete", "change", "manage"] as const;

export type Permission = (typeof PERMISSIONS)[number];

/** Named constants, e.g. `Permission.DELETE === "delete"` */
export const Permission = {
  VIEW: "view",
  LIST: "list",
  ADD: "add",
  DELETE: "delete",
  CHANGE: "change",
  MANAGE: "manage",
} as const satisfies Record<string, Permission>;

/** One-letter code per permission */
export const PERMISSION_CODES = {
  view: "v",
  list: "l",
  add: "a",
  delete: "d",
  change: "c",
  manage: "m",
} as const satisfies Record<Permission, string>;

export type PermissionCode = (typeof PERMISSION_CODES)[Permission];

const CODE_LOOKUP = new Map<string, Permission>(
  PERMISSIONS.map((p) => [PERMISSION_CODES[p], p])
);

/** Bit assigned to each permission; the bit order follows PERMISSIONS. */
function bitOf(permission: Permission): number {
  return 1 << PERMISSIONS.indexOf(permission);
}

/** Validates a permission string at a trust boundary (any order, codes only). */
export const PermissionCodeSchema = z
  .string()
  .regex(/^[vladcm]*$/, "Permission strings may only contain the codes v, l, a, d, c, m");

/**
 * Immutable set of permissions.
 *
 * Equality is by contents; `encode()` always emits codes in the fixed
 * order regardless of how the set was built.
 */
export class PermissionSet {
  static readonly NONE = new PermissionSet(0);
  static readonly READ = PermissionSet.of("view", "list");
  static readonly WRITE = PermissionSet.of("view", "list", "add", "delete", "change");
  static readonly ALL = PermissionSet.of(...PERMISSIONS);

  private readonly mask: number;

  private constructor(mask: number) {
    this.mask = mask;
    Object.freeze(this);
  }

  static of(...permissions: Permission[]): PermissionSet {
    let mask = 0;
    for (const permission of permissions) {
      mask |= bitOf(permission);
    }
    return new PermissionSet(mask);
  }

  /**
   * Parses a code string. Letters may appear in any order and repeat;
   * anything outside the alphabet throws InvalidPermissionCodeError.
   */
  static decode(text: string): PermissionSet {
    const permissions: Permission[] = [];
    const invalid: string[] = [];

    for (const char of text) {
      const permission = CODE_LOOKUP.get(char);
      if (permission) {
        permissions.push(permission);
      } else if (!invalid.includes(char)) {
        invalid.push(char);
      }
    }

    if (invalid.length > 0) {
      throw new InvalidPermissionCodeError(text, invalid);
    }
    return PermissionSet.of(...permissions);
  }

  has(permission: Permission): boolean {
    return (this.mask & bitOf(permission)) !== 0;
  }

  union(other: PermissionSet): PermissionSet {
    return new PermissionSet(this.mask | other.mask);
  }

  equals(other: PermissionSet): boolean {
    return this.mask === other.mask;
  }

  isEmpty(): boolean {
    return this.mask === 0;
  }

  get size(): number {
    return this.permissions().length;
  }

  /** Members in canonical order */
  permissions(): Permission[] {
    return PERMISSIONS.filter((p) => this.has(p));
  }

  encode(): string {
    return this.permissions()
      .map((p) => PERMISSION_CODES[p])
      .join("");
  }

  toString(): string {
    return this.encode();
  }

  toJSON(): string {
    return this.encode();
  }
}

/** Named presets, addressable by lowercase name (e.g. from configuration). */
export const PERMISSION_PRESETS = {
  none: PermissionSet.NONE,
  read: PermissionSet.READ,
  write: PermissionSet.WRITE,
  all: PermissionSet.ALL,
} as const;

export type PermissionPresetName = keyof typeof PERMISSION_PRESETS;

/** Type guard for values coming from untyped sources */
export function isPermission(value: string): value is Permission {
  return PERMISSIONS.some((p) => p === value);
}

/** Accepts either a PermissionSet or its string form. */
export function toPermissionSet(value: PermissionSet | string): PermissionSet {
  return typeof value === "string" ? PermissionSet.decode(value) : value;
}

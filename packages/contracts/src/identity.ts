/**
 * Identity Contract
 *
 * The identity/group store is an external collaborator. The engine only
 * needs, per identity, a stable name, a superuser flag, an active flag and
 * the names of its groups; per group, a stable name. The engine never
 * creates or deletes identities or groups.
 */

import { z } from "zod";
import { AgentNameSchema } from "./agent.js";

export interface Identity {
  kind: "identity";

  /** Unique, stable name; also the identity's agent key */
  name: string;

  /** Superusers bypass every ACL check */
  superuser: boolean;

  /**
   * Inactive identities are resolved like the guest: only the
   * "any user" group applies to them.
   */
  active: boolean;

  /** Names of the (persisted) groups this identity belongs to */
  groups: readonly string[];
}

export interface Group {
  kind: "group";
  name: string;
}

/** Anything that can appear in an ACL */
export type Agent = Identity | Group;

/**
 * The identity a request is made on behalf of.
 * `null` is the unauthenticated guest.
 */
export type Requester = Identity | null;

/** Input accepted when registering an identity with a directory */
export const IdentityInputSchema = z.object({
  name: AgentNameSchema,
  superuser: z.boolean().default(false),
  active: z.boolean().default(true),
  groups: z.array(AgentNameSchema).default([]),
});

export type IdentityInput = z.input<typeof IdentityInputSchema>;

/**
 * Lookup side of the identity/group store.
 * Used to resolve agent keys given as strings.
 */
export interface IdentityDirectory {
  findIdentity(name: string): Promise<Identity | null>;
  findGroup(name: string): Promise<Group | null>;
}

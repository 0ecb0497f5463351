/**
 * In-Memory Identity Directory
 *
 * A minimal identity/group store implementing IdentityDirectory. Real
 * deployments plug in their own user database; this one backs tests and
 * embedded use.
 *
 * Special groups ("anyuser", "authuser") cannot be created here: their
 * membership is computed by the engine, never stored.
 */

import {
  IdentityInputSchema,
  AgentNameSchema,
  assertGroupNameAllowed,
  type Group,
  type Identity,
  type IdentityDirectory,
  type IdentityInput,
} from "@arbor/contracts";

export class MemoryIdentityDirectory implements IdentityDirectory {
  private readonly identities = new Map<string, Identity>();
  private readonly groups = new Map<string, Group>();

  async findIdentity(name: string): Promise<Identity | null> {
    return this.identities.get(name) ?? null;
  }

  async findGroup(name: string): Promise<Group | null> {
    return this.groups.get(name) ?? null;
  }

  /**
   * Registers a group.
   *
   * @throws ReservedAgentNameError for "anyuser" / "authuser"
   */
  createGroup(name: string): Group {
    assertGroupNameAllowed(name);
    AgentNameSchema.parse(name);
    if (this.groups.has(name)) {
      throw new Error(`Group "${name}" already exists`);
    }
    const group: Group = { kind: "group", name };
    this.groups.set(name, group);
    return group;
  }

  /** Registers an identity. Every group it lists must already exist. */
  createIdentity(input: IdentityInput): Identity {
    const parsed = IdentityInputSchema.parse(input);
    if (this.identities.has(parsed.name)) {
      throw new Error(`Identity "${parsed.name}" already exists`);
    }
    for (const group of parsed.groups) {
      this.requireGroup(group);
    }

    const identity: Identity = {
      kind: "identity",
      name: parsed.name,
      superuser: parsed.superuser,
      active: parsed.active,
      groups: [...new Set(parsed.groups)],
    };
    this.identities.set(identity.name, identity);
    return identity;
  }

  /** Adds a membership and returns the updated identity. */
  addMember(groupName: string, identityName: string): Identity {
    this.requireGroup(groupName);
    const identity = this.requireIdentity(identityName);
    if (identity.groups.includes(groupName)) return identity;

    const updated: Identity = { ...identity, groups: [...identity.groups, groupName] };
    this.identities.set(identityName, updated);
    return updated;
  }

  /** Removes a membership and returns the updated identity. */
  removeMember(groupName: string, identityName: string): Identity {
    const identity = this.requireIdentity(identityName);
    const updated: Identity = {
      ...identity,
      groups: identity.groups.filter((g) => g !== groupName),
    };
    this.identities.set(identityName, updated);
    return updated;
  }

  private requireGroup(name: string): Group {
    const group = this.groups.get(name);
    if (!group) {
      throw new Error(`Group "${name}" does not exist`);
    }
    return group;
  }

  private requireIdentity(name: string): Identity {
    const identity = this.identities.get(name);
    if (!identity) {
      throw new Error(`Identity "${name}" does not exist`);
    }
    return identity;
  }
}

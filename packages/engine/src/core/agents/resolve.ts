/**
 * Agent Resolution
 *
 * Computes which ACL keys apply to a requester, and maps agent references
 * (objects or key strings) to the key an ACL entry is stored under.
 *
 * Resolution order for a requester:
 *   1. own identity key          (active identities only)
 *   2. "group:<g>" for each group (active identities only)
 *   3. "group:anyuser"            (always)
 *   4. "group:authuser"           (active identities only)
 *
 * Special groups are derived here and never read from a store. Names that
 * are not valid agent names ("group:staff" as an identity name) never
 * produce a key.
 */

import {
  ANY_USER_KEY,
  AUTH_USER_KEY,
  AgentKeySchema,
  AgentNameSchema,
  AgentNotFoundError,
  groupKey,
  identityKey,
  isSpecialGroupKey,
  parseAgentKey,
  type AgentRef,
  type Identity,
  type IdentityDirectory,
  type Requester,
} from "@arbor/contracts";

function isAgentName(name: string): boolean {
  return AgentNameSchema.safeParse(name).success;
}

/** True for an identity whose name can be used as its agent key */
export function hasValidName(requester: Requester): requester is Identity {
  return requester !== null && isAgentName(requester.name);
}

/**
 * Returns the ordered, de-duplicated agent keys to consult for a
 * permission check. The guest (null), inactive identities and identities
 * with a malformed name only match the "any user" group; malformed group
 * names are skipped.
 */
export function resolveAgentKeys(requester: Requester): string[] {
  if (!hasValidName(requester) || !requester.active) {
    return [ANY_USER_KEY];
  }

  const keys = new Set<string>();
  keys.add(identityKey(requester.name));
  for (const group of requester.groups) {
    if (isAgentName(group)) {
      keys.add(groupKey(group));
    }
  }
  keys.add(ANY_USER_KEY);
  keys.add(AUTH_USER_KEY);
  return [...keys];
}

/** Display name used in diagnostics and denial messages */
export function requesterName(requester: Requester): string {
  return requester === null ? "<anonymous>" : requester.name;
}

/** Key a creator is granted ALL under; null for the guest or a malformed name */
export function creatorKey(requester: Requester): string | null {
  return hasValidName(requester) ? identityKey(requester.name) : null;
}

/**
 * Maps an agent reference to its ACL key.
 *
 * Objects map directly once their name is checked. Strings must be well-formed keys; unless they name
 * a special group, the named identity or group must exist in `directory`.
 *
 * @throws AgentNotFoundError if the key is malformed or names an unknown agent
 */
export async function agentKeyFor(
  agent: AgentRef,
  directory: IdentityDirectory | null
): Promise<string> {
  if (typeof agent !== "string") {
    const key = agent.kind === "group" ? groupKey(agent.name) : identityKey(agent.name);
    if (!isAgentName(agent.name)) {
      throw new AgentNotFoundError(key);
    }
    return key;
  }

  if (isSpecialGroupKey(agent)) {
    return agent;
  }

  if (!AgentKeySchema.safeParse(agent).success) {
    throw new AgentNotFoundError(agent);
  }

  if (!directory) {
    throw new Error(
      `Cannot resolve agent "${agent}": no identity directory configured. ` +
      "Pass an Identity or Group object, or configure a directory."
    );
  }

  const parsed = parseAgentKey(agent);
  const found =
    parsed.kind === "group"
      ? await directory.findGroup(parsed.name)
      : await directory.findIdentity(parsed.name);

  if (!found) {
    throw new AgentNotFoundError(agent);
  }
  return agent;
}

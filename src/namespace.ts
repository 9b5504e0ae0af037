import { InvalidRoleError, NamespaceCollisionError, type ErrorContext } from "./errors.js";

export const NS_SEPARATOR = "__";

export const ROLES = ["pre", "post", "response", "plasticity", "synapse"] as const;
export type Role = (typeof ROLES)[number];

export function isRole(s: string): s is Role {
  return ROLES.some((r) => r === s);
}

export function parseRole(s: string, ctx: ErrorContext = {}): Role {
  if (!isRole(s)) throw new InvalidRoleError(s, ctx);
  return s;
}

export function appendNamespace(name: string, namespace: string): string {
  if (namespace.length === 0 || namespace.includes(NS_SEPARATOR)) {
    throw new NamespaceCollisionError(
      namespace,
      `namespace may not be empty or contain '${NS_SEPARATOR}', names under it could not be split`,
    );
  }
  return `${name}${NS_SEPARATOR}${namespace}`;
}

/** Inverse of appendNamespace; the namespace is always the last segment. */
export function splitNamespace(name: string): { namespace: string; name: string } {
  const at = name.lastIndexOf(NS_SEPARATOR);
  if (at <= 0 || at + NS_SEPARATOR.length >= name.length) {
    throw new NamespaceCollisionError(name, "name carries no namespace");
  }
  return { name: name.slice(0, at), namespace: name.slice(at + NS_SEPARATOR.length) };
}

/**
 * Mapping from port connection roles to the sub-component names they are
 * bound to inside one container. Two roles may not share a name.
 */
export class RoleTable {
  private readonly names = new Map<Role, string>();

  constructor(entries: Partial<Record<Role, string>>) {
    const seen = new Map<string, Role>();
    for (const role of ROLES) {
      const name = entries[role];
      if (name === undefined) continue;
      const other = seen.get(name);
      if (other) {
        throw new NamespaceCollisionError(name, `roles '${other}' and '${role}' are both bound to it`);
      }
      if (name.includes(NS_SEPARATOR)) {
        throw new NamespaceCollisionError(name, `sub-component names may not contain '${NS_SEPARATOR}'`);
      }
      seen.set(name, role);
      this.names.set(role, name);
    }
  }

  has(role: Role): boolean {
    return this.names.has(role);
  }

  get(role: Role): string | undefined {
    return this.names.get(role);
  }

  require(role: Role, ctx: ErrorContext = {}): string {
    const name = this.names.get(role);
    if (name === undefined) throw new InvalidRoleError(role, ctx);
    return name;
  }

  namespace(port: string, role: Role, ctx: ErrorContext = {}): string {
    return appendNamespace(port, this.require(role, ctx));
  }

  /** Role and port a namespaced name was built from. */
  split(name: string, ctx: ErrorContext = {}): { role: Role; port: string } {
    const parts = splitNamespace(name);
    for (const [role, bound] of this.names) {
      if (bound === parts.namespace) return { role, port: parts.name };
    }
    throw new NamespaceCollisionError(name, `'${parts.namespace}' is bound to no role`, ctx);
  }
}

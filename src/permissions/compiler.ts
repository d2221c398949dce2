/**
 * Permission compiler.
 *
 * Expands a role template against the primary workspaces of the users that
 * share it into the permission document stored on the remote role.
 */

import { UnresolvedWorkspaceError } from '../errors.js';
import type {
  CompiledRole,
  RemoteId,
  RolePermissionDocument,
  RoleTemplate,
  User,
  WorkspacePermissionEntry,
} from '../types.js';
import { WORKSPACE_PERMISSION_KEYS } from './catalog.js';

export function roleNameFor(slugs: readonly string[], templateName: string): string {
  return `[${slugs.join('+').toUpperCase()}] ${templateName}`;
}

export function compareWorkspaceEntries(
  a: WorkspacePermissionEntry,
  b: WorkspacePermissionEntry
): number {
  return compareRemoteIds(a.id, b.id);
}

/** Numeric ids compare as numbers; anything else by its text */
export function compareRemoteIds(a: RemoteId, b: RemoteId): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  const left = String(a);
  const right = String(b);
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

export interface CompileRoleInput {
  roleName: string;
  template: RoleTemplate;
  /** Primary workspace slugs, in declared order */
  primary: readonly string[];
  /** Every desired workspace slug */
  allSlugs: readonly string[];
  workspaceIds: ReadonlyMap<string, RemoteId>;
}

export function compileRolePermissions(input: CompileRoleInput): RolePermissionDocument {
  const { roleName, template, primary, allSlugs, workspaceIds } = input;

  const idFor = (slug: string): RemoteId => {
    const id = workspaceIds.get(slug);
    if (id === undefined) {
      throw new UnresolvedWorkspaceError(roleName, slug);
    }
    return id;
  };

  const workspaces: WorkspacePermissionEntry[] = primary.map(slug => ({
    id: idFor(slug),
    ...template.primaryWorkspaces,
  }));

  const grantsOtherWorkspaces = WORKSPACE_PERMISSION_KEYS.some(key => template.otherWorkspaces[key]);
  if (grantsOtherWorkspaces) {
    const primarySet = new Set(primary);
    for (const slug of allSlugs) {
      if (primarySet.has(slug)) continue;
      workspaces.push({ id: idFor(slug), ...template.otherWorkspaces });
    }
  }

  workspaces.sort(compareWorkspaceEntries);
  return { ...template.organization, workspaces };
}

export interface CompiledRoles {
  /** Role name → compiled role, in first-use order */
  roles: Map<string, CompiledRole>;
  /** User email → role name */
  userRoles: Map<string, string>;
}

/**
 * Compile one role per distinct (workspace list, template) combination found
 * among the desired users.
 */
export function compileRoles(input: {
  users: Iterable<User>;
  roleTemplates: ReadonlyMap<string, RoleTemplate>;
  allSlugs: readonly string[];
  workspaceIds: ReadonlyMap<string, RemoteId>;
}): CompiledRoles {
  const { users, roleTemplates, allSlugs, workspaceIds } = input;
  const roles = new Map<string, CompiledRole>();
  const userRoles = new Map<string, string>();

  for (const user of users) {
    const primary = Array.from(user.assignments.keys());
    const assignments = Array.from(user.assignments.values());
    if (assignments.length === 0) continue;

    const templateName = assignments[assignments.length - 1].roleTemplate;
    const roleName = roleNameFor(primary, templateName);

    if (!roles.has(roleName)) {
      const template = roleTemplates.get(templateName);
      if (!template) {
        throw new Error(`Role template '${templateName}' is not defined`);
      }
      roles.set(roleName, {
        name: roleName,
        templateName,
        workspaces: primary,
        permissions: compileRolePermissions({ roleName, template, primary, allSlugs, workspaceIds }),
      });
    }
    userRoles.set(user.email, roleName);
  }

  return { roles, userRoles };
}

import { isDeepStrictEqual } from 'node:util';
import { compareWorkspaceEntries } from '../permissions/compiler.js';
import type { AccessApi, RemoteRole, RemoteRolePermissions, RemoteRoleSummary } from '../remote/types.js';
import type { CompiledRole, RemoteId, RolePermissionDocument } from '../types.js';
import { applyPlan, planReconciliation, summarizePlan, type ApplyContext } from './reconciler.js';
import type { PhaseSummary, ResourceMatcher } from './types.js';

/** Built-in role of the remote system; never reported as unknown */
export const RESERVED_ROLE_NAME = 'Admin';

/** Drop the remote-only bookkeeping fields and order workspace entries by id */
export function comparablePermissions(permissions: RemoteRolePermissions): RolePermissionDocument {
  const { private: _private, user: _user, ...document } = permissions;
  return {
    ...document,
    workspaces: [...document.workspaces].sort(compareWorkspaceEntries),
  };
}

export const roleMatcher: ResourceMatcher<CompiledRole, RemoteRole> = {
  desiredKey: role => role.name,
  remoteKey: remote => remote.name,
  isEqual: (role, remote) => isDeepStrictEqual(role.permissions, comparablePermissions(remote.permissions)),
  isReserved: remote => remote.name === RESERVED_ROLE_NAME,
};

export interface RolePhaseResult {
  summary: PhaseSummary;
  /** Role name → remote role id */
  ids: Map<string, RemoteId>;
  unknown: RemoteRoleSummary[];
}

export async function syncRoles(
  api: AccessApi,
  desired: Iterable<CompiledRole>,
  context: ApplyContext
): Promise<RolePhaseResult> {
  const roles = Array.from(desired);
  const names = new Set(roles.map(role => role.name));

  // Only matched roles need their permission documents
  const summaries = await api.roles.query();
  const remote: RemoteRole[] = [];
  const unknown: RemoteRoleSummary[] = [];
  for (const summary of summaries) {
    if (names.has(summary.name)) {
      remote.push(await api.roles.get(summary.id));
    } else if (summary.name !== RESERVED_ROLE_NAME) {
      unknown.push(summary);
    }
  }

  const plan = planReconciliation(roles, remote, roleMatcher);

  const resolved = await applyPlan('roles', plan, async ({ desired: role, remote: match }) => {
    if (!match) {
      return api.roles.create({ name: role.name, permissions: role.permissions });
    }
    return api.roles.save({
      ...match,
      permissions: { ...role.permissions, private: false, user: null },
    });
  }, context);

  return {
    summary: summarizePlan(plan),
    ids: new Map(resolved.map(({ desired: role, remote: match }): [string, RemoteId] => [role.name, match.id])),
    unknown,
  };
}

/**
 * Three-pass synchronization: workspaces, then roles compiled against the
 * synchronized workspace ids, then users pointing at the synchronized roles.
 */

import { compileRoles } from '../permissions/compiler.js';
import type { AccessApi, RemoteRoleSummary, RemoteUser, RemoteWorkspace } from '../remote/types.js';
import type { DesiredState } from '../types.js';
import type { ApplyContext } from './reconciler.js';
import { syncRoles } from './roles.js';
import type { PhaseSummary } from './types.js';
import { resolveUsers, syncUsers } from './users.js';
import { syncWorkspaces } from './workspaces.js';

export interface SyncResult {
  workspaces: PhaseSummary;
  roles: PhaseSummary;
  users: PhaseSummary;
  unknown: {
    workspaces: RemoteWorkspace[];
    roles: RemoteRoleSummary[];
    users: RemoteUser[];
  };
}

export async function synchronize(
  api: AccessApi,
  desired: DesiredState,
  context: ApplyContext
): Promise<SyncResult> {
  const { reporter } = context;

  reporter.phaseStarted('Synchronizing Workspaces...');
  const workspaces = await syncWorkspaces(api, desired.workspaces.values(), context);

  reporter.phaseStarted('Synchronizing Roles...');
  const compiled = compileRoles({
    users: desired.users.values(),
    roleTemplates: desired.roleTemplates,
    allSlugs: Array.from(desired.workspaces.keys()),
    workspaceIds: workspaces.ids,
  });
  const roles = await syncRoles(api, compiled.roles.values(), context);

  reporter.phaseStarted('Synchronizing Users...');
  const users = await syncUsers(
    api,
    resolveUsers(desired.users.values(), compiled.userRoles, roles.ids),
    context
  );

  const unknown = {
    workspaces: workspaces.unknown,
    roles: roles.unknown,
    users: users.unknown,
  };
  if (unknown.workspaces.length > 0 || unknown.roles.length > 0 || unknown.users.length > 0) {
    reporter.phaseStarted('Identifying Unknown Resources...');
    reporter.unknownResources('workspaces', unknown.workspaces.map(w => ({ name: w.name, key: w.slug })));
    reporter.unknownResources('roles', unknown.roles.map(r => ({ name: r.name })));
    reporter.unknownResources('users', unknown.users.map(u => ({ name: u.name, key: u.email })));
  }

  return {
    workspaces: workspaces.summary,
    roles: roles.summary,
    users: users.summary,
    unknown,
  };
}

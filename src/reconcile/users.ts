import { UnresolvedRoleError } from '../errors.js';
import type { AccessApi, RemoteUser } from '../remote/types.js';
import type { RemoteId, User } from '../types.js';
import { applyPlan, planReconciliation, summarizePlan, type ApplyContext } from './reconciler.js';
import type { PhaseSummary, ResourceMatcher } from './types.js';

/** Desired user with the id of its synchronized role */
export type ResolvedUser = {
  email: string;
  name: string;
  active: boolean;
  roleName: string;
  roleId: RemoteId;
};

export const userMatcher: ResourceMatcher<ResolvedUser, RemoteUser> = {
  desiredKey: user => user.email,
  remoteKey: remote => remote.email,
  isEqual: (user, remote) =>
    user.name === remote.name && user.active === remote.active && user.roleId === remote.roleId,
};

/** Attach role ids to desired users; every user's role must already be synchronized */
export function resolveUsers(
  users: Iterable<User>,
  userRoles: ReadonlyMap<string, string>,
  roleIds: ReadonlyMap<string, RemoteId>
): ResolvedUser[] {
  const resolved: ResolvedUser[] = [];
  for (const user of users) {
    const roleName = userRoles.get(user.email);
    if (roleName === undefined) continue;

    const roleId = roleIds.get(roleName);
    if (roleId === undefined) {
      throw new UnresolvedRoleError(user.email, roleName);
    }
    resolved.push({ email: user.email, name: user.name, active: user.active, roleName, roleId });
  }
  return resolved;
}

export interface UserPhaseResult {
  summary: PhaseSummary;
  unknown: RemoteUser[];
}

export async function syncUsers(
  api: AccessApi,
  desired: Iterable<ResolvedUser>,
  context: ApplyContext
): Promise<UserPhaseResult> {
  const plan = planReconciliation(desired, await api.users.query(), userMatcher);

  await applyPlan('users', plan, async ({ desired: user, remote }) => {
    if (!remote) {
      return api.users.create({
        email: user.email,
        name: user.name,
        active: user.active,
        roleId: user.roleId,
      });
    }
    const current = await api.users.get(remote.id);
    return api.users.save({
      ...current,
      name: user.name,
      active: user.active,
      roleId: user.roleId,
    });
  }, context);

  return {
    summary: summarizePlan(plan),
    unknown: plan.unknown,
  };
}

import type { AccessApi, RemoteWorkspace } from '../remote/types.js';
import type { RemoteId, Workspace } from '../types.js';
import { applyPlan, planReconciliation, summarizePlan, type ApplyContext } from './reconciler.js';
import type { PhaseSummary, ResourceMatcher } from './types.js';

export const workspaceMatcher: ResourceMatcher<Workspace, RemoteWorkspace> = {
  desiredKey: workspace => workspace.slug,
  remoteKey: remote => remote.slug,
  isEqual: (workspace, remote) => workspace.name === remote.name,
};

export interface WorkspacePhaseResult {
  summary: PhaseSummary;
  /** Slug → remote workspace id */
  ids: Map<string, RemoteId>;
  unknown: RemoteWorkspace[];
}

export async function syncWorkspaces(
  api: AccessApi,
  desired: Iterable<Workspace>,
  context: ApplyContext
): Promise<WorkspacePhaseResult> {
  const plan = planReconciliation(desired, await api.workspaces.query(), workspaceMatcher);

  const resolved = await applyPlan('workspaces', plan, async ({ desired: workspace, remote }) => {
    if (!remote) {
      return api.workspaces.create({ slug: workspace.slug, name: workspace.name });
    }
    return api.workspaces.save({ ...remote, name: workspace.name });
  }, context);

  return {
    summary: summarizePlan(plan),
    ids: new Map(resolved.map(({ desired: workspace, remote }): [string, RemoteId] => [workspace.slug, remote.id])),
    unknown: plan.unknown,
  };
}

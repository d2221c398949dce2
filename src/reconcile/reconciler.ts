import { AbortedByUserError } from '../errors.js';
import type {
  ApprovalGate,
  PhaseSummary,
  ReconcilePlan,
  ReconciliationItem,
  ReportSink,
  ResourceKind,
  ResourceMatcher,
} from './types.js';

/** Match remote records to desired ones by natural key and classify each desired record */
export function planReconciliation<D, R>(
  desired: Iterable<D>,
  remote: Iterable<R>,
  matcher: ResourceMatcher<D, R>
): ReconcilePlan<D, R> {
  const desiredByKey = new Map<string, D>();
  for (const record of desired) {
    desiredByKey.set(matcher.desiredKey(record), record);
  }

  const remoteByKey = new Map<string, R>();
  const unknown: R[] = [];
  for (const record of remote) {
    const key = matcher.remoteKey(record);
    if (desiredByKey.has(key)) {
      remoteByKey.set(key, record);
    } else if (!matcher.isReserved?.(record)) {
      unknown.push(record);
    }
  }

  const items: ReconciliationItem<D, R>[] = [];
  for (const [key, record] of desiredByKey) {
    const match = remoteByKey.get(key);
    items.push({
      desired: record,
      remote: match,
      action: match === undefined ? 'create' : matcher.isEqual(record, match) ? 'unchanged' : 'update',
    });
  }

  return { items, unknown };
}

export function summarizePlan<D, R>(plan: ReconcilePlan<D, R>): PhaseSummary {
  const count = (action: ReconciliationItem<D, R>['action']) =>
    plan.items.filter(item => item.action === action).length;
  return {
    total: plan.items.length,
    created: count('create'),
    updated: count('update'),
    unchanged: count('unchanged'),
  };
}

export interface ApplyContext {
  gate: ApprovalGate;
  reporter: ReportSink;
  /** Writes in flight at once; 1 applies one record at a time */
  concurrency?: number;
}

/** Run `fn` over `items` with at most `limit` calls in flight, preserving result order */
export async function mapWithConcurrency<T, U>(
  items: readonly T[],
  limit: number,
  fn: (item: T) => Promise<U>,
  onSettled?: (completed: number) => void
): Promise<U[]> {
  const results = new Array<U>(items.length);
  let next = 0;
  let completed = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index]);
      completed += 1;
      onSettled?.(completed);
    }
  };

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => worker());
  await Promise.all(workers);
  return results;
}

/**
 * Ask for approval of a plan's creates and updates and apply them.
 *
 * Returns the remote record of every desired item (applied or unchanged), in
 * plan order. Declining the approval aborts the run.
 */
export async function applyPlan<D, R>(
  kind: ResourceKind,
  plan: ReconcilePlan<D, R>,
  apply: (item: ReconciliationItem<D, R>) => Promise<R>,
  context: ApplyContext
): Promise<Array<{ desired: D; remote: R }>> {
  const { gate, reporter, concurrency = 1 } = context;
  const summary = summarizePlan(plan);
  const jobs = plan.items.filter(item => item.action !== 'unchanged');

  const applied = new Map<ReconciliationItem<D, R>, R>();
  if (jobs.length > 0) {
    reporter.changesFound(kind, summary.created, summary.updated);
    const approved = await gate.confirm(`Are you sure you wish to synchronize ${kind}?`);
    if (!approved) {
      throw new AbortedByUserError(kind);
    }

    reporter.applyStarted(kind, jobs.length);
    const results = await mapWithConcurrency(jobs, concurrency, apply, completed => {
      reporter.applyProgress(completed);
    });
    jobs.forEach((job, index) => applied.set(job, results[index]));
    reporter.applyFinished(kind);
  } else {
    reporter.upToDate(kind, summary.total);
  }

  return plan.items.map(item => {
    const remote = applied.get(item) ?? item.remote;
    if (remote === undefined) {
      throw new Error(`No remote record for ${kind} item after synchronization`);
    }
    return { desired: item.desired, remote };
  });
}

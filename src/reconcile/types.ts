export type ReconcileAction = 'unchanged' | 'create' | 'update';

export type ResourceKind = 'workspaces' | 'roles' | 'users';

export interface ReconciliationItem<D, R> {
  desired: D;
  remote: R | undefined;
  action: ReconcileAction;
}

export interface ReconcilePlan<D, R> {
  items: ReconciliationItem<D, R>[];
  /** Remote records with no desired counterpart; reported, never mutated */
  unknown: R[];
}

/** How desired and remote records of one resource kind are matched and compared */
export interface ResourceMatcher<D, R> {
  desiredKey(desired: D): string;
  remoteKey(remote: R): string;
  isEqual(desired: D, remote: R): boolean;
  /** Remote records excluded from the unknown report */
  isReserved?(remote: R): boolean;
}

export interface PhaseSummary {
  total: number;
  created: number;
  updated: number;
  unchanged: number;
}

/** Asks the operator to approve a phase's changes */
export interface ApprovalGate {
  confirm(question: string): Promise<boolean>;
}

export interface UnknownResource {
  name: string;
  /** Natural key shown next to the name, when it differs from it */
  key?: string;
}

/** Receives progress and outcome of the synchronization */
export interface ReportSink {
  phaseStarted(title: string): void;
  changesFound(kind: ResourceKind, created: number, updated: number): void;
  upToDate(kind: ResourceKind, total: number): void;
  applyStarted(kind: ResourceKind, total: number): void;
  applyProgress(completed: number): void;
  applyFinished(kind: ResourceKind): void;
  unknownResources(kind: ResourceKind, resources: UnknownResource[]): void;
}

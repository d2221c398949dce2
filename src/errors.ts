/**
 * Error taxonomy for the synchronizer.
 *
 * Every error carries a short message plus an optional detail line; the CLI
 * prints both and exits non-zero. The first error raised stops the run.
 */

export class SyncError extends Error {
  constructor(message: string, readonly detail?: string) {
    super(message);
    this.name = new.target.name;
  }
}

export type HeaderErrorKind = 'missing' | 'duplicate';

export class HeaderError extends SyncError {
  constructor(readonly kind: HeaderErrorKind, source: string, detail: string) {
    super(`Failed to resolve headers in '${source}' workbook`, detail);
  }
}

export class SheetNotFoundError extends SyncError {
  constructor(readonly workbook: string, readonly sheet: string, message: string) {
    super(message, `Workbook must contain '${sheet}' sheet`);
  }
}

export class TemplateDefinitionError extends SyncError {
  constructor(readonly sheet: string, message: string, detail: string) {
    super(message, detail);
  }
}

export type UserRowErrorKind =
  | 'incomplete'
  | 'unknown_workspace'
  | 'unknown_role'
  | 'duplicate_assignment'
  | 'conflicting_role';

export class UserRowError extends SyncError {
  constructor(
    readonly kind: UserRowErrorKind,
    readonly file: string,
    readonly row: number,
    detail: string
  ) {
    super(`Failed to parse users from '${file}'`, detail);
  }
}

export class UnresolvedWorkspaceError extends SyncError {
  constructor(readonly roleName: string, readonly slug: string) {
    super(`Failed to create role '${roleName}'`, `Workspace '${slug}' not found`);
  }
}

export class UnresolvedRoleError extends SyncError {
  constructor(readonly email: string, readonly roleName: string) {
    super(`Failed to synchronize user '${email}'`, `Role '${roleName}' has not been synchronized`);
  }
}

export class AbortedByUserError extends SyncError {
  constructor(readonly phase: string) {
    super('Synchronization aborted', `Changes to ${phase} were not approved`);
  }
}

export class ConfigError extends SyncError {}

export class ApiError extends SyncError {
  constructor(
    readonly method: string,
    readonly path: string,
    readonly status: number,
    readonly body: string
  ) {
    super(`Request ${method} ${path} failed with status ${status}`, body || undefined);
  }
}

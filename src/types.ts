import type {
  OrganizationPermissions,
  WorkspacePermissions,
} from './permissions/catalog.js';

/** Desired workspace, keyed by slug */
export type Workspace = {
  slug: string;
  /** Display name, `[SLUG] Name` */
  name: string;
};

export type RoleTemplate = {
  name: string;
  organization: OrganizationPermissions;
  primaryWorkspaces: WorkspacePermissions;
  otherWorkspaces: WorkspacePermissions;
};

/** Remote identifier, kept as the API returns it */
export type RemoteId = string | number;

export type WorkspacePermissionEntry = WorkspacePermissions & {
  id: RemoteId;
};

/** Permission document as stored on a remote role */
export type RolePermissionDocument = OrganizationPermissions & {
  workspaces: WorkspacePermissionEntry[];
};

export type CompiledRole = {
  name: string;
  templateName: string;
  /** Primary workspace slugs, in declared order */
  workspaces: string[];
  permissions: RolePermissionDocument;
};

export type WorkspaceAssignment = {
  roleTemplate: string;
  sourceFile: string;
  row: number;
};

export type User = {
  email: string;
  name: string;
  active: boolean;
  /** Workspace slug → assignment, in declared order */
  assignments: Map<string, WorkspaceAssignment>;
};

export type DesiredState = {
  workspaces: Map<string, Workspace>;
  roleTemplates: Map<string, RoleTemplate>;
  users: Map<string, User>;
  warnings: string[];
};

import type { RemoteId, RolePermissionDocument } from '../types.js';

/** Workspace as returned by the access API */
export interface RemoteWorkspace {
  id: RemoteId;
  slug: string;
  name: string;
  protected: boolean;
}

/** Role list entry; the permission document is only returned by `get` */
export interface RemoteRoleSummary {
  id: RemoteId;
  name: string;
}

/**
 * Remote permission document. Besides the fields the synchronizer writes, the
 * API keeps two bookkeeping fields of its own.
 */
export type RemoteRolePermissions = RolePermissionDocument & {
  private?: boolean;
  user?: string | null;
};

export interface RemoteRole {
  id: RemoteId;
  name: string;
  permissions: RemoteRolePermissions;
}

export interface RemoteUser {
  id: RemoteId;
  email: string;
  name: string;
  active: boolean;
  /** Null when the API reports no role */
  roleId: RemoteId | null;
}

/** The three resource collections the synchronizer manages */
export interface AccessApi {
  workspaces: {
    query(): Promise<RemoteWorkspace[]>;
    create(input: { slug: string; name: string }): Promise<RemoteWorkspace>;
    save(workspace: RemoteWorkspace): Promise<RemoteWorkspace>;
  };
  roles: {
    query(): Promise<RemoteRoleSummary[]>;
    get(id: RemoteId): Promise<RemoteRole>;
    create(input: { name: string; permissions: RolePermissionDocument }): Promise<RemoteRole>;
    save(role: RemoteRole): Promise<RemoteRole>;
  };
  users: {
    query(): Promise<RemoteUser[]>;
    get(id: RemoteId): Promise<RemoteUser>;
    create(input: { email: string; name: string; active: boolean; roleId: RemoteId }): Promise<RemoteUser>;
    save(user: RemoteUser): Promise<RemoteUser>;
  };
}

/**
 * REST client for the access-management API.
 *
 * Every request authenticates with HTTP Basic credentials; rate-limited
 * requests (429) are retried with exponential backoff.
 */

import { ApiError } from '../errors.js';
import type { ApiCredentials } from '../config.js';
import {
  ORGANIZATION_PERMISSION_KEYS,
  WORKSPACE_PERMISSION_KEYS,
  emptyOrganizationPermissions,
  emptyWorkspacePermissions,
  type WorkspacePermissions,
} from '../permissions/catalog.js';
import type { RemoteId, RolePermissionDocument, WorkspacePermissionEntry } from '../types.js';
import type {
  AccessApi,
  RemoteRole,
  RemoteRolePermissions,
  RemoteRoleSummary,
  RemoteUser,
  RemoteWorkspace,
} from './types.js';

type Fetch = typeof fetch;

export interface AccessApiClientOptions {
  /** Base URL of the deployment, e.g. https://access.example.com */
  baseUrl: string;
  credentials: ApiCredentials;
  fetchImpl?: Fetch;
  maxRetries?: number;
  baseDelayMs?: number;
}

type JsonObject = Record<string, unknown>;

function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectRecord(value: unknown, what: string): JsonObject {
  if (!isRecord(value)) {
    throw new Error(`Unexpected ${what} response: expected an object`);
  }
  return value;
}

function expectArray(value: unknown, what: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new Error(`Unexpected ${what} response: expected an array`);
  }
  return value;
}

function readId(obj: JsonObject, key: string, what: string): RemoteId {
  const value = obj[key];
  if ((typeof value === 'string' && value !== '') || typeof value === 'number') return value;
  throw new Error(`Unexpected ${what} response: missing '${key}'`);
}

/** A missing reference reads as null */
function readOptionalId(value: unknown, what: string): RemoteId | null {
  if (value === undefined || value === null) return null;
  if ((typeof value === 'string' && value !== '') || typeof value === 'number') return value;
  throw new Error(`Unexpected ${what} response: invalid id`);
}

function readString(obj: JsonObject, key: string, what: string): string {
  const value = obj[key];
  if (typeof value !== 'string') {
    throw new Error(`Unexpected ${what} response: missing '${key}'`);
  }
  return value;
}

function toWorkspace(value: unknown): RemoteWorkspace {
  const obj = expectRecord(value, 'workspace');
  return {
    id: readId(obj, 'id', 'workspace'),
    slug: readString(obj, 'slug', 'workspace'),
    name: readString(obj, 'name', 'workspace'),
    protected: obj.protected === true,
  };
}

function toRoleSummary(value: unknown): RemoteRoleSummary {
  const obj = expectRecord(value, 'role');
  return {
    id: readId(obj, 'id', 'role'),
    name: readString(obj, 'name', 'role'),
  };
}

function toWorkspacePermissionEntry(value: unknown): WorkspacePermissionEntry {
  const obj = expectRecord(value, 'role workspace');
  const flags: WorkspacePermissions = emptyWorkspacePermissions();
  for (const key of WORKSPACE_PERMISSION_KEYS) {
    flags[key] = obj[key] === true;
  }
  return { id: readId(obj, 'id', 'role workspace'), ...flags };
}

/** Absent flags read as false; fields outside the catalog are dropped */
export function toRolePermissions(value: unknown): RemoteRolePermissions {
  const obj = expectRecord(value, 'role permissions');
  const organization = emptyOrganizationPermissions();
  for (const key of ORGANIZATION_PERMISSION_KEYS) {
    organization[key] = obj[key] === true;
  }
  const permissions: RemoteRolePermissions = {
    ...organization,
    workspaces: (Array.isArray(obj.workspaces) ? obj.workspaces : []).map(toWorkspacePermissionEntry),
  };
  if (typeof obj.private === 'boolean') {
    permissions.private = obj.private;
  }
  if (typeof obj.user === 'string' || obj.user === null) {
    permissions.user = obj.user;
  }
  return permissions;
}

function toRole(value: unknown): RemoteRole {
  const obj = expectRecord(value, 'role');
  return {
    id: readId(obj, 'id', 'role'),
    name: readString(obj, 'name', 'role'),
    permissions: toRolePermissions(obj.permissions),
  };
}

function toUser(value: unknown): RemoteUser {
  const obj = expectRecord(value, 'user');
  const role = isRecord(obj.role) ? obj.role : undefined;
  return {
    id: readId(obj, 'id', 'user'),
    email: readString(obj, 'email', 'user').toLowerCase(),
    name: readString(obj, 'name', 'user'),
    active: obj.active === true,
    roleId: readOptionalId(role ? role.id : obj.role_id, 'user role'),
  };
}

/** Retry wrapper with exponential backoff for rate limiting */
async function retryApiCall<T>(
  fn: () => Promise<T>,
  maxRetries = 3,
  baseDelayMs = 500
): Promise<T> {
  let attempt = 0;
  // eslint-disable-next-line no-constant-condition
  while (true) {
    try {
      return await fn();
    } catch (err) {
      const isRateLimited = err instanceof ApiError && err.status === 429;

      attempt += 1;
      if (isRateLimited && attempt <= maxRetries) {
        const delay = baseDelayMs * Math.pow(2, attempt - 1);
        await new Promise(r => setTimeout(r, delay));
        continue;
      }
      throw err;
    }
  }
}

export class AccessApiClient implements AccessApi {
  private readonly apiUrl: string;
  private readonly authorization: string;
  private readonly fetchImpl: Fetch;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;

  constructor(options: AccessApiClientOptions) {
    this.apiUrl = `${options.baseUrl.replace(/\/+$/, '')}/api`;
    const token = Buffer.from(`${options.credentials.id}:${options.credentials.secret}`).toString('base64');
    this.authorization = `Basic ${token}`;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.maxRetries = options.maxRetries ?? 3;
    this.baseDelayMs = options.baseDelayMs ?? 500;
  }

  private request(method: string, path: string, body?: unknown): Promise<unknown> {
    return retryApiCall(async () => {
      const response = await this.fetchImpl(`${this.apiUrl}${path}`, {
        method,
        headers: {
          'Authorization': this.authorization,
          'Accept': 'application/json',
          ...(body === undefined ? {} : { 'Content-Type': 'application/json' }),
        },
        body: body === undefined ? undefined : JSON.stringify(body),
      });

      if (!response.ok) {
        throw new ApiError(method, path, response.status, await response.text());
      }

      const text = await response.text();
      return text ? JSON.parse(text) : undefined;
    }, this.maxRetries, this.baseDelayMs);
  }

  readonly workspaces = {
    query: async (): Promise<RemoteWorkspace[]> => {
      return expectArray(await this.request('GET', '/workspaces'), 'workspaces').map(toWorkspace);
    },
    create: async (input: { slug: string; name: string }): Promise<RemoteWorkspace> => {
      return toWorkspace(await this.request('POST', '/workspaces', {
        slug: input.slug,
        name: input.name,
        protected: false,
      }));
    },
    save: async (workspace: RemoteWorkspace): Promise<RemoteWorkspace> => {
      return toWorkspace(await this.request('PUT', `/workspaces/${encodeURIComponent(workspace.id)}`, {
        slug: workspace.slug,
        name: workspace.name,
        protected: workspace.protected,
      }));
    },
  };

  readonly roles = {
    query: async (): Promise<RemoteRoleSummary[]> => {
      return expectArray(await this.request('GET', '/roles'), 'roles').map(toRoleSummary);
    },
    get: async (id: RemoteId): Promise<RemoteRole> => {
      return toRole(await this.request('GET', `/roles/${encodeURIComponent(id)}`));
    },
    create: async (input: { name: string; permissions: RolePermissionDocument }): Promise<RemoteRole> => {
      return toRole(await this.request('POST', '/roles', {
        name: input.name,
        permissions: input.permissions,
      }));
    },
    save: async (role: RemoteRole): Promise<RemoteRole> => {
      return toRole(await this.request('PUT', `/roles/${encodeURIComponent(role.id)}`, {
        name: role.name,
        permissions: role.permissions,
      }));
    },
  };

  readonly users = {
    query: async (): Promise<RemoteUser[]> => {
      return expectArray(await this.request('GET', '/users'), 'users').map(toUser);
    },
    get: async (id: RemoteId): Promise<RemoteUser> => {
      return toUser(await this.request('GET', `/users/${encodeURIComponent(id)}`));
    },
    create: async (input: { email: string; name: string; active: boolean; roleId: RemoteId }): Promise<RemoteUser> => {
      return toUser(await this.request('POST', '/users', {
        email: input.email,
        name: input.name,
        active: input.active,
        role_id: input.roleId,
      }));
    },
    save: async (user: RemoteUser): Promise<RemoteUser> => {
      return toUser(await this.request('PUT', `/users/${encodeURIComponent(user.id)}`, {
        email: user.email,
        name: user.name,
        active: user.active,
        role_id: user.roleId,
      }));
    },
  };
}

import { existsSync, readFileSync } from 'node:fs';
import { ConfigError } from './errors.js';

export type WorkspaceColumn = 'slug' | 'name';
export type UserColumn = 'workspace' | 'name' | 'email' | 'role' | 'active';

export type ColumnOptions = {
  workspaces: Record<WorkspaceColumn, string>;
  users: Record<UserColumn, string>;
};

export type DataLayout = {
  /** Workbook (directory of CSV sheets) holding the `Workspaces` sheet */
  workspacesFile: string;
  /** Workbook with one sheet per role template */
  rolesFile: string;
  /** Directory of user workbooks, each with a `Users` sheet */
  usersDirectory: string;
};

export const WORKSPACES_SHEET = 'Workspaces';
export const USERS_SHEET = 'Users';

export const DEFAULT_LAYOUT: DataLayout = {
  workspacesFile: 'workspaces',
  rolesFile: 'roles',
  usersDirectory: 'users',
};

export const DEFAULT_COLUMNS: ColumnOptions = {
  workspaces: {
    slug: 'Slug',
    name: 'Name',
  },
  users: {
    workspace: 'Workspace',
    name: 'Name',
    email: 'Email',
    role: 'Role',
    active: 'Active',
  },
};

export type ApiCredentials = {
  id: string;
  secret: string;
};

/** Read an API credentials file (`{ "id": ..., "secret": ... }`) */
export function readCredentials(filePath: string): ApiCredentials {
  if (!existsSync(filePath)) {
    throw new ConfigError(`Credentials file not found: ${filePath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (err) {
    throw new ConfigError(
      `Failed to read credentials file: ${filePath}`,
      err instanceof Error ? err.message : String(err)
    );
  }

  if (typeof parsed !== 'object' || parsed === null) {
    throw new ConfigError(`Invalid credentials file: ${filePath}`, 'Expected a JSON object');
  }
  const id = 'id' in parsed ? parsed.id : undefined;
  const secret = 'secret' in parsed ? parsed.secret : undefined;
  if (typeof id !== 'string' || id.trim() === '' || typeof secret !== 'string' || secret.trim() === '') {
    throw new ConfigError(`Invalid credentials file: ${filePath}`, "Both 'id' and 'secret' must be provided");
  }
  return { id, secret };
}

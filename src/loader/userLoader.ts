import { cellText, isBlank, parseFlag } from '../boolean.js';
import { USERS_SHEET, type UserColumn } from '../config.js';
import { SheetNotFoundError, UserRowError } from '../errors.js';
import { resolveHeaders, type ColumnSpec } from '../tabular/headerResolver.js';
import type { Workbook } from '../tabular/csvWorkbook.js';
import type { RoleTemplate, User, Workspace } from '../types.js';

/** Field order used when reporting the first missing value of a row */
const USER_FIELDS: readonly UserColumn[] = ['workspace', 'name', 'email', 'role', 'active'];

type UserRow = {
  workspace: string;
  name: string;
  email: string;
  role: string;
  active: boolean;
};

export interface UserLoadOptions {
  workbooks: Workbook[];
  columns: ColumnSpec<UserColumn>;
  workspaces: ReadonlyMap<string, Workspace>;
  roleTemplates: ReadonlyMap<string, RoleTemplate>;
}

export interface UserLoadResult {
  users: Map<string, User>;
  warnings: string[];
}

function titleCase(field: string): string {
  return field.charAt(0).toUpperCase() + field.slice(1);
}

/**
 * Merge user declarations from every user workbook, keyed by email.
 *
 * A user may appear in several files and workspaces, but always with the same
 * role template and at most once per workspace.
 */
export function loadUsers(options: UserLoadOptions): UserLoadResult {
  const { workbooks, columns, workspaces, roleTemplates } = options;
  const users = new Map<string, User>();
  const warnings: string[] = [];

  for (const workbook of workbooks) {
    const file = workbook.source;
    const sheet = workbook.sheet(USERS_SHEET);
    if (!sheet) {
      throw new SheetNotFoundError(file, USERS_SHEET, `Failed to parse users from '${file}'`);
    }

    const [header = [], ...rows] = sheet.rows;
    const headers = resolveHeaders(file, header, columns);

    rows.forEach((cells, index) => {
      const rowNumber = index + 2;

      const missing = USER_FIELDS.filter(field => isBlank(headers.read(cells, field)));
      if (missing.length === USER_FIELDS.length) return;
      if (missing.length > 0) {
        throw new UserRowError(
          'incomplete',
          file,
          rowNumber,
          `User is missing '${titleCase(missing[0])}' value in row ${rowNumber}`
        );
      }

      const row: UserRow = {
        workspace: cellText(headers.read(cells, 'workspace')).toLowerCase(),
        name: cellText(headers.read(cells, 'name')),
        email: cellText(headers.read(cells, 'email')).toLowerCase(),
        role: cellText(headers.read(cells, 'role')),
        active: parseFlag(headers.read(cells, 'active')),
      };

      if (!workspaces.has(row.workspace)) {
        throw new UserRowError(
          'unknown_workspace',
          file,
          rowNumber,
          `User at row ${rowNumber} references an unknown workspace '${row.workspace}'`
        );
      }
      if (!roleTemplates.has(row.role)) {
        throw new UserRowError(
          'unknown_role',
          file,
          rowNumber,
          `User at row ${rowNumber} references an unknown role template '${row.role}'`
        );
      }

      let user = users.get(row.email);
      if (!user) {
        user = {
          email: row.email,
          name: row.name,
          active: row.active,
          assignments: new Map(),
        };
        users.set(row.email, user);
      } else if (user.name !== row.name || user.active !== row.active) {
        warnings.push(
          `User '${row.email}' at row ${rowNumber} of '${file}' differs in name or active flag ` +
          `from its first declaration, which is kept`
        );
      }

      for (const assignment of user.assignments.values()) {
        if (assignment.roleTemplate !== row.role) {
          throw new UserRowError(
            'conflicting_role',
            file,
            rowNumber,
            `User at row ${rowNumber} has conflicting role assignments of role '${row.role}' ` +
            `and '${assignment.roleTemplate}'\nFirst assigned in '${assignment.sourceFile}'`
          );
        }
      }

      const existing = user.assignments.get(row.workspace);
      if (existing) {
        throw new UserRowError(
          'duplicate_assignment',
          file,
          rowNumber,
          `User at row ${rowNumber} has multiple role assignments for workspace '${row.workspace}'` +
          `\nFirst assigned in '${existing.sourceFile}'`
        );
      }

      user.assignments.set(row.workspace, {
        roleTemplate: row.role,
        sourceFile: file,
        row: rowNumber,
      });
    });
  }

  return { users, warnings };
}

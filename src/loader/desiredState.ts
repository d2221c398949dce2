import path from 'node:path';
import type { ColumnOptions, DataLayout } from '../config.js';
import { CsvWorkbook, openWorkbooks, type Workbook } from '../tabular/csvWorkbook.js';
import type { DesiredState } from '../types.js';
import { loadRoleTemplates } from './roleTemplateLoader.js';
import { loadUsers } from './userLoader.js';
import { loadWorkspaces } from './workspaceLoader.js';

export interface DesiredStateSources {
  workspaces: Workbook;
  roles: Workbook;
  users: Workbook[];
}

/** Assemble the desired state from already opened workbooks */
export function assembleDesiredState(
  sources: DesiredStateSources,
  columns: ColumnOptions
): DesiredState {
  const { workspaces, warnings: workspaceWarnings } = loadWorkspaces(sources.workspaces, columns.workspaces);
  const roleTemplates = loadRoleTemplates(sources.roles);
  const { users, warnings: userWarnings } = loadUsers({
    workbooks: sources.users,
    columns: columns.users,
    workspaces,
    roleTemplates,
  });

  return {
    workspaces,
    roleTemplates,
    users,
    warnings: [...workspaceWarnings, ...userWarnings],
  };
}

/** Open the workbooks of a data directory and assemble the desired state */
export function loadDesiredState(options: {
  dataDir: string;
  layout: DataLayout;
  columns: ColumnOptions;
}): DesiredState {
  const { dataDir, layout, columns } = options;
  return assembleDesiredState(
    {
      workspaces: new CsvWorkbook(path.join(dataDir, layout.workspacesFile)),
      roles: new CsvWorkbook(path.join(dataDir, layout.rolesFile)),
      users: openWorkbooks(path.join(dataDir, layout.usersDirectory)),
    },
    columns
  );
}

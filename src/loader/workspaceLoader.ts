import { cellText } from '../boolean.js';
import { WORKSPACES_SHEET, type WorkspaceColumn } from '../config.js';
import { SheetNotFoundError } from '../errors.js';
import { resolveHeaders, type ColumnSpec } from '../tabular/headerResolver.js';
import type { Workbook } from '../tabular/csvWorkbook.js';
import type { Workspace } from '../types.js';

export interface WorkspaceLoadResult {
  workspaces: Map<string, Workspace>;
  warnings: string[];
}

export function displayName(slug: string, name: string): string {
  return `[${slug.toUpperCase()}] ${name}`;
}

/**
 * Read desired workspaces from the `Workspaces` sheet.
 *
 * Rows missing a slug or a name are skipped. A repeated slug replaces the
 * earlier row (keeping its position) and is reported as a warning.
 */
export function loadWorkspaces(
  workbook: Workbook,
  columns: ColumnSpec<WorkspaceColumn>
): WorkspaceLoadResult {
  const sheet = workbook.sheet(WORKSPACES_SHEET);
  if (!sheet) {
    throw new SheetNotFoundError(
      workbook.source,
      WORKSPACES_SHEET,
      `Failed to read '${workbook.source}' workspace workbook`
    );
  }

  const [header = [], ...rows] = sheet.rows;
  const headers = resolveHeaders(workbook.source, header, columns);

  const workspaces = new Map<string, Workspace>();
  const firstRow = new Map<string, number>();
  const warnings: string[] = [];

  rows.forEach((row, index) => {
    const rowNumber = index + 2;
    const slug = cellText(headers.read(row, 'slug')).toLowerCase();
    const name = cellText(headers.read(row, 'name'));
    if (!slug || !name) return;

    const previous = firstRow.get(slug);
    if (previous !== undefined) {
      warnings.push(
        `Workspace '${slug}' at row ${rowNumber} of '${workbook.source}' overrides row ${previous}`
      );
    } else {
      firstRow.set(slug, rowNumber);
    }
    workspaces.set(slug, { slug, name: displayName(slug, name) });
  });

  return { workspaces, warnings };
}

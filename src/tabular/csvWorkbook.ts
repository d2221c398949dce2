/**
 * CSV-backed workbooks.
 *
 * A workbook is a directory; every `*.csv` file inside it is one sheet, named
 * after the file's base name (`roles/Standard.csv` is sheet "Standard" of
 * workbook "roles"). Sheets are listed in lexical order.
 */

import { existsSync, readFileSync, readdirSync, statSync } from 'node:fs';
import path from 'node:path';
import { parse } from 'csv-parse/sync';
import { ConfigError } from '../errors.js';

export type Cell = string | number | boolean | null;

export interface Sheet {
  name: string;
  /** All rows, header included, as ordered cell values */
  rows: Cell[][];
}

export interface Workbook {
  /** Path or label used in diagnostics */
  readonly source: string;
  sheetNames(): string[];
  sheet(name: string): Sheet | undefined;
}

const CSV_EXTENSION = '.csv';

function toCell(value: string): Cell {
  return value === '' ? null : value;
}

/** Parse CSV text into rows of cells; empty fields become absent cells */
export function parseSheet(name: string, content: string): Sheet {
  const records: string[][] = parse(content, {
    bom: true,
    relax_column_count: true,
    skip_empty_lines: false,
  });
  return {
    name,
    rows: records.map(record => record.map(toCell)),
  };
}

export class CsvWorkbook implements Workbook {
  private readonly files: Map<string, string>;
  private readonly cache = new Map<string, Sheet>();

  constructor(readonly source: string) {
    if (!existsSync(source) || !statSync(source).isDirectory()) {
      throw new ConfigError(`Workbook not found: ${source}`, 'Expected a directory of CSV sheets');
    }
    this.files = new Map<string, string>();
    const sheetFiles = readdirSync(source)
      .filter(file => path.extname(file).toLowerCase() === CSV_EXTENSION)
      .sort();
    for (const file of sheetFiles) {
      const name = path.basename(file, path.extname(file));
      const existing = this.files.get(name);
      if (existing !== undefined) {
        throw new ConfigError(
          `Duplicate sheet '${name}' in workbook: ${source}`,
          `Both '${path.basename(existing)}' and '${file}' define it`
        );
      }
      this.files.set(name, path.join(source, file));
    }
  }

  sheetNames(): string[] {
    return Array.from(this.files.keys());
  }

  sheet(name: string): Sheet | undefined {
    const cached = this.cache.get(name);
    if (cached) return cached;

    const file = this.files.get(name);
    if (!file) return undefined;

    const sheet = parseSheet(name, readFileSync(file, 'utf8'));
    this.cache.set(name, sheet);
    return sheet;
  }
}

/** In-memory workbook, used where sheets are assembled programmatically */
export class MemoryWorkbook implements Workbook {
  private readonly sheets: Map<string, Sheet>;

  constructor(readonly source: string, sheets: Record<string, Cell[][]>) {
    this.sheets = new Map(
      Object.entries(sheets).map(([name, rows]): [string, Sheet] => [name, { name, rows }])
    );
  }

  sheetNames(): string[] {
    return Array.from(this.sheets.keys());
  }

  sheet(name: string): Sheet | undefined {
    return this.sheets.get(name);
  }
}

/**
 * Open every workbook directory inside `directory`, in lexical order,
 * skipping editor lock entries (names starting with `~` or `$`).
 */
export function openWorkbooks(directory: string): Workbook[] {
  if (!existsSync(directory) || !statSync(directory).isDirectory()) {
    throw new ConfigError(`Directory not found: ${directory}`);
  }
  return readdirSync(directory)
    .filter(entry => !entry.startsWith('~') && !entry.startsWith('$'))
    .sort()
    .map(entry => path.join(directory, entry))
    .filter(entryPath => statSync(entryPath).isDirectory())
    .map(entryPath => new CsvWorkbook(entryPath));
}

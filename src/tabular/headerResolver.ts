import { HeaderError } from '../errors.js';
import type { Cell } from './csvWorkbook.js';

/** Logical column key → expected header text */
export type ColumnSpec<K extends string> = Readonly<Record<K, string>>;

function isColumnKey<K extends string>(spec: ColumnSpec<K>, key: string): key is K {
  return Object.prototype.hasOwnProperty.call(spec, key);
}

/** Resolved logical column positions for one sheet */
export class ColumnMap<K extends string> {
  constructor(private readonly indexes: ReadonlyMap<K, number>) {}

  indexOf(key: K): number {
    const index = this.indexes.get(key);
    if (index === undefined) {
      throw new Error(`Column '${key}' was not resolved`);
    }
    return index;
  }

  read(row: readonly Cell[], key: K): Cell {
    return row[this.indexOf(key)] ?? null;
  }
}

function normalize(text: string): string {
  return text.trim().toLowerCase();
}

/**
 * Map logical keys to column indexes of a header row.
 *
 * Header cells match by trimmed, case-insensitive equality, left to right; a
 * column is claimed by the first key whose text it matches.
 */
export function resolveHeaders<K extends string>(
  source: string,
  header: readonly Cell[],
  spec: ColumnSpec<K>
): ColumnMap<K> {
  const expected: Array<[K, string]> = [];
  for (const [key, text] of Object.entries<string>(spec)) {
    if (isColumnKey(spec, key)) {
      expected.push([key, normalize(text)]);
    }
  }

  const indexes = new Map<K, number>();
  header.forEach((value, index) => {
    if (typeof value !== 'string') return;
    const text = normalize(value);
    const match = expected.find(([, head]) => head === text);
    if (!match) return;

    const [key] = match;
    if (indexes.has(key)) {
      throw new HeaderError('duplicate', source, `Duplicate '${text}' columns`);
    }
    indexes.set(key, index);
  });

  for (const [key] of expected) {
    if (!indexes.has(key)) {
      throw new HeaderError('missing', source, `Missing '${key}' column`);
    }
  }

  return new ColumnMap(indexes);
}

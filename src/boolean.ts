import type { Cell } from './tabular/csvWorkbook.js';

/** Lenient flag coercion: "true"/"yes" (any case) or a boolean true cell; everything else is false */
export function parseFlag(value: Cell): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value !== 'string') return false;
  const str = value.trim().toLowerCase();
  return str === 'true' || str === 'yes';
}

/** Strict grant: only "yes" (any case) */
export function isYes(value: Cell): boolean {
  return typeof value === 'string' && value.trim().toLowerCase() === 'yes';
}

export function isBlank(val: Cell | undefined): boolean {
  if (val === undefined || val === null) return true;
  if (typeof val === 'string' && val.trim() === '') return true;
  return false;
}

/** Trimmed text of a non-blank cell */
export function cellText(val: Cell | undefined): string {
  if (val === undefined || val === null) return '';
  return String(val).trim();
}

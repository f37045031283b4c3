/**
 * Contact Row Normalization
 *
 * Runs once at ingestion, for every reader:
 * - null / undefined / NaN / empty cells become ''
 * - numbers, booleans and dates are stringified
 * - values and header names are trimmed; columns with a blank header are dropped
 * - rows with no non-blank value are dropped
 * - a missing `email` column yields email ''
 */

import { ContactRecordSchema } from './types.js';
import type { ContactRecord, RawContactRow } from './types.js';

function normalizeValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'number') return Number.isNaN(value) ? '' : String(value);
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? '' : value.toISOString();
  if (typeof value === 'string') return value.trim();
  return String(value).trim();
}

export function normalizeRow(raw: RawContactRow): ContactRecord {
  // fromEntries defines own properties, so a column headed "__proto__" survives
  const fields: Record<string, string> = Object.fromEntries(
    Object.entries(raw)
      .map(([key, value]): [string, string] => [key.trim(), normalizeValue(value)])
      .filter(([name]) => name !== ''),
  );

  const record: ContactRecord = { ...fields, email: fields.email ?? '' };
  ContactRecordSchema.parse(record);
  return record;
}

export function isBlankRecord(record: ContactRecord): boolean {
  return Object.values(record).every((value) => value === '');
}

/**
 * Normalizes reader output into the ordered ContactRecord sequence the batch
 * consumes. Blank rows are dropped; order is kept.
 */
export function normalizeRows(rows: RawContactRow[]): ContactRecord[] {
  return rows.map(normalizeRow).filter((record) => !isBlankRecord(record));
}

/** Zips a header row with a value row, ignoring values past the header. */
export function rowFromCells(headers: readonly string[], cells: readonly unknown[]): RawContactRow {
  return Object.fromEntries(headers.map((header, index): [string, unknown] => [header, cells[index]]));
}

/**
 * Contact Record Types
 *
 * A ContactRecord is one spreadsheet row keyed by header name. Every value is a
 * string (blank cells become ''), and the `email` key is always present after
 * normalization so downstream code never has to check for it.
 */

import { z } from 'zod';

export const ContactRecordSchema = z
  .object({
    email: z.string(),
  })
  .catchall(z.string());

export type ContactRecord = Readonly<z.infer<typeof ContactRecordSchema>>;

/** A raw row as a reader produced it, before normalization. */
export type RawContactRow = Record<string, unknown>;

/** Field lookup that treats absent keys as blank. */
export function field(record: ContactRecord, name: string): string {
  return record[name] ?? '';
}

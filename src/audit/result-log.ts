/**
 * Draft Result Log
 *
 * Append-only CSV audit trail, one row per contact that had an email address:
 *   email,company,first_name,subject,draft_id,status
 *
 * The header is written when the file does not exist yet. Single writer only;
 * the batch appends sequentially and nothing else touches the file.
 */

import { constants, existsSync } from 'node:fs';
import { access, appendFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { stringify } from 'csv-stringify/sync';

export const AUDIT_HEADER = ['email', 'company', 'first_name', 'subject', 'draft_id', 'status'] as const;

export type AuditStatus = 'success' | 'error';

export interface AuditRow {
  email: string;
  company: string;
  firstName: string;
  subject: string;
  draftId: string;
  status: AuditStatus;
}

function toCells(row: AuditRow): string[] {
  return [row.email, row.company, row.firstName, row.subject, row.draftId, row.status];
}

export async function logResult(path: string, row: AuditRow): Promise<void> {
  const records: string[][] = existsSync(path) ? [] : [[...AUDIT_HEADER]];
  records.push(toCells(row));
  await appendFile(path, stringify(records), 'utf-8');
}

/**
 * Rejects when the log cannot be appended to (or created, for a new file).
 * Runs before sign-in so a bad path never leaves drafts without audit rows.
 */
export async function assertLogWritable(path: string): Promise<void> {
  await access(existsSync(path) ? path : dirname(path), constants.W_OK);
}

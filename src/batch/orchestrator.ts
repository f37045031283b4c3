/**
 * Batch Orchestrator
 *
 * Checks the audit log is writable and authenticates once, then walks the
 * contact list in order:
 * 1. Render subject + body
 * 2. No email -> print a skip notice and move on (no audit row, no pause)
 * 3. Append the AI personalization (when enabled)
 * 4. Create the Graph draft
 * 5. Append the audit row, whatever the outcome (a failed write is reported)
 * 6. Pause before the next contact, unless this was the last one
 *
 * Only an unwritable log or an authentication failure stops the run, and both
 * are detected before any draft exists. Every per-contact failure is contained
 * to that contact.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { assertLogWritable, logResult, type AuditRow } from '../audit/index.js';
import type { SessionProvider } from '../auth/index.js';
import { field, type ContactRecord } from '../contacts/index.js';
import { buildRenderContext, createDraft, tryRenderTemplate } from '../email/index.js';
import { failure } from '../failures.js';
import { generatePersonalization } from '../personalization/index.js';
import type { BatchOptions, BatchOutcome, BatchSummary, ContactOutcome } from './types.js';

function defaultSleep(ms: number): Promise<void> {
  return delay(ms);
}

interface ProcessedContact {
  outcome: ContactOutcome;
  warnings: number;
  /** False when the audit row for a submitted contact could not be written */
  logged: boolean;
}

async function writeAuditRow(path: string, row: AuditRow, rowNumber: number): Promise<boolean> {
  try {
    await logResult(path, row);
    return true;
  } catch (err) {
    console.error(
      `[batch] Row ${rowNumber}: could not write audit row: ${err instanceof Error ? err.message : String(err)}`,
      { status: row.status, draftId: row.draftId },
    );
    return false;
  }
}

async function processContact(
  record: ContactRecord,
  rowNumber: number,
  credentials: SessionProvider,
  options: BatchOptions,
): Promise<ProcessedContact> {
  let warnings = 0;

  const context = buildRenderContext(record, options.sender);
  const subject = tryRenderTemplate(options.templates.subject, context);
  const body = tryRenderTemplate(options.templates.body, context);
  if (subject.failure) warnings++;
  if (body.failure) warnings++;

  const email = record.email;
  if (!email) {
    console.log(`[batch] Row ${rowNumber}: no email address, skipping`);
    return {
      outcome: { status: 'skipped', failure: failure('missing-email', `Row ${rowNumber} has no email`) },
      warnings,
      logged: true,
    };
  }

  let text = body.text;
  if (options.personalize) {
    const personalization = await generatePersonalization(record);
    if (personalization.failure) warnings++;
    text += personalization.suffix;
  }

  console.log(`[batch] Row ${rowNumber}: creating draft`, { recipientDomain: email.split('@')[1] ?? '' });
  const result = await createDraft(credentials.session, email, subject.text, text);

  const logged = await writeAuditRow(
    options.logPath,
    {
      email,
      company: field(record, 'company'),
      firstName: field(record, 'first_name'),
      subject: subject.text,
      draftId: result.ok ? result.draftId : '',
      status: result.ok ? 'success' : 'error',
    },
    rowNumber,
  );

  if (result.ok) {
    console.log(`[batch] Row ${rowNumber}: draft created`, { draftId: result.draftId });
    return { outcome: { status: 'success', draftId: result.draftId }, warnings, logged };
  }

  console.error(`[batch] Row ${rowNumber}: draft creation failed: ${result.failure.message}`);
  return { outcome: { status: 'error', failure: result.failure }, warnings, logged };
}

export async function runBatch(
  contacts: readonly ContactRecord[],
  credentials: SessionProvider,
  options: BatchOptions,
): Promise<BatchOutcome> {
  try {
    await assertLogWritable(options.logPath);
  } catch (err) {
    const message = `Cannot write audit log '${options.logPath}': ${err instanceof Error ? err.message : String(err)}`;
    console.error(message);
    return { status: 'log-unavailable', failure: failure('audit', message) };
  }

  if (!(await credentials.authenticate())) {
    console.error('Authentication failed. Exiting.');
    return {
      status: 'auth-failed',
      failure: failure('authentication', 'Could not acquire a Microsoft Graph access token'),
    };
  }
  console.log('[batch] Authentication successful', { contacts: contacts.length });

  const sleep = options.sleep ?? defaultSleep;
  const summary: BatchSummary = {
    total: contacts.length,
    created: 0,
    failed: 0,
    skipped: 0,
    warnings: 0,
    unlogged: 0,
  };

  for (const [index, record] of contacts.entries()) {
    const { outcome, warnings, logged } = await processContact(record, index + 1, credentials, options);
    summary.warnings += warnings;
    if (!logged) summary.unlogged++;

    if (outcome.status === 'skipped') {
      summary.skipped++;
      continue;
    }
    if (outcome.status === 'success') summary.created++;
    else summary.failed++;

    if (index < contacts.length - 1 && options.delayMs > 0) {
      console.log(`[batch] Waiting ${(options.delayMs / 1000).toFixed(1)} seconds...`);
      await sleep(options.delayMs);
    }
  }

  console.log(`[batch] Processing complete! Check '${options.logPath}' for results.`, summary);
  return { status: 'completed', summary };
}

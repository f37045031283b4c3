#!/usr/bin/env node
/**
 * Application Entry Point
 *
 * Loads contacts from an Excel workbook or a Google Sheet, signs in to
 * Microsoft Graph, and creates one Outlook draft per contact.
 *
 * Exit codes: 0 when the batch ran (even with per-contact failures),
 * 1 when contacts could not be loaded, the audit log is not writable or
 * sign-in failed, 2 on bad arguments.
 *
 * Usage:
 *   Production: node dist/src/index.js --excel contacts.xlsx --sheet Leads ...
 *   Development: npx tsx src/index.ts --excel contacts.xlsx --sheet Leads ...
 */

import { CliUsageError, USAGE, contactSource, isHelpRequested, parseCliArgs, type RunOptions } from './cli.js';
import { appConfig } from './config.js';
import { CredentialManager } from './auth/index.js';
import { readContactsFromExcel, readContactsFromGoogleSheet, type ContactRecord } from './contacts/index.js';
import { loadTemplates } from './email/index.js';
import { runBatch } from './batch/index.js';

async function loadContacts(options: RunOptions): Promise<ContactRecord[]> {
  const source = contactSource(options);
  return source.kind === 'excel'
    ? readContactsFromExcel(source.path, source.sheet)
    : readContactsFromGoogleSheet(source.spreadsheetId, source.sheet, appConfig.sheets);
}

async function main(argv: string[]): Promise<number> {
  if (isHelpRequested(argv)) {
    console.log(USAGE);
    return 0;
  }

  let options: RunOptions;
  try {
    options = parseCliArgs(argv);
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(`Error: ${err.message}\n\n${USAGE}`);
      return 2;
    }
    throw err;
  }

  const templates = await loadTemplates({ subject: options.subjectTemplate, body: options.bodyTemplate });
  const contacts = await loadContacts(options);
  console.log(`Loaded ${contacts.length} contacts`);

  const credentials = new CredentialManager({
    clientId: options.clientId,
    authority: appConfig.auth.authority,
    scopes: appConfig.auth.scopes,
    tokenCachePath: appConfig.auth.tokenCachePath,
    deviceCodeTimeoutSeconds: appConfig.auth.deviceCodeTimeoutSeconds,
    openBrowser: options.openBrowser,
  });

  const outcome = await runBatch(contacts, credentials, {
    templates,
    sender: { name: options.fromName, email: options.fromEmail },
    logPath: options.logCsv,
    delayMs: options.delayMs,
    personalize: options.aiPersonalize,
  });

  return outcome.status === 'completed' ? 0 : 1;
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error('Error:', err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });

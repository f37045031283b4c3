/**
 * Command-Line Options
 *
 * Accepts --flag value and --flag=value. Underscores in flag names are read
 * as dashes, so the long-standing --from_name / --log_csv spellings work.
 */

import { z } from 'zod';
import { appConfig } from './config.js';

export const USAGE = `Usage: contact-drafts (--excel <file> | --google-sheet <id>) --sheet <name>
       --from-name <name> --from-email <email> --log-csv <file>
       [--delay-ms <ms>] [--ai-personalize] [--client-id <id>]
       [--subject-template <file>] [--body-template <file>] [--open-browser]`;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

const BOOLEAN_FLAGS = new Set(['ai-personalize', 'open-browser', 'help']);
const VALUE_FLAGS = new Set([
  'excel',
  'google-sheet',
  'sheet',
  'from-name',
  'from-email',
  'delay-ms',
  'log-csv',
  'client-id',
  'subject-template',
  'body-template',
]);

const RunOptionsSchema = z
  .object({
    excel: z.string().min(1).optional(),
    googleSheet: z.string().min(1).optional(),
    sheet: z.string().min(1, '--sheet is required'),
    fromName: z.string().min(1, '--from-name is required'),
    fromEmail: z.string().min(1, '--from-email is required'),
    delayMs: z.coerce.number().int().nonnegative(),
    logCsv: z.string().min(1, '--log-csv is required'),
    aiPersonalize: z.boolean(),
    clientId: z.string().min(1, '--client-id is required (or set AZURE_CLIENT_ID)'),
    subjectTemplate: z.string().min(1).optional(),
    bodyTemplate: z.string().min(1).optional(),
    openBrowser: z.boolean(),
  })
  .refine((opts) => Boolean(opts.excel) !== Boolean(opts.googleSheet), {
    message: 'Provide exactly one of --excel or --google-sheet',
  });

export type RunOptions = z.infer<typeof RunOptionsSchema>;

export type ContactSourceOption =
  | { kind: 'excel'; path: string; sheet: string }
  | { kind: 'google-sheet'; spreadsheetId: string; sheet: string };

export function contactSource(options: RunOptions): ContactSourceOption {
  if (options.excel) return { kind: 'excel', path: options.excel, sheet: options.sheet };
  if (options.googleSheet) {
    return { kind: 'google-sheet', spreadsheetId: options.googleSheet, sheet: options.sheet };
  }
  throw new CliUsageError('Provide exactly one of --excel or --google-sheet');
}

function camelCase(flag: string): string {
  return flag.replace(/-([a-z])/g, (_, letter: string) => letter.toUpperCase());
}

/** Splits argv into flag values; unknown flags and stray positionals are errors. */
function readFlags(argv: readonly string[]): Map<string, string | true> {
  const flags = new Map<string, string | true>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (!arg.startsWith('--')) {
      throw new CliUsageError(`Unexpected argument: ${arg}`);
    }

    const [rawName = '', inlineValue] = arg.slice(2).split(/=(.*)/s, 2);
    const name = rawName.replace(/_/g, '-');

    if (BOOLEAN_FLAGS.has(name)) {
      if (inlineValue !== undefined) throw new CliUsageError(`--${name} does not take a value`);
      flags.set(name, true);
      continue;
    }
    if (!VALUE_FLAGS.has(name)) {
      throw new CliUsageError(`Unknown option: --${rawName}`);
    }

    const value = inlineValue ?? argv[++i];
    if (value === undefined || (inlineValue === undefined && value.startsWith('--'))) {
      throw new CliUsageError(`--${name} needs a value`);
    }
    flags.set(name, value);
  }

  return flags;
}

export function isHelpRequested(argv: readonly string[]): boolean {
  return argv.includes('--help') || argv.includes('-h');
}

export function parseCliArgs(argv: readonly string[]): RunOptions {
  const flags = readFlags(argv);
  const values: Record<string, string | boolean | undefined> = {};
  for (const [name, value] of flags) {
    values[camelCase(name)] = value;
  }

  const parsed = RunOptionsSchema.safeParse({
    ...values,
    sheet: values.sheet ?? '',
    fromName: values.fromName ?? '',
    fromEmail: values.fromEmail ?? '',
    logCsv: values.logCsv ?? '',
    delayMs: values.delayMs ?? appConfig.drafts.delayMs,
    clientId: values.clientId ?? appConfig.auth.clientId ?? '',
    aiPersonalize: values.aiPersonalize === true,
    openBrowser: values.openBrowser === true,
  });

  if (!parsed.success) {
    const messages = parsed.error.issues.map((issue) =>
      issue.path.length > 0 && issue.code !== 'too_small' ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    );
    throw new CliUsageError(messages.join('\n'));
  }
  return parsed.data;
}

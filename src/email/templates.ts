/**
 * Draft Templates
 *
 * Built-in subject and body templates, overridable per run with
 * --subject-template / --body-template files. Placeholders use {{ field }}
 * syntax and may reference any spreadsheet column plus from_name / from_email.
 */

import { readFile } from 'node:fs/promises';
import type { DraftTemplates } from './types.js';

export const SUBJECT_TEMPLATE = 'Quick idea for {{ company }}';

export const BODY_TEMPLATE = `Hi {{ first_name }},

I came across {{ company }} recently and wanted to reach out. {{ observation }}

Would you be open to a short call next week to see if it's a fit?

Best,
{{ from_name }}
{{ from_email }}`;

export class TemplateFileError extends Error {
  readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = 'TemplateFileError';
    this.path = path;
  }
}

async function readTemplateFile(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (err) {
    throw new TemplateFileError(
      `Could not read template '${path}': ${err instanceof Error ? err.message : String(err)}`,
      path,
    );
  }
}

/**
 * Resolves the template pair for a run. A trailing newline in a subject file
 * is dropped, since Graph subjects are single-line.
 */
export async function loadTemplates(paths: { subject?: string; body?: string } = {}): Promise<DraftTemplates> {
  const subject = paths.subject ? (await readTemplateFile(paths.subject)).trim() : SUBJECT_TEMPLATE;
  const body = paths.body ? await readTemplateFile(paths.body) : BODY_TEMPLATE;
  return { subject, body };
}

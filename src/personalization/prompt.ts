/**
 * Personalization Prompt
 *
 * One user-role prompt built from a handful of contact fields. Each field is
 * capped so a long spreadsheet note cannot blow up the request.
 */

import { field, type ContactRecord } from '../contacts/index.js';

export const MAX_FIELD_LENGTH = 200;
export const MAX_SUFFIX_LENGTH = 200;

function bounded(record: ContactRecord, name: string): string {
  return field(record, name).slice(0, MAX_FIELD_LENGTH);
}

export function buildPersonalizationPrompt(record: ContactRecord): string {
  return [
    'Based on this contact info, write a brief, personalized sentence (max 35 words) to add to a cold email:',
    `Name: ${bounded(record, 'first_name')} ${bounded(record, 'last_name')}`.trimEnd(),
    `Company: ${bounded(record, 'company')}`,
    `Role: ${bounded(record, 'role')}`,
    `Observation: ${bounded(record, 'observation')}`,
    '',
    'Write a natural, genuine-sounding personalization:',
  ].join('\n');
}

/**
 * Turns a completion into the text appended to the body: trimmed, capped at
 * MAX_SUFFIX_LENGTH with a trailing ellipsis, and separated by a blank line.
 */
export function formatSuffix(completion: string): string {
  const text = completion.trim();
  if (!text) return '';
  const capped = text.length > MAX_SUFFIX_LENGTH ? `${text.slice(0, MAX_SUFFIX_LENGTH - 3)}...` : text;
  return `\n\n${capped}`;
}

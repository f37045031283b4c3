/**
 * Template Renderer
 *
 * Renders {{ field }} placeholders with nunjucks against a contact record.
 * Output is plain text, so autoescaping is off. Unknown placeholders render
 * as ''. A template that fails to parse or render is logged and returned
 * verbatim; rendering never throws to the caller.
 */

import nunjucks from 'nunjucks';
import type { ContactRecord } from '../contacts/index.js';
import { failure } from '../failures.js';
import type { RenderedMessage, RenderResult, SenderIdentity, DraftTemplates } from './types.js';

const env = new nunjucks.Environment(null, {
  autoescape: false,
  throwOnUndefined: false,
});

export type RenderContext = Readonly<Record<string, string>>;

/** Sender fields first so a spreadsheet column of the same name wins. */
export function buildRenderContext(record: ContactRecord, sender?: SenderIdentity): RenderContext {
  return {
    from_name: sender?.name ?? '',
    from_email: sender?.email ?? '',
    ...record,
  };
}

export function tryRenderTemplate(template: string, context: RenderContext): RenderResult {
  try {
    return { text: env.renderString(template, { ...context }) };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[render] Template rendering error: ${message}`);
    return { text: template, failure: failure('render', message) };
  }
}

export function renderTemplate(template: string, context: RenderContext): string {
  return tryRenderTemplate(template, context).text;
}

export function renderMessage(
  templates: DraftTemplates,
  record: ContactRecord,
  sender?: SenderIdentity,
): RenderedMessage {
  const context = buildRenderContext(record, sender);
  return {
    subject: renderTemplate(templates.subject, context),
    body: renderTemplate(templates.body, context),
  };
}

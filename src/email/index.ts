// ============================================================================
// Email Module — Barrel Export
// ============================================================================
//
// Public API for template rendering and Graph draft creation.

export type {
  DraftTemplates,
  RenderedMessage,
  RenderResult,
  SenderIdentity,
  SubmissionResult,
  GraphDraftMessage,
} from './types.js';

export { SUBJECT_TEMPLATE, BODY_TEMPLATE, TemplateFileError, loadTemplates } from './templates.js';
export { buildRenderContext, renderMessage, renderTemplate, tryRenderTemplate } from './render.js';
export type { RenderContext } from './render.js';
export { buildDraftMessage, createDraft } from './graph-client.js';

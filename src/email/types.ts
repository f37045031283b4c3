/**
 * Email Module Type Definitions
 *
 * Types for:
 * - Subject/body template pair (DraftTemplates)
 * - Rendered message for one contact (RenderedMessage)
 * - Graph draft creation outcome (SubmissionResult)
 */

import type { PipelineFailure } from '../failures.js';

// ---------------------------------------------------------------------------
// Templates & Rendering
// ---------------------------------------------------------------------------

export interface DraftTemplates {
  subject: string;
  body: string;
}

export interface RenderedMessage {
  subject: string;
  body: string;
}

/** Sender details exposed to templates as from_name / from_email. */
export interface SenderIdentity {
  name: string;
  email: string;
}

/** Rendered text, plus the failure when the raw template was returned instead. */
export interface RenderResult {
  text: string;
  failure?: PipelineFailure<'render'>;
}

// ---------------------------------------------------------------------------
// Graph Draft Submission
// ---------------------------------------------------------------------------

export type SubmissionResult =
  | { ok: true; draftId: string }
  | { ok: false; failure: PipelineFailure<'submission'> };

/** Microsoft Graph message resource, limited to the fields a draft needs. */
export interface GraphDraftMessage {
  subject: string;
  body: {
    contentType: 'Text';
    content: string;
  };
  toRecipients: Array<{
    emailAddress: { address: string };
  }>;
}

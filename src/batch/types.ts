/**
 * Batch Type Definitions
 */

import type { DraftTemplates, SenderIdentity } from '../email/index.js';
import type { PipelineFailure } from '../failures.js';

export interface BatchOptions {
  templates: DraftTemplates;
  sender: SenderIdentity;
  /** CSV audit log path */
  logPath: string;
  /** Pause between contacts that were submitted */
  delayMs: number;
  personalize: boolean;
  /** Injected in tests; defaults to a timer-based pause */
  sleep?: (ms: number) => Promise<void>;
}

/** What happened to one contact. */
export type ContactOutcome =
  | { status: 'skipped'; failure: PipelineFailure<'missing-email'> }
  | { status: 'success'; draftId: string }
  | { status: 'error'; failure: PipelineFailure<'submission'> };

export interface BatchSummary {
  total: number;
  created: number;
  failed: number;
  skipped: number;
  /** Render and personalization problems that were recovered from */
  warnings: number;
  /** Drafts (created or failed) whose audit row could not be written */
  unlogged: number;
}

export type BatchOutcome =
  | { status: 'completed'; summary: BatchSummary }
  | { status: 'auth-failed'; failure: PipelineFailure<'authentication'> }
  | { status: 'log-unavailable'; failure: PipelineFailure<'audit'> };

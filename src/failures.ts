// ============================================================================
// Pipeline Failure Taxonomy
// ============================================================================
//
// Every per-contact step reports failure as a value of this shape instead of
// throwing. Only 'authentication' and 'audit' (log not writable at start) stop
// a batch; the rest are contained to the contact (and step) that produced them.

export type PipelineFailureKind =
  | 'authentication'
  | 'render'
  | 'augmentation'
  | 'submission'
  | 'missing-email'
  | 'audit';

export interface PipelineFailure<K extends PipelineFailureKind = PipelineFailureKind> {
  kind: K;
  message: string;
}

export function failure<K extends PipelineFailureKind>(kind: K, message: string): PipelineFailure<K> {
  return { kind, message };
}


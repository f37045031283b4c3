export { runBatch } from './orchestrator.js';
export type { BatchOptions, BatchOutcome, BatchSummary, ContactOutcome } from './types.js';

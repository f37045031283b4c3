export { AUDIT_HEADER, assertLogWritable, logResult } from './result-log.js';
export type { AuditRow, AuditStatus } from './result-log.js';

// ============================================================================
// Contacts Module — Barrel Export
// ============================================================================

export type { ContactRecord, RawContactRow } from './types.js';
export { ContactRecordSchema, field } from './types.js';
export { normalizeRow, normalizeRows } from './normalize.js';
export { ContactSourceError } from './errors.js';
export { readContactsFromExcel } from './excel-reader.js';
export { readContactsFromGoogleSheet } from './sheets-reader.js';
export type { SheetsCredentials } from './sheets-client.js';

/**
 * Thrown when a contact source cannot be read at all (missing file, unknown
 * sheet, unreadable workbook). Aborts the run before any contact is processed.
 */
export class ContactSourceError extends Error {
  readonly source: string;

  constructor(message: string, source: string) {
    super(message);
    this.name = 'ContactSourceError';
    this.source = source;
  }
}

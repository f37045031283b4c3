/**
 * Google Sheets Contact Reader
 *
 * Reads a whole tab of a spreadsheet (range = tab name) using formatted
 * values, so cells arrive as the text shown in the Sheets UI. Row 1 is the
 * header, same as the Excel reader.
 */

import { createSheetsClient, type SheetsCredentials } from './sheets-client.js';
import { ContactSourceError } from './errors.js';
import { normalizeRows, rowFromCells } from './normalize.js';
import type { ContactRecord } from './types.js';

/** Quotes a tab name for A1 notation ("Q3 Leads" -> "'Q3 Leads'"). */
export function sheetRange(sheetName: string): string {
  return `'${sheetName.replace(/'/g, "''")}'`;
}

export async function readContactsFromGoogleSheet(
  spreadsheetId: string,
  sheetName: string,
  credentials: SheetsCredentials,
): Promise<ContactRecord[]> {
  const sheets = createSheetsClient(credentials);

  let values: unknown[][];
  try {
    const response = await sheets.spreadsheets.values.get({
      spreadsheetId,
      range: sheetRange(sheetName),
      valueRenderOption: 'FORMATTED_VALUE',
    });
    values = response.data.values ?? [];
  } catch (err) {
    throw new ContactSourceError(
      `Error reading sheet '${sheetName}': ${err instanceof Error ? err.message : String(err)}`,
      spreadsheetId,
    );
  }

  const [headerRow, ...dataRows] = values;
  if (!headerRow) {
    console.warn('[contacts] Sheet is empty', { sheet: sheetName });
    return [];
  }

  const headers = headerRow.map((cell) => (cell === null || cell === undefined ? '' : String(cell)));
  const contacts = normalizeRows(dataRows.map((cells) => rowFromCells(headers, cells)));

  console.log('[contacts] Loaded Google Sheet tab', {
    sheet: sheetName,
    columns: headers.filter(Boolean).length,
    contacts: contacts.length,
  });
  return contacts;
}

/**
 * Excel Contact Reader
 *
 * Reads one worksheet of a local .xlsx workbook. Row 1 is the header; each
 * following non-empty row becomes a ContactRecord. Cells are read through
 * exceljs's display text, so hyperlinked addresses and formula results come
 * through as the text a user sees in Excel.
 */

import { access } from 'node:fs/promises';
import ExcelJS from 'exceljs';
import { ContactSourceError } from './errors.js';
import { normalizeRows } from './normalize.js';
import type { ContactRecord, RawContactRow } from './types.js';

export async function readContactsFromExcel(filePath: string, sheetName: string): Promise<ContactRecord[]> {
  try {
    await access(filePath);
  } catch {
    throw new ContactSourceError(`Excel file '${filePath}' not found`, filePath);
  }

  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.readFile(filePath);
  } catch (err) {
    throw new ContactSourceError(
      `Error reading Excel file: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
    );
  }

  const worksheet = workbook.getWorksheet(sheetName);
  if (!worksheet) {
    const available = workbook.worksheets.map((ws) => ws.name).join(', ');
    throw new ContactSourceError(
      `Sheet '${sheetName}' not found in ${filePath} (available: ${available || 'none'})`,
      filePath,
    );
  }

  const headers = new Map<number, string>();
  worksheet.getRow(1).eachCell({ includeEmpty: false }, (cell, colNumber) => {
    headers.set(colNumber, cell.text);
  });

  const rows: RawContactRow[] = [];
  worksheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
    if (rowNumber === 1) return;
    const raw: RawContactRow = {};
    for (const [colNumber, header] of headers) {
      raw[header] = row.getCell(colNumber).text;
    }
    rows.push(raw);
  });

  const contacts = normalizeRows(rows);
  console.log('[contacts] Loaded workbook sheet', {
    sheet: sheetName,
    columns: headers.size,
    contacts: contacts.length,
  });
  return contacts;
}

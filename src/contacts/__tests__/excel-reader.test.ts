/**
 * Excel Reader Tests
 *
 * Builds real .xlsx workbooks in a temp directory with exceljs, then reads
 * them back through readContactsFromExcel.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import ExcelJS from 'exceljs';
import { readContactsFromExcel } from '../excel-reader.js';
import { ContactSourceError } from '../errors.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'contacts-excel-'));
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dir, { recursive: true, force: true });
});

async function writeWorkbook(sheetName: string, rows: unknown[][]): Promise<string> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(sheetName);
  for (const row of rows) {
    sheet.addRow(row);
  }
  const path = join(dir, 'contacts.xlsx');
  await workbook.xlsx.writeFile(path);
  return path;
}

describe('readContactsFromExcel', () => {
  it('maps header names to fields for every data row', async () => {
    const path = await writeWorkbook('Leads', [
      ['email', 'first_name', 'company'],
      ['ann@example.com', 'Ann', 'Acme'],
      ['bo@example.com', 'Bo', 'Globex'],
    ]);

    const contacts = await readContactsFromExcel(path, 'Leads');

    expect(contacts).toEqual([
      { email: 'ann@example.com', first_name: 'Ann', company: 'Acme' },
      { email: 'bo@example.com', first_name: 'Bo', company: 'Globex' },
    ]);
  });

  it('normalizes empty cells and numbers', async () => {
    const path = await writeWorkbook('Leads', [
      ['email', 'company', 'employees'],
      ['', 'Acme', 250],
    ]);

    const contacts = await readContactsFromExcel(path, 'Leads');

    expect(contacts).toEqual([{ email: '', company: 'Acme', employees: '250' }]);
  });

  it('reads hyperlinked cells as their display text', async () => {
    const path = await writeWorkbook('Leads', [
      ['email', 'first_name'],
      [{ text: 'ann@example.com', hyperlink: 'mailto:ann@example.com' }, 'Ann'],
    ]);

    const contacts = await readContactsFromExcel(path, 'Leads');

    expect(contacts[0]?.email).toBe('ann@example.com');
  });

  it('throws ContactSourceError for an unknown sheet and lists the available ones', async () => {
    const path = await writeWorkbook('Leads', [['email']]);

    await expect(readContactsFromExcel(path, 'Missing')).rejects.toThrow(
      `Sheet 'Missing' not found in ${path} (available: Leads)`,
    );
  });

  it('throws ContactSourceError when the file does not exist', async () => {
    const path = join(dir, 'nope.xlsx');

    await expect(readContactsFromExcel(path, 'Leads')).rejects.toBeInstanceOf(ContactSourceError);
  });

  it('throws ContactSourceError when the file is not a workbook', async () => {
    const path = join(dir, 'broken.xlsx');
    await writeFile(path, 'not a zip archive');

    await expect(readContactsFromExcel(path, 'Leads')).rejects.toThrow(/^Error reading Excel file:/);
  });
});

/**
 * Google Sheets Reader Tests
 *
 * The Sheets client is mocked; tests cover header mapping, ragged rows, the
 * A1 range quoting and error wrapping.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockValuesGet = vi.hoisted(() => vi.fn());
const mockCreateSheetsClient = vi.hoisted(() =>
  vi.fn((_credentials: unknown) => ({
    spreadsheets: { values: { get: mockValuesGet } },
  })),
);

vi.mock('../sheets-client.js', () => ({
  createSheetsClient: mockCreateSheetsClient,
}));

const CREDENTIALS = { apiKey: 'test-api-key' };

import { readContactsFromGoogleSheet, sheetRange } from '../sheets-reader.js';
import { ContactSourceError } from '../errors.js';

beforeEach(() => {
  vi.clearAllMocks();
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

describe('sheetRange', () => {
  it('quotes the tab name', () => {
    expect(sheetRange('Q3 Leads')).toBe("'Q3 Leads'");
  });

  it('doubles embedded single quotes', () => {
    expect(sheetRange("Bob's list")).toBe("'Bob''s list'");
  });
});

describe('readContactsFromGoogleSheet', () => {
  it('requests the whole tab with formatted values', async () => {
    mockValuesGet.mockResolvedValue({ data: { values: [['email']] } });

    await readContactsFromGoogleSheet('sheet-123', 'Leads', CREDENTIALS);

    expect(mockCreateSheetsClient).toHaveBeenCalledWith(CREDENTIALS);
    expect(mockValuesGet).toHaveBeenCalledWith({
      spreadsheetId: 'sheet-123',
      range: "'Leads'",
      valueRenderOption: 'FORMATTED_VALUE',
    });
  });

  it('maps rows to records and fills short rows with empty strings', async () => {
    mockValuesGet.mockResolvedValue({
      data: {
        values: [
          ['email', 'first_name', 'company'],
          ['ann@example.com', 'Ann', 'Acme'],
          ['bo@example.com', 'Bo'],
          [],
        ],
      },
    });

    const contacts = await readContactsFromGoogleSheet('sheet-123', 'Leads', CREDENTIALS);

    expect(contacts).toEqual([
      { email: 'ann@example.com', first_name: 'Ann', company: 'Acme' },
      { email: 'bo@example.com', first_name: 'Bo', company: '' },
    ]);
  });

  it('returns no contacts for an empty tab', async () => {
    mockValuesGet.mockResolvedValue({ data: {} });

    await expect(readContactsFromGoogleSheet('sheet-123', 'Leads', CREDENTIALS)).resolves.toEqual([]);
  });

  it('wraps API errors in ContactSourceError', async () => {
    mockValuesGet.mockRejectedValue(new Error('Requested entity was not found.'));

    const promise = readContactsFromGoogleSheet('sheet-123', 'Leads', CREDENTIALS);

    await expect(promise).rejects.toBeInstanceOf(ContactSourceError);
    await expect(promise).rejects.toThrow("Error reading sheet 'Leads': Requested entity was not found.");
  });
});

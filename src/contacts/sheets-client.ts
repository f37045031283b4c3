/**
 * Google Sheets Client (read-only)
 *
 * Built per read for the --google-sheet source. Credentials, first match wins:
 * 1. keyFile: path to a service account JSON key (GOOGLE_APPLICATION_CREDENTIALS)
 * 2. serviceAccountKey: the same key, base64-encoded (GOOGLE_SERVICE_ACCOUNT_KEY)
 * 3. apiKey: only reads sheets shared as "anyone with the link" (GOOGLE_SHEETS_API_KEY)
 *
 * A private spreadsheet has to be shared with the service account's email.
 */

import { google, type sheets_v4 } from 'googleapis';
import { GoogleAuth } from 'google-auth-library';
import { z } from 'zod';
import { ContactSourceError } from './errors.js';

export type SheetsClient = sheets_v4.Sheets;

export interface SheetsCredentials {
  keyFile?: string;
  serviceAccountKey?: string;
  apiKey?: string;
}

export const SHEETS_READONLY_SCOPE = 'https://www.googleapis.com/auth/spreadsheets.readonly';

const ServiceAccountKeySchema = z.object({
  client_email: z.string().min(1),
  private_key: z.string().min(1),
});

type ServiceAccountKey = z.infer<typeof ServiceAccountKeySchema>;

function decodeServiceAccountKey(encoded: string): ServiceAccountKey {
  let json: unknown;
  try {
    json = JSON.parse(Buffer.from(encoded, 'base64').toString('utf-8'));
  } catch (err) {
    throw new ContactSourceError(
      `GOOGLE_SERVICE_ACCOUNT_KEY is not base64-encoded JSON: ${err instanceof Error ? err.message : String(err)}`,
      'google-sheets',
    );
  }

  const parsed = ServiceAccountKeySchema.safeParse(json);
  if (!parsed.success) {
    throw new ContactSourceError('GOOGLE_SERVICE_ACCOUNT_KEY needs client_email and private_key', 'google-sheets');
  }
  return parsed.data;
}

/** Service account auth, or the bare API key string googleapis accepts as `auth`. */
export function resolveSheetsAuth(credentials: SheetsCredentials): GoogleAuth | string {
  if (credentials.keyFile) {
    return new GoogleAuth({ keyFile: credentials.keyFile, scopes: [SHEETS_READONLY_SCOPE] });
  }
  if (credentials.serviceAccountKey) {
    const key = decodeServiceAccountKey(credentials.serviceAccountKey);
    return new GoogleAuth({ credentials: key, scopes: [SHEETS_READONLY_SCOPE] });
  }
  if (credentials.apiKey) return credentials.apiKey;

  throw new ContactSourceError(
    'No Google credentials for --google-sheet. Set GOOGLE_APPLICATION_CREDENTIALS, ' +
      'GOOGLE_SERVICE_ACCOUNT_KEY or GOOGLE_SHEETS_API_KEY',
    'google-sheets',
  );
}

export function createSheetsClient(credentials: SheetsCredentials): SheetsClient {
  return google.sheets({ version: 'v4', auth: resolveSheetsAuth(credentials) });
}

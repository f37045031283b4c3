/**
 * Shared Application Configuration
 *
 * Centralizes all environment variable access. CLI flags (src/cli.ts) take
 * precedence over the values here where both exist.
 *
 * Environment variables:
 * - AZURE_CLIENT_ID: Azure AD application (client) ID for the device code flow
 * - TOKEN_CACHE_PATH: Serialized MSAL token cache (default token_cache.bin)
 * - DEVICE_CODE_TIMEOUT_SECONDS: How long to wait for the user to sign in (default 900)
 * - GRAPH_API_BASE: Microsoft Graph base URL (defaults to v1.0)
 * - DRAFT_DELAY_MS: Pause between drafts (default 1000)
 * - PERSONALIZE_PROVIDER: 'openai' (default) or 'gemini'
 * - OPENAI_API_KEY / OPENAI_MODEL: Chat completion credentials and model
 * - GEMINI_API_KEY / GEMINI_MODEL: Gemini credentials and model
 * - PERSONALIZE_TIMEOUT_MS: Timeout for one personalization request (default 10000)
 * - GOOGLE_APPLICATION_CREDENTIALS / GOOGLE_SERVICE_ACCOUNT_KEY / GOOGLE_SHEETS_API_KEY:
 *   Google Sheets source credentials (key file path, base64 key JSON, API key)
 */

import 'dotenv/config';

export type PersonalizationProvider = 'openai' | 'gemini';

export interface AppConfig {
  auth: {
    clientId: string | undefined;
    authority: string;
    scopes: string[];
    tokenCachePath: string;
    deviceCodeTimeoutSeconds: number;
  };
  graph: {
    apiBase: string;
  };
  drafts: {
    delayMs: number;
  };
  personalization: {
    provider: PersonalizationProvider;
    openaiApiKey: string | undefined;
    openaiModel: string;
    geminiApiKey: string | undefined;
    geminiModel: string;
    timeoutMs: number;
    maxTokens: number;
  };
  sheets: {
    keyFile: string | undefined;
    serviceAccountKey: string | undefined;
    apiKey: string | undefined;
  };
}

function optionalEnv(key: string, fallback = ''): string {
  const value = process.env[key]?.trim();
  return value ? value : fallback;
}

function secretEnv(key: string): string | undefined {
  const value = process.env[key]?.trim();
  return value ? value : undefined;
}

function intEnv(key: string, fallback: number): number {
  const parsed = parseInt(optionalEnv(key, String(fallback)), 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    console.warn(`[config] Ignoring invalid ${key}; using ${fallback}`);
    return fallback;
  }
  return parsed;
}

function providerEnv(): PersonalizationProvider {
  const value = optionalEnv('PERSONALIZE_PROVIDER', 'openai').toLowerCase();
  if (value === 'openai' || value === 'gemini') return value;
  console.warn(`[config] Unknown PERSONALIZE_PROVIDER "${value}"; using openai`);
  return 'openai';
}

export const appConfig: AppConfig = {
  auth: {
    clientId: secretEnv('AZURE_CLIENT_ID'),
    authority: 'https://login.microsoftonline.com/common',
    scopes: ['Mail.ReadWrite', 'offline_access'],
    tokenCachePath: optionalEnv('TOKEN_CACHE_PATH', 'token_cache.bin'),
    deviceCodeTimeoutSeconds: intEnv('DEVICE_CODE_TIMEOUT_SECONDS', 900),
  },
  graph: {
    apiBase: optionalEnv('GRAPH_API_BASE', 'https://graph.microsoft.com/v1.0').replace(/\/+$/, ''),
  },
  drafts: {
    delayMs: intEnv('DRAFT_DELAY_MS', 1000),
  },
  personalization: {
    provider: providerEnv(),
    openaiApiKey: secretEnv('OPENAI_API_KEY'),
    openaiModel: optionalEnv('OPENAI_MODEL', 'gpt-3.5-turbo'),
    geminiApiKey: secretEnv('GEMINI_API_KEY'),
    geminiModel: optionalEnv('GEMINI_MODEL', 'gemini-1.5-flash'),
    timeoutMs: intEnv('PERSONALIZE_TIMEOUT_MS', 10_000),
    maxTokens: 50,
  },
  sheets: {
    keyFile: secretEnv('GOOGLE_APPLICATION_CREDENTIALS'),
    serviceAccountKey: secretEnv('GOOGLE_SERVICE_ACCOUNT_KEY'),
    apiKey: secretEnv('GOOGLE_SHEETS_API_KEY'),
  },
};

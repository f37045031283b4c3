/**
 * Microsoft Graph Credential Manager
 *
 * Acquires a delegated Mail.ReadWrite token for the signed-in user:
 * 1. Load the serialized MSAL cache from disk (if any)
 * 2. Silent acquisition with the first cached account (refreshes if needed)
 * 3. Otherwise the device code flow: print the URL + code, wait for sign-in
 *
 * The cache file is overwritten after every successful acquisition. It is the
 * only durable state this module owns.
 */

import { readFile, writeFile } from 'node:fs/promises';
import {
  PublicClientApplication,
  type AuthenticationResult,
  type DeviceCodeRequest,
} from '@azure/msal-node';
import open from 'open';
import { AccessSession, type SessionProvider } from './session.js';

export interface CredentialManagerOptions {
  clientId: string;
  authority: string;
  scopes: string[];
  tokenCachePath: string;
  deviceCodeTimeoutSeconds: number;
  /** Also open the verification URL in the default browser. */
  openBrowser?: boolean;
}

type DeviceCodeResponse = Parameters<DeviceCodeRequest['deviceCodeCallback']>[0];

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class CredentialManager implements SessionProvider {
  readonly session = new AccessSession();
  private readonly app: PublicClientApplication;
  private readonly options: CredentialManagerOptions;

  constructor(options: CredentialManagerOptions) {
    this.options = options;
    this.app = new PublicClientApplication({
      auth: {
        clientId: options.clientId,
        authority: options.authority,
      },
    });
  }

  async authenticate(): Promise<boolean> {
    await this.loadCache();

    const result = (await this.acquireSilently()) ?? (await this.acquireByDeviceCode());
    if (!result?.accessToken) {
      this.session.clear();
      return false;
    }

    this.session.acquire(result.accessToken, result.expiresOn, result.account?.username ?? null);
    await this.saveCache();

    console.log('[auth] Authenticated', {
      expiresOn: result.expiresOn?.toISOString() ?? null,
      fromCache: result.fromCache,
    });
    return true;
  }

  private async loadCache(): Promise<void> {
    let data: string;
    try {
      data = await readFile(this.options.tokenCachePath, 'utf-8');
    } catch (err) {
      if (err !== null && typeof err === 'object' && 'code' in err && err.code === 'ENOENT') return;
      console.warn('[auth] Could not read token cache; signing in again', { error: describeError(err) });
      return;
    }

    try {
      this.app.getTokenCache().deserialize(data);
    } catch (err) {
      console.warn('[auth] Token cache is corrupt; signing in again', { error: describeError(err) });
    }
  }

  private async saveCache(): Promise<void> {
    try {
      await writeFile(this.options.tokenCachePath, this.app.getTokenCache().serialize(), 'utf-8');
    } catch (err) {
      console.warn('[auth] Could not write token cache; next run will sign in again', {
        error: describeError(err),
      });
    }
  }

  private async acquireSilently(): Promise<AuthenticationResult | null> {
    const accounts = await this.app.getTokenCache().getAllAccounts();
    const [account] = accounts;
    if (!account) return null;

    try {
      return await this.app.acquireTokenSilent({ account, scopes: this.options.scopes });
    } catch (err) {
      console.log('[auth] Cached session unusable, falling back to device code sign-in', {
        error: describeError(err),
      });
      return null;
    }
  }

  private async acquireByDeviceCode(): Promise<AuthenticationResult | null> {
    try {
      return await this.app.acquireTokenByDeviceCode({
        scopes: this.options.scopes,
        timeout: this.options.deviceCodeTimeoutSeconds,
        deviceCodeCallback: (response) => this.showDeviceCode(response),
      });
    } catch (err) {
      console.error(`Authentication failed: ${describeError(err)}`);
      return null;
    }
  }

  private showDeviceCode(response: DeviceCodeResponse): void {
    console.log(`To sign in, use a web browser to open the page ${response.verificationUri}`);
    console.log(`Enter the code ${response.userCode} to authenticate.`);

    if (this.options.openBrowser) {
      open(response.verificationUri).catch((err: unknown) => {
        console.warn('[auth] Could not open browser automatically; open the URL manually', {
          error: describeError(err),
        });
      });
    }
  }
}

/**
 * Access Session
 *
 * Owns the Graph bearer token for one process run. Lifecycle:
 * acquire -> valid until cleared -> replaced on re-authentication.
 *
 * The raw token is never handed out; callers only get the Authorization
 * header value.
 */
export class AccessSession {
  private token: string | null = null;
  private expiry: Date | null = null;
  private account: string | null = null;

  acquire(token: string, expiresOn: Date | null, account: string | null = null): void {
    if (!token) {
      throw new Error('Cannot acquire an empty access token');
    }
    this.token = token;
    this.expiry = expiresOn;
    this.account = account;
  }

  clear(): void {
    this.token = null;
    this.expiry = null;
    this.account = null;
  }

  get isActive(): boolean {
    return this.token !== null;
  }

  get expiresOn(): Date | null {
    return this.expiry;
  }

  /** Username of the signed-in account, when the identity provider reported one. */
  get username(): string | null {
    return this.account;
  }

  authorizationHeader(): string | null {
    return this.token ? `Bearer ${this.token}` : null;
  }
}

/** Anything that can produce an authenticated AccessSession for a batch. */
export interface SessionProvider {
  readonly session: AccessSession;
  authenticate(): Promise<boolean>;
}

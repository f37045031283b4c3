import { describe, it, expect } from 'vitest';
import { AccessSession } from '../session.js';

describe('AccessSession', () => {
  it('starts without a token', () => {
    const session = new AccessSession();
    expect(session.isActive).toBe(false);
    expect(session.authorizationHeader()).toBeNull();
  });

  it('exposes the token only as a bearer header', () => {
    const session = new AccessSession();
    const expiresOn = new Date('2030-01-01T00:00:00Z');

    session.acquire('token-1', expiresOn, 'sender@example.com');

    expect(session.authorizationHeader()).toBe('Bearer token-1');
    expect(session.expiresOn).toBe(expiresOn);
    expect(session.username).toBe('sender@example.com');
  });

  it('replaces the token on re-acquisition', () => {
    const session = new AccessSession();
    session.acquire('token-1', null);
    session.acquire('token-2', null);
    expect(session.authorizationHeader()).toBe('Bearer token-2');
  });

  it('drops everything on clear', () => {
    const session = new AccessSession();
    session.acquire('token-1', new Date(), 'sender@example.com');

    session.clear();

    expect(session.isActive).toBe(false);
    expect(session.expiresOn).toBeNull();
    expect(session.username).toBeNull();
    expect(session.authorizationHeader()).toBeNull();
  });

  it('rejects an empty token', () => {
    expect(() => new AccessSession().acquire('', null)).toThrow('Cannot acquire an empty access token');
  });
});

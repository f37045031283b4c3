/**
 * Graph Draft Client Tests
 *
 * fetch is stubbed with real Response objects. Covers request shape, 201
 * success, non-201 failures (including 429), transport errors and the
 * missing-token short circuit.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';

vi.mock('../../config.js', () => ({
  appConfig: {
    graph: { apiBase: 'https://graph.test/v1.0' },
  },
}));

import { AccessSession } from '../../auth/index.js';
import { buildDraftMessage, createDraft } from '../graph-client.js';

function activeSession(): AccessSession {
  const session = new AccessSession();
  session.acquire('test-token', null);
  return session;
}

let fetchSpy: MockInstance<typeof fetch>;

beforeEach(() => {
  fetchSpy = vi.spyOn(globalThis, 'fetch');
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('buildDraftMessage', () => {
  it('builds a plain-text message with one recipient', () => {
    expect(buildDraftMessage('ann@example.com', 'Hello', 'Body text')).toEqual({
      subject: 'Hello',
      body: { contentType: 'Text', content: 'Body text' },
      toRecipients: [{ emailAddress: { address: 'ann@example.com' } }],
    });
  });
});

describe('createDraft', () => {
  it('posts the message to /me/messages with bearer auth', async () => {
    fetchSpy.mockResolvedValue(new Response('{"id": "AAMk-example"}', { status: 201 }));

    await createDraft(activeSession(), 'ann@example.com', 'Hello', 'Body text');

    expect(fetchSpy).toHaveBeenCalledOnce();
    const [url, init] = fetchSpy.mock.calls[0] ?? [];
    expect(url).toBe('https://graph.test/v1.0/me/messages');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({
      Authorization: 'Bearer test-token',
      'Content-Type': 'application/json',
    });
    expect(JSON.parse(String(init?.body))).toEqual(buildDraftMessage('ann@example.com', 'Hello', 'Body text'));
  });

  it('returns the provider id on 201', async () => {
    fetchSpy.mockResolvedValue(new Response('{"id": "AAMk-example"}', { status: 201 }));

    const result = await createDraft(activeSession(), 'ann@example.com', 'Hello', 'Body');

    expect(result).toEqual({ ok: true, draftId: 'AAMk-example' });
  });

  it("uses 'unknown' when a 201 body has no id", async () => {
    fetchSpy.mockResolvedValue(new Response('{}', { status: 201 }));

    const result = await createDraft(activeSession(), 'ann@example.com', 'Hello', 'Body');

    expect(result).toEqual({ ok: true, draftId: 'unknown' });
  });

  it('returns a failure with status and body for 429', async () => {
    fetchSpy.mockResolvedValue(
      new Response('{"error":{"code":"ApplicationThrottled"}}', { status: 429 }),
    );

    const result = await createDraft(activeSession(), 'ann@example.com', 'Hello', 'Body');

    expect(result).toEqual({
      ok: false,
      failure: {
        kind: 'submission',
        message: 'HTTP 429: {"error":{"code":"ApplicationThrottled"}}',
      },
    });
  });

  it('treats a 200 as a failure', async () => {
    fetchSpy.mockResolvedValue(new Response('ok', { status: 200 }));

    const result = await createDraft(activeSession(), 'ann@example.com', 'Hello', 'Body');

    expect(result).toEqual({ ok: false, failure: { kind: 'submission', message: 'HTTP 200: ok' } });
  });

  it('returns a failure instead of throwing on transport errors', async () => {
    fetchSpy.mockRejectedValue(new TypeError('fetch failed'));

    const result = await createDraft(activeSession(), 'ann@example.com', 'Hello', 'Body');

    expect(result).toEqual({ ok: false, failure: { kind: 'submission', message: 'fetch failed' } });
  });

  it('fails without a network call when the session has no token', async () => {
    const result = await createDraft(new AccessSession(), 'ann@example.com', 'Hello', 'Body');

    expect(result).toEqual({ ok: false, failure: { kind: 'submission', message: 'No access token' } });
    expect(fetchSpy).not.toHaveBeenCalled();
  });
});

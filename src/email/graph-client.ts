/**
 * Microsoft Graph Draft Client
 *
 * Creates one draft in the signed-in user's mailbox:
 *   POST {GRAPH_API_BASE}/me/messages
 *
 * Outcome classification:
 * - 201 Created -> success with the message id
 * - any other status -> failure "HTTP <status>: <response text>"
 * - network/transport error -> failure with the error message
 *
 * No retries; the batch paces requests instead. Logs never include the
 * recipient address, only its domain.
 */

import { z } from 'zod';
import type { AccessSession } from '../auth/index.js';
import { appConfig } from '../config.js';
import { failure } from '../failures.js';
import type { GraphDraftMessage, SubmissionResult } from './types.js';

const CreatedMessageSchema = z.object({
  id: z.string().min(1),
});

export function buildDraftMessage(email: string, subject: string, body: string): GraphDraftMessage {
  return {
    subject,
    body: {
      contentType: 'Text',
      content: body,
    },
    toRecipients: [
      {
        emailAddress: { address: email },
      },
    ],
  };
}

async function readDraftId(response: Response): Promise<string> {
  const text = await response.text();
  try {
    const parsed = CreatedMessageSchema.safeParse(JSON.parse(text));
    if (parsed.success) return parsed.data.id;
  } catch (err) {
    console.warn('[graph] Draft created but response body was not JSON', {
      error: err instanceof Error ? err.message : String(err),
    });
  }
  return 'unknown';
}

export async function createDraft(
  session: AccessSession,
  email: string,
  subject: string,
  body: string,
): Promise<SubmissionResult> {
  const authorization = session.authorizationHeader();
  if (!authorization) {
    return { ok: false, failure: failure('submission', 'No access token') };
  }

  let response: Response;
  try {
    response = await fetch(`${appConfig.graph.apiBase}/me/messages`, {
      method: 'POST',
      headers: {
        Authorization: authorization,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(buildDraftMessage(email, subject, body)),
    });
  } catch (err) {
    return {
      ok: false,
      failure: failure('submission', err instanceof Error ? err.message : String(err)),
    };
  }

  if (response.status !== 201) {
    const text = await response.text().catch((err: unknown) => `<unreadable body: ${String(err)}>`);
    console.warn('[graph] Draft creation rejected', {
      status: response.status,
      recipientDomain: email.split('@')[1] ?? '',
    });
    return { ok: false, failure: failure('submission', `HTTP ${response.status}: ${text}`) };
  }

  return { ok: true, draftId: await readDraftId(response) };
}

/**
 * Personalization Augmenter
 *
 * Asks a generative model for one extra sentence to append to a draft body.
 * Providers:
 * - openai (default): chat completions, single user message
 * - gemini: generateContent with the same prompt
 *
 * Degrades to an empty suffix when the provider's key is missing (no request
 * is made), when the request fails or times out, or when the response has no
 * usable text. A failure here never stops the batch.
 */

import OpenAI from 'openai';
import { GoogleGenerativeAI } from '@google/generative-ai';
import { appConfig } from '../config.js';
import type { ContactRecord } from '../contacts/index.js';
import { failure, type PipelineFailure } from '../failures.js';
import { buildPersonalizationPrompt, formatSuffix } from './prompt.js';

export interface PersonalizationResult {
  /** Text to append to the body; '' when personalization was skipped or failed. */
  suffix: string;
  failure?: PipelineFailure<'augmentation'>;
}

type CompletionFn = (prompt: string) => Promise<string>;

// ---------------------------------------------------------------------------
// Providers
// ---------------------------------------------------------------------------

function openAiCompletion(apiKey: string): CompletionFn {
  const { openaiModel, maxTokens, timeoutMs } = appConfig.personalization;
  const client = new OpenAI({ apiKey, timeout: timeoutMs, maxRetries: 0 });

  return async (prompt) => {
    const completion = await client.chat.completions.create({
      model: openaiModel,
      messages: [{ role: 'user', content: prompt }],
      max_tokens: maxTokens,
    });
    const content = completion.choices[0]?.message?.content;
    if (typeof content !== 'string') {
      throw new Error('Chat completion response has no message content');
    }
    return content;
  };
}

function geminiCompletion(apiKey: string): CompletionFn {
  const { geminiModel, maxTokens, timeoutMs } = appConfig.personalization;
  const model = new GoogleGenerativeAI(apiKey).getGenerativeModel(
    { model: geminiModel, generationConfig: { maxOutputTokens: maxTokens } },
    { timeout: timeoutMs },
  );

  return async (prompt) => {
    const result = await model.generateContent(prompt);
    return result.response.text();
  };
}

/** Returns null when the selected provider has no API key configured. */
function resolveCompletion(): CompletionFn | null {
  const config = appConfig.personalization;
  if (config.provider === 'gemini') {
    return config.geminiApiKey ? geminiCompletion(config.geminiApiKey) : null;
  }
  return config.openaiApiKey ? openAiCompletion(config.openaiApiKey) : null;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export async function generatePersonalization(record: ContactRecord): Promise<PersonalizationResult> {
  const complete = resolveCompletion();
  if (!complete) {
    return { suffix: '' };
  }

  try {
    const suffix = formatSuffix(await complete(buildPersonalizationPrompt(record)));
    if (!suffix) {
      throw new Error('Model returned an empty personalization');
    }
    return { suffix };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`AI personalization failed: ${message}`);
    return { suffix: '', failure: failure('augmentation', message) };
  }
}

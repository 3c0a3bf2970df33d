import { describe, it, expect } from 'vitest';
import { ChatCompletionAugmenter, createAugmenter, noAugmentation, tryAugment } from './augmenter.js';
import type { FetchLike } from '../gateway/transport.js';
import { SwarmLogger, type StructuredLogEntry } from '../runner/logger.js';

interface Captured {
  url: string;
  init: RequestInit;
}

function replying(status: number, body: unknown, captured: Captured[] = []): FetchLike {
  return async (url, init) => {
    captured.push({ url, init });
    return new Response(JSON.stringify(body), { status });
  };
}

const settings = { baseUrl: 'http://llm.test/v1/', apiKey: 'test-secret', model: 'test-model' };

describe('ChatCompletionAugmenter', () => {
  it('posts the role and prompt and returns the first choice', async () => {
    const captured: Captured[] = [];
    const augmenter = new ChatCompletionAugmenter({
      ...settings,
      fetch: replying(200, { choices: [{ message: { content: '  Reset the cache.  ' } }] }, captured),
    });

    await expect(augmenter.augment('Research Agent', 'Be brief.', 'Ticket: sso')).resolves.toBe('Reset the cache.');
    expect(captured[0]?.url).toBe('http://llm.test/v1/chat/completions');
    expect(JSON.parse(String(captured[0]?.init.body))).toEqual({
      model: 'test-model',
      messages: [
        { role: 'system', content: 'You are the Research Agent. Be brief.' },
        { role: 'user', content: 'Ticket: sso' },
      ],
    });
  });

  it('returns null and warns on an HTTP error', async () => {
    const entries: StructuredLogEntry[] = [];
    const augmenter = new ChatCompletionAugmenter({
      ...settings,
      fetch: replying(429, { error: 'rate limited' }),
      logger: new SwarmLogger({ silent: true, sink: entry => entries.push(entry) }),
    });

    await expect(augmenter.augment('Triage Agent', '', 'x')).resolves.toBeNull();
    expect(entries.map(e => e.event)).toEqual(['augment.http_error']);
  });

  it('returns null for an empty or malformed completion', async () => {
    const empty = new ChatCompletionAugmenter({ ...settings, fetch: replying(200, { choices: [] }) });
    const malformed = new ChatCompletionAugmenter({ ...settings, fetch: replying(200, { choices: 'nope' }) });

    await expect(empty.augment('Triage Agent', '', 'x')).resolves.toBeNull();
    await expect(malformed.augment('Triage Agent', '', 'x')).resolves.toBeNull();
  });

  it('returns null when the request fails', async () => {
    const augmenter = new ChatCompletionAugmenter({
      ...settings,
      fetch: async () => {
        throw new TypeError('fetch failed');
      },
    });

    await expect(augmenter.augment('Triage Agent', '', 'x')).resolves.toBeNull();
  });
});

describe('createAugmenter', () => {
  it('uses no augmentation without an API key', () => {
    expect(createAugmenter({ baseUrl: 'http://llm.test', model: 'm', timeoutMs: 1000 })).toBe(noAugmentation);
  });

  it('uses the chat augmenter with an API key', () => {
    const augmenter = createAugmenter({ apiKey: 'test-secret', baseUrl: 'http://llm.test', model: 'm', timeoutMs: 1000 });
    expect(augmenter).toBeInstanceOf(ChatCompletionAugmenter);
  });
});

describe('tryAugment', () => {
  const logger = SwarmLogger.silent();
  const request = { role: 'Response Agent', instructions: '', prompt: 'p', maxLength: 5 };

  it('truncates the answer', async () => {
    await expect(tryAugment({ augment: async () => 'abcdefgh' }, request, logger)).resolves.toBe('abcde');
  });

  it('treats blank answers as none', async () => {
    await expect(tryAugment({ augment: async () => '   ' }, request, logger)).resolves.toBeNull();
  });

  it('swallows a throwing augmenter', async () => {
    const augmenter = {
      augment: async (): Promise<string | null> => {
        throw new Error('boom');
      },
    };
    await expect(tryAugment(augmenter, request, logger)).resolves.toBeNull();
  });
});

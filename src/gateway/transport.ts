import type { ToolDocument } from '../contracts/tool.js';

/** The subset of `fetch` the gateway and augmenter rely on; tests pass an in-process stand-in. */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type ResponseMode = 'json' | 'event-stream';

/**
 * One calling convention a tool server may speak.
 */
export interface ConventionStrategy {
  readonly method: 'GET' | 'POST';
  readonly path: string;
  readonly body?: ToolDocument;
  readonly mode: ResponseMode;
}

export const EVENT_DATA_PREFIX = 'data:';
export const EVENT_STREAM_SENTINEL = '[DONE]';

export function isToolDocument(value: unknown): value is ToolDocument {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Split a byte stream into text lines without the line terminator.
 * Cancels the underlying stream when the consumer stops early.
 */
export async function* readLines(body: NonNullable<Response['body']>): AsyncGenerator<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffered = '';
  let finished = false;

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        break;
      }
      buffered += decoder.decode(value, { stream: true });

      let newline = buffered.indexOf('\n');
      while (newline !== -1) {
        yield buffered.slice(0, newline).replace(/\r$/, '');
        buffered = buffered.slice(newline + 1);
        newline = buffered.indexOf('\n');
      }
    }

    buffered += decoder.decode();
    if (buffered.length > 0) {
      yield buffered.replace(/\r$/, '');
    }
  } finally {
    if (!finished) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

/**
 * Return the first `data:` payload that parses as a JSON object.
 * The sentinel, or the end of the stream, yields `null`.
 */
export async function readEventStreamPayload(
  lines: AsyncIterable<string>,
  onSkipped?: (payload: string) => void,
): Promise<ToolDocument | null> {
  for await (const line of lines) {
    if (!line.startsWith(EVENT_DATA_PREFIX)) {
      continue;
    }

    const payload = line.slice(EVENT_DATA_PREFIX.length).trim();
    if (payload === EVENT_STREAM_SENTINEL) {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(payload);
    } catch {
      onSkipped?.(payload);
      continue;
    }

    if (isToolDocument(parsed)) {
      return parsed;
    }
    onSkipped?.(payload);
  }

  return null;
}

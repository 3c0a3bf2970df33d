import { z } from 'zod';
import type { FetchLike } from '../gateway/transport.js';
import { SwarmLogger } from '../runner/logger.js';
import { describeError } from '../runner/errors.js';

/**
 * Optional generative-text capability.
 * Resolving `null` means "no augmentation available" and is never an error.
 */
export interface Augmenter {
  augment(role: string, instructions: string, prompt: string): Promise<string | null>;
}

export const noAugmentation: Augmenter = {
  augment: async () => null,
};

export interface ChatCompletionAugmenterConfig {
  baseUrl: string;
  apiKey: string;
  model: string;
  timeoutMs?: number;
  fetch?: FetchLike;
  logger?: SwarmLogger;
}

const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional(),
      })
    )
    .default([]),
});

/**
 * Augmenter backed by an OpenAI-compatible `/chat/completions` endpoint.
 * Every failure is logged and reported as "no augmentation".
 */
export class ChatCompletionAugmenter implements Augmenter {
  private readonly endpoint: string;
  private readonly apiKey: string;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger: SwarmLogger;

  constructor(config: ChatCompletionAugmenterConfig) {
    this.endpoint = `${config.baseUrl.replace(/\/+$/, '')}/chat/completions`;
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.timeoutMs = config.timeoutMs ?? 20_000;
    this.fetchImpl = config.fetch ?? fetch;
    this.logger = config.logger ?? SwarmLogger.silent();
  }

  async augment(role: string, instructions: string, prompt: string): Promise<string | null> {
    try {
      const response = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: this.model,
          messages: [
            { role: 'system', content: `You are the ${role}. ${instructions}` },
            { role: 'user', content: prompt },
          ],
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        this.logger.warn('augment.http_error', `Augmentation for ${role} failed with status ${response.status}`, {
          role,
          status: response.status,
        });
        return null;
      }

      const parsed = ChatCompletionResponseSchema.safeParse(await response.json());
      const content = parsed.success ? parsed.data.choices[0]?.message?.content?.trim() : undefined;
      return content !== undefined && content !== null && content.length > 0 ? content : null;
    } catch (error) {
      this.logger.warn('augment.failed', `Augmentation for ${role} failed: ${describeError(error)}`, { role });
      return null;
    }
  }
}

export interface AugmenterSettings {
  apiKey?: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
}

/**
 * Chat-backed augmentation when an API key is configured, otherwise none.
 */
export function createAugmenter(settings: AugmenterSettings, logger?: SwarmLogger): Augmenter {
  if (settings.apiKey === undefined) {
    return noAugmentation;
  }
  return new ChatCompletionAugmenter({
    baseUrl: settings.baseUrl,
    apiKey: settings.apiKey,
    model: settings.model,
    timeoutMs: settings.timeoutMs,
    logger,
  });
}

/**
 * Ask the augmenter and never let a failure escape. Truncates the answer.
 */
export async function tryAugment(
  augmenter: Augmenter,
  request: { role: string; instructions: string; prompt: string; maxLength: number },
  logger: SwarmLogger,
): Promise<string | null> {
  try {
    const text = await augmenter.augment(request.role, request.instructions, request.prompt);
    if (text === null || text.trim().length === 0) {
      return null;
    }
    return text.slice(0, request.maxLength);
  } catch (error) {
    logger.warn('augment.rejected', `Augmenter for ${request.role} threw: ${describeError(error)}`, {
      role: request.role,
    });
    return null;
  }
}

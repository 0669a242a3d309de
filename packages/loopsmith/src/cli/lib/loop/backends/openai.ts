/**
 * OpenAI-compatible chat completions backend.
 *
 * Works against any endpoint that speaks the chat completions API
 * (`model.base_url`). The key is read from the env var named by
 * `model.api_key_env`. Rate limits and 5xx responses are retried by the
 * SDK; anything else surfaces as a TransportError.
 */

import OpenAI from 'openai';

import type { GenerateOptions, ModelBackend, ModelReply } from '../../../../lib/types.js';
import { GenerationTimeoutError, TransportError } from '../../errors.js';

/** Retries for 429 and 5xx, handled inside the SDK. */
const MAX_RETRIES = 2;

export interface OpenAIBackendOptions {
  apiKey: string;
  model: string;
  baseURL?: string | null;
  temperature: number;
}

export class OpenAIBackend implements ModelBackend {
  name = 'openai';
  private readonly client: OpenAI;

  constructor(private readonly opts: OpenAIBackendOptions) {
    this.client = new OpenAI({
      apiKey: opts.apiKey,
      ...(opts.baseURL ? { baseURL: opts.baseURL } : {}),
      maxRetries: MAX_RETRIES,
    });
  }

  async generate(opts: GenerateOptions): Promise<ModelReply> {
    const startTime = Date.now();
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.opts.model,
          temperature: this.opts.temperature,
          messages: [
            ...(opts.system ? [{ role: 'system' as const, content: opts.system }] : []),
            { role: 'user' as const, content: opts.prompt },
          ],
        },
        { timeout: opts.timeoutMs },
      );

      const text = response.choices[0]?.message?.content ?? '';
      const tokens = response.usage?.total_tokens;
      return {
        text,
        durationMs: Date.now() - startTime,
        ...(tokens !== undefined ? { tokens } : {}),
      };
    } catch (err: unknown) {
      if (err instanceof OpenAI.APIConnectionTimeoutError) {
        throw new GenerationTimeoutError(`${this.opts.model} did not answer within ${opts.timeoutMs}ms`, opts.timeoutMs);
      }
      if (err instanceof OpenAI.APIError) {
        const status = err.status === undefined ? '' : ` (HTTP ${err.status})`;
        throw new TransportError(`chat completion failed${status}: ${err.message}`, 'model');
      }
      throw err;
    }
  }
}

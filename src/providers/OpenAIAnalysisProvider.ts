/**
 * OpenAI chat-completions provider.
 * Wraps the OpenAI SDK and maps its error classes onto the analysis taxonomy.
 */

import OpenAI from 'openai';
import type { CompletionOptions, IAnalysisProvider } from './IAnalysisProvider.js';
import {
  AnalysisRequestError,
  AuthenticationError,
  MalformedResponseError,
  RateLimitedError,
  TransientFailureError,
  errorMessage,
} from '../errors.js';
import { parseRetryAfter } from './AnthropicAnalysisProvider.js';

const DEFAULT_MODEL = 'gpt-4o-mini';
const DEFAULT_MAX_TOKENS = 4096;

export class OpenAIAnalysisProvider implements IAnalysisProvider {
  readonly name = 'openai';
  readonly model: string;
  private client: OpenAI;

  constructor(opts?: { apiKey?: string; model?: string }) {
    this.client = new OpenAI({
      apiKey: opts?.apiKey ?? process.env.OPENAI_API_KEY,
      // Retries are owned by AnalysisClient
      maxRetries: 0,
    });
    this.model = opts?.model ?? DEFAULT_MODEL;
  }

  async complete(prompt: string, options?: CompletionOptions): Promise<string> {
    let completion: OpenAI.Chat.Completions.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create(
        {
          model: this.model,
          max_tokens: options?.maxTokens ?? DEFAULT_MAX_TOKENS,
          messages: [{ role: 'user', content: prompt }],
        },
        { signal: options?.signal }
      );
    } catch (err) {
      if (options?.signal?.aborted) throw options.signal.reason;
      throw mapOpenAIError(err);
    }

    const content = completion.choices[0]?.message?.content;
    if (!content || content.trim().length === 0) {
      throw new MalformedResponseError('OpenAI response contains no text', {
        finishReason: completion.choices[0]?.finish_reason ?? null,
      });
    }
    return content;
  }
}

export function mapOpenAIError(err: unknown): Error {
  if (err instanceof OpenAI.AuthenticationError || err instanceof OpenAI.PermissionDeniedError) {
    return new AuthenticationError(`OpenAI API error (${err.status}): ${err.message}`);
  }
  if (err instanceof OpenAI.RateLimitError) {
    const retryAfter = err.headers?.['retry-after'];
    return new RateLimitedError(
      `OpenAI API error (429): ${err.message}`,
      parseRetryAfter(retryAfter)
    );
  }
  if (err instanceof OpenAI.APIConnectionError || err instanceof OpenAI.InternalServerError) {
    return new TransientFailureError(`OpenAI request failed: ${err.message}`);
  }
  if (err instanceof OpenAI.APIError) {
    return new AnalysisRequestError(`OpenAI API error (${err.status}): ${err.message}`, {
      status: err.status,
    });
  }
  return new TransientFailureError(`OpenAI request failed: ${errorMessage(err)}`);
}

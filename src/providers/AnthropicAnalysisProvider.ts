/**
 * Anthropic Messages API provider.
 * No SDK dependency; uses native fetch.
 */

import type { CompletionOptions, IAnalysisProvider } from './IAnalysisProvider.js';
import {
  AnalysisRequestError,
  AuthenticationError,
  MalformedResponseError,
  RateLimitedError,
  TransientFailureError,
  errorMessage,
} from '../errors.js';

const API_URL = 'https://api.anthropic.com/v1/messages';
const API_VERSION = '2023-06-01';
const DEFAULT_MODEL = 'claude-sonnet-4-20250514';
const DEFAULT_MAX_TOKENS = 4096;

interface AnthropicContentBlock {
  type: string;
  text?: string;
}

interface AnthropicMessageResponse {
  content: AnthropicContentBlock[];
  stop_reason?: string;
}

export class AnthropicAnalysisProvider implements IAnalysisProvider {
  readonly name = 'anthropic';
  readonly model: string;
  private readonly apiKey: string;

  constructor(opts?: { apiKey?: string; model?: string }) {
    this.apiKey = opts?.apiKey ?? process.env.ANTHROPIC_API_KEY ?? '';
    this.model = opts?.model ?? DEFAULT_MODEL;
  }

  async complete(prompt: string, options?: CompletionOptions): Promise<string> {
    let res: Response;
    try {
      res = await fetch(API_URL, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-api-key': this.apiKey,
          'anthropic-version': API_VERSION,
        },
        body: JSON.stringify({
          model: this.model,
          max_tokens: options?.maxTokens ?? DEFAULT_MAX_TOKENS,
          messages: [{ role: 'user', content: prompt }],
        }),
        signal: options?.signal,
      });
    } catch (err) {
      if (options?.signal?.aborted) throw options.signal.reason;
      throw new TransientFailureError(`Anthropic request failed: ${errorMessage(err)}`);
    }

    if (!res.ok) {
      throw await toProviderError(res);
    }

    let payload: unknown;
    try {
      payload = await res.json();
    } catch {
      throw new MalformedResponseError('Anthropic response body is not JSON');
    }

    if (!isMessageResponse(payload)) {
      throw new MalformedResponseError('Anthropic response has no content blocks');
    }

    const text = payload.content
      .filter((block) => block.type === 'text' && typeof block.text === 'string')
      .map((block) => block.text)
      .join('');

    if (text.trim().length === 0) {
      throw new MalformedResponseError('Anthropic response contains no text', {
        stopReason: payload.stop_reason ?? null,
      });
    }

    return text;
  }
}

async function toProviderError(res: Response): Promise<Error> {
  const err = (await res.json().catch(() => ({}))) as {
    error?: { type?: string; message?: string };
  };
  const detail = err.error?.message ?? 'Unknown error';
  const message = `Anthropic API error (${res.status}): ${detail}`;

  if (res.status === 401 || res.status === 403) {
    return new AuthenticationError(message);
  }
  if (res.status === 429) {
    return new RateLimitedError(message, parseRetryAfter(res.headers.get('retry-after')));
  }
  // 529 is Anthropic's "overloaded"
  if (res.status >= 500) {
    return new TransientFailureError(message, { status: res.status });
  }
  return new AnalysisRequestError(message, { status: res.status });
}

export function parseRetryAfter(header: string | null | undefined): number | null {
  if (!header) return null;
  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) return seconds;
  const date = Date.parse(header);
  if (Number.isNaN(date)) return null;
  return Math.max(0, Math.ceil((date - Date.now()) / 1000));
}

function isMessageResponse(value: unknown): value is AnthropicMessageResponse {
  return (
    typeof value === 'object' &&
    value !== null &&
    'content' in value &&
    Array.isArray(value.content)
  );
}

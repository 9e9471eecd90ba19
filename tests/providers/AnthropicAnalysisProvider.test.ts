import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  AnthropicAnalysisProvider,
  parseRetryAfter,
} from '../../src/providers/AnthropicAnalysisProvider.js';
import {
  AnalysisRequestError,
  AuthenticationError,
  MalformedResponseError,
  RateLimitedError,
  TransientFailureError,
} from '../../src/errors.js';

const mockFetch = vi.fn();

function jsonResponse(status: number, body: unknown, headers?: Record<string, string>): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

describe('AnthropicAnalysisProvider', () => {
  let provider: AnthropicAnalysisProvider;

  beforeEach(() => {
    vi.stubGlobal('fetch', mockFetch);
    mockFetch.mockReset();
    provider = new AnthropicAnalysisProvider({ apiKey: 'test-key', model: 'test-model' });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should post the prompt and join the text blocks', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse(200, {
        content: [
          { type: 'text', text: '{"questions":' },
          { type: 'tool_use' },
          { type: 'text', text: '[]}' },
        ],
        stop_reason: 'end_turn',
      })
    );

    const text = await provider.complete('analyse this', { maxTokens: 512 });

    expect(text).toBe('{"questions":[]}');
    expect(mockFetch).toHaveBeenCalledTimes(1);
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://api.anthropic.com/v1/messages');
    expect(init.headers['x-api-key']).toBe('test-key');
    expect(init.headers['anthropic-version']).toBe('2023-06-01');
    expect(JSON.parse(init.body)).toEqual({
      model: 'test-model',
      max_tokens: 512,
      messages: [{ role: 'user', content: 'analyse this' }],
    });
  });

  it('should report its name and model', () => {
    expect(provider.name).toBe('anthropic');
    expect(provider.model).toBe('test-model');
  });

  it('should map 401 to AuthenticationError', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse(401, { error: { type: 'authentication_error', message: 'invalid x-api-key' } })
    );

    const err = await provider.complete('x').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AuthenticationError);
    expect((err as AuthenticationError).message).toBe(
      'Anthropic API error (401): invalid x-api-key'
    );
  });

  it('should map 429 to RateLimitedError with the retry-after hint', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse(429, { error: { message: 'slow down' } }, { 'retry-after': '7' })
    );

    const err = await provider.complete('x').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RateLimitedError);
    expect((err as RateLimitedError).retryAfterSeconds).toBe(7);
  });

  it('should map overloaded responses to TransientFailureError', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(529, { error: { message: 'Overloaded' } }));

    await expect(provider.complete('x')).rejects.toThrow(TransientFailureError);
  });

  it('should map other client errors to AnalysisRequestError', async () => {
    mockFetch.mockResolvedValueOnce(new Response('not json', { status: 400 }));

    const err = await provider.complete('x').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AnalysisRequestError);
    expect((err as AnalysisRequestError).message).toBe('Anthropic API error (400): Unknown error');
  });

  it('should treat a network failure as transient', async () => {
    mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

    const err = await provider.complete('x').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransientFailureError);
    expect((err as TransientFailureError).message).toBe('Anthropic request failed: fetch failed');
  });

  it('should reject a response without text', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(200, { content: [], stop_reason: 'max_tokens' }));

    await expect(provider.complete('x')).rejects.toThrow('Anthropic response contains no text');
  });

  it('should reject a response without content blocks', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(200, { id: 'msg_1' }));

    await expect(provider.complete('x')).rejects.toThrow(MalformedResponseError);
  });

  it('should rethrow the abort reason when the signal fires', async () => {
    const controller = new AbortController();
    const reason = new Error('stopped');
    controller.abort(reason);
    mockFetch.mockRejectedValueOnce(new Error('This operation was aborted'));

    await expect(provider.complete('x', { signal: controller.signal })).rejects.toBe(reason);
  });
});

describe('parseRetryAfter', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should read delta seconds', () => {
    expect(parseRetryAfter('12')).toBe(12);
    expect(parseRetryAfter('0')).toBe(0);
  });

  it('should return null for missing or unreadable values', () => {
    expect(parseRetryAfter(null)).toBeNull();
    expect(parseRetryAfter(undefined)).toBeNull();
    expect(parseRetryAfter('soon')).toBeNull();
  });

  it('should read an HTTP date relative to now', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-10T10:00:00Z'));

    expect(parseRetryAfter('Tue, 10 Mar 2026 10:00:30 GMT')).toBe(30);
    expect(parseRetryAfter('Tue, 10 Mar 2026 09:59:00 GMT')).toBe(0);
  });
});

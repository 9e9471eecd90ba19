/**
 * Language-model provider interface.
 * Sends one prompt, returns the raw text completion.
 *
 * Implementations translate transport failures into the analysis error
 * taxonomy: AuthenticationError, RateLimitedError, TransientFailureError,
 * AnalysisRequestError, and MalformedResponseError for unreadable envelopes.
 */

export interface CompletionOptions {
  signal?: AbortSignal;
  maxTokens?: number;
}

export interface IAnalysisProvider {
  /** Provider name for logs, e.g. "anthropic". */
  readonly name: string;
  /** Model identifier sent with each request. */
  readonly model: string;

  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

/**
 * Chat-platform delivery interface.
 *
 * Implementations raise RateLimitedError / TransientFailureError for
 * failures worth retrying and DeliveryError for everything else.
 */

export interface SendMessageOptions {
  signal?: AbortSignal;
}

export interface SentMessage {
  messageId: number;
}

export interface IMessagingProvider {
  /** Largest document accepted in a single send. */
  readonly maxMessageLength: number;

  sendMessage(
    chatId: number,
    html: string,
    options?: SendMessageOptions
  ): Promise<SentMessage>;
}

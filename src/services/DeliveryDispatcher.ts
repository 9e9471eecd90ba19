/**
 * Sends persisted reports to their chats, one chat at a time.
 *
 * Per chat: zero-question reports are skipped, retryable transport errors
 * are retried with backoff, and a fixed pacing delay separates consecutive
 * chats. A failure rate above one half raises a single escalation.
 * Once every chunk is out the chat counts as delivered; a failure to record
 * the send afterwards is reported under `unrecorded` instead.
 */

import type { IMessagingProvider } from '../providers/IMessagingProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { Chat, Report } from '../types/models.js';
import type { Clock, RunOptions, Sleep } from '../types/common.js';
import { CancelledError, errorMessage, failureKind, type FailureKind } from '../errors.js';
import { retryWithBackoff, type RetryPolicy } from '../utils/retry.js';
import { throwIfAborted } from '../utils/sleep.js';
import { withTimeout } from '../utils/timeout.js';
import type { ChatDirectory } from './ChatDirectory.js';
import type { EscalationNotifier } from './EscalationNotifier.js';
import type { ReportFormatter } from './ReportFormatter.js';
import type { ReportStore } from './ReportStore.js';

export const ESCALATION_THRESHOLD = 0.5;

export interface DeliveryItem {
  chat: Chat;
  report: Report;
}

export interface DeliveryFailure {
  chatId: number;
  kind: FailureKind;
  error: string;
}

export interface DeliveryOutcome {
  delivered: number[];
  /** Zero-question reports, never sent. */
  skipped: number[];
  failed: DeliveryFailure[];
  /** Delivered, but the sent timestamps could not be stored. */
  unrecorded: DeliveryFailure[];
  escalated: boolean;
  cancelled: boolean;
}

export interface DeliverySettings {
  retryPolicy: RetryPolicy;
  pacingMs: number;
  /** Upper bound for one chat's delivery, retries included. */
  chatTimeoutMs: number;
}

export class DeliveryDispatcher {
  constructor(
    private readonly messaging: IMessagingProvider,
    private readonly formatter: ReportFormatter,
    private readonly reportStore: ReportStore,
    private readonly chatDirectory: ChatDirectory,
    private readonly escalation: EscalationNotifier,
    private readonly logger: ILogProvider,
    private readonly clock: Clock,
    private readonly sleep: Sleep,
    private readonly settings: DeliverySettings
  ) {}

  async deliverAll(items: DeliveryItem[], options?: RunOptions): Promise<DeliveryOutcome> {
    const signal = options?.signal;
    const outcome: DeliveryOutcome = {
      delivered: [],
      skipped: [],
      failed: [],
      unrecorded: [],
      escalated: false,
      cancelled: false,
    };

    let sentBefore = false;
    try {
      for (const { chat, report } of items) {
        throwIfAborted(signal);

        if (report.questionsCount === 0) {
          this.logger.info('No questions in window, report not sent', {
            chatId: chat.chatId,
            reportDate: report.reportDate,
          });
          outcome.skipped.push(chat.chatId);
          continue;
        }

        if (sentBefore && this.settings.pacingMs > 0) {
          await this.sleep(this.settings.pacingMs, signal);
        }
        sentBefore = true;

        let chunks: number;
        try {
          chunks = await withTimeout(
            (chatSignal) => this.deliverOne(chat, report, chatSignal),
            this.settings.chatTimeoutMs,
            `Delivery to chat ${chat.chatId}`,
            signal
          );
        } catch (err) {
          if (err instanceof CancelledError) throw err;
          const kind = failureKind(err);
          this.logger.error('Report delivery failed', {
            chatId: chat.chatId,
            reportDate: report.reportDate,
            kind,
            error: errorMessage(err),
          });
          outcome.failed.push({ chatId: chat.chatId, kind, error: errorMessage(err) });
          continue;
        }

        outcome.delivered.push(chat.chatId);
        this.logger.info('Report delivered', {
          chatId: chat.chatId,
          reportDate: report.reportDate,
          chunks,
        });

        const unrecorded = await this.recordSent(chat, report);
        if (unrecorded) outcome.unrecorded.push(unrecorded);
      }
    } catch (err) {
      if (!(err instanceof CancelledError)) throw err;
      this.logger.warn('Delivery cancelled', {
        delivered: outcome.delivered.length,
        remaining:
          items.length -
          outcome.delivered.length -
          outcome.skipped.length -
          outcome.failed.length,
      });
      outcome.cancelled = true;
    }

    const attempted = outcome.delivered.length + outcome.failed.length;
    if (attempted > 0 && outcome.failed.length / attempted > ESCALATION_THRESHOLD) {
      await this.escalation.notify({
        kind: 'delivery_failures',
        failedChatIds: outcome.failed.map((f) => f.chatId),
        attempted,
      });
      outcome.escalated = true;
    }

    return outcome;
  }

  /** Sends every chunk of the report; resolves to the number of messages sent. */
  private async deliverOne(chat: Chat, report: Report, signal: AbortSignal): Promise<number> {
    const chunks = this.formatter.split(report.body, this.messaging.maxMessageLength);

    for (const [index, chunk] of chunks.entries()) {
      await retryWithBackoff(
        () => this.messaging.sendMessage(chat.chatId, chunk, { signal }),
        {
          policy: this.settings.retryPolicy,
          sleep: this.sleep,
          signal,
          onRetry: (err, attempt, delayMs) => {
            this.logger.warn('Delivery attempt failed, retrying', {
              chatId: chat.chatId,
              chunk: index + 1,
              attempt,
              delayMs,
              error: errorMessage(err),
            });
          },
        }
      );
    }

    return chunks.length;
  }

  /** Both writes are attempted; the first error is returned, not thrown. */
  private async recordSent(chat: Chat, report: Report): Promise<DeliveryFailure | null> {
    const sentAt = this.clock.now();
    const errors: string[] = [];

    try {
      await this.reportStore.markSent(report, sentAt);
    } catch (err) {
      errors.push(errorMessage(err));
    }
    try {
      await this.chatDirectory.markReportSent(chat.chatId, sentAt);
    } catch (err) {
      errors.push(errorMessage(err));
    }

    if (errors.length === 0) return null;
    this.logger.error('Report sent but not recorded', {
      chatId: chat.chatId,
      reportDate: report.reportDate,
      errors,
    });
    return { chatId: chat.chatId, kind: 'storage', error: errors.join('; ') };
  }
}

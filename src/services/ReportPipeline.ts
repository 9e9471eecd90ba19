/**
 * Daily run orchestrator.
 *
 * Chats are processed strictly one after another: window read, analysis
 * under a per-chat timeout, annotation, formatting and persistence. The
 * collected reports are then handed to the DeliveryDispatcher. An
 * authentication failure aborts the run before anything is delivered.
 */

import { randomUUID } from 'node:crypto';
import type { ILogProvider, RunLogEvent } from '../providers/ILogProvider.js';
import type { Chat } from '../types/models.js';
import type { Clock, RunOptions } from '../types/common.js';
import {
  AppError,
  AuthenticationError,
  CancelledError,
  errorMessage,
  failureKind,
  type FailureKind,
} from '../errors.js';
import { withTimeout } from '../utils/timeout.js';
import type { AnalysisClient } from './AnalysisClient.js';
import type { ChatDirectory } from './ChatDirectory.js';
import type { DeliveryDispatcher, DeliveryItem } from './DeliveryDispatcher.js';
import type { EscalationNotifier } from './EscalationNotifier.js';
import type { MessageStore } from './MessageStore.js';
import type { ReportFormatter } from './ReportFormatter.js';
import { toReportDate, type ReportStore } from './ReportStore.js';

const MS_PER_HOUR = 3_600_000;

export type PipelineState = 'idle' | 'running' | 'completed' | 'completed_with_failures';

export interface PipelineSettings {
  lookbackHours: number;
  chatTimeoutMs: number;
}

export interface ChatFailure {
  chatId: number;
  /** `record`: the report went out but its sent timestamps were not stored. */
  stage: 'analysis' | 'delivery' | 'record';
  kind: FailureKind;
  error: string;
}

export interface RunSummary {
  runId: string;
  reportDate: string;
  state: Exclude<PipelineState, 'idle' | 'running'>;
  startedAt: Date;
  durationMs: number;
  chatsProcessed: number;
  /** Chats with an empty window: no analysis, no report. */
  chatsSkipped: number;
  /** Chats whose report for the date was already delivered by an earlier run. */
  alreadySent: number;
  reportsGenerated: number;
  reportsDelivered: number;
  /** Zero-question reports, persisted but not sent. */
  reportsSkipped: number;
  failures: ChatFailure[];
  failuresByKind: Partial<Record<FailureKind, number>>;
  aborted: boolean;
  cancelled: boolean;
  escalated: boolean;
}

type ChatResult =
  | { status: 'generated'; item: DeliveryItem }
  | { status: 'empty' }
  | { status: 'already_sent' };

export class ReportPipeline {
  private currentState: PipelineState = 'idle';

  constructor(
    private readonly chatDirectory: ChatDirectory,
    private readonly messageStore: MessageStore,
    private readonly analysisClient: AnalysisClient,
    private readonly formatter: ReportFormatter,
    private readonly reportStore: ReportStore,
    private readonly dispatcher: DeliveryDispatcher,
    private readonly escalation: EscalationNotifier,
    private readonly logger: ILogProvider,
    private readonly clock: Clock,
    private readonly settings: PipelineSettings
  ) {}

  get state(): PipelineState {
    return this.currentState;
  }

  async run(options?: RunOptions): Promise<RunSummary> {
    if (this.currentState === 'running') {
      throw new AppError('RUN_IN_PROGRESS', 'A report run is already in progress', 409);
    }
    this.currentState = 'running';

    try {
      const summary = await this.execute(options?.signal);
      this.currentState = summary.state;
      return summary;
    } catch (err) {
      this.currentState = 'completed_with_failures';
      this.logger.error('Report run failed', { error: errorMessage(err) });
      throw err;
    }
  }

  private async execute(signal: AbortSignal | undefined): Promise<RunSummary> {
    const startedAt = this.clock.now();
    const reportDate = toReportDate(startedAt);
    const since = new Date(startedAt.getTime() - this.settings.lookbackHours * MS_PER_HOUR);

    const summary: RunSummary = {
      runId: randomUUID(),
      reportDate,
      state: 'completed',
      startedAt,
      durationMs: 0,
      chatsProcessed: 0,
      chatsSkipped: 0,
      alreadySent: 0,
      reportsGenerated: 0,
      reportsDelivered: 0,
      reportsSkipped: 0,
      failures: [],
      failuresByKind: {},
      aborted: false,
      cancelled: false,
      escalated: false,
    };

    const chats = await this.chatDirectory.listEnabled();
    this.logger.info('Report run started', {
      runId: summary.runId,
      reportDate,
      chats: chats.length,
    });

    const pending: DeliveryItem[] = [];

    for (const chat of chats) {
      if (signal?.aborted) {
        summary.cancelled = true;
        break;
      }
      summary.chatsProcessed++;

      try {
        const result = await this.processChat(chat, reportDate, since, signal);
        if (result.status === 'empty') summary.chatsSkipped++;
        else if (result.status === 'already_sent') summary.alreadySent++;
        else {
          summary.reportsGenerated++;
          pending.push(result.item);
        }
      } catch (err) {
        if (err instanceof CancelledError) {
          summary.cancelled = true;
          break;
        }
        recordFailure(summary, chat.chatId, 'analysis', err);
        this.logger.error('Chat report failed', {
          runId: summary.runId,
          chatId: chat.chatId,
          kind: failureKind(err),
          error: errorMessage(err),
        });

        if (err instanceof AuthenticationError) {
          summary.aborted = true;
          await this.escalation.notify({
            kind: 'run_aborted',
            reason: err.message,
            chatId: chat.chatId,
          });
          summary.escalated = true;
          break;
        }
      }
    }

    if (!summary.aborted && !summary.cancelled && pending.length > 0) {
      const outcome = await this.dispatcher.deliverAll(pending, { signal });
      summary.reportsDelivered = outcome.delivered.length;
      summary.reportsSkipped = outcome.skipped.length;
      summary.escalated = outcome.escalated;
      summary.cancelled = outcome.cancelled;
      const failures = [
        ...outcome.failed.map((f) => ({ ...f, stage: 'delivery' as const })),
        ...outcome.unrecorded.map((f) => ({ ...f, stage: 'record' as const })),
      ];
      for (const failure of failures) {
        summary.failures.push(failure);
        summary.failuresByKind[failure.kind] = (summary.failuresByKind[failure.kind] ?? 0) + 1;
      }
    }

    summary.durationMs = this.clock.now().getTime() - startedAt.getTime();
    if (summary.failures.length > 0 || summary.aborted || summary.cancelled) {
      summary.state = 'completed_with_failures';
    }

    this.logRun(summary);
    return summary;
  }

  private async processChat(
    chat: Chat,
    reportDate: string,
    since: Date,
    signal: AbortSignal | undefined
  ): Promise<ChatResult> {
    const window = await this.messageStore.windowSince(chat.chatId, since);
    if (window.length === 0) {
      this.logger.info('Empty window, chat skipped', { chatId: chat.chatId });
      return { status: 'empty' };
    }

    const result = await withTimeout(
      (chatSignal) => this.analysisClient.analyze(window, { signal: chatSignal }),
      this.settings.chatTimeoutMs,
      `Analysis of chat ${chat.chatId}`,
      signal
    );

    await this.messageStore.annotate(chat.chatId, result);

    const body = this.formatter.format(chat, reportDate, result);
    const saved = await this.reportStore.save(chat.chatId, reportDate, result, body);
    if (saved.status === 'already_sent') {
      this.logger.info('Report already delivered for this date, chat skipped', {
        chatId: chat.chatId,
        reportDate,
      });
      return { status: 'already_sent' };
    }

    return { status: 'generated', item: { chat, report: saved.report } };
  }

  private logRun(summary: RunSummary): void {
    const event: RunLogEvent = {
      level: summary.state === 'completed' ? 'info' : 'warn',
      message: 'Report run finished',
      runId: summary.runId,
      state: summary.state,
      durationMs: summary.durationMs,
      fields: {
        reportDate: summary.reportDate,
        chatsProcessed: summary.chatsProcessed,
        chatsSkipped: summary.chatsSkipped,
        alreadySent: summary.alreadySent,
        reportsGenerated: summary.reportsGenerated,
        reportsDelivered: summary.reportsDelivered,
        reportsSkipped: summary.reportsSkipped,
        failuresByKind: summary.failuresByKind,
        aborted: summary.aborted,
        cancelled: summary.cancelled,
        escalated: summary.escalated,
      },
    };
    this.logger.log(event);
  }
}

function recordFailure(
  summary: RunSummary,
  chatId: number,
  stage: ChatFailure['stage'],
  err: unknown
): void {
  const kind = failureKind(err);
  summary.failures.push({ chatId, stage, kind, error: errorMessage(err) });
  summary.failuresByKind[kind] = (summary.failuresByKind[kind] ?? 0) + 1;
}

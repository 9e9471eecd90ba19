/**
 * Retention sweep: the second daily entry point.
 * Deletes messages older than the retention window and reports older than
 * the report retention period.
 */

import type { ILogProvider } from '../providers/ILogProvider.js';
import type { Clock } from '../types/common.js';
import type { MessageStore } from './MessageStore.js';
import { toReportDate, type ReportStore } from './ReportStore.js';

const MS_PER_HOUR = 3_600_000;
const MS_PER_DAY = 24 * MS_PER_HOUR;

export interface CleanupSettings {
  messageRetentionHours: number;
  reportRetentionDays: number;
}

export interface CleanupSummary {
  messagesDeleted: number;
  reportsDeleted: number;
  messageCutoff: Date;
  reportCutoff: string;
}

export class CleanupService {
  constructor(
    private readonly messageStore: MessageStore,
    private readonly reportStore: ReportStore,
    private readonly logger: ILogProvider,
    private readonly clock: Clock,
    private readonly settings: CleanupSettings
  ) {}

  async run(): Promise<CleanupSummary> {
    const now = this.clock.now().getTime();
    const messageCutoff = new Date(now - this.settings.messageRetentionHours * MS_PER_HOUR);
    const reportCutoff = toReportDate(new Date(now - this.settings.reportRetentionDays * MS_PER_DAY));

    const messagesDeleted = await this.messageStore.deleteOlderThan(messageCutoff);
    const reportsDeleted = await this.reportStore.deleteBefore(reportCutoff);

    this.logger.info('Retention cleanup finished', {
      messagesDeleted,
      reportsDeleted,
      messageCutoff: messageCutoff.toISOString(),
      reportCutoff,
    });
    return { messagesDeleted, reportsDeleted, messageCutoff, reportCutoff };
  }
}

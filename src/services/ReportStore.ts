/**
 * Report persistence and history.
 * One report per chat per UTC date; a report that was delivered is immutable.
 */

import type { IReportRepository } from '../repositories/IReportRepository.js';
import type { AnalysisResult, Report } from '../types/models.js';
import type { ReportRow } from '../types/database.js';
import { AppError, ValidationError } from '../errors.js';

const DEFAULT_HISTORY_LIMIT = 10;
const MAX_HISTORY_LIMIT = 100;

export type SaveOutcome =
  | { status: 'saved'; report: Report }
  | { status: 'already_sent'; report: Report };

export class ReportStore {
  constructor(private readonly reportRepo: IReportRepository) {}

  /**
   * Persist the report for (chatId, reportDate). An unsent report from an
   * earlier attempt the same day is replaced; a sent one is left untouched.
   */
  async save(
    chatId: number,
    reportDate: string,
    result: AnalysisResult,
    body: string
  ): Promise<SaveOutcome> {
    const existing = await this.reportRepo.findByChatAndDate(chatId, reportDate);
    if (existing && existing.sent_at !== null) {
      return { status: 'already_sent', report: toReport(existing) };
    }

    const row = await this.reportRepo.upsert({
      chat_id: chatId,
      report_date: reportDate,
      questions_count: result.summary.totalQuestions,
      answered_count: result.summary.answered,
      unanswered_count: result.summary.unanswered,
      avg_response_time_minutes: result.summary.avgResponseTimeMinutes,
      body,
    });
    return { status: 'saved', report: toReport(row) };
  }

  async markSent(report: Report, sentAt: Date): Promise<Report> {
    if (report.questionsCount === 0) {
      throw new AppError(
        'EMPTY_REPORT',
        `Report ${report.id} has no questions and is never marked sent`
      );
    }
    const row = await this.reportRepo.markSent(report.id, sentAt.toISOString());
    return toReport(row);
  }

  async findByChatAndDate(chatId: number, reportDate: string): Promise<Report | null> {
    const row = await this.reportRepo.findByChatAndDate(chatId, reportDate);
    return row ? toReport(row) : null;
  }

  async history(chatId: number, limit = DEFAULT_HISTORY_LIMIT): Promise<Report[]> {
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_HISTORY_LIMIT) {
      throw new ValidationError(`limit must be between 1 and ${MAX_HISTORY_LIMIT}`);
    }
    const rows = await this.reportRepo.findRecentByChat(chatId, limit);
    return rows.map(toReport);
  }

  async deleteBefore(reportDate: string): Promise<number> {
    return this.reportRepo.deleteBefore(reportDate);
  }
}

/** UTC calendar date of an instant, YYYY-MM-DD. */
export function toReportDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function toReport(row: ReportRow): Report {
  return {
    id: row.id,
    chatId: row.chat_id,
    reportDate: row.report_date,
    questionsCount: row.questions_count,
    answeredCount: row.answered_count,
    unansweredCount: row.unanswered_count,
    avgResponseTimeMinutes: row.avg_response_time_minutes,
    body: row.body,
    sentAt: row.sent_at ? new Date(row.sent_at) : null,
    createdAt: new Date(row.created_at),
  };
}

/**
 * Report data access interface.
 */

import type { NewReportRow, ReportRow } from '../types/database.js';

export interface IReportRepository {
  /**
   * Insert or replace the report for (chat_id, report_date) in one statement.
   * Callers must not overwrite a report that has already been sent.
   */
  upsert(row: NewReportRow): Promise<ReportRow>;

  findByChatAndDate(chatId: number, reportDate: string): Promise<ReportRow | null>;

  /** Most recent first. */
  findRecentByChat(chatId: number, limit: number): Promise<ReportRow[]>;

  markSent(id: string, sentAt: string): Promise<ReportRow>;

  /** Delete reports dated before the given date. Returns number deleted. */
  deleteBefore(reportDate: string): Promise<number>;
}

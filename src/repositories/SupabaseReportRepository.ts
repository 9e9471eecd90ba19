/**
 * Supabase implementation of IReportRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IReportRepository } from './IReportRepository.js';
import type { NewReportRow, ReportRow } from '../types/database.js';
import { StorageError } from '../errors.js';

export class SupabaseReportRepository implements IReportRepository {
  constructor(private readonly db: SupabaseClient) {}

  async upsert(row: NewReportRow): Promise<ReportRow> {
    const { data, error } = await this.db
      .from('reports')
      .upsert(
        {
          chat_id: row.chat_id,
          report_date: row.report_date,
          questions_count: row.questions_count,
          answered_count: row.answered_count,
          unanswered_count: row.unanswered_count,
          avg_response_time_minutes: row.avg_response_time_minutes,
          body: row.body,
        },
        { onConflict: 'chat_id,report_date' }
      )
      .select()
      .single();

    if (error) throw new StorageError(`Failed to save report: ${error.message}`);
    return data as ReportRow;
  }

  async findByChatAndDate(chatId: number, reportDate: string): Promise<ReportRow | null> {
    const { data, error } = await this.db
      .from('reports')
      .select('*')
      .eq('chat_id', chatId)
      .eq('report_date', reportDate)
      .maybeSingle();

    if (error) throw new StorageError(`Failed to find report: ${error.message}`);
    return data as ReportRow | null;
  }

  async findRecentByChat(chatId: number, limit: number): Promise<ReportRow[]> {
    const { data, error } = await this.db
      .from('reports')
      .select('*')
      .eq('chat_id', chatId)
      .order('report_date', { ascending: false })
      .limit(limit);

    if (error) throw new StorageError(`Failed to list reports: ${error.message}`);
    return (data ?? []) as ReportRow[];
  }

  async markSent(id: string, sentAt: string): Promise<ReportRow> {
    const { data, error } = await this.db
      .from('reports')
      .update({ sent_at: sentAt })
      .eq('id', id)
      .select()
      .single();

    if (error) throw new StorageError(`Failed to mark report sent: ${error.message}`);
    return data as ReportRow;
  }

  async deleteBefore(reportDate: string): Promise<number> {
    const { count, error } = await this.db
      .from('reports')
      .delete({ count: 'exact' })
      .lt('report_date', reportDate);

    if (error) throw new StorageError(`Failed to delete old reports: ${error.message}`);
    return count ?? 0;
  }
}

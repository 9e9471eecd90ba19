/**
 * Supabase implementation of IMessageRepository.
 * Window reads use the (chat_id, sent_at, message_id) index.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IMessageRepository } from './IMessageRepository.js';
import type {
  MessageAnnotationRow,
  MessageRow,
  NewMessageRow,
} from '../types/database.js';
import { DuplicateMessageError, StorageError } from '../errors.js';

const UNIQUE_VIOLATION = '23505';
/** PostgREST caps a response at max-rows (1000 by default). */
export const PAGE_SIZE = 1000;

export class SupabaseMessageRepository implements IMessageRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insert(row: NewMessageRow): Promise<MessageRow> {
    const { data, error } = await this.db
      .from('messages')
      .insert({
        chat_id: row.chat_id,
        message_id: row.message_id,
        user_id: row.user_id,
        user_name: row.user_name,
        text: row.text,
        sent_at: row.sent_at,
        reactions: row.reactions,
      })
      .select()
      .single();

    if (error) {
      if (error.code === UNIQUE_VIOLATION) {
        throw new DuplicateMessageError(row.chat_id, row.message_id);
      }
      throw new StorageError(`Failed to insert message: ${error.message}`);
    }
    return data as MessageRow;
  }

  async findSince(chatId: number, since: string): Promise<MessageRow[]> {
    const rows: MessageRow[] = [];
    for (let from = 0; ; from += PAGE_SIZE) {
      const { data, error } = await this.db
        .from('messages')
        .select('*')
        .eq('chat_id', chatId)
        .gte('sent_at', since)
        .order('sent_at', { ascending: true })
        .order('message_id', { ascending: true })
        .range(from, from + PAGE_SIZE - 1);

      if (error) throw new StorageError(`Failed to read message window: ${error.message}`);
      const page = (data ?? []) as MessageRow[];
      rows.push(...page);
      if (page.length < PAGE_SIZE) return rows;
    }
  }

  async annotate(chatId: number, annotations: MessageAnnotationRow[]): Promise<void> {
    for (const annotation of annotations) {
      const { error } = await this.db
        .from('messages')
        .update({
          is_question: annotation.is_question,
          is_answer: annotation.is_answer,
          answers_message_id: annotation.answers_message_id,
        })
        .eq('chat_id', chatId)
        .eq('message_id', annotation.message_id);

      if (error) throw new StorageError(`Failed to annotate message: ${error.message}`);
    }
  }

  async deleteOlderThan(cutoff: string): Promise<number> {
    const { count, error } = await this.db
      .from('messages')
      .delete({ count: 'exact' })
      .lt('sent_at', cutoff);

    if (error) throw new StorageError(`Failed to delete old messages: ${error.message}`);
    return count ?? 0;
  }
}

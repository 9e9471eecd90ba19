/**
 * Supabase implementation of IChatRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IChatRepository } from './IChatRepository.js';
import type { ChatRow } from '../types/database.js';
import { StorageError } from '../errors.js';

export class SupabaseChatRepository implements IChatRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insert(row: Pick<ChatRow, 'chat_id' | 'name' | 'enabled'>): Promise<ChatRow> {
    const { data, error } = await this.db
      .from('chats')
      .insert({ chat_id: row.chat_id, name: row.name, enabled: row.enabled })
      .select()
      .single();

    if (error) throw new StorageError(`Failed to insert chat: ${error.message}`);
    return data as ChatRow;
  }

  async findById(chatId: number): Promise<ChatRow | null> {
    const { data, error } = await this.db
      .from('chats')
      .select('*')
      .eq('chat_id', chatId)
      .maybeSingle();

    if (error) throw new StorageError(`Failed to find chat: ${error.message}`);
    return data as ChatRow | null;
  }

  async findAll(): Promise<ChatRow[]> {
    const { data, error } = await this.db
      .from('chats')
      .select('*')
      .order('created_at', { ascending: true })
      .order('chat_id', { ascending: true });

    if (error) throw new StorageError(`Failed to list chats: ${error.message}`);
    return (data ?? []) as ChatRow[];
  }

  async findEnabled(): Promise<ChatRow[]> {
    const { data, error } = await this.db
      .from('chats')
      .select('*')
      .eq('enabled', true)
      .order('created_at', { ascending: true })
      .order('chat_id', { ascending: true });

    if (error) throw new StorageError(`Failed to list enabled chats: ${error.message}`);
    return (data ?? []) as ChatRow[];
  }

  async update(
    chatId: number,
    data: Partial<Pick<ChatRow, 'name' | 'enabled' | 'last_report_sent'>>
  ): Promise<ChatRow | null> {
    const { data: updated, error } = await this.db
      .from('chats')
      .update(data)
      .eq('chat_id', chatId)
      .select()
      .maybeSingle();

    if (error) throw new StorageError(`Failed to update chat: ${error.message}`);
    return updated as ChatRow | null;
  }

  async delete(chatId: number): Promise<boolean> {
    const { count, error } = await this.db
      .from('chats')
      .delete({ count: 'exact' })
      .eq('chat_id', chatId);

    if (error) throw new StorageError(`Failed to delete chat: ${error.message}`);
    return (count ?? 0) > 0;
  }

  async ping(): Promise<void> {
    const { error } = await this.db
      .from('chats')
      .select('chat_id', { count: 'exact', head: true });

    if (error) throw new StorageError(`Store unreachable: ${error.message}`);
  }
}

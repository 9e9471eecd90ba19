/**
 * Chat directory data access interface.
 */

import type { ChatRow } from '../types/database.js';

export interface IChatRepository {
  insert(row: Pick<ChatRow, 'chat_id' | 'name' | 'enabled'>): Promise<ChatRow>;

  findById(chatId: number): Promise<ChatRow | null>;

  /** All chats in directory order (created_at, then chat_id). */
  findAll(): Promise<ChatRow[]>;

  /** Enabled chats in directory order. */
  findEnabled(): Promise<ChatRow[]>;

  update(
    chatId: number,
    data: Partial<Pick<ChatRow, 'name' | 'enabled' | 'last_report_sent'>>
  ): Promise<ChatRow | null>;

  delete(chatId: number): Promise<boolean>;

  /** Cheap round-trip used by the liveness probe. */
  ping(): Promise<void>;
}

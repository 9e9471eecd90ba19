/**
 * Message data access interface.
 */

import type {
  MessageAnnotationRow,
  MessageRow,
  NewMessageRow,
} from '../types/database.js';

export interface IMessageRepository {
  /**
   * Insert one message. Throws DuplicateMessageError when
   * (chat_id, message_id) already exists.
   */
  insert(row: NewMessageRow): Promise<MessageRow>;

  /** Messages with sent_at >= since, ordered by sent_at then message_id. */
  findSince(chatId: number, since: string): Promise<MessageRow[]>;

  /** Apply question/answer annotations to existing messages of a chat. */
  annotate(chatId: number, annotations: MessageAnnotationRow[]): Promise<void>;

  /** Delete messages sent before the cutoff. Returns number deleted. */
  deleteOlderThan(cutoff: string): Promise<number>;
}

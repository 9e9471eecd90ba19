/**
 * Whitelist of monitored chats.
 * The pipeline reads enabled chats and stamps last_report_sent;
 * administration adds, toggles, lists and removes entries.
 */

import type { IChatRepository } from '../repositories/IChatRepository.js';
import type { Chat } from '../types/models.js';
import type { ChatRow } from '../types/database.js';
import { AppError, NotFoundError, ValidationError } from '../errors.js';

const MAX_NAME_LENGTH = 255;

export class ChatDirectory {
  constructor(private readonly chatRepo: IChatRepository) {}

  /** Enabled chats in directory order. */
  async listEnabled(): Promise<Chat[]> {
    const rows = await this.chatRepo.findEnabled();
    return rows.map(toChat);
  }

  async list(): Promise<Chat[]> {
    const rows = await this.chatRepo.findAll();
    return rows.map(toChat);
  }

  async get(chatId: number): Promise<Chat | null> {
    const row = await this.chatRepo.findById(chatId);
    return row ? toChat(row) : null;
  }

  async isEnabled(chatId: number): Promise<boolean> {
    const row = await this.chatRepo.findById(chatId);
    return row !== null && row.enabled;
  }

  /** Add a chat, or re-enable and rename it if it is already known. */
  async add(chatId: number, name: string): Promise<Chat> {
    if (!Number.isSafeInteger(chatId)) {
      throw new ValidationError('chatId must be an integer');
    }
    const trimmed = name.trim();
    if (trimmed.length === 0) {
      throw new ValidationError('name is required');
    }
    if (trimmed.length > MAX_NAME_LENGTH) {
      throw new ValidationError(`name must be ${MAX_NAME_LENGTH} characters or less`);
    }

    const existing = await this.chatRepo.findById(chatId);
    if (existing) {
      const updated = await this.chatRepo.update(chatId, { name: trimmed, enabled: true });
      if (!updated) throw new NotFoundError(`Chat ${chatId} not found`);
      return toChat(updated);
    }

    const row = await this.chatRepo.insert({ chat_id: chatId, name: trimmed, enabled: true });
    return toChat(row);
  }

  async enable(chatId: number): Promise<Chat> {
    return this.setEnabled(chatId, true);
  }

  async disable(chatId: number): Promise<Chat> {
    return this.setEnabled(chatId, false);
  }

  async remove(chatId: number): Promise<void> {
    const deleted = await this.chatRepo.delete(chatId);
    if (!deleted) throw new NotFoundError(`Chat ${chatId} not found`);
  }

  /** The only field the pipeline writes. */
  async markReportSent(chatId: number, sentAt: Date): Promise<void> {
    const updated = await this.chatRepo.update(chatId, {
      last_report_sent: sentAt.toISOString(),
    });
    if (!updated) {
      throw new AppError('CHAT_MISSING', `Chat ${chatId} disappeared before it could be stamped`);
    }
  }

  async ping(): Promise<void> {
    await this.chatRepo.ping();
  }

  private async setEnabled(chatId: number, enabled: boolean): Promise<Chat> {
    const updated = await this.chatRepo.update(chatId, { enabled });
    if (!updated) throw new NotFoundError(`Chat ${chatId} not found`);
    return toChat(updated);
  }
}

function toChat(row: ChatRow): Chat {
  return {
    chatId: row.chat_id,
    name: row.name,
    enabled: row.enabled,
    lastReportSent: row.last_report_sent ? new Date(row.last_report_sent) : null,
    createdAt: new Date(row.created_at),
  };
}

/**
 * Message log access for ingestion and the daily pipeline.
 * Converts between rows and domain messages and owns window ordering.
 */

import type { IMessageRepository } from '../repositories/IMessageRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { AnalysisResult, Message, NewMessage } from '../types/models.js';
import type { MessageAnnotationRow, MessageRow } from '../types/database.js';
import { DuplicateMessageError, ValidationError } from '../errors.js';

export class MessageStore {
  constructor(
    private readonly messageRepo: IMessageRepository,
    private readonly logger: ILogProvider
  ) {}

  /** Persist a message. Throws DuplicateMessageError on re-ingestion. */
  async append(message: NewMessage): Promise<Message> {
    this.validate(message);

    const row = await this.messageRepo.insert({
      chat_id: message.chatId,
      message_id: message.messageId,
      user_id: message.userId,
      user_name: message.userName,
      text: message.text,
      sent_at: message.sentAt.toISOString(),
      reactions: message.reactions ?? {},
    });
    return toMessage(row);
  }

  /** Ingestion entry point: a duplicate is a no-op that returns false. */
  async appendIfAbsent(message: NewMessage): Promise<boolean> {
    try {
      await this.append(message);
      return true;
    } catch (err) {
      if (err instanceof DuplicateMessageError) {
        this.logger.debug('Duplicate message ignored', {
          chatId: message.chatId,
          messageId: message.messageId,
        });
        return false;
      }
      throw err;
    }
  }

  /**
   * Messages of a chat sent at or after `since`, oldest first, ties broken by
   * message id. The analysis prompt depends on this order.
   */
  async windowSince(chatId: number, since: Date): Promise<Message[]> {
    const rows = await this.messageRepo.findSince(chatId, since.toISOString());
    return rows.map(toMessage).sort(compareMessages);
  }

  /** Record which messages were questions and answers in a validated result. */
  async annotate(chatId: number, result: AnalysisResult): Promise<void> {
    const annotations = new Map<number, MessageAnnotationRow>();
    const entry = (messageId: number): MessageAnnotationRow => {
      let existing = annotations.get(messageId);
      if (!existing) {
        existing = {
          message_id: messageId,
          is_question: false,
          is_answer: false,
          answers_message_id: null,
        };
        annotations.set(messageId, existing);
      }
      return existing;
    };

    for (const question of result.questions) {
      entry(question.messageId).is_question = true;
      if (question.answerMessageId !== null) {
        const answer = entry(question.answerMessageId);
        answer.is_answer = true;
        answer.answers_message_id = question.messageId;
      }
    }

    if (annotations.size === 0) return;
    await this.messageRepo.annotate(chatId, [...annotations.values()]);
  }

  async deleteOlderThan(cutoff: Date): Promise<number> {
    return this.messageRepo.deleteOlderThan(cutoff.toISOString());
  }

  // ── Private ──

  private validate(message: NewMessage): void {
    if (!Number.isSafeInteger(message.chatId)) {
      throw new ValidationError('chatId must be an integer');
    }
    if (!Number.isSafeInteger(message.messageId)) {
      throw new ValidationError('messageId must be an integer');
    }
    if (Number.isNaN(message.sentAt.getTime())) {
      throw new ValidationError('sentAt must be a valid date');
    }
  }
}

export function compareMessages(a: Message, b: Message): number {
  const byTime = a.sentAt.getTime() - b.sentAt.getTime();
  return byTime !== 0 ? byTime : a.messageId - b.messageId;
}

function toMessage(row: MessageRow): Message {
  return {
    chatId: row.chat_id,
    messageId: row.message_id,
    userId: row.user_id,
    userName: row.user_name,
    text: row.text,
    sentAt: new Date(row.sent_at),
    reactions: row.reactions ?? {},
    isQuestion: row.is_question,
    isAnswer: row.is_answer,
    answersMessageId: row.answers_message_id,
    createdAt: new Date(row.created_at),
  };
}

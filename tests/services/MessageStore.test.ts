import { describe, it, expect, beforeEach } from 'vitest';
import { MessageStore } from '../../src/services/MessageStore.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { DuplicateMessageError, ValidationError } from '../../src/errors.js';
import { MockMessageRepository } from '../mocks/MockMessageRepository.js';
import { T0, minutesAfter, newMessage } from '../mocks/fixtures.js';
import type { AnalysisResult } from '../../src/types/models.js';

describe('MessageStore', () => {
  let repo: MockMessageRepository;
  let logger: ConsoleLogProvider;
  let store: MessageStore;

  beforeEach(() => {
    repo = new MockMessageRepository();
    logger = new ConsoleLogProvider();
    store = new MessageStore(repo, logger);
  });

  // ── append ──

  describe('append', () => {
    it('should persist a message and return it as a domain object', async () => {
      const stored = await store.append(newMessage(1, 10, T0, 'hello'));

      expect(stored.chatId).toBe(1);
      expect(stored.messageId).toBe(10);
      expect(stored.text).toBe('hello');
      expect(stored.sentAt.toISOString()).toBe('2026-03-10T09:00:00.000Z');
      expect(stored.reactions).toEqual({});
      expect(stored.isQuestion).toBe(false);
      expect(repo.size).toBe(1);
    });

    it('should reject a duplicate (chat, message id) and keep one row', async () => {
      await store.append(newMessage(1, 10, T0, 'first'));

      await expect(store.append(newMessage(1, 10, T0, 'second'))).rejects.toThrow(
        DuplicateMessageError
      );
      expect(repo.size).toBe(1);
      expect(repo.get(1, 10)?.text).toBe('first');
    });

    it('should allow the same message id in different chats', async () => {
      await store.append(newMessage(1, 10, T0));
      await store.append(newMessage(2, 10, T0));

      expect(repo.size).toBe(2);
    });

    it('should reject an invalid send time', async () => {
      await expect(store.append(newMessage(1, 10, new Date('nope')))).rejects.toThrow(
        ValidationError
      );
    });
  });

  describe('appendIfAbsent', () => {
    it('should make re-ingestion a no-op', async () => {
      expect(await store.appendIfAbsent(newMessage(1, 10, T0))).toBe(true);
      expect(await store.appendIfAbsent(newMessage(1, 10, T0))).toBe(false);

      expect(repo.size).toBe(1);
      expect(logger.events.at(-1)?.message).toBe('Duplicate message ignored');
    });
  });

  // ── windowSince ──

  describe('windowSince', () => {
    it('should order by send time then message id, whatever the insert order', async () => {
      await store.append(newMessage(1, 30, minutesAfter(T0, 5)));
      await store.append(newMessage(1, 12, minutesAfter(T0, 1)));
      await store.append(newMessage(1, 11, minutesAfter(T0, 1)));
      await store.append(newMessage(1, 5, minutesAfter(T0, 10)));

      const window = await store.windowSince(1, T0);

      expect(window.map((m) => m.messageId)).toEqual([11, 12, 30, 5]);
    });

    it('should include messages sent exactly at the cutoff and exclude older ones', async () => {
      await store.append(newMessage(1, 1, minutesAfter(T0, -1)));
      await store.append(newMessage(1, 2, T0));
      await store.append(newMessage(1, 3, minutesAfter(T0, 1)));

      const window = await store.windowSince(1, T0);

      expect(window.map((m) => m.messageId)).toEqual([2, 3]);
    });

    it('should only return messages of the requested chat', async () => {
      await store.append(newMessage(1, 1, T0));
      await store.append(newMessage(2, 2, T0));

      const window = await store.windowSince(2, T0);

      expect(window.map((m) => m.chatId)).toEqual([2]);
    });

    it('should return an empty window for an unknown chat', async () => {
      expect(await store.windowSince(99, T0)).toEqual([]);
    });
  });

  // ── annotate ──

  describe('annotate', () => {
    it('should flag questions and their chosen answers', async () => {
      await store.append(newMessage(1, 1, T0));
      await store.append(newMessage(1, 2, minutesAfter(T0, 5)));
      await store.append(newMessage(1, 3, minutesAfter(T0, 6)));

      const result: AnalysisResult = {
        questions: [
          {
            messageId: 1,
            text: 'message 1',
            category: 'technical',
            answered: true,
            answerMessageId: 2,
            responseTimeMinutes: 5,
            askedAt: T0,
          },
        ],
        answers: [{ messageId: 2, answersMessageId: 1 }],
        summary: { totalQuestions: 1, answered: 1, unanswered: 0, avgResponseTimeMinutes: 5 },
      };

      await store.annotate(1, result);

      expect(repo.get(1, 1)).toMatchObject({ is_question: true, is_answer: false });
      expect(repo.get(1, 2)).toMatchObject({ is_answer: true, answers_message_id: 1 });
      expect(repo.get(1, 3)).toMatchObject({ is_question: false, is_answer: false });
    });
  });

  // ── deleteOlderThan ──

  describe('deleteOlderThan', () => {
    it('should delete only messages sent before the cutoff', async () => {
      await store.append(newMessage(1, 1, minutesAfter(T0, -60)));
      await store.append(newMessage(1, 2, T0));
      await store.append(newMessage(2, 3, minutesAfter(T0, -1)));

      const deleted = await store.deleteOlderThan(T0);

      expect(deleted).toBe(2);
      expect(repo.get(1, 2)).toBeDefined();
      expect(repo.size).toBe(1);
    });
  });
});

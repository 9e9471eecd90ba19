/**
 * Builders for messages and analysis payloads shared across tests.
 */

import type { AnalysisResult, Message, NewMessage } from '../../src/types/models.js';

export const T0 = new Date('2026-03-10T09:00:00.000Z');

export function minutesAfter(base: Date, minutes: number): Date {
  return new Date(base.getTime() + minutes * 60_000);
}

export function newMessage(
  chatId: number,
  messageId: number,
  sentAt: Date,
  text = `message ${messageId}`,
  userName = 'alice'
): NewMessage {
  return { chatId, messageId, userId: messageId * 10, userName, text, sentAt };
}

export function message(
  chatId: number,
  messageId: number,
  sentAt: Date,
  text = `message ${messageId}`
): Message {
  return {
    ...newMessage(chatId, messageId, sentAt, text),
    reactions: {},
    isQuestion: false,
    isAnswer: false,
    answersMessageId: null,
    createdAt: sentAt,
  };
}

export interface PayloadQuestion {
  id: number;
  answeredBy?: number;
  category?: string;
  minutes?: number;
}

/** A provider payload whose summary agrees with its questions. */
export function analysisPayload(questions: PayloadQuestion[]): string {
  const answered = questions.filter((q) => q.answeredBy !== undefined);
  return JSON.stringify({
    questions: questions.map((q) => ({
      message_id: q.id,
      text: `question ${q.id}`,
      category: q.category ?? 'technical',
      is_answered: q.answeredBy !== undefined,
      answer_message_id: q.answeredBy ?? null,
      response_time_minutes: q.answeredBy !== undefined ? (q.minutes ?? 1) : null,
    })),
    answers: answered.map((q) => ({
      message_id: q.answeredBy,
      text: `answer ${q.answeredBy}`,
      answers_to_message_id: q.id,
    })),
    summary: {
      total_questions: questions.length,
      answered: answered.length,
      unanswered: questions.length - answered.length,
      avg_response_time_minutes: null,
    },
  });
}

export function emptyResult(): AnalysisResult {
  return {
    questions: [],
    answers: [],
    summary: { totalQuestions: 0, answered: 0, unanswered: 0, avgResponseTimeMinutes: null },
  };
}

/** Message ids quoted in a prompt, in prompt order. */
export function promptMessageIds(prompt: string): number[] {
  return [...prompt.matchAll(/\(ID: (\d+)\)/g)].map((m) => Number(m[1]));
}

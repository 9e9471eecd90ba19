/**
 * Domain models: core entities as the application understands them.
 * Decoupled from database row shapes. All timestamps are UTC.
 */

// ── Stored Entities ──

export interface Message {
  chatId: number;
  messageId: number;
  userId: number;
  userName: string;
  text: string;
  sentAt: Date;
  /** Reaction symbol → count. */
  reactions: Record<string, number>;
  isQuestion: boolean;
  isAnswer: boolean;
  /** Message id of the question this message answers, if any. */
  answersMessageId: number | null;
  createdAt: Date;
}

/** What ingestion hands to MessageStore.append. */
export type NewMessage = Pick<
  Message,
  'chatId' | 'messageId' | 'userId' | 'userName' | 'text' | 'sentAt'
> & {
  reactions?: Record<string, number>;
};

export interface Chat {
  chatId: number;
  name: string;
  enabled: boolean;
  lastReportSent: Date | null;
  createdAt: Date;
}

export interface Report {
  id: string;
  chatId: number;
  /** UTC calendar date, YYYY-MM-DD. */
  reportDate: string;
  questionsCount: number;
  answeredCount: number;
  unansweredCount: number;
  avgResponseTimeMinutes: number | null;
  body: string;
  sentAt: Date | null;
  createdAt: Date;
}

// ── Analysis (transient) ──

export type QuestionCategory = 'technical' | 'business' | 'other';

export const QUESTION_CATEGORIES: readonly QuestionCategory[] = [
  'technical',
  'business',
  'other',
];

export interface AnalyzedQuestion {
  messageId: number;
  text: string;
  category: QuestionCategory;
  answered: boolean;
  answerMessageId: number | null;
  responseTimeMinutes: number | null;
  /** Send time of the question message. */
  askedAt: Date;
}

export interface AnalyzedAnswer {
  messageId: number;
  answersMessageId: number;
}

export interface AnalysisSummary {
  totalQuestions: number;
  answered: number;
  unanswered: number;
  avgResponseTimeMinutes: number | null;
}

export interface AnalysisResult {
  questions: AnalyzedQuestion[];
  answers: AnalyzedAnswer[];
  summary: AnalysisSummary;
}

// ── Response Time ──

export type ResponseTimeBucket =
  | 'fast'
  | 'medium'
  | 'slow'
  | 'very_slow'
  | 'unanswered';

/**
 * Parse-and-validate step for analysis provider output.
 *
 * The provider's text is untrusted. It is unwrapped from code fences or
 * surrounding prose, parsed as JSON, checked field by field, then reconciled
 * against the message window it was produced from. Any violation raises
 * MalformedResponseError; nothing is coerced into a best guess.
 */

import type {
  AnalysisResult,
  AnalyzedAnswer,
  AnalyzedQuestion,
  Message,
  QuestionCategory,
} from '../types/models.js';
import { QUESTION_CATEGORIES } from '../types/models.js';
import { MalformedResponseError } from '../errors.js';
import { compareMessages } from './MessageStore.js';

const MS_PER_MINUTE = 60_000;
// Only a fence around the whole response; fences inside string values are content.
const WRAPPING_FENCE = /^```[\w-]*\s*([\s\S]*?)\s*```$/;

// ── Raw payload shapes (after field validation) ──

interface RawQuestion {
  message_id: number;
  text: string;
  category: QuestionCategory;
  is_answered: boolean;
  answer_message_id: number | null;
  response_time_minutes: number | null;
}

interface RawAnswer {
  message_id: number;
  answers_to_message_id: number;
}

interface RawSummary {
  total_questions: number;
  answered: number;
  unanswered: number;
}

interface RawResult {
  questions: RawQuestion[];
  answers: RawAnswer[];
  summary: RawSummary;
}

export class AnalysisResultParser {
  parse(raw: string, window: Message[]): AnalysisResult {
    const json = extractJson(raw);

    let payload: unknown;
    try {
      payload = JSON.parse(json);
    } catch (err) {
      throw new MalformedResponseError('Analysis response is not valid JSON', {
        error: err instanceof Error ? err.message : String(err),
        excerpt: raw.slice(0, 200),
      });
    }

    const problems: string[] = [];
    const result = readResult(payload, problems);
    if (!result || problems.length > 0) {
      throw new MalformedResponseError('Analysis response failed validation', {
        problems,
      });
    }

    return reconcile(result, window);
  }
}

/** Strip code fences and leading/trailing prose around a JSON object. */
export function extractJson(raw: string): string {
  const trimmed = raw.trim();
  if (trimmed.startsWith('{') && trimmed.endsWith('}')) {
    return trimmed;
  }

  const fenced = WRAPPING_FENCE.exec(trimmed);
  const candidate = fenced ? fenced[1].trim() : trimmed;

  if (candidate.startsWith('{') && candidate.endsWith('}')) {
    return candidate;
  }

  const start = candidate.indexOf('{');
  const end = candidate.lastIndexOf('}');
  if (start === -1 || end <= start) {
    throw new MalformedResponseError('Analysis response contains no JSON object', {
      excerpt: raw.slice(0, 200),
    });
  }
  return candidate.slice(start, end + 1);
}

// ── Field validation ──

function readResult(payload: unknown, problems: string[]): RawResult | null {
  if (!isRecord(payload)) {
    problems.push('response must be a JSON object');
    return null;
  }

  const { questions, answers, summary } = payload;
  if (!Array.isArray(questions)) problems.push('questions must be an array');
  if (!Array.isArray(answers)) problems.push('answers must be an array');
  if (!isRecord(summary)) problems.push('summary must be an object');
  if (!Array.isArray(questions) || !Array.isArray(answers) || !isRecord(summary)) {
    return null;
  }

  return {
    questions: questions.map((q: unknown, i) => readQuestion(q, `questions[${i}]`, problems)),
    answers: answers.map((a: unknown, i) => readAnswer(a, `answers[${i}]`, problems)),
    summary: readSummary(summary, problems),
  };
}

function readQuestion(value: unknown, path: string, problems: string[]): RawQuestion {
  const q = isRecord(value) ? value : {};
  if (!isRecord(value)) problems.push(`${path} must be an object`);

  const category = q.category;
  if (typeof category !== 'string' || !isCategory(category)) {
    problems.push(`${path}.category must be one of: ${QUESTION_CATEGORIES.join(', ')}`);
  }
  if (typeof q.is_answered !== 'boolean') {
    problems.push(`${path}.is_answered must be a boolean`);
  }
  if (typeof q.text !== 'string') {
    problems.push(`${path}.text must be a string`);
  }

  return {
    message_id: readInteger(q.message_id, `${path}.message_id`, problems),
    text: typeof q.text === 'string' ? q.text : '',
    category: typeof category === 'string' && isCategory(category) ? category : 'other',
    is_answered: q.is_answered === true,
    answer_message_id: readOptionalInteger(q.answer_message_id, `${path}.answer_message_id`, problems),
    response_time_minutes: readOptionalMinutes(
      q.response_time_minutes,
      `${path}.response_time_minutes`,
      problems
    ),
  };
}

function readAnswer(value: unknown, path: string, problems: string[]): RawAnswer {
  const a = isRecord(value) ? value : {};
  if (!isRecord(value)) problems.push(`${path} must be an object`);

  return {
    message_id: readInteger(a.message_id, `${path}.message_id`, problems),
    answers_to_message_id: readInteger(
      a.answers_to_message_id,
      `${path}.answers_to_message_id`,
      problems
    ),
  };
}

function readSummary(s: Record<string, unknown>, problems: string[]): RawSummary {
  const count = (field: string): number => {
    const value = readInteger(s[field], `summary.${field}`, problems);
    if (value < 0) problems.push(`summary.${field} must not be negative`);
    return value;
  };

  const avg = s.avg_response_time_minutes;
  if (avg !== undefined && avg !== null && (typeof avg !== 'number' || !Number.isFinite(avg))) {
    problems.push('summary.avg_response_time_minutes must be a number or null');
  }

  return {
    total_questions: count('total_questions'),
    answered: count('answered'),
    unanswered: count('unanswered'),
  };
}

function readInteger(value: unknown, path: string, problems: string[]): number {
  if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
    problems.push(`${path} must be an integer`);
    return 0;
  }
  return value;
}

function readOptionalInteger(value: unknown, path: string, problems: string[]): number | null {
  if (value === undefined || value === null) return null;
  return readInteger(value, path, problems);
}

function readOptionalMinutes(value: unknown, path: string, problems: string[]): number | null {
  if (value === undefined || value === null) return null;
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    problems.push(`${path} must be a non-negative number or null`);
    return null;
  }
  return value;
}

// ── Reconciliation against the window ──

function reconcile(raw: RawResult, window: Message[]): AnalysisResult {
  const byId = new Map(window.map((m) => [m.messageId, m]));
  const problems: string[] = [];

  const questionIds = new Set<number>();
  for (const q of raw.questions) {
    if (questionIds.has(q.message_id)) {
      problems.push(`question ${q.message_id} is listed more than once`);
    }
    questionIds.add(q.message_id);
    if (!byId.has(q.message_id)) {
      problems.push(`question ${q.message_id} is not a message in the window`);
    }
  }

  const answersByQuestion = new Map<number, number[]>();
  const answers: AnalyzedAnswer[] = [];
  for (const a of raw.answers) {
    if (!byId.has(a.message_id)) {
      problems.push(`answer ${a.message_id} is not a message in the window`);
    }
    if (!questionIds.has(a.answers_to_message_id)) {
      problems.push(
        `answer ${a.message_id} references unknown question ${a.answers_to_message_id}`
      );
    }
    const list = answersByQuestion.get(a.answers_to_message_id) ?? [];
    list.push(a.message_id);
    answersByQuestion.set(a.answers_to_message_id, list);
    answers.push({ messageId: a.message_id, answersMessageId: a.answers_to_message_id });
  }

  if (problems.length > 0) {
    throw new MalformedResponseError('Analysis result references unknown messages', { problems });
  }

  const questions: AnalyzedQuestion[] = [];
  for (const q of raw.questions) {
    const asked = byId.get(q.message_id);
    if (!asked) continue;

    const referencing = answersByQuestion.get(q.message_id) ?? [];

    if (!q.is_answered) {
      if (q.answer_message_id !== null || q.response_time_minutes !== null) {
        problems.push(`unanswered question ${q.message_id} carries an answer or response time`);
      }
      if (referencing.length > 0) {
        problems.push(`unanswered question ${q.message_id} is referenced by an answer`);
      }
      questions.push({
        messageId: q.message_id,
        text: asked.text,
        category: q.category,
        answered: false,
        answerMessageId: null,
        responseTimeMinutes: null,
        askedAt: asked.sentAt,
      });
      continue;
    }

    const candidateIds = new Set(referencing);
    if (q.answer_message_id !== null) {
      if (!byId.has(q.answer_message_id)) {
        problems.push(`question ${q.message_id} names unknown answer ${q.answer_message_id}`);
        continue;
      }
      candidateIds.add(q.answer_message_id);
    }

    const chosen = earliestQualifyingAnswer(asked, candidateIds, byId);
    if (!chosen) {
      problems.push(`answered question ${q.message_id} has no answer sent after it`);
      continue;
    }

    questions.push({
      messageId: q.message_id,
      text: asked.text,
      category: q.category,
      answered: true,
      answerMessageId: chosen.messageId,
      responseTimeMinutes: (chosen.sentAt.getTime() - asked.sentAt.getTime()) / MS_PER_MINUTE,
      askedAt: asked.sentAt,
    });
  }

  const answered = questions.filter((q) => q.answered);
  const summary = raw.summary;
  if (summary.total_questions !== raw.questions.length) {
    problems.push(
      `summary.total_questions is ${summary.total_questions} but ${raw.questions.length} questions were listed`
    );
  }
  if (summary.answered !== answered.length) {
    problems.push(
      `summary.answered is ${summary.answered} but ${answered.length} questions are answered`
    );
  }
  if (summary.unanswered !== raw.questions.length - answered.length) {
    problems.push(
      `summary.unanswered is ${summary.unanswered} but ${raw.questions.length - answered.length} questions are unanswered`
    );
  }

  if (problems.length > 0) {
    throw new MalformedResponseError('Analysis result is internally inconsistent', { problems });
  }

  const times = answered.map((q) => q.responseTimeMinutes ?? 0);
  return {
    questions,
    answers,
    summary: {
      totalQuestions: questions.length,
      answered: answered.length,
      unanswered: questions.length - answered.length,
      avgResponseTimeMinutes:
        times.length > 0 ? times.reduce((sum, t) => sum + t, 0) / times.length : null,
    },
  };
}

/**
 * Among the candidate answers, the first one sent at or after the question.
 * Candidates sent before the question do not qualify.
 */
function earliestQualifyingAnswer(
  question: Message,
  candidateIds: Set<number>,
  byId: Map<number, Message>
): Message | null {
  const qualifying: Message[] = [];
  for (const id of candidateIds) {
    const candidate = byId.get(id);
    if (
      candidate &&
      candidate.messageId !== question.messageId &&
      compareMessages(candidate, question) > 0
    ) {
      qualifying.push(candidate);
    }
  }
  qualifying.sort(compareMessages);
  return qualifying[0] ?? null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCategory(value: string): value is QuestionCategory {
  return (QUESTION_CATEGORIES as readonly string[]).includes(value);
}

/**
 * Renders a validated analysis result as a Telegram HTML document.
 *
 * Sections are separated by a blank line and never contain one, so a
 * document can be split on section boundaries and the summary can be
 * read back out of a stored body.
 */

import type { AnalysisResult, AnalyzedQuestion, Chat, QuestionCategory } from '../types/models.js';
import { BUCKET_LABELS, BUCKET_ORDER, bucketCounts } from './ResponseTimeClassifier.js';
import type { ResponseTimeBucket } from '../types/models.js';

export const DEFAULT_REPORT_TAG = '#DailyReport';
export const SECTION_SEPARATOR = '\n\n';
const DEFAULT_MAX_LENGTH = 4096;

const SUMMARY_HEADING = '<b>Summary</b>';

const BUCKET_ICONS: Record<ResponseTimeBucket, string> = {
  fast: '⚡',
  medium: '🕐',
  slow: '🐌',
  very_slow: '🦥',
  unanswered: '❌',
};

const CATEGORY_BADGES: Record<QuestionCategory, string> = {
  technical: '🔧 Technical',
  business: '💼 Business',
  other: '❓ Other',
};

export interface SummaryTotals {
  totalQuestions: number;
  answered: number;
  unanswered: number;
}

export class ReportFormatter {
  private readonly tag: string;

  constructor(options?: { tag?: string }) {
    this.tag = options?.tag ?? DEFAULT_REPORT_TAG;
  }

  format(chat: Pick<Chat, 'name'>, reportDate: string, result: AnalysisResult): string {
    return [
      this.header(chat.name, reportDate),
      summarySection(result),
      breakdownSection(result.questions),
      unansweredSection(result.questions),
      reactionsSection(),
    ].join(SECTION_SEPARATOR);
  }

  /**
   * Split a document into chunks no longer than `maxLength`, preferring
   * section boundaries, then line boundaries, then word boundaries.
   */
  split(document: string, maxLength = DEFAULT_MAX_LENGTH): string[] {
    if (document.length <= maxLength) return [document];

    const pieces = document
      .split(SECTION_SEPARATOR)
      .flatMap((section) =>
        section.length <= maxLength ? [section] : splitSection(section, maxLength)
      );
    return pack(pieces, SECTION_SEPARATOR, maxLength);
  }

  private header(chatName: string, reportDate: string): string {
    return [
      `<b>📊 Daily Communication Report</b> ${escapeHtml(this.tag)}`,
      `<b>Chat:</b> ${escapeInline(chatName)}`,
      `<b>Date:</b> ${reportDate}`,
    ].join('\n');
  }
}

// ── Sections ──

function summarySection(result: AnalysisResult): string {
  const { totalQuestions, answered, unanswered, avgResponseTimeMinutes } = result.summary;
  const answerRate =
    totalQuestions > 0 ? `${((answered / totalQuestions) * 100).toFixed(1)}%` : 'N/A';
  const avg = avgResponseTimeMinutes !== null ? formatDuration(avgResponseTimeMinutes) : 'N/A';

  return [
    SUMMARY_HEADING,
    `Total questions: ${totalQuestions}`,
    `Answered: ${answered} (${answerRate})`,
    `Unanswered: ${unanswered}`,
    `Average response time: ${avg}`,
  ].join('\n');
}

function breakdownSection(questions: AnalyzedQuestion[]): string {
  const counts = bucketCounts(questions);
  const lines = BUCKET_ORDER.map(
    (bucket) => `${BUCKET_ICONS[bucket]} ${escapeHtml(BUCKET_LABELS[bucket])}: ${counts[bucket]}`
  );
  return ['<b>Response Time Breakdown</b>', ...lines].join('\n');
}

function unansweredSection(questions: AnalyzedQuestion[]): string {
  const unanswered = questions.filter((q) => !q.answered);
  if (unanswered.length === 0) {
    return '<b>Unanswered Questions</b>\n✨ All questions have been answered!';
  }

  const lines = unanswered.map(
    (q, i) =>
      `${i + 1}. [${formatUtc(q.askedAt)}] ${CATEGORY_BADGES[q.category]}: ${escapeInline(q.text)}`
  );
  return ['<b>Unanswered Questions</b>', ...lines].join('\n');
}

function reactionsSection(): string {
  return '<b>Top Reactions</b>\n<i>Reaction tracking coming soon</i>';
}

// ── Read-back ──

/** Totals from the summary section of a formatted document, or null. */
export function parseSummary(document: string): SummaryTotals | null {
  const section = document
    .split(SECTION_SEPARATOR)
    .find((s) => s.startsWith(SUMMARY_HEADING));
  if (!section) return null;

  const total = /^Total questions: (\d+)$/m.exec(section);
  const answered = /^Answered: (\d+)/m.exec(section);
  const unanswered = /^Unanswered: (\d+)$/m.exec(section);
  if (!total || !answered || !unanswered) return null;

  return {
    totalQuestions: Number(total[1]),
    answered: Number(answered[1]),
    unanswered: Number(unanswered[1]),
  };
}

// ── Text helpers ──

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/** Escaped and flattened to one line so it cannot break the section layout. */
function escapeInline(text: string): string {
  return escapeHtml(text.replace(/\s*\n\s*/g, ' ').trim());
}

export function formatDuration(minutes: number): string {
  if (minutes < 60) return `${Math.floor(minutes)}m`;

  const hours = Math.floor(minutes / 60);
  const mins = Math.floor(minutes % 60);
  return mins === 0 ? `${hours}h` : `${hours}h ${mins}m`;
}

function formatUtc(date: Date): string {
  return `${date.toISOString().slice(0, 16).replace('T', ' ')} UTC`;
}

// ── Splitting ──

function splitSection(section: string, maxLength: number): string[] {
  const lines = section
    .split('\n')
    .flatMap((line) => (line.length <= maxLength ? [line] : splitLine(line, maxLength)));
  return pack(lines, '\n', maxLength);
}

function splitLine(line: string, maxLength: number): string[] {
  const words = line
    .split(' ')
    .flatMap((word) => (word.length <= maxLength ? [word] : hardSplit(word, maxLength)));
  return pack(words, ' ', maxLength);
}

/** Last resort for a single oversize word; never cuts an HTML entity in half. */
function hardSplit(word: string, maxLength: number): string[] {
  const parts: string[] = [];
  let rest = word;
  while (rest.length > maxLength) {
    let cut = maxLength;
    const amp = rest.lastIndexOf('&', cut - 1);
    if (amp > 0 && rest.indexOf(';', amp) >= cut) cut = amp;
    parts.push(rest.slice(0, cut));
    rest = rest.slice(cut);
  }
  parts.push(rest);
  return parts;
}

function pack(pieces: string[], separator: string, maxLength: number): string[] {
  const chunks: string[] = [];
  let current: string | null = null;

  for (const piece of pieces) {
    if (current === null) {
      current = piece;
    } else if (current.length + separator.length + piece.length <= maxLength) {
      current += separator + piece;
    } else {
      chunks.push(current);
      current = piece;
    }
  }
  if (current !== null) chunks.push(current);
  return chunks;
}

import { describe, it, expect } from 'vitest';
import {
  ReportFormatter,
  escapeHtml,
  formatDuration,
  parseSummary,
} from '../../src/services/ReportFormatter.js';
import type { AnalysisResult, AnalyzedQuestion } from '../../src/types/models.js';
import { T0, emptyResult, minutesAfter } from '../mocks/fixtures.js';

function question(
  messageId: number,
  responseTimeMinutes: number | null,
  overrides: Partial<AnalyzedQuestion> = {}
): AnalyzedQuestion {
  return {
    messageId,
    text: `question ${messageId}`,
    category: 'technical',
    answered: responseTimeMinutes !== null,
    answerMessageId: responseTimeMinutes !== null ? messageId + 1000 : null,
    responseTimeMinutes,
    askedAt: minutesAfter(T0, messageId),
    ...overrides,
  };
}

function resultOf(questions: AnalyzedQuestion[]): AnalysisResult {
  const answered = questions.filter((q) => q.answered);
  const times = answered.map((q) => q.responseTimeMinutes ?? 0);
  return {
    questions,
    answers: answered.map((q) => ({ messageId: q.answerMessageId ?? 0, answersMessageId: q.messageId })),
    summary: {
      totalQuestions: questions.length,
      answered: answered.length,
      unanswered: questions.length - answered.length,
      avgResponseTimeMinutes: times.length ? times.reduce((a, b) => a + b, 0) / times.length : null,
    },
  };
}

describe('ReportFormatter', () => {
  const formatter = new ReportFormatter();

  describe('format', () => {
    it('should render every section in order', () => {
      const doc = formatter.format({ name: 'Partner-A' }, '2026-03-10', resultOf([question(1, 45)]));

      expect(doc).toBe(
        [
          '<b>📊 Daily Communication Report</b> #DailyReport\n<b>Chat:</b> Partner-A\n<b>Date:</b> 2026-03-10',
          '<b>Summary</b>\nTotal questions: 1\nAnswered: 1 (100.0%)\nUnanswered: 0\nAverage response time: 45m',
          '<b>Response Time Breakdown</b>\n⚡ Fast (&lt;1h): 1\n🕐 Medium (1-4h): 0\n🐌 Slow (4-24h): 0\n🦥 Very slow (&gt;24h): 0\n❌ Unanswered: 0',
          '<b>Unanswered Questions</b>\n✨ All questions have been answered!',
          '<b>Top Reactions</b>\n<i>Reaction tracking coming soon</i>',
        ].join('\n\n')
      );
    });

    it('should list unanswered questions with their original time and category', () => {
      const doc = formatter.format(
        { name: 'Ops' },
        '2026-03-10',
        resultOf([
          question(1, 30),
          question(2, null, { category: 'business', text: 'When is the <b>invoice</b> due?' }),
        ])
      );

      expect(doc).toContain(
        '<b>Unanswered Questions</b>\n1. [2026-03-10 09:02 UTC] 💼 Business: When is the &lt;b&gt;invoice&lt;/b&gt; due?'
      );
      expect(doc).toContain('Answered: 1 (50.0%)');
      expect(doc).toContain('❌ Unanswered: 1');
    });

    it('should escape the chat name', () => {
      const doc = formatter.format({ name: 'R&D <core>' }, '2026-03-10', resultOf([]));

      expect(doc).toContain('<b>Chat:</b> R&amp;D &lt;core&gt;');
    });

    it('should flatten multi-line question text to one line', () => {
      const doc = formatter.format(
        { name: 'Ops' },
        '2026-03-10',
        resultOf([question(1, null, { category: 'other', text: 'first line\n\nsecond line' })])
      );

      expect(doc).toContain('1. [2026-03-10 09:01 UTC] ❓ Other: first line second line');
    });

    it('should show N/A for rate and average when there is nothing to measure', () => {
      const doc = formatter.format({ name: 'Quiet' }, '2026-03-10', emptyResult());

      expect(doc).toContain('Answered: 0 (N/A)');
      expect(doc).toContain('Average response time: N/A');
    });

    it('should bucket response times in the breakdown', () => {
      const doc = formatter.format(
        { name: 'Ops' },
        '2026-03-10',
        resultOf([question(1, 10), question(2, 60), question(3, 241), question(4, 1441), question(5, null)])
      );

      expect(doc).toContain(
        '⚡ Fast (&lt;1h): 1\n🕐 Medium (1-4h): 1\n🐌 Slow (4-24h): 1\n🦥 Very slow (&gt;24h): 1\n❌ Unanswered: 1'
      );
    });

    it('should use a configured tag', () => {
      const tagged = new ReportFormatter({ tag: '#QA' });

      expect(tagged.format({ name: 'Ops' }, '2026-03-10', emptyResult())).toContain(
        '<b>📊 Daily Communication Report</b> #QA'
      );
    });
  });

  describe('parseSummary', () => {
    it('should read back the totals of a formatted document', () => {
      const result = resultOf([question(1, 5), question(2, null), question(3, 300)]);
      const doc = formatter.format({ name: 'Ops' }, '2026-03-10', result);

      expect(parseSummary(doc)).toEqual({
        totalQuestions: result.summary.totalQuestions,
        answered: result.summary.answered,
        unanswered: result.summary.unanswered,
      });
    });

    it('should not be confused by question text that looks like a summary line', () => {
      const result = resultOf([question(1, null, { text: 'Total questions: 99' })]);
      const doc = formatter.format({ name: 'Ops' }, '2026-03-10', result);

      expect(parseSummary(doc)).toEqual({ totalQuestions: 1, answered: 0, unanswered: 1 });
    });

    it('should return null without a summary section', () => {
      expect(parseSummary('<b>Top Reactions</b>')).toBeNull();
    });
  });

  describe('split', () => {
    it('should return a short document as one chunk', () => {
      expect(formatter.split('short', 4096)).toEqual(['short']);
    });

    it('should split on section boundaries first', () => {
      expect(formatter.split('aaa\n\nbbb\n\nccc', 8)).toEqual(['aaa\n\nbbb', 'ccc']);
    });

    it('should split an oversize section on line boundaries', () => {
      expect(formatter.split('line one\nline two', 10)).toEqual(['line one', 'line two']);
    });

    it('should split an oversize line on word boundaries', () => {
      expect(formatter.split('alpha beta gamma', 11)).toEqual(['alpha beta', 'gamma']);
    });

    it('should not cut an HTML entity in half', () => {
      expect(formatter.split('x&amp;y', 5)).toEqual(['x', '&amp;', 'y']);
    });

    it('should keep every chunk of a long report within the limit', () => {
      const questions = Array.from({ length: 40 }, (_, i) =>
        question(i + 1, null, { text: `question number ${i + 1} about the deployment pipeline` })
      );
      const doc = formatter.format({ name: 'Ops' }, '2026-03-10', resultOf(questions));

      const chunks = formatter.split(doc, 500);

      expect(chunks.length).toBeGreaterThan(1);
      for (const chunk of chunks) {
        expect(chunk.length).toBeLessThanOrEqual(500);
      }
      expect(chunks[0].startsWith('<b>📊 Daily Communication Report</b>')).toBe(true);
      expect(chunks.join('\n')).toContain('40. [2026-03-10 09:40 UTC]');
    });
  });
});

describe('formatDuration', () => {
  it.each([
    [0, '0m'],
    [45, '45m'],
    [59.9, '59m'],
    [60, '1h'],
    [90, '1h 30m'],
    [150.7, '2h 30m'],
    [1500, '25h'],
  ])('formats %s minutes as %s', (minutes, text) => {
    expect(formatDuration(minutes)).toBe(text);
  });
});

describe('escapeHtml', () => {
  it('should escape ampersands before angle brackets', () => {
    expect(escapeHtml('<a & b>')).toBe('&lt;a &amp; b&gt;');
  });
});

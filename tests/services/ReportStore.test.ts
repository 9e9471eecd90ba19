import { describe, it, expect, beforeEach } from 'vitest';
import { ReportStore, toReportDate } from '../../src/services/ReportStore.js';
import { AppError, ValidationError } from '../../src/errors.js';
import type { AnalysisResult } from '../../src/types/models.js';
import { MockReportRepository } from '../mocks/MockReportRepository.js';
import { emptyResult } from '../mocks/fixtures.js';

const oneAnswered: AnalysisResult = {
  ...emptyResult(),
  summary: { totalQuestions: 1, answered: 1, unanswered: 0, avgResponseTimeMinutes: 45 },
};

describe('ReportStore', () => {
  let repo: MockReportRepository;
  let store: ReportStore;

  beforeEach(() => {
    repo = new MockReportRepository();
    store = new ReportStore(repo);
  });

  describe('save', () => {
    it('should persist counts and body', async () => {
      const outcome = await store.save(1, '2026-03-10', oneAnswered, 'body');

      expect(outcome.status).toBe('saved');
      expect(outcome.report).toMatchObject({
        chatId: 1,
        reportDate: '2026-03-10',
        questionsCount: 1,
        answeredCount: 1,
        unansweredCount: 0,
        avgResponseTimeMinutes: 45,
        body: 'body',
        sentAt: null,
      });
    });

    it('should replace an unsent report for the same date', async () => {
      const first = await store.save(1, '2026-03-10', emptyResult(), 'v1');
      const second = await store.save(1, '2026-03-10', oneAnswered, 'v2');

      expect(second.report.id).toBe(first.report.id);
      expect(second.report.body).toBe('v2');
      expect(repo.all()).toHaveLength(1);
    });

    it('should leave a sent report untouched', async () => {
      const { report } = await store.save(1, '2026-03-10', oneAnswered, 'v1');
      await store.markSent(report, new Date('2026-03-10T10:00:00.000Z'));

      const again = await store.save(1, '2026-03-10', oneAnswered, 'v2');

      expect(again.status).toBe('already_sent');
      expect(again.report.body).toBe('v1');
      expect(repo.upserts).toBe(1);
    });
  });

  describe('markSent', () => {
    it('should set sentAt', async () => {
      const { report } = await store.save(1, '2026-03-10', oneAnswered, 'body');

      const sent = await store.markSent(report, new Date('2026-03-10T10:00:00.000Z'));

      expect(sent.sentAt?.toISOString()).toBe('2026-03-10T10:00:00.000Z');
    });

    it('should refuse to mark a zero-question report as sent', async () => {
      const { report } = await store.save(1, '2026-03-10', emptyResult(), 'body');

      await expect(store.markSent(report, new Date())).rejects.toThrow(AppError);
      expect((await store.findByChatAndDate(1, '2026-03-10'))?.sentAt).toBeNull();
    });
  });

  describe('history', () => {
    it('should return most recent reports first', async () => {
      await store.save(1, '2026-03-08', emptyResult(), 'a');
      await store.save(1, '2026-03-10', emptyResult(), 'c');
      await store.save(1, '2026-03-09', emptyResult(), 'b');
      await store.save(2, '2026-03-10', emptyResult(), 'other chat');

      const history = await store.history(1, 2);

      expect(history.map((r) => r.reportDate)).toEqual(['2026-03-10', '2026-03-09']);
    });

    it('should reject an out-of-range limit', async () => {
      await expect(store.history(1, 0)).rejects.toThrow(ValidationError);
      await expect(store.history(1, 101)).rejects.toThrow(ValidationError);
    });
  });

  describe('deleteBefore', () => {
    it('should delete reports dated before the cutoff', async () => {
      await store.save(1, '2026-01-01', emptyResult(), 'old');
      await store.save(1, '2026-03-10', emptyResult(), 'new');

      expect(await store.deleteBefore('2026-02-01')).toBe(1);
      expect(repo.all().map((r) => r.report_date)).toEqual(['2026-03-10']);
    });
  });
});

describe('toReportDate', () => {
  it('should use the UTC calendar date', () => {
    expect(toReportDate(new Date('2026-03-10T23:59:59.999Z'))).toBe('2026-03-10');
    expect(toReportDate(new Date('2026-03-11T00:00:00.000Z'))).toBe('2026-03-11');
  });
});

import { describe, it, expect } from 'vitest';
import {
  classifyResponseTime,
  bucketCounts,
  BUCKET_ORDER,
} from '../../src/services/ResponseTimeClassifier.js';
import type { ResponseTimeBucket } from '../../src/types/models.js';

const BOUNDARIES: [number, ResponseTimeBucket][] = [
  [0, 'fast'],
  [59, 'fast'],
  [59.99, 'fast'],
  [60, 'medium'],
  [61, 'medium'],
  [240, 'medium'],
  [240.5, 'slow'],
  [241, 'slow'],
  [1440, 'slow'],
  [1441, 'very_slow'],
  [100_000, 'very_slow'],
];

describe('classifyResponseTime', () => {
  it.each(BOUNDARIES)('classifies %s minutes as %s', (minutes, bucket) => {
    expect(classifyResponseTime(minutes)).toBe(bucket);
  });

  it('should treat a missing response time as unanswered', () => {
    expect(classifyResponseTime(null)).toBe('unanswered');
    expect(classifyResponseTime(undefined)).toBe('unanswered');
    expect(classifyResponseTime(Number.NaN)).toBe('unanswered');
  });

  it('should never throw and always return a known bucket', () => {
    for (const t of [-5, 0, 1e-9, Infinity, -Infinity, Number.MAX_VALUE]) {
      expect(BUCKET_ORDER).toContain(classifyResponseTime(t));
    }
  });

  it('should be monotonic across the range', () => {
    let previous = BUCKET_ORDER.indexOf(classifyResponseTime(0));
    for (let t = 0; t <= 2000; t += 0.5) {
      const rank = BUCKET_ORDER.indexOf(classifyResponseTime(t));
      expect(rank).toBeGreaterThanOrEqual(previous);
      previous = rank;
    }
  });
});

describe('bucketCounts', () => {
  it('should count every question into exactly one bucket', () => {
    const counts = bucketCounts([
      { responseTimeMinutes: 10 },
      { responseTimeMinutes: 45 },
      { responseTimeMinutes: 120 },
      { responseTimeMinutes: 600 },
      { responseTimeMinutes: 3000 },
      { responseTimeMinutes: null },
    ]);

    expect(counts).toEqual({ fast: 2, medium: 1, slow: 1, very_slow: 1, unanswered: 1 });
  });

  it('should return zeros for no questions', () => {
    expect(bucketCounts([])).toEqual({ fast: 0, medium: 0, slow: 0, very_slow: 0, unanswered: 0 });
  });
});

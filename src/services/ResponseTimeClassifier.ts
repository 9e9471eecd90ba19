/**
 * Response-time buckets.
 *
 *   fast       t < 60
 *   medium     60 <= t <= 240
 *   slow       240 < t <= 1440
 *   very_slow  t > 1440
 *   unanswered no response time
 */

import type { AnalyzedQuestion, ResponseTimeBucket } from '../types/models.js';

const FAST_BELOW = 60;
const MEDIUM_UP_TO = 240;
const SLOW_UP_TO = 1440;

export const BUCKET_ORDER: readonly ResponseTimeBucket[] = [
  'fast',
  'medium',
  'slow',
  'very_slow',
  'unanswered',
];

export const BUCKET_LABELS: Record<ResponseTimeBucket, string> = {
  fast: 'Fast (<1h)',
  medium: 'Medium (1-4h)',
  slow: 'Slow (4-24h)',
  very_slow: 'Very slow (>24h)',
  unanswered: 'Unanswered',
};

/** Total over every input: never throws. */
export function classifyResponseTime(
  minutes: number | null | undefined
): ResponseTimeBucket {
  if (minutes === null || minutes === undefined || Number.isNaN(minutes)) {
    return 'unanswered';
  }
  if (minutes < FAST_BELOW) return 'fast';
  if (minutes <= MEDIUM_UP_TO) return 'medium';
  if (minutes <= SLOW_UP_TO) return 'slow';
  return 'very_slow';
}

export function bucketCounts(
  questions: Pick<AnalyzedQuestion, 'responseTimeMinutes'>[]
): Record<ResponseTimeBucket, number> {
  const counts: Record<ResponseTimeBucket, number> = {
    fast: 0,
    medium: 0,
    slow: 0,
    very_slow: 0,
    unanswered: 0,
  };
  for (const question of questions) {
    counts[classifyResponseTime(question.responseTimeMinutes)]++;
  }
  return counts;
}

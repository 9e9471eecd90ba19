/**
 * Fires named jobs once a day at a fixed UTC time of day.
 *
 * Owned by the process entry point: `start()` arms a timer per job and
 * `stop()` disarms them and aborts any job still running. A job that is
 * still running when its next fire comes round is skipped for that day.
 */

import type { ILogProvider } from '../providers/ILogProvider.js';
import type { Clock } from '../types/common.js';
import { ValidationError, errorMessage } from '../errors.js';

const MS_PER_MINUTE = 60_000;
const MS_PER_DAY = 24 * 60 * MS_PER_MINUTE;

export interface TimeOfDay {
  hour: number;
  minute: number;
}

export interface ScheduledJob {
  name: string;
  at: TimeOfDay;
  run: (signal: AbortSignal) => Promise<unknown>;
}

export interface JobStatus {
  name: string;
  nextRunAt: Date | null;
  running: boolean;
  lastRunAt: Date | null;
}

interface JobState {
  job: ScheduledJob;
  timer: ReturnType<typeof setTimeout> | null;
  nextRunAt: Date | null;
  lastRunAt: Date | null;
  inFlight: Promise<void> | null;
}

export class DailyScheduler {
  private readonly jobs = new Map<string, JobState>();
  private controller: AbortController | null = null;

  constructor(
    private readonly logger: ILogProvider,
    private readonly clock: Clock,
    private readonly jitterToleranceMinutes: number
  ) {}

  add(job: ScheduledJob): void {
    if (this.jobs.has(job.name)) {
      throw new ValidationError(`Job "${job.name}" is already scheduled`);
    }
    const state: JobState = { job, timer: null, nextRunAt: null, lastRunAt: null, inFlight: null };
    this.jobs.set(job.name, state);
    if (this.controller) this.arm(state);
  }

  get running(): boolean {
    return this.controller !== null;
  }

  start(): void {
    if (this.controller) return;
    this.controller = new AbortController();
    for (const state of this.jobs.values()) this.arm(state);
    this.logger.info('Scheduler started', {
      jobs: this.status().map((s) => ({ name: s.name, nextRunAt: s.nextRunAt?.toISOString() })),
    });
  }

  /** Disarm all timers, abort running jobs and wait for them to settle. */
  async stop(): Promise<void> {
    const controller = this.controller;
    if (!controller) return;
    this.controller = null;

    const inFlight: Promise<void>[] = [];
    for (const state of this.jobs.values()) {
      if (state.timer) clearTimeout(state.timer);
      state.timer = null;
      state.nextRunAt = null;
      if (state.inFlight) inFlight.push(state.inFlight);
    }

    controller.abort();
    await Promise.all(inFlight);
    this.logger.info('Scheduler stopped');
  }

  status(): JobStatus[] {
    return [...this.jobs.values()].map((state) => ({
      name: state.job.name,
      nextRunAt: state.nextRunAt,
      running: state.inFlight !== null,
      lastRunAt: state.lastRunAt,
    }));
  }

  private arm(state: JobState, notBefore?: Date): void {
    const now = this.clock.now();
    const from = notBefore && notBefore.getTime() > now.getTime() ? notBefore : now;
    const next = nextOccurrence(from, state.job.at);
    state.nextRunAt = next;
    state.timer = setTimeout(() => this.fire(state, next), next.getTime() - now.getTime());
  }

  private fire(state: JobState, scheduledFor: Date): void {
    state.timer = null;
    const controller = this.controller;
    if (!controller) return;

    const { name } = state.job;
    const lateByMs = this.clock.now().getTime() - scheduledFor.getTime();
    if (lateByMs > this.jitterToleranceMinutes * MS_PER_MINUTE) {
      this.logger.warn('Job fired later than the jitter tolerance', {
        job: name,
        scheduledFor: scheduledFor.toISOString(),
        lateByMs,
      });
    }

    if (state.inFlight) {
      this.logger.warn('Previous run still in progress, skipping', { job: name });
    } else {
      state.lastRunAt = this.clock.now();
      state.inFlight = this.execute(state, controller.signal).finally(() => {
        state.inFlight = null;
      });
    }

    this.arm(state, scheduledFor);
  }

  private async execute(state: JobState, signal: AbortSignal): Promise<void> {
    const { name } = state.job;
    this.logger.info('Job started', { job: name });
    try {
      await state.job.run(signal);
      this.logger.info('Job finished', { job: name });
    } catch (err) {
      this.logger.error('Job failed', { job: name, error: errorMessage(err) });
    }
  }
}

/** First instant strictly after `now` that falls on `at` (UTC). */
export function nextOccurrence(now: Date, at: TimeOfDay): Date {
  const candidate = new Date(
    Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate(), at.hour, at.minute)
  );
  if (candidate.getTime() <= now.getTime()) {
    return new Date(candidate.getTime() + MS_PER_DAY);
  }
  return candidate;
}

/** Parse `HH:MM` (24-hour, UTC). Returns null when malformed or out of range. */
export function parseTimeOfDay(value: string): TimeOfDay | null {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
  if (!match) return null;
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) return null;
  return { hour, minute };
}

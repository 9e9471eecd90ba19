/**
 * Liveness report: scheduler armed, store reachable.
 */

import type { Clock } from '../types/common.js';
import type { JobStatus } from '../scheduler/DailyScheduler.js';
import { errorMessage } from '../errors.js';
import type { ChatDirectory } from './ChatDirectory.js';

export interface SchedulerProbe {
  readonly running: boolean;
  status(): JobStatus[];
}

export interface HealthReport {
  status: 'ok' | 'unhealthy';
  timestamp: string;
  uptimeSeconds: number;
  scheduler: {
    running: boolean;
    jobs: { name: string; nextRunAt: string | null; running: boolean; lastRunAt: string | null }[];
  };
  store: { reachable: boolean; error?: string };
}

export class HealthService {
  private readonly startedAt: Date;

  constructor(
    private readonly chatDirectory: ChatDirectory,
    private readonly scheduler: SchedulerProbe,
    private readonly clock: Clock
  ) {
    this.startedAt = clock.now();
  }

  async check(): Promise<HealthReport> {
    const now = this.clock.now();

    let store: HealthReport['store'];
    try {
      await this.chatDirectory.ping();
      store = { reachable: true };
    } catch (err) {
      store = { reachable: false, error: errorMessage(err) };
    }

    const running = this.scheduler.running;
    return {
      status: running && store.reachable ? 'ok' : 'unhealthy',
      timestamp: now.toISOString(),
      uptimeSeconds: Math.floor((now.getTime() - this.startedAt.getTime()) / 1000),
      scheduler: {
        running,
        jobs: this.scheduler.status().map((job) => ({
          name: job.name,
          nextRunAt: job.nextRunAt?.toISOString() ?? null,
          running: job.running,
          lastRunAt: job.lastRunAt?.toISOString() ?? null,
        })),
      },
      store,
    };
  }
}

/**
 * Console-based log provider.
 * Writes one line per event (warn/error to stderr) and keeps the most recent
 * events in a bounded buffer for inspection in tests and health output.
 */

import type { ILogProvider, LogEvent, LogLevel } from './ILogProvider.js';
import { LOG_LEVELS } from './ILogProvider.js';

export interface ConsoleLogProviderOptions {
  /** Write events to the console as they arrive. Default: false. */
  outputToConsole?: boolean;
  /** Events below this level are dropped. Default: 'debug'. */
  minLevel?: LogLevel;
  /** Buffer capacity; oldest events are evicted first. Default: 1000. */
  maxBufferedEvents?: number;
}

export class ConsoleLogProvider implements ILogProvider {
  /** Inspectable buffer of logged events (most recent last). */
  readonly events: LogEvent[] = [];

  private readonly outputToConsole: boolean;
  private readonly minRank: number;
  private readonly maxBufferedEvents: number;

  constructor(options?: ConsoleLogProviderOptions) {
    this.outputToConsole = options?.outputToConsole ?? false;
    this.minRank = LOG_LEVELS.indexOf(options?.minLevel ?? 'debug');
    this.maxBufferedEvents = options?.maxBufferedEvents ?? 1000;
  }

  log(event: LogEvent): void {
    if (LOG_LEVELS.indexOf(event.level) < this.minRank) return;

    const stamped: LogEvent = {
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
    };
    this.events.push(stamped);
    if (this.events.length > this.maxBufferedEvents) {
      this.events.splice(0, this.events.length - this.maxBufferedEvents);
    }

    if (this.outputToConsole) {
      const line = this.formatLine(stamped);
      if (stamped.level === 'error' || stamped.level === 'warn') {
        console.error(line);
      } else {
        console.log(line);
      }
    }
  }

  async flush(): Promise<void> {
    // Console writes are synchronous.
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'info', message, fields });
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'warn', message, fields });
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'error', message, fields });
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'debug', message, fields });
  }

  /** Clear the event buffer. Useful between test cases. */
  clear(): void {
    this.events.length = 0;
  }

  private formatLine(event: LogEvent): string {
    const { level, message, timestamp, fields, ...extra } = event;
    const merged = { ...extra, ...fields };
    const fieldsStr =
      Object.keys(merged).length > 0 ? ` ${JSON.stringify(merged)}` : '';
    return `${timestamp} [${level.toUpperCase()}] ${message}${fieldsStr}`;
  }
}

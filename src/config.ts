/**
 * Environment-driven configuration.
 * Every variable is validated up front; all problems are reported together
 * in one ConfigError.
 */

import { ConfigError } from './errors.js';
import { isLogLevel, type LogLevel } from './providers/ILogProvider.js';
import { parseTimeOfDay, type TimeOfDay } from './scheduler/DailyScheduler.js';

export type AnalysisProviderName = 'anthropic' | 'openai';

export interface Config {
  telegramBotToken: string;
  supabase: { url: string; serviceRoleKey: string };
  analysis: { provider: AnalysisProviderName; apiKey: string; model: string | null };
  adminChatId: number | null;
  schedule: { reportTime: TimeOfDay; cleanupTime: TimeOfDay; jitterMinutes: number };
  lookbackHours: number;
  messageRetentionHours: number;
  reportRetentionDays: number;
  reportTag: string;
  delivery: { pacingMs: number; maxAttempts: number };
  chatTimeoutMs: number;
  healthPort: number;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env): Config {
  const problems: string[] = [];

  const required = (name: string): string => {
    const value = env[name]?.trim();
    if (!value) {
      problems.push(`${name} is required`);
      return '';
    }
    return value;
  };

  const integer = (name: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number => {
    const raw = env[name]?.trim();
    if (!raw) return fallback;
    const value = Number(raw);
    if (!Number.isSafeInteger(value) || value < min || value > max) {
      problems.push(`${name} must be an integer between ${min} and ${max}`);
      return fallback;
    }
    return value;
  };

  const timeOfDay = (name: string, fallback: string): TimeOfDay => {
    const raw = env[name]?.trim() || fallback;
    const parsed = parseTimeOfDay(raw);
    if (!parsed) {
      problems.push(`${name} must be a UTC time of day as HH:MM`);
      return { hour: 0, minute: 0 };
    }
    return parsed;
  };

  const providerRaw = env.ANALYSIS_PROVIDER?.trim().toLowerCase() || 'anthropic';
  let provider: AnalysisProviderName = 'anthropic';
  if (providerRaw === 'anthropic' || providerRaw === 'openai') {
    provider = providerRaw;
  } else {
    problems.push('ANALYSIS_PROVIDER must be "anthropic" or "openai"');
  }
  const apiKey = required(provider === 'openai' ? 'OPENAI_API_KEY' : 'ANTHROPIC_API_KEY');

  let adminChatId: number | null = null;
  const adminRaw = env.ADMIN_CHAT_ID?.trim();
  if (adminRaw) {
    const value = Number(adminRaw);
    if (Number.isSafeInteger(value)) adminChatId = value;
    else problems.push('ADMIN_CHAT_ID must be an integer chat id');
  }

  const logLevelRaw = env.LOG_LEVEL?.trim().toLowerCase() || 'info';
  let logLevel: LogLevel = 'info';
  if (isLogLevel(logLevelRaw)) logLevel = logLevelRaw;
  else problems.push('LOG_LEVEL must be one of debug, info, warn, error');

  const config: Config = {
    telegramBotToken: required('TELEGRAM_BOT_TOKEN'),
    supabase: {
      url: required('SUPABASE_URL'),
      serviceRoleKey: required('SUPABASE_SERVICE_ROLE_KEY'),
    },
    analysis: { provider, apiKey, model: env.ANALYSIS_MODEL?.trim() || null },
    adminChatId,
    schedule: {
      reportTime: timeOfDay('REPORT_TIME', '10:00'),
      cleanupTime: timeOfDay('CLEANUP_TIME', '02:00'),
      jitterMinutes: integer('SCHEDULER_JITTER_MINUTES', 2, 0, 60),
    },
    lookbackHours: integer('LOOKBACK_HOURS', 24, 1, 168),
    messageRetentionHours: integer('MESSAGE_RETENTION_HOURS', 48, 1),
    reportRetentionDays: integer('REPORT_RETENTION_DAYS', 90, 1),
    reportTag: env.REPORT_TAG?.trim() || '#DailyReport',
    delivery: {
      pacingMs: integer('DELIVERY_PACING_MS', 5000, 0),
      maxAttempts: integer('DELIVERY_MAX_ATTEMPTS', 3, 1, 10),
    },
    chatTimeoutMs: integer('CHAT_TIMEOUT_MS', 300_000, 1000),
    healthPort: integer('HEALTH_PORT', 8080, 0, 65535),
    logLevel,
  };

  if (config.messageRetentionHours < config.lookbackHours) {
    problems.push('MESSAGE_RETENTION_HOURS must not be shorter than LOOKBACK_HOURS');
  }

  if (problems.length > 0) throw new ConfigError(problems);
  return config;
}

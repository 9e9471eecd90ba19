/**
 * Production container: Supabase storage, the configured analysis provider,
 * Telegram delivery and console logging.
 */

import { createContainer, type Container } from './container.js';
import type { Config } from './config.js';
import { createSupabaseClient } from './db.js';
import { SupabaseMessageRepository } from './repositories/SupabaseMessageRepository.js';
import { SupabaseChatRepository } from './repositories/SupabaseChatRepository.js';
import { SupabaseReportRepository } from './repositories/SupabaseReportRepository.js';
import {
  AnthropicAnalysisProvider,
  ConsoleLogProvider,
  OpenAIAnalysisProvider,
  TelegramMessagingProvider,
  type IAnalysisProvider,
} from './providers/index.js';

export function createProductionContainer(config: Config): Container {
  const db = createSupabaseClient(config.supabase.url, config.supabase.serviceRoleKey);

  const logProvider = new ConsoleLogProvider({
    outputToConsole: true,
    minLevel: config.logLevel,
  });

  return createContainer({
    messageRepo: new SupabaseMessageRepository(db),
    chatRepo: new SupabaseChatRepository(db),
    reportRepo: new SupabaseReportRepository(db),
    analysisProvider: createAnalysisProvider(config),
    messagingProvider: new TelegramMessagingProvider({ token: config.telegramBotToken }),
    logProvider,
    settings: config,
  });
}

function createAnalysisProvider(config: Config): IAnalysisProvider {
  const { provider, apiKey, model } = config.analysis;
  const opts = model ? { apiKey, model } : { apiKey };
  return provider === 'openai'
    ? new OpenAIAnalysisProvider(opts)
    : new AnthropicAnalysisProvider(opts);
}

export type { IAnalysisProvider, CompletionOptions } from './IAnalysisProvider.js';
export { AnthropicAnalysisProvider } from './AnthropicAnalysisProvider.js';
export { OpenAIAnalysisProvider } from './OpenAIAnalysisProvider.js';
export type { IMessagingProvider, SendMessageOptions, SentMessage } from './IMessagingProvider.js';
export { TelegramMessagingProvider } from './TelegramMessagingProvider.js';
export type { ILogProvider, LogEvent, LogLevel, RequestLogEvent, RunLogEvent } from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';

/**
 * Dependency wiring.
 * Constructs all services with their dependencies. Production passes the
 * Supabase repositories and real providers; tests pass in-memory mocks.
 */

import type { IMessageRepository } from './repositories/IMessageRepository.js';
import type { IChatRepository } from './repositories/IChatRepository.js';
import type { IReportRepository } from './repositories/IReportRepository.js';
import type { IAnalysisProvider } from './providers/IAnalysisProvider.js';
import type { IMessagingProvider } from './providers/IMessagingProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { Config } from './config.js';
import { systemClock, type Clock, type Sleep } from './types/common.js';
import { sleep as realSleep } from './utils/sleep.js';
import { DEFAULT_RETRY_POLICY } from './utils/retry.js';
import { MessageStore } from './services/MessageStore.js';
import { ChatDirectory } from './services/ChatDirectory.js';
import { AnalysisClient } from './services/AnalysisClient.js';
import { ReportFormatter } from './services/ReportFormatter.js';
import { ReportStore } from './services/ReportStore.js';
import { EscalationNotifier } from './services/EscalationNotifier.js';
import { DeliveryDispatcher } from './services/DeliveryDispatcher.js';
import { ReportPipeline } from './services/ReportPipeline.js';
import { CleanupService } from './services/CleanupService.js';
import { HealthService } from './services/HealthService.js';
import { DailyScheduler } from './scheduler/DailyScheduler.js';

export const REPORT_JOB = 'daily-report';
export const CLEANUP_JOB = 'retention-cleanup';

export type ContainerSettings = Pick<
  Config,
  | 'adminChatId'
  | 'schedule'
  | 'lookbackHours'
  | 'messageRetentionHours'
  | 'reportRetentionDays'
  | 'reportTag'
  | 'delivery'
  | 'chatTimeoutMs'
>;

export const DEFAULT_SETTINGS: ContainerSettings = {
  adminChatId: null,
  schedule: {
    reportTime: { hour: 10, minute: 0 },
    cleanupTime: { hour: 2, minute: 0 },
    jitterMinutes: 2,
  },
  lookbackHours: 24,
  messageRetentionHours: 48,
  reportRetentionDays: 90,
  reportTag: '#DailyReport',
  delivery: { pacingMs: 5000, maxAttempts: 3 },
  chatTimeoutMs: 300_000,
};

export interface Container {
  messageStore: MessageStore;
  chatDirectory: ChatDirectory;
  reportStore: ReportStore;
  analysisClient: AnalysisClient;
  formatter: ReportFormatter;
  escalation: EscalationNotifier;
  dispatcher: DeliveryDispatcher;
  pipeline: ReportPipeline;
  cleanup: CleanupService;
  scheduler: DailyScheduler;
  healthService: HealthService;
  logProvider: ILogProvider;
}

export function createContainer(deps: {
  messageRepo: IMessageRepository;
  chatRepo: IChatRepository;
  reportRepo: IReportRepository;
  analysisProvider: IAnalysisProvider;
  messagingProvider: IMessagingProvider;
  logProvider: ILogProvider;
  clock?: Clock;
  sleep?: Sleep;
  settings?: Partial<ContainerSettings>;
}): Container {
  const settings: ContainerSettings = { ...DEFAULT_SETTINGS, ...deps.settings };
  const clock = deps.clock ?? systemClock;
  const sleep = deps.sleep ?? realSleep;
  const logger = deps.logProvider;

  const messageStore = new MessageStore(deps.messageRepo, logger);
  const chatDirectory = new ChatDirectory(deps.chatRepo);
  const reportStore = new ReportStore(deps.reportRepo);
  const analysisClient = new AnalysisClient(
    deps.analysisProvider,
    logger,
    DEFAULT_RETRY_POLICY,
    sleep
  );
  const formatter = new ReportFormatter({ tag: settings.reportTag });
  const escalation = new EscalationNotifier(
    deps.messagingProvider,
    logger,
    clock,
    settings.adminChatId
  );
  const dispatcher = new DeliveryDispatcher(
    deps.messagingProvider,
    formatter,
    reportStore,
    chatDirectory,
    escalation,
    logger,
    clock,
    sleep,
    {
      retryPolicy: { ...DEFAULT_RETRY_POLICY, maxAttempts: settings.delivery.maxAttempts },
      pacingMs: settings.delivery.pacingMs,
      chatTimeoutMs: settings.chatTimeoutMs,
    }
  );
  const pipeline = new ReportPipeline(
    chatDirectory,
    messageStore,
    analysisClient,
    formatter,
    reportStore,
    dispatcher,
    escalation,
    logger,
    clock,
    { lookbackHours: settings.lookbackHours, chatTimeoutMs: settings.chatTimeoutMs }
  );
  const cleanup = new CleanupService(messageStore, reportStore, logger, clock, {
    messageRetentionHours: settings.messageRetentionHours,
    reportRetentionDays: settings.reportRetentionDays,
  });

  const scheduler = new DailyScheduler(logger, clock, settings.schedule.jitterMinutes);
  scheduler.add({
    name: REPORT_JOB,
    at: settings.schedule.reportTime,
    run: (signal) => pipeline.run({ signal }),
  });
  scheduler.add({
    name: CLEANUP_JOB,
    at: settings.schedule.cleanupTime,
    run: () => cleanup.run(),
  });

  const healthService = new HealthService(chatDirectory, scheduler, clock);

  return {
    messageStore,
    chatDirectory,
    reportStore,
    analysisClient,
    formatter,
    escalation,
    dispatcher,
    pipeline,
    cleanup,
    scheduler,
    healthService,
    logProvider: logger,
  };
}

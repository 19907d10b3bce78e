export * from './types';
export * from './types/errors';
export * from './usage';
export { Classifier, BUILT_IN_TABLES } from './classification/Classifier';
export type { KeywordTables, KeywordGroup, SiteGroup, CustomRuleSource } from './classification/Classifier';
export { Settings, getDefaultConfig } from './config/settings';
export { TrackerService } from './service/TrackerService';
export type { TrackerServiceOptions, TrackerStatus, CsvExportResult } from './service/TrackerService';
export { ShutdownManager, ShutdownReason } from './service/ShutdownManager';
export { CommandProbe, execFileRunner } from './probes/commandProbes';
export type { CommandRunner } from './probes/commandProbes';
export { SafeNotifier, LogNotifier } from './notifications/notifier';
export { ReminderScheduler } from './notifications/ReminderScheduler';
export { AutoStartManager } from './autoLaunch/autoStart';
export { hashPassword, verifyPassword } from './security/passwordGate';
export { runCli } from './cli';
export { logger, Logger, LogLevel } from './utils/logger';

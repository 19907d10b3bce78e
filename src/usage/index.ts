export { AccountingStore, STREAKS_KEY, emptyStreaks } from './AccountingStore';
export { TrackingLoop, TrackingState, normalizeAppId } from './TrackingLoop';
export { StreakEvaluator, goalsMet } from './StreakEvaluator';
export { UsageAnalyzer } from './UsageAnalyzer';
export { exportRange, toCsv, escapeCsvField, CSV_HEADER } from './exportRange';
export * from './GoalEvaluator';
export type { AccountingStoreOptions, CategoryResolver, ExclusionSource } from './AccountingStore';
export type {
    TrackingLoopOptions,
    TrackingConfigSource,
    TrackingSession,
    TrackingHealth,
    SessionStats
} from './TrackingLoop';
export type { StreakStore, GoalConfigSource } from './StreakEvaluator';
export type {
    IUsageAnalyzer,
    DaySummary,
    WeekSummary,
    Insights,
    HistoryEntry,
    AppUsage,
    CategoryUsage,
    GoalRemark
} from './UsageAnalyzer';
export type { ExportRow, RangeSource } from './exportRange';

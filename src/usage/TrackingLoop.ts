import {
    ActiveWindowProbe,
    Clock,
    IdleProbe,
    Notifier,
    ProbeResult,
    unavailable
} from '../types';
import { toError } from '../types/errors';
import { logger } from '../utils/logger';
import { toDateKey } from '../utils/date';
import { SafeNotifier } from '../notifications/notifier';
import { ReminderConfigSource, ReminderScheduler } from '../notifications/ReminderScheduler';
import { AccountingStore } from './AccountingStore';
import { StreakEvaluator } from './StreakEvaluator';

export enum TrackingState {
    STOPPED = 'STOPPED',
    RUNNING_ACTIVE = 'RUNNING_ACTIVE',   // アプリの時間を計測中
    RUNNING_IDLE = 'RUNNING_IDLE',       // 計測対象なし（アイドル・起動直後など）
    PAUSED = 'PAUSED'
}

export interface TrackingConfigSource extends ReminderConfigSource {
    getIdleThresholdSeconds(): number;
    getTickIntervalSeconds(): number;
    getMaxIncrementSeconds(): number | null;
    getFocusModeBlocked(): string[];
}

export interface UnknownAppDetector {
    isUnrecognized(appId: string): boolean;
}

export interface TrackingSession {
    currentApp: string | null;
    startTime: Date | null;
    currentProject: string | null;
    isPaused: boolean;
    focusMode: boolean;
    sessionStart: Date | null;
}

export interface TrackingHealth {
    degraded: boolean;
    consecutiveFailures: number;
    lastError: string | null;
}

export interface SessionStats {
    sessionDurationSeconds: number;
    currentApp: string | null;
    currentAppSeconds: number;
    currentProject: string | null;
    focusMode: boolean;
    todayTotalSeconds: number;
    todayByCategoryHours: Record<string, number>;
}

export interface TrackingLoopOptions {
    store: AccountingStore;
    config: TrackingConfigSource;
    classifier: UnknownAppDetector;
    activeWindowProbe: ActiveWindowProbe;
    idleProbe: IdleProbe;
    notifier?: Notifier;
    clock?: Clock;
    failureThreshold?: number;      // この回数連続で失敗すると degraded
    reminderEveryTicks?: number;    // 通知チェックの間隔（tick数）
}

const UNKNOWN_SENTINEL = 'unknown';

/**
 * プローブの返す文字列を AppId として扱えるか判定（"Unknown" や空文字は不明扱い）
 */
export function normalizeAppId(value: string): string | null {
    const trimmed = value.trim();
    if (!trimmed || trimmed.toLowerCase() === UNKNOWN_SENTINEL) {
        return null;
    }
    return trimmed;
}

/**
 * 定周期でアイドル時間とアクティブウィンドウを取得し、経過時間を AccountingStore へ記録する
 */
export class TrackingLoop {
    private state: TrackingState = TrackingState.STOPPED;
    private currentApp: string | null = null;
    private startTime: number | null = null;    // ミリ秒
    private currentProject: string | null = null;
    private focusMode = false;
    private sessionStart: Date | null = null;

    private timer: NodeJS.Timeout | null = null;
    private inFlight: Promise<void> | null = null;
    private stopRequested = false;
    private tickCount = 0;

    private consecutiveFailures = 0;
    private degraded = false;
    private lastError: string | null = null;
    private lastBlockedApp: string | null = null;
    private unknownApps = new Set<string>();

    private healthCallback: ((health: TrackingHealth) => void) | null = null;
    private persistenceErrorCallback: ((error: Error) => void) | null = null;

    private readonly store: AccountingStore;
    private readonly config: TrackingConfigSource;
    private readonly classifier: UnknownAppDetector;
    private readonly activeWindowProbe: ActiveWindowProbe;
    private readonly idleProbe: IdleProbe;
    private readonly notifier: SafeNotifier | null;
    private readonly streakEvaluator: StreakEvaluator;
    private readonly reminders: ReminderScheduler | null;
    private readonly clock: Clock;
    private readonly failureThreshold: number;
    private readonly reminderEveryTicks: number;

    constructor(options: TrackingLoopOptions) {
        this.store = options.store;
        this.config = options.config;
        this.classifier = options.classifier;
        this.activeWindowProbe = options.activeWindowProbe;
        this.idleProbe = options.idleProbe;
        this.clock = options.clock || (() => new Date());
        this.failureThreshold = options.failureThreshold ?? 3;
        this.reminderEveryTicks = options.reminderEveryTicks ?? 6;
        this.notifier = options.notifier ? new SafeNotifier(options.notifier) : null;
        this.streakEvaluator = new StreakEvaluator(options.notifier);
        this.reminders = options.notifier ? new ReminderScheduler(this.store, this.config, options.notifier) : null;
    }

    now(): number {
        return this.clock().getTime();
    }

    /**
     * start から現在までの経過秒数（壁時計の差分）
     */
    elapsedSince(start: number): number {
        return this.secondsBetween(start, this.now());
    }

    private secondsBetween(start: number, end: number): number {
        const seconds = Math.max(0, (end - start) / 1000);
        const cap = this.config.getMaxIncrementSeconds();
        if (cap !== null && seconds > cap) {
            logger.warn(`1回の加算が上限を超えたため ${cap} 秒に切り詰めます`, { seconds });
            return cap;
        }
        return seconds;
    }

    private periodMs(): number {
        return this.config.getTickIntervalSeconds() * 1000;
    }

    /**
     * 追跡開始。連続達成日数を更新してから定期サンプリングを始める
     */
    async start(): Promise<void> {
        if (this.state !== TrackingState.STOPPED) {
            logger.warn('トラッキングは既に開始されています');
            return;
        }
        this.state = TrackingState.RUNNING_IDLE;
        this.sessionStart = this.clock();
        this.currentApp = null;
        this.startTime = null;
        this.tickCount = 0;
        this.reminders?.reset();

        logger.info('トラッキングを開始しました', {
            tickIntervalSeconds: this.config.getTickIntervalSeconds(),
            idleThresholdSeconds: this.config.getIdleThresholdSeconds()
        });

        try {
            await this.streakEvaluator.update(this.store, this.config, this.clock());
            this.persistSafely();
        } catch (error) {
            logger.error('連続達成日数の更新に失敗しました', error);
        }

        this.scheduleNext();
    }

    private scheduleNext(): void {
        if (this.state === TrackingState.STOPPED || this.stopRequested || this.timer) {
            return;
        }
        this.timer = setTimeout(() => {
            this.timer = null;
            this.inFlight = this.tick().finally(() => {
                this.inFlight = null;
                this.scheduleNext();
            });
        }, this.periodMs());
    }

    /**
     * 追跡停止。実行中のtickを待ってから最後の区間を記録し、保存する
     */
    async stop(): Promise<void> {
        if (this.state === TrackingState.STOPPED) {
            return;
        }
        this.stopRequested = true;
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        if (this.inFlight) {
            await this.inFlight;
        }

        try {
            if (this.currentApp !== null && this.startTime !== null) {
                this.flush(this.currentApp, this.elapsedSince(this.startTime));
            }
            this.store.persist();
            logger.info('トラッキングを停止しました');
        } finally {
            this.currentApp = null;
            this.startTime = null;
            this.sessionStart = null;
            this.lastBlockedApp = null;
            this.state = TrackingState.STOPPED;
            this.stopRequested = false;
        }
    }

    /**
     * 一時停止。未記録の区間は破棄する（切り替えではなく中断）
     */
    pause(): void {
        if (this.state === TrackingState.STOPPED || this.state === TrackingState.PAUSED) {
            return;
        }
        this.currentApp = null;
        this.startTime = null;
        this.state = TrackingState.PAUSED;
        logger.info('トラッキングを一時停止しました');
    }

    resume(): void {
        if (this.state !== TrackingState.PAUSED) {
            return;
        }
        this.state = TrackingState.RUNNING_IDLE;
        logger.info('トラッキングを再開しました');
    }

    private isSampling(): boolean {
        return !this.stopRequested
            && this.state !== TrackingState.STOPPED
            && this.state !== TrackingState.PAUSED;
    }

    /**
     * 1回分のサンプリング。例外はここで止め、ループは継続する
     */
    async tick(): Promise<void> {
        if (!this.isSampling()) {
            return;
        }
        this.tickCount++;

        try {
            await this.sample();
        } catch (error) {
            logger.error('トラッキング処理でエラーが発生しました', error);
        }

        if (this.reminders && this.sessionStart && this.isSampling() && this.tickCount % this.reminderEveryTicks === 0) {
            try {
                await this.reminders.check(this.clock(), this.sessionStart);
            } catch (error) {
                logger.warn('通知チェックでエラーが発生しました', error);
            }
        }
    }

    private async sample(): Promise<void> {
        // 前回の保存に失敗していれば再試行
        if (this.store.isDirty()) {
            this.persistSafely();
        }

        const idle = await this.safeProbe('idle', () => this.idleProbe.probeIdleSeconds());
        if (!this.isSampling()) {
            return;
        }
        if (idle.kind === 'unavailable') {
            this.registerFailure(idle.reason);
            return;
        }
        if (idle.value >= this.config.getIdleThresholdSeconds()) {
            this.registerSuccess();
            this.suspendForIdle();
            return;
        }

        const window = await this.safeProbe('active window', () => this.activeWindowProbe.probeActiveWindow());
        if (!this.isSampling()) {
            return;
        }
        const app = window.kind === 'known' ? normalizeAppId(window.value) : null;
        if (app === null) {
            this.registerFailure(window.kind === 'unavailable' ? window.reason : 'active window is unknown');
            return;
        }
        this.registerSuccess();

        if (this.focusMode && this.isBlocked(app)) {
            await this.handleBlocked(app);
            return;
        }
        this.lastBlockedApp = null;

        if (app === this.currentApp) {
            this.continueCurrent();
        } else {
            this.switchTo(app);
        }
    }

    private async safeProbe<T>(label: string, call: () => Promise<ProbeResult<T>>): Promise<ProbeResult<T>> {
        try {
            return await call();
        } catch (error) {
            return unavailable(`${label} probe failed: ${toError(error).message}`);
        }
    }

    private continueCurrent(): void {
        if (this.currentApp === null) {
            return;
        }
        const now = this.now();
        if (this.startTime === null) {
            this.startTime = now;
            return;
        }
        if (now - this.startTime >= this.periodMs()) {
            this.flush(this.currentApp, this.secondsBetween(this.startTime, now));
            this.startTime = now;
        }
    }

    private switchTo(app: string): void {
        const now = this.now();
        if (this.currentApp !== null && this.startTime !== null) {
            this.flush(this.currentApp, this.secondsBetween(this.startTime, now));
        }
        this.currentApp = app;
        this.startTime = now;
        this.state = TrackingState.RUNNING_ACTIVE;

        if (this.classifier.isUnrecognized(app)) {
            this.unknownApps.add(app);
        }
        logger.info(`Tracking: ${app.slice(0, 60)}`);
    }

    private suspendForIdle(): void {
        if (this.currentApp === null) {
            return;
        }
        if (this.startTime !== null) {
            this.flush(this.currentApp, this.elapsedSince(this.startTime));
        }
        logger.info('アイドル状態を検出したため計測を中断します');
        this.currentApp = null;
        this.startTime = null;
        this.state = TrackingState.RUNNING_IDLE;
    }

    /**
     * 集中モードでブロック対象のアプリ。直前のアプリ分は記録し、このアプリには時間を付けない
     */
    private async handleBlocked(app: string): Promise<void> {
        if (this.currentApp !== null) {
            this.suspendForIdle();
        }
        if (this.lastBlockedApp !== app) {
            this.lastBlockedApp = app;
            logger.info(`集中モード: ブロック対象のアプリ ${app.slice(0, 60)}`);
            if (this.notifier) {
                await this.notifier.notify('Blocked App', `${app.slice(0, 30)} is blocked in focus mode`);
            }
        }
    }

    isBlocked(app: string): boolean {
        const lower = app.toLowerCase();
        return this.config.getFocusModeBlocked().some(pattern => pattern !== '' && lower.includes(pattern.toLowerCase()));
    }

    private flush(app: string, seconds: number): void {
        try {
            this.store.record(app, seconds, this.currentProject);
        } catch (error) {
            logger.error(`記録に失敗しました: ${app}`, error);
            return;
        }
        this.persistSafely();
    }

    private persistSafely(): boolean {
        try {
            this.store.persist();
            return true;
        } catch (error) {
            // メモリ上の記録は残っているので次のtickで再試行する
            const err = toError(error);
            logger.error('記録データの保存に失敗しました', err);
            this.persistenceErrorCallback?.(err);
            return false;
        }
    }

    private registerFailure(reason: string): void {
        this.consecutiveFailures++;
        this.lastError = reason;
        logger.warn(`サンプリングに失敗しました (${this.consecutiveFailures}回連続): ${reason}`);

        if (!this.degraded && this.consecutiveFailures >= this.failureThreshold) {
            this.degraded = true;
            logger.error('サンプリングの失敗が続いています', this.getHealth());
            this.healthCallback?.(this.getHealth());
        }
    }

    private registerSuccess(): void {
        this.consecutiveFailures = 0;
        if (this.degraded) {
            this.degraded = false;
            this.lastError = null;
            logger.info('サンプリングが回復しました');
            this.healthCallback?.(this.getHealth());
        }
    }

    onHealthChange(callback: (health: TrackingHealth) => void): void {
        this.healthCallback = callback;
    }

    onPersistenceError(callback: (error: Error) => void): void {
        this.persistenceErrorCallback = callback;
    }

    getHealth(): TrackingHealth {
        return {
            degraded: this.degraded,
            consecutiveFailures: this.consecutiveFailures,
            lastError: this.lastError
        };
    }

    getState(): TrackingState {
        return this.state;
    }

    getSession(): TrackingSession {
        return {
            currentApp: this.currentApp,
            startTime: this.startTime === null ? null : new Date(this.startTime),
            currentProject: this.currentProject,
            isPaused: this.state === TrackingState.PAUSED,
            focusMode: this.focusMode,
            sessionStart: this.sessionStart
        };
    }

    setProject(projectId: string | null): void {
        const trimmed = projectId ? projectId.trim() : '';
        this.currentProject = trimmed || null;
        logger.info(`プロジェクトを設定しました: ${this.currentProject ?? 'None'}`);
    }

    setFocusMode(enabled: boolean): void {
        this.focusMode = enabled;
        this.lastBlockedApp = null;
        logger.info(`集中モードを${enabled ? '有効' : '無効'}にしました`);
    }

    getUnknownApps(): string[] {
        return Array.from(this.unknownApps);
    }

    getSessionStats(): SessionStats {
        const now = this.now();
        const today = this.store.snapshotFor(toDateKey(this.clock()));
        const todayByCategoryHours: Record<string, number> = {};
        let todayTotalSeconds = 0;
        for (const [category, bucket] of Object.entries(today)) {
            todayByCategoryHours[category] = bucket.total_seconds / 3600;
            todayTotalSeconds += bucket.total_seconds;
        }

        return {
            sessionDurationSeconds: this.sessionStart ? Math.max(0, (now - this.sessionStart.getTime()) / 1000) : 0,
            currentApp: this.currentApp,
            currentAppSeconds: this.startTime === null ? 0 : Math.max(0, (now - this.startTime) / 1000),
            currentProject: this.currentProject,
            focusMode: this.focusMode,
            todayTotalSeconds,
            todayByCategoryHours
        };
    }
}

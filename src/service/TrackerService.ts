import * as fs from 'fs-extra';
import * as path from 'path';
import {
    ActiveWindowProbe,
    Clock,
    DateRange,
    DayRecord,
    IdleProbe,
    Notifier,
    OperationResult
} from '../types';
import { PersistenceError, ValidationError, toError } from '../types/errors';
import { Settings } from '../config/settings';
import { Classifier } from '../classification/Classifier';
import { AccountingStore } from '../usage/AccountingStore';
import { SessionStats, TrackingHealth, TrackingLoop, TrackingSession, TrackingState } from '../usage/TrackingLoop';
import { UsageAnalyzer } from '../usage/UsageAnalyzer';
import { ExportRow, exportRange, toCsv } from '../usage/exportRange';
import { CommandProbe } from '../probes/commandProbes';
import { LogNotifier, SafeNotifier } from '../notifications/notifier';
import { isDateKey } from '../utils/date';
import { CONFIG_FILE_NAME, DATA_FILE_NAME, getDataDirectory } from '../utils/paths';
import { logger } from '../utils/logger';

export interface TrackerServiceOptions {
    dataDir?: string;
    activeWindowProbe?: ActiveWindowProbe;
    idleProbe?: IdleProbe;
    notifier?: Notifier;
    clock?: Clock;
}

export interface TrackerStatus {
    state: TrackingState;
    session: TrackingSession;
    health: TrackingHealth;
    stats: SessionStats;
    unknownApps: string[];
}

export interface CsvExportResult {
    filePath: string;
    rows: number;
}

function ok<T>(value: T): OperationResult<T> {
    return { ok: true, value };
}

function fail<T>(operation: string, error: unknown): OperationResult<T> {
    const err = toError(error);
    if (err instanceof ValidationError) {
        logger.warn(`${operation}: ${err.message}`);
    } else {
        logger.error(`${operation}に失敗しました`, err);
    }
    return { ok: false, error: err };
}

function attempt<T>(operation: string, fn: () => T): OperationResult<T> {
    try {
        return ok(fn());
    } catch (error) {
        return fail(operation, error);
    }
}

function validateRange(range: DateRange): DateRange {
    if (!isDateKey(range.start) || !isDateKey(range.end)) {
        throw new ValidationError(`Dates must be in YYYY-MM-DD format (got ${range.start}..${range.end})`);
    }
    if (range.start > range.end) {
        throw new ValidationError(`Range start ${range.start} is after end ${range.end}`);
    }
    return range;
}

/**
 * UI/CLI から使う窓口。例外を投げずに OperationResult を返す
 */
export class TrackerService {
    private readonly analyzer: UsageAnalyzer;

    private constructor(
        private readonly settings: Settings,
        private readonly store: AccountingStore,
        private readonly loop: TrackingLoop,
        clock: Clock
    ) {
        this.analyzer = new UsageAnalyzer(store, settings, clock);
    }

    /**
     * 設定と記録を読み込む。壊れたファイルがあれば CorruptDocumentError で失敗する
     */
    static open(options: TrackerServiceOptions = {}): OperationResult<TrackerService> {
        return attempt('データの読み込み', () => {
            const dataDir = options.dataDir || getDataDirectory();
            const clock = options.clock || (() => new Date());
            const settings = new Settings(path.join(dataDir, CONFIG_FILE_NAME));
            const classifier = new Classifier(settings);
            const store = AccountingStore.load({
                filePath: path.join(dataDir, DATA_FILE_NAME),
                classifier,
                exclusions: settings,
                clock
            });

            const probe = new CommandProbe();
            const notifier = new SafeNotifier(options.notifier || new LogNotifier(), () => settings.isNotificationsEnabled());
            const loop = new TrackingLoop({
                store,
                config: settings,
                classifier,
                activeWindowProbe: options.activeWindowProbe || probe,
                idleProbe: options.idleProbe || probe,
                notifier,
                clock
            });
            loop.onHealthChange(health => {
                if (health.degraded) {
                    logger.warn('ウィンドウ情報を取得できない状態が続いています', health);
                }
            });

            return new TrackerService(settings, store, loop, clock);
        });
    }

    async start(): Promise<OperationResult<TrackingState>> {
        try {
            await this.loop.start();
            return ok(this.loop.getState());
        } catch (error) {
            return fail('トラッキング開始', error);
        }
    }

    /**
     * 停止して最後の区間を保存する。保存に失敗した場合は PersistenceError を返す
     */
    async stop(): Promise<OperationResult<TrackingState>> {
        try {
            await this.loop.stop();
            return ok(this.loop.getState());
        } catch (error) {
            return fail('トラッキング停止', error);
        }
    }

    pause(): OperationResult<TrackingState> {
        return attempt('一時停止', () => {
            this.loop.pause();
            return this.loop.getState();
        });
    }

    resume(): OperationResult<TrackingState> {
        return attempt('再開', () => {
            this.loop.resume();
            return this.loop.getState();
        });
    }

    getSnapshot(range: DateRange): OperationResult<Record<string, DayRecord>> {
        return attempt('記録の取得', () => this.store.snapshotRange(validateRange(range)));
    }

    recordManual(
        app: string,
        category: string,
        minutes: number,
        project: string | null = null,
        date: string | null = null
    ): OperationResult<void> {
        return attempt('手入力', () => {
            this.store.manualEntry(app, category, minutes, project, date);
            this.ensureProject(project);
        });
    }

    exportRange(range: DateRange): OperationResult<ExportRow[]> {
        return attempt('エクスポート', () => exportRange(this.store, validateRange(range)));
    }

    exportCsv(filePath: string, range: DateRange): OperationResult<CsvExportResult> {
        return attempt('CSVエクスポート', () => {
            const rows = exportRange(this.store, validateRange(range));
            const target = path.resolve(filePath);
            try {
                fs.outputFileSync(target, toCsv(rows), 'utf8');
            } catch (error) {
                throw new PersistenceError(`Failed to write ${target}: ${toError(error).message}`, target, error);
            }
            logger.info(`CSVを出力しました: ${target}`, { rows: rows.length });
            return { filePath: target, rows: rows.length };
        });
    }

    setProject(project: string | null): OperationResult<void> {
        return attempt('プロジェクト設定', () => {
            this.loop.setProject(project);
            this.ensureProject(project);
        });
    }

    setFocusMode(enabled: boolean): OperationResult<void> {
        return attempt('集中モード切り替え', () => this.loop.setFocusMode(enabled));
    }

    getStatus(): TrackerStatus {
        return {
            state: this.loop.getState(),
            session: this.loop.getSession(),
            health: this.loop.getHealth(),
            stats: this.loop.getSessionStats(),
            unknownApps: this.loop.getUnknownApps()
        };
    }

    onPersistenceError(callback: (error: Error) => void): void {
        this.loop.onPersistenceError(callback);
    }

    getSettings(): Settings {
        return this.settings;
    }

    getAnalyzer(): UsageAnalyzer {
        return this.analyzer;
    }

    getLoop(): TrackingLoop {
        return this.loop;
    }

    getStore(): AccountingStore {
        return this.store;
    }

    // タグ付けされたプロジェクトは未登録なら登録する
    private ensureProject(project: string | null): void {
        const id = project ? project.trim() : '';
        if (id && !(id in this.settings.getProjects())) {
            this.settings.addProject(id);
        }
    }
}

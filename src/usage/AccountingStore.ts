import * as path from 'path';
import {
    AccountingDocument,
    CategoryBucket,
    Clock,
    DateRange,
    DayRecord,
    StreakLedger
} from '../types';
import { CorruptDocumentError, ValidationError } from '../types/errors';
import { isDateKey, toDateKey } from '../utils/date';
import { isPlainObject, readJsonDocument, writeJsonAtomic } from '../utils/jsonFile';
import { DATA_FILE_NAME, getDataDirectory } from '../utils/paths';
import { logger } from '../utils/logger';

export const STREAKS_KEY = 'streaks';

export interface CategoryResolver {
    classify(appId: string): string;
}

export interface ExclusionSource {
    getExcludedApps(): string[];
}

export interface AccountingStoreOptions {
    filePath?: string;
    classifier: CategoryResolver;
    exclusions: ExclusionSource;
    clock?: Clock;
}

interface BucketState {
    totalSeconds: number;
    apps: Map<string, number>;
    projects: Map<string, number> | null;
}

type DayState = Map<string, BucketState>;

function copyDay(day: DayState): DayState {
    return new Map(Array.from(day, ([category, bucket]): [string, BucketState] => [category, {
        totalSeconds: bucket.totalSeconds,
        apps: new Map(bucket.apps),
        projects: bucket.projects ? new Map(bucket.projects) : null
    }]));
}

export function emptyStreaks(): StreakLedger {
    return { current: 0, longest: 0, last_date: null };
}

function isNonNegativeNumber(value: unknown): value is number {
    return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

function sum(values: Iterable<number>): number {
    let total = 0;
    for (const value of values) {
        total += value;
    }
    return total;
}

/**
 * 日付 → カテゴリ → {合計, アプリ別, プロジェクト別} の累積記録
 *
 * 変更系の操作はすべて同期的に完結する（記録と保存の間に他の処理が割り込まない）。
 * 読み出しは常にコピーを返す。
 */
export class AccountingStore {
    private days = new Map<string, DayState>();
    private streaks: StreakLedger = emptyStreaks();
    private dirty = false;
    private readonly filePath: string;
    private readonly classifier: CategoryResolver;
    private readonly exclusions: ExclusionSource;
    private readonly clock: Clock;

    constructor(options: AccountingStoreOptions) {
        this.filePath = options.filePath || path.join(getDataDirectory(), DATA_FILE_NAME);
        this.classifier = options.classifier;
        this.exclusions = options.exclusions;
        this.clock = options.clock || (() => new Date());
    }

    /**
     * ファイルから読み込んだストアを返す。
     * ファイルがなければ空のストア、解析できなければ CorruptDocumentError（ファイルには触れない）
     */
    static load(options: AccountingStoreOptions): AccountingStore {
        const store = new AccountingStore(options);
        const raw = readJsonDocument(store.filePath);
        if (raw) {
            store.hydrate(raw);
            logger.info('記録データを読み込みました', { file: store.filePath, days: store.days.size });
        }
        return store;
    }

    private hydrate(raw: Record<string, unknown>): void {
        for (const [key, value] of Object.entries(raw)) {
            if (key === STREAKS_KEY) {
                this.streaks = this.parseStreaks(value);
                continue;
            }
            if (!isDateKey(key)) {
                throw new CorruptDocumentError(`Unexpected key "${key}" in ${this.filePath}`, this.filePath);
            }
            this.days.set(key, this.parseDay(key, value));
        }
    }

    private parseStreaks(value: unknown): StreakLedger {
        if (!isPlainObject(value)
            || !isNonNegativeNumber(value.current)
            || !isNonNegativeNumber(value.longest)
            || !(value.last_date === null || value.last_date === undefined || typeof value.last_date === 'string')) {
            throw new CorruptDocumentError(`Invalid streak ledger in ${this.filePath}`, this.filePath);
        }
        return {
            current: value.current,
            longest: value.longest,
            last_date: typeof value.last_date === 'string' ? value.last_date : null
        };
    }

    private parseDay(dateKey: string, value: unknown): DayState {
        if (!isPlainObject(value)) {
            throw new CorruptDocumentError(`Invalid day record ${dateKey} in ${this.filePath}`, this.filePath);
        }
        const day: DayState = new Map();
        for (const [category, bucket] of Object.entries(value)) {
            if (!isPlainObject(bucket) || !isNonNegativeNumber(bucket.total_seconds)) {
                throw new CorruptDocumentError(`Invalid bucket ${dateKey}/${category} in ${this.filePath}`, this.filePath);
            }
            const apps = this.parseSeconds(bucket.apps, `${dateKey}/${category}/apps`);
            if (!apps) {
                throw new CorruptDocumentError(`Missing apps in ${dateKey}/${category}`, this.filePath);
            }
            day.set(category, {
                totalSeconds: bucket.total_seconds,
                apps,
                projects: this.parseSeconds(bucket.projects, `${dateKey}/${category}/projects`)
            });
        }
        return day;
    }

    private parseSeconds(value: unknown, label: string): Map<string, number> | null {
        if (value === undefined || value === null) {
            return null;
        }
        if (!isPlainObject(value)) {
            throw new CorruptDocumentError(`Invalid ${label} in ${this.filePath}`, this.filePath);
        }
        const result = new Map<string, number>();
        for (const [key, seconds] of Object.entries(value)) {
            if (!isNonNegativeNumber(seconds)) {
                throw new CorruptDocumentError(`Invalid seconds for ${label}/${key} in ${this.filePath}`, this.filePath);
            }
            result.set(key, seconds);
        }
        return result;
    }

    public getFilePath(): string {
        return this.filePath;
    }

    public isExcluded(appId: string): boolean {
        const app = appId.toLowerCase();
        return this.exclusions.getExcludedApps().some(pattern => pattern !== '' && app.includes(pattern.toLowerCase()));
    }

    /**
     * 経過時間を今日の記録へ加算する。除外対象は何も変更せずに false を返す
     */
    public record(appId: string, elapsedSeconds: number, projectId: string | null = null): boolean {
        if (!isNonNegativeNumber(elapsedSeconds)) {
            throw new ValidationError(`elapsedSeconds must be a non-negative number (got ${elapsedSeconds})`);
        }
        if (this.isExcluded(appId)) {
            return false;
        }
        const category = this.classifier.classify(appId);
        this.add(toDateKey(this.clock()), category, appId, elapsedSeconds, projectId);
        return true;
    }

    /**
     * 手入力による記録（分類器を通さない）。検証や保存に失敗した場合は記録前の状態に戻す
     */
    public manualEntry(
        appId: string,
        categoryId: string,
        minutes: number,
        projectId: string | null = null,
        date: string | null = null
    ): void {
        const app = typeof appId === 'string' ? appId.trim() : '';
        const category = typeof categoryId === 'string' ? categoryId.trim() : '';
        if (!app) {
            throw new ValidationError('App name must not be empty');
        }
        if (!category) {
            throw new ValidationError('Category must not be empty');
        }
        if (typeof minutes !== 'number' || !Number.isFinite(minutes) || minutes <= 0) {
            throw new ValidationError(`Minutes must be a positive number (got ${minutes})`);
        }
        const dateKey = date ?? toDateKey(this.clock());
        if (!isDateKey(dateKey)) {
            throw new ValidationError(`Date must be in YYYY-MM-DD format (got ${dateKey})`);
        }
        const project = projectId && projectId.trim() ? projectId.trim() : null;

        const previous = this.days.get(dateKey);
        const backup = previous ? copyDay(previous) : null;
        const wasDirty = this.dirty;
        this.add(dateKey, category, app, minutes * 60, project);
        try {
            this.persist();
        } catch (error) {
            if (backup) {
                this.days.set(dateKey, backup);
            } else {
                this.days.delete(dateKey);
            }
            this.dirty = wasDirty;
            throw error;
        }
        logger.info(`手入力: ${app} (${category}) に ${minutes} 分を追加しました`, { date: dateKey, project });
    }

    private add(dateKey: string, category: string, appId: string, seconds: number, projectId: string | null): void {
        let day = this.days.get(dateKey);
        if (!day) {
            day = new Map();
            this.days.set(dateKey, day);
        }
        let bucket = day.get(category);
        if (!bucket) {
            bucket = { totalSeconds: 0, apps: new Map(), projects: null };
            day.set(category, bucket);
        }

        bucket.apps.set(appId, (bucket.apps.get(appId) ?? 0) + seconds);
        bucket.totalSeconds = sum(bucket.apps.values());

        if (projectId) {
            if (!bucket.projects) {
                bucket.projects = new Map();
            }
            bucket.projects.set(projectId, (bucket.projects.get(projectId) ?? 0) + seconds);
        }
        this.dirty = true;
    }

    public snapshotFor(dateKey: string): DayRecord {
        const day = this.days.get(dateKey);
        if (!day) {
            return {};
        }
        return Object.fromEntries(
            Array.from(day, ([category, bucket]): [string, CategoryBucket] => [category, this.toBucket(bucket)])
        );
    }

    /**
     * 範囲内（両端を含む）の日付ごとの記録。記録のない日は含まない
     */
    public snapshotRange(range: DateRange): Record<string, DayRecord> {
        const result: Record<string, DayRecord> = {};
        for (const dateKey of this.dates()) {
            if (dateKey >= range.start && dateKey <= range.end) {
                result[dateKey] = this.snapshotFor(dateKey);
            }
        }
        return result;
    }

    /**
     * 記録のある日付（昇順）。streaks キーは含まない
     */
    public dates(): string[] {
        return Array.from(this.days.keys()).sort();
    }

    public getStreaks(): StreakLedger {
        return { ...this.streaks };
    }

    public setStreaks(ledger: StreakLedger): void {
        this.streaks = { ...ledger };
        this.dirty = true;
    }

    /**
     * 全日付の記録を削除する（UIからの明示的な操作のみ）
     */
    public clearAll(): void {
        this.days.clear();
        this.streaks = emptyStreaks();
        this.dirty = true;
        this.persist();
        logger.warn('全記録データを削除しました');
    }

    public isDirty(): boolean {
        return this.dirty;
    }

    public toDocument(): AccountingDocument {
        const document: AccountingDocument = {};
        for (const dateKey of this.dates()) {
            document[dateKey] = this.snapshotFor(dateKey);
        }
        document[STREAKS_KEY] = this.getStreaks();
        return document;
    }

    /**
     * ドキュメント全体を上書き保存。失敗時は PersistenceError（メモリ上の内容が正）
     */
    public persist(): void {
        writeJsonAtomic(this.filePath, this.toDocument());
        this.dirty = false;
    }

    private toBucket(bucket: BucketState): CategoryBucket {
        const result: CategoryBucket = {
            total_seconds: bucket.totalSeconds,
            apps: Object.fromEntries(bucket.apps)
        };
        if (bucket.projects) {
            result.projects = Object.fromEntries(bucket.projects);
        }
        return result;
    }
}

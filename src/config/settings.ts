import * as path from 'path';
import { ConfigDocument, CustomRule, ProjectInfo } from '../types';
import { ValidationError } from '../types/errors';
import { logger } from '../utils/logger';
import { CONFIG_FILE_NAME, getDataDirectory } from '../utils/paths';
import { isPlainObject, readJsonDocument, writeJsonAtomic } from '../utils/jsonFile';
import { hashPassword, verifyPassword } from '../security/passwordGate';

const KNOWN_KEYS: ReadonlyArray<keyof ConfigDocument> = [
    'idle_threshold_seconds',
    'tick_interval_seconds',
    'max_increment_seconds',
    'goals',
    'custom_categories',
    'excluded_apps',
    'focus_mode_blocked',
    'break_reminder_interval',
    'notifications_enabled',
    'auto_start',
    'password_hash',
    'productive_categories',
    'projects'
];

export function getDefaultConfig(): ConfigDocument {
    return {
        idle_threshold_seconds: 300,
        tick_interval_seconds: 5,
        max_increment_seconds: null,
        goals: { Coding: 4, Entertainment: 2 },
        custom_categories: [],
        excluded_apps: [],
        focus_mode_blocked: ['facebook', 'twitter', 'instagram', 'tiktok', 'youtube', 'netflix', 'game'],
        break_reminder_interval: 3600, // 1時間
        notifications_enabled: true,
        auto_start: false,
        password_hash: null,
        productive_categories: ['Coding', 'Productivity', 'Education'],
        projects: {}
    };
}

function isNonNegativeNumber(value: unknown): value is number {
    return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

function isPositiveNumber(value: unknown): value is number {
    return isNonNegativeNumber(value) && value > 0;
}

function isNullablePositiveNumber(value: unknown): value is number | null {
    return value === null || isPositiveNumber(value);
}

function isBoolean(value: unknown): value is boolean {
    return typeof value === 'boolean';
}

function isNullableString(value: unknown): value is string | null {
    return value === null || typeof value === 'string';
}

function isProjectRecord(value: unknown): value is Record<string, ProjectInfo> {
    return isPlainObject(value) && Object.values(value).every(info =>
        isPlainObject(info) && Object.values(info).every(field => typeof field === 'string')
    );
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isNumberRecord(value: unknown): value is Record<string, number> {
    return isPlainObject(value) && Object.values(value).every(isNonNegativeNumber);
}

function requireText(value: string, label: string): string {
    const trimmed = typeof value === 'string' ? value.trim() : '';
    if (!trimmed) {
        throw new ValidationError(`${label} must be a non-empty string`);
    }
    return trimmed;
}

function requireNonNegative(value: number, label: string): number {
    if (!isNonNegativeNumber(value)) {
        throw new ValidationError(`${label} must be a non-negative number`);
    }
    return value;
}

/**
 * 設定ドキュメントの読み書き。UIはこのクラスのアクセサ経由でのみ設定に触れる
 */
export class Settings {
    private config: ConfigDocument;
    private customRules: CustomRule[] = [];
    private extras: Record<string, unknown> = {};
    private configPath: string;

    constructor(configPath?: string) {
        this.configPath = configPath || path.join(getDataDirectory(), CONFIG_FILE_NAME);
        this.config = getDefaultConfig();
        this.loadSettings();
    }

    private loadSettings(): void {
        // 解析できないファイルは CorruptDocumentError のまま呼び出し元へ（上書きしない）
        const raw = readJsonDocument(this.configPath);
        if (!raw) {
            this.saveSettings();
            return;
        }

        const defaults = getDefaultConfig();
        const pick = <K extends keyof ConfigDocument>(
            key: K,
            guard: (value: unknown) => value is ConfigDocument[K]
        ): ConfigDocument[K] => {
            if (!(key in raw)) {
                return defaults[key];
            }
            const value = raw[key];
            if (guard(value)) {
                return value;
            }
            logger.warn(`設定値 ${key} が不正なため既定値を使用します`, value);
            return defaults[key];
        };

        this.config = {
            idle_threshold_seconds: pick('idle_threshold_seconds', isNonNegativeNumber),
            tick_interval_seconds: pick('tick_interval_seconds', isPositiveNumber),
            max_increment_seconds: pick('max_increment_seconds', isNullablePositiveNumber),
            goals: pick('goals', isNumberRecord),
            custom_categories: [],
            excluded_apps: pick('excluded_apps', isStringArray),
            focus_mode_blocked: pick('focus_mode_blocked', isStringArray),
            break_reminder_interval: pick('break_reminder_interval', isNonNegativeNumber),
            notifications_enabled: pick('notifications_enabled', isBoolean),
            auto_start: pick('auto_start', isBoolean),
            password_hash: pick('password_hash', isNullableString),
            productive_categories: pick('productive_categories', isStringArray),
            projects: pick('projects', isProjectRecord)
        };
        this.customRules = this.readCustomRules(raw.custom_categories);

        this.extras = {};
        for (const [key, value] of Object.entries(raw)) {
            if (!KNOWN_KEYS.some(known => known === key)) {
                this.extras[key] = value;
            }
        }
    }

    /**
     * ペア配列形式で保存する。オブジェクト形式も読めるが、数字だけのパターンは
     * JSON オブジェクトのキー順で先頭に来てしまう
     */
    private readCustomRules(value: unknown): CustomRule[] {
        const rules: CustomRule[] = [];
        if (Array.isArray(value)) {
            for (const entry of value) {
                if (Array.isArray(entry) && typeof entry[0] === 'string' && typeof entry[1] === 'string') {
                    rules.push([entry[0], entry[1]]);
                }
            }
        } else if (isPlainObject(value)) {
            for (const [pattern, category] of Object.entries(value)) {
                if (typeof category === 'string') {
                    rules.push([pattern, category]);
                }
            }
        }
        return rules.filter(([pattern, category]) => pattern.trim() !== '' && category.trim() !== '');
    }

    public toDocument(): ConfigDocument {
        return {
            ...this.config,
            goals: { ...this.config.goals },
            custom_categories: this.getCustomCategories(),
            excluded_apps: [...this.config.excluded_apps],
            focus_mode_blocked: [...this.config.focus_mode_blocked],
            productive_categories: [...this.config.productive_categories],
            projects: { ...this.config.projects }
        };
    }

    public saveSettings(): void {
        writeJsonAtomic(this.configPath, { ...this.extras, ...this.toDocument() });
    }

    public getConfigPath(): string {
        return this.configPath;
    }

    public getIdleThresholdSeconds(): number {
        return this.config.idle_threshold_seconds;
    }

    public setIdleThresholdSeconds(seconds: number): void {
        this.config.idle_threshold_seconds = requireNonNegative(seconds, 'Idle threshold');
        this.saveSettings();
    }

    public getTickIntervalSeconds(): number {
        return this.config.tick_interval_seconds;
    }

    public setTickIntervalSeconds(seconds: number): void {
        if (requireNonNegative(seconds, 'Tick interval') === 0) {
            throw new ValidationError('Tick interval must be greater than zero');
        }
        this.config.tick_interval_seconds = seconds;
        this.saveSettings();
    }

    public getMaxIncrementSeconds(): number | null {
        return this.config.max_increment_seconds;
    }

    public setMaxIncrementSeconds(seconds: number | null): void {
        if (seconds !== null && requireNonNegative(seconds, 'Max increment') === 0) {
            throw new ValidationError('Max increment must be greater than zero');
        }
        this.config.max_increment_seconds = seconds;
        this.saveSettings();
    }

    public getGoals(): Record<string, number> {
        return { ...this.config.goals };
    }

    public setGoal(category: string, hours: number): void {
        const name = requireText(category, 'Category');
        this.config.goals[name] = requireNonNegative(hours, 'Goal hours');
        this.saveSettings();
    }

    public removeGoal(category: string): void {
        delete this.config.goals[category];
        this.saveSettings();
    }

    public getCustomCategories(): CustomRule[] {
        return this.customRules.map(([pattern, category]): CustomRule => [pattern, category]);
    }

    /**
     * 既存パターンは位置を変えずにカテゴリのみ更新、新規は末尾に追加
     */
    public addCustomCategory(pattern: string, category: string): void {
        const key = requireText(pattern, 'Pattern');
        const value = requireText(category, 'Category');
        const existing = this.customRules.find(([p]) => p === key);
        if (existing) {
            existing[1] = value;
        } else {
            this.customRules.push([key, value]);
        }
        this.saveSettings();
    }

    public removeCustomCategory(pattern: string): void {
        this.customRules = this.customRules.filter(([p]) => p !== pattern);
        this.saveSettings();
    }

    public getExcludedApps(): string[] {
        return [...this.config.excluded_apps];
    }

    public addExcludedApp(pattern: string): void {
        const value = requireText(pattern, 'Pattern');
        if (!this.config.excluded_apps.includes(value)) {
            this.config.excluded_apps.push(value);
            this.saveSettings();
        }
    }

    public removeExcludedApp(pattern: string): void {
        this.config.excluded_apps = this.config.excluded_apps.filter(p => p !== pattern);
        this.saveSettings();
    }

    public getFocusModeBlocked(): string[] {
        return [...this.config.focus_mode_blocked];
    }

    public addFocusModeBlocked(pattern: string): void {
        const value = requireText(pattern, 'Pattern');
        if (!this.config.focus_mode_blocked.includes(value)) {
            this.config.focus_mode_blocked.push(value);
            this.saveSettings();
        }
    }

    public removeFocusModeBlocked(pattern: string): void {
        this.config.focus_mode_blocked = this.config.focus_mode_blocked.filter(p => p !== pattern);
        this.saveSettings();
    }

    public getBreakReminderInterval(): number {
        return this.config.break_reminder_interval;
    }

    public setBreakReminderInterval(seconds: number): void {
        this.config.break_reminder_interval = requireNonNegative(seconds, 'Break reminder interval');
        this.saveSettings();
    }

    public isNotificationsEnabled(): boolean {
        return this.config.notifications_enabled;
    }

    public setNotificationsEnabled(enabled: boolean): void {
        this.config.notifications_enabled = enabled;
        this.saveSettings();
    }

    public getAutoStart(): boolean {
        return this.config.auto_start;
    }

    public setAutoStart(autoStart: boolean): void {
        this.config.auto_start = autoStart;
        this.saveSettings();
    }

    public getProductiveCategories(): string[] {
        return [...this.config.productive_categories];
    }

    public setProductiveCategories(categories: string[]): void {
        this.config.productive_categories = categories.map(c => requireText(c, 'Category'));
        this.saveSettings();
    }

    public getProjects(): Record<string, ProjectInfo> {
        return { ...this.config.projects };
    }

    public addProject(projectId: string, info: ProjectInfo = {}): void {
        const id = requireText(projectId, 'Project');
        this.config.projects[id] = { created_at: new Date().toISOString(), ...info };
        this.saveSettings();
    }

    public removeProject(projectId: string): void {
        delete this.config.projects[projectId];
        this.saveSettings();
    }

    public hasPassword(): boolean {
        return this.config.password_hash !== null;
    }

    public setPassword(password: string): void {
        this.config.password_hash = hashPassword(requireText(password, 'Password'));
        this.saveSettings();
    }

    public clearPassword(): void {
        this.config.password_hash = null;
        this.saveSettings();
    }

    public checkPassword(password: string): boolean {
        return verifyPassword(password, this.config.password_hash);
    }
}

export default Settings;

// 記録ドキュメントの型（ファイル上の形式と同じスネークケース）
export interface CategoryBucket {
    total_seconds: number;                  // apps の合計秒数
    apps: Record<string, number>;           // アプリ別秒数
    projects?: Record<string, number>;      // プロジェクト別秒数（タグ付き時間がある場合のみ）
}

export type DayRecord = Record<string, CategoryBucket>;

export interface StreakLedger {
    current: number;
    longest: number;
    last_date: string | null;               // YYYY-MM-DD
}

export interface AccountingDocument {
    [dateKey: string]: DayRecord | StreakLedger;
}

export interface DateRange {
    start: string;                          // YYYY-MM-DD（含む）
    end: string;                            // YYYY-MM-DD（含む）
}

export interface ProjectInfo {
    description?: string;
    created_at?: string;
}

// 分類ルール（パターン, カテゴリ）。配列の順序がそのまま優先順位
export type CustomRule = [pattern: string, category: string];

// 設定ドキュメント
export interface ConfigDocument {
    idle_threshold_seconds: number;
    tick_interval_seconds: number;
    max_increment_seconds: number | null;
    goals: Record<string, number>;          // カテゴリ → 1日の目標時間
    custom_categories: CustomRule[];
    excluded_apps: string[];
    focus_mode_blocked: string[];
    break_reminder_interval: number;        // 秒、0で無効
    notifications_enabled: boolean;
    auto_start: boolean;
    password_hash: string | null;
    productive_categories: string[];
    projects: Record<string, ProjectInfo>;
}

export type Clock = () => Date;

/**
 * プローブ結果。取得できなかった場合は例外ではなく unavailable で表す
 */
export type ProbeResult<T> =
    | { kind: 'known'; value: T }
    | { kind: 'unavailable'; reason: string };

export function known<T>(value: T): ProbeResult<T> {
    return { kind: 'known', value };
}

export function unavailable<T>(reason: string): ProbeResult<T> {
    return { kind: 'unavailable', reason };
}

export interface ActiveWindowProbe {
    probeActiveWindow(): Promise<ProbeResult<string>>;
}

export interface IdleProbe {
    probeIdleSeconds(): Promise<ProbeResult<number>>;
}

export interface Notifier {
    notify(title: string, message: string): void | Promise<void>;
}

export type OperationResult<T> =
    | { ok: true; value: T }
    | { ok: false; error: Error };

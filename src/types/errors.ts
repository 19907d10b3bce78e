/**
 * 入力値が不正（UIや設定の境界で拒否する）
 */
export class ValidationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ValidationError';
    }
}

/**
 * ディスクへの書き込みに失敗した
 */
export class PersistenceError extends Error {
    constructor(message: string, public readonly filePath: string, public readonly reason?: unknown) {
        super(message);
        this.name = 'PersistenceError';
    }
}

/**
 * 保存ファイルを解析できない。自動で初期化せず、利用者の操作を求める
 */
export class CorruptDocumentError extends Error {
    constructor(message: string, public readonly filePath: string) {
        super(message);
        this.name = 'CorruptDocumentError';
    }
}

export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}

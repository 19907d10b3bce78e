import * as fs from 'fs-extra';
import * as path from 'path';
import { getDataDirectory } from './paths';

export enum LogLevel {
    DEBUG = 'DEBUG',
    INFO = 'INFO',
    WARN = 'WARN',
    ERROR = 'ERROR'
}

const LEVEL_ORDER: Record<LogLevel, number> = {
    [LogLevel.DEBUG]: 0,
    [LogLevel.INFO]: 1,
    [LogLevel.WARN]: 2,
    [LogLevel.ERROR]: 3
};

function parseLevel(value: string | undefined): LogLevel {
    switch ((value || '').toLowerCase()) {
        case 'debug': return LogLevel.DEBUG;
        case 'warn': return LogLevel.WARN;
        case 'error': return LogLevel.ERROR;
        default: return LogLevel.INFO;
    }
}

export class Logger {
    private logFile: string;
    private maxLogSize: number = 10 * 1024 * 1024; // 10MB
    private maxLogFiles: number = 5;
    private errorCount: number = 0;
    private minLevel: LogLevel;
    private pending: Promise<void> = Promise.resolve();

    constructor(logDir?: string) {
        this.minLevel = parseLevel(process.env.LOG_LEVEL);
        const dir = logDir || process.env.TIME_LEDGER_LOG_DIR || path.join(getDataDirectory(), 'logs');
        try {
            fs.ensureDirSync(dir);
            this.logFile = path.join(dir, 'app.log');
        } catch (error) {
            console.error('Logger initialization error:', error);
            // フォールバックとして現在のディレクトリを使用
            this.logFile = path.join(process.cwd(), 'app.log');
        }
    }

    private formatMessage(level: LogLevel, message: string, error?: Error): string {
        const timestamp = new Date().toISOString();
        const errorInfo = error ? ` | Error: ${error.message}\n${error.stack}` : '';
        return `[${timestamp}] [${level}] ${message}${errorInfo}\n`;
    }

    private enqueue(level: LogLevel, message: string, error?: Error): void {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
            return;
        }
        // 書き込み順を保つため直列化（ローテーション中の追記を防ぐ）
        this.pending = this.pending.then(() => this.writeLog(level, message, error));
    }

    private async writeLog(level: LogLevel, message: string, error?: Error): Promise<void> {
        try {
            const logMessage = this.formatMessage(level, message, error);

            await this.rotateLogIfNeeded();
            await fs.appendFile(this.logFile, logMessage, 'utf8');

            // テスト環境ではJestの終了後ログによる失敗を防ぐため、コンソール出力を抑制
            const isTestEnv = !!process.env.JEST_WORKER_ID;
            if (!isTestEnv) {
                const consoleMessage = `[${level}] ${message}`;
                switch (level) {
                    case LogLevel.DEBUG:
                        console.debug(consoleMessage);
                        break;
                    case LogLevel.INFO:
                        console.info(consoleMessage);
                        break;
                    case LogLevel.WARN:
                        console.warn(consoleMessage);
                        break;
                    case LogLevel.ERROR:
                        console.error(consoleMessage, error ?? '');
                        break;
                }
            }
        } catch (writeError) {
            console.error('ログ書き込みエラー:', writeError);
        }
    }

    private async rotateLogIfNeeded(): Promise<void> {
        try {
            if (!(await fs.pathExists(this.logFile))) {
                return;
            }
            const stats = await fs.stat(this.logFile);

            if (stats.size > this.maxLogSize) {
                // 古いログファイルを順送り（最古は削除）
                for (let i = this.maxLogFiles - 1; i >= 1; i--) {
                    const oldFile = `${this.logFile}.${i}`;
                    const newFile = `${this.logFile}.${i + 1}`;

                    if (await fs.pathExists(oldFile)) {
                        if (i === this.maxLogFiles - 1) {
                            await fs.remove(oldFile);
                        } else {
                            await fs.move(oldFile, newFile, { overwrite: true });
                        }
                    }
                }

                await fs.move(this.logFile, `${this.logFile}.1`, { overwrite: true });
            }
        } catch (error) {
            console.error('ログローテーションエラー:', error);
        }
    }

    private withData(message: string, data?: unknown): string {
        if (data === undefined) {
            return message;
        }
        try {
            return `${message} | Data: ${JSON.stringify(data, null, 2)}`;
        } catch {
            return `${message} | Data: ${String(data)}`;
        }
    }

    public debug(message: string, data?: unknown): void {
        this.enqueue(LogLevel.DEBUG, this.withData(message, data));
    }

    public info(message: string, data?: unknown): void {
        this.enqueue(LogLevel.INFO, this.withData(message, data));
    }

    public warn(message: string, error?: unknown): void {
        if (error instanceof Error) {
            this.enqueue(LogLevel.WARN, message, error);
        } else {
            this.enqueue(LogLevel.WARN, this.withData(message, error));
        }
    }

    public error(message: string, error?: unknown): void {
        this.errorCount++;

        if (error instanceof Error) {
            this.enqueue(LogLevel.ERROR, message, error);
        } else {
            this.enqueue(LogLevel.ERROR, this.withData(message, error));
        }
    }

    /**
     * キューに積まれたログの書き込み完了を待つ
     */
    public flush(): Promise<void> {
        return this.pending;
    }

    public getErrorStats(): { errorCount: number } {
        return { errorCount: this.errorCount };
    }

    public resetErrorCount(): void {
        this.errorCount = 0;
    }

    public getLogFilePath(): string {
        return this.logFile;
    }

    public async getRecentLogs(lines: number = 100): Promise<string[]> {
        try {
            const content = await fs.readFile(this.logFile, 'utf8');
            const logLines = content.split('\n').filter(line => line.trim());
            return logLines.slice(-lines);
        } catch {
            return [];
        }
    }
}

// シングルトンインスタンス
export const logger = new Logger();

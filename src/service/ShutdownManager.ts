import { logger } from '../utils/logger';

/**
 * シャットダウン理由
 */
export enum ShutdownReason {
    SIGNAL = 'signal',                    // シグナル受信
    MANUAL = 'manual',                    // 呼び出し側からの終了
    CRASH = 'crash'                       // 未処理の例外
}

export interface IShutdownManager {
    initialize(): void;
    shutdown(reason: ShutdownReason, signal?: string): Promise<void>;
    addShutdownCallback(callback: () => Promise<void>): void;
    dispose(): void;
}

/**
 * シグナル受信元（テストでは process の代わりに EventEmitter を渡す）
 */
export interface SignalSource {
    on(event: string, listener: (...args: unknown[]) => void): unknown;
    removeListener(event: string, listener: (...args: unknown[]) => void): unknown;
}

export interface ShutdownManagerOptions {
    signalSource?: SignalSource;
    exit?: (code: number) => void;
    maxShutdownTime?: number;
}

const SIGNALS = ['SIGINT', 'SIGTERM', 'SIGHUP'];

/**
 * シャットダウン管理クラス。登録されたコールバックを一度だけ、制限時間内に実行してから終了する
 */
export class ShutdownManager implements IShutdownManager {
    private isShuttingDown: boolean = false;
    private shutdownCallbacks: Array<() => Promise<void>> = [];
    private readonly maxShutdownTime: number;
    private readonly signalSource: SignalSource;
    private readonly exit: (code: number) => void;
    private readonly listeners = new Map<string, (...args: unknown[]) => void>();

    constructor(options: ShutdownManagerOptions = {}) {
        this.signalSource = options.signalSource || process;
        this.exit = options.exit || ((code: number) => process.exit(code));
        this.maxShutdownTime = options.maxShutdownTime ?? 10000; // 10秒
    }

    initialize(): void {
        for (const signal of SIGNALS) {
            this.listen(signal, () => {
                void this.handleSignal(signal);
            });
        }
        if (process.platform === 'win32') {
            this.listen('SIGBREAK', () => {
                void this.handleSignal('SIGBREAK');
            });
        }

        this.listen('uncaughtException', (error: unknown) => {
            logger.error('未処理の例外が発生しました', error);
            void this.shutdown(ShutdownReason.CRASH);
        });
        this.listen('unhandledRejection', (reason: unknown) => {
            logger.error('未処理のPromise拒否が発生しました', reason);
            void this.shutdown(ShutdownReason.CRASH);
        });

        logger.debug('シグナルハンドラーを設定しました');
    }

    private listen(event: string, listener: (...args: unknown[]) => void): void {
        this.signalSource.on(event, listener);
        this.listeners.set(event, listener);
    }

    dispose(): void {
        for (const [event, listener] of this.listeners) {
            this.signalSource.removeListener(event, listener);
        }
        this.listeners.clear();
    }

    private async handleSignal(signal: string): Promise<void> {
        logger.info(`シグナルを受信しました: ${signal}`);
        await this.shutdown(ShutdownReason.SIGNAL, signal);
    }

    /**
     * シャットダウンを実行（二度目以降の呼び出しは無視）
     */
    async shutdown(reason: ShutdownReason, signal?: string): Promise<void> {
        if (this.isShuttingDown) {
            logger.warn('既にシャットダウン処理中です');
            return;
        }
        this.isShuttingDown = true;
        logger.info('シャットダウン開始', { reason, signal });

        let shutdownTimeout: NodeJS.Timeout | undefined;
        const timeout = new Promise<'timeout'>(resolve => {
            shutdownTimeout = setTimeout(() => resolve('timeout'), this.maxShutdownTime);
        });
        const outcome = await Promise.race([
            this.runCallbacks().then((): 'done' => 'done'),
            timeout
        ]);
        clearTimeout(shutdownTimeout);

        if (outcome === 'timeout') {
            logger.error('シャットダウンタイムアウト。強制終了します。');
            await logger.flush();
            this.exit(1);
            return;
        }

        const exitCode = this.getExitCode(reason);
        logger.info('プロセスを終了します', { exitCode, reason });
        await logger.flush();
        this.exit(exitCode);
    }

    private async runCallbacks(): Promise<void> {
        for (const callback of this.shutdownCallbacks) {
            try {
                await callback();
            } catch (error) {
                logger.warn('シャットダウンコールバックエラー', error);
            }
        }
    }

    private getExitCode(reason: ShutdownReason): number {
        switch (reason) {
            case ShutdownReason.SIGNAL:
            case ShutdownReason.MANUAL:
                return 0;
            case ShutdownReason.CRASH:
            default:
                return 1;
        }
    }

    addShutdownCallback(callback: () => Promise<void>): void {
        this.shutdownCallbacks.push(callback);
        logger.debug('シャットダウンコールバックを追加しました', {
            callbackCount: this.shutdownCallbacks.length
        });
    }

    isShuttingDownNow(): boolean {
        return this.isShuttingDown;
    }
}

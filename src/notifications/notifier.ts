import { Notifier } from '../types';
import { logger } from '../utils/logger';

/**
 * 通知はベストエフォート。失敗しても呼び出し元へは伝えない
 */
export class SafeNotifier implements Notifier {
    constructor(
        private readonly target: Notifier,
        private readonly isEnabled: () => boolean = () => true
    ) {}

    async notify(title: string, message: string): Promise<void> {
        if (!this.isEnabled()) {
            return;
        }
        try {
            await this.target.notify(title, message);
        } catch (error) {
            logger.debug(`通知の送信に失敗しました: ${title}`, error instanceof Error ? error.message : error);
        }
    }
}

/**
 * デスクトップ通知の代わりにログと標準出力へ流す
 */
export class LogNotifier implements Notifier {
    notify(title: string, message: string): void {
        logger.info(`通知: ${title} - ${message}`);
        if (!process.env.JEST_WORKER_ID) {
            console.log(`[${title}] ${message}`);
        }
    }
}

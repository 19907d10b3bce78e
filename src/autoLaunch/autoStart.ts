import AutoLaunch from 'auto-launch';
import * as path from 'path';
import { logger } from '../utils/logger';

/**
 * isHidden 指定時に auto-launch が起動コマンドへ付けるフラグ。CLI はこれを start として扱う
 */
export const LOGIN_LAUNCH_FLAG = '--hidden';

/**
 * ログイン時に起動するCLIエントリ（ビルド後は dist/main.js、shebang 付き）
 */
export function getCliEntryPath(): string {
    return path.resolve(__dirname, '..', 'main.js');
}

export interface AutoStartOptions {
    name?: string;
    path?: string;
}

/**
 * ログイン時の自動起動。失敗はログに残して false を返す
 */
export class AutoStartManager {
    private autoLauncher: AutoLaunch | null = null;
    private readonly name: string;
    private readonly exePath: string;

    constructor(options: AutoStartOptions = {}) {
        this.name = options.name || 'TimeLedger';
        this.exePath = options.path || getCliEntryPath();
    }

    private getLauncher(): AutoLaunch {
        if (this.autoLauncher) return this.autoLauncher;

        this.autoLauncher = new AutoLaunch({
            name: this.name,
            path: this.exePath,
            isHidden: true
        });
        return this.autoLauncher;
    }

    public async enableAutoStart(): Promise<boolean> {
        try {
            const isEnabled = await this.getLauncher().isEnabled();
            if (!isEnabled) {
                await this.getLauncher().enable();
                logger.info('自動起動が有効になりました', { path: this.exePath });
            }
            return true;
        } catch (error) {
            logger.error('自動起動の有効化に失敗しました', error);
            return false;
        }
    }

    public async disableAutoStart(): Promise<boolean> {
        try {
            const isEnabled = await this.getLauncher().isEnabled();
            if (isEnabled) {
                await this.getLauncher().disable();
                logger.info('自動起動が無効になりました');
            }
            return true;
        } catch (error) {
            logger.error('自動起動の無効化に失敗しました', error);
            return false;
        }
    }

    public async isEnabled(): Promise<boolean> {
        try {
            return await this.getLauncher().isEnabled();
        } catch (error) {
            logger.error('自動起動状態の確認に失敗しました', error);
            return false;
        }
    }

    public async toggleAutoStart(enable: boolean): Promise<boolean> {
        return enable ? this.enableAutoStart() : this.disableAutoStart();
    }
}

export default AutoStartManager;

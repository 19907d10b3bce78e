import * as os from 'os';
import * as path from 'path';

export const DATA_FILE_NAME = 'time_tracking.json';
export const CONFIG_FILE_NAME = 'tracker_config.json';

/**
 * データディレクトリ（環境変数 TIME_LEDGER_HOME で上書き可能）
 */
export function getDataDirectory(): string {
    const override = process.env.TIME_LEDGER_HOME;
    if (override && override.trim()) {
        return path.resolve(override);
    }
    const home = process.env.HOME || process.env.USERPROFILE || os.homedir() || process.cwd();
    return path.join(home, '.time-ledger');
}

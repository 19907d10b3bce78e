import { DayRecord, Notifier, StreakLedger } from '../types';
import { addDays, toDateKey } from '../utils/date';
import { logger } from '../utils/logger';
import { SafeNotifier } from '../notifications/notifier';
import { evaluateGoal } from './GoalEvaluator';

export interface StreakStore {
    getStreaks(): StreakLedger;
    setStreaks(ledger: StreakLedger): void;
    snapshotFor(dateKey: string): DayRecord;
}

export interface GoalConfigSource {
    getGoals(): Record<string, number>;
    getProductiveCategories(): string[];
}

/**
 * 生産的カテゴリの目標をすべて達成したか（目標のないカテゴリは対象外）
 */
export function goalsMet(day: DayRecord, config: GoalConfigSource): boolean {
    const productive = config.getProductiveCategories();
    return Object.entries(config.getGoals())
        .filter(([category]) => productive.includes(category))
        .every(([category, hours]) => evaluateGoal(day, category, hours).met);
}

/**
 * 連続達成日数の更新。同じ日に何度呼んでも結果は変わらない
 */
export class StreakEvaluator {
    private readonly notifier: SafeNotifier | null;

    constructor(notifier?: Notifier) {
        this.notifier = notifier ? new SafeNotifier(notifier) : null;
    }

    async update(store: StreakStore, config: GoalConfigSource, today: Date): Promise<StreakLedger> {
        const todayKey = toDateKey(today);
        const ledger = store.getStreaks();

        if (ledger.last_date === todayKey) {
            return ledger;
        }

        // 前日の記録がなければ判定しない（何も記録していない日で連続日数を伸ばさない）
        const yesterdayKey = toDateKey(addDays(today, -1));
        const yesterday = store.snapshotFor(yesterdayKey);
        if (Object.keys(yesterday).length === 0) {
            return ledger;
        }
        const met = goalsMet(yesterday, config);
        const previous = ledger.current;

        if (met) {
            ledger.current = ledger.last_date === yesterdayKey ? ledger.current + 1 : 1;
        } else {
            ledger.current = 0;
        }

        const isNewRecord = ledger.current > ledger.longest;
        ledger.longest = Math.max(ledger.longest, ledger.current);
        ledger.last_date = todayKey;
        store.setStreaks(ledger);

        logger.info('連続達成日数を更新しました', ledger);

        if (isNewRecord) {
            await this.notify('New Record!', `New longest streak: ${ledger.longest} days!`);
        } else if (!met && previous > 0) {
            await this.notify('Streak Broken', `Your ${previous} day streak has ended`);
        }
        return ledger;
    }

    private async notify(title: string, message: string): Promise<void> {
        if (this.notifier) {
            await this.notifier.notify(title, message);
        }
    }
}

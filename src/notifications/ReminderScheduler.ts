import { DayRecord, Notifier } from '../types';
import { toDateKey } from '../utils/date';
import { GoalConfigSource } from '../usage/StreakEvaluator';
import { SafeNotifier } from './notifier';

export interface ReminderConfigSource extends GoalConfigSource {
    getBreakReminderInterval(): number;
}

export interface DaySource {
    snapshotFor(dateKey: string): DayRecord;
}

const LIMIT_WARNING_FACTOR = 1.5;

/**
 * 目標達成・使いすぎ警告・休憩リマインダー。同じ通知は一度だけ送る
 */
export class ReminderScheduler {
    private sent = new Set<string>();
    private readonly notifier: SafeNotifier;

    constructor(
        private readonly store: DaySource,
        private readonly config: ReminderConfigSource,
        notifier: Notifier
    ) {
        this.notifier = new SafeNotifier(notifier);
    }

    /**
     * 送信した通知のキーを返す
     */
    async check(now: Date, sessionStart: Date): Promise<string[]> {
        const keys: string[] = [];
        keys.push(...await this.checkGoals(now));

        const breakKey = await this.checkBreak(now, sessionStart);
        if (breakKey) {
            keys.push(breakKey);
        }
        return keys;
    }

    private async checkGoals(now: Date): Promise<string[]> {
        const today = toDateKey(now);
        const day = this.store.snapshotFor(today);
        const productive = this.config.getProductiveCategories();
        const keys: string[] = [];

        for (const [category, goalHours] of Object.entries(this.config.getGoals())) {
            if (!Object.prototype.hasOwnProperty.call(day, category)) {
                continue;
            }
            const bucket = day[category];
            const hours = bucket.total_seconds / 3600;

            if (hours >= goalHours) {
                const key = `goal_${category}_${today}`;
                if (this.markSent(key)) {
                    await this.notifier.notify('Goal Achieved!', `You've hit your ${category} goal of ${goalHours}h today!`);
                    keys.push(key);
                }
            }

            // 生産的でないカテゴリは目標を上限として扱う
            if (!productive.includes(category) && hours > goalHours * LIMIT_WARNING_FACTOR) {
                const key = `warn_${category}_${today}`;
                if (this.markSent(key)) {
                    await this.notifier.notify(
                        'Limit Warning',
                        `You've spent ${hours.toFixed(1)}h on ${category} today (limit: ${goalHours}h)`
                    );
                    keys.push(key);
                }
            }
        }
        return keys;
    }

    private async checkBreak(now: Date, sessionStart: Date): Promise<string | null> {
        const interval = this.config.getBreakReminderInterval();
        if (interval <= 0) {
            return null;
        }
        const nowSeconds = now.getTime() / 1000;
        if (nowSeconds - sessionStart.getTime() / 1000 <= interval) {
            return null;
        }
        const key = `break_${Math.floor(nowSeconds / interval)}`;
        if (!this.markSent(key)) {
            return null;
        }
        await this.notifier.notify(
            'Take a Break!',
            `You've been working for ${Math.floor(interval / 60)} minutes. Time for a break!`
        );
        return key;
    }

    private markSent(key: string): boolean {
        if (this.sent.has(key)) {
            return false;
        }
        this.sent.add(key);
        return true;
    }

    reset(): void {
        this.sent.clear();
    }
}

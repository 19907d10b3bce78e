import { Clock, DateRange, DayRecord } from '../types';
import { addDays, startOfWeek, toDateKey } from '../utils/date';
import { productiveSecondsOf, productivityScore, totalSecondsOf } from './GoalEvaluator';
import { GoalConfigSource } from './StreakEvaluator';

export interface AppUsage {
    application: string;
    seconds: number;
    hours: number;
    percentage: number;        // カテゴリ内の割合
}

export interface GoalRemark {
    goalHours: number;
    met: boolean;
    remainingHours: number;
}

export interface CategoryUsage {
    category: string;
    seconds: number;
    hours: number;
    percentage: number;        // 全体に対する割合
    topApps: AppUsage[];
    moreApps: number;          // topApps に入らなかったアプリ数
    goal: GoalRemark | null;
}

export interface DaySummary {
    date: string;
    totalSeconds: number;
    totalHours: number;
    productivityScore: number;
    categories: CategoryUsage[];
}

export interface WeekSummary {
    weekStart: string;
    weekEnd: string;
    totalSeconds: number;
    totalHours: number;
    categories: CategoryUsage[];
}

export interface Insights {
    days: string[];
    avgProductiveHours: number;
    avgEntertainmentHours: number;
    avgTotalHours: number;
    mostProductiveDay: { date: string; productiveHours: number } | null;
    topApps: { application: string; hours: number }[];
}

export interface HistoryEntry {
    date: string;
    totalHours: number;
    categories: string[];
}

export interface AnalyzerSource {
    snapshotFor(dateKey: string): DayRecord;
    snapshotRange(range: DateRange): Record<string, DayRecord>;
    dates(): string[];
}

export interface IUsageAnalyzer {
    summarizeDay(dateKey: string): DaySummary;
    summarizeToday(): DaySummary;
    summarizeWeek(reference?: Date): WeekSummary;
    getInsights(): Insights | null;
    getHistory(limit?: number): HistoryEntry[];
    formatDuration(minutes: number): string;
}

const ENTERTAINMENT_CATEGORY = 'Entertainment';
const INSIGHT_DAYS = 7;

interface Accumulator {
    seconds: number;
    apps: Map<string, number>;
}

function average(values: readonly number[]): number {
    return values.length ? values.reduce((sum, v) => sum + v, 0) / values.length : 0;
}

function bySecondsDesc<T extends { seconds: number }>(a: T, b: T): number {
    return b.seconds - a.seconds;
}

export class UsageAnalyzer implements IUsageAnalyzer {
    private readonly clock: Clock;

    constructor(
        private store: AnalyzerSource,
        private config: GoalConfigSource,
        clock?: Clock
    ) {
        this.clock = clock || (() => new Date());
    }

    /**
     * 1日分のカテゴリ別集計（時間の多い順、各カテゴリ上位5アプリと目標との比較）
     */
    summarizeDay(dateKey: string): DaySummary {
        const day = this.store.snapshotFor(dateKey);
        const totalSeconds = totalSecondsOf(day);
        const goals = this.config.getGoals();

        const categories = this.buildCategories(this.accumulate([day]), totalSeconds, 5)
            .map(usage => ({
                ...usage,
                goal: Object.prototype.hasOwnProperty.call(goals, usage.category)
                    ? this.goalRemark(usage, goals[usage.category])
                    : null
            }));

        return {
            date: dateKey,
            totalSeconds,
            totalHours: totalSeconds / 3600,
            productivityScore: productivityScore(day, this.config.getProductiveCategories()),
            categories
        };
    }

    summarizeToday(): DaySummary {
        return this.summarizeDay(toDateKey(this.clock()));
    }

    /**
     * 月曜始まりの週の集計（各カテゴリ上位3アプリ）
     */
    summarizeWeek(reference: Date = this.clock()): WeekSummary {
        const start = startOfWeek(reference);
        const range = { start: toDateKey(start), end: toDateKey(addDays(start, 6)) };
        const days = Object.values(this.store.snapshotRange(range));
        const totalSeconds = days.reduce((sum, day) => sum + totalSecondsOf(day), 0);

        return {
            weekStart: range.start,
            weekEnd: range.end,
            totalSeconds,
            totalHours: totalSeconds / 3600,
            categories: this.buildCategories(this.accumulate(days), totalSeconds, 3)
        };
    }

    /**
     * 直近7日（記録のある日）の平均と、全期間の上位アプリ。記録がなければ null
     */
    getInsights(): Insights | null {
        const allDates = this.store.dates();
        if (allDates.length === 0) {
            return null;
        }
        const days = allDates.slice(-INSIGHT_DAYS);
        const productive = this.config.getProductiveCategories();

        const productiveHours: number[] = [];
        const entertainmentHours: number[] = [];
        const totalHours: number[] = [];
        for (const date of days) {
            const day = this.store.snapshotFor(date);
            productiveHours.push(productiveSecondsOf(day, productive) / 3600);
            entertainmentHours.push((day[ENTERTAINMENT_CATEGORY]?.total_seconds ?? 0) / 3600);
            totalHours.push(totalSecondsOf(day) / 3600);
        }

        // 同値の場合は古い日を優先
        let best = 0;
        productiveHours.forEach((hours, index) => {
            if (hours > productiveHours[best]) {
                best = index;
            }
        });

        const apps = new Map<string, number>();
        for (const date of allDates) {
            for (const bucket of Object.values(this.store.snapshotFor(date))) {
                for (const [app, seconds] of Object.entries(bucket.apps)) {
                    apps.set(app, (apps.get(app) ?? 0) + seconds);
                }
            }
        }
        const topApps = Array.from(apps, ([application, seconds]) => ({ application, seconds }))
            .sort(bySecondsDesc)
            .slice(0, 5)
            .map(({ application, seconds }) => ({ application, hours: seconds / 3600 }));

        return {
            days,
            avgProductiveHours: average(productiveHours),
            avgEntertainmentHours: average(entertainmentHours),
            avgTotalHours: average(totalHours),
            mostProductiveDay: { date: days[best], productiveHours: productiveHours[best] },
            topApps
        };
    }

    /**
     * 記録のある日を新しい順に
     */
    getHistory(limit: number = 10): HistoryEntry[] {
        return this.store.dates()
            .reverse()
            .slice(0, Math.max(0, limit))
            .map(date => {
                const day = this.store.snapshotFor(date);
                return {
                    date,
                    totalHours: totalSecondsOf(day) / 3600,
                    categories: Object.keys(day)
                };
            });
    }

    formatDuration(minutes: number): string {
        if (minutes < 1) {
            return '0:00';
        }

        const total = Math.round(minutes);
        const hours = Math.floor(total / 60);
        const mins = total % 60;

        return `${hours}:${mins.toString().padStart(2, '0')}`;
    }

    private accumulate(days: readonly DayRecord[]): Map<string, Accumulator> {
        const categories = new Map<string, Accumulator>();
        for (const day of days) {
            for (const [category, bucket] of Object.entries(day)) {
                const existing = categories.get(category) || { seconds: 0, apps: new Map<string, number>() };
                existing.seconds += bucket.total_seconds;
                for (const [app, seconds] of Object.entries(bucket.apps)) {
                    existing.apps.set(app, (existing.apps.get(app) ?? 0) + seconds);
                }
                categories.set(category, existing);
            }
        }
        return categories;
    }

    private buildCategories(categories: Map<string, Accumulator>, totalSeconds: number, appLimit: number): CategoryUsage[] {
        return Array.from(categories, ([category, data]): CategoryUsage => {
            const apps = Array.from(data.apps, ([application, seconds]) => ({
                application,
                seconds,
                hours: seconds / 3600,
                percentage: data.seconds > 0 ? seconds * 100 / data.seconds : 0
            })).sort(bySecondsDesc);

            return {
                category,
                seconds: data.seconds,
                hours: data.seconds / 3600,
                percentage: totalSeconds > 0 ? data.seconds * 100 / totalSeconds : 0,
                topApps: apps.slice(0, appLimit),
                moreApps: Math.max(0, apps.length - appLimit),
                goal: null
            };
        }).sort(bySecondsDesc);
    }

    private goalRemark(usage: CategoryUsage, goalHours: number): GoalRemark {
        return {
            goalHours,
            met: usage.hours >= goalHours,
            remainingHours: Math.max(0, goalHours - usage.hours)
        };
    }
}

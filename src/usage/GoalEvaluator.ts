import { DayRecord } from '../types';

export interface GoalProgress {
    category: string;
    goalHours: number;
    actualHours: number;
    progressPct: number;        // 上限なし（目標超過は100%超）
    met: boolean;
}

export interface GoalReport {
    goals: GoalProgress[];
    totalSeconds: number;
    productiveSeconds: number;
    productivityScore: number;  // 0〜100
}

const SECONDS_PER_HOUR = 3600;

export function categorySeconds(day: DayRecord, category: string): number {
    return Object.prototype.hasOwnProperty.call(day, category) ? day[category].total_seconds : 0;
}

export function totalSecondsOf(day: DayRecord): number {
    return Object.values(day).reduce((sum, bucket) => sum + bucket.total_seconds, 0);
}

export function productiveSecondsOf(day: DayRecord, productiveCategories: readonly string[]): number {
    return productiveCategories.reduce((sum, category) => sum + categorySeconds(day, category), 0);
}

/**
 * 生産性スコア（生産的カテゴリの割合、記録がなければ 0）
 */
export function productivityScore(day: DayRecord, productiveCategories: readonly string[]): number {
    const total = totalSecondsOf(day);
    if (total === 0) {
        return 0;
    }
    return productiveSecondsOf(day, productiveCategories) * 100 / total;
}

export function evaluateGoal(day: DayRecord, category: string, goalHours: number): GoalProgress {
    const seconds = categorySeconds(day, category);
    return {
        category,
        goalHours,
        actualHours: seconds / SECONDS_PER_HOUR,
        progressPct: goalHours > 0 ? seconds * 100 / (goalHours * SECONDS_PER_HOUR) : 0,
        met: seconds >= goalHours * SECONDS_PER_HOUR
    };
}

export function evaluateGoals(
    day: DayRecord,
    goals: Record<string, number>,
    productiveCategories: readonly string[]
): GoalReport {
    return {
        goals: Object.entries(goals).map(([category, hours]) => evaluateGoal(day, category, hours)),
        totalSeconds: totalSecondsOf(day),
        productiveSeconds: productiveSecondsOf(day, productiveCategories),
        productivityScore: productivityScore(day, productiveCategories)
    };
}

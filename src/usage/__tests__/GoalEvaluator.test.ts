import { evaluateGoal, evaluateGoals, productivityScore, totalSecondsOf } from '../GoalEvaluator';
import { DayRecord } from '../../types';

const day: DayRecord = {
    Coding: { total_seconds: 4.5 * 3600, apps: { Editor: 4.5 * 3600 } },
    Productivity: { total_seconds: 2.5 * 3600, apps: { Docs: 2.5 * 3600 } },
    Entertainment: { total_seconds: 3 * 3600, apps: { Player: 3 * 3600 } }
};

describe('GoalEvaluator', () => {
    test('進捗率は上限なしで計算されること', () => {
        expect(evaluateGoal(day, 'Coding', 4)).toEqual({
            category: 'Coding',
            goalHours: 4,
            actualHours: 4.5,
            progressPct: 112.5,
            met: true
        });
    });

    test('記録のないカテゴリは 0 として扱うこと', () => {
        expect(evaluateGoal(day, 'Education', 1)).toEqual({
            category: 'Education',
            goalHours: 1,
            actualHours: 0,
            progressPct: 0,
            met: false
        });
    });

    test('Object のメンバーと同じ名前のカテゴリも記録なしとして扱うこと', () => {
        expect(evaluateGoal(day, 'constructor', 1)).toEqual({
            category: 'constructor',
            goalHours: 1,
            actualHours: 0,
            progressPct: 0,
            met: false
        });
    });

    test('目標が 0 の場合の進捗率は 0 で、達成扱いになること', () => {
        const result = evaluateGoal(day, 'Coding', 0);
        expect(result.progressPct).toBe(0);
        expect(result.met).toBe(true);
    });

    test('生産性スコアは生産的カテゴリの割合であること', () => {
        expect(productivityScore(day, ['Coding', 'Productivity'])).toBe(70);
        expect(productivityScore({}, ['Coding'])).toBe(0);
    });

    test('evaluateGoals はすべての目標と合計をまとめること', () => {
        const report = evaluateGoals(day, { Coding: 4, Entertainment: 2 }, ['Coding', 'Productivity']);

        expect(report.goals.map(goal => [goal.category, goal.met])).toEqual([['Coding', true], ['Entertainment', true]]);
        expect(report.totalSeconds).toBe(totalSecondsOf(day));
        expect(report.totalSeconds).toBe(36000);
        expect(report.productiveSeconds).toBe(25200);
        expect(report.productivityScore).toBe(70);
    });
});

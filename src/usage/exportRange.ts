import { DateRange, DayRecord } from '../types';

export interface ExportRow {
    date: string;
    category: string;
    app: string | null;        // プロジェクト行では null
    hours: number;
    project: string | null;    // アプリ行では null
}

export const CSV_HEADER = 'Date,Category,App,Hours,Project';

export interface RangeSource {
    snapshotRange(range: DateRange): Record<string, DayRecord>;
}

/**
 * 範囲内の記録を行に展開する。
 * アプリ別の行に続けて、タグ付き時間があればプロジェクト別の行を出す
 */
export function exportRange(store: RangeSource, range: DateRange): ExportRow[] {
    const rows: ExportRow[] = [];
    const days = store.snapshotRange(range);

    for (const date of Object.keys(days).sort()) {
        for (const [category, bucket] of Object.entries(days[date])) {
            for (const [app, seconds] of Object.entries(bucket.apps)) {
                rows.push({ date, category, app, hours: seconds / 3600, project: null });
            }
            for (const [project, seconds] of Object.entries(bucket.projects ?? {})) {
                rows.push({ date, category, app: null, hours: seconds / 3600, project });
            }
        }
    }
    return rows;
}

export function escapeCsvField(field: string): string {
    if (field.includes(',') || field.includes('"') || field.includes('\n') || field.includes('\r')) {
        return `"${field.replace(/"/g, '""')}"`;
    }
    return field;
}

export function toCsv(rows: readonly ExportRow[]): string {
    const lines = rows.map(row => [
        row.date,
        escapeCsvField(row.category),
        escapeCsvField(row.app ?? ''),
        row.hours.toFixed(4),
        escapeCsvField(row.project ?? '')
    ].join(','));
    return [CSV_HEADER, ...lines].join('\n') + '\n';
}

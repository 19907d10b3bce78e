const DATE_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * ローカルタイムゾーンで YYYY-MM-DD 形式へ変換
 */
export function toDateKey(date: Date): string {
    const yyyy = date.getFullYear();
    const mm = String(date.getMonth() + 1).padStart(2, '0');
    const dd = String(date.getDate()).padStart(2, '0');
    return `${yyyy}-${mm}-${dd}`;
}

export function isDateKey(value: string): boolean {
    const match = DATE_KEY_PATTERN.exec(value);
    if (!match) {
        return false;
    }
    const [, y, m, d] = match;
    const date = new Date(Number(y), Number(m) - 1, Number(d));
    return toDateKey(date) === value;
}

/**
 * YYYY-MM-DD をローカル日付の 0:00 として解釈
 */
export function parseDateKey(value: string): Date {
    const match = DATE_KEY_PATTERN.exec(value);
    if (!match || !isDateKey(value)) {
        throw new RangeError(`Invalid date key: ${value}`);
    }
    return new Date(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
}

export function addDays(date: Date, days: number): Date {
    return new Date(date.getFullYear(), date.getMonth(), date.getDate() + days);
}

/**
 * 月曜始まりの週の初日
 */
export function startOfWeek(date: Date): Date {
    const weekday = (date.getDay() + 6) % 7;
    return addDays(date, -weekday);
}

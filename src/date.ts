import { GameError } from './errors';

// Calendar days are plain 'YYYY-MM-DD' strings in UTC.

const DAY_MS = 24 * 60 * 60 * 1000;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function isCalendarDate(value: string): boolean {
    const match = DATE_PATTERN.exec(value);
    if (!match) return false;
    const [, y, m, d] = match;
    const parsed = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
    return formatDate(parsed) === value;
}

/**
 * @throws GameError InvalidDate when the value is not a real calendar day.
 */
export function assertCalendarDate(value: string): string {
    if (!isCalendarDate(value)) {
        throw new GameError('InvalidDate', `Date must be a calendar day in YYYY-MM-DD format, got '${value}'`);
    }
    return value;
}

export function formatDate(date: Date): string {
    return date.toISOString().slice(0, 10);
}

/**
 * The UTC calendar day containing the given instant.
 */
export function utcDay(now: number = Date.now()): string {
    return formatDate(new Date(now));
}

export function addDays(date: string, days: number): string {
    const start = Date.parse(`${assertCalendarDate(date)}T00:00:00Z`);
    return formatDate(new Date(start + days * DAY_MS));
}

export function previousDay(date: string): string {
    return addDays(date, -1);
}

/**
 * Every day from start to end inclusive. Empty when end precedes start.
 */
export function eachDay(start: string, end: string): string[] {
    const days: string[] = [];
    for (let day = assertCalendarDate(start); day <= assertCalendarDate(end); day = addDays(day, 1)) {
        days.push(day);
    }
    return days;
}

/** '2024-01-15' -> '20240115' */
export function compactDate(date: string): string {
    return date.replace(/-/g, '');
}

/** '20240115' -> '2024-01-15' */
export function expandDate(compact: string): string {
    return `${compact.slice(0, 4)}-${compact.slice(4, 6)}-${compact.slice(6, 8)}`;
}

/**
 * Date arithmetic utilities using native Date.
 * Native Date only; no date library.
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Calendar day (UTC) of an ISO date or timestamp, as epoch milliseconds.
 * Returns null for anything that does not start with YYYY-MM-DD.
 */
export function utcDay(value: string): number | null {
    const match = value.match(/^(\d{4})-(\d{2})-(\d{2})/);
    if (!match) return null;
    const ms = Date.UTC(parseInt(match[1]), parseInt(match[2]) - 1, parseInt(match[3]));
    return isNaN(ms) ? null : ms;
}

/**
 * Calculate absolute days between two ISO dates or timestamps.
 * Only the calendar day counts; time of day is ignored.
 *
 * @returns Absolute difference in days, or null if either value is not a date
 */
export function daysBetween(date1: string, date2: string): number | null {
    const d1 = utcDay(date1);
    const d2 = utcDay(date2);
    if (d1 === null || d2 === null) return null;
    return Math.round(Math.abs(d1 - d2) / MS_PER_DAY);
}

/**
 * Check if two dates are within tolerance (inclusive).
 */
export function isWithinDateTolerance(date1: string, date2: string, toleranceDays: number): boolean {
    const days = daysBetween(date1, date2);
    return days !== null && days <= toleranceDays;
}

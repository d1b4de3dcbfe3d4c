/**
 * Date parsing utilities for extractors and bank exports.
 * All dates returned as UTC (00:00:00Z).
 */

/**
 * Fixed-layout date formats tried by the extractors.
 * Numeric fields accept one or two digits; years need four.
 */
export type DateFormat =
    | 'MM/DD/YYYY'
    | 'DD/MM/YYYY'
    | 'YYYY-MM-DD'
    | 'YYYY/MM/DD'
    | 'MM-DD-YYYY'
    | 'DD-MM-YYYY'
    | 'MON DD YYYY';

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

/**
 * A whole month name or its abbreviation ("Sep", "Sept", "September").
 * Regex source, no capture group; use with the `i` flag.
 */
export const MONTH_NAME = String.raw`(?:jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)(?![a-z])`;

const MONTH_DAY_YEAR = new RegExp(String.raw`^(${MONTH_NAME})\.?\s+(\d{1,2}),?\s+(\d{4})$`, 'i');

interface FormatLayout {
    pattern: RegExp;
    order: 'MDY' | 'DMY' | 'YMD';
}

const NUMERIC_LAYOUTS: Record<Exclude<DateFormat, 'MON DD YYYY'>, FormatLayout> = {
    'MM/DD/YYYY': { pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, order: 'MDY' },
    'DD/MM/YYYY': { pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, order: 'DMY' },
    'YYYY-MM-DD': { pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})$/, order: 'YMD' },
    'YYYY/MM/DD': { pattern: /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/, order: 'YMD' },
    'MM-DD-YYYY': { pattern: /^(\d{1,2})-(\d{1,2})-(\d{4})$/, order: 'MDY' },
    'DD-MM-YYYY': { pattern: /^(\d{1,2})-(\d{1,2})-(\d{4})$/, order: 'DMY' },
};

/**
 * Parse date value (Excel serial, Date object, or string).
 * Strings are tried as MM/DD/YYYY, then YYYY-MM-DD.
 * Returns date in UTC (00:00:00Z).
 */
export function parseDateValue(value: unknown): Date | null {
    if (value instanceof Date) {
        return isValidDate(value) ? value : null;
    }
    if (typeof value === 'number') {
        // Excel serial date
        return excelSerialToDate(value);
    }
    if (typeof value === 'string') {
        const trimmed = value.trim();
        return parseMdyDate(trimmed) ?? parseIsoDate(trimmed);
    }
    return null;
}

/**
 * Parse MM/DD/YYYY date string to Date (UTC).
 */
export function parseMdyDate(value: string): Date | null {
    return parseWithFormat(value, 'MM/DD/YYYY');
}

/**
 * Parse YYYY-MM-DD date string to Date (UTC).
 */
export function parseIsoDate(value: string): Date | null {
    return parseWithFormat(value, 'YYYY-MM-DD');
}

/**
 * Try each format in order; the first one that yields a real calendar date wins.
 */
export function parseWithFormats(value: string, formats: readonly DateFormat[]): Date | null {
    for (const format of formats) {
        const date = parseWithFormat(value, format);
        if (date) return date;
    }
    return null;
}

/**
 * Parse a date string against one fixed layout.
 * Rejects dates that roll over (02/30/2024).
 */
export function parseWithFormat(value: string, format: DateFormat): Date | null {
    const text = value.trim();

    if (format === 'MON DD YYYY') {
        const match = MONTH_DAY_YEAR.exec(text);
        if (!match) return null;
        return buildUtcDate(parseInt(match[3]), monthNumber(match[1]), parseInt(match[2]));
    }

    const { pattern, order } = NUMERIC_LAYOUTS[format];
    const match = text.match(pattern);
    if (!match) return null;

    const [a, b, c] = [parseInt(match[1]), parseInt(match[2]), parseInt(match[3])];
    switch (order) {
        case 'MDY':
            return buildUtcDate(c, a, b);
        case 'DMY':
            return buildUtcDate(c, b, a);
        case 'YMD':
            return buildUtcDate(a, b, c);
    }
}

/**
 * Parse a "Mon D" fragment (no year) against a reference year.
 */
export function parseMonthDay(monthName: string, day: number, year: number): Date | null {
    const month = monthNumber(monthName);
    if (month === 0) return null;
    return buildUtcDate(year, month, day);
}

/** 1-12, or 0 for an unknown name. */
function monthNumber(name: string): number {
    return MONTHS.indexOf(name.slice(0, 3).toLowerCase()) + 1;
}

/** Offsets in minutes for the obsolete RFC 2822 zone names. */
const ZONE_OFFSETS: Record<string, number> = {
    ut: 0, utc: 0, gmt: 0, z: 0,
    est: -300, edt: -240,
    cst: -360, cdt: -300,
    mst: -420, mdt: -360,
    pst: -480, pdt: -420,
};

const RFC_2822 = new RegExp(
    String.raw`^(?:(?:mon|tue|wed|thu|fri|sat|sun),\s*)?(\d{1,2})\s+(${MONTH_NAME})\s+(\d{4})\s+` +
    String.raw`(\d{2}):(\d{2})(?::(\d{2}))?(?:\s*([+-]\d{4}|[a-z]{1,3}))?(?:\s*\([^)]*\))?$`,
    'i'
);

/**
 * Parse an e-mail `Date` header ("Mon, 15 Jan 2024 10:30:00 +0000").
 * A missing zone is read as UTC. Anything else is rejected.
 */
export function parseRfc2822Date(value: string): Date | null {
    const match = RFC_2822.exec(value.trim());
    if (!match) return null;

    const day = buildUtcDate(parseInt(match[3]), monthNumber(match[2]), parseInt(match[1]));
    if (!day) return null;

    const [hours, minutes, seconds] = [parseInt(match[4]), parseInt(match[5]), parseInt(match[6] ?? '0')];
    if (hours > 23 || minutes > 59 || seconds > 59) return null;

    const offset = zoneOffset(match[7]);
    if (offset === null) return null;

    const minutesOfDay = hours * 60 + minutes - offset;
    return new Date(day.getTime() + (minutesOfDay * 60 + seconds) * 1000);
}

function zoneOffset(zone: string | undefined): number | null {
    if (zone === undefined) return 0;
    if (/^[+-]\d{4}$/.test(zone)) {
        const minutes = parseInt(zone.slice(1, 3)) * 60 + parseInt(zone.slice(3, 5));
        return zone.startsWith('-') ? -minutes : minutes;
    }
    return ZONE_OFFSETS[zone.toLowerCase()] ?? null;
}

/**
 * Build a UTC midnight date, or null when the fields do not name a real day.
 */
export function buildUtcDate(year: number, month: number, day: number): Date | null {
    const date = new Date(Date.UTC(year, month - 1, day));
    if (!isValidDate(date)) return null;

    if (date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day) {
        return null;
    }

    return date;
}

/**
 * Convert Excel serial date to JavaScript Date (UTC).
 */
export function excelSerialToDate(serial: number): Date {
    // Excel serial: days since 1899-12-30.
    // Rounded to the nearest day to absorb timezone offsets picked up on export.
    const days = Math.round(serial);
    const utcDays = days - 25569; // Adjust to Unix epoch
    const utcMs = utcDays * 86400 * 1000;
    return new Date(utcMs);
}

/**
 * Format Date as ISO YYYY-MM-DD string (UTC).
 */
export function formatIsoDate(date: Date): string {
    const year = date.getUTCFullYear();
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    const day = String(date.getUTCDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}

/**
 * Check if date is valid.
 */
export function isValidDate(date: Date): boolean {
    return !isNaN(date.getTime());
}

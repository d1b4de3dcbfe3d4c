import { describe, it, expect } from 'vitest';
import {
    parseMdyDate,
    parseIsoDate,
    parseWithFormat,
    parseWithFormats,
    parseMonthDay,
    formatIsoDate,
    isValidDate,
    parseDateValue,
    excelSerialToDate,
    parseRfc2822Date,
} from '../../src/utils/date-parse.js';

describe('date-parse utilities', () => {
    describe('parseMdyDate', () => {
        it('should parse valid MM/DD/YYYY', () => {
            const date = parseMdyDate('01/15/2024');
            expect(date).not.toBeNull();
            expect(date?.getUTCFullYear()).toBe(2024);
            expect(date?.getUTCMonth()).toBe(0); // Jan
            expect(date?.getUTCDate()).toBe(15);
        });

        it('should accept single-digit month and day', () => {
            expect(parseMdyDate('1/5/2024')?.toISOString()).toBe('2024-01-05T00:00:00.000Z');
        });

        it('should return null for invalid format', () => {
            expect(parseMdyDate('2024-01-15')).toBeNull();
            expect(parseMdyDate('01-15-2024')).toBeNull();
            expect(parseMdyDate('1/1/24')).toBeNull();
        });

        it('should return null for invalid dates', () => {
            expect(parseMdyDate('13/01/2024')).toBeNull();
            expect(parseMdyDate('02/30/2024')).toBeNull();
        });
    });

    describe('parseIsoDate', () => {
        it('should parse valid YYYY-MM-DD', () => {
            expect(parseIsoDate('2024-01-15')?.toISOString()).toBe('2024-01-15T00:00:00.000Z');
        });

        it('should return null for invalid format', () => {
            expect(parseIsoDate('01/15/2024')).toBeNull();
        });
    });

    describe('parseWithFormat', () => {
        it('reads day-first layouts', () => {
            expect(parseWithFormat('25/12/2023', 'DD/MM/YYYY')?.toISOString()).toBe('2023-12-25T00:00:00.000Z');
            expect(parseWithFormat('25-12-2023', 'DD-MM-YYYY')?.toISOString()).toBe('2023-12-25T00:00:00.000Z');
        });

        it('reads year-first with slashes', () => {
            expect(parseWithFormat('2024/3/9', 'YYYY/MM/DD')?.toISOString()).toBe('2024-03-09T00:00:00.000Z');
        });

        it('reads month names, abbreviated or full', () => {
            expect(parseWithFormat('Jan 15, 2024', 'MON DD YYYY')?.toISOString()).toBe('2024-01-15T00:00:00.000Z');
            expect(parseWithFormat('september 3 2023', 'MON DD YYYY')?.toISOString()).toBe('2023-09-03T00:00:00.000Z');
            expect(parseWithFormat('Foo 3 2023', 'MON DD YYYY')).toBeNull();
            expect(parseWithFormat('Decathlon 3, 2023', 'MON DD YYYY')).toBeNull();
        });
    });

    describe('parseWithFormats', () => {
        it('uses the first format that yields a real date', () => {
            const formats = ['MM/DD/YYYY', 'DD/MM/YYYY'] as const;
            expect(parseWithFormats('03/04/2024', formats)?.toISOString()).toBe('2024-03-04T00:00:00.000Z');
            expect(parseWithFormats('31/01/2024', formats)?.toISOString()).toBe('2024-01-31T00:00:00.000Z');
        });

        it('returns null when no format applies', () => {
            expect(parseWithFormats('13/13/2024', ['MM/DD/YYYY', 'DD/MM/YYYY'])).toBeNull();
        });
    });

    describe('parseMonthDay', () => {
        it('uses the reference year', () => {
            expect(parseMonthDay('Mar', 3, 2024)?.toISOString()).toBe('2024-03-03T00:00:00.000Z');
        });

        it('rejects impossible days', () => {
            expect(parseMonthDay('feb', 30, 2024)).toBeNull();
        });
    });

    describe('formatIsoDate', () => {
        it('should format date to YYYY-MM-DD', () => {
            expect(formatIsoDate(new Date(Date.UTC(2024, 0, 15)))).toBe('2024-01-15');
        });
    });

    describe('isValidDate', () => {
        it('should return true for valid date', () => {
            expect(isValidDate(new Date())).toBe(true);
        });

        it('should return false for invalid date', () => {
            expect(isValidDate(new Date('invalid'))).toBe(false);
        });
    });

    describe('parseDateValue', () => {
        it('should handle Date objects', () => {
            const d = new Date(Date.UTC(2024, 0, 15));
            expect(parseDateValue(d)).toEqual(d);
        });

        it('should handle Excel serials', () => {
            expect(parseDateValue(45306)?.toISOString()).toBe('2024-01-15T00:00:00.000Z');
        });

        it('should handle both string layouts', () => {
            expect(parseDateValue('01/15/2024')?.toISOString()).toBe('2024-01-15T00:00:00.000Z');
            expect(parseDateValue(' 2024-01-15 ')?.toISOString()).toBe('2024-01-15T00:00:00.000Z');
        });

        it('should return null for other values', () => {
            expect(parseDateValue('soon')).toBeNull();
            expect(parseDateValue(null)).toBeNull();
        });
    });

    describe('excelSerialToDate', () => {
        it('rounds away fractional offsets', () => {
            expect(formatIsoDate(excelSerialToDate(45305.96))).toBe('2024-01-15');
        });
    });

    describe('parseRfc2822Date', () => {
        it('reads e-mail Date headers in UTC', () => {
            expect(parseRfc2822Date('Mon, 15 Jan 2024 10:30:00 +0000')?.toISOString()).toBe('2024-01-15T10:30:00.000Z');
            expect(parseRfc2822Date('15 Jan 2024 10:30:00 -0500')?.toISOString()).toBe('2024-01-15T15:30:00.000Z');
            expect(parseRfc2822Date('Sat, 6 Apr 2024 01:15:00 +0530')?.toISOString()).toBe('2024-04-05T19:45:00.000Z');
        });

        it('accepts named zones, a comment and a missing zone or seconds', () => {
            expect(parseRfc2822Date('Tue, 16 Jan 2024 08:00 EST')?.toISOString()).toBe('2024-01-16T13:00:00.000Z');
            expect(parseRfc2822Date('Tue, 16 Jan 2024 08:00:00 +0000 (UTC)')?.toISOString()).toBe('2024-01-16T08:00:00.000Z');
            expect(parseRfc2822Date('16 Jan 2024 08:00:05')?.toISOString()).toBe('2024-01-16T08:00:05.000Z');
        });

        it('rejects anything else', () => {
            expect(parseRfc2822Date('1')).toBeNull();
            expect(parseRfc2822Date('12345')).toBeNull();
            expect(parseRfc2822Date('whenever')).toBeNull();
            expect(parseRfc2822Date('2024-01-15T10:30:00Z')).toBeNull();
            expect(parseRfc2822Date('31 Feb 2024 10:00:00 +0000')).toBeNull();
            expect(parseRfc2822Date('15 Jan 2024 25:00:00 +0000')).toBeNull();
            expect(parseRfc2822Date('15 Jan 2024 10:00:00 XYZ')).toBeNull();
        });
    });
});

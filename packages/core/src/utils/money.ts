/**
 * Money parsing for extracted amounts.
 *
 * Amounts leave the extractors as fixed-point strings with cent precision
 * ("4.90"). Decimal is used for every comparison so "45" and "45.00" agree.
 */

import { Decimal } from 'decimal.js';

/**
 * Parse a captured numeric token into a non-negative Decimal.
 *
 * Accepts thousands separators ("1,234.56") and a dangling decimal point
 * ("45."), both of which the loose capture patterns can produce.
 *
 * @returns Decimal, or null when the token is not a finite non-negative number
 */
export function parseMoney(raw: string): Decimal | null {
    const clean = raw.trim().replace(/,/g, '').replace(/\.$/, '');
    if (!/^\d+(\.\d+)?$/.test(clean)) return null;

    let value: Decimal;
    try {
        value = new Decimal(clean);
    } catch {
        return null;
    }
    if (!value.isFinite() || value.isNegative()) return null;
    return value;
}

/**
 * Format a Decimal with exactly two fraction digits (half-up).
 */
export function formatMoney(value: Decimal): string {
    return value.toFixed(2, Decimal.ROUND_HALF_UP);
}

/**
 * parseMoney + formatMoney in one step.
 * Returns undefined (not null) so the result can be assigned to an optional field.
 */
export function toMoneyString(raw: string): string | undefined {
    const value = parseMoney(raw);
    return value ? formatMoney(value) : undefined;
}

/**
 * Parse a signed amount from a bank export ("-1,234.50", "$12.00", or a number cell).
 */
export function parseSignedAmount(raw: unknown): Decimal | null {
    if (typeof raw === 'number') {
        return Number.isFinite(raw) ? new Decimal(raw) : null;
    }
    if (typeof raw !== 'string') return null;

    const clean = raw.trim().replace(/,/g, '').replace(/^\$/, '').replace(/^-\$/, '-');
    if (!/^[-+]?\d+(\.\d+)?$/.test(clean)) return null;
    return new Decimal(clean);
}

/**
 * Ordered pattern tables and the small loops that evaluate them.
 *
 * Every table is tried top to bottom and the first pattern with at least one
 * match decides. Which of that pattern's matches is used (first, last or the
 * largest) is chosen per field by the caller.
 *
 * ARCHITECTURAL NOTE: Nothing here throws. A capture that fails to parse
 * moves evaluation on to the next pattern.
 */

import { Decimal } from 'decimal.js';
import { parseMoney, formatMoney } from '../utils/money.js';
import { MONTH_NAME } from '../utils/date-parse.js';

/**
 * Loose number capture: "45", "45.", "45.00", "1,234.56".
 */
const NUM = String.raw`\d+(?:,\d{3})*\.?\d*`;

/** Merchant word characters. */
const WORD = String.raw`[A-Za-z0-9&'.\-]`;

/**
 * SMS merchant capture: up to eight words of up to 40 characters, separated
 * by spaces or tabs. The capture can neither start nor end on whitespace, so
 * the `\s+` that follows it is never ambiguous.
 */
const MERCHANT = String.raw`(${WORD}{1,40}(?:[ \t]+${WORD}{1,40}){0,7}?)`;

/** Labelled amount: "total: $4.90", "Tax 0.40". */
function labelled(label: string): RegExp {
    return new RegExp(String.raw`${label}[:\s]*\$?(${NUM})`, 'gi');
}

// ============================================================================
// Receipt tables
// ============================================================================

export const RECEIPT_AMOUNT_PATTERNS: readonly RegExp[] = [
    labelled('total'),
    labelled('amount'),
    /\$(\d+\.\d{2})/g,
    /(\d+\.\d{2})\s*$/g,
];

export const RECEIPT_TAX_PATTERNS: readonly RegExp[] = [
    labelled('tax'),
    labelled('hst'),
    labelled('gst'),
];

export const RECEIPT_TIP_PATTERNS: readonly RegExp[] = [
    labelled('tip'),
    labelled('gratuity'),
];

export const RECEIPT_SUBTOTAL_PATTERNS: readonly RegExp[] = [
    labelled(String.raw`sub[\s-]?total`),
];

/**
 * Numeric day-first/month-first, then year-first, then month-name.
 * Word boundaries keep "2024-01-15" from being read as "24-01-15".
 */
export const RECEIPT_DATE_PATTERNS: readonly RegExp[] = [
    /\b(\d{1,2}[/-]\d{1,2}[/-]\d{2,4})\b/gi,
    /\b(\d{4}[/-]\d{1,2}[/-]\d{1,2})\b/gi,
    new RegExp(String.raw`\b(${MONTH_NAME}\.?\s+\d{1,2},?\s+\d{4})\b`, 'gi'),
];

/** Receipt line that carries a price. */
export const LINE_ITEM_PRICE = /\$\d+\.\d{2}/;
export const LINE_ITEM_CAPTURE = /\$?(\d+\.\d{2})/;

/** Line made only of digits, whitespace, punctuation and symbols. */
export const NON_MERCHANT_LINE = /^[\d\s\p{P}\p{S}]+$/u;

// ============================================================================
// SMS tables
// ============================================================================

export const SMS_MERCHANT_PATTERNS: readonly RegExp[] = [
    new RegExp(String.raw`\bat\s+${MERCHANT}(?:\s+on\b|\s+for\b|\s*\$)`, 'i'),
    new RegExp(String.raw`\bfrom\s+${MERCHANT}(?:\s+on\b|\s+for\b|\s*\$)`, 'i'),
    new RegExp(String.raw`${MERCHANT}\s+charged`, 'i'),
    new RegExp(String.raw`${MERCHANT}\s+transaction`, 'i'),
];

export const SMS_AMOUNT_PATTERNS: readonly RegExp[] = [
    new RegExp(String.raw`\$(${NUM})`, 'gi'),
    labelled('amount'),
    labelled('charged'),
    labelled('paid'),
    /(\d+\.\d{2})/g,
];

export const SMS_NUMERIC_DATE_PATTERNS: readonly RegExp[] = [
    /\bon\s+(\d{1,2}[/-]\d{1,2}[/-]\d{2,4})\b/i,
    /\b(\d{1,2}[/-]\d{1,2}[/-]\d{2,4})\b/i,
];

export const SMS_MONTH_DAY_PATTERN = new RegExp(String.raw`\b(${MONTH_NAME})\.?\s+(\d{1,2})\b`, 'i');

export const CARD_SUFFIX_PATTERNS: readonly RegExp[] = [
    /card\s+ending\s+in\s+(\d{4})/i,
    /card\s+\*+(\d{4})/i,
    /\*+(\d{4})/i,
];

// ============================================================================
// E-mail tables
// ============================================================================

export const EMAIL_AMOUNT_PATTERNS: readonly RegExp[] = [
    new RegExp(String.raw`\$(${NUM})`, 'g'),
    labelled('total'),
    labelled('amount'),
    /(\d+\.\d{2})/g,
];

export const EMAIL_SENDER_DOMAIN = /@([^.>\s]+)/;

// ============================================================================
// Evaluation
// ============================================================================

/**
 * Which capture of the deciding pattern is used.
 */
export type MoneyPick = 'first' | 'last' | 'max';

/**
 * Capture group 1 of every match of a global pattern.
 */
export function captureAll(text: string, pattern: RegExp): string[] {
    const flags = pattern.flags.includes('g') ? pattern.flags : pattern.flags + 'g';
    return Array.from(text.matchAll(new RegExp(pattern.source, flags)), (m) => m[1] ?? '');
}

/**
 * Capture group 1 of the first match, or null.
 */
export function captureFirst(text: string, pattern: RegExp): string | null {
    const match = new RegExp(pattern.source, pattern.flags.replace('g', '')).exec(text);
    return match ? match[1] ?? null : null;
}

/**
 * Evaluate a money table. Returns a cent-precision string or undefined.
 */
export function extractMoney(text: string, patterns: readonly RegExp[], pick: MoneyPick): string | undefined {
    for (const pattern of patterns) {
        const captures = captureAll(text, pattern);
        if (captures.length === 0) continue;

        const value = pickMoney(captures, pick);
        if (value) return formatMoney(value);
    }
    return undefined;
}

function pickMoney(captures: string[], pick: MoneyPick): Decimal | null {
    if (pick === 'first') return parseMoney(captures[0]);
    if (pick === 'last') return parseMoney(captures[captures.length - 1]);

    let max: Decimal | null = null;
    for (const capture of captures) {
        const value = parseMoney(capture);
        if (!value) return null;
        if (!max || value.greaterThan(max)) max = value;
    }
    return max;
}

/**
 * First card-suffix capture, or undefined.
 */
export function extractCardSuffix(text: string): string | undefined {
    for (const pattern of CARD_SUFFIX_PATTERNS) {
        const digits = captureFirst(text, pattern);
        if (digits) return digits;
    }
    return undefined;
}

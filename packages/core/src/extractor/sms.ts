/**
 * Receipt extraction from SMS bodies (bank and card alerts).
 */

import { SMS_RECEIPT_KEYWORDS, SMS_MERCHANT_MIN_LENGTH } from '../types/index.js';
import type { ExtractedFields } from '../types/index.js';
import { parseWithFormats, parseMonthDay } from '../utils/date-parse.js';
import type { DateFormat } from '../utils/date-parse.js';
import {
    SMS_MERCHANT_PATTERNS,
    SMS_AMOUNT_PATTERNS,
    SMS_NUMERIC_DATE_PATTERNS,
    SMS_MONTH_DAY_PATTERN,
    extractMoney,
    extractCardSuffix,
} from './patterns.js';

const SMS_DATE_FORMATS: readonly DateFormat[] = ['MM/DD/YYYY', 'DD/MM/YYYY', 'MM-DD-YYYY', 'DD-MM-YYYY'];

export interface MessageExtractOptions {
    /** Processing time; used when no date can be read. Defaults to the current time. */
    now?: Date;
}

/**
 * Extract candidate fields from an SMS body.
 *
 * @returns null when the message is not a receipt at all; otherwise the
 *   fields found, always with `transaction_date`, `raw_body` and `sender`
 */
export function extractSmsFields(
    body: string,
    sender: string,
    options: MessageExtractOptions = {}
): ExtractedFields | null {
    if (typeof body !== 'string' || body === '') return null;
    if (!isReceiptMessage(body)) return null;

    const now = options.now ?? new Date();
    const fields: ExtractedFields = { line_items: [] };

    const merchant = extractMerchant(body);
    if (merchant) fields.merchant_name = merchant;

    // Alerts often quote a balance too; the largest value is the charge.
    const amount = extractMoney(body, SMS_AMOUNT_PATTERNS, 'max');
    if (amount) fields.amount = amount;

    fields.transaction_date = (extractDate(body, now.getUTCFullYear()) ?? now).toISOString();

    const card = extractCardSuffix(body);
    if (card) fields.card_last_four = card;

    fields.raw_body = body;
    fields.sender = sender;

    return fields;
}

function isReceiptMessage(body: string): boolean {
    const lower = body.toLowerCase();
    return SMS_RECEIPT_KEYWORDS.some((keyword) => lower.includes(keyword));
}

function extractMerchant(body: string): string | undefined {
    for (const pattern of SMS_MERCHANT_PATTERNS) {
        const match = pattern.exec(body);
        if (!match) continue;

        const merchant = match[1].trim();
        if (merchant.length >= SMS_MERCHANT_MIN_LENGTH && !/^\d+$/.test(merchant)) {
            return merchant;
        }
    }
    return undefined;
}

/**
 * The first date pattern that matches decides. "Mon D" takes its year from
 * the processing time.
 */
function extractDate(body: string, referenceYear: number): Date | null {
    for (const pattern of SMS_NUMERIC_DATE_PATTERNS) {
        const match = pattern.exec(body);
        if (match) return parseWithFormats(match[1], SMS_DATE_FORMATS);
    }

    const monthDay = SMS_MONTH_DAY_PATTERN.exec(body);
    if (monthDay) {
        return parseMonthDay(monthDay[1], parseInt(monthDay[2]), referenceYear);
    }
    return null;
}

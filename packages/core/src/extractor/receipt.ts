/**
 * Receipt field extraction from OCR text.
 *
 * Never throws and never returns a negative amount. Any field that cannot be
 * read is left out of the result.
 */

import { RECEIPT_EXTRACTION } from '../types/index.js';
import type { ExtractedFields, LineItem } from '../types/index.js';
import { parseWithFormats } from '../utils/date-parse.js';
import type { DateFormat } from '../utils/date-parse.js';
import { toMoneyString } from '../utils/money.js';
import {
    RECEIPT_AMOUNT_PATTERNS,
    RECEIPT_TAX_PATTERNS,
    RECEIPT_TIP_PATTERNS,
    RECEIPT_SUBTOTAL_PATTERNS,
    RECEIPT_DATE_PATTERNS,
    LINE_ITEM_PRICE,
    LINE_ITEM_CAPTURE,
    NON_MERCHANT_LINE,
    extractMoney,
    captureAll,
} from './patterns.js';

const RECEIPT_DATE_FORMATS: readonly DateFormat[] = [
    'MM/DD/YYYY',
    'DD/MM/YYYY',
    'YYYY-MM-DD',
    'YYYY/MM/DD',
    'MM-DD-YYYY',
    'MON DD YYYY',
];

/** Line items need some text besides the price. */
const LINE_ITEM_MIN_LENGTH = 6;

/**
 * Extract candidate fields from receipt OCR text.
 *
 * Amount takes the LAST match of the first matching pattern (the grand total
 * follows subtotals); tax, tip and subtotal take the FIRST.
 */
export function extractReceiptFields(ocrText: string): ExtractedFields {
    const text = typeof ocrText === 'string' ? ocrText : '';
    const fields: ExtractedFields = { line_items: [] };

    const merchant = extractMerchant(text);
    if (merchant) fields.merchant_name = merchant;

    const amount = extractMoney(text, RECEIPT_AMOUNT_PATTERNS, 'last');
    if (amount) fields.amount = amount;

    const tax = extractMoney(text, RECEIPT_TAX_PATTERNS, 'first');
    if (tax) fields.tax_amount = tax;

    const tip = extractMoney(text, RECEIPT_TIP_PATTERNS, 'first');
    if (tip) fields.tip_amount = tip;

    const subtotal = extractMoney(text, RECEIPT_SUBTOTAL_PATTERNS, 'first');
    if (subtotal) fields.subtotal = subtotal;

    const date = extractDate(text);
    if (date) fields.transaction_date = date.toISOString();

    fields.line_items = extractLineItems(text);

    return fields;
}

/**
 * First of the top lines that reads like a name rather than an address
 * number, phone number or separator.
 */
function extractMerchant(text: string): string | undefined {
    const lines = text.split(/\r?\n/).slice(0, RECEIPT_EXTRACTION.MERCHANT_SCAN_LINES);
    for (const raw of lines) {
        const line = raw.trim();
        if (line.length >= RECEIPT_EXTRACTION.MERCHANT_MIN_LENGTH && !NON_MERCHANT_LINE.test(line)) {
            return line;
        }
    }
    return undefined;
}

/**
 * The first date pattern that matches decides; if none of the formats
 * parses its first match, the date is omitted.
 */
function extractDate(text: string): Date | null {
    for (const pattern of RECEIPT_DATE_PATTERNS) {
        const captures = captureAll(text, pattern);
        if (captures.length === 0) continue;
        return parseWithFormats(captures[0], RECEIPT_DATE_FORMATS);
    }
    return null;
}

function extractLineItems(text: string): LineItem[] {
    const items: LineItem[] = [];

    for (const raw of text.split(/\r?\n/)) {
        const line = raw.trim();
        if (!LINE_ITEM_PRICE.test(line) || line.length < LINE_ITEM_MIN_LENGTH) continue;
        if (line.split(/\s+/).length < 2) continue;

        const price = LINE_ITEM_CAPTURE.exec(line);
        if (!price) continue;

        const description = line.replace(price[0], '').trim();
        const total = toMoneyString(price[1]);
        if (description && total) {
            items.push({ description, total_price: total });
        }
    }

    return items;
}

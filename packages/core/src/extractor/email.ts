/**
 * Receipt extraction from e-mail messages.
 */

import { EMAIL_RECEIPT_KEYWORDS, KNOWN_EMAIL_SENDERS } from '../types/index.js';
import type { ExtractedFields } from '../types/index.js';
import { titleCase } from '../utils/normalize.js';
import { parseRfc2822Date } from '../utils/date-parse.js';
import { EMAIL_AMOUNT_PATTERNS, EMAIL_SENDER_DOMAIN, extractMoney, extractCardSuffix } from './patterns.js';
import type { MessageExtractOptions } from './sms.js';

export interface EmailMessage {
    subject?: string;
    body: string;
    sender?: string;
    /** Raw `Date` header (RFC 2822). */
    date?: string;
}

/**
 * Extract candidate fields from an e-mail.
 *
 * @returns null unless the subject or body mentions a receipt keyword
 */
export function extractEmailFields(
    message: EmailMessage,
    options: MessageExtractOptions = {}
): ExtractedFields | null {
    const subject = (message.subject ?? '').toLowerCase();
    const body = (message.body ?? '').toLowerCase();
    const sender = message.sender ?? '';

    const isReceipt = EMAIL_RECEIPT_KEYWORDS.some((k) => subject.includes(k) || body.includes(k));
    if (!isReceipt) return null;

    const fields: ExtractedFields = { line_items: [] };

    const merchant = merchantFromSender(sender);
    if (merchant) fields.merchant_name = merchant;

    const amount = extractMoney(body, EMAIL_AMOUNT_PATTERNS, 'last');
    if (amount) fields.amount = amount;

    if (message.date && message.date.trim() !== '') {
        const date = parseRfc2822Date(message.date) ?? options.now ?? new Date();
        fields.transaction_date = date.toISOString();
    }

    const card = extractCardSuffix(body);
    if (card) fields.card_last_four = card;

    if (sender) fields.sender = sender;

    return fields;
}

/**
 * Known senders by substring; otherwise the first domain label, title-cased.
 */
export function merchantFromSender(sender: string): string | undefined {
    const lower = sender.toLowerCase();
    const known = KNOWN_EMAIL_SENDERS.find((entry) => lower.includes(entry.match));
    if (known) return known.merchant;

    const domain = EMAIL_SENDER_DOMAIN.exec(lower);
    return domain ? titleCase(domain[1]) : undefined;
}

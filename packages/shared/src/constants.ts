/**
 * Constants for Tallyslip.
 *
 * Keyword tables are declared in match order. Order is part of the contract:
 * the first entry whose keyword is a substring of the input wins.
 */

import type { PatternTable } from './schemas.js';

/**
 * Fallback merchant pattern table, consulted after persisted rules.
 * Category labels are lowercase; they are title-cased when materialized.
 * "gas" appears under both gas and utilities; gas is declared first and wins.
 */
export const DEFAULT_PATTERN_TABLE: PatternTable = [
    { category: 'food', keywords: ['restaurant', 'cafe', 'pizza', 'burger', 'food', 'kitchen', 'diner', 'grill', 'bistro'] },
    { category: 'groceries', keywords: ['grocery', 'supermarket', 'market', 'walmart', 'target', 'costco', 'safeway'] },
    { category: 'gas', keywords: ['gas', 'fuel', 'shell', 'exxon', 'bp', 'chevron', 'mobil'] },
    { category: 'shopping', keywords: ['store', 'shop', 'retail', 'amazon', 'ebay', 'mall'] },
    { category: 'transport', keywords: ['uber', 'lyft', 'taxi', 'bus', 'train', 'metro', 'parking'] },
    { category: 'entertainment', keywords: ['movie', 'cinema', 'theater', 'netflix', 'spotify', 'game'] },
    { category: 'utilities', keywords: ['electric', 'water', 'gas', 'internet', 'phone', 'cable'] },
    { category: 'healthcare', keywords: ['hospital', 'clinic', 'pharmacy', 'doctor', 'medical', 'health'] },
];

/**
 * Second fallback for bank transaction descriptions only.
 * Never consulted for merchant names.
 */
export const DESCRIPTION_FALLBACKS: PatternTable = [
    { category: 'cash', keywords: ['atm', 'withdrawal', 'cash'] },
    { category: 'transfer', keywords: ['transfer', 'deposit'] },
    { category: 'fees', keywords: ['fee', 'charge', 'service'] },
];

/**
 * An SMS must contain one of these (case-insensitive) to be treated as a receipt.
 */
export const SMS_RECEIPT_KEYWORDS = ['receipt', 'purchase', 'transaction', 'payment', 'charged', 'paid'] as const;

/**
 * An e-mail subject or body must contain one of these to be treated as a receipt.
 */
export const EMAIL_RECEIPT_KEYWORDS = ['receipt', 'invoice', 'purchase', 'order', 'payment', 'transaction'] as const;

/**
 * Senders recognised by substring of the lowercased From address.
 */
export const KNOWN_EMAIL_SENDERS = [
    { match: 'amazon', merchant: 'Amazon' },
    { match: 'uber', merchant: 'Uber' },
    { match: 'lyft', merchant: 'Lyft' },
    { match: 'paypal', merchant: 'PayPal' },
] as const;

/**
 * Receipt extraction limits.
 */
export const RECEIPT_EXTRACTION = {
    MERCHANT_SCAN_LINES: 5,
    MERCHANT_MIN_LENGTH: 4,
} as const;

/**
 * SMS merchant captures must be longer than this.
 */
export const SMS_MERCHANT_MIN_LENGTH = 3;

/**
 * Keyword validation thresholds for user rules.
 */
export const KEYWORD_VALIDATION = {
    MIN_LENGTH: 3,
    MAX_MATCH_PERCENT: 0.2,
    MAX_MATCHES_FOR_BROAD: 3,
} as const;

/**
 * Duplicate detection window: same amount within this many days.
 */
export const DUPLICATE_WINDOW_DAYS = 1;

/**
 * Record identifier configuration (document and transaction ids).
 */
export const RECORD_ID = {
    LENGTH: 16,
    COLLISION_SUFFIX_START: 2,
} as const;

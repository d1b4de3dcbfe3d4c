/**
 * Import routing by filename.
 *
 * Filename convention: {kind}_{anything}.{ext}
 * Examples: receipt_0001.txt, sms_2024-01-15.txt, email_order.eml, transactions_checking.csv
 */

import type { SourceHint } from '../types/index.js';

/**
 * What an import file contains. Bank exports are parsed; the rest are extracted.
 */
export type ImportKind = SourceHint | 'bank';

interface RouteEntry {
    pattern: RegExp;
    kind: ImportKind;
}

/**
 * Registry of routes. First match wins.
 */
const ROUTES: readonly RouteEntry[] = [
    { pattern: /^receipt_.+\.txt$/i, kind: 'receipt_ocr' },
    { pattern: /^sms_.+\.txt$/i, kind: 'sms' },
    { pattern: /^email_.+\.(eml|txt)$/i, kind: 'email' },
    { pattern: /^transactions_.+\.(csv|xlsx)$/i, kind: 'bank' },
];

/**
 * Detect what kind of import a file is.
 *
 * Hidden files (start with .) and editor/Office temp files (start with ~) are skipped.
 *
 * @param filename - Base filename (not full path)
 * @returns Import kind, or null if the file is not recognized
 */
export function detectSource(filename: string): ImportKind | null {
    if (filename.startsWith('.') || filename.startsWith('~')) {
        return null;
    }

    const route = ROUTES.find((r) => r.pattern.test(filename));
    return route ? route.kind : null;
}

/**
 * Filename patterns, for help text.
 */
export function getSupportedPatterns(): string[] {
    return ['receipt_*.txt', 'sms_*.txt', 'email_*.eml', 'email_*.txt', 'transactions_*.csv', 'transactions_*.xlsx'];
}

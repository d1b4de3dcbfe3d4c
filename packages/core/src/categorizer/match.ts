/**
 * Keyword matching for categorization.
 *
 * ARCHITECTURAL NOTE: Keywords are plain lowercase substrings. Both sides are
 * normalized the same way before comparison.
 */

import { normalizeForMatch } from '../utils/normalize.js';
import type { PatternTable } from '../types/index.js';

/**
 * First keyword contained in the already-normalized text, or null.
 * Empty keywords never match.
 */
export function findKeyword(normalizedText: string, keywords: readonly string[]): string | null {
    for (const keyword of keywords) {
        const needle = normalizeForMatch(keyword);
        if (needle !== '' && normalizedText.includes(needle)) {
            return needle;
        }
    }
    return null;
}

/**
 * First table entry with a keyword contained in the text, in declared order.
 */
export function matchTable(
    normalizedText: string,
    table: PatternTable
): { category: string; keyword: string } | null {
    for (const entry of table) {
        const keyword = findKeyword(normalizedText, entry.keywords);
        if (keyword !== null) {
            return { category: entry.category, keyword };
        }
    }
    return null;
}

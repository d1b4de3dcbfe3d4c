/**
 * Rule-based categorization of merchant names and bank descriptions.
 *
 * Lookup order (first match wins):
 * 1. Persisted active rules, in stored order
 * 2. Fallback pattern table, in declared order (label is title-cased)
 * 3. Description fallbacks (cash, transfer, fees), bank descriptions only
 *
 * ARCHITECTURAL NOTE: Pure function. Never throws, whatever it is given;
 * materializing the matched category is the caller's job.
 */

import { normalizeForMatch, titleCase } from '../utils/normalize.js';
import { DEFAULT_PATTERN_TABLE, DESCRIPTION_FALLBACKS } from '../types/index.js';
import type { CategoryRule } from '../types/index.js';
import { findKeyword, matchTable } from './match.js';
import type { CategorizeOptions, CategoryMatch } from './types.js';

/**
 * Match text against rules and fallback tables.
 *
 * @param text - Merchant name or bank description; anything else yields null
 * @param rules - Persisted rules; inactive or keyword-less rules are skipped
 * @returns The winning match, or null when nothing matched
 */
export function categorize(
    text: unknown,
    rules: readonly CategoryRule[],
    options: CategorizeOptions = {}
): CategoryMatch | null {
    if (typeof text !== 'string') return null;

    const haystack = normalizeForMatch(text);
    if (haystack === '') return null;

    for (const rule of rules) {
        if (!rule.active || rule.keywords.length === 0) continue;

        const keyword = findKeyword(haystack, rule.keywords);
        if (keyword !== null) {
            return { category: rule.category, source: 'rule', keyword, is_system: rule.is_system };
        }
    }

    const builtin = matchTable(haystack, options.patternTable ?? DEFAULT_PATTERN_TABLE);
    if (builtin) {
        return { category: titleCase(builtin.category), source: 'builtin', keyword: builtin.keyword, is_system: true };
    }

    if (options.kind === 'description') {
        const fallback = matchTable(haystack, options.descriptionFallbacks ?? DESCRIPTION_FALLBACKS);
        if (fallback) {
            return {
                category: titleCase(fallback.category),
                source: 'description',
                keyword: fallback.keyword,
                is_system: true,
            };
        }
    }

    return null;
}

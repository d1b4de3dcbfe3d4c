/**
 * Keyword validation for user rules.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Results returned as data.
 */

import { normalizeForMatch } from '../utils/normalize.js';
import { KEYWORD_VALIDATION } from '../types/index.js';
import type { CategoryRule } from '../types/index.js';
import type { CollisionResult, KeywordCollision, KeywordValidationResult } from './types.js';

/**
 * Validate a keyword before adding it to a rule.
 *
 * - Empty keyword = rejected
 * - Keyword shorter than 3 characters = rejected
 * - Matches >20% of the given merchant names AND >3 of them = too broad (warning)
 *
 * @param merchantNames - Optional sample of stored merchant names/descriptions for the breadth check
 */
export function validateKeyword(keyword: string, merchantNames?: readonly string[]): KeywordValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];
    const needle = normalizeForMatch(keyword ?? '');

    if (needle === '') {
        errors.push('Keyword cannot be empty');
        return { valid: false, errors, warnings };
    }

    if (needle.length < KEYWORD_VALIDATION.MIN_LENGTH) {
        errors.push(
            `Keyword must be at least ${KEYWORD_VALIDATION.MIN_LENGTH} characters (got ${needle.length})`
        );
        return { valid: false, errors, warnings };
    }

    if (!merchantNames || merchantNames.length === 0) {
        return { valid: true, errors, warnings };
    }

    const matchCount = merchantNames.filter((name) => normalizeForMatch(name).includes(needle)).length;
    const matchPercent = matchCount / merchantNames.length;

    if (
        matchPercent > KEYWORD_VALIDATION.MAX_MATCH_PERCENT &&
        matchCount > KEYWORD_VALIDATION.MAX_MATCHES_FOR_BROAD
    ) {
        warnings.push(
            `Keyword "${needle}" is too broad: matches ${matchCount} records ` +
            `(${(matchPercent * 100).toFixed(1)}% > ${KEYWORD_VALIDATION.MAX_MATCH_PERCENT * 100}%)`
        );
    }

    return { valid: true, errors, warnings, matchCount, matchPercent };
}

/**
 * Report existing keywords that overlap a new one (either contains the other).
 * Inactive rules are included: they can be re-activated.
 */
export function checkKeywordCollision(keyword: string, existingRules: readonly CategoryRule[]): CollisionResult {
    const needle = normalizeForMatch(keyword);
    const collisions: KeywordCollision[] = [];

    if (needle === '') {
        return { hasCollision: false, collisions };
    }

    for (const rule of existingRules) {
        for (const existing of rule.keywords) {
            const other = normalizeForMatch(existing);
            if (other !== '' && (needle.includes(other) || other.includes(needle))) {
                collisions.push({ category: rule.category, keyword: other });
            }
        }
    }

    return { hasCollision: collisions.length > 0, collisions };
}

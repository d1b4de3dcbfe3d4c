/**
 * Internal types for categorizer module.
 */

import type { Category, CategoryRef, CategoryRule, NewCategory, PatternTable } from '../types/index.js';

/**
 * Which stage of the lookup produced a match.
 * - rule: persisted keyword rule
 * - builtin: fallback pattern table
 * - description: bank-description fallbacks (cash, transfer, fees)
 */
export type CategorySource = 'rule' | 'builtin' | 'description';

/**
 * Text being categorized. Description fallbacks only apply to bank descriptions.
 */
export type CategorizeKind = 'merchant' | 'description';

/**
 * Result of the pure matcher. `category` is the display name to materialize.
 */
export interface CategoryMatch {
    category: string;
    source: CategorySource;
    keyword: string;
    is_system: boolean;
}

/**
 * Options for categorize() function.
 */
export interface CategorizeOptions {
    kind?: CategorizeKind;
    /** Fallback table consulted after persisted rules. Defaults to DEFAULT_PATTERN_TABLE. */
    patternTable?: PatternTable;
    /** Description-only fallbacks. Defaults to DESCRIPTION_FALLBACKS. */
    descriptionFallbacks?: PatternTable;
}

/**
 * Persistence the categorizer depends on.
 *
 * `insert` must enforce a case-insensitive unique name and reject a clash
 * with CategoryConflictError.
 */
export interface CategoryRepository {
    /** Active rules in stored order. */
    loadActiveRules(): Promise<CategoryRule[]>;
    /** Case-insensitive lookup. */
    findByName(name: string): Promise<Category | null>;
    insert(category: NewCategory): Promise<Category>;
    list(): Promise<Category[]>;
}

/**
 * Category reference together with the match that produced it.
 */
export interface ResolvedCategory {
    ref: CategoryRef;
    match: CategoryMatch;
}

/**
 * Statistics from batch categorization.
 */
export interface CategorizationStats {
    total: number;
    attempted: number;
    skipped: number;
    bySource: Record<CategorySource | 'none', number>;
}

/**
 * Keyword validation output. Errors block the rule; warnings do not.
 */
export interface KeywordValidationResult {
    valid: boolean;
    errors: string[];
    warnings: string[];
    matchCount?: number;
    matchPercent?: number;
}

export interface KeywordCollision {
    category: string;
    keyword: string;
}

export interface CollisionResult {
    hasCollision: boolean;
    collisions: KeywordCollision[];
}

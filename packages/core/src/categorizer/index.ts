/**
 * Categorizer module: keyword rules, fallback tables and category materialization.
 */

export { categorize } from './categorize.js';
export { Categorizer } from './categorizer.js';
export type { CategorizerOptions } from './categorizer.js';
export { materializeCategory } from './materialize.js';
export type { MaterializeOptions } from './materialize.js';
export { initializeDefaultCategories } from './defaults.js';
export type { InitializeResult } from './defaults.js';
export { categorizeAll, isUncategorized } from './batch.js';
export type { CategorizableRecord } from './batch.js';
export { validateKeyword, checkKeywordCollision } from './validate.js';
export { findKeyword, matchTable } from './match.js';
export type {
    CategorySource,
    CategorizeKind,
    CategoryMatch,
    CategorizeOptions,
    CategoryRepository,
    ResolvedCategory,
    CategorizationStats,
    KeywordValidationResult,
    KeywordCollision,
    CollisionResult,
} from './types.js';

/**
 * Stateful categorizer bound to a category repository.
 */

import type { CategoryRef, CategoryRule } from '../types/index.js';
import { categorize } from './categorize.js';
import { materializeCategory } from './materialize.js';
import type { CategorizeKind, CategorizeOptions, CategoryRepository, ResolvedCategory } from './types.js';

export type CategorizerOptions = Omit<CategorizeOptions, 'kind'>;

/**
 * Matches text and materializes the winning category.
 *
 * Active rules are loaded once, on first use, and shared by concurrent calls.
 * Call `reloadRules()` after the rule set changes.
 */
export class Categorizer {
    private rulesPromise: Promise<CategoryRule[]> | null = null;

    constructor(
        private readonly repository: CategoryRepository,
        private readonly options: CategorizerOptions = {}
    ) {}

    /**
     * @returns Reference to the matched category, or null when nothing matched
     */
    async categorize(text: unknown, kind: CategorizeKind = 'merchant'): Promise<CategoryRef | null> {
        const resolved = await this.categorizeWithMatch(text, kind);
        return resolved ? resolved.ref : null;
    }

    /**
     * Like categorize(), but also reports which rule or table entry matched.
     */
    async categorizeWithMatch(text: unknown, kind: CategorizeKind = 'merchant'): Promise<ResolvedCategory | null> {
        const rules = await this.loadRules();
        const match = categorize(text, rules, { ...this.options, kind });
        if (!match) return null;

        const category = await materializeCategory(this.repository, match.category, {
            is_system: match.is_system,
        });
        return { ref: { id: category.id, name: category.name }, match };
    }

    reloadRules(): void {
        this.rulesPromise = null;
    }

    private loadRules(): Promise<CategoryRule[]> {
        if (!this.rulesPromise) {
            this.rulesPromise = this.repository.loadActiveRules().catch((e: unknown) => {
                this.rulesPromise = null;
                throw e;
            });
        }
        return this.rulesPromise;
    }
}

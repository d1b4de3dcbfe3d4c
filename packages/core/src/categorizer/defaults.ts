/**
 * Default category installation.
 */

import type { Category, CategoryRule, DefaultCategory } from '../types/index.js';
import type { CategoryRepository } from './types.js';

export interface InitializeResult {
    /** Categories inserted by this call. */
    created: Category[];
    /** System rules for categories that have no rule yet; the caller persists them. */
    rulesToAdd: CategoryRule[];
}

/**
 * Create every default category that does not exist yet (case-insensitive)
 * and return the keyword rules still missing for them.
 *
 * Idempotent: a second call creates nothing and returns no rules once the
 * first call's rules have been persisted.
 */
export async function initializeDefaultCategories(
    repository: CategoryRepository,
    definitions: readonly DefaultCategory[],
    existingRules: readonly CategoryRule[],
    options: { addedDate?: string } = {}
): Promise<InitializeResult> {
    const created: Category[] = [];
    const rulesToAdd: CategoryRule[] = [];
    const ruled = new Set(existingRules.map((r) => r.category.toLowerCase()));

    for (const def of definitions) {
        const existing = await repository.findByName(def.name);
        if (!existing) {
            created.push(
                await repository.insert({
                    name: def.name,
                    description: def.description,
                    color: def.color,
                    icon: def.icon,
                    is_income: def.is_income,
                    is_system: true,
                    is_active: true,
                })
            );
        }

        if (def.keywords.length > 0 && !ruled.has(def.name.toLowerCase())) {
            rulesToAdd.push({
                category: def.name,
                keywords: def.keywords.map((k) => k.toLowerCase()),
                is_system: true,
                active: true,
                added_date: options.addedDate,
            });
            ruled.add(def.name.toLowerCase());
        }
    }

    return { created, rulesToAdd };
}

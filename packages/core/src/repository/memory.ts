/**
 * In-process category repository.
 *
 * Enforces the same case-insensitive name uniqueness as durable storage, so
 * concurrent materialization behaves the same way against it.
 */

import { CategoryConflictError } from '../errors.js';
import { NewCategorySchema } from '../types/index.js';
import type { Category, CategoryRule, NewCategory } from '../types/index.js';
import type { CategoryRepository } from '../categorizer/types.js';

export class InMemoryCategoryRepository implements CategoryRepository {
    private readonly categories: Category[];
    private readonly rules: CategoryRule[];

    constructor(categories: readonly Category[] = [], rules: readonly CategoryRule[] = []) {
        this.categories = categories.map((c) => ({ ...c }));
        this.rules = rules.map((r) => ({ ...r, keywords: [...r.keywords] }));
    }

    async loadActiveRules(): Promise<CategoryRule[]> {
        return this.rules.filter((r) => r.active).map((r) => ({ ...r, keywords: [...r.keywords] }));
    }

    async findByName(name: string): Promise<Category | null> {
        const key = name.toLowerCase();
        const found = this.categories.find((c) => c.name.toLowerCase() === key);
        return found ? { ...found } : null;
    }

    async insert(category: NewCategory): Promise<Category> {
        const fields = NewCategorySchema.parse(category);
        const key = fields.name.toLowerCase();
        if (this.categories.some((c) => c.name.toLowerCase() === key)) {
            throw new CategoryConflictError(fields.name);
        }

        const id = this.categories.reduce((max, c) => Math.max(max, c.id), 0) + 1;
        const created: Category = { ...fields, id };
        this.categories.push(created);
        return { ...created };
    }

    async list(): Promise<Category[]> {
        return this.categories.map((c) => ({ ...c }));
    }

    addRule(rule: CategoryRule): void {
        this.rules.push({ ...rule, keywords: [...rule.keywords] });
    }
}

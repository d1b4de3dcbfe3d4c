/**
 * Category repository backed by the workspace files.
 *
 * Categories live in data/categories.json; rules are read from
 * config/rules.yaml. Writes go straight to disk so a second process sees
 * them on its next read.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { CategorySchema, NewCategorySchema } from '@tallyslip/shared';
import type { Category, CategoryRule, NewCategory } from '@tallyslip/shared';
import { CategoryConflictError, InMemoryCategoryRepository, StorageError, type CategoryRepository } from '@tallyslip/core';
import type { Workspace } from '../types.js';
import { loadRules } from '../workspace/config.js';

const CategoryFileSchema = z.array(CategorySchema);

export class FileCategoryRepository implements CategoryRepository {
    constructor(private readonly workspace: Workspace) {}

    async loadActiveRules(): Promise<CategoryRule[]> {
        try {
            return loadRules(this.workspace).filter((rule) => rule.active);
        } catch (err) {
            throw new StorageError(`Failed to read rules from ${this.workspace.config.rulesPath}`, { cause: err });
        }
    }

    async findByName(name: string): Promise<Category | null> {
        const key = name.toLowerCase();
        return this.read().find((c) => c.name.toLowerCase() === key) ?? null;
    }

    async insert(category: NewCategory): Promise<Category> {
        const fields = NewCategorySchema.parse(category);
        const categories = this.read();

        const key = fields.name.toLowerCase();
        if (categories.some((c) => c.name.toLowerCase() === key)) {
            throw new CategoryConflictError(fields.name);
        }

        const created: Category = {
            ...fields,
            id: categories.reduce((max, c) => Math.max(max, c.id), 0) + 1,
        };
        this.write([...categories, created]);
        return created;
    }

    async list(): Promise<Category[]> {
        return this.read();
    }

    private read(): Category[] {
        const path = this.workspace.config.categoriesPath;
        if (!existsSync(path)) return [];

        try {
            return CategoryFileSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
        } catch (err) {
            throw new StorageError(`Failed to read categories from ${path}`, { cause: err });
        }
    }

    private write(categories: Category[]): void {
        const path = this.workspace.config.categoriesPath;
        try {
            mkdirSync(dirname(path), { recursive: true });
            writeFileSync(path, JSON.stringify(categories, null, 2) + '\n');
        } catch (err) {
            throw new StorageError(`Failed to write categories to ${path}`, { cause: err });
        }
    }
}

/**
 * Repository for a categorization pass. A dry run works on an in-memory
 * copy so categories created on first use are not written.
 */
export async function openCategoryRepository(workspace: Workspace, dryRun: boolean): Promise<CategoryRepository> {
    const repository = new FileCategoryRepository(workspace);
    if (!dryRun) return repository;
    return new InMemoryCategoryRepository(await repository.list(), await repository.loadActiveRules());
}

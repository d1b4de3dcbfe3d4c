/**
 * Idempotent category creation.
 */

import { CategoryConflictError, StorageError } from '../errors.js';
import type { Category } from '../types/index.js';
import type { CategoryRepository } from './types.js';

export interface MaterializeOptions {
    is_system?: boolean;
}

/**
 * Return the category named `name` (case-insensitive), creating it if absent.
 *
 * A uniqueness conflict on insert means another writer got there first: the
 * existing row is re-read and returned. If that re-read fails too, the
 * failure is a StorageError carrying the original cause.
 */
export async function materializeCategory(
    repository: CategoryRepository,
    name: string,
    options: MaterializeOptions = {}
): Promise<Category> {
    const existing = await repository.findByName(name);
    if (existing) return existing;

    try {
        return await repository.insert({
            name,
            is_system: options.is_system ?? true,
            is_active: true,
        });
    } catch (e) {
        if (!(e instanceof CategoryConflictError)) throw e;
        return refetchAfterConflict(repository, name, e);
    }
}

async function refetchAfterConflict(
    repository: CategoryRepository,
    name: string,
    conflict: CategoryConflictError
): Promise<Category> {
    let category: Category | null;
    try {
        category = await repository.findByName(name);
    } catch (cause) {
        throw new StorageError(`Failed to re-read category "${name}" after insert conflict`, { cause });
    }
    if (!category) {
        throw new StorageError(`Category "${name}" conflicted on insert but could not be found`, { cause: conflict });
    }
    return category;
}

/**
 * Errors raised by category storage.
 *
 * The extractors and the pure matcher never throw; these surface only from
 * repository calls made while materializing a category.
 */

/**
 * Insert rejected because a category with the same name (case-insensitive)
 * already exists. Recovered from by re-reading the existing row.
 */
export class CategoryConflictError extends Error {
    readonly categoryName: string;

    constructor(categoryName: string, options?: ErrorOptions) {
        super(`Category "${categoryName}" already exists`, options);
        this.name = 'CategoryConflictError';
        this.categoryName = categoryName;
    }
}

/**
 * Storage failed in a way the categorizer cannot recover from.
 */
export class StorageError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'StorageError';
    }
}

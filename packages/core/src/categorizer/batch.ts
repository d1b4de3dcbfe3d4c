/**
 * Batch categorization of stored records.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Outcome is returned as stats.
 */

import type { DocumentRecord, TransactionRecord } from '../types/index.js';
import type { Categorizer } from './categorizer.js';
import type { CategorizationStats, ResolvedCategory } from './types.js';

export type CategorizableRecord = DocumentRecord | TransactionRecord;

/**
 * Whether the record still needs a categorization attempt.
 */
export function isUncategorized(record: CategorizableRecord): boolean {
    return record.category_id === null && !record.auto_categorized;
}

/**
 * Categorize every uncategorized record. Mutates records in place.
 *
 * Merchant name is tried first; bank transactions fall back to their
 * description. `categorized_at` is stamped on every attempt, matched or not.
 */
export async function categorizeAll<T extends CategorizableRecord>(
    records: T[],
    categorizer: Categorizer,
    options: { now?: Date } = {}
): Promise<{ records: T[]; stats: CategorizationStats }> {
    const stamp = (options.now ?? new Date()).toISOString();
    const stats: CategorizationStats = {
        total: records.length,
        attempted: 0,
        skipped: 0,
        bySource: { rule: 0, builtin: 0, description: 0, none: 0 },
    };

    for (const item of records) {
        const record: CategorizableRecord = item;
        if (!isUncategorized(record)) {
            stats.skipped++;
            continue;
        }
        stats.attempted++;

        let resolved: ResolvedCategory | null = null;
        if (record.merchant_name) {
            resolved = await categorizer.categorizeWithMatch(record.merchant_name, 'merchant');
        }
        if (!resolved && 'txn_id' in record) {
            resolved = await categorizer.categorizeWithMatch(record.description, 'description');
        }

        record.categorized_at = stamp;
        if (resolved) {
            record.category_id = resolved.ref.id;
            record.auto_categorized = true;
            stats.bySource[resolved.match.source]++;
        } else {
            stats.bySource.none++;
        }
    }

    return { records, stats };
}

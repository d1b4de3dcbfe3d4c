import { Categorizer, categorizeAll } from '@tallyslip/core';
import type { CategorizationStats } from '@tallyslip/core';
import type { PipelineStep } from '../types.js';
import { openCategoryRepository } from '../../store/categories.js';
import { errorMessage } from '../../utils/console.js';

/**
 * Step 5: Categorization
 * Applies keyword rules, then the built-in tables, to every new record.
 * Categories named by a match are created on first use.
 */
export const categorizeRecords: PipelineStep = async (state) => {
    try {
        const repository = await openCategoryRepository(state.workspace, state.options.dryRun);
        const categorizer = new Categorizer(repository);

        const docs = await categorizeAll(state.documents, categorizer, { now: state.now });
        const txns = await categorizeAll(state.transactions, categorizer, { now: state.now });
        state.categorizationStats = mergeStats(docs.stats, txns.stats);
    } catch (err) {
        state.errors.push({
            step: 'categorize',
            message: `Categorization failed: ${errorMessage(err)}`,
            fatal: true,
            error: err,
        });
    }

    return state;
};

export function mergeStats(a: CategorizationStats, b: CategorizationStats): CategorizationStats {
    return {
        total: a.total + b.total,
        attempted: a.attempted + b.attempted,
        skipped: a.skipped + b.skipped,
        bySource: {
            rule: a.bySource.rule + b.bySource.rule,
            builtin: a.bySource.builtin + b.bySource.builtin,
            description: a.bySource.description + b.bySource.description,
            none: a.bySource.none + b.bySource.none,
        },
    };
}

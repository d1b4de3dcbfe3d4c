import { Categorizer, categorizeAll } from '@tallyslip/core';
import { requireWorkspace } from './workspace.js';
import { openCategoryRepository } from '../store/categories.js';
import { loadDocuments, loadTransactions, saveDocuments, saveTransactions } from '../store/records.js';
import { mergeStats } from '../pipeline/steps/categorize.js';
import { log, success, arrow, fail, errorMessage } from '../utils/console.js';
import type { SweepOptions } from '../types.js';

/**
 * Categorize stored records that are still uncategorized, e.g. after new
 * rules were added. Records already categorized are left alone.
 */
export async function sweep(options: SweepOptions, now: Date = new Date()): Promise<void> {
    log('\nTallyslip - Categorizing stored records');
    const workspace = requireWorkspace(options.workspace);

    try {
        const documents = loadDocuments(workspace);
        const transactions = loadTransactions(workspace);
        const categorizer = new Categorizer(await openCategoryRepository(workspace, options.dryRun));

        const docs = await categorizeAll(documents, categorizer, { now });
        const txns = await categorizeAll(transactions, categorizer, { now });
        const stats = mergeStats(docs.stats, txns.stats);

        if (!options.dryRun) {
            await saveDocuments(workspace, documents);
            await saveTransactions(workspace, transactions);
        }

        const matched = stats.bySource.rule + stats.bySource.builtin + stats.bySource.description;
        success(`Sweep complete: ${stats.attempted} of ${stats.total} records attempted.`);
        arrow(`Matched by rule: ${stats.bySource.rule}`);
        arrow(`Matched by built-in table: ${stats.bySource.builtin + stats.bySource.description}`);
        arrow(`Categorized: ${matched}`);
        arrow(`Still uncategorized: ${stats.bySource.none}`);
        if (options.dryRun) {
            log('\n[DRY RUN] No records were saved.');
        }
    } catch (err) {
        fail(`Sweep failed: ${errorMessage(err)}`);
        process.exit(1);
    }
}

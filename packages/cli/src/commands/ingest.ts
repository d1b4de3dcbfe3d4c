import { formatIsoDate, parseIsoDate } from '@tallyslip/core';
import { runPipeline } from '../pipeline/runner.js';
import { requireWorkspace } from './workspace.js';
import { log, success, warn, arrow, fail } from '../utils/console.js';
import type { IngestOptions } from '../types.js';

export async function ingest(options: IngestOptions, now: Date = new Date()): Promise<void> {
    const runDate = options.runDate ?? formatIsoDate(now);
    log(`\nTallyslip - Ingesting imports (run ${runDate})`);

    if (!/^\d{4}-\d{2}-\d{2}$/.test(runDate) || !parseIsoDate(runDate)) {
        fail('Error: Invalid run date. Use YYYY-MM-DD (e.g., 2024-01-31).');
        process.exit(1);
    }

    // 1. Workspace detection
    arrow('Detecting workspace...');
    const workspace = requireWorkspace(options.workspace);
    success(`Workspace: ${workspace.root}`);

    // 2. Run Pipeline
    const state = await runPipeline(runDate, workspace, options, now);

    // 3. Report Final Status
    log('\n--- Ingest Summary ---');

    for (const w of state.warnings) {
        warn(w);
    }

    if (state.errors.length > 0) {
        for (const e of state.errors) {
            console.error(`✖ ERROR [${e.step}]: ${e.message}`);
        }
        if (state.errors.some(e => e.fatal)) {
            log('\n✖ Ingest failed with fatal errors.');
            process.exit(1);
        }
    }

    const { statistics } = state;
    success(`Ingest complete for ${runDate}.`);
    arrow(`Documents: ${state.documents.length} (${statistics.notReceipts} messages were not receipts)`);
    arrow(`Transactions: ${state.transactions.length}`);
    arrow(`Already imported: ${statistics.alreadyStored}`);
    arrow(`Possible duplicates: ${statistics.flaggedDuplicates}`);
    if (state.categorizationStats) {
        arrow(`Uncategorized: ${state.categorizationStats.bySource.none}`);
    }

    if (!options.dryRun) {
        arrow(`Outputs saved to: ${workspace.outputs}/${runDate}`);
    } else {
        log('\n[DRY RUN] No files were written or archived.');
    }
}

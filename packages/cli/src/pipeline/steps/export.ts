import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { RunManifest } from '@tallyslip/shared';
import type { PipelineStep } from '../types.js';
import { getOutputsPath } from '../../workspace/paths.js';
import { FileCategoryRepository } from '../../store/categories.js';
import { buildReportRows } from '../../excel/rows.js';
import { generateReviewExcel } from '../../excel/review.js';
import { generateAnalysisExcel } from '../../excel/analysis.js';
import { errorMessage } from '../../utils/console.js';

export const MANIFEST_VERSION = '1.0.0';

/**
 * Step 8: Export
 * Writes review.xlsx and analysis.xlsx for this run's records, and the run manifest.
 */
export const exportResults: PipelineStep = async (state) => {
    if (state.options.dryRun) {
        state.warnings.push('Dry run: Skipping file export.');
        return state;
    }

    const outputPath = getOutputsPath(state.workspace, state.runDate);

    try {
        await mkdir(outputPath, { recursive: true });

        const categories = await new FileCategoryRepository(state.workspace).list();
        const rows = buildReportRows(state.documents, state.transactions, categories);

        const reviewWb = await generateReviewExcel(rows);
        await reviewWb.xlsx.writeFile(join(outputPath, 'review.xlsx'));

        const analysisWb = await generateAnalysisExcel(rows);
        await analysisWb.xlsx.writeFile(join(outputPath, 'analysis.xlsx'));

        const manifest: RunManifest = {
            run_date: state.runDate,
            run_timestamp: state.now.toISOString(),
            input_files: Object.fromEntries(state.files.filter(f => f.kind).map(f => [f.filename, f.hash])),
            document_count: state.documents.length,
            transaction_count: state.transactions.length,
            doc_ids: state.documents.map(d => d.doc_id),
            txn_ids: state.transactions.map(t => t.txn_id),
            version: MANIFEST_VERSION,
        };

        await writeFile(
            join(outputPath, 'run_manifest.json'),
            JSON.stringify(manifest, null, 2)
        );
    } catch (err) {
        state.errors.push({
            step: 'export',
            message: `Failed to export results to ${outputPath}: ${errorMessage(err)}`,
            fatal: true,
            error: err,
        });
    }

    return state;
};

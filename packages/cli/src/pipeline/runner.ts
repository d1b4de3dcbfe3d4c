import type { PipelineState, PipelineStep } from './types.js';
import { manifestCheck } from './steps/manifest-check.js';
import { detectFiles } from './steps/detect.js';
import { extractFiles } from './steps/extract.js';
import { deduplicateRecords } from './steps/dedup.js';
import { categorizeRecords } from './steps/categorize.js';
import { flagDuplicates } from './steps/duplicates.js';
import { persistRecords } from './steps/persist.js';
import { exportResults } from './steps/export.js';
import { archiveRawFiles } from './steps/archive.js';
import type { Workspace, IngestOptions } from '../types.js';
import { arrow, fail } from '../utils/console.js';

/**
 * Orchestrates the execution of the ingest pipeline.
 * Runs each step sequentially, stopping if a fatal error occurs.
 */
export async function runPipeline(
    runDate: string,
    workspace: Workspace,
    options: IngestOptions,
    now: Date = new Date()
): Promise<PipelineState> {
    let state: PipelineState = {
        runDate,
        workspace,
        options,
        now,
        files: [],
        documents: [],
        transactions: [],
        storedDocuments: [],
        storedTransactions: [],
        warnings: [],
        errors: [],
        statistics: {
            extractedDocuments: 0,
            notReceipts: 0,
            parsedTransactions: 0,
            alreadyStored: 0,
            flaggedDuplicates: 0,
        },
    };

    const steps: { name: string; fn: PipelineStep }[] = [
        { name: 'Manifest Check', fn: manifestCheck },
        { name: 'File Detection', fn: detectFiles },
        { name: 'Extraction', fn: extractFiles },
        { name: 'Deduplication', fn: deduplicateRecords },
        { name: 'Categorization', fn: categorizeRecords },
        { name: 'Duplicate Flagging', fn: flagDuplicates },
        { name: 'Persist Records', fn: persistRecords },
        { name: 'Export Results', fn: exportResults },
        { name: 'Archiving', fn: archiveRawFiles },
    ];

    for (const [i, step] of steps.entries()) {
        arrow(`Step ${i + 1}/${steps.length}: ${step.name}...`);

        state = await step.fn(state);

        if (state.errors.some(e => e.fatal)) {
            fail(`Fatal error in step "${step.name}". Stopping.`);
            break;
        }
    }

    return state;
}

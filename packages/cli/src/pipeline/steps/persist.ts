import type { PipelineStep } from '../types.js';
import { saveDocuments, saveTransactions } from '../../store/records.js';
import { errorMessage } from '../../utils/console.js';

/**
 * Step 7: Persist Records
 * Appends the new records to the workspace data files.
 */
export const persistRecords: PipelineStep = async (state) => {
    if (state.options.dryRun) {
        state.warnings.push('Dry run: Skipping record storage.');
        return state;
    }

    try {
        if (state.documents.length > 0) {
            await saveDocuments(state.workspace, [...state.storedDocuments, ...state.documents]);
        }
        if (state.transactions.length > 0) {
            await saveTransactions(state.workspace, [...state.storedTransactions, ...state.transactions]);
        }
    } catch (err) {
        state.errors.push({
            step: 'persist',
            message: `Failed to save records: ${errorMessage(err)}`,
            fatal: true,
            error: err,
        });
    }

    return state;
};

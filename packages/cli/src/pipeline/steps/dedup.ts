import type { PipelineStep } from '../types.js';
import { loadDocuments, loadTransactions } from '../../store/records.js';
import { errorMessage } from '../../utils/console.js';

/**
 * Step 4: Deduplication
 * Loads the stored records, then drops new records whose id is already
 * stored (re-imported file) or was seen earlier in this run (overlapping
 * exports). Same-day identical bank rows inside one file were already
 * suffixed (-02, -03) by the parser, so they survive.
 */
export const deduplicateRecords: PipelineStep = async (state) => {
    try {
        state.storedDocuments = loadDocuments(state.workspace);
        state.storedTransactions = loadTransactions(state.workspace);
    } catch (err) {
        state.errors.push({
            step: 'dedup',
            message: `Failed to load stored records: ${errorMessage(err)}`,
            fatal: true,
            error: err,
        });
        return state;
    }

    const seenDocs = new Set(state.storedDocuments.map(d => d.doc_id));
    const seenTxns = new Set(state.storedTransactions.map(t => t.txn_id));
    let removed = 0;

    state.documents = state.documents.filter(doc => {
        if (seenDocs.has(doc.doc_id)) {
            removed++;
            return false;
        }
        seenDocs.add(doc.doc_id);
        return true;
    });

    state.transactions = state.transactions.filter(txn => {
        if (seenTxns.has(txn.txn_id)) {
            removed++;
            return false;
        }
        seenTxns.add(txn.txn_id);
        return true;
    });

    state.statistics.alreadyStored = removed;
    if (removed > 0) {
        state.warnings.push(`${removed} records already imported, skipped.`);
    }

    return state;
};

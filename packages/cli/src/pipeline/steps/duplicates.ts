import {
    findDuplicates,
    DOCUMENT_DUPLICATE_ACCESSORS,
    TRANSACTION_DUPLICATE_ACCESSORS,
} from '@tallyslip/core';
import type { DuplicateMark } from '@tallyslip/core';
import type { PipelineStep } from '../types.js';

/**
 * Step 6: Duplicate Flagging
 * Compares new records against stored ones and each other. New records that
 * look like an earlier record (same merchant/amount within a day) are kept
 * but flagged for review. Stored records are never re-flagged, and stored
 * duplicates are not candidates.
 */
export const flagDuplicates: PipelineStep = async (state) => {
    const docMarks = findDuplicates(
        [...state.storedDocuments.filter(d => !d.is_duplicate), ...state.documents],
        DOCUMENT_DUPLICATE_ACCESSORS
    );
    const txnMarks = findDuplicates(
        [...state.storedTransactions.filter(t => !t.is_duplicate), ...state.transactions],
        TRANSACTION_DUPLICATE_ACCESSORS
    );

    let flagged = 0;
    const docIndex = indexMarks(docMarks);
    for (const doc of state.documents) {
        const original = docIndex.get(doc.doc_id);
        if (original) {
            doc.is_duplicate = true;
            doc.duplicate_of = original;
            flagged++;
        }
    }

    const txnIndex = indexMarks(txnMarks);
    for (const txn of state.transactions) {
        const original = txnIndex.get(txn.txn_id);
        if (original) {
            txn.is_duplicate = true;
            txn.duplicate_of = original;
            flagged++;
        }
    }

    state.statistics.flaggedDuplicates = flagged;
    if (flagged > 0) {
        state.warnings.push(`${flagged} records flagged as possible duplicates.`);
    }

    return state;
};

function indexMarks(marks: DuplicateMark[]): Map<string, string> {
    return new Map(marks.map(m => [m.id, m.duplicate_of]));
}

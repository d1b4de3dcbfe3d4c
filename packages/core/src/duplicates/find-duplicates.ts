/**
 * Likely-duplicate detection across stored records.
 *
 * Two records are duplicates when they share a key, have the same amount and
 * fall within DUPLICATE_WINDOW_DAYS of each other. The earliest record of a
 * group stays canonical; every later one points at it.
 *
 * ARCHITECTURAL NOTE: Returns descriptors, does not mutate.
 */

import { Decimal } from 'decimal.js';
import { DUPLICATE_WINDOW_DAYS } from '../types/index.js';
import type { DocumentRecord, TransactionRecord } from '../types/index.js';
import { normalizeForMatch } from '../utils/normalize.js';
import { isWithinDateTolerance, utcDay } from './date-diff.js';

/**
 * How to read the comparison fields of an item.
 * An item with a null key, amount or date is never a duplicate nor canonical.
 */
export interface DuplicateAccessors<T> {
    id(item: T): string;
    key(item: T): string | null;
    amount(item: T): string | null;
    date(item: T): string | null;
}

export interface DuplicateMark {
    id: string;
    duplicate_of: string;
}

interface Candidate {
    id: string;
    group: string;
    date: string;
    day: number;
    index: number;
}

export function findDuplicates<T>(
    items: readonly T[],
    accessors: DuplicateAccessors<T>,
    windowDays: number = DUPLICATE_WINDOW_DAYS
): DuplicateMark[] {
    const candidates: Candidate[] = [];

    items.forEach((item, index) => {
        const key = accessors.key(item);
        const amount = amountKey(accessors.amount(item));
        const date = accessors.date(item);
        if (key === null || amount === null || date === null) return;

        const day = utcDay(date);
        if (day === null) return;

        candidates.push({ id: accessors.id(item), group: `${key}|${amount}`, date, day, index });
    });

    // Earlier date first; input order breaks ties.
    candidates.sort((a, b) => a.day - b.day || a.index - b.index);

    const canonical = new Map<string, Candidate[]>();
    const marks: DuplicateMark[] = [];

    for (const candidate of candidates) {
        const group = canonical.get(candidate.group) ?? [];
        const original = group.find((c) => isWithinDateTolerance(c.date, candidate.date, windowDays));

        if (original) {
            marks.push({ id: candidate.id, duplicate_of: original.id });
        } else {
            group.push(candidate);
            canonical.set(candidate.group, group);
        }
    }

    return marks;
}

function amountKey(amount: string | null): string | null {
    if (amount === null) return null;
    try {
        return new Decimal(amount).toFixed();
    } catch {
        return null;
    }
}

/**
 * Documents: same merchant (case-insensitive), amount and date window.
 */
export const DOCUMENT_DUPLICATE_ACCESSORS: DuplicateAccessors<DocumentRecord> = {
    id: (doc) => doc.doc_id,
    key: (doc) => (doc.merchant_name ? normalizeForMatch(doc.merchant_name) : null),
    amount: (doc) => doc.amount ?? null,
    date: (doc) => doc.transaction_date ?? null,
};

/**
 * Transactions: same amount and date window; description is not compared.
 */
export const TRANSACTION_DUPLICATE_ACCESSORS: DuplicateAccessors<TransactionRecord> = {
    id: (txn) => txn.txn_id,
    key: () => '',
    amount: (txn) => txn.amount,
    date: (txn) => txn.txn_date,
};

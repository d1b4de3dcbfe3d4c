import { describe, it, expect } from 'vitest';
import {
    findDuplicates,
    DOCUMENT_DUPLICATE_ACCESSORS,
    TRANSACTION_DUPLICATE_ACCESSORS,
} from '../../src/duplicates/find-duplicates.js';
import type { DocumentRecord, TransactionRecord } from '../../src/types/index.js';

function doc(id: string, merchant: string | undefined, amount: string | undefined, date: string | undefined): DocumentRecord {
    return {
        doc_id: id,
        source: 'receipt_ocr',
        source_file: `receipt_${id}.txt`,
        ingested_at: '2024-02-01T00:00:00.000Z',
        raw_text: '',
        merchant_name: merchant,
        amount,
        transaction_date: date,
        line_items: [],
        category_id: null,
        auto_categorized: false,
        categorized_at: null,
        is_duplicate: false,
        duplicate_of: null,
    };
}

function txn(id: string, description: string, amount: string, date: string): TransactionRecord {
    return {
        txn_id: id,
        txn_date: date,
        description,
        amount,
        source_file: 'transactions_checking.csv',
        category_id: null,
        auto_categorized: false,
        categorized_at: null,
        is_duplicate: false,
        duplicate_of: null,
    };
}

describe('findDuplicates (documents)', () => {
    it('marks same merchant, amount and date within a day', () => {
        const docs = [
            doc('a', 'Shell Gas', '40.00', '2024-01-15T00:00:00.000Z'),
            doc('b', 'SHELL GAS', '40.00', '2024-01-16T00:00:00.000Z'),
            doc('c', 'Shell Gas', '40.00', '2024-01-20T00:00:00.000Z'),
            doc('d', 'Cafe Luna', '40.00', '2024-01-15T00:00:00.000Z'),
            doc('e', 'Shell Gas', undefined, '2024-01-15T00:00:00.000Z'),
        ];

        expect(findDuplicates(docs, DOCUMENT_DUPLICATE_ACCESSORS)).toEqual([{ id: 'b', duplicate_of: 'a' }]);
    });

    it('keeps the earliest record canonical regardless of input order', () => {
        const docs = [
            doc('late', 'Shell Gas', '40.00', '2024-01-16T00:00:00.000Z'),
            doc('early', 'Shell Gas', '40.00', '2024-01-15T00:00:00.000Z'),
        ];

        expect(findDuplicates(docs, DOCUMENT_DUPLICATE_ACCESSORS)).toEqual([{ id: 'late', duplicate_of: 'early' }]);
    });

    it('only links to non-duplicate records', () => {
        const docs = [
            doc('a', 'Shell Gas', '40.00', '2024-01-15T00:00:00.000Z'),
            doc('b', 'Shell Gas', '40.00', '2024-01-16T00:00:00.000Z'),
            doc('c', 'Shell Gas', '40.00', '2024-01-17T00:00:00.000Z'),
        ];

        expect(findDuplicates(docs, DOCUMENT_DUPLICATE_ACCESSORS)).toEqual([{ id: 'b', duplicate_of: 'a' }]);
    });

    it('ignores records without merchant or date', () => {
        const docs = [
            doc('a', undefined, '40.00', '2024-01-15T00:00:00.000Z'),
            doc('b', undefined, '40.00', '2024-01-15T00:00:00.000Z'),
            doc('c', 'Shell', '40.00', undefined),
            doc('d', 'Shell', '40.00', undefined),
        ];

        expect(findDuplicates(docs, DOCUMENT_DUPLICATE_ACCESSORS)).toEqual([]);
    });
});

describe('findDuplicates (transactions)', () => {
    it('compares amount and date only', () => {
        const txns = [
            txn('t1', 'STARBUCKS 123', '-4.50', '2024-01-15'),
            txn('t2', 'SQ COFFEE', '-4.5', '2024-01-16'),
            txn('t3', 'STARBUCKS 123', '-4.75', '2024-01-15'),
        ];

        expect(findDuplicates(txns, TRANSACTION_DUPLICATE_ACCESSORS)).toEqual([{ id: 't2', duplicate_of: 't1' }]);
    });

    it('respects a custom window', () => {
        const txns = [txn('t1', 'A', '-1.00', '2024-01-15'), txn('t2', 'B', '-1.00', '2024-01-18')];

        expect(findDuplicates(txns, TRANSACTION_DUPLICATE_ACCESSORS)).toEqual([]);
        expect(findDuplicates(txns, TRANSACTION_DUPLICATE_ACCESSORS, 3)).toEqual([{ id: 't2', duplicate_of: 't1' }]);
    });
});

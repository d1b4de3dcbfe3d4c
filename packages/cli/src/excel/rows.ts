/**
 * Flattening of stored records into report rows.
 *
 * Amounts follow the bank convention: negative = money out. Receipt amounts
 * are always spend, so they are negated.
 */

import { Decimal } from 'decimal.js';
import type { Category, DocumentRecord, TransactionRecord } from '@tallyslip/shared';

export interface ReportRow {
    record_id: string;
    /** Document source, or 'bank' for imported transactions. */
    source: string;
    /** YYYY-MM-DD, or '' when the record has no date. */
    date: string;
    merchant: string;
    description: string;
    amount: Decimal | null;
    category_id: number | null;
    category_name: string;
    is_duplicate: boolean;
    duplicate_of: string | null;
}

export function documentRow(doc: DocumentRecord, categories: Map<number, Category>): ReportRow {
    return {
        record_id: doc.doc_id,
        source: doc.source,
        date: doc.transaction_date ? doc.transaction_date.slice(0, 10) : '',
        merchant: doc.merchant_name ?? '',
        description: firstLine(doc.raw_text),
        amount: doc.amount ? new Decimal(doc.amount).negated() : null,
        category_id: doc.category_id,
        category_name: categoryName(doc.category_id, categories),
        is_duplicate: doc.is_duplicate,
        duplicate_of: doc.duplicate_of,
    };
}

export function transactionRow(txn: TransactionRecord, categories: Map<number, Category>): ReportRow {
    return {
        record_id: txn.txn_id,
        source: 'bank',
        date: txn.txn_date,
        merchant: txn.merchant_name ?? '',
        description: txn.description,
        amount: new Decimal(txn.amount),
        category_id: txn.category_id,
        category_name: categoryName(txn.category_id, categories),
        is_duplicate: txn.is_duplicate,
        duplicate_of: txn.duplicate_of,
    };
}

/**
 * Rows for every record, documents first.
 */
export function buildReportRows(
    documents: DocumentRecord[],
    transactions: TransactionRecord[],
    categories: Category[]
): ReportRow[] {
    const byId = new Map(categories.map(c => [c.id, c]));
    return [
        ...documents.map(d => documentRow(d, byId)),
        ...transactions.map(t => transactionRow(t, byId)),
    ];
}

export function categoryName(categoryId: number | null, categories: Map<number, Category>): string {
    if (categoryId === null) return 'Uncategorized';
    const cat = categories.get(categoryId);
    return cat ? cat.name : `Category ${categoryId}`;
}

function firstLine(text: string): string {
    return text.trim().split(/\r?\n/)[0].trim();
}

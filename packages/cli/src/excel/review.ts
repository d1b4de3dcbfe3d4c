import type { Workbook } from 'exceljs';
import { createWorkbook, addReportSheet, finishReportSheet } from './utils.js';
import type { ReportColumn } from './utils.js';
import type { ReportRow } from './rows.js';

const REVIEW_COLUMNS: readonly ReportColumn[] = [
    { key: 'record_id' },
    { key: 'source' },
    { key: 'date' },
    { key: 'merchant' },
    { key: 'description' },
    { key: 'amount', money: true },
    { key: 'category' },
    { key: 'review_reason' },
    { key: 'duplicate_of' },
    { key: 'your_category' },
];

/**
 * Generates the review workbook: records with no category and records
 * flagged as possible duplicates. Uncategorized first, then by date.
 */
export async function generateReviewExcel(rows: ReportRow[]): Promise<Workbook> {
    const workbook = createWorkbook();
    // ID and source stay in view.
    const sheet = addReportSheet(workbook, 'Review', REVIEW_COLUMNS, 2);

    const reviewRows = rows
        .filter(r => r.category_id === null || r.is_duplicate)
        .sort((a, b) => rank(a) - rank(b) || a.date.localeCompare(b.date));

    for (const row of reviewRows) {
        sheet.addRow({
            record_id: row.record_id,
            source: row.source,
            date: row.date,
            merchant: row.merchant,
            description: row.description,
            amount: row.amount ? row.amount.toNumber() : null,
            category: row.category_name,
            review_reason: reviewReasons(row).join('; '),
            duplicate_of: row.duplicate_of ?? '',
            your_category: '',
        });
    }

    finishReportSheet(sheet, REVIEW_COLUMNS);

    return workbook;
}

export function reviewReasons(row: ReportRow): string[] {
    const reasons: string[] = [];
    if (row.category_id === null) reasons.push('No matching category');
    if (row.is_duplicate) reasons.push('Possible duplicate');
    if (row.amount === null) reasons.push('No amount found');
    return reasons;
}

function rank(row: ReportRow): number {
    return row.category_id === null ? 0 : 1;
}

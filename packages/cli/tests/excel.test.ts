import { describe, it, expect } from 'vitest';
import { Decimal } from 'decimal.js';
import type { Workbook, Worksheet, CellValue } from 'exceljs';
import { buildDocumentRecord } from '@tallyslip/core';
import type { Category, TransactionRecord } from '@tallyslip/core';
import { generateAnalysisExcel } from '../src/excel/analysis.js';
import { generateReviewExcel } from '../src/excel/review.js';
import { buildReportRows } from '../src/excel/rows.js';
import { MONEY_FORMAT } from '../src/excel/utils.js';
import type { ReportRow } from '../src/excel/rows.js';

function sheetOf(wb: Workbook, name: string): Worksheet {
    const sheet = wb.getWorksheet(name);
    if (!sheet) throw new Error(`missing sheet ${name}`);
    return sheet;
}

function rowValues(sheet: Worksheet, rowNumber: number): CellValue[] {
    const row = sheet.getRow(rowNumber);
    return Array.from({ length: sheet.columnCount }, (_, i) => row.getCell(i + 1).value);
}

function row(overrides: Partial<ReportRow> & Pick<ReportRow, 'record_id'>): ReportRow {
    return {
        source: 'bank',
        date: '2024-01-15',
        merchant: '',
        description: '',
        amount: null,
        category_id: null,
        category_name: 'Uncategorized',
        is_duplicate: false,
        duplicate_of: null,
        ...overrides,
    };
}

describe('Excel Generation', () => {
    const rows: ReportRow[] = [
        row({
            record_id: 'a',
            source: 'receipt_ocr',
            merchant: 'Corner Bistro',
            amount: new Decimal('-12.50'),
            category_id: 1,
            category_name: 'Food & Dining',
        }),
        row({ record_id: 'b', date: '2024-01-16', description: 'ATM WITHDRAWAL', amount: new Decimal('-60') }),
        row({ record_id: 'c', description: 'PAYROLL', amount: new Decimal('2500'), category_id: 8, category_name: 'Income' }),
        row({
            record_id: 'd',
            source: 'receipt_ocr',
            date: '2024-01-16',
            merchant: 'Corner Bistro',
            amount: new Decimal('-12.50'),
            category_id: 1,
            category_name: 'Food & Dining',
            is_duplicate: true,
            duplicate_of: 'a',
        }),
    ];

    it('should generate review workbook with uncategorized and duplicate records', async () => {
        const wb = await generateReviewExcel(rows);
        const sheet = sheetOf(wb, 'Review');

        expect(rowValues(sheet, 1)).toEqual([
            'record_id',
            'source',
            'date',
            'merchant',
            'description',
            'amount',
            'category',
            'review_reason',
            'duplicate_of',
            'your_category',
        ]);
        expect(sheet.actualRowCount).toBe(3);

        expect(rowValues(sheet, 2)).toEqual([
            'b', 'bank', '2024-01-16', '', 'ATM WITHDRAWAL', -60, 'Uncategorized', 'No matching category', '', '',
        ]);
        expect(rowValues(sheet, 3)).toEqual([
            'd', 'receipt_ocr', '2024-01-16', 'Corner Bistro', '', -12.5, 'Food & Dining', 'Possible duplicate', 'a', '',
        ]);
    });

    it('should lay out the review sheet for editing', async () => {
        const sheet = sheetOf(await generateReviewExcel(rows), 'Review');

        expect(sheet.views[0]).toMatchObject({ state: 'frozen', xSplit: 2, ySplit: 1 });
        expect(sheet.getRow(1).font).toMatchObject({ bold: true });
        expect(sheet.getColumn('amount').numFmt).toBe(MONEY_FORMAT);
        // Widest value plus padding, never under the minimum.
        expect(sheet.getColumn('description').width).toBe(16);
        expect(sheet.getColumn('amount').width).toBe(10);
    });

    it('should generate analysis workbook with 3 sheets', async () => {
        const wb = await generateAnalysisExcel(rows);
        expect(wb.worksheets.map(s => s.name)).toEqual(['By Category', 'By Merchant', 'Summary']);
    });

    it('should total by category without duplicates', async () => {
        const sheet = sheetOf(await generateAnalysisExcel(rows), 'By Category');

        expect(rowValues(sheet, 2)).toEqual([1, 'Food & Dining', -12.5, 1]);
        expect(rowValues(sheet, 3)).toEqual(['N/A', 'Uncategorized', -60, 1]);
        expect(rowValues(sheet, 4)).toEqual([8, 'Income', 2500, 1]);
        expect(sheet.actualRowCount).toBe(4);
    });

    it('should rank merchants by money out', async () => {
        const sheet = sheetOf(await generateAnalysisExcel(rows), 'By Merchant');

        expect(rowValues(sheet, 2)).toEqual(['ATM WITHDRAWAL', 60, 1]);
        expect(rowValues(sheet, 3)).toEqual(['Corner Bistro', 12.5, 1]);
        expect(sheet.actualRowCount).toBe(3);
    });

    it('should summarize income, expenses and review counts', async () => {
        const sheet = sheetOf(await generateAnalysisExcel(rows), 'Summary');

        expect(rowValues(sheet, 2)).toEqual(['Total income', 2500]);
        expect(rowValues(sheet, 3)).toEqual(['Total expenses', 72.5]);
        expect(rowValues(sheet, 4)).toEqual(['Net', 2427.5]);
        expect(rowValues(sheet, 5)).toEqual(['Uncategorized count', 1]);
        expect(rowValues(sheet, 6)).toEqual(['Duplicate count', 1]);
    });
});

describe('buildReportRows', () => {
    const categories: Category[] = [
        { id: 1, name: 'Food & Dining', is_system: true, is_active: true, is_income: false },
    ];

    it('flattens documents and transactions', () => {
        const doc = buildDocumentRecord(
            { text: 'CORNER BISTRO\n123 Main St\nTotal $12.50', source: 'receipt_ocr' },
            {
                merchant_name: 'CORNER BISTRO',
                amount: '12.50',
                transaction_date: '2024-01-15T00:00:00.000Z',
                line_items: [],
            },
            { sourceFile: 'receipt_0001.txt', ingestedAt: new Date('2024-01-16T00:00:00.000Z') }
        );
        doc.category_id = 1;

        const txn: TransactionRecord = {
            txn_id: '0123456789abcdef',
            txn_date: '2024-01-16',
            description: 'ATM WITHDRAWAL',
            amount: '-60.00',
            source_file: 'transactions_checking.csv',
            category_id: 99,
            auto_categorized: true,
            categorized_at: null,
            is_duplicate: false,
            duplicate_of: null,
        };

        const [docRow, txnRow] = buildReportRows([doc], [txn], categories);

        expect(docRow).toMatchObject({
            record_id: doc.doc_id,
            source: 'receipt_ocr',
            date: '2024-01-15',
            merchant: 'CORNER BISTRO',
            description: 'CORNER BISTRO',
            category_name: 'Food & Dining',
        });
        expect(docRow.amount?.toFixed(2)).toBe('-12.50');

        expect(txnRow).toMatchObject({ source: 'bank', date: '2024-01-16', category_name: 'Category 99' });
        expect(txnRow.amount?.toFixed(2)).toBe('-60.00');
    });
});

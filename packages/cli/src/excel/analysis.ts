import type { Workbook } from 'exceljs';
import { Decimal } from 'decimal.js';
import { createWorkbook, addReportSheet, finishReportSheet } from './utils.js';
import type { ReportColumn } from './utils.js';
import type { ReportRow } from './rows.js';

const CATEGORY_COLUMNS: readonly ReportColumn[] = [
    { key: 'category_id' },
    { key: 'category_name' },
    { key: 'total_amount', money: true },
    { key: 'record_count' },
];

const MERCHANT_COLUMNS: readonly ReportColumn[] = [
    { key: 'merchant' },
    { key: 'total_spent', money: true },
    { key: 'record_count' },
];

const SUMMARY_COLUMNS: readonly ReportColumn[] = [
    { key: 'metric', header: 'Metric' },
    { key: 'value', header: 'Value', money: true },
];

/**
 * Generates the analysis workbook with summary sheets.
 * Possible duplicates are left out of every total.
 */
export async function generateAnalysisExcel(rows: ReportRow[]): Promise<Workbook> {
    const workbook = createWorkbook();
    const counted = rows.filter(r => !r.is_duplicate);

    addCategorySheet(workbook, counted);
    addMerchantSheet(workbook, counted);
    addSummarySheet(workbook, rows);

    return workbook;
}

/**
 * Sheet: By Category
 * Columns: category_id, category_name, total_amount, record_count
 */
function addCategorySheet(workbook: Workbook, rows: ReportRow[]): void {
    const sheet = addReportSheet(workbook, 'By Category', CATEGORY_COLUMNS);

    const categoryStats = new Map<number | null, { name: string; count: number; total: Decimal }>();

    for (const row of rows) {
        const stats = categoryStats.get(row.category_id) ?? { name: row.category_name, count: 0, total: new Decimal(0) };
        stats.count++;
        if (row.amount) stats.total = stats.total.plus(row.amount);
        categoryStats.set(row.category_id, stats);
    }

    for (const [id, stats] of categoryStats) {
        sheet.addRow({
            category_id: id ?? 'N/A',
            category_name: stats.name,
            total_amount: stats.total.toNumber(),
            record_count: stats.count,
        });
    }

    finishReportSheet(sheet, CATEGORY_COLUMNS);
}

/**
 * Sheet: By Merchant
 * Columns: merchant, total_spent, record_count. Only money out, largest first.
 */
function addMerchantSheet(workbook: Workbook, rows: ReportRow[]): void {
    const sheet = addReportSheet(workbook, 'By Merchant', MERCHANT_COLUMNS);

    const merchants = new Map<string, { name: string; count: number; total: Decimal }>();

    for (const row of rows) {
        const name = row.merchant || row.description;
        if (!name || !row.amount || !row.amount.isNegative()) continue;

        const key = name.toLowerCase();
        const stats = merchants.get(key) ?? { name, count: 0, total: new Decimal(0) };
        stats.count++;
        stats.total = stats.total.plus(row.amount.abs());
        merchants.set(key, stats);
    }

    const sorted = [...merchants.values()].sort((a, b) => b.total.comparedTo(a.total));
    for (const stats of sorted) {
        sheet.addRow({
            merchant: stats.name,
            total_spent: stats.total.toNumber(),
            record_count: stats.count,
        });
    }

    finishReportSheet(sheet, MERCHANT_COLUMNS);
}

/**
 * Sheet: Summary
 * Rows: Total income, Total expenses, Net, Uncategorized count, Duplicate count
 */
function addSummarySheet(workbook: Workbook, rows: ReportRow[]): void {
    const sheet = addReportSheet(workbook, 'Summary', SUMMARY_COLUMNS);

    let totalIn = new Decimal(0);
    let totalOut = new Decimal(0);
    let uncategorized = 0;
    let duplicates = 0;

    for (const row of rows) {
        if (row.is_duplicate) {
            duplicates++;
            continue;
        }
        if (row.category_id === null) uncategorized++;
        if (!row.amount) continue;

        if (row.amount.isPositive()) {
            totalIn = totalIn.plus(row.amount);
        } else {
            totalOut = totalOut.plus(row.amount.abs());
        }
    }

    sheet.addRow({ metric: 'Total income', value: totalIn.toNumber() });
    sheet.addRow({ metric: 'Total expenses', value: totalOut.toNumber() });
    sheet.addRow({ metric: 'Net', value: totalIn.minus(totalOut).toNumber() });
    sheet.addRow({ metric: 'Uncategorized count', value: uncategorized });
    sheet.addRow({ metric: 'Duplicate count', value: duplicates });

    finishReportSheet(sheet, SUMMARY_COLUMNS);
}

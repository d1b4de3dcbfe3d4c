/**
 * Sheet layout shared by the review and analysis reports.
 *
 * Every report sheet has one header row naming its columns, then one row per
 * record or group. Money columns show two decimals with money out in red.
 */

import exceljs from 'exceljs';
import type { CellValue, Workbook, Worksheet } from 'exceljs';

export const MONEY_FORMAT = '#,##0.00;[Red]-#,##0.00';

const HEADER_FONT_COLOR = 'FFFFFFFF';
const HEADER_FILL_COLOR = 'FF2E6B5E';
const MIN_COLUMN_WIDTH = 10;
const MAX_COLUMN_WIDTH = 60;

export interface ReportColumn {
    key: string;
    /** Header text; defaults to the key, which is what review readers fill in against. */
    header?: string;
    money?: boolean;
}

export function createWorkbook(now: Date = new Date()): Workbook {
    const workbook = new exceljs.Workbook();
    workbook.creator = 'Tallyslip';
    workbook.created = now;
    return workbook;
}

/**
 * Add a sheet with its header row. The header row (and `frozenColumns`
 * leading columns) stay in view while scrolling.
 */
export function addReportSheet(
    workbook: Workbook,
    name: string,
    columns: readonly ReportColumn[],
    frozenColumns = 0
): Worksheet {
    const sheet = workbook.addWorksheet(name, {
        views: [{ state: 'frozen', xSplit: frozenColumns, ySplit: 1 }],
    });
    sheet.columns = columns.map((c) => ({ header: c.header ?? c.key, key: c.key }));
    return sheet;
}

/**
 * Style the header, format money columns and size every column to its
 * widest value. Call once all rows are in.
 */
export function finishReportSheet(sheet: Worksheet, columns: readonly ReportColumn[]): void {
    const header = sheet.getRow(1);
    header.font = { bold: true, color: { argb: HEADER_FONT_COLOR } };
    header.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: HEADER_FILL_COLOR } };
    header.alignment = { vertical: 'middle', horizontal: 'center' };

    for (const spec of columns) {
        const column = sheet.getColumn(spec.key);
        if (spec.money) {
            column.numFmt = MONEY_FORMAT;
            column.alignment = { horizontal: 'right' };
        }

        let width = MIN_COLUMN_WIDTH;
        column.eachCell({ includeEmpty: false }, (cell) => {
            width = Math.max(width, displayText(cell.value, spec.money ?? false).length + 2);
        });
        column.width = Math.min(width, MAX_COLUMN_WIDTH);
    }
}

function displayText(value: CellValue, money: boolean): string {
    if (value === null || value === undefined) return '';
    if (money && typeof value === 'number') {
        return value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });
    }
    return value.toString();
}

/**
 * Bank transaction export parser (CSV or XLSX).
 *
 * Format:
 * - First sheet, header row first
 * - Required columns: Date, Description, Amount (case-insensitive)
 * - Optional column: Merchant
 * - Amount convention: negative = money out, positive = money in
 */

import * as XLSX from 'xlsx';
import { Decimal } from 'decimal.js';
import type { TransactionRecord, TransactionParseResult } from '../types/index.js';
import { TransactionRecordSchema } from '../types/index.js';
import { generateTxnId, resolveCollisions } from '../utils/record-id.js';
import { normalizeDescription } from '../utils/normalize.js';
import { parseDateValue, formatIsoDate } from '../utils/date-parse.js';
import { parseSignedAmount } from '../utils/money.js';
import { normalizeRowKeys, cellText } from '../utils/csv.js';

const REQUIRED_COLUMNS = ['date', 'description', 'amount'];

/**
 * Parse a bank transaction export.
 *
 * @param data - File contents as ArrayBuffer
 * @param sourceFile - Original filename for traceability
 * @returns Transactions (collision suffixes applied), warnings, and skip count
 * @throws Error when a required column is missing
 */
export function parseTransactionsFile(data: ArrayBuffer, sourceFile: string): TransactionParseResult {
    const workbook = XLSX.read(data, { type: 'array' });
    const firstSheet = workbook.SheetNames[0];
    const sheet = firstSheet === undefined ? undefined : workbook.Sheets[firstSheet];
    if (!sheet) {
        return { transactions: [], warnings: [`${sourceFile}: no sheets found`], skippedRows: 0 };
    }

    const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet).map(normalizeRowKeys);

    const warnings: string[] = [];
    const transactions: TransactionRecord[] = [];
    let skippedDates = 0;
    let skippedAmounts = 0;
    let skippedSchema = 0;

    if (rows.length === 0) {
        return { transactions, warnings, skippedRows: 0 };
    }

    const firstRow = rows[0];
    const missingColumns = REQUIRED_COLUMNS.filter((col) => !(col in firstRow));
    if (missingColumns.length > 0) {
        throw new Error(
            `${sourceFile}: Missing required columns: ${missingColumns.join(', ')}. ` +
            `Found: ${Object.keys(firstRow).join(', ')}`
        );
    }

    for (const row of rows) {
        const txnDate = parseDateValue(row['date']);
        if (!txnDate) {
            skippedDates++;
            continue;
        }

        const rawAmount = row['amount'];
        const amount = parseSignedAmount(rawAmount);
        if (!amount) {
            warnings.push(`Invalid amount "${cellText(rawAmount)}" in row, skipping`);
            skippedAmounts++;
            continue;
        }

        const rawDesc = cellText(row['description']);
        const merchant = cellText(row['merchant']);
        const isoDate = formatIsoDate(txnDate);

        const txn: TransactionRecord = {
            txn_id: generateTxnId(isoDate, rawDesc, amount),
            txn_date: isoDate,
            description: normalizeDescription(rawDesc),
            amount: signedAmountString(amount),
            source_file: sourceFile,
            category_id: null,
            auto_categorized: false,
            categorized_at: null,
            is_duplicate: false,
            duplicate_of: null,
        };
        if (merchant) txn.merchant_name = merchant;

        const parsed = TransactionRecordSchema.safeParse(txn);
        if (parsed.success) {
            transactions.push(txn);
        } else {
            warnings.push(`Schema validation failed for row: ${parsed.error.message}`);
            skippedSchema++;
        }
    }

    if (skippedDates) {
        warnings.push(`Skipped ${skippedDates} rows with invalid or missing dates`);
    }
    if (skippedAmounts) {
        warnings.push(`Skipped ${skippedAmounts} rows with invalid amounts`);
    }
    if (skippedSchema) {
        warnings.push(`Skipped ${skippedSchema} rows that failed schema validation`);
    }

    const skippedRows = skippedDates + skippedAmounts + skippedSchema;
    return { transactions: resolveCollisions(transactions), warnings, skippedRows };
}

/**
 * Cent-precision signed string ("-60.00"); wider precision is kept as-is.
 */
function signedAmountString(amount: Decimal): string {
    return amount.decimalPlaces() <= 2 ? amount.toFixed(2) : amount.toFixed();
}

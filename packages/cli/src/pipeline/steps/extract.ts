import { readFile } from 'node:fs/promises';
import { buildDocumentRecord, extractDocument, parseTransactionsFile } from '@tallyslip/core';
import type { SourceHint } from '@tallyslip/core';
import { DocumentRecordSchema } from '@tallyslip/shared';
import type { InputFile, PipelineState, PipelineStep } from '../types.js';
import { toExtractionInput } from '../input.js';
import { promptContinue } from '../../utils/prompt.js';
import { errorMessage } from '../../utils/console.js';

/**
 * Step 3: Extraction
 * Reads every routed file: bank exports are parsed into transactions,
 * receipts, SMS and e-mail become document records.
 */
export const extractFiles: PipelineStep = async (state) => {
    for (const file of state.files) {
        if (!file.kind) {
            continue; // Skip files with no import route
        }

        try {
            if (file.kind === 'bank') {
                await parseBankExport(state, file);
            } else {
                await extractMessage(state, file, file.kind);
            }
        } catch (err) {
            state.errors.push({
                step: 'extract',
                message: `Failed to read ${file.filename}: ${errorMessage(err)}`,
                fatal: false, // Non-fatal by default, but subject to prompt below
                error: err,
            });
        }
    }

    // After extraction, if any errors, call promptContinue (unless --yes/non-TTY)
    const failures = state.errors.filter(e => e.step === 'extract').length;
    if (failures > 0) {
        const shouldContinue = await promptContinue(
            `\n⚠️  ${failures} file(s) could not be read. Some data will be missing.`,
            state.options
        );

        if (!shouldContinue) {
            state.errors.push({
                step: 'extract',
                message: 'Aborted by user after extraction errors.',
                fatal: true,
            });
        }
    }

    if (state.documents.length === 0 && state.transactions.length === 0 && state.errors.length === 0) {
        state.warnings.push('No receipts or transactions found in any of the files.');
    }

    return state;
};

async function parseBankExport(state: PipelineState, file: InputFile): Promise<void> {
    const buffer = await readFile(file.path);
    const result = parseTransactionsFile(toArrayBuffer(buffer), file.filename);
    state.transactions.push(...result.transactions);
    state.statistics.parsedTransactions += result.transactions.length;

    // Forward parser warnings to pipeline state
    for (const warning of result.warnings) {
        state.warnings.push(`[${file.filename}] ${warning}`);
    }
}

async function extractMessage(state: PipelineState, file: InputFile, source: SourceHint): Promise<void> {
    const raw = await readFile(file.path, 'utf8');
    const input = toExtractionInput(source, raw);

    const fields = extractDocument(input, { now: state.now });
    if (!fields) {
        state.statistics.notReceipts++;
        state.warnings.push(`[${file.filename}] Not a receipt, skipping`);
        return;
    }

    const record = buildDocumentRecord(input, fields, { sourceFile: file.filename, ingestedAt: state.now });

    // A record the store cannot read back must never reach it.
    const parsed = DocumentRecordSchema.safeParse(record);
    if (!parsed.success) {
        state.warnings.push(`[${file.filename}] Schema validation failed, skipping: ${parsed.error.message}`);
        return;
    }

    state.documents.push(record);
    state.statistics.extractedDocuments++;
}

function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
    const copy = new ArrayBuffer(bytes.byteLength);
    new Uint8Array(copy).set(bytes);
    return copy;
}

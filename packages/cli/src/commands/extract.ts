import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { detectSource, extractDocument } from '@tallyslip/core';
import type { SourceHint } from '@tallyslip/core';
import { toExtractionInput } from '../pipeline/input.js';
import { log, info, fail, errorMessage } from '../utils/console.js';
import type { ExtractOptions } from '../types.js';

/**
 * Print the fields extracted from one receipt, SMS or e-mail file.
 * Nothing is stored.
 */
export async function extractFile(filePath: string, options: ExtractOptions, now: Date = new Date()): Promise<void> {
    const source = options.source ?? sourceFromName(basename(filePath));
    if (!source) {
        fail(`Error: Cannot tell the source of ${basename(filePath)}. Use --source receipt_ocr|sms|email.`);
        process.exit(1);
    }

    let raw: string;
    try {
        raw = await readFile(filePath, 'utf8');
    } catch (err) {
        fail(`Error reading file: ${errorMessage(err)}`);
        process.exit(1);
    }

    const fields = extractDocument(toExtractionInput(source, raw), { now });
    if (!fields) {
        info(`Not a receipt (${source}): no receipt keyword found.`);
        return;
    }

    log(JSON.stringify(fields, null, 2));
}

function sourceFromName(filename: string): SourceHint | null {
    const kind = detectSource(filename);
    return kind === null || kind === 'bank' ? null : kind;
}

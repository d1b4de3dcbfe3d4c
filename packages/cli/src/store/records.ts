import { existsSync, readFileSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { DocumentRecordSchema, TransactionRecordSchema } from '@tallyslip/shared';
import type { DocumentRecord, TransactionRecord } from '@tallyslip/shared';
import type { Workspace } from '../types.js';

/**
 * Stored documents (receipts, SMS, e-mail). A missing file means none yet.
 */
export function loadDocuments(workspace: Workspace): DocumentRecord[] {
    return loadJsonArray(workspace.config.documentsPath, DocumentRecordSchema);
}

/**
 * Stored bank transactions. A missing file means none yet.
 */
export function loadTransactions(workspace: Workspace): TransactionRecord[] {
    return loadJsonArray(workspace.config.transactionsPath, TransactionRecordSchema);
}

export async function saveDocuments(workspace: Workspace, documents: DocumentRecord[]): Promise<void> {
    await saveJson(workspace.config.documentsPath, documents);
}

export async function saveTransactions(workspace: Workspace, transactions: TransactionRecord[]): Promise<void> {
    await saveJson(workspace.config.transactionsPath, transactions);
}

function loadJsonArray<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
    if (!existsSync(path)) {
        return [];
    }
    const data: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    return z.array(schema).parse(data);
}

async function saveJson(path: string, value: unknown): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, JSON.stringify(value, null, 2) + '\n');
}

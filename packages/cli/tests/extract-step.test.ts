import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { extractDocument } from '@tallyslip/core';
import { extractFiles } from '../src/pipeline/steps/extract.js';
import type { InputFile, PipelineState } from '../src/pipeline/types.js';
import { resolveWorkspace } from '../src/workspace/paths.js';
import { makeTempDir, removeTempDir } from './helpers.js';

vi.mock('@tallyslip/core', async (importOriginal) => {
    const actual = await importOriginal<typeof import('@tallyslip/core')>();
    return { ...actual, extractDocument: vi.fn(actual.extractDocument) };
});

const now = new Date('2024-01-31T12:00:00Z');

function stateFor(root: string, files: InputFile[]): PipelineState {
    return {
        runDate: '2024-01-31',
        workspace: resolveWorkspace(root),
        options: { dryRun: false, force: false, yes: true },
        now,
        files,
        documents: [],
        transactions: [],
        storedDocuments: [],
        storedTransactions: [],
        warnings: [],
        errors: [],
        statistics: {
            extractedDocuments: 0,
            notReceipts: 0,
            parsedTransactions: 0,
            alreadyStored: 0,
            flaggedDuplicates: 0,
        },
    };
}

describe('Extraction step', () => {
    let root: string;
    let email: InputFile;

    beforeEach(async () => {
        root = await makeTempDir();
        email = { path: join(root, 'email_0001.eml'), filename: 'email_0001.eml', hash: 'sha256:test', kind: 'email' };
        await writeFile(email.path, 'Subject: Your receipt\n\nTotal: $5.00');
    });

    afterEach(async () => {
        await removeTempDir(root);
    });

    it('should keep documents that pass schema validation', async () => {
        const state = await extractFiles(stateFor(root, [email]));

        expect(state.warnings).toEqual([]);
        expect(state.documents).toHaveLength(1);
        expect(state.documents[0]).toMatchObject({ source: 'email', amount: '5.00', source_file: 'email_0001.eml' });
        expect(state.statistics.extractedDocuments).toBe(1);
    });

    it('should skip a document the store could not read back', async () => {
        vi.mocked(extractDocument).mockReturnValueOnce({
            line_items: [],
            amount: '5.00',
            transaction_date: '+012345-01-01T00:00:00.000Z',
        });

        const state = await extractFiles(stateFor(root, [email]));

        expect(state.documents).toEqual([]);
        expect(state.statistics.extractedDocuments).toBe(0);
        expect(state.errors).toEqual([]);
        expect(state.warnings).toEqual([
            expect.stringMatching(/^\[email_0001\.eml\] Schema validation failed, skipping: /),
            'No receipts or transactions found in any of the files.',
        ]);
    });
});

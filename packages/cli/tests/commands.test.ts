import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { buildDocumentRecord } from '@tallyslip/core';
import type { TransactionRecord } from '@tallyslip/core';
import { initWorkspace } from '../src/commands/init.js';
import { addRule } from '../src/commands/add-rule.js';
import { setCategoryRulesActive } from '../src/commands/toggle-rule.js';
import { sweep } from '../src/commands/sweep.js';
import { extractFile } from '../src/commands/extract.js';
import { resolveWorkspace } from '../src/workspace/paths.js';
import { loadRules } from '../src/workspace/config.js';
import { FileCategoryRepository } from '../src/store/categories.js';
import { loadDocuments, loadTransactions, saveDocuments, saveTransactions } from '../src/store/records.js';
import { makeTempDir, removeTempDir } from './helpers.js';

const now = new Date('2024-01-31T12:00:00.000Z');

describe('CLI commands', () => {
    let root: string;

    beforeEach(async () => {
        root = await makeTempDir();
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'info').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
        vi.spyOn(process, 'exit').mockImplementation(() => {
            throw new Error('exit');
        });
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await removeTempDir(root);
    });

    describe('init', () => {
        it('installs default categories and their rules', async () => {
            await initWorkspace(root, now);
            const workspace = resolveWorkspace(root);

            const categories = await new FileCategoryRepository(workspace).list();
            expect(categories.map(c => c.name)).toEqual([
                'Food & Dining',
                'Groceries',
                'Transportation',
                'Shopping',
                'Entertainment',
                'Utilities',
                'Healthcare',
                'Income',
                'Fees & Charges',
                'Cash & ATM',
            ]);
            expect(categories[7]).toMatchObject({ id: 8, is_income: true, is_system: true, color: '#90EE90' });

            const rules = loadRules(workspace);
            expect(rules).toHaveLength(10);
            expect(rules[0]).toMatchObject({ category: 'Food & Dining', is_system: true, active: true, added_date: '2024-01-31' });

            const rulesText = await readFile(workspace.config.rulesPath, 'utf8');
            expect(rulesText).toContain('# Tallyslip keyword rules.');
        });

        it('is idempotent', async () => {
            await initWorkspace(root, now);
            await initWorkspace(root, now);
            const workspace = resolveWorkspace(root);

            expect(await new FileCategoryRepository(workspace).list()).toHaveLength(10);
            expect(loadRules(workspace)).toHaveLength(10);
        });
    });

    describe('add-rule', () => {
        beforeEach(async () => {
            await initWorkspace(root, now);
        });

        it('creates the category and appends a user rule', async () => {
            await addRule('Coffee', ['Latte', ' Espresso '], { workspace: root, note: 'morning' }, now);
            const workspace = resolveWorkspace(root);

            expect(await new FileCategoryRepository(workspace).findByName('coffee')).toEqual({
                id: 11,
                name: 'Coffee',
                is_system: false,
                is_active: true,
                is_income: false,
            });
            expect(loadRules(workspace)[10]).toEqual({
                category: 'Coffee',
                keywords: ['latte', 'espresso'],
                is_system: false,
                active: true,
                note: 'morning',
                added_date: '2024-01-31',
            });
        });

        it('reuses an existing category with its stored name', async () => {
            await addRule('groceries', ['trader joe'], { workspace: root }, now);

            const rules = loadRules(resolveWorkspace(root));
            expect(rules[10].category).toBe('Groceries');
        });

        it('rejects keywords shorter than 3 characters', async () => {
            await expect(addRule('Coffee', ['ab'], { workspace: root }, now)).rejects.toThrow('exit');
            expect(loadRules(resolveWorkspace(root))).toHaveLength(10);
        });

        it('warns about overlapping keywords but still adds the rule', async () => {
            await addRule('Fuel Stops', ['gas station'], { workspace: root }, now);

            expect(console.warn).toHaveBeenCalledWith(
                '⚠️  Keyword "gas station" overlaps "gas" (Transportation). Earlier rules win.'
            );
            expect(loadRules(resolveWorkspace(root))).toHaveLength(11);
        });
    });

    describe('activate/deactivate-rule', () => {
        it('toggles a category\'s rules', async () => {
            await initWorkspace(root, now);
            const workspace = resolveWorkspace(root);

            await setCategoryRulesActive('groceries', false, { workspace: root });
            expect(loadRules(workspace).find(r => r.category === 'Groceries')?.active).toBe(false);

            await setCategoryRulesActive('Groceries', true, { workspace: root });
            expect(loadRules(workspace).find(r => r.category === 'Groceries')?.active).toBe(true);
        });
    });

    describe('sweep', () => {
        it('categorizes stored records that have no category', async () => {
            await initWorkspace(root, now);
            await addRule('Coffee', ['latte'], { workspace: root }, now);
            const workspace = resolveWorkspace(root);

            const ingestedAt = new Date('2024-01-20T00:00:00.000Z');
            const latte = buildDocumentRecord(
                { text: 'LATTE LAB\nTotal $4.50', source: 'receipt_ocr' },
                { merchant_name: 'Latte Lab', amount: '4.50', line_items: [] },
                { sourceFile: 'receipt_0001.txt', ingestedAt }
            );
            const unknown = buildDocumentRecord(
                { text: 'ZZYZX WORKS', source: 'receipt_ocr' },
                { merchant_name: 'Zzyzx Works', line_items: [] },
                { sourceFile: 'receipt_0002.txt', ingestedAt }
            );
            const payroll: TransactionRecord = {
                txn_id: '0123456789abcdef',
                txn_date: '2024-01-19',
                description: 'PAYROLL ACME',
                amount: '2500.00',
                source_file: 'transactions_checking.csv',
                category_id: null,
                auto_categorized: false,
                categorized_at: null,
                is_duplicate: false,
                duplicate_of: null,
            };
            await saveDocuments(workspace, [latte, unknown]);
            await saveTransactions(workspace, [payroll]);

            await sweep({ dryRun: false, workspace: root }, now);

            const [storedLatte, storedUnknown] = loadDocuments(workspace);
            expect(storedLatte).toMatchObject({
                category_id: 11,
                auto_categorized: true,
                categorized_at: '2024-01-31T12:00:00.000Z',
            });
            expect(storedUnknown).toMatchObject({
                category_id: null,
                auto_categorized: false,
                categorized_at: '2024-01-31T12:00:00.000Z',
            });
            expect(loadTransactions(workspace)[0]).toMatchObject({ category_id: 8, auto_categorized: true });
        });

        it('writes nothing on a dry run', async () => {
            await initWorkspace(root, now);
            const workspace = resolveWorkspace(root);
            const doc = buildDocumentRecord(
                { text: 'SHELL', source: 'receipt_ocr' },
                { merchant_name: 'Shell', line_items: [] },
                { sourceFile: 'receipt_0001.txt', ingestedAt: now }
            );
            await saveDocuments(workspace, [doc]);

            await sweep({ dryRun: true, workspace: root }, now);

            expect(loadDocuments(workspace)[0].category_id).toBeNull();
        });
    });

    describe('extract', () => {
        it('prints the fields of an SMS file', async () => {
            const file = join(root, 'sms_0001.txt');
            await writeFile(file, 'From: +15550000000\n\nYou were charged $45.00 at Shell on 01/16/2024');

            await extractFile(file, {}, now);

            const printed = vi.mocked(console.log).mock.calls[0][0];
            expect(JSON.parse(String(printed))).toEqual({
                line_items: [],
                merchant_name: 'Shell',
                amount: '45.00',
                transaction_date: '2024-01-16T00:00:00.000Z',
                raw_body: 'You were charged $45.00 at Shell on 01/16/2024',
                sender: '+15550000000',
            });
        });

        it('reports a message that is not a receipt', async () => {
            const file = join(root, 'sms_0002.txt');
            await writeFile(file, 'See you at 5');

            await extractFile(file, {}, now);

            expect(console.info).toHaveBeenCalledWith('ℹ Not a receipt (sms): no receipt keyword found.');
        });

        it('exits when the source cannot be told from the name', async () => {
            const file = join(root, 'notes.txt');
            await writeFile(file, 'Total $5.00');

            await expect(extractFile(file, {}, now)).rejects.toThrow('exit');
        });
    });
});

/**
 * Command-line parsing. Kept apart from index.ts so it can be tested
 * without running a command.
 */

import { parseArgs } from 'node:util';
import { SourceHintSchema } from '@tallyslip/shared';
import type { SourceHint } from '@tallyslip/shared';

export type Command =
    | { name: 'help' }
    | { name: 'init'; dir?: string }
    | { name: 'ingest'; dryRun: boolean; force: boolean; yes: boolean; runDate?: string; workspace?: string }
    | { name: 'sweep'; dryRun: boolean; workspace?: string }
    | { name: 'extract'; file: string; source?: SourceHint }
    | { name: 'add-rule'; category: string; keywords: string[]; note?: string; workspace?: string }
    | { name: 'deactivate-rule' | 'activate-rule'; category: string; workspace?: string };

export const USAGE = `Usage: tallyslip <command> [options]

Commands:
  init [dir]                          Create a workspace with default categories
  ingest [--dry-run] [--force] [--yes] [--run-date YYYY-MM-DD]
                                      Import files from imports/
  sweep [--dry-run]                   Categorize stored uncategorized records
  extract <file> [--source receipt_ocr|sms|email]
                                      Print extracted fields of one file
  add-rule <category> <keyword...> [--note TEXT]
                                      Add a keyword rule
  deactivate-rule <category>          Turn a category's rules off
  activate-rule <category>            Turn a category's rules back on

Options:
  --workspace DIR                     Workspace root (default: search upward from cwd)`;

const OPTIONS = {
    'dry-run': { type: 'boolean' },
    force: { type: 'boolean' },
    yes: { type: 'boolean', short: 'y' },
    'run-date': { type: 'string' },
    workspace: { type: 'string' },
    source: { type: 'string' },
    note: { type: 'string' },
    help: { type: 'boolean', short: 'h' },
} as const;

/**
 * Parse argv (without node and script path) into a command.
 * @throws Error with a user-facing message on bad usage
 */
export function parseCommandLine(argv: string[]): Command {
    const { values, positionals } = parseArgs({ args: argv, options: OPTIONS, allowPositionals: true });
    const [name, ...rest] = positionals;

    if (!name || values.help) {
        return { name: 'help' };
    }

    switch (name) {
        case 'init':
            return { name: 'init', dir: rest[0] };
        case 'ingest':
            return {
                name: 'ingest',
                dryRun: values['dry-run'] ?? false,
                force: values.force ?? false,
                yes: values.yes ?? false,
                runDate: values['run-date'],
                workspace: values.workspace,
            };
        case 'sweep':
            return { name: 'sweep', dryRun: values['dry-run'] ?? false, workspace: values.workspace };
        case 'extract': {
            const file = rest[0];
            if (!file) throw new Error('extract needs a file path');
            return { name: 'extract', file, source: parseSource(values.source) };
        }
        case 'add-rule': {
            const [category, ...keywords] = rest;
            if (!category || keywords.length === 0) {
                throw new Error('add-rule needs a category and at least one keyword');
            }
            return { name: 'add-rule', category, keywords, note: values.note, workspace: values.workspace };
        }
        case 'deactivate-rule':
        case 'activate-rule': {
            const category = rest[0];
            if (!category) throw new Error(`${name} needs a category`);
            return {
                name: name === 'activate-rule' ? 'activate-rule' : 'deactivate-rule',
                category,
                workspace: values.workspace,
            };
        }
        default:
            throw new Error(`Unknown command: ${name}`);
    }
}

function parseSource(value: string | undefined): SourceHint | undefined {
    if (value === undefined) return undefined;
    const parsed = SourceHintSchema.safeParse(value);
    if (!parsed.success) {
        throw new Error(`Invalid --source "${value}". Use receipt_ocr, sms or email.`);
    }
    return parsed.data;
}

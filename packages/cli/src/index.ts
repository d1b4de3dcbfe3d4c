#!/usr/bin/env tsx
/**
 * Tallyslip CLI
 *
 * ARCHITECTURAL NOTE: All file I/O and console output happen here in the
 * CLI. The core receives text or an ArrayBuffer and returns data.
 */

import { parseCommandLine, USAGE } from './args.js';
import type { Command } from './args.js';
import { initWorkspace } from './commands/init.js';
import { ingest } from './commands/ingest.js';
import { sweep } from './commands/sweep.js';
import { extractFile } from './commands/extract.js';
import { addRule } from './commands/add-rule.js';
import { setCategoryRulesActive } from './commands/toggle-rule.js';
import { log, fail, errorMessage } from './utils/console.js';

async function run(command: Command): Promise<void> {
    switch (command.name) {
        case 'help':
            log(USAGE);
            return;
        case 'init':
            return initWorkspace(command.dir);
        case 'ingest':
            return ingest(command);
        case 'sweep':
            return sweep(command);
        case 'extract':
            return extractFile(command.file, { source: command.source });
        case 'add-rule':
            return addRule(command.category, command.keywords, {
                note: command.note,
                workspace: command.workspace,
            });
        case 'deactivate-rule':
        case 'activate-rule':
            return setCategoryRulesActive(command.category, command.name === 'activate-rule', {
                workspace: command.workspace,
            });
    }
}

async function main(): Promise<void> {
    let command: Command;
    try {
        command = parseCommandLine(process.argv.slice(2));
    } catch (err) {
        fail(`Error: ${errorMessage(err)}`);
        log(`\n${USAGE}`);
        process.exit(1);
    }
    await run(command);
}

main().catch((err: unknown) => {
    fail(`Unexpected error: ${errorMessage(err)}`);
    process.exit(1);
});

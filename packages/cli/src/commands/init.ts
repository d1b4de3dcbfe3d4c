import { existsSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { formatIsoDate, initializeDefaultCategories } from '@tallyslip/core';
import { resolveWorkspace } from '../workspace/paths.js';
import { loadDefaultCategories, loadRules } from '../workspace/config.js';
import { FileCategoryRepository } from '../store/categories.js';
import { appendRuleToYaml } from '../yaml/rules.js';
import { log, success, arrow, fail, errorMessage } from '../utils/console.js';

const RULES_HEADER = `# Tallyslip keyword rules.
# A keyword matches when it appears anywhere in a merchant name (case-insensitive).
# Rules are checked top to bottom; the first match wins.
rules:
`;

/**
 * Create the workspace layout and install the default categories with
 * their system rules. Safe to run again: nothing existing is replaced.
 */
export async function initWorkspace(dir: string | undefined, now: Date = new Date()): Promise<void> {
    const workspace = resolveWorkspace(resolve(dir ?? process.cwd()));
    log(`\nTallyslip - Initializing workspace at ${workspace.root}`);

    try {
        const folders = [
            dirname(workspace.config.rulesPath),
            dirname(workspace.config.categoriesPath),
            workspace.imports,
            workspace.outputs,
            workspace.archive,
        ];
        for (const folder of folders) {
            await mkdir(folder, { recursive: true });
        }

        if (!existsSync(workspace.config.rulesPath)) {
            await writeFile(workspace.config.rulesPath, RULES_HEADER);
            arrow('Created config/rules.yaml');
        }

        const repository = new FileCategoryRepository(workspace);
        const result = await initializeDefaultCategories(
            repository,
            loadDefaultCategories(),
            loadRules(workspace),
            { addedDate: formatIsoDate(now) }
        );

        for (const rule of result.rulesToAdd) {
            await appendRuleToYaml(workspace.config.rulesPath, rule);
        }

        success(`Workspace ready: ${workspace.root}`);
        arrow(`Categories created: ${result.created.length}`);
        arrow(`System rules added: ${result.rulesToAdd.length}`);
    } catch (err) {
        fail(`Failed to initialize workspace: ${errorMessage(err)}`);
        process.exit(1);
    }
}

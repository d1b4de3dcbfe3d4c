import { validateKeyword, checkKeywordCollision, materializeCategory } from '@tallyslip/core';
import { requireWorkspace } from './workspace.js';
import { loadRules } from '../workspace/config.js';
import { loadDocuments, loadTransactions } from '../store/records.js';
import { FileCategoryRepository } from '../store/categories.js';
import { appendRuleToYaml } from '../yaml/rules.js';
import { success, log, arrow, warn, fail, errorMessage } from '../utils/console.js';
import type { AddRuleOptions } from '../types.js';

/**
 * Validate keywords and append a user rule. The category is created if it
 * does not exist yet.
 */
export async function addRule(
    category: string,
    keywords: string[],
    options: AddRuleOptions,
    now: Date = new Date()
): Promise<void> {
    if (category.trim() === '') {
        fail('Error: Category name cannot be empty.');
        process.exit(1);
    }
    if (keywords.length === 0) {
        fail('Error: At least one keyword is required.');
        process.exit(1);
    }

    // 1. Workspace detection
    const workspace = requireWorkspace(options.workspace);
    const rulesPath = workspace.config.rulesPath;

    // 2. Validate keywords against stored merchant names
    const names = [
        ...loadDocuments(workspace).map(d => d.merchant_name ?? ''),
        ...loadTransactions(workspace).map(t => t.merchant_name ?? t.description),
    ].filter(name => name !== '');

    for (const keyword of keywords) {
        const validation = validateKeyword(keyword, names);
        if (!validation.valid) {
            fail(`Error: ${validation.errors.join(', ')}`);
            process.exit(1);
        }
        for (const w of validation.warnings) {
            warn(w);
        }
    }

    // 3. Collision handling (warn but don't block)
    const existingRules = loadRules(workspace);
    for (const keyword of keywords) {
        const collision = checkKeywordCollision(keyword, existingRules);
        for (const c of collision.collisions) {
            warn(`Keyword "${keyword}" overlaps "${c.keyword}" (${c.category}). Earlier rules win.`);
        }
    }

    // 4. Perform addition
    try {
        const target = await materializeCategory(new FileCategoryRepository(workspace), category.trim(), {
            is_system: false,
        });

        log(`Adding new rule to: ${rulesPath}`);
        await appendRuleToYaml(rulesPath, {
            category: target.name,
            keywords: keywords.map(k => k.trim().toLowerCase()),
            is_system: false,
            active: true,
            note: options.note,
            added_date: now.toISOString().split('T')[0],
        });

        success('Rule successfully added!');
        arrow(`Category: ${target.name} (id ${target.id})`);
        arrow(`Keywords: ${keywords.map(k => `"${k.trim().toLowerCase()}"`).join(', ')}`);
        if (options.note) {
            arrow(`Note:     ${options.note}`);
        }
    } catch (err) {
        fail(`Failed to add rule: ${errorMessage(err)}`);
        process.exit(1);
    }
}

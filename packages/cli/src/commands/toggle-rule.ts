import { requireWorkspace } from './workspace.js';
import { setRulesActive } from '../yaml/rules.js';
import { success, info, fail, errorMessage } from '../utils/console.js';
import type { ToggleRuleOptions } from '../types.js';

/**
 * Turn every rule of a category on or off. Rules stay in the file either way.
 */
export async function setCategoryRulesActive(
    category: string,
    active: boolean,
    options: ToggleRuleOptions
): Promise<void> {
    const workspace = requireWorkspace(options.workspace);

    let changed: number;
    try {
        changed = await setRulesActive(workspace.config.rulesPath, category, active);
    } catch (err) {
        fail(`Failed to update rules: ${errorMessage(err)}`);
        process.exit(1);
    }

    const state = active ? 'activated' : 'deactivated';
    if (changed === 0) {
        info(`No rules to update for "${category}".`);
    } else {
        success(`${changed} rule(s) ${state} for "${category}".`);
    }
}

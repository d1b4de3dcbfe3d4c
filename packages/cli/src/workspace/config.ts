import { readFileSync, existsSync } from 'node:fs';
import { parse } from 'yaml';
import {
    RuleFileSchema,
    DefaultCategoryFileSchema,
    type CategoryRule,
    type DefaultCategory,
} from '@tallyslip/shared';
import type { Workspace } from '../types.js';
import { resolveAssetPath } from './paths.js';

/**
 * Loads every keyword rule (active and inactive) from config/rules.yaml.
 * A missing or empty file has no rules.
 */
export function loadRules(workspace: Workspace): CategoryRule[] {
    return loadYamlRules(workspace.config.rulesPath);
}

export function loadYamlRules(path: string): CategoryRule[] {
    if (!existsSync(path)) {
        return [];
    }
    const content = readFileSync(path, 'utf-8');
    const data: unknown = parse(content);
    if (data === null || data === undefined) return [];

    // Either a direct array or a wrapped object { rules: [...] }
    const parsed = RuleFileSchema.parse(data);
    return Array.isArray(parsed) ? parsed : parsed.rules ?? [];
}

/**
 * Loads the category definitions installed by `init`.
 */
export function loadDefaultCategories(path: string = resolveAssetPath('default-categories.yaml')): DefaultCategory[] {
    if (!existsSync(path)) {
        throw new Error(`Default categories file not found: ${path}`);
    }
    const data: unknown = parse(readFileSync(path, 'utf-8'));
    return DefaultCategoryFileSchema.parse(data).categories;
}

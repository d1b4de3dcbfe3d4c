import { parseDocument, isSeq, isMap, isScalar } from 'yaml';
import type { Node, YAMLSeq } from 'yaml';
import { readFile, writeFile } from 'node:fs/promises';

/**
 * Rule as written to config/rules.yaml. Optional fields are left out when absent.
 */
export interface RuleEntry {
    category: string;
    keywords: string[];
    is_system?: boolean;
    active?: boolean;
    note?: string;
    added_date?: string;
}

const EMPTY_RULES_FILE = '# Categorization Rules\nrules:\n';

/**
 * Appends a new categorization rule to a YAML file while preserving comments.
 * Structure-aware: a top-level list, a `rules:` list, or no rules yet.
 */
export async function appendRuleToYaml(filePath: string, rule: RuleEntry): Promise<void> {
    let content = '';
    try {
        content = await readFile(filePath, 'utf8');
    } catch (err) {
        if (isNotFound(err)) {
            content = EMPTY_RULES_FILE;
        } else {
            throw err;
        }
    }

    const doc = parseDocument<Node>(content || 'rules:');
    const node = doc.createNode(cleanRule(rule));
    const root = doc.contents;

    if (isSeq(root)) {
        // Case 1: Top-level sequence
        root.add(node);
    } else if (isMap(root)) {
        // Case 2: Top-level mapping
        const rules = root.get('rules');
        if (rules === null || rules === undefined || (isScalar(rules) && rules.value === null)) {
            // Case 2a: No rules key (or an empty one), create it
            root.set('rules', doc.createNode([cleanRule(rule)]));
        } else if (isSeq(rules)) {
            // Case 2b: rules key is a sequence
            rules.add(node);
        } else {
            throw new Error(`Invalid YAML structure in ${filePath}: "rules" must be a list.`);
        }
    } else {
        // Case 3: Empty or other scalar (fallback)
        doc.set('rules', doc.createNode([cleanRule(rule)]));
    }

    await writeFile(filePath, doc.toString());
}

/**
 * Sets `active` on every rule of a category (case-insensitive), keeping comments.
 * Rules are never deleted.
 *
 * @returns Number of rules whose flag changed
 */
export async function setRulesActive(filePath: string, category: string, active: boolean): Promise<number> {
    const content = await readFile(filePath, 'utf8');
    const doc = parseDocument(content);
    const list = findRuleList(doc.contents);
    if (!list) return 0;

    const key = category.toLowerCase();
    let changed = 0;

    for (const item of list.items) {
        if (!isMap(item)) continue;

        const name = item.get('category');
        if (typeof name !== 'string' || name.toLowerCase() !== key) continue;

        // A rule without the flag is active.
        const isActive = item.get('active') !== false;
        if (isActive !== active) {
            item.set('active', active);
            changed++;
        }
    }

    if (changed > 0) {
        await writeFile(filePath, doc.toString());
    }
    return changed;
}

function findRuleList(root: unknown): YAMLSeq | null {
    if (isSeq(root)) return root;
    if (isMap(root)) {
        const rules = root.get('rules');
        if (isSeq(rules)) return rules;
    }
    return null;
}

function cleanRule(rule: RuleEntry): RuleEntry {
    const entry: RuleEntry = { category: rule.category, keywords: [...rule.keywords] };
    if (rule.is_system !== undefined) entry.is_system = rule.is_system;
    if (rule.active !== undefined) entry.active = rule.active;
    if (rule.note !== undefined) entry.note = rule.note;
    if (rule.added_date !== undefined) entry.added_date = rule.added_date;
    return entry;
}

function isNotFound(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

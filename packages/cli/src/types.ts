/**
 * Tallyslip CLI - Core Types
 */

import type { SourceHint } from '@tallyslip/core';

export interface IngestOptions {
    dryRun: boolean;
    force: boolean;
    yes: boolean;
    /** Output/archive folder name (YYYY-MM-DD). Defaults to today. */
    runDate?: string;
    workspace?: string;
}

export interface SweepOptions {
    dryRun: boolean;
    workspace?: string;
}

export interface AddRuleOptions {
    note?: string;
    workspace?: string;
}

export interface ToggleRuleOptions {
    workspace?: string;
}

export interface ExtractOptions {
    source?: SourceHint;
}

export interface WorkspaceConfig {
    rulesPath: string;
    categoriesPath: string;
    documentsPath: string;
    transactionsPath: string;
}

export interface Workspace {
    root: string;
    imports: string;
    outputs: string;
    archive: string;
    config: WorkspaceConfig;
}

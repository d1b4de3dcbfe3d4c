import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Workspace } from '../types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Constructs a Workspace object from a root path.
 */
export function resolveWorkspace(root: string): Workspace {
    return {
        root,
        imports: join(root, 'imports'),
        outputs: join(root, 'outputs'),
        archive: join(root, 'archive'),
        config: {
            rulesPath: join(root, 'config', 'rules.yaml'),
            categoriesPath: join(root, 'data', 'categories.json'),
            documentsPath: join(root, 'data', 'documents.json'),
            transactionsPath: join(root, 'data', 'transactions.json'),
        },
    };
}

/**
 * Path of a file shipped in the package's assets/ folder.
 */
export function resolveAssetPath(name: string): string {
    // In dev: packages/cli/src/workspace -> packages/cli
    // In dist: packages/cli/dist/workspace -> packages/cli
    return join(__dirname, '..', '..', 'assets', name);
}

export function getOutputsPath(workspace: Workspace, runDate: string): string {
    return join(workspace.outputs, runDate);
}

export function getArchivePath(workspace: Workspace, runDate: string): string {
    return join(workspace.archive, runDate);
}

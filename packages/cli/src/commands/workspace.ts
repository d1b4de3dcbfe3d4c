import { detectWorkspaceRoot } from '../workspace/detect.js';
import { resolveWorkspace } from '../workspace/paths.js';
import { fail } from '../utils/console.js';
import type { Workspace } from '../types.js';

/**
 * Resolve the workspace from --workspace or the working directory, or exit.
 */
export function requireWorkspace(explicitRoot?: string): Workspace {
    const root = explicitRoot || detectWorkspaceRoot();
    if (!root) {
        fail('Error: Workspace not found. Run "tallyslip init" first.');
        console.error('Expected "config/rules.yaml" in the workspace root.');
        process.exit(1);
    }
    return resolveWorkspace(root);
}

import { mkdir, copyFile, rename, unlink } from 'node:fs/promises';
import { join } from 'node:path';
import type { PipelineStep } from '../types.js';
import { getArchivePath } from '../../workspace/paths.js';
import { errorMessage } from '../../utils/console.js';

/**
 * Step 9: Archiving
 * Moves imported files to archive/<run-date>/ so the next run starts clean.
 * Files are moved, not copied. Unrecognized files stay in imports/.
 */
export const archiveRawFiles: PipelineStep = async (state) => {
    if (state.options.dryRun) {
        state.warnings.push('Dry run: Skipping archival.');
        return state;
    }

    // Only archive if there are no fatal errors in previous steps.
    if (state.errors.some(e => e.fatal)) {
        state.warnings.push('Archival skipped due to previous fatal errors.');
        return state;
    }

    const archivePath = getArchivePath(state.workspace, state.runDate);

    try {
        await mkdir(archivePath, { recursive: true });

        for (const file of state.files) {
            if (!file.kind) continue;
            await moveFile(file.path, join(archivePath, file.filename));
        }
    } catch (err) {
        state.errors.push({
            step: 'archive',
            message: `Failed to archive files to ${archivePath}: ${errorMessage(err)}`,
            fatal: false, // Archival failure is bad but doesn't invalidate the output.
            error: err,
        });
    }

    return state;
};

async function moveFile(from: string, to: string): Promise<void> {
    try {
        // Attempt atomic move (atomic rename)
        await rename(from, to);
    } catch (err) {
        // Fallback for cross-device move (EXDEV)
        if (err instanceof Error && 'code' in err && err.code === 'EXDEV') {
            await copyFile(from, to);
            await unlink(from);
        } else {
            throw err;
        }
    }
}

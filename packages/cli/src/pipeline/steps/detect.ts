import { readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { detectSource, getSupportedPatterns } from '@tallyslip/core';
import type { PipelineStep, InputFile } from '../types.js';
import { hashFile } from '../../utils/hash.js';
import { errorMessage } from '../../utils/console.js';

/**
 * Step 2: File Detection
 * Lists files in the imports directory, hashes them, and routes them by name.
 */
export const detectFiles: PipelineStep = async (state) => {
    const importsPath = state.workspace.imports;

    try {
        const entries = (await readdir(importsPath)).sort();
        const files: InputFile[] = [];

        for (const filename of entries) {
            // Skip hidden and temporary files
            if (filename.startsWith('.') || filename.startsWith('~')) {
                continue;
            }

            const filePath = join(importsPath, filename);
            const s = await stat(filePath);

            if (!s.isFile()) {
                continue; // Skip directories and other non-file entries
            }

            const hash = await hashFile(filePath);
            const kind = detectSource(filename);

            files.push({
                path: filePath,
                filename,
                hash,
                kind: kind ?? undefined,
            });

            if (!kind) {
                state.warnings.push(`File skipped (unrecognized name): ${filename}`);
            }
        }

        state.files = files;

        if (!files.some(f => f.kind !== undefined)) {
            state.errors.push({
                step: 'detect',
                message: `No importable files found in ${importsPath}. Expected ${getSupportedPatterns().join(', ')}`,
                fatal: true,
            });
        }
    } catch (err) {
        state.errors.push({
            step: 'detect',
            message: `Error scanning directory ${importsPath}: ${errorMessage(err)}`,
            fatal: true,
            error: err,
        });
    }

    return state;
};

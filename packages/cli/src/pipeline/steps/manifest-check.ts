import { existsSync } from 'node:fs';
import { join } from 'node:path';
import type { PipelineStep } from '../types.js';
import { getOutputsPath } from '../../workspace/paths.js';

/**
 * Step 1: Manifest Check
 * Prevents accidental overwrite of a run's outputs unless --force is used.
 * Checks for any output file, not just the manifest.
 */
export const manifestCheck: PipelineStep = async (state) => {
    // A dry run writes nothing, so there is nothing to overwrite.
    if (state.options.dryRun || state.options.force) {
        return state;
    }

    const outputPath = getOutputsPath(state.workspace, state.runDate);

    const criticalFiles = [
        'run_manifest.json',
        'analysis.xlsx',
        'review.xlsx',
    ];

    const existingFiles = criticalFiles.filter(f => existsSync(join(outputPath, f)));

    if (existingFiles.length > 0) {
        state.errors.push({
            step: 'manifest-check',
            message: `Output for ${state.runDate} already exists (found: ${existingFiles.join(', ')}). Use --force to overwrite.`,
            fatal: true,
        });
    }

    return state;
};

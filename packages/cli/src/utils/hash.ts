import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';

/**
 * SHA-256 of a file's content, prefixed with 'sha256:'.
 * Recorded per input file in run_manifest.json.
 */
export async function hashFile(filePath: string): Promise<string> {
    const content = await readFile(filePath);
    const hash = createHash('sha256').update(content).digest('hex');
    return `sha256:${hash}`;
}

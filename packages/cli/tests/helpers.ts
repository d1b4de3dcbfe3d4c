import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

/**
 * Fresh empty directory under the OS temp folder.
 */
export async function makeTempDir(): Promise<string> {
    return mkdtemp(join(tmpdir(), 'tallyslip-test-'));
}

export async function removeTempDir(dir: string): Promise<void> {
    await rm(dir, { recursive: true, force: true });
}

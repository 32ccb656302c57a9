import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

/** Creates a fresh temporary directory for one test. */
export async function MakeTempDir(prefix: string): Promise<string> {
    return mkdtemp(join(tmpdir(), `${prefix}-`));
}

export async function RemoveTempDir(dir: string): Promise<void> {
    await rm(dir, { recursive: true, force: true });
}

export const FIXED_TIME = '2025-03-01T10:00:00.000Z';

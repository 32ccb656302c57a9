/**
 * Crash-safe single-file replacement: content is written next to the target and renamed over it.
 */
import { promises as fs } from 'fs';
import path from 'path';

/**
 * Writes `data` to `{target}.tmp`, then renames it onto `target`.
 * Creates the parent directory when missing. A failed write leaves the previous target intact.
 * @param target string - Final file path
 * @param data string - UTF-8 content
 * @example
 * await WriteFileAtomic('./data/project_index.json', JSON.stringify(index));
 */
export async function WriteFileAtomic(target: string, data: string): Promise<void> {
    const tempFile = `${target}.tmp`;
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(tempFile, data, `utf-8`);
    await fs.rename(tempFile, target);
}

/**
 * Filesystem moves used by archiving and directory relocation.
 * All failures surface as IOFailureError carrying the paths involved.
 */
import { promises as fs, type Dirent } from 'fs';
import path from 'path';
import { ErrorMessage, IOFailureError, IsErrnoCode } from '../Common/Errors.js';
import { log } from '../Common/Log.js';

const SOURCE = 'Project/FileMover';

/**
 * True when the path exists (file or directory).
 * @example
 * await PathExists('/prints/cube.stl'); // true
 */
export async function PathExists(target: string): Promise<boolean> {
    try {
        await fs.access(target);
        return true;
    } catch {
        return false;
    }
}

/** Ensure directory exists (mkdir -p semantics). */
export async function EnsureDirectory(dir: string): Promise<void> {
    try {
        await fs.mkdir(dir, { recursive: true });
    } catch(error) {
        throw new IOFailureError(`Failed to create directory ${dir}: ${ErrorMessage(error)}`, { dir }, error);
    }
}

/**
 * Moves a file, falling back to copy + unlink when source and target sit on different volumes.
 * @param source string - Existing file
 * @param target string - Destination path (replaced if present)
 */
export async function MoveFile(source: string, target: string): Promise<void> {
    try {
        await fs.rename(source, target);
        return;
    } catch(error) {
        if (!IsErrnoCode(error, `EXDEV`)) {
            throw new IOFailureError(`Failed to move ${source} to ${target}: ${ErrorMessage(error)}`, { source, target }, error);
        }
    }

    try {
        await fs.copyFile(source, target);
        await fs.unlink(source);
    } catch(error) {
        throw new IOFailureError(`Failed to move ${source} to ${target}: ${ErrorMessage(error)}`, { source, target }, error);
    }
}

/**
 * Moves every regular file of `fromDir` into `toDir`, keeping names.
 * A missing `fromDir` counts as empty. When one move fails, files already moved are put back.
 * @returns string[] - Names of moved files
 */
export async function MoveDirectoryFiles(fromDir: string, toDir: string): Promise<string[]> {
    let entries: Dirent[];
    try {
        entries = await fs.readdir(fromDir, { withFileTypes: true });
    } catch(error) {
        if (IsErrnoCode(error, `ENOENT`)) {
            return [];
        }
        throw new IOFailureError(`Failed to list ${fromDir}: ${ErrorMessage(error)}`, { dir: fromDir }, error);
    }

    const moved: string[] = [];
    for (const entry of entries) {
        if (!entry.isFile()) {
            continue;
        }
        try {
            await MoveFile(path.join(fromDir, entry.name), path.join(toDir, entry.name));
            moved.push(entry.name);
        } catch(error) {
            await RestoreMoves(toDir, fromDir, moved);
            throw error;
        }
    }
    return moved;
}

/**
 * Puts moved files back after a failed batch. Failures are logged, never thrown,
 * so the original error reaches the caller.
 */
export async function RestoreMoves(movedTo: string, movedFrom: string, names: string[]): Promise<void> {
    for (const name of names) {
        try {
            await MoveFile(path.join(movedTo, name), path.join(movedFrom, name));
        } catch(error) {
            log.error(`Could not restore ${name} to ${movedFrom}: ${ErrorMessage(error)}`, SOURCE, `RestoreMoves`);
        }
    }
}

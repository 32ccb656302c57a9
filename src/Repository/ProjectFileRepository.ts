/**
 * Filesystem-backed record storage: one JSON document per project inside the projects directory.
 */
import { promises as fs } from 'fs';
import path from 'path';
import type { ProjectRecord } from '../Domain/Project.js';
import type { ProjectRecordRepository } from '../Domain/Repository.js';
import { ErrorMessage, IOFailureError, IsErrnoCode, SerializationError } from '../Common/Errors.js';
import { WriteFileAtomic } from '../Common/AtomicFile.js';
import { DecodeProjectRecord, EncodeProjectRecord } from '../Project/ProjectCodec.js';

export class ProjectFileRepository implements ProjectRecordRepository {
    /** Directory holding record files [// absolute path] */
    private readonly _projectsDir: string;

    /**
     * @param projectsDir string - Directory to store record files (e.g. './data/projects')
     */
    constructor(projectsDir: string) {
        this._projectsDir = projectsDir;
    }

    public PathOf(filename: string): string {
        return path.join(this._projectsDir, filename);
    }

    /**
     * Reads and validates a record file.
     * @throws SerializationError when missing, unreadable or corrupt
     */
    public async Read(filename: string): Promise<ProjectRecord> {
        const filePath = this.PathOf(filename);
        let raw: string;
        try {
            raw = await fs.readFile(filePath, `utf-8`);
        } catch(error) {
            throw new SerializationError(`Failed to read record ${filePath}: ${ErrorMessage(error)}`, { filePath }, error);
        }
        return DecodeProjectRecord(raw, filePath);
    }

    /**
     * Writes a record file atomically.
     * @throws SerializationError when the record fails the record schema (nothing is written)
     * @throws IOFailureError when the write fails
     */
    public async Write(filename: string, record: ProjectRecord): Promise<void> {
        const filePath = this.PathOf(filename);
        const content = EncodeProjectRecord(record, filePath);
        try {
            await WriteFileAtomic(filePath, content);
        } catch(error) {
            throw new IOFailureError(`Failed to write record ${filePath}: ${ErrorMessage(error)}`, { filePath }, error);
        }
    }

    /**
     * Removes a record file.
     * @returns Promise<boolean> - false when the file was already missing
     * @throws IOFailureError for any other failure
     */
    public async Remove(filename: string): Promise<boolean> {
        const filePath = this.PathOf(filename);
        try {
            await fs.unlink(filePath);
            return true;
        } catch(error) {
            if (IsErrnoCode(error, `ENOENT`)) {
                return false;
            }
            throw new IOFailureError(`Failed to delete record ${filePath}: ${ErrorMessage(error)}`, { filePath }, error);
        }
    }
}

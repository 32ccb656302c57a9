/**
 * Lookup index: project id -> (record filename, cached status).
 * Persisted as one JSON document, replaced atomically on every save.
 */
import { createHash } from 'crypto';
import { promises as fs } from 'fs';
import Joi from 'joi';
import type { IndexEntry, IndexLoadOutcome, ProjectIndexRepository } from '../Domain/Repository.js';
import { ConflictError, ErrorMessage, IOFailureError, IsErrnoCode, NotFoundError } from '../Common/Errors.js';
import { WriteFileAtomic } from '../Common/AtomicFile.js';
import { log } from '../Common/Log.js';

const SOURCE = 'ProjectIndex';
const INDEX_VERSION = 1;

/** On-disk shape of the index file. */
interface IndexDocument {
    version: number;
    entries: Array<{ id: string; filename: string; status: string }>;
}

const indexDocumentSchema = Joi.object<IndexDocument>({
    version: Joi.number().valid(INDEX_VERSION).required(),
    entries: Joi.array()
        .items(
            Joi.object({
                id: Joi.string().required(),
                filename: Joi.string().required(),
                status: Joi.string().allow(``).required(),
            }),
        )
        .unique(`id`)
        .required(),
});

/**
 * Deterministic record filename for a project id (md5 hex + extension).
 * @example
 * RecordFilename('HAM_1'); // '<32 hex chars>.json'
 */
export function RecordFilename(projectId: string, extension: string = `.json`): string {
    return `${createHash(`md5`).update(projectId).digest(`hex`)}${extension}`;
}

export class ProjectIndex implements ProjectIndexRepository {
    private readonly _indexFile: string; // absolute path of the index document
    private _entries: Map<string, IndexEntry> = new Map();

    constructor(indexFile: string) {
        this._indexFile = indexFile;
    }

    public get file(): string {
        return this._indexFile;
    }

    /**
     * Loads the index from disk. A missing file yields an empty index; an unreadable or corrupt
     * file is logged and also yields an empty index.
     */
    public async Load(): Promise<IndexLoadOutcome> {
        let raw: string;
        try {
            raw = await fs.readFile(this._indexFile, `utf-8`);
        } catch(error) {
            this._entries = new Map();
            if (IsErrnoCode(error, `ENOENT`)) {
                return `missing`;
            }
            log.error(`Failed to read project index ${this._indexFile}: ${ErrorMessage(error)}`, SOURCE, `Load`);
            return `reset`;
        }

        try {
            const result = indexDocumentSchema.validate(JSON.parse(raw), { convert: false });
            if (result.error) {
                throw result.error;
            }
            this._entries = new Map(
                result.value.entries.map(entry => [entry.id, { filename: entry.filename, status: entry.status }]),
            );
            return `loaded`;
        } catch(error) {
            log.error(`Failed to load project index ${this._indexFile}: ${ErrorMessage(error)}`, SOURCE, `Load`);
            this._entries = new Map();
            return `reset`;
        }
    }

    /**
     * Writes the whole index atomically (temp file + rename).
     * @throws IOFailureError when the write fails
     */
    public async Save(): Promise<void> {
        const document: IndexDocument = {
            version: INDEX_VERSION,
            entries: this.Entries().map(([id, entry]) => ({ id, filename: entry.filename, status: entry.status })),
        };
        try {
            await WriteFileAtomic(this._indexFile, JSON.stringify(document, null, 2));
        } catch(error) {
            throw new IOFailureError(
                `Failed to save project index ${this._indexFile}: ${ErrorMessage(error)}`,
                { indexFile: this._indexFile },
                error,
            );
        }
    }

    public Has(id: string): boolean {
        return this._entries.has(id);
    }

    public Get(id: string): IndexEntry | undefined {
        const entry = this._entries.get(id);
        return entry ? { ...entry } : undefined;
    }

    public Set(id: string, entry: IndexEntry): void {
        this._entries.set(id, { ...entry });
    }

    public Remove(id: string): boolean {
        return this._entries.delete(id);
    }

    /**
     * Moves an entry to a new id in place, keeping its filename and its position in the listing.
     * @throws NotFoundError when `oldId` is not indexed
     * @throws ConflictError when `newId` is already taken
     */
    public Rename(oldId: string, newId: string): void {
        if (oldId === newId) {
            return;
        }
        if (!this._entries.has(oldId)) {
            throw new NotFoundError(`Project ID '${oldId}' not found in index`, { projectId: oldId });
        }
        if (this._entries.has(newId)) {
            throw new ConflictError(`Project ID '${newId}' already exists`, { projectId: newId });
        }
        this._entries = new Map(
            [...this._entries].map(([id, value]): [string, IndexEntry] => [id === oldId ? newId : id, value]),
        );
    }

    /** Ids in insertion order. */
    public Ids(): string[] {
        return [...this._entries.keys()];
    }

    public Entries(): Array<[string, IndexEntry]> {
        return [...this._entries.entries()].map(([id, entry]) => [id, { ...entry }]);
    }
}

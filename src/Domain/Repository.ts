/**
 * Repository interfaces for project persistence.
 */
import type { ProjectRecord } from './Project.js';

/** Cached index row: where the record lives and its last known status. */
export interface IndexEntry {
    filename: string;
    status: string;
}

/** Per-record blob storage, addressed by storage filename. */
export interface ProjectRecordRepository {
    /** Reads and validates a record. Throws SerializationError when unreadable or corrupt. */
    Read(filename: string): Promise<ProjectRecord>;
    /** Writes a record, replacing any previous content. Throws IOFailureError. */
    Write(filename: string, record: ProjectRecord): Promise<void>;
    /** Removes a record file. Resolves false when it was already missing. */
    Remove(filename: string): Promise<boolean>;
    /** Absolute location of a record file (for diagnostics). */
    PathOf(filename: string): string;
}

/** How an index load went: read from disk, absent (fresh store) or discarded as corrupt. */
export type IndexLoadOutcome = `loaded` | `missing` | `reset`;

/** Identifier -> storage location table. */
export interface ProjectIndexRepository {
    Load(): Promise<IndexLoadOutcome>;
    Save(): Promise<void>;
    Has(id: string): boolean;
    Get(id: string): IndexEntry | undefined;
    Set(id: string, entry: IndexEntry): void;
    Remove(id: string): boolean;
    Rename(oldId: string, newId: string): void;
    Ids(): string[];
    Entries(): Array<[string, IndexEntry]>;
}

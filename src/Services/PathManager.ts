import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import type { ValidatedConfig } from '../Types/Config.js';

/**
 * PathManager centralizes resolution of the ledger's filesystem paths (data root, record files, index).
 * Directories are created on demand (idempotent).
 */
export class PathManager {
    private _cfg: ValidatedConfig; // active configuration
    private _ensured: Set<string> = new Set(); // memo of created directories

    constructor(cfg: ValidatedConfig) {
        this._cfg = cfg;
    }

    /** Ensure directory exists (mkdir -p semantics). */
    private __ensure(dir: string): string {
        if (!this._ensured.has(dir)) {
            if (!existsSync(dir)) {
                mkdirSync(dir, { recursive: true });
            }
            this._ensured.add(dir);
        }
        return dir;
    }

    /** Root for persistent data. */
    public DataRoot(): string {
        return this.__ensure(this._cfg.dataRoot);
    }
    /** Directory holding one record file per project. */
    public ProjectsDir(): string {
        return this.__ensure(this._cfg.projectsDir);
    }
    /** Index file path; its parent directory is created. */
    public IndexFile(): string {
        this.__ensure(dirname(this._cfg.indexFile));
        return this._cfg.indexFile;
    }
}


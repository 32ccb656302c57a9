/**
 * ProjectStore owns the project index and the record files. It creates, fetches, mutates and
 * deletes projects by id, keeps the index in step with the records and reports every outcome as
 * a typed StoreResult instead of throwing.
 */
import Joi from 'joi';
import { ComposeProjectId, EVENT_NAMES, Fail, Ok } from '../Domain/index.js';
import type {
    IndexEntry,
    NewProjectInput,
    ProjectIndexRepository,
    ProjectInfo,
    ProjectMutation,
    ProjectRecordRepository,
    StoreResult,
} from '../Domain/index.js';
import {
    AppError,
    ConflictError,
    ERROR_CODES,
    InvalidArgumentError,
    IOFailureError,
    NotFoundError,
    ToAppError,
} from '../Common/Errors.js';
import { log } from '../Common/Log.js';
import { Project } from '../Project/Project.js';
import { ParseMutation, ValidateMutation } from '../Project/ParseMutation.js';
import type { InfoFormatOptions } from '../Project/Rendering.js';
import type { VolumeEstimator } from '../Project/VolumeEstimator.js';
import { RecordFilename } from '../Repository/ProjectIndex.js';
import { MainEventBus, MAIN_EVENT_BUS } from '../Events/MainEventBus.js';
import { MetricsService } from './MetricsService.js';

const SOURCE = 'ProjectStore';

/** Collaborators of a store. */
export interface ProjectStoreOptions {
    records: ProjectRecordRepository;
    index: ProjectIndexRepository;
    recordExtension?: string; // default `.json`
    volumeEstimator?: VolumeEstimator;
    eventBus?: MainEventBus; // default: the global bus
    metrics?: MetricsService; // default: the bus's metrics
}

const newProjectSchema = Joi.object<NewProjectInput>({
    masterId: Joi.string().trim().min(1).required(),
    subId: Joi.number().integer().required(),
    file: Joi.string().min(1).required(),
    archiveDirectory: Joi.string().min(1).required(),
    responsible: Joi.object()
        .pattern(Joi.string(), Joi.array().items(Joi.string().allow(``)))
        .required(),
    quantity: Joi.number().integer().min(0).default(1),
});

/** Errors caused by the request rather than by storage; logged as warnings. */
const REQUEST_ERROR_CODES: ReadonlySet<string> = new Set([
    ERROR_CODES.NOT_FOUND,
    ERROR_CODES.INVALID_ARGUMENT,
    ERROR_CODES.CONFLICT,
    ERROR_CODES.UNSUPPORTED_OPERATION,
]);

export class ProjectStore {
    private readonly _records: ProjectRecordRepository;
    private readonly _index: ProjectIndexRepository;
    private readonly _recordExtension: string;
    private readonly _volumeEstimator?: VolumeEstimator;
    private readonly _eventBus: MainEventBus;
    private readonly _metrics: MetricsService;
    private _loading: Promise<void> | null = null; // shared index load, set on first use

    constructor(options: ProjectStoreOptions) {
        this._records = options.records;
        this._index = options.index;
        this._recordExtension = options.recordExtension ?? `.json`;
        this._volumeEstimator = options.volumeEstimator;
        this._eventBus = options.eventBus ?? MAIN_EVENT_BUS;
        this._metrics = options.metrics ?? this._eventBus.metrics;
    }

    /**
     * Deterministic record filename for a project id.
     * @example
     * ProjectStore.RecordFilename('HAM_1'); // md5('HAM_1') + '.json'
     */
    public static RecordFilename(projectId: string, extension: string = `.json`): string {
        return RecordFilename(projectId, extension);
    }

    /**
     * Loads the index once. Later calls wait on the same load. A corrupt index is logged,
     * announced as `index.reset` and replaced by an empty one.
     */
    public async Init(): Promise<void> {
        if (!this._loading) {
            this._loading = this.__loadIndex();
        }
        try {
            await this._loading;
        } catch(error) {
            this._loading = null;
            throw error;
        }
    }

    private async __loadIndex(): Promise<void> {
        const outcome = await this._index.Load();
        if (outcome === `reset`) {
            log.warning(`Project index was unreadable and has been reset to empty`, SOURCE, `Init`);
            this._eventBus.Emit(EVENT_NAMES.indexReset, { reason: `Index file unreadable or corrupt` });
            return;
        }
        log.debug(`Project index ${outcome}, ${this._index.Ids().length} entries`, SOURCE, `Init`);
    }

    /**
     * Runs one store operation: waits for the index, converts anything thrown into a failed result,
     * logs it and emits `project.operationFailed`.
     */
    private async __run<T>(operation: string, projectId: string | undefined, body: () => Promise<T>): Promise<StoreResult<T>> {
        try {
            await this.Init();
            return Ok(await body());
        } catch(error) {
            const appError = ToAppError(error, `${operation} failed`);
            const target = projectId ? ` for ${projectId}` : ``;
            if (REQUEST_ERROR_CODES.has(appError.code)) {
                log.warning(`${operation}${target} rejected: ${appError.message}`, SOURCE, operation);
            } else {
                log.error(`${operation}${target} failed: ${appError.message}`, SOURCE, operation);
            }
            this._metrics.IncOperationFailure();
            this._eventBus.Emit(EVENT_NAMES.projectOperationFailed, { operation, projectId, error: appError });
            return Fail<T>(appError);
        }
    }

    private __entry(projectId: string): IndexEntry {
        const entry = this._index.Get(projectId);
        if (!entry) {
            throw new NotFoundError(`Project ID '${projectId}' not found in index`, { projectId });
        }
        return entry;
    }

    private async __load(projectId: string): Promise<{ project: Project; entry: IndexEntry }> {
        const entry = this.__entry(projectId);
        const record = await this._records.Read(entry.filename);
        return { project: Project.FromRecord(record, { volumeEstimator: this._volumeEstimator }), entry };
    }

    private async __saveIndex(): Promise<void> {
        await this._index.Save();
        this._eventBus.Emit(EVENT_NAMES.indexUpdated, { size: this._index.Ids().length });
    }

    /**
     * Creates and persists a new project.
     * The record file is written first; the index entry only after that succeeds.
     * @example
     * const result = await store.Create({ masterId: 'HAM', subId: 1, file: '/prints/cube.stl',
     *     archiveDirectory: '/prints/archive', responsible: { Design: ['Alice'] } });
     * if (result.ok) console.log(result.data.Id()); // 'HAM_1'
     */
    public async Create(input: NewProjectInput): Promise<StoreResult<Project>> {
        return this.__run(`Create`, undefined, async () => {
            const { error, value } = newProjectSchema.validate(input, { abortEarly: false });
            if (error) {
                throw new InvalidArgumentError(`Invalid project input: ${error.message}`);
            }
            const projectId = ComposeProjectId(value.masterId, value.subId);
            if (this._index.Has(projectId)) {
                throw new ConflictError(`Project ID '${projectId}' already exists`, { projectId });
            }

            const project = Project.Create(value, { volumeEstimator: this._volumeEstimator });
            const filename = RecordFilename(projectId, this._recordExtension);
            await this._records.Write(filename, project.ToRecord());

            this._index.Set(projectId, { filename, status: project.status });
            try {
                await this.__saveIndex();
            } catch(saveError) {
                this._index.Remove(projectId);
                throw new IOFailureError(
                    `Project '${projectId}' was written but the index could not be saved: ${ToAppError(saveError).message}`,
                    { projectId, orphanedRecord: this._records.PathOf(filename) },
                    saveError,
                );
            }

            log.info(`Project '${projectId}' created`, SOURCE, `Create`);
            this._metrics.IncProjectCreated();
            this._eventBus.Emit(EVENT_NAMES.projectCreated, { projectId, filename });
            return project;
        });
    }

    /**
     * Loads a project from its record file.
     * Fails with NOT_FOUND for unknown ids and SERIALIZATION_FAILURE for a corrupt record.
     */
    public async Fetch(projectId: string): Promise<StoreResult<Project>> {
        return this.__run(`Fetch`, projectId, async () => {
            const { project } = await this.__load(projectId);
            return project;
        });
    }

    /**
     * Deletes the record file and the index entry. A record file that is already gone only
     * produces a warning; any other delete failure keeps the index entry.
     */
    public async Delete(projectId: string): Promise<StoreResult<void>> {
        return this.__run(`Delete`, projectId, async () => {
            const { filename } = this.__entry(projectId);
            const recordRemoved = await this._records.Remove(filename);
            if (!recordRemoved) {
                log.warning(`Record file ${filename} for '${projectId}' was already missing`, SOURCE, `Delete`);
            }
            this._index.Remove(projectId);
            await this.__saveIndex();

            log.info(`Project '${projectId}' deleted`, SOURCE, `Delete`);
            this._metrics.IncProjectDeleted();
            this._eventBus.Emit(EVENT_NAMES.projectDeleted, { projectId, filename, recordRemoved });
        });
    }

    /**
     * Applies one mutation and persists the result.
     * An identity change re-keys the index entry; the record filename stays the same.
     * @example
     * await store.Mutate('HAM_1', { kind: 'updateStatus', status: 'Printing' });
     */
    public async Mutate(projectId: string, mutation: ProjectMutation): Promise<StoreResult<Project>> {
        return this.__run(`Mutate`, projectId, () => this.__mutate(projectId, ValidateMutation(mutation)));
    }

    /**
     * Parses an untyped request (operation name plus arguments) and applies it.
     * @example
     * await store.MutateByName('HAM_1', 'update_file', ['/prints/cube_v2.stl', true]);
     * await store.MutateByName('HAM_1', 'add_comment', 'Support removed');
     */
    public async MutateByName(projectId: string, operation: string, args?: unknown): Promise<StoreResult<Project>> {
        return this.__run(`MutateByName`, projectId, () => this.__mutate(projectId, ParseMutation(operation, args)));
    }

    private async __mutate(projectId: string, mutation: ProjectMutation): Promise<Project> {
        const { project, entry } = await this.__load(projectId);

        if (mutation.kind === `updateMasterId`) {
            const nextId = ComposeProjectId(mutation.masterId, project.subId);
            if (nextId !== projectId && this._index.Has(nextId)) {
                throw new ConflictError(`Project ID '${nextId}' already exists`, { projectId, nextId });
            }
        }

        await project.Apply(mutation);

        try {
            await this._records.Write(entry.filename, project.ToRecord());
        } catch(writeError) {
            throw PersistenceFailure(`Record for '${projectId}' could not be written`, writeError, {
                projectId,
                persisted: false,
            });
        }

        const newId = project.Id();
        if (newId !== projectId) {
            this._index.Rename(projectId, newId);
        }
        this._index.Set(newId, { filename: entry.filename, status: project.status });
        try {
            await this.__saveIndex();
        } catch(saveError) {
            throw PersistenceFailure(`Record for '${newId}' was written but the index could not be saved`, saveError, {
                projectId: newId,
                persisted: true,
            });
        }

        log.info(`Project '${newId}' updated (${mutation.kind})`, SOURCE, `Mutate`);
        this._metrics.IncProjectUpdated();
        this._eventBus.Emit(EVENT_NAMES.projectUpdated, {
            projectId: newId,
            previousId: projectId,
            kind: mutation.kind,
            status: project.status,
        });
        return project;
    }

    /** Indexed ids in insertion order. */
    public async ListIds(): Promise<StoreResult<string[]>> {
        return this.__run(`ListIds`, undefined, async () => this._index.Ids());
    }

    /** Indexed `[id, { filename, status }]` pairs in insertion order. */
    public async ListEntries(): Promise<StoreResult<Array<[string, IndexEntry]>>> {
        return this.__run(`ListEntries`, undefined, async () => this._index.Entries());
    }

    public async GetInfo(projectId: string): Promise<StoreResult<ProjectInfo>> {
        return this.__run(`GetInfo`, projectId, async () => (await this.__load(projectId)).project.GetInfo());
    }

    public async FormatInfo(projectId: string, options: InfoFormatOptions = {}): Promise<StoreResult<string>> {
        return this.__run(`FormatInfo`, projectId, async () => (await this.__load(projectId)).project.FormatInfo(options));
    }

    /**
     * Prints a project's info rendering to a line sink (console by default).
     */
    public async PrintInfo(
        projectId: string,
        options: InfoFormatOptions = {},
        write: (text: string) => void = console.log,
    ): Promise<StoreResult<void>> {
        return this.__run(`PrintInfo`, projectId, async () => {
            const { project } = await this.__load(projectId);
            project.PrintInfo(options, write);
        });
    }
}

/** Wraps a storage failure as IO_FAILURE, merging the original details with what was (not) written. */
function PersistenceFailure(message: string, error: unknown, details: Record<string, unknown>): IOFailureError {
    const cause = ToAppError(error);
    const original = error instanceof AppError ? error.details : undefined;
    return new IOFailureError(`${message}: ${cause.message}`, { ...original, ...details }, error);
}

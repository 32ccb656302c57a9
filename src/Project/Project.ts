/**
 * Project is one 3D-printing production job: identity, production fields, design-file versions,
 * comments and the append-only change ledger.
 *
 * Every successful mutation appends exactly one ledger entry under its category
 * (two for a directory update touching both directories). A failed mutation throws
 * before any field changes, so the in-memory record stays as it was.
 */
import path from 'path';
import {
    ComposeProjectId,
    DEFAULT_STATUS,
    PROJECT_SCHEMA_VERSION,
} from '../Domain/Project.js';
import type {
    ChangeCategory,
    ChangeLogEntry,
    CommentEntry,
    NewProjectInput,
    ProjectInfo,
    ProjectRecord,
    ResponsibleMap,
    ShippingInfo,
} from '../Domain/Project.js';
import { AssertNever, type ProjectMutation } from '../Domain/Mutation.js';
import { ErrorMessage, InvalidArgumentError, IOFailureError, NotFoundError, ToAppError } from '../Common/Errors.js';
import { GetTimestamp, log } from '../Common/Log.js';
import { ChangeLog } from './ChangeLog.js';
import { EnsureDirectory, MoveDirectoryFiles, MoveFile, PathExists } from './FileMover.js';
import { PLACEHOLDER_VOLUME_ESTIMATOR, type VolumeEstimator } from './VolumeEstimator.js';
import { FormatChangeLog, FormatComments, FormatProjectInfo, type InfoFormatOptions } from './Rendering.js';

const SOURCE = 'Project';

/** Collaborators a project needs at run time (not persisted). */
export interface ProjectOptions {
    volumeEstimator?: VolumeEstimator;
}

/** New locations for `UpdateFileDirectories`; at least one is required. */
export interface DirectoryUpdate {
    activeDirectory?: string;
    archiveDirectory?: string;
}

export class Project {
    private _masterId: string;
    private readonly _subId: number;
    private _file: string;
    private _fileVersion: number;
    private _archiveDirectory: string;
    private _status: string;
    private _responsible: ResponsibleMap;
    private _quantity: number;
    private _volume: number;
    private _projectName: string | null;
    private _customerId: string | null;
    private _shippingInfo: ShippingInfo | null;
    private readonly _comments: Map<number, string> = new Map(); // comment id -> body
    private _lastCommentId: number; // ids are never reissued
    private readonly _changeLog: ChangeLog;
    private readonly _volumeEstimator: VolumeEstimator;

    private constructor(record: ProjectRecord, options: ProjectOptions) {
        this._masterId = record.masterId;
        this._subId = record.subId;
        this._file = record.file;
        this._fileVersion = record.fileVersion;
        this._archiveDirectory = record.archiveDirectory;
        this._status = record.status;
        this._responsible = CloneResponsible(record.responsible);
        this._quantity = record.quantity;
        this._volume = record.volume;
        this._projectName = record.projectName;
        this._customerId = record.customerId;
        this._shippingInfo = record.shippingInfo ? { ...record.shippingInfo } : null;
        for (const comment of record.comments) {
            this._comments.set(comment.id, comment.body);
        }
        this._lastCommentId = record.lastCommentId;
        this._changeLog = new ChangeLog(record.changeLog);
        this._volumeEstimator = options.volumeEstimator ?? PLACEHOLDER_VOLUME_ESTIMATOR;
    }

    /**
     * Opens a brand new project at file version 1 with an empty ledger.
     * @example
     * const project = Project.Create({ masterId: 'HAM', subId: 1, file: '/prints/cube.stl',
     *     archiveDirectory: '/prints/archive', responsible: { Design: ['Alice'] }, quantity: 2 });
     */
    public static Create(input: NewProjectInput, options: ProjectOptions = {}): Project {
        return new Project(
            {
                schemaVersion: PROJECT_SCHEMA_VERSION,
                masterId: input.masterId,
                subId: input.subId,
                file: input.file,
                fileVersion: 1,
                archiveDirectory: input.archiveDirectory,
                status: DEFAULT_STATUS,
                responsible: input.responsible,
                quantity: input.quantity ?? 1,
                volume: 0,
                projectName: null,
                customerId: null,
                shippingInfo: null,
                comments: [],
                lastCommentId: 0,
                changeLog: [],
            },
            options,
        );
    }

    /** Rebuilds a project from its persisted record. */
    public static FromRecord(record: ProjectRecord, options: ProjectOptions = {}): Project {
        return new Project(record, options);
    }

    /** Persistable snapshot of every field, comment and ledger entry. */
    public ToRecord(): ProjectRecord {
        return {
            schemaVersion: PROJECT_SCHEMA_VERSION,
            masterId: this._masterId,
            subId: this._subId,
            file: this._file,
            fileVersion: this._fileVersion,
            archiveDirectory: this._archiveDirectory,
            status: this._status,
            responsible: CloneResponsible(this._responsible),
            quantity: this._quantity,
            volume: this._volume,
            projectName: this._projectName,
            customerId: this._customerId,
            shippingInfo: this._shippingInfo ? { ...this._shippingInfo } : null,
            comments: this.Comments(),
            lastCommentId: this._lastCommentId,
            changeLog: this._changeLog.Entries(),
        };
    }

    public get masterId(): string {
        return this._masterId;
    }
    public get subId(): number {
        return this._subId;
    }
    public get file(): string {
        return this._file;
    }
    public get fileVersion(): number {
        return this._fileVersion;
    }
    public get archiveDirectory(): string {
        return this._archiveDirectory;
    }
    public get status(): string {
        return this._status;
    }
    public get responsible(): ResponsibleMap {
        return CloneResponsible(this._responsible);
    }
    public get quantity(): number {
        return this._quantity;
    }
    public get volume(): number {
        return this._volume;
    }
    public get projectName(): string | null {
        return this._projectName;
    }
    public get customerId(): string | null {
        return this._customerId;
    }
    public get shippingInfo(): ShippingInfo | null {
        return this._shippingInfo ? { ...this._shippingInfo } : null;
    }

    /** Composite identifier `{masterId}_{subId}`. */
    public Id(): string {
        return ComposeProjectId(this._masterId, this._subId);
    }

    /** Version label used to name archived files, e.g. `HAM_1_v2`. */
    public FileVersionLabel(): string {
        return `${this.Id()}_v${this._fileVersion}`;
    }

    /** Live comments in ascending id order. */
    public Comments(): CommentEntry[] {
        return [...this._comments.entries()]
            .sort(([a], [b]) => a - b)
            .map(([id, body]) => ({ id, body }));
    }

    /** Ledger entries in append (chronological) order. */
    public History(): ChangeLogEntry[] {
        return this._changeLog.Entries();
    }

    /** Ledger entries in ascending key order. */
    public ChangeLogEntries(): ChangeLogEntry[] {
        return this._changeLog.Sorted();
    }

    /** Derived counter of a category. */
    public ChangeCount(category: ChangeCategory): number {
        return this._changeLog.Count(category);
    }

    /** Derived counters of every category. */
    public ChangeCounters(): Record<ChangeCategory, number> {
        return this._changeLog.Counters();
    }

    //#region Comments

    /**
     * Adds a timestamped comment under the next comment id.
     * @returns number - The issued comment id
     */
    public AddComment(text: string): number {
        const timestamp = GetTimestamp();
        const id = this._lastCommentId + 1;
        this._lastCommentId = id;
        this._comments.set(id, `${timestamp}: ${text}`);
        this._changeLog.Append(`comment`, `comment_${id} added`, timestamp);
        return id;
    }

    /** Removes a live comment. The id is not reissued. */
    public RemoveComment(commentId: number): void {
        this.__requireComment(commentId);
        const timestamp = GetTimestamp();
        this._comments.delete(commentId);
        this._changeLog.Append(`comment`, `Comment ${commentId} deleted`, timestamp);
    }

    /** Replaces a live comment; the body keeps the edit time only. */
    public EditComment(commentId: number, text: string): void {
        this.__requireComment(commentId);
        const timestamp = GetTimestamp();
        this._comments.set(commentId, `edited ${timestamp}: ${text}`);
        this._changeLog.Append(`comment`, `Comment ${commentId} edited`, timestamp);
    }

    private __requireComment(commentId: number): void {
        if (!this._comments.has(commentId)) {
            throw new NotFoundError(`Comment ${commentId} not found`, { projectId: this.Id(), commentId });
        }
    }

    //#endregion

    /**
     * Moves the project under another master id. Uniqueness of the resulting id is the store's concern.
     */
    public UpdateMasterId(masterId: string): void {
        const oldId = this.Id();
        this._masterId = masterId;
        const newId = this.Id();
        this._changeLog.Append(
            `identity`,
            `Subproject moved under master project ${masterId}. Project ID changed from ${oldId} to ${newId}`,
        );
    }

    //#region Files

    /**
     * Points the project at another design file.
     * With `newVersion`, the current file is first moved into the archive directory as
     * `{label}{ext}`; only after that move succeeds does the version advance.
     * @param filePath string - Existing replacement file
     * @param newVersion boolean - Archive the current file and bump the version
     * @throws NotFoundError when `filePath` does not exist
     * @throws InvalidArgumentError when `filePath` is the current file
     * @throws IOFailureError when archiving fails (record unchanged)
     */
    public async UpdateFile(filePath: string, newVersion: boolean = false): Promise<void> {
        if (!(await PathExists(filePath))) {
            throw new NotFoundError(`File ${filePath} does not exist`, { projectId: this.Id(), filePath });
        }
        if (path.resolve(filePath) === path.resolve(this._file)) {
            throw new InvalidArgumentError(`New file cannot be the same as current file`, {
                projectId: this.Id(),
                filePath,
            });
        }

        if (newVersion) {
            const archivedPath = path.join(this._archiveDirectory, `${this.FileVersionLabel()}${path.extname(this._file)}`);
            await EnsureDirectory(this._archiveDirectory);
            await MoveFile(this._file, archivedPath);

            this._fileVersion += 1;
            this._file = filePath;
            await this.__refreshVolume();
            this._changeLog.Append(`file`, `File version updated to ${this.FileVersionLabel()}, new volume ${this._volume}`);
            return;
        }

        this._file = filePath;
        await this.__refreshVolume();
        this._changeLog.Append(`file`, `File updated (same version), new volume ${this._volume}`);
    }

    /**
     * Relocates the active file and/or the whole archive directory.
     * Each directory that actually changes gets its own `file` ledger entry.
     * If the archive move fails after the active file was moved, the active move is undone.
     * @throws InvalidArgumentError when no directory is given, or none differs from the current one
     */
    public async UpdateFileDirectories(directories: DirectoryUpdate): Promise<void> {
        const { activeDirectory, archiveDirectory } = directories;
        if (activeDirectory === undefined && archiveDirectory === undefined) {
            throw new InvalidArgumentError(`Must provide at least one new directory`, { projectId: this.Id() });
        }

        const activeTarget =
            activeDirectory !== undefined && path.resolve(activeDirectory) !== path.resolve(path.dirname(this._file))
                ? activeDirectory
                : undefined;
        const archiveTarget =
            archiveDirectory !== undefined && path.resolve(archiveDirectory) !== path.resolve(this._archiveDirectory)
                ? archiveDirectory
                : undefined;
        if (activeTarget === undefined && archiveTarget === undefined) {
            throw new InvalidArgumentError(`Directories already in place, nothing to change`, {
                projectId: this.Id(),
                activeDirectory,
                archiveDirectory,
            });
        }

        let movedFile: string | undefined;
        if (activeTarget !== undefined) {
            await EnsureDirectory(activeTarget);
            movedFile = path.join(activeTarget, path.basename(this._file));
            await MoveFile(this._file, movedFile);
        }

        if (archiveTarget !== undefined) {
            try {
                await EnsureDirectory(archiveTarget);
                await MoveDirectoryFiles(this._archiveDirectory, archiveTarget);
            } catch(error) {
                if (movedFile !== undefined && !(await this.__undoMove(movedFile, this._file))) {
                    const cause = ToAppError(error);
                    throw new IOFailureError(
                        `${cause.message}; ${movedFile} could not be moved back to ${this._file}`,
                        { ...cause.details, strandedFile: movedFile, recordedFile: this._file },
                        error,
                    );
                }
                throw error;
            }
        }

        const timestamp = GetTimestamp();
        if (activeTarget !== undefined && movedFile !== undefined) {
            this._file = movedFile;
            this._changeLog.Append(`file`, `File directory changed to ${activeTarget}`, timestamp);
        }
        if (archiveTarget !== undefined) {
            this._archiveDirectory = archiveTarget;
            this._changeLog.Append(`file`, `Archive directory changed to ${archiveTarget}`, timestamp);
        }
    }

    /** @returns false when the file stays at `from` */
    private async __undoMove(from: string, to: string): Promise<boolean> {
        try {
            await MoveFile(from, to);
            return true;
        } catch(error) {
            log.error(`Could not move ${from} back to ${to}: ${ErrorMessage(error)}`, SOURCE, this.Id());
            return false;
        }
    }

    /** Volume hook: runs after each file swap, before the ledger entry is written. */
    private async __refreshVolume(): Promise<void> {
        try {
            const volume = await this._volumeEstimator.Estimate(this._file);
            if (!Number.isFinite(volume)) {
                throw new Error(`estimator returned ${volume}`);
            }
            this._volume = volume;
        } catch(error) {
            log.warning(`Volume estimation failed for ${this._file}, keeping ${this._volume}: ${ErrorMessage(error)}`, SOURCE, this.Id());
        }
    }

    //#endregion

    public UpdateStatus(status: string): void {
        this._status = status;
        this._changeLog.Append(`status`, `Status changed to ${status}`);
    }

    /** Replaces the whole assignee list of one role; other roles are untouched. */
    public UpdateResponsible(role: string, assignees: string[]): void {
        this._responsible[role] = [...assignees];
        this._changeLog.Append(`responsible`, `${role} updated to ${assignees.join(`, `)}`);
    }

    public UpdateQuantity(quantity: number): void {
        this._quantity = quantity;
        this._changeLog.Append(`quantity`, `Quantity updated to ${quantity}`);
    }

    public UpdateName(name: string): void {
        this._projectName = name;
        this._changeLog.Append(`name`, `Project name updated to ${name}`);
    }

    public UpdateCustomerId(customerId: string): void {
        this._customerId = customerId;
        this._changeLog.Append(`customer`, `Project customer updated to ${customerId}`);
    }

    /** Stores shipping details as given; the ledger only surfaces the `Post Code` entry. */
    public UpdateShippingInfo(shippingInfo: ShippingInfo): void {
        this._shippingInfo = { ...shippingInfo };
        const postCode = shippingInfo['Post Code'] ?? `Unknown`;
        this._changeLog.Append(`shipping`, `Shipping info updated to ${postCode}`);
    }

    /**
     * Applies a typed mutation request.
     * @example
     * await project.Apply({ kind: 'updateStatus', status: 'Printing' });
     */
    public async Apply(mutation: ProjectMutation): Promise<void> {
        switch (mutation.kind) {
            case `addComment`:
                this.AddComment(mutation.text);
                return;
            case `removeComment`:
                this.RemoveComment(mutation.commentId);
                return;
            case `editComment`:
                this.EditComment(mutation.commentId, mutation.text);
                return;
            case `updateMasterId`:
                this.UpdateMasterId(mutation.masterId);
                return;
            case `updateFile`:
                await this.UpdateFile(mutation.filePath, mutation.newVersion);
                return;
            case `updateFileDirectories`:
                await this.UpdateFileDirectories({
                    activeDirectory: mutation.activeDirectory,
                    archiveDirectory: mutation.archiveDirectory,
                });
                return;
            case `updateStatus`:
                this.UpdateStatus(mutation.status);
                return;
            case `updateResponsible`:
                this.UpdateResponsible(mutation.role, mutation.assignees);
                return;
            case `updateQuantity`:
                this.UpdateQuantity(mutation.quantity);
                return;
            case `updateName`:
                this.UpdateName(mutation.name);
                return;
            case `updateCustomerId`:
                this.UpdateCustomerId(mutation.customerId);
                return;
            case `updateShippingInfo`:
                this.UpdateShippingInfo(mutation.shippingInfo);
                return;
            default:
                AssertNever(mutation);
        }
    }

    //#region Read side

    /** Snapshot of the displayable fields. */
    public GetInfo(): ProjectInfo {
        const comments: Record<string, string> = {};
        for (const comment of this.Comments()) {
            comments[`comment_${comment.id}`] = comment.body;
        }
        return {
            'Project ID': this.Id(),
            'Project Name': this._projectName,
            'Customer ID': this._customerId,
            Status: this._status,
            Quantity: this._quantity,
            Volume: this._volume,
            File: this._file,
            'File Version': this._fileVersion,
            'Archive Directory': this._archiveDirectory,
            Responsible: CloneResponsible(this._responsible),
            'Shipping Info': this.shippingInfo,
            Comments: comments,
        };
    }

    public FormatInfo(options: InfoFormatOptions = {}): string {
        return FormatProjectInfo(this.GetInfo(), this.Comments(), this._changeLog.Sorted(), options);
    }

    public FormatComments(): string {
        return FormatComments(this.Id(), this.Comments());
    }

    public FormatChangeLog(): string {
        return FormatChangeLog(this.Id(), this._changeLog.Sorted());
    }

    /**
     * Writes the info rendering to a line sink (console by default).
     * @example
     * project.PrintInfo({ comments: true, changeLog: true });
     */
    public PrintInfo(options: InfoFormatOptions = {}, write: (text: string) => void = console.log): void {
        write(this.FormatInfo(options));
    }

    //#endregion
}

function CloneResponsible(responsible: ResponsibleMap): ResponsibleMap {
    const copy: ResponsibleMap = {};
    for (const [role, assignees] of Object.entries(responsible)) {
        copy[role] = [...assignees];
    }
    return copy;
}

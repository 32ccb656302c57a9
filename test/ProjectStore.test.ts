import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { ProjectStore } from '../src/Services/ProjectStore.js';
import { ProjectFileRepository } from '../src/Repository/ProjectFileRepository.js';
import { ProjectIndex } from '../src/Repository/ProjectIndex.js';
import { MainEventBus } from '../src/Events/MainEventBus.js';
import { MetricsService } from '../src/Services/MetricsService.js';
import { PathExists } from '../src/Project/FileMover.js';
import type { NewProjectInput, StoreResult } from '../src/Domain/index.js';
import { MakeTempDir, RemoveTempDir } from './helpers.js';

const HAM_FILENAME = '62adf66dd088957c9f2a05ffd524f754.json';

function Input(masterId: string, subId: number): NewProjectInput {
    return {
        masterId,
        subId,
        file: `/prints/${masterId.toLowerCase()}_${subId}.stl`,
        archiveDirectory: '/prints/archive',
        responsible: { Design: ['Alice'] },
    };
}

/** Unwraps a successful result, failing the test with the error otherwise. */
function Data<T>(result: StoreResult<T>): T {
    if (!result.ok) {
        throw new Error(`Expected success, got ${result.error.code}: ${result.error.message}`);
    }
    return result.data;
}

function ErrorCode<T>(result: StoreResult<T>): string | undefined {
    return result.ok ? undefined : result.error.code;
}

describe('ProjectStore', () => {
    let root: string;
    let projectsDir: string;
    let indexFile: string;
    let metrics: MetricsService;
    let eventBus: MainEventBus;
    let store: ProjectStore;

    function NewStore(): ProjectStore {
        return new ProjectStore({
            records: new ProjectFileRepository(projectsDir),
            index: new ProjectIndex(indexFile),
            eventBus,
        });
    }

    beforeEach(async () => {
        root = await MakeTempDir('ledger-store');
        projectsDir = join(root, 'projects');
        indexFile = join(root, 'project_index.json');
        metrics = new MetricsService();
        eventBus = new MainEventBus(metrics);
        store = NewStore();
    });

    afterEach(async () => {
        await RemoveTempDir(root);
    });

    describe('Create', () => {
        it('should write the record and index it', async () => {
            const project = Data(await store.Create(Input('HAM', 1)));

            expect(project.Id()).toBe('HAM_1');
            expect(await PathExists(join(projectsDir, HAM_FILENAME))).toBe(true);
            expect(Data(await store.ListEntries())).toEqual([['HAM_1', { filename: HAM_FILENAME, status: 'Created' }]]);
            expect(JSON.parse(await readFile(indexFile, 'utf-8')).entries).toEqual([
                { id: 'HAM_1', filename: HAM_FILENAME, status: 'Created' },
            ]);
        });

        it('should refuse a duplicate id and keep the existing record', async () => {
            Data(await store.Create(Input('HAM', 1)));
            Data(await store.MutateByName('HAM_1', 'update_status', 'Printing'));

            const duplicate = await store.Create(Input('HAM', 1));

            expect(ErrorCode(duplicate)).toBe('CONFLICT');
            expect(Data(await store.Fetch('HAM_1')).status).toBe('Printing');
        });

        it('should validate the input', async () => {
            const result = await store.Create({ ...Input('HAM', 1), subId: 1.5 });

            expect(ErrorCode(result)).toBe('INVALID_ARGUMENT');
            expect(Data(await store.ListIds())).toEqual([]);
        });

        it('should report the orphaned record when the index cannot be saved', async () => {
            await mkdir(`${indexFile}.tmp`);

            const result = await store.Create(Input('HAM', 1));

            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error.code).toBe('IO_FAILURE');
                expect(result.error.details).toEqual({
                    projectId: 'HAM_1',
                    orphanedRecord: join(projectsDir, HAM_FILENAME),
                });
            }
            expect(Data(await store.ListIds())).toEqual([]);
            expect(await PathExists(join(projectsDir, HAM_FILENAME))).toBe(true);
        });
    });

    describe('Fetch', () => {
        it('should fail for unknown ids', async () => {
            expect(ErrorCode(await store.Fetch('HAM_404'))).toBe('NOT_FOUND');
        });

        it('should fail for a corrupt record', async () => {
            Data(await store.Create(Input('HAM', 1)));
            await writeFile(join(projectsDir, HAM_FILENAME), 'garbage');

            expect(ErrorCode(await store.Fetch('HAM_1'))).toBe('SERIALIZATION_FAILURE');
        });

        it('should read what another store instance wrote', async () => {
            Data(await store.Create(Input('HAM', 1)));
            Data(await store.MutateByName('HAM_1', 'add_comment', 'Support removed'));

            const project = Data(await NewStore().Fetch('HAM_1'));

            expect(project.Comments()).toHaveLength(1);
            expect(project.ChangeCount('comment')).toBe(1);
        });
    });

    describe('Mutate', () => {
        it('should persist the change and refresh the cached status', async () => {
            Data(await store.Create(Input('HAM', 1)));

            const project = Data(await store.Mutate('HAM_1', { kind: 'updateStatus', status: 'Printing' }));

            expect(project.status).toBe('Printing');
            expect(Data(await store.ListEntries())).toEqual([['HAM_1', { filename: HAM_FILENAME, status: 'Printing' }]]);
            expect(Data(await store.Fetch('HAM_1')).History().map(entry => entry.description)).toEqual([
                'Status changed to Printing',
            ]);
        });

        it('should not persist a failed mutation', async () => {
            Data(await store.Create(Input('HAM', 1)));

            const result = await store.Mutate('HAM_1', { kind: 'removeComment', commentId: 5 });

            expect(ErrorCode(result)).toBe('NOT_FOUND');
            expect(Data(await store.Fetch('HAM_1')).History()).toEqual([]);
        });

        it('should re-key the index when the id changes', async () => {
            Data(await store.Create(Input('HAM', 1)));

            Data(await store.Mutate('HAM_1', { kind: 'updateMasterId', masterId: 'MAAS' }));

            expect(Data(await store.ListEntries())).toEqual([['MAAS_1', { filename: HAM_FILENAME, status: 'Created' }]]);
            expect(Data(await store.Fetch('MAAS_1')).Id()).toBe('MAAS_1');
            expect(ErrorCode(await store.Fetch('HAM_1'))).toBe('NOT_FOUND');
        });

        it('should refuse an id change onto an existing project', async () => {
            Data(await store.Create(Input('HAM', 1)));
            Data(await store.Create(Input('MAAS', 1)));

            const result = await store.Mutate('HAM_1', { kind: 'updateMasterId', masterId: 'MAAS' });

            expect(ErrorCode(result)).toBe('CONFLICT');
            expect(Data(await store.Fetch('HAM_1')).ChangeCount('identity')).toBe(0);
            expect(Data(await store.ListIds())).toEqual(['HAM_1', 'MAAS_1']);
        });

        it('should say whether the record was written when the index save fails', async () => {
            Data(await store.Create(Input('HAM', 1)));
            await mkdir(`${indexFile}.tmp`);

            const result = await store.Mutate('HAM_1', { kind: 'updateQuantity', quantity: 4 });

            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error.code).toBe('IO_FAILURE');
                expect(result.error.details?.persisted).toBe(true);
            }
            expect(Data(await store.Fetch('HAM_1')).quantity).toBe(4);
        });

        it('should reject typed mutations carrying values a record cannot hold', async () => {
            Data(await store.Create(Input('HAM', 1)));

            expect(ErrorCode(await store.Mutate('HAM_1', { kind: 'updateQuantity', quantity: -1 }))).toBe('INVALID_ARGUMENT');
            expect(ErrorCode(await store.Mutate('HAM_1', { kind: 'updateQuantity', quantity: 1.5 }))).toBe('INVALID_ARGUMENT');
            expect(ErrorCode(await store.Mutate('HAM_1', { kind: 'updateMasterId', masterId: '' }))).toBe('INVALID_ARGUMENT');

            const project = Data(await store.Fetch('HAM_1'));
            expect(project.quantity).toBe(1);
            expect(project.History()).toEqual([]);
            expect(Data(await store.ListIds())).toEqual(['HAM_1']);
            expect(metrics.Snapshot().operationFailures).toBe(3);
        });

        it('should reject unknown operations and bad arguments by name', async () => {
            Data(await store.Create(Input('HAM', 1)));

            expect(ErrorCode(await store.MutateByName('HAM_1', 'paint', []))).toBe('UNSUPPORTED_OPERATION');
            expect(ErrorCode(await store.MutateByName('HAM_1', 'update_quantity', 'many'))).toBe('INVALID_ARGUMENT');
        });
    });

    describe('Delete', () => {
        it('should remove the record and the index entry', async () => {
            Data(await store.Create(Input('HAM', 1)));

            Data(await store.Delete('HAM_1'));

            expect(Data(await store.ListIds())).toEqual([]);
            expect(await PathExists(join(projectsDir, HAM_FILENAME))).toBe(false);
            expect(ErrorCode(await store.Delete('HAM_1'))).toBe('NOT_FOUND');
        });

        it('should succeed when the record file is already gone', async () => {
            const removed: boolean[] = [];
            eventBus.On('project.deleted', payload => removed.push(payload.recordRemoved));
            Data(await store.Create(Input('HAM', 1)));
            await rm(join(projectsDir, HAM_FILENAME));

            Data(await store.Delete('HAM_1'));

            expect(removed).toEqual([false]);
            expect(Data(await store.ListIds())).toEqual([]);
        });
    });

    describe('index loading', () => {
        it('should treat a corrupt index as empty and announce the reset', async () => {
            await writeFile(indexFile, 'not json');
            const resets: string[] = [];
            eventBus.On('index.reset', payload => resets.push(payload.reason));

            expect(Data(await store.ListIds())).toEqual([]);
            expect(Data(await store.ListIds())).toEqual([]);
            expect(resets).toEqual(['Index file unreadable or corrupt']);
        });
    });

    describe('rendering', () => {
        it('should format and print a stored project', async () => {
            Data(await store.Create(Input('HAM', 1)));
            const lines: string[] = [];

            const formatted = Data(await store.FormatInfo('HAM_1'));
            Data(await store.PrintInfo('HAM_1', {}, text => lines.push(text)));

            expect(formatted.split('\n')[0]).toBe('--- Project Info for HAM_1 ---');
            expect(lines).toEqual([formatted]);
            expect(Data(await store.GetInfo('HAM_1'))['File']).toBe('/prints/ham_1.stl');
        });
    });

    describe('events and metrics', () => {
        it('should count operations and published events', async () => {
            const created: string[] = [];
            eventBus.On('project.created', payload => created.push(payload.projectId));

            Data(await store.Create(Input('HAM', 1)));
            Data(await store.MutateByName('HAM_1', 'update_name', 'Bracket'));
            await store.Fetch('HAM_404');

            const snapshot = metrics.Snapshot();
            expect(created).toEqual(['HAM_1']);
            expect(snapshot.projectsCreated).toBe(1);
            expect(snapshot.projectsUpdated).toBe(1);
            expect(snapshot.operationFailures).toBe(1);
            expect(snapshot.eventsPublished).toEqual({
                'index.updated': 2,
                'project.created': 1,
                'project.updated': 1,
                'project.operationFailed': 1,
            });
        });
    });
});

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Project } from '../src/Project/Project.js';
import { InvalidArgumentError, NotFoundError } from '../src/Common/Errors.js';
import { FIXED_TIME } from './helpers.js';

function NewProject(): Project {
    return Project.Create({
        masterId: 'HAM',
        subId: 1,
        file: '/prints/cube.stl',
        archiveDirectory: '/prints/archive',
        responsible: { Design: ['Alice'], Production: ['Bob', 'Carol'] },
        quantity: 2,
    });
}

describe('Project', () => {
    beforeEach(() => {
        vi.useFakeTimers({ toFake: ['Date'] });
        vi.setSystemTime(new Date(FIXED_TIME));
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    describe('creation', () => {
        it('should start at file version 1 with default status and an empty ledger', () => {
            const project = NewProject();

            expect(project.Id()).toBe('HAM_1');
            expect(project.fileVersion).toBe(1);
            expect(project.FileVersionLabel()).toBe('HAM_1_v1');
            expect(project.status).toBe('Created');
            expect(project.quantity).toBe(2);
            expect(project.volume).toBe(0);
            expect(project.projectName).toBeNull();
            expect(project.History()).toEqual([]);
            expect(project.Comments()).toEqual([]);
        });

        it('should default quantity to 1', () => {
            const project = Project.Create({
                masterId: 'MAAS',
                subId: 7,
                file: '/prints/hook.obj',
                archiveDirectory: '/prints/archive',
                responsible: {},
            });

            expect(project.quantity).toBe(1);
            expect(project.Id()).toBe('MAAS_7');
        });
    });

    describe('comments', () => {
        it('should keep only the edited comment after add, add, remove, edit', () => {
            const project = NewProject();

            expect(project.AddComment('First pass')).toBe(1);
            expect(project.AddComment('Second pass')).toBe(2);
            project.RemoveComment(1);
            project.EditComment(2, 'Second pass revised');

            expect(project.Comments()).toEqual([{ id: 2, body: `edited ${FIXED_TIME}: Second pass revised` }]);
            expect(project.ChangeCount('comment')).toBe(4);
            expect(project.History().map(entry => entry.description)).toEqual([
                'comment_1 added',
                'comment_2 added',
                'Comment 1 deleted',
                'Comment 2 edited',
            ]);
        });

        it('should prefix new comment bodies with the timestamp', () => {
            const project = NewProject();
            project.AddComment('Layer height 0.2');

            expect(project.Comments()).toEqual([{ id: 1, body: `${FIXED_TIME}: Layer height 0.2` }]);
        });

        it('should never reissue a comment id', () => {
            const project = NewProject();
            project.AddComment('one');
            project.RemoveComment(1);

            expect(project.AddComment('two')).toBe(2);
        });

        it('should reject unknown comment ids without touching the ledger', () => {
            const project = NewProject();

            expect(() => project.RemoveComment(9)).toThrow(NotFoundError);
            expect(() => project.EditComment(9, 'x')).toThrow('Comment 9 not found');
            expect(project.History()).toEqual([]);
        });
    });

    describe('field updates', () => {
        it('should record an identity change with old and new ids', () => {
            const project = NewProject();
            project.UpdateMasterId('MAAS');

            expect(project.Id()).toBe('MAAS_1');
            expect(project.ChangeLogEntries()).toEqual([
                {
                    category: 'identity',
                    sequence: 1,
                    timestamp: FIXED_TIME,
                    description: 'Subproject moved under master project MAAS. Project ID changed from HAM_1 to MAAS_1',
                },
            ]);
        });

        it('should replace one role and leave the others alone', () => {
            const project = NewProject();
            project.UpdateResponsible('Production', ['Dave']);

            expect(project.responsible).toEqual({ Design: ['Alice'], Production: ['Dave'] });
            expect(project.History()[0].description).toBe('Production updated to Dave');
        });

        it('should surface the post code of shipping info', () => {
            const project = NewProject();
            project.UpdateShippingInfo({ 'Post Code': '1234AB', City: 'Utrecht' });
            project.UpdateShippingInfo({ City: 'Delft' });

            expect(project.shippingInfo).toEqual({ City: 'Delft' });
            expect(project.History().map(entry => entry.description)).toEqual([
                'Shipping info updated to 1234AB',
                'Shipping info updated to Unknown',
            ]);
            expect(project.ChangeCount('shipping')).toBe(2);
        });

        it('should count each category separately', () => {
            const project = NewProject();
            project.UpdateStatus('Printing');
            project.UpdateQuantity(5);
            project.UpdateStatus('Done');
            project.UpdateName('Bracket');
            project.UpdateCustomerId('C-42');

            expect(project.ChangeCounters()).toEqual({
                identity: 0,
                file: 0,
                status: 2,
                responsible: 0,
                quantity: 1,
                name: 1,
                customer: 1,
                shipping: 0,
                comment: 0,
            });
            expect(project.status).toBe('Done');
            expect(project.projectName).toBe('Bracket');
            expect(project.customerId).toBe('C-42');
        });
    });

    describe('Apply', () => {
        it('should dispatch typed mutations', async () => {
            const project = NewProject();
            await project.Apply({ kind: 'updateQuantity', quantity: 5 });
            await project.Apply({ kind: 'addComment', text: 'Ready for slicing' });

            expect(project.quantity).toBe(5);
            expect(project.History().map(entry => entry.description)).toEqual(['Quantity updated to 5', 'comment_1 added']);
        });

        it('should reject a directory update that names no directory', async () => {
            const project = NewProject();

            await expect(project.Apply({ kind: 'updateFileDirectories' })).rejects.toBeInstanceOf(InvalidArgumentError);
            expect(project.History()).toEqual([]);
        });
    });

    describe('records', () => {
        it('should rebuild an equivalent project from its record', () => {
            const project = NewProject();
            project.AddComment('one');
            project.AddComment('two');
            project.RemoveComment(2);
            project.UpdateStatus('Printing');

            const restored = Project.FromRecord(project.ToRecord());

            expect(restored.ToRecord()).toEqual(project.ToRecord());
            expect(restored.AddComment('three')).toBe(3);
            expect(restored.ChangeCount('comment')).toBe(4);
        });
    });

    describe('rendering', () => {
        it('should render the info block with the change log', () => {
            const project = NewProject();
            project.UpdateStatus('Printing');

            expect(project.FormatInfo({ changeLog: true })).toBe(
                [
                    '--- Project Info for HAM_1 ---',
                    'Project Name: -',
                    'Customer ID: -',
                    'Status: Printing',
                    'Quantity: 2',
                    'Volume: 0',
                    'File: /prints/cube.stl',
                    'File Version: 1',
                    'Archive Directory: /prints/archive',
                    'Responsible: {"Design":["Alice"],"Production":["Bob","Carol"]}',
                    'Shipping Info: -',
                    '',
                    'Change log for project HAM_1:',
                    `  Status Change #1: ${FIXED_TIME}: Status changed to Printing`,
                ].join('\n'),
            );
        });

        it('should render comments in id order', () => {
            const project = NewProject();
            expect(project.FormatComments()).toBe('No comments.');

            project.AddComment('alpha');
            project.AddComment('beta');

            expect(project.FormatComments()).toBe(
                [
                    'Comments for project HAM_1:',
                    `  comment_1: ${FIXED_TIME}: alpha`,
                    `  comment_2: ${FIXED_TIME}: beta`,
                ].join('\n'),
            );
        });

        it('should print through the given sink', () => {
            const project = NewProject();
            const lines: string[] = [];
            project.PrintInfo({ comments: true }, text => lines.push(text));

            expect(lines).toHaveLength(1);
            expect(lines[0].endsWith('\n\nNo comments.')).toBe(true);
        });
    });
});

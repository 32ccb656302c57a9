import { describe, it, expect } from 'vitest';
import { DecodeProjectRecord, EncodeProjectRecord } from '../src/Project/ProjectCodec.js';
import { Project } from '../src/Project/Project.js';
import { SerializationError } from '../src/Common/Errors.js';
import type { ProjectRecord } from '../src/Domain/Project.js';

function SampleRecord(): ProjectRecord {
    const project = Project.Create({
        masterId: 'HAM',
        subId: 1,
        file: '/prints/cube.stl',
        archiveDirectory: '/prints/archive',
        responsible: { Design: ['Alice'] },
    });
    project.AddComment('first');
    project.UpdateShippingInfo({ 'Post Code': '1234AB' });
    return project.ToRecord();
}

describe('ProjectCodec', () => {
    it('should decode what it encodes', () => {
        const record = SampleRecord();

        expect(DecodeProjectRecord(EncodeProjectRecord(record))).toEqual(record);
    });

    it('should refuse to encode a record that would not decode', () => {
        const negative = { ...SampleRecord(), quantity: -1 };
        const unmeasured = { ...SampleRecord(), volume: Number.NaN };

        expect(() => EncodeProjectRecord(negative, 'ham.json')).toThrow(SerializationError);
        expect(() => EncodeProjectRecord(negative, 'ham.json')).toThrow(/^Record ham\.json cannot be written: /);
        expect(() => EncodeProjectRecord(unmeasured)).toThrow(SerializationError);
    });

    it('should reject malformed JSON', () => {
        expect(() => DecodeProjectRecord('{ not json', 'broken.json')).toThrow(SerializationError);
    });

    it('should reject records with missing or mistyped fields', () => {
        const { status: _status, ...withoutStatus } = SampleRecord();
        const mistyped = { ...SampleRecord(), quantity: '2' };

        expect(() => DecodeProjectRecord(JSON.stringify(withoutStatus))).toThrow(/failed validation/);
        expect(() => DecodeProjectRecord(JSON.stringify(mistyped))).toThrow(/failed validation/);
    });

    it('should reject an unknown schema version', () => {
        const record = { ...SampleRecord(), schemaVersion: 2 };

        expect(() => DecodeProjectRecord(JSON.stringify(record))).toThrow(SerializationError);
    });

    it('should reject a change log with a gap in a category', () => {
        const record = SampleRecord();
        record.changeLog.push({ category: 'comment', sequence: 3, timestamp: 't', description: 'comment_3 added' });

        expect(() => DecodeProjectRecord(JSON.stringify(record), 'gap.json')).toThrow(
            'Record gap.json has comment entry #3 where #2 was expected',
        );
    });

    it('should reject comment ids above the last issued id', () => {
        const record = SampleRecord();
        record.comments.push({ id: 5, body: 'ghost' });

        expect(() => DecodeProjectRecord(JSON.stringify(record), 'ghost.json')).toThrow(
            'Record ghost.json has an invalid comment id 5',
        );
    });
});

/**
 * Encodes projects to their record-file JSON and decodes them back, validating the
 * decoded document with Joi before any Project is built from it.
 */
import Joi from 'joi';
import { CHANGE_CATEGORIES, PROJECT_SCHEMA_VERSION } from '../Domain/Project.js';
import type { ChangeCategory, ProjectRecord } from '../Domain/Project.js';
import { ErrorMessage, SerializationError } from '../Common/Errors.js';

const changeLogEntrySchema = Joi.object({
    category: Joi.string()
        .valid(...CHANGE_CATEGORIES)
        .required(),
    sequence: Joi.number().integer().min(1).required(),
    timestamp: Joi.string().required(),
    description: Joi.string().allow(``).required(),
});

const commentSchema = Joi.object({
    id: Joi.number().integer().min(1).required(),
    body: Joi.string().allow(``).required(),
});

const projectRecordSchema = Joi.object<ProjectRecord>({
    schemaVersion: Joi.number().valid(PROJECT_SCHEMA_VERSION).required(),
    masterId: Joi.string().required(),
    subId: Joi.number().integer().required(),
    file: Joi.string().required(),
    fileVersion: Joi.number().integer().min(1).required(),
    archiveDirectory: Joi.string().required(),
    status: Joi.string().allow(``).required(),
    responsible: Joi.object()
        .pattern(Joi.string(), Joi.array().items(Joi.string().allow(``)))
        .required(),
    quantity: Joi.number().integer().min(0).required(),
    volume: Joi.number().required(),
    projectName: Joi.string().allow(``, null).required(),
    customerId: Joi.string().allow(``, null).required(),
    shippingInfo: Joi.object().pattern(Joi.string(), Joi.string().allow(``)).allow(null).required(),
    comments: Joi.array().items(commentSchema).required(),
    lastCommentId: Joi.number().integer().min(0).required(),
    changeLog: Joi.array().items(changeLogEntrySchema).required(),
});

/**
 * Serializes a record to the JSON stored in its record file.
 * The record is checked against the same schema `DecodeProjectRecord` applies, so nothing unreadable is written.
 * @throws SerializationError when the record would not decode again
 */
export function EncodeProjectRecord(record: ProjectRecord, target: string = `<memory>`): string {
    const result = projectRecordSchema.validate(record, { convert: false, abortEarly: false });
    if (result.error) {
        throw new SerializationError(`Record ${target} cannot be written: ${result.error.message}`, { source: target }, result.error);
    }
    return JSON.stringify(record, null, 2);
}

/**
 * Parses and validates a record file's content.
 * @param raw string - File content
 * @param source string - Where the content came from, for error details
 * @throws SerializationError on malformed JSON, schema violations or broken ledger sequences
 */
export function DecodeProjectRecord(raw: string, source: string = `<memory>`): ProjectRecord {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch(error) {
        throw new SerializationError(`Record ${source} is not valid JSON: ${ErrorMessage(error)}`, { source }, error);
    }

    const result = projectRecordSchema.validate(parsed, { convert: false, abortEarly: false });
    if (result.error) {
        throw new SerializationError(`Record ${source} failed validation: ${result.error.message}`, { source }, result.error);
    }
    const record = result.value;
    CheckLedgerSequences(record, source);
    CheckComments(record, source);
    return record;
}

/** Every category's entries must be numbered 1..n in append order. */
function CheckLedgerSequences(record: ProjectRecord, source: string): void {
    const seen = new Map<ChangeCategory, number>();
    for (const entry of record.changeLog) {
        const expected = (seen.get(entry.category) ?? 0) + 1;
        if (entry.sequence !== expected) {
            throw new SerializationError(
                `Record ${source} has ${entry.category} entry #${entry.sequence} where #${expected} was expected`,
                { source, category: entry.category },
            );
        }
        seen.set(entry.category, expected);
    }
}

/** Comment ids must be unique and never above the last issued id. */
function CheckComments(record: ProjectRecord, source: string): void {
    const ids = new Set<number>();
    for (const comment of record.comments) {
        if (ids.has(comment.id) || comment.id > record.lastCommentId) {
            throw new SerializationError(`Record ${source} has an invalid comment id ${comment.id}`, {
                source,
                commentId: comment.id,
            });
        }
        ids.add(comment.id);
    }
}

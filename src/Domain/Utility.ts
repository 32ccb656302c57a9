/**
 * Utility Types for the project ledger.
 * Event names and the result wrapper returned by store operations.
 */
import type { AppError } from '../Common/Errors.js';
import type { ValidatedConfig } from '../Types/Config.js';
import type { MutationKind } from './Mutation.js';

/**
 * Central enumeration of well-known event names for typed event bus helpers.
 */
export const EVENT_NAMES = {
    projectCreated: 'project.created',
    projectUpdated: 'project.updated',
    projectDeleted: 'project.deleted',
    projectOperationFailed: 'project.operationFailed',
    indexUpdated: 'index.updated',
    indexReset: 'index.reset',
    configLoaded: 'config.loaded',
    configError: 'config.error',
} as const;

/** Type union of event string literals. */
export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];

/** Payload carried by each event. */
export interface EventPayloads {
    'project.created': { projectId: string; filename: string };
    'project.updated': { projectId: string; previousId: string; kind: MutationKind; status: string };
    'project.deleted': { projectId: string; filename: string; recordRemoved: boolean };
    'project.operationFailed': { operation: string; projectId?: string; error: AppError };
    'index.updated': { size: number };
    'index.reset': { reason: string };
    'config.loaded': ValidatedConfig;
    'config.error': { path: string; error: AppError };
}

/** Outcome of a store operation: data on success, a typed error otherwise. */
export type StoreResult<T> = { ok: true; data: T } | { ok: false; error: AppError };

/** Builds a successful result. */
export function Ok<T>(data: T): StoreResult<T> {
    return { ok: true, data };
}

/** Builds a failed result. */
export function Fail<T>(error: AppError): StoreResult<T> {
    return { ok: false, error };
}

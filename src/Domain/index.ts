/**
 * Domain interfaces and types for the project ledger.
 */

// Project model
export type {
    ResponsibleMap,
    ShippingInfo,
    ChangeCategory,
    ChangeLogEntry,
    CommentEntry,
    ProjectRecord,
    NewProjectInput,
    ProjectInfo,
} from './Project.js';
export {
    CHANGE_CATEGORIES,
    CHANGE_CATEGORY_LABELS,
    DEFAULT_STATUS,
    PROJECT_SCHEMA_VERSION,
    ComposeProjectId,
} from './Project.js';

// Mutations
export type { ProjectMutation, MutationKind } from './Mutation.js';
export { MUTATION_PARAMETERS, AssertNever } from './Mutation.js';

// Repository Interfaces
export type { IndexEntry, IndexLoadOutcome, ProjectRecordRepository, ProjectIndexRepository } from './Repository.js';

// Utility Types
export type { EventName, EventPayloads, StoreResult } from './Utility.js';
export { EVENT_NAMES, Ok, Fail } from './Utility.js';

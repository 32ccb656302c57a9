/**
 * Project record model: identity, production fields, comments and the change ledger.
 */

/** Role name -> ordered assignee names (e.g. { Design: ['Alice'] }). */
export type ResponsibleMap = Record<string, string[]>;

/** Free-form shipping details. Only `Post Code` is read by the ledger. */
export type ShippingInfo = Record<string, string>;

/** Mutable field categories, one sequence counter each. */
export type ChangeCategory =
    | `identity`
    | `file`
    | `status`
    | `responsible`
    | `quantity`
    | `name`
    | `customer`
    | `shipping`
    | `comment`;

/** Human label per category, used to build legacy log keys ("Status Change #3"). */
export const CHANGE_CATEGORY_LABELS: Record<ChangeCategory, string> = {
    identity: `Project ID`,
    file: `Project File`,
    status: `Status`,
    responsible: `Responsible`,
    quantity: `Quantity`,
    name: `Name`,
    customer: `Customer ID`,
    shipping: `Shipping Info`,
    comment: `Comment`,
};

export const CHANGE_CATEGORIES: readonly ChangeCategory[] = [
    `identity`,
    `file`,
    `status`,
    `responsible`,
    `quantity`,
    `name`,
    `customer`,
    `shipping`,
    `comment`,
];

/** One append-only ledger entry. */
export interface ChangeLogEntry {
    category: ChangeCategory;
    sequence: number; // 1-based, per category
    timestamp: string; // ISO
    description: string;
}

/** One live comment. `body` embeds its creation or edit timestamp. */
export interface CommentEntry {
    id: number;
    body: string;
}

/** Persisted shape of a project (one record file). */
export interface ProjectRecord {
    schemaVersion: 1;
    masterId: string;
    subId: number;
    file: string;
    fileVersion: number;
    archiveDirectory: string;
    status: string;
    responsible: ResponsibleMap;
    quantity: number;
    volume: number;
    projectName: string | null;
    customerId: string | null;
    shippingInfo: ShippingInfo | null;
    comments: CommentEntry[];
    lastCommentId: number;
    changeLog: ChangeLogEntry[];
}

/** Fields required to open a new project. */
export interface NewProjectInput {
    masterId: string;
    subId: number;
    file: string;
    archiveDirectory: string;
    responsible: ResponsibleMap;
    quantity?: number;
}

/** Read-side snapshot returned by `GetInfo`. */
export interface ProjectInfo {
    'Project ID': string;
    'Project Name': string | null;
    'Customer ID': string | null;
    Status: string;
    Quantity: number;
    Volume: number;
    File: string;
    'File Version': number;
    'Archive Directory': string;
    Responsible: ResponsibleMap;
    'Shipping Info': ShippingInfo | null;
    Comments: Record<string, string>;
}

export const DEFAULT_STATUS = `Created`;
export const PROJECT_SCHEMA_VERSION = 1;

/** Composite identifier `{masterId}_{subId}`. */
export function ComposeProjectId(masterId: string, subId: number): string {
    return `${masterId}_${subId}`;
}

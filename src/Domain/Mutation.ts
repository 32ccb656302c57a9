/**
 * Closed set of project mutations. Each request names its operation in `kind`
 * and carries statically typed fields; the store dispatches with an exhaustive switch.
 */
import type { ShippingInfo } from './Project.js';

export interface AddCommentMutation {
    kind: `addComment`;
    text: string;
}

export interface RemoveCommentMutation {
    kind: `removeComment`;
    commentId: number;
}

export interface EditCommentMutation {
    kind: `editComment`;
    commentId: number;
    text: string;
}

export interface UpdateMasterIdMutation {
    kind: `updateMasterId`;
    masterId: string;
}

export interface UpdateFileMutation {
    kind: `updateFile`;
    filePath: string;
    newVersion: boolean;
}

export interface UpdateFileDirectoriesMutation {
    kind: `updateFileDirectories`;
    activeDirectory?: string;
    archiveDirectory?: string;
}

export interface UpdateStatusMutation {
    kind: `updateStatus`;
    status: string;
}

export interface UpdateResponsibleMutation {
    kind: `updateResponsible`;
    role: string;
    assignees: string[];
}

export interface UpdateQuantityMutation {
    kind: `updateQuantity`;
    quantity: number;
}

export interface UpdateNameMutation {
    kind: `updateName`;
    name: string;
}

export interface UpdateCustomerIdMutation {
    kind: `updateCustomerId`;
    customerId: string;
}

export interface UpdateShippingInfoMutation {
    kind: `updateShippingInfo`;
    shippingInfo: ShippingInfo;
}

export type ProjectMutation =
    | AddCommentMutation
    | RemoveCommentMutation
    | EditCommentMutation
    | UpdateMasterIdMutation
    | UpdateFileMutation
    | UpdateFileDirectoriesMutation
    | UpdateStatusMutation
    | UpdateResponsibleMutation
    | UpdateQuantityMutation
    | UpdateNameMutation
    | UpdateCustomerIdMutation
    | UpdateShippingInfoMutation;

export type MutationKind = ProjectMutation[`kind`];

/**
 * Positional parameter order per operation, used when a caller passes arguments as a list
 * or a single scalar instead of named fields.
 */
export const MUTATION_PARAMETERS: { [K in MutationKind]: ReadonlyArray<keyof Omit<Extract<ProjectMutation, { kind: K }>, `kind`>> } = {
    addComment: [`text`],
    removeComment: [`commentId`],
    editComment: [`commentId`, `text`],
    updateMasterId: [`masterId`],
    updateFile: [`filePath`, `newVersion`],
    updateFileDirectories: [`activeDirectory`, `archiveDirectory`],
    updateStatus: [`status`],
    updateResponsible: [`role`, `assignees`],
    updateQuantity: [`quantity`],
    updateName: [`name`],
    updateCustomerId: [`customerId`],
    updateShippingInfo: [`shippingInfo`],
};

/** Exhaustiveness guard for switches over `kind`. */
export function AssertNever(value: never): never {
    throw new Error(`Unhandled mutation: ${JSON.stringify(value)}`);
}

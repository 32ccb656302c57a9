/**
 * Turns an untyped front-end request (operation name + argument container) into a typed ProjectMutation.
 * Arguments may come as named fields (object), positional values (array) or a single scalar.
 */
import Joi, { type ObjectSchema } from 'joi';
import { MUTATION_PARAMETERS } from '../Domain/Mutation.js';
import type { MutationKind, ProjectMutation } from '../Domain/Mutation.js';
import { InvalidArgumentError, UnsupportedOperationError } from '../Common/Errors.js';

type MutationOf<K extends MutationKind> = Extract<ProjectMutation, { kind: K }>;

const text = Joi.string().allow(``);
const commentId = Joi.number().integer().min(1);

/** Per-kind argument schemas, shared by untyped parsing and typed validation. */
export const MUTATION_SCHEMAS: { [K in MutationKind]: ObjectSchema<MutationOf<K>> } = {
    addComment: Joi.object<MutationOf<`addComment`>>({
        kind: Joi.string().valid(`addComment`).required(),
        text: text.required(),
    }),
    removeComment: Joi.object<MutationOf<`removeComment`>>({
        kind: Joi.string().valid(`removeComment`).required(),
        commentId: commentId.required(),
    }),
    editComment: Joi.object<MutationOf<`editComment`>>({
        kind: Joi.string().valid(`editComment`).required(),
        commentId: commentId.required(),
        text: text.required(),
    }),
    updateMasterId: Joi.object<MutationOf<`updateMasterId`>>({
        kind: Joi.string().valid(`updateMasterId`).required(),
        masterId: Joi.string().required(),
    }),
    updateFile: Joi.object<MutationOf<`updateFile`>>({
        kind: Joi.string().valid(`updateFile`).required(),
        filePath: Joi.string().required(),
        newVersion: Joi.boolean().default(false),
    }),
    updateFileDirectories: Joi.object<MutationOf<`updateFileDirectories`>>({
        kind: Joi.string().valid(`updateFileDirectories`).required(),
        activeDirectory: Joi.string(),
        archiveDirectory: Joi.string(),
    }),
    updateStatus: Joi.object<MutationOf<`updateStatus`>>({
        kind: Joi.string().valid(`updateStatus`).required(),
        status: text.required(),
    }),
    updateResponsible: Joi.object<MutationOf<`updateResponsible`>>({
        kind: Joi.string().valid(`updateResponsible`).required(),
        role: Joi.string().required(),
        assignees: Joi.array().items(Joi.string()).required(),
    }),
    updateQuantity: Joi.object<MutationOf<`updateQuantity`>>({
        kind: Joi.string().valid(`updateQuantity`).required(),
        quantity: Joi.number().integer().min(0).required(),
    }),
    updateName: Joi.object<MutationOf<`updateName`>>({
        kind: Joi.string().valid(`updateName`).required(),
        name: text.required(),
    }),
    updateCustomerId: Joi.object<MutationOf<`updateCustomerId`>>({
        kind: Joi.string().valid(`updateCustomerId`).required(),
        customerId: text.required(),
    }),
    updateShippingInfo: Joi.object<MutationOf<`updateShippingInfo`>>({
        kind: Joi.string().valid(`updateShippingInfo`).required(),
        shippingInfo: Joi.object().pattern(Joi.string(), Joi.string().allow(``)).required(),
    }),
};

/** True when the name is one of the known mutation kinds. */
export function IsMutationKind(name: string): name is MutationKind {
    return Object.prototype.hasOwnProperty.call(MUTATION_PARAMETERS, name);
}

/**
 * Resolves an operation name to a mutation kind. Accepts the kind itself (`updateStatus`)
 * or its snake_case spelling (`update_status`).
 * @throws UnsupportedOperationError for unknown names
 */
export function ResolveMutationKind(operation: string): MutationKind {
    const camel = operation.trim().replace(/_([a-z])/g, (_match, letter: string) => letter.toUpperCase());
    if (!IsMutationKind(camel)) {
        throw new UnsupportedOperationError(`Action '${operation}' not valid for Project`, { operation });
    }
    return camel;
}

function IsPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === `object` && value !== null && !Array.isArray(value);
}

/** Maps the argument container onto named fields. */
function NameArguments(kind: MutationKind, args: unknown): Record<string, unknown> {
    const parameters: readonly string[] = MUTATION_PARAMETERS[kind];
    if (args === undefined || args === null) {
        return {};
    }
    if (IsPlainObject(args)) {
        return { ...args };
    }
    if (Array.isArray(args)) {
        if (args.length > parameters.length) {
            throw new InvalidArgumentError(
                `'${kind}' takes at most ${parameters.length} argument(s), got ${args.length}`,
                { operation: kind },
            );
        }
        const named: Record<string, unknown> = {};
        args.forEach((value: unknown, position) => {
            named[parameters[position]] = value;
        });
        return named;
    }
    return { [parameters[0]]: args };
}

/**
 * Checks a typed mutation against its kind's schema and returns it with defaults applied.
 * Typed callers can still carry values the record cannot hold (negative quantity, empty id, NaN).
 * @throws InvalidArgumentError when a field is missing, out of range or of the wrong type
 * @example
 * ValidateMutation({ kind: 'updateQuantity', quantity: -1 }); // throws
 */
export function ValidateMutation(mutation: ProjectMutation): ProjectMutation {
    return __validate(mutation.kind, mutation);
}

function __validate(kind: MutationKind, candidate: object): ProjectMutation {
    const result = MUTATION_SCHEMAS[kind].validate(candidate, { abortEarly: false });
    if (result.error) {
        throw new InvalidArgumentError(`Invalid arguments for '${kind}': ${result.error.message}`, {
            operation: kind,
        });
    }
    return result.value;
}

/**
 * Builds a typed mutation from an operation name and its arguments.
 * @example
 * ParseMutation('update_file', ['/prints/cube_v2.stl', true]);
 * // { kind: 'updateFile', filePath: '/prints/cube_v2.stl', newVersion: true }
 * @throws UnsupportedOperationError for unknown operations
 * @throws InvalidArgumentError for missing, extra or mistyped arguments
 */
export function ParseMutation(operation: string, args?: unknown): ProjectMutation {
    const kind = ResolveMutationKind(operation);
    return __validate(kind, { ...NameArguments(kind, args), kind });
}

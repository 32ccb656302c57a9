/**
 * Error taxonomy for the project ledger.
 * Every failure carries a machine-readable code, optional structured details and the original cause.
 *
 * Conventions:
 * - Class names are PascalCase.
 * - Error codes are SNAKE_CASE and globally unique.
 * - Use specific subclasses instead of the base `AppError` wherever possible.
 */

/** Well-known application error codes. */
export const ERROR_CODES = {
    NOT_FOUND: 'NOT_FOUND',
    INVALID_ARGUMENT: 'INVALID_ARGUMENT',
    IO_FAILURE: 'IO_FAILURE',
    SERIALIZATION_FAILURE: 'SERIALIZATION_FAILURE',
    CONFLICT: 'CONFLICT',
    UNSUPPORTED_OPERATION: 'UNSUPPORTED_OPERATION',
    INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

/** Union type of all known error code string literals. */
export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/** Structured diagnostic metadata attached to an error. */
export type ErrorDetails = Record<string, unknown>;

/**
 * Base application error carrying a machine code and structured details.
 */
export class AppError extends Error {
    /** Machine readable error code (SNAKE_CASE). */
    public readonly code: ErrorCode;
    /** Structured metadata for diagnostics (record ids, paths, etc.). */
    public readonly details?: ErrorDetails;
    /** Underlying cause error (if any). */
    public readonly cause?: unknown;

    /**
     * @param code ErrorCode - Machine error code (see ERROR_CODES)
     * @param message string - Human readable summary
     * @param details ErrorDetails|undefined - Additional structured context
     * @param cause unknown - Original error object or value
     */
    constructor(code: ErrorCode, message: string, details?: ErrorDetails, cause?: unknown) {
        super(message);
        this.name = new.target.name;
        this.code = code;
        this.details = details;
        this.cause = cause;
        // Maintain proper prototype chain (TS/JS quirk)
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/** NotFoundError when a requested project, comment or file does not exist. */
export class NotFoundError extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ERROR_CODES.NOT_FOUND, message, details);
    }
}

/** InvalidArgumentError indicates a malformed or contradictory request. */
export class InvalidArgumentError extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ERROR_CODES.INVALID_ARGUMENT, message, details);
    }
}

/** IOFailureError represents filesystem failures (move, mkdir, unlink, write). */
export class IOFailureError extends AppError {
    constructor(message: string, details?: ErrorDetails, cause?: unknown) {
        super(ERROR_CODES.IO_FAILURE, message, details, cause);
    }
}

/** SerializationError for unreadable or corrupt persisted records and indexes. */
export class SerializationError extends AppError {
    constructor(message: string, details?: ErrorDetails, cause?: unknown) {
        super(ERROR_CODES.SERIALIZATION_FAILURE, message, details, cause);
    }
}

/** ConflictError for duplicate project identifiers. */
export class ConflictError extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ERROR_CODES.CONFLICT, message, details);
    }
}

/** UnsupportedOperationError when a mutation name is not one of the known operations. */
export class UnsupportedOperationError extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ERROR_CODES.UNSUPPORTED_OPERATION, message, details);
    }
}

/** Generic internal error wrapper when no more specific category applies. */
export class InternalError extends AppError {
    constructor(message: string, details?: ErrorDetails, cause?: unknown) {
        super(ERROR_CODES.INTERNAL_ERROR, message, details, cause);
    }
}

/**
 * Extracts a printable message from any thrown value.
 * @example
 * ErrorMessage(new Error('boom')); // 'boom'
 */
export function ErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return typeof error === `string` ? error : String(error);
}

/**
 * Normalizes any thrown value into an AppError, keeping AppErrors as they are.
 * @param error unknown - Caught value
 * @param fallbackMessage string - Prefix used when wrapping a foreign error
 */
export function ToAppError(error: unknown, fallbackMessage: string = `Unexpected failure`): AppError {
    if (error instanceof AppError) {
        return error;
    }
    return new InternalError(`${fallbackMessage}: ${ErrorMessage(error)}`, undefined, error);
}

/** True when the value is a Node.js system error carrying the given errno code (e.g. 'ENOENT'). */
export function IsErrnoCode(error: unknown, code: string): boolean {
    return error instanceof Error && `code` in error && error.code === code;
}

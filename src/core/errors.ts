/**
 * InterceptorError: Error Taxonomy of the Interceptor Engine
 *
 * A single error class with a discriminating `code`. Every error that
 * concerns one interceptor carries its `interceptorId` so operators can
 * pinpoint which registration misbehaved. Wrapped errors keep the
 * original as `cause`.
 *
 * @example
 * ```typescript
 * try {
 *     await engine.executeChain({ interceptorIds: ['redact'], event, phase, payload });
 * } catch (e) {
 *     if (isInterceptorError(e, 'MUTATION_FAILED')) {
 *         console.log(e.interceptorId); // "redact"
 *         console.log(e.cause);         // what the handler threw
 *     }
 * }
 * ```
 *
 * @module
 */
import { type ZodError } from 'zod';
import { type ChainResult } from '../domain/Interceptor.js';

// ── Codes ────────────────────────────────────────────────

export type InterceptorErrorCode =
    | 'DUPLICATE_ID'
    | 'INVALID_DEFINITION'
    | 'UNKNOWN_INTERCEPTOR_ID'
    | 'MISSING_REQUIRED_PARAMETER'
    | 'PARAMETER_BINDING_FAILURE'
    | 'HANDLER_FAILURE'
    | 'SERIALIZATION_ERROR'
    | 'MUTATION_FAILED'
    | 'CANCELLED'
    | 'INVALID_CURSOR'
    | 'ENGINE_SHUT_DOWN';

/**
 * Codes the caller can fix by changing the request.
 * Tracing leaves these spans `UNSET`; everything else is a system failure.
 */
const CALLER_FIXABLE: ReadonlySet<InterceptorErrorCode> = new Set<InterceptorErrorCode>([
    'UNKNOWN_INTERCEPTOR_ID',
    'MISSING_REQUIRED_PARAMETER',
    'SERIALIZATION_ERROR',
    'INVALID_CURSOR',
]);

export interface InterceptorErrorOptions {
    readonly interceptorId?: string;
    readonly parameter?: string;
    readonly cause?: unknown;
}

// ── Error Class ──────────────────────────────────────────

export class InterceptorError extends Error {
    readonly code: InterceptorErrorCode;
    /** The interceptor this error concerns, when there is one */
    readonly interceptorId?: string;
    /** The parameter that could not be bound, for binding errors */
    readonly parameter?: string;

    constructor(code: InterceptorErrorCode, message: string, options: InterceptorErrorOptions = {}) {
        super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
        this.name = 'InterceptorError';
        this.code = code;
        if (options.interceptorId !== undefined) this.interceptorId = options.interceptorId;
        if (options.parameter !== undefined) this.parameter = options.parameter;
    }

    /** Whether a client can fix this error by changing its request. */
    get callerFixable(): boolean {
        return CALLER_FIXABLE.has(this.code);
    }
}

/**
 * Raised when the mutation group of a chain fails.
 *
 * The validation group still ran; its findings and the payload as it
 * stood before the failing step are available on `partial`.
 */
export class ChainMutationError extends InterceptorError {
    readonly partial: ChainResult;

    constructor(interceptorId: string, cause: unknown, partial: ChainResult) {
        super(
            'MUTATION_FAILED',
            `Mutation interceptor "${interceptorId}" failed: ${describeCause(cause)}`,
            { interceptorId, cause },
        );
        this.name = 'ChainMutationError';
        this.partial = partial;
    }
}

// ── Guards & Helpers ─────────────────────────────────────

export function isInterceptorError(value: unknown, code?: InterceptorErrorCode): value is InterceptorError {
    if (!(value instanceof InterceptorError)) return false;
    return code === undefined || value.code === code;
}

/** Human-readable text of anything that was thrown. */
export function describeCause(cause: unknown): string {
    if (cause instanceof Error) return cause.message;
    if (typeof cause === 'string') return cause;
    try {
        return JSON.stringify(cause) ?? String(cause);
    } catch {
        return String(cause);
    }
}

/**
 * Flatten Zod issues into a single line per field.
 *
 * @example `'limit': Expected number, received string`
 */
export function formatZodIssues(error: ZodError): string {
    return error.issues
        .map(issue => {
            const path = issue.path.length > 0 ? `'${issue.path.join('.')}'` : '(root)';
            return `${path}: ${issue.message}`;
        })
        .join('; ');
}

// ── Factories ────────────────────────────────────────────

export function duplicateId(id: string): InterceptorError {
    return new InterceptorError('DUPLICATE_ID', `Interceptor "${id}" is already registered.`, { interceptorId: id });
}

export function unknownInterceptorId(id: string): InterceptorError {
    return new InterceptorError('UNKNOWN_INTERCEPTOR_ID', `Interceptor "${id}" does not exist.`, { interceptorId: id });
}

export function handlerFailure(id: string, cause: unknown): InterceptorError {
    if (isInterceptorError(cause, 'CANCELLED')) return cause;
    return new InterceptorError(
        'HANDLER_FAILURE',
        `Interceptor "${id}" threw: ${describeCause(cause)}`,
        { interceptorId: id, cause },
    );
}

export function cancelled(id: string | undefined, reason?: unknown): InterceptorError {
    const message = id !== undefined
        ? `Execution of interceptor "${id}" was cancelled.`
        : 'Execution was cancelled.';
    return new InterceptorError(
        'CANCELLED',
        message,
        { ...(id !== undefined ? { interceptorId: id } : {}), cause: reason },
    );
}

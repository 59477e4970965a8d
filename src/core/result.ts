/**
 * Result\<T\>: Railway-Oriented Pipeline Steps
 *
 * A discriminated union for expressing success/failure in the binding
 * and resolution steps without throwing mid-pipeline. The caller decides
 * when a `Failure` becomes a thrown {@link InterceptorError}.
 *
 * @example
 * ```typescript
 * const bound = await bindArguments(params, request, ctx);
 * if (!bound.ok) throw bound.error;
 * handler(bound.value);
 * ```
 *
 * @module
 */
import { type InterceptorError } from './errors.js';

export interface Success<T> {
    readonly ok: true;
    readonly value: T;
}

export interface Failure {
    readonly ok: false;
    readonly error: InterceptorError;
}

export type Result<T> = Success<T> | Failure;

export function succeed<T>(value: T): Success<T> {
    return { ok: true, value };
}

export function fail(error: InterceptorError): Failure {
    return { ok: false, error };
}

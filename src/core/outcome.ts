/**
 * Interceptor Outcomes: Tagged Return Values for Handlers
 *
 * Handlers return one of three tagged variants matching their kind:
 *
 * - {@link modified}: a new payload (mutation interceptors)
 * - {@link findings}: validation findings (any kind)
 * - {@link metadata}: metadata only (any kind)
 *
 * The invocation engine checks the variant against the interceptor's
 * declared kind. Validators may also return bare findings, and mutators
 * a bare payload value.
 *
 * @example
 * ```typescript
 * handler: ({ text }) => text.includes('@')
 *     ? findings(warning('Possible email address', '$.text'))
 *     : findings([]),
 * ```
 *
 * @module
 */
import {
    type Finding,
    type InterceptorMetadata,
    Severity,
} from '../domain/Interceptor.js';

// ── Variants ─────────────────────────────────────────────

export interface ModifiedOutcome {
    readonly __brand: 'InterceptorOutcome';
    readonly type: 'modified';
    readonly payload: unknown;
    readonly metadata?: InterceptorMetadata;
}

export interface FindingsOutcome {
    readonly __brand: 'InterceptorOutcome';
    readonly type: 'findings';
    readonly findings: readonly Finding[];
    readonly metadata?: InterceptorMetadata;
}

export interface MetadataOutcome {
    readonly __brand: 'InterceptorOutcome';
    readonly type: 'metadata';
    readonly metadata: InterceptorMetadata;
}

export type InterceptorOutcome = ModifiedOutcome | FindingsOutcome | MetadataOutcome;

// ── Constructors ─────────────────────────────────────────

/** A replacement payload, optionally with metadata. */
export function modified(payload: unknown, meta?: InterceptorMetadata): ModifiedOutcome {
    return { __brand: 'InterceptorOutcome', type: 'modified', payload, ...(meta ? { metadata: meta } : {}) };
}

/** One or more findings, optionally with metadata. An empty list means "valid". */
export function findings(list: Finding | readonly Finding[], meta?: InterceptorMetadata): FindingsOutcome {
    const items: readonly Finding[] = isFindingList(list) ? list : [list];
    return { __brand: 'InterceptorOutcome', type: 'findings', findings: items, ...(meta ? { metadata: meta } : {}) };
}

/** Metadata only. */
export function metadata(meta: InterceptorMetadata): MetadataOutcome {
    return { __brand: 'InterceptorOutcome', type: 'metadata', metadata: meta };
}

function isFindingList(value: Finding | readonly Finding[]): value is readonly Finding[] {
    return Array.isArray(value);
}

// ── Finding Shortcuts ────────────────────────────────────

export function finding(severity: Severity, message: string, path?: string): Finding {
    return path !== undefined ? { severity, message, path } : { severity, message };
}

export const info = (message: string, path?: string): Finding => finding(Severity.Info, message, path);
export const warning = (message: string, path?: string): Finding => finding(Severity.Warning, message, path);
export const error = (message: string, path?: string): Finding => finding(Severity.Error, message, path);

// ── Guard ────────────────────────────────────────────────

/** @internal */
export function isInterceptorOutcome(value: unknown): value is InterceptorOutcome {
    return (
        typeof value === 'object' &&
        value !== null &&
        '__brand' in value &&
        value.__brand === 'InterceptorOutcome'
    );
}

/**
 * Interceptor: Domain Model for Interceptor Descriptors
 *
 * Leaf data types shared by every layer of the engine: the immutable
 * descriptor of a registered interceptor, the request/result shapes of a
 * single invocation and of a chain, and the validation finding.
 *
 * Enum values are the PascalCase member names, as they appear on the wire.
 *
 * @module
 */

// ── Enums ────────────────────────────────────────────────

/**
 * Execution model of an interceptor.
 *
 * - `Validation`: runs in parallel on the original payload, produces findings
 * - `Mutation`: runs sequentially, each step transforms the payload
 * - `Observability`: detached, fire-and-forget
 */
export const InterceptorKind = {
    Validation: 'Validation',
    Mutation: 'Mutation',
    Observability: 'Observability',
} as const;

export type InterceptorKind = typeof InterceptorKind[keyof typeof InterceptorKind];

/** Whether an interceptor applies to an incoming request or an outgoing response. */
export const InterceptorPhase = {
    Request: 'Request',
    Response: 'Response',
} as const;

export type InterceptorPhase = typeof InterceptorPhase[keyof typeof InterceptorPhase];

/** Severity of a validation finding. */
export const Severity = {
    Info: 'Info',
    Warning: 'Warning',
    Error: 'Error',
} as const;

export type Severity = typeof Severity[keyof typeof Severity];

// ── Records ──────────────────────────────────────────────

/**
 * Immutable description of one registered interceptor.
 *
 * Frozen at registration time. `id` is the only key.
 */
export interface InterceptorDescriptor {
    readonly id: string;
    /** Display name (defaults to `id`) */
    readonly name: string;
    readonly description?: string;
    readonly kind: InterceptorKind;
    /** Lower runs earlier; ties are broken by `id` */
    readonly priority: number;
    /** Empty = applies to every event */
    readonly applicableEvents: readonly string[];
    /** Empty = applies to both phases */
    readonly applicablePhases: readonly InterceptorPhase[];
}

/** A single validation outcome. */
export interface Finding {
    readonly severity: Severity;
    readonly message: string;
    /** Optional JSON path into the payload, e.g. `$.user.email` */
    readonly path?: string;
}

/** Free-form key/value metadata returned by an interceptor. */
export type InterceptorMetadata = Readonly<Record<string, unknown>>;

/** Target of a single-interceptor invocation. */
export interface InvocationRequest {
    readonly interceptorId: string;
    /** Protocol operation name, e.g. `tools/call` */
    readonly event: string;
    readonly phase: InterceptorPhase;
    readonly payload?: unknown;
    readonly progressToken?: string | number;
}

/** Normalized output of one invocation. */
export interface InvocationResult {
    /** Present only for mutation interceptors that produced a payload */
    readonly modifiedPayload?: unknown;
    readonly validationResults?: readonly Finding[];
    readonly metadata?: InterceptorMetadata;
}

/** A request to execute several interceptors together. */
export interface ChainRequest {
    /** Advisory order only; execution order is recomputed */
    readonly interceptorIds: readonly string[];
    readonly event: string;
    readonly phase: InterceptorPhase;
    readonly payload?: unknown;
    readonly progressToken?: string | number;
}

/** Aggregated outcome of a chain. */
export interface ChainResult {
    readonly modifiedPayload?: unknown;
    readonly allValidationResults: readonly Finding[];
    /** Metadata of every mutation and validation step, keyed by interceptor id */
    readonly metadata: Readonly<Record<string, InterceptorMetadata>>;
}

// ── Ordering & Applicability ─────────────────────────────

/**
 * Canonical ordering: `(priority ascending, id ascending)`.
 * Ids compare by UTF-16 code unit, never by locale.
 */
export function compareDescriptors(
    a: Pick<InterceptorDescriptor, 'priority' | 'id'>,
    b: Pick<InterceptorDescriptor, 'priority' | 'id'>,
): number {
    if (a.priority !== b.priority) return a.priority - b.priority;
    if (a.id === b.id) return 0;
    return a.id < b.id ? -1 : 1;
}

/** Return a new array sorted by {@link compareDescriptors}. */
export function sortByPriority<T extends Pick<InterceptorDescriptor, 'priority' | 'id'>>(
    items: readonly T[],
): T[] {
    return [...items].sort(compareDescriptors);
}

export function appliesToPhase(descriptor: InterceptorDescriptor, phase: InterceptorPhase): boolean {
    return descriptor.applicablePhases.length === 0 || descriptor.applicablePhases.includes(phase);
}

export function appliesToEvent(descriptor: InterceptorDescriptor, event: string): boolean {
    return descriptor.applicableEvents.length === 0 || descriptor.applicableEvents.includes(event);
}

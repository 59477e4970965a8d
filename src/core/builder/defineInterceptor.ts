/**
 * defineInterceptor(): Explicit Interceptor Registration Units
 *
 * Builds an {@link InterceptorDefinition}: a frozen descriptor, the
 * normalized parameter declarations and the handler. The definition is
 * what {@link InterceptorRegistry.register} accepts; a discovery adapter
 * (decorators, file scanning) only needs to produce these.
 *
 * The handler's argument type is inferred from `params`, and its return
 * type is constrained by `kind`.
 *
 * @example
 * ```typescript
 * import { defineInterceptor, modified, p } from 'mcp-interceptors';
 *
 * export const redactEmails = defineInterceptor('email-redactor', {
 *     kind: 'Mutation',
 *     name: 'Email Redaction',
 *     priority: 10,
 *     params: { payload: p.context('payload') },
 *     handler: ({ payload }) => modified(redact(payload), { redacted: true }),
 * });
 * ```
 *
 * @module
 */
import {
    type Finding,
    type InterceptorDescriptor,
    InterceptorKind,
    type InterceptorMetadata,
    type InterceptorPhase,
    type InvocationRequest,
} from '../../domain/Interceptor.js';
import { KindSchema, PhaseSchema } from '../schema/ProtocolSchemas.js';
import { InterceptorError } from '../errors.js';
import {
    normalizeParams,
    type InferArgs,
    type NormalizedParam,
    type ParamsMap,
} from '../binding/ParamDescriptors.js';
import { type BoundArguments } from '../binding/ParameterBinder.js';
import { type ServiceResolver } from '../binding/ServiceResolver.js';
import { type SessionHandle } from '../binding/InvocationContext.js';
import { type ProgressEvent } from '../execution/ProgressHelper.js';
import {
    type FindingsOutcome,
    type InterceptorOutcome,
    type MetadataOutcome,
} from '../outcome.js';

// ============================================================================
// Handler Return Types
// ============================================================================

/** What a validator may return. `void` means "no findings". */
export type ValidationReturn = FindingsOutcome | MetadataOutcome | Finding | readonly Finding[] | void;

/** What an observer may return. */
export type ObservabilityReturn = MetadataOutcome | void;

/** What a mutator may return: a tagged outcome or the new payload itself. */
export type MutationReturn = InterceptorOutcome | InterceptorMetadata | string | number | boolean | null | unknown[] | void;

export type ReturnFor<K extends InterceptorKind> =
    K extends typeof InterceptorKind.Mutation ? MutationReturn :
    K extends typeof InterceptorKind.Validation ? ValidationReturn :
    ObservabilityReturn;

/** Sync, async, or an async generator yielding progress. */
export type HandlerResult<K extends InterceptorKind> =
    | ReturnFor<K>
    | Promise<ReturnFor<K>>
    | AsyncGenerator<ProgressEvent, ReturnFor<K>, undefined>;

// ============================================================================
// Config & Definition
// ============================================================================

/** Values available to a per-call target factory. */
export interface TargetContext {
    readonly request: InvocationRequest;
    readonly services: ServiceResolver;
    readonly session: SessionHandle;
    readonly signal: AbortSignal;
}

export interface InterceptorConfig<
    K extends InterceptorKind,
    TParams extends ParamsMap,
    TTarget,
> {
    readonly kind: K;
    /** Display name (defaults to the id) */
    readonly name?: string;
    readonly description?: string;
    /** Lower runs earlier (default 0) */
    readonly priority?: number;
    /** Event names this interceptor applies to; omit for all events */
    readonly events?: readonly string[];
    /** Phases this interceptor applies to; omit for both */
    readonly phases?: readonly InterceptorPhase[];
    readonly params?: TParams;
    /**
     * Per-call target, created after binding and disposed after the
     * handler settles (`Symbol.asyncDispose`, `Symbol.dispose`,
     * `dispose()` or `close()`).
     */
    readonly target?: (ctx: TargetContext) => TTarget | Promise<TTarget>;
    readonly handler: (args: InferArgs<TParams>, target: TTarget) => HandlerResult<K>;
}

/** A registrable interceptor: descriptor plus type-erased callable. */
export interface InterceptorDefinition {
    readonly descriptor: InterceptorDescriptor;
    readonly params: readonly NormalizedParam[];
    readonly createTarget?: (ctx: TargetContext) => unknown;
    readonly handler: (args: BoundArguments, target: unknown) => unknown;
}

// ============================================================================
// Factory
// ============================================================================

function invalid(id: string, reason: string): InterceptorError {
    return new InterceptorError('INVALID_DEFINITION', `Interceptor "${id}": ${reason}`, { interceptorId: id });
}

/**
 * Build and freeze a descriptor, validating every field.
 *
 * @throws InterceptorError `INVALID_DEFINITION`
 */
export function createDescriptor(id: string, config: {
    readonly kind: string;
    readonly name?: string;
    readonly description?: string;
    readonly priority?: number;
    readonly events?: readonly string[];
    readonly phases?: readonly string[];
}): InterceptorDescriptor {
    if (typeof id !== 'string' || id.trim().length === 0) {
        throw invalid(String(id), 'id must be a non-empty string.');
    }
    const kind = KindSchema.safeParse(config.kind);
    if (!kind.success) {
        throw invalid(id, `unknown kind "${config.kind}". Use ${KindSchema.options.join(', ')}.`);
    }
    const priority = config.priority ?? 0;
    if (!Number.isSafeInteger(priority)) {
        throw invalid(id, `priority must be an integer, got ${priority}.`);
    }
    const phases: InterceptorPhase[] = [];
    for (const phase of config.phases ?? []) {
        const parsed = PhaseSchema.safeParse(phase);
        if (!parsed.success) throw invalid(id, `unknown phase "${phase}".`);
        if (!phases.includes(parsed.data)) phases.push(parsed.data);
    }

    return Object.freeze({
        id,
        name: config.name ?? id,
        ...(config.description !== undefined ? { description: config.description } : {}),
        kind: kind.data,
        priority,
        applicableEvents: Object.freeze([...new Set(config.events ?? [])]),
        applicablePhases: Object.freeze(phases),
    });
}

/**
 * Define an interceptor.
 *
 * @param id - Globally unique, immutable id
 * @param config - Kind, ordering, applicability, params and handler
 * @throws InterceptorError `INVALID_DEFINITION` on an invalid descriptor or params map
 */
export function defineInterceptor<
    K extends InterceptorKind,
    TParams extends ParamsMap = Record<never, never>,
    TTarget = undefined,
>(id: string, config: InterceptorConfig<K, TParams, TTarget>): InterceptorDefinition {
    const descriptor = createDescriptor(id, config);

    let params: readonly NormalizedParam[];
    try {
        params = normalizeParams(config.params);
    } catch (err) {
        throw invalid(id, err instanceof Error ? err.message : String(err));
    }

    const createTarget = config.target;
    const handler = config.handler;

    return Object.freeze({
        descriptor,
        params,
        ...(createTarget ? { createTarget: (ctx: TargetContext) => createTarget(ctx) } : {}),
        // Arguments are bound from this same params map and the target from
        // this same factory, so they match the handler's declared types.
        handler: (args: BoundArguments, target: unknown) =>
            handler(args as InferArgs<TParams>, target as TTarget),
    });
}

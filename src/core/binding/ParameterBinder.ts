/**
 * ParameterBinder: Resolves One Invocation's Arguments
 *
 * For each declared parameter, first match wins:
 *
 * 1. well-known context values (signal, services, session, progress, ...)
 * 2. service parameters, and payload parameters whose `serviceToken`
 *    the resolver reports it can satisfy
 * 3. payload fields matched by name and decoded with the parameter schema
 *
 * The original payload is never handed out: every payload-derived value
 * is a structured clone, so a handler mutating its input cannot affect
 * the caller or another interceptor.
 *
 * Pure-function module: no state.
 *
 * @module
 */
import { type InvocationRequest } from '../../domain/Interceptor.js';
import {
    InterceptorError,
    describeCause,
    formatZodIssues,
} from '../errors.js';
import { type Result, succeed, fail } from '../result.js';
import { createProgressEmitter } from '../execution/ProgressHelper.js';
import { type InvocationContext } from './InvocationContext.js';
import {
    type NormalizedParam,
    type ContextValue,
    type ContextValueMap,
    type ServiceParam,
    type FieldParam,
} from './ParamDescriptors.js';
import { tokenName, type ServiceLookup } from './ServiceResolver.js';

/** Bound arguments, keyed by parameter name. */
export type BoundArguments = Record<string, unknown>;

// ── Payload Helpers ──────────────────────────────────────

function isPayloadObject(payload: unknown): payload is Record<string, unknown> {
    return typeof payload === 'object' && payload !== null && !Array.isArray(payload);
}

/** Structured clone that tolerates `undefined`. */
export function clonePayload<T>(payload: T): T {
    return payload === undefined ? payload : structuredClone(payload);
}

// ── Per-Source Binding Steps ─────────────────────────────

function bindContext(
    value: ContextValue,
    request: InvocationRequest,
    ctx: InvocationContext,
): ContextValueMap[ContextValue] {
    switch (value) {
        case 'signal': return ctx.signal;
        case 'services': return ctx.services;
        case 'session': return ctx.session;
        case 'progress': return createProgressEmitter(ctx.progressSink);
        case 'request': return { ...request, payload: clonePayload(request.payload) };
        case 'payload': return clonePayload(request.payload);
    }
}

async function bindService(
    param: ServiceParam & { readonly name: string },
    request: InvocationRequest,
    ctx: InvocationContext,
): Promise<Result<unknown>> {
    let lookup: ServiceLookup<unknown>;
    try {
        lookup = param.key !== undefined
            ? await ctx.services.resolveKeyed(param.token, param.key)
            : await ctx.services.resolve(param.token);
    } catch (err) {
        return fail(new InterceptorError(
            'PARAMETER_BINDING_FAILURE',
            `Interceptor "${request.interceptorId}": resolving service ${tokenName(param.token)} ` +
            `for parameter "${param.name}" failed: ${describeCause(err)}`,
            { interceptorId: request.interceptorId, parameter: param.name, cause: err },
        ));
    }

    if (lookup.found) return succeed(lookup.value);
    if (param.optional) return succeed(undefined);

    const keyed = param.key !== undefined ? ` (key ${String(param.key)})` : '';
    return fail(new InterceptorError(
        'MISSING_REQUIRED_PARAMETER',
        `Interceptor "${request.interceptorId}": no service ${tokenName(param.token)}${keyed} ` +
        `is available for parameter "${param.name}".`,
        { interceptorId: request.interceptorId, parameter: param.name },
    ));
}

function bindField(
    param: FieldParam & { readonly name: string },
    request: InvocationRequest,
): Result<unknown> {
    const payload = request.payload;
    const present = isPayloadObject(payload) && Object.hasOwn(payload, param.name);
    const raw = present ? clonePayload(payload[param.name]) : undefined;

    const parsed = param.schema.safeParse(raw);
    if (parsed.success) return succeed(parsed.data);

    if (!present) {
        return fail(new InterceptorError(
            'MISSING_REQUIRED_PARAMETER',
            `Interceptor "${request.interceptorId}": required parameter "${param.name}" ` +
            'is missing from the payload.',
            { interceptorId: request.interceptorId, parameter: param.name },
        ));
    }

    return fail(new InterceptorError(
        'SERIALIZATION_ERROR',
        `Interceptor "${request.interceptorId}": payload field "${param.name}" ` +
        `does not match the expected shape: ${formatZodIssues(parsed.error)}`,
        { interceptorId: request.interceptorId, parameter: param.name, cause: parsed.error },
    ));
}

async function bindOne(
    param: NormalizedParam,
    request: InvocationRequest,
    ctx: InvocationContext,
): Promise<Result<unknown>> {
    switch (param.source) {
        case 'context':
            return succeed(bindContext(param.value, request, ctx));
        case 'service':
            return bindService(param, request, ctx);
        case 'payload':
            if (param.serviceToken && ctx.services.canResolve(param.serviceToken)) {
                return bindService(
                    { source: 'service', name: param.name, token: param.serviceToken, optional: false },
                    request,
                    ctx,
                );
            }
            return bindField(param, request);
    }
}

// ── Public API ───────────────────────────────────────────

/**
 * Bind every declared parameter for one invocation.
 *
 * Stops at the first parameter that cannot be bound.
 */
export async function bindArguments(
    params: readonly NormalizedParam[],
    request: InvocationRequest,
    ctx: InvocationContext,
): Promise<Result<BoundArguments>> {
    const bound: BoundArguments = {};

    for (const param of params) {
        const result = await bindOne(param, request, ctx);
        if (!result.ok) return result;
        bound[param.name] = result.value;
    }

    return succeed(bound);
}

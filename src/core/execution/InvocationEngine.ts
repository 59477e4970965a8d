/**
 * InvocationEngine: Runs Exactly One Interceptor
 *
 * Pipeline: bind arguments → create target → call handler → dispose
 * target → normalize the return value.
 *
 * Binding failures propagate unchanged. Anything the handler (or its
 * target factory) throws is wrapped in `HANDLER_FAILURE` with the
 * original as `cause`.
 *
 * @module
 */
import {
    InterceptorKind,
    type InterceptorDescriptor,
    type InvocationRequest,
    type InvocationResult,
} from '../../domain/Interceptor.js';
import { type InterceptorDefinition, type TargetContext } from '../builder/defineInterceptor.js';
import { bindArguments, clonePayload, type BoundArguments } from '../binding/ParameterBinder.js';
import { type InvocationContext } from '../binding/InvocationContext.js';
import {
    InterceptorError,
    cancelled,
    describeCause,
    handlerFailure,
    isInterceptorError,
} from '../errors.js';
import { isInterceptorOutcome } from '../outcome.js';
import { FindingListSchema, FindingSchema } from '../schema/ProtocolSchemas.js';
import { type ProgressSink, isProgressEvent } from './ProgressHelper.js';
import { type DebugObserverFn } from '../../observability/DebugObserver.js';
import { type InterceptorTracer, SpanStatusCode } from '../../observability/Tracing.js';

export interface InvocationEngineOptions {
    readonly debug?: DebugObserverFn;
    readonly tracer?: InterceptorTracer;
}

// ============================================================================
// Outcome Normalization
// ============================================================================

function describeKind(kind: InterceptorKind): string {
    return `${/^[AEIOU]/.test(kind) ? 'an' : 'a'} ${kind} interceptor`;
}

/**
 * Map whatever a handler returned onto an {@link InvocationResult}.
 *
 * @param onDiscard - Called with a reason when a value is dropped because
 *   it does not fit the interceptor's kind
 */
export function normalizeOutcome(
    descriptor: InterceptorDescriptor,
    value: unknown,
    onDiscard: (reason: string) => void = () => undefined,
): InvocationResult {
    const isMutation = descriptor.kind === InterceptorKind.Mutation;

    if (value === undefined) return {};

    if (isInterceptorOutcome(value)) {
        const meta = value.metadata !== undefined ? { metadata: { ...value.metadata } } : {};
        switch (value.type) {
            case 'modified':
                if (isMutation) return { modifiedPayload: value.payload, ...meta };
                onDiscard(`modified() returned by ${describeKind(descriptor.kind)}`);
                return meta;
            case 'findings':
                return { validationResults: [...value.findings], ...meta };
            case 'metadata':
                return meta;
        }
    }

    // A mutator reports findings only through findings(); any bare value is its payload.
    if (isMutation) return { modifiedPayload: value };

    const single = FindingSchema.safeParse(value);
    if (single.success) return { validationResults: [single.data] };

    const list = FindingListSchema.safeParse(value);
    if (list.success) return { validationResults: list.data };

    onDiscard(`bare value returned by ${describeKind(descriptor.kind)}`);
    return {};
}

// ============================================================================
// Handler Invocation Helpers
// ============================================================================

function isAsyncGenerator(value: unknown): value is AsyncGenerator<unknown, unknown, undefined> {
    return (
        typeof value === 'object' &&
        value !== null &&
        Symbol.asyncIterator in value &&
        'next' in value &&
        typeof value.next === 'function'
    );
}

async function drainGenerator(
    gen: AsyncGenerator<unknown, unknown, undefined>,
    progressSink?: ProgressSink,
): Promise<unknown> {
    let result = await gen.next();

    while (!result.done) {
        if (progressSink && isProgressEvent(result.value)) {
            progressSink(result.value);
        }
        result = await gen.next();
    }

    return result.value;
}

async function callHandler(
    definition: InterceptorDefinition,
    args: BoundArguments,
    target: unknown,
    progressSink?: ProgressSink,
): Promise<unknown> {
    const value: unknown = definition.handler(args, target);
    if (isAsyncGenerator(value)) return drainGenerator(value, progressSink);
    return await value;
}

/** Release a per-call target through the first disposal hook it has. */
export async function disposeTarget(target: unknown): Promise<void> {
    if ((typeof target !== 'object' && typeof target !== 'function') || target === null) return;

    const hooks: Array<string | symbol> = [];
    for (const name of ['asyncDispose', 'dispose']) {
        const symbol: unknown = Reflect.get(Symbol, name);
        if (typeof symbol === 'symbol') hooks.push(symbol);
    }
    hooks.push('dispose', 'close');

    for (const hook of hooks) {
        const fn: unknown = Reflect.get(target, hook);
        if (typeof fn === 'function') {
            await fn.call(target);
            return;
        }
    }
}

// ============================================================================
// Engine
// ============================================================================

export class InvocationEngine {
    private readonly _debug?: DebugObserverFn;
    private readonly _tracer?: InterceptorTracer;

    constructor(options: InvocationEngineOptions = {}) {
        if (options.debug) this._debug = options.debug;
        if (options.tracer) this._tracer = options.tracer;
    }

    /**
     * Invoke one interceptor for one request.
     *
     * Phase and event applicability are not checked here; the caller
     * selected this interceptor explicitly.
     *
     * @throws InterceptorError binding codes as-is, `HANDLER_FAILURE`,
     *   or `CANCELLED` when `ctx.signal` is already aborted
     */
    async invoke(
        definition: InterceptorDefinition,
        request: InvocationRequest,
        ctx: InvocationContext,
    ): Promise<InvocationResult> {
        const tracer = this._tracer;
        if (!tracer) return this._run(definition, request, ctx);

        const { descriptor } = definition;
        const span = tracer.startSpan(`mcp.interceptor.${descriptor.id}`, {
            attributes: {
                'mcp.system': 'interceptors',
                'mcp.interceptor.id': descriptor.id,
                'mcp.interceptor.kind': descriptor.kind,
                'mcp.interceptor.priority': descriptor.priority,
                'mcp.event': request.event,
                'mcp.phase': request.phase,
            },
        });
        const startTime = performance.now();
        let statusCode: number = SpanStatusCode.UNSET;
        let statusMessage: string | undefined;

        try {
            const result = await this._run(definition, request, ctx);
            span.setAttribute('mcp.findings', result.validationResults?.length ?? 0);
            span.setAttribute('mcp.modified', result.modifiedPayload !== undefined);
            statusCode = SpanStatusCode.OK;
            return result;
        } catch (err) {
            const code = isInterceptorError(err) ? err.code : 'HANDLER_FAILURE';
            span.setAttribute('mcp.error_type', code.toLowerCase());
            if (!isInterceptorError(err) || !err.callerFixable) {
                span.recordException(err instanceof Error ? err : describeCause(err));
                statusCode = SpanStatusCode.ERROR;
                statusMessage = describeCause(err);
            }
            throw err;
        } finally {
            span.setAttribute('mcp.durationMs', performance.now() - startTime);
            span.setStatus(statusMessage !== undefined ? { code: statusCode, message: statusMessage } : { code: statusCode });
            span.end();
        }
    }

    private async _run(
        definition: InterceptorDefinition,
        request: InvocationRequest,
        ctx: InvocationContext,
    ): Promise<InvocationResult> {
        const { descriptor } = definition;
        const id = descriptor.id;
        const startTime = performance.now();

        if (ctx.signal.aborted) {
            throw this._report(cancelled(id, ctx.signal.reason), 'invoke');
        }

        // Step 1: Bind
        const bound = await bindArguments(definition.params, request, ctx);
        this._debug?.({
            type: 'bind',
            interceptor: id,
            ok: bound.ok,
            ...(bound.ok ? {} : { error: bound.error.message }),
            durationMs: performance.now() - startTime,
            timestamp: Date.now(),
        });
        if (!bound.ok) throw this._report(bound.error, 'bind');

        // Step 2: Target
        let target: unknown;
        if (definition.createTarget) {
            const targetCtx: TargetContext = {
                request: { ...request, payload: clonePayload(request.payload) },
                services: ctx.services,
                session: ctx.session,
                signal: ctx.signal,
            };
            try {
                target = await definition.createTarget(targetCtx);
            } catch (err) {
                throw this._failInvoke(descriptor, handlerFailure(id, err), startTime);
            }
        }

        // Step 3: Call, always disposing the target
        let raw: unknown;
        let primary: InterceptorError | undefined;
        try {
            raw = await callHandler(definition, bound.value, target, ctx.progressSink);
        } catch (err) {
            primary = ctx.signal.aborted && !isInterceptorError(err)
                ? cancelled(id, ctx.signal.reason)
                : handlerFailure(id, err);
            throw this._failInvoke(descriptor, primary, startTime);
        } finally {
            await this._dispose(descriptor, target, primary, startTime);
        }

        // Step 4: Normalize
        const result = normalizeOutcome(descriptor, raw, reason => {
            this._debug?.({ type: 'discard', interceptor: id, kind: descriptor.kind, reason, timestamp: Date.now() });
        });
        this._debug?.({
            type: 'invoke',
            interceptor: id,
            kind: descriptor.kind,
            isError: false,
            durationMs: performance.now() - startTime,
            timestamp: Date.now(),
        });
        return result;
    }

    /**
     * A disposal failure fails the invocation only when the handler
     * itself succeeded; otherwise the handler's error wins.
     */
    private async _dispose(
        descriptor: InterceptorDescriptor,
        target: unknown,
        primary: InterceptorError | undefined,
        startTime: number,
    ): Promise<void> {
        try {
            await disposeTarget(target);
        } catch (err) {
            const failure = handlerFailure(descriptor.id, err);
            if (primary) {
                this._report(failure, 'invoke');
                return;
            }
            throw this._failInvoke(descriptor, failure, startTime);
        }
    }

    private _failInvoke(
        descriptor: InterceptorDescriptor,
        error: InterceptorError,
        startTime: number,
    ): InterceptorError {
        this._debug?.({
            type: 'invoke',
            interceptor: descriptor.id,
            kind: descriptor.kind,
            isError: true,
            durationMs: performance.now() - startTime,
            timestamp: Date.now(),
        });
        return this._report(error, 'invoke');
    }

    private _report(error: InterceptorError, step: 'bind' | 'invoke'): InterceptorError {
        this._debug?.({
            type: 'error',
            interceptor: error.interceptorId ?? '?',
            code: error.code,
            error: error.message,
            step,
            timestamp: Date.now(),
        });
        return error;
    }
}

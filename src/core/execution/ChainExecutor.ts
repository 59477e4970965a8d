/**
 * ChainExecutor: Resolves, Partitions and Runs an Interceptor Chain
 *
 * Pipeline: resolve ids → filter by phase → partition by kind → run the
 * three groups → aggregate.
 *
 * - Mutations run one after another in `(priority, id)` order, each
 *   receiving the previous step's payload.
 * - Validators run concurrently on the original payload. A validator
 *   that fails contributes one synthesized `Error` finding instead of
 *   failing the chain. Findings keep `(priority, id)` order.
 * - Observers are detached through the {@link BackgroundTaskTracker};
 *   their results only reach the {@link ObservationSink}.
 *
 * The mutation and validation groups run side by side. When a mutation
 * fails the validators are still awaited, then the chain rejects with a
 * {@link ChainMutationError} carrying the partial result.
 *
 * @module
 */
import {
    InterceptorKind,
    Severity,
    compareDescriptors,
    appliesToPhase,
    type ChainRequest,
    type ChainResult,
    type Finding,
    type InterceptorMetadata,
    type InvocationRequest,
} from '../../domain/Interceptor.js';
import { type InterceptorDefinition } from '../builder/defineInterceptor.js';
import { type InvocationContext, type SessionHandle } from '../binding/InvocationContext.js';
import { type ServiceResolver } from '../binding/ServiceResolver.js';
import { type RegistrySnapshot } from '../registry/InterceptorRegistry.js';
import {
    ChainMutationError,
    cancelled,
    describeCause,
    isInterceptorError,
} from '../errors.js';
import { finding } from '../outcome.js';
import { type InvocationEngine } from './InvocationEngine.js';
import { type BackgroundTaskTracker } from './BackgroundTasks.js';
import { type ObservationSink } from './ObservationSink.js';
import { type ProgressSink } from './ProgressHelper.js';
import { type DebugObserverFn } from '../../observability/DebugObserver.js';
import { type InterceptorTracer, type InterceptorSpan, SpanStatusCode } from '../../observability/Tracing.js';

// ── Types ────────────────────────────────────────────────

export interface ChainExecutionOptions {
    /** Cancels the mutation group and every validator */
    readonly signal?: AbortSignal;
    readonly session?: SessionHandle;
    readonly progressSink?: ProgressSink;
}

export interface ChainExecutorDeps {
    /** Supplies the snapshot each chain resolves against */
    readonly snapshot: () => RegistrySnapshot;
    readonly invoker: InvocationEngine;
    readonly services: ServiceResolver;
    readonly background: BackgroundTaskTracker;
    readonly observations: ObservationSink;
    readonly debug?: DebugObserverFn;
    readonly tracer?: InterceptorTracer;
}

/** Interceptors of one chain, partitioned and sorted. */
export interface ChainPlan {
    readonly mutations: readonly InterceptorDefinition[];
    readonly validations: readonly InterceptorDefinition[];
    readonly observers: readonly InterceptorDefinition[];
    /** Resolved but excluded by phase */
    readonly skipped: number;
}

interface MutationOutcome {
    readonly payload: unknown;
    readonly metadata: Record<string, InterceptorMetadata>;
    readonly failure?: { readonly id: string; readonly error: unknown };
}

interface ValidationOutcome {
    readonly findings: Finding[];
    readonly metadata: Record<string, InterceptorMetadata>;
}

// ── Planning ─────────────────────────────────────────────

/**
 * Steps 1–3: resolve every id against one snapshot, drop interceptors
 * whose phases exclude the request's, partition by kind and sort.
 *
 * Duplicate ids are collapsed. `applicableEvents` is not consulted.
 *
 * @throws InterceptorError `UNKNOWN_INTERCEPTOR_ID` naming the first unknown id
 */
export function planChain(snapshot: RegistrySnapshot, request: ChainRequest): ChainPlan {
    const resolved: InterceptorDefinition[] = [];
    for (const id of new Set(request.interceptorIds)) {
        const lookup = snapshot.resolve(id);
        if (!lookup.ok) throw lookup.error;
        resolved.push(lookup.value);
    }

    const applicable = resolved.filter(definition => appliesToPhase(definition.descriptor, request.phase));
    const ordered = applicable.sort((a, b) => compareDescriptors(a.descriptor, b.descriptor));

    return {
        mutations: ordered.filter(definition => definition.descriptor.kind === InterceptorKind.Mutation),
        validations: ordered.filter(definition => definition.descriptor.kind === InterceptorKind.Validation),
        observers: ordered.filter(definition => definition.descriptor.kind === InterceptorKind.Observability),
        skipped: resolved.length - applicable.length,
    };
}

// ── Signals ──────────────────────────────────────────────

/** A child signal that aborts with its parent, detachable once done. */
function linkSignal(parent: AbortSignal): { signal: AbortSignal; release: () => void } {
    const child = new AbortController();
    if (parent.aborted) {
        child.abort(parent.reason);
        return { signal: child.signal, release: () => undefined };
    }
    const onAbort = (): void => child.abort(parent.reason);
    parent.addEventListener('abort', onAbort, { once: true });
    return { signal: child.signal, release: () => parent.removeEventListener('abort', onAbort) };
}

/** The cause worth showing for a failed validator. */
function failureCause(error: unknown): unknown {
    return isInterceptorError(error, 'HANDLER_FAILURE') && error.cause !== undefined ? error.cause : error;
}

// ── Executor ─────────────────────────────────────────────

export class ChainExecutor {
    constructor(private readonly deps: ChainExecutorDeps) {}

    /**
     * Execute a chain and aggregate its outcome.
     *
     * @throws InterceptorError `UNKNOWN_INTERCEPTOR_ID` before anything runs,
     *   `CANCELLED` when the signal is already aborted
     * @throws ChainMutationError when a mutation step fails
     * @throws InterceptorError `CANCELLED` when the signal aborts the mutation group
     */
    async execute(request: ChainRequest, options: ChainExecutionOptions = {}): Promise<ChainResult> {
        const { debug, tracer } = this.deps;
        const startTime = performance.now();
        const span = tracer?.startSpan('mcp.interceptor.chain', {
            attributes: {
                'mcp.system': 'interceptors',
                'mcp.event': request.event,
                'mcp.phase': request.phase,
                'mcp.chain.requested': request.interceptorIds.length,
            },
        });

        let plan: ChainPlan;
        try {
            if (options.signal?.aborted) throw cancelled(undefined, options.signal.reason);
            plan = planChain(this.deps.snapshot(), request);
        } catch (err) {
            if (isInterceptorError(err)) {
                debug?.({
                    type: 'error',
                    interceptor: err.interceptorId ?? '?',
                    code: err.code,
                    error: err.message,
                    step: 'resolve',
                    timestamp: Date.now(),
                });
            }
            this._finish(span, request, undefined, 'rejected', startTime, err);
            throw err;
        }

        span?.setAttribute('mcp.chain.mutations', plan.mutations.length);
        span?.setAttribute('mcp.chain.validations', plan.validations.length);
        span?.setAttribute('mcp.chain.observers', plan.observers.length);

        const signal = options.signal ?? new AbortController().signal;
        const ctx: InvocationContext = {
            signal,
            services: this.deps.services,
            session: options.session ?? {},
            ...(options.progressSink ? { progressSink: options.progressSink } : {}),
        };

        // Observers first: the tracker refuses new tasks after shutdown.
        try {
            this._launchObservers(plan.observers, request, ctx.session);
        } catch (err) {
            this._finish(span, request, plan, 'rejected', startTime, err);
            throw err;
        }
        const mutating = this._runMutations(plan.mutations, request, ctx);
        const validating = this._runValidations(plan.validations, request, ctx);

        const [mutation, validation] = await Promise.all([mutating, validating]);

        const result: ChainResult = {
            ...(mutation.payload !== undefined ? { modifiedPayload: mutation.payload } : {}),
            allValidationResults: validation.findings,
            metadata: { ...mutation.metadata, ...validation.metadata },
        };

        if (mutation.failure) {
            const { id, error: cause } = mutation.failure;
            const error = isInterceptorError(cause, 'CANCELLED')
                ? cause
                : new ChainMutationError(id, failureCause(cause), result);
            debug?.({
                type: 'error',
                interceptor: id,
                code: error.code,
                error: error.message,
                step: 'mutate',
                timestamp: Date.now(),
            });
            this._finish(span, request, plan, 'mutation_failed', startTime, error);
            throw error;
        }

        span?.setAttribute('mcp.findings', validation.findings.length);
        this._finish(span, request, plan, 'ok', startTime);
        return result;
    }

    private _stepRequest(definition: InterceptorDefinition, request: ChainRequest, payload: unknown): InvocationRequest {
        return {
            interceptorId: definition.descriptor.id,
            event: request.event,
            phase: request.phase,
            ...(payload !== undefined ? { payload } : {}),
            ...(request.progressToken !== undefined ? { progressToken: request.progressToken } : {}),
        };
    }

    /** Step 4: strictly sequential, stop at the first failure. */
    private async _runMutations(
        steps: readonly InterceptorDefinition[],
        request: ChainRequest,
        ctx: InvocationContext,
    ): Promise<MutationOutcome> {
        let payload = request.payload;
        const metadata: Record<string, InterceptorMetadata> = {};

        for (const step of steps) {
            const id = step.descriptor.id;
            if (ctx.signal.aborted) {
                return { payload, metadata, failure: { id, error: cancelled(id, ctx.signal.reason) } };
            }
            try {
                const result = await this.deps.invoker.invoke(step, this._stepRequest(step, request, payload), ctx);
                if (result.modifiedPayload !== undefined) payload = result.modifiedPayload;
                if (result.metadata !== undefined) metadata[id] = result.metadata;
            } catch (err) {
                return { payload, metadata, failure: { id, error: err } };
            }
        }

        return { payload, metadata };
    }

    /** Step 5: concurrent on the original payload; failures become findings. */
    private async _runValidations(
        steps: readonly InterceptorDefinition[],
        request: ChainRequest,
        ctx: InvocationContext,
    ): Promise<ValidationOutcome> {
        const settled = await Promise.allSettled(steps.map(async step => {
            const link = linkSignal(ctx.signal);
            try {
                return await this.deps.invoker.invoke(
                    step,
                    this._stepRequest(step, request, request.payload),
                    { ...ctx, signal: link.signal },
                );
            } finally {
                link.release();
            }
        }));

        const findings: Finding[] = [];
        const metadata: Record<string, InterceptorMetadata> = {};

        settled.forEach((outcome, index) => {
            const step = steps[index];
            if (!step) return;
            const id = step.descriptor.id;

            if (outcome.status === 'fulfilled') {
                findings.push(...(outcome.value.validationResults ?? []));
                if (outcome.value.metadata !== undefined) metadata[id] = outcome.value.metadata;
                return;
            }

            const message = `Interceptor "${id}" failed: ${describeCause(failureCause(outcome.reason))}`;
            findings.push(finding(Severity.Error, message));
            this.deps.debug?.({
                type: 'error',
                interceptor: id,
                code: isInterceptorError(outcome.reason) ? outcome.reason.code : 'HANDLER_FAILURE',
                error: message,
                step: 'validate',
                timestamp: Date.now(),
            });
        });

        return { findings, metadata };
    }

    /** Step 6: detached, on the tracker's signal rather than the caller's. */
    private _launchObservers(
        observers: readonly InterceptorDefinition[],
        request: ChainRequest,
        session: SessionHandle,
    ): void {
        const { invoker, background, observations, debug, services } = this.deps;

        for (const observer of observers) {
            const id = observer.descriptor.id;
            const stepRequest = this._stepRequest(observer, request, request.payload);

            background.start(async signal => {
                const startTime = performance.now();
                try {
                    const result = await invoker.invoke(observer, stepRequest, { signal, services, session });
                    observations.recordSuccess(id, result.metadata);
                    debug?.({
                        type: 'observe',
                        interceptor: id,
                        outcome: 'success',
                        durationMs: performance.now() - startTime,
                        timestamp: Date.now(),
                    });
                } catch (err) {
                    observations.recordFailure(id, err);
                    debug?.({
                        type: 'observe',
                        interceptor: id,
                        outcome: 'failure',
                        error: describeCause(err),
                        durationMs: performance.now() - startTime,
                        timestamp: Date.now(),
                    });
                }
            });
        }
    }

    private _finish(
        span: InterceptorSpan | undefined,
        request: ChainRequest,
        plan: ChainPlan | undefined,
        outcome: 'ok' | 'mutation_failed' | 'rejected',
        startTime: number,
        error?: unknown,
    ): void {
        const durationMs = performance.now() - startTime;

        this.deps.debug?.({
            type: 'chain',
            event: request.event,
            phase: request.phase,
            mutations: plan?.mutations.length ?? 0,
            validations: plan?.validations.length ?? 0,
            observers: plan?.observers.length ?? 0,
            skipped: plan?.skipped ?? 0,
            outcome,
            durationMs,
            timestamp: Date.now(),
        });

        if (!span) return;
        span.setAttribute('mcp.durationMs', durationMs);
        if (outcome === 'ok') {
            span.setStatus({ code: SpanStatusCode.OK });
        } else if (outcome === 'mutation_failed') {
            span.recordException(error instanceof Error ? error : describeCause(error));
            span.setAttribute('mcp.error_type', 'mutation_failed');
            span.setStatus({ code: SpanStatusCode.ERROR, message: describeCause(error) });
        } else {
            const code = isInterceptorError(error) ? error.code : 'HANDLER_FAILURE';
            span.setAttribute('mcp.error_type', code.toLowerCase());
            span.setStatus({ code: SpanStatusCode.UNSET });
        }
        span.end();
    }
}

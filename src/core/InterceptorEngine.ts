/**
 * InterceptorEngine: Facade Over Registry, Invocation and Chains
 *
 * Owns every collaborator of the interceptor pipeline and their
 * lifecycle: created ready to serve, drained by {@link shutdown}.
 *
 * @example
 * ```typescript
 * import { createInterceptorEngine, createDebugObserver } from 'mcp-interceptors';
 *
 * const engine = createInterceptorEngine({
 *     pageSize: 100,
 *     services,
 *     debug: createDebugObserver(),
 * });
 * engine.register(piiValidator, emailRedactor, auditTrail);
 *
 * const result = await engine.executeChain({
 *     interceptorIds: ['pii-validator', 'email-redactor', 'audit-trail'],
 *     event: 'tools/call',
 *     phase: 'Request',
 *     payload: { text: 'mail me at jane@example.com' },
 * });
 *
 * engine.attachToServer(server);
 * process.on('SIGTERM', () => engine.shutdown());
 * ```
 *
 * @module
 */
import {
    type ChainRequest,
    type ChainResult,
    type InterceptorDescriptor,
    type InterceptorPhase,
    type InvocationRequest,
    type InvocationResult,
} from '../domain/Interceptor.js';
import { type InterceptorDefinition } from './builder/defineInterceptor.js';
import { EMPTY_SERVICES, type ServiceResolver } from './binding/ServiceResolver.js';
import { InterceptorError } from './errors.js';
import { parseEngineConfig, type EngineConfig, type EngineConfigInput } from './config/EngineConfig.js';
import {
    InterceptorRegistry,
    type InterceptorPage,
    type RegistryNotificationSink,
} from './registry/InterceptorRegistry.js';
import { InvocationEngine } from './execution/InvocationEngine.js';
import { ChainExecutor, type ChainExecutionOptions } from './execution/ChainExecutor.js';
import { BackgroundTaskTracker, type DrainReport } from './execution/BackgroundTasks.js';
import { ObservationSink } from './execution/ObservationSink.js';
import { type DebugObserverFn } from '../observability/DebugObserver.js';
import { type InterceptorTracer } from '../observability/Tracing.js';
import { attachInterceptors, type AttachOptions, type DetachFn, type EngineDelegate } from '../server/ServerAttachment.js';

export interface InterceptorEngineOptions extends EngineConfigInput {
    /** Service lookup for `p.service()` parameters (default: none) */
    readonly services?: ServiceResolver;
    readonly debug?: DebugObserverFn;
    /** OpenTelemetry-compatible tracer, e.g. `trace.getTracer('mcp-interceptors')` */
    readonly tracing?: InterceptorTracer;
    /** Receives observability results (default: a fresh sink) */
    readonly observations?: ObservationSink;
}

/** Cancellation, session and progress for one call. */
export type InvocationOptions = ChainExecutionOptions;

export class InterceptorEngine implements EngineDelegate {
    readonly config: EngineConfig;
    readonly registry: InterceptorRegistry;
    readonly observations: ObservationSink;

    private readonly _services: ServiceResolver;
    private readonly _debug?: DebugObserverFn;
    private readonly _invoker: InvocationEngine;
    private readonly _chains: ChainExecutor;
    private readonly _background = new BackgroundTaskTracker();
    private _shutDown = false;

    constructor(options: InterceptorEngineOptions = {}) {
        const { services, debug, tracing, observations, ...config } = options;
        this.config = parseEngineConfig(config);
        this._services = services ?? EMPTY_SERVICES;
        if (debug) this._debug = debug;
        this.observations = observations ?? new ObservationSink();

        this.registry = new InterceptorRegistry({
            pageSize: this.config.pageSize,
            notifyDebounceMs: this.config.notifyDebounceMs,
            cursor: {
                mode: this.config.cursor.mode,
                ...(this.config.cursor.secret !== undefined ? { secret: this.config.cursor.secret } : {}),
            },
            ...(debug ? { debug } : {}),
        });
        this._invoker = new InvocationEngine({
            ...(debug ? { debug } : {}),
            ...(tracing ? { tracer: tracing } : {}),
        });
        this._chains = new ChainExecutor({
            snapshot: () => this.registry.snapshot(),
            invoker: this._invoker,
            services: this._services,
            background: this._background,
            observations: this.observations,
            ...(debug ? { debug } : {}),
            ...(tracing ? { tracer: tracing } : {}),
        });
    }

    get isShutDown(): boolean {
        return this._shutDown;
    }

    /** Observability tasks still running. */
    get pendingObservers(): number {
        return this._background.size;
    }

    private assertRunning(): void {
        if (this._shutDown) {
            throw new InterceptorError('ENGINE_SHUT_DOWN', 'The interceptor engine has been shut down.');
        }
    }

    // ── Registry ─────────────────────────────────────────

    /**
     * Register interceptors in order.
     *
     * @throws InterceptorError `DUPLICATE_ID` or `INVALID_DEFINITION`
     */
    register(...definitions: InterceptorDefinition[]): this {
        this.assertRunning();
        this.registry.registerAll(...definitions);
        return this;
    }

    unregister(id: string): boolean {
        return this.registry.unregister(id);
    }

    /** Interceptors applicable to an event and phase, in execution order. */
    lookup(event: string, phase: InterceptorPhase): InterceptorDescriptor[] {
        return this.registry.lookup(event, phase);
    }

    list(cursor?: string): Promise<InterceptorPage> {
        return this.registry.list(cursor);
    }

    setNotificationSink(sink: RegistryNotificationSink | undefined): void {
        this.registry.setNotificationSink(sink);
    }

    // ── Execution ────────────────────────────────────────

    /**
     * Invoke one interceptor directly, whatever its kind or phases.
     * Every failure propagates.
     *
     * @throws InterceptorError `UNKNOWN_INTERCEPTOR_ID`, binding codes,
     *   `HANDLER_FAILURE`, `CANCELLED` or `ENGINE_SHUT_DOWN`
     */
    async invoke(request: InvocationRequest, options: InvocationOptions = {}): Promise<InvocationResult> {
        this.assertRunning();
        const definition = this.registry.snapshot().resolve(request.interceptorId);
        if (!definition.ok) {
            this._debug?.({
                type: 'error',
                interceptor: request.interceptorId,
                code: definition.error.code,
                error: definition.error.message,
                step: 'resolve',
                timestamp: Date.now(),
            });
            throw definition.error;
        }

        return this._invoker.invoke(definition.value, request, {
            signal: options.signal ?? new AbortController().signal,
            services: this._services,
            session: options.session ?? {},
            ...(options.progressSink ? { progressSink: options.progressSink } : {}),
        });
    }

    /**
     * Execute a chain.
     *
     * @throws InterceptorError `UNKNOWN_INTERCEPTOR_ID`, `CANCELLED` or `ENGINE_SHUT_DOWN`
     * @throws ChainMutationError when a mutation step fails
     */
    async executeChain(request: ChainRequest, options: ChainExecutionOptions = {}): Promise<ChainResult> {
        this.assertRunning();
        return this._chains.execute(request, options);
    }

    // ── Lifecycle ────────────────────────────────────────

    /**
     * Register the interceptor protocol on an MCP server.
     *
     * @param server - Server or McpServer instance (duck-typed)
     */
    attachToServer(server: unknown, options: AttachOptions = {}): DetachFn {
        this.assertRunning();
        return attachInterceptors(server, this, {
            ...(this._debug ? { debug: this._debug } : {}),
            ...options,
        });
    }

    /**
     * Stop accepting work, wait for detached observers, abort stragglers.
     *
     * Safe to call more than once.
     *
     * @param graceMs - Defaults to `config.shutdownGraceMs`
     */
    async shutdown(graceMs: number = this.config.shutdownGraceMs): Promise<DrainReport> {
        this._shutDown = true;
        this.registry.cancelPendingNotification();
        const startTime = performance.now();

        const report = await this._background.drain(graceMs);
        this._debug?.({
            type: 'shutdown',
            drained: report.drained,
            abandoned: report.abandoned,
            durationMs: performance.now() - startTime,
            timestamp: Date.now(),
        });
        return report;
    }
}

/** Create an engine with validated configuration. */
export function createInterceptorEngine(options: InterceptorEngineOptions = {}): InterceptorEngine {
    return new InterceptorEngine(options);
}

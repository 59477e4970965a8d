/**
 * ServerAttachment: MCP Server Integration
 *
 * Registers the interceptor protocol on an MCP SDK server:
 *
 * - `interceptors/list` → paginated descriptors
 * - `interceptors/invoke` → one interceptor
 * - `interceptors/executeChain` → a chain
 * - `notifications/interceptors/list_changed` ← every registry change
 *
 * Supports both `Server` (low-level) and `McpServer` (high-level, via
 * its `.server` property) by duck-typing. Engine errors are mapped onto
 * `McpError` so the SDK answers with a proper JSON-RPC error.
 *
 * Pure-function module: receives dependencies, returns detach function.
 */
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { type ZodError } from 'zod';
import {
    type ChainRequest,
    type ChainResult,
    type InvocationRequest,
    type InvocationResult,
} from '../domain/Interceptor.js';
import {
    ExecuteChainParamsSchema,
    ExecuteChainRequestSchema,
    InterceptorMethods,
    InvokeInterceptorParamsSchema,
    InvokeInterceptorRequestSchema,
    ListInterceptorsParamsSchema,
    ListInterceptorsRequestSchema,
    toWireInterceptor,
    type ExecuteChainResult,
    type InvokeInterceptorResult,
    type ListInterceptorsResult,
} from '../core/schema/ProtocolSchemas.js';
import {
    ChainMutationError,
    describeCause,
    formatZodIssues,
    isInterceptorError,
    type InterceptorErrorCode,
} from '../core/errors.js';
import { type SessionHandle } from '../core/binding/InvocationContext.js';
import { type ProgressEvent, type ProgressSink } from '../core/execution/ProgressHelper.js';
import { type InterceptorPage, type RegistryNotificationSink } from '../core/registry/InterceptorRegistry.js';
import { type DebugObserverFn } from '../observability/DebugObserver.js';

// ── Types ────────────────────────────────────────────────

/** The envelope schema shape the SDK routes on */
interface MethodSchema {
    readonly shape: { readonly method: { readonly value: string } };
}

/** Minimal duck-typed interface for the low-level MCP Server */
export interface McpServerLike {
    setRequestHandler(schema: MethodSchema, handler: (request: never, extra: never) => unknown): void;
    notification?(notification: { method: string; params?: Record<string, unknown> }): Promise<void>;
    registerCapabilities?(capabilities: Record<string, unknown>): void;
}

/** Per-call options the engine accepts from the attachment */
export interface RequestScope {
    readonly signal?: AbortSignal;
    readonly session: SessionHandle;
    readonly progressSink?: ProgressSink;
}

/** Delegate interface for the engine operations needed by the attachment */
export interface EngineDelegate {
    list(cursor?: string): Promise<InterceptorPage>;
    invoke(request: InvocationRequest, scope: RequestScope): Promise<InvocationResult>;
    executeChain(request: ChainRequest, scope: RequestScope): Promise<ChainResult>;
    setNotificationSink(sink: RegistryNotificationSink | undefined): void;
}

export interface AttachOptions {
    /**
     * Advertise `experimental.interceptors.listChanged` through
     * `registerCapabilities()`. The SDK only allows this before
     * `connect()`; pass `false` when attaching to a connected server.
     *
     * @defaultValue true
     */
    readonly advertiseCapabilities?: boolean;
    readonly debug?: DebugObserverFn;
}

/** Function to detach the engine from the server */
export type DetachFn = () => void;

/**
 * Duck-typed interface for the MCP SDK `extra` object passed to request handlers.
 */
interface McpRequestExtra {
    _meta?: { progressToken?: string | number };
    sendNotification: (notification: { method: string; params?: Record<string, unknown> }) => Promise<void>;
    /** Fired when the client sends `notifications/cancelled` or the connection drops */
    signal?: AbortSignal;
    sessionId?: string;
}

// ── Server Resolution ────────────────────────────────────

function isMcpServerLike(obj: unknown): obj is McpServerLike {
    return (
        typeof obj === 'object' &&
        obj !== null &&
        'setRequestHandler' in obj &&
        typeof obj.setRequestHandler === 'function'
    );
}

/**
 * Accept a low-level `Server`, or an `McpServer` exposing one at `.server`.
 *
 * @throws Error if neither shape matches
 */
export function resolveServer(server: unknown): McpServerLike {
    if (isMcpServerLike(server)) return server;
    if (typeof server === 'object' && server !== null && 'server' in server && isMcpServerLike(server.server)) {
        return server.server;
    }
    throw new Error(
        'attachInterceptors() requires a Server or McpServer instance ' +
        '(an object with setRequestHandler(), or one exposing it at .server).',
    );
}

// ── Error Mapping ────────────────────────────────────────

const INVALID_PARAMS: ReadonlySet<InterceptorErrorCode> = new Set<InterceptorErrorCode>([
    'UNKNOWN_INTERCEPTOR_ID',
    'MISSING_REQUIRED_PARAMETER',
    'PARAMETER_BINDING_FAILURE',
    'SERIALIZATION_ERROR',
    'INVALID_CURSOR',
]);

/**
 * Map anything thrown by the engine onto an `McpError`.
 *
 * `data` carries `{ code, interceptorId? }`, plus `partial` for a
 * failed chain.
 */
export function toMcpError(err: unknown): McpError {
    if (err instanceof McpError) return err;
    if (!isInterceptorError(err)) {
        return new McpError(ErrorCode.InternalError, describeCause(err));
    }

    const rpcCode = INVALID_PARAMS.has(err.code) ? ErrorCode.InvalidParams : ErrorCode.InternalError;
    return new McpError(rpcCode, err.message, {
        code: err.code,
        ...(err.interceptorId !== undefined ? { interceptorId: err.interceptorId } : {}),
        ...(err instanceof ChainMutationError ? { partial: toWireChainResult(err.partial) } : {}),
    });
}

function invalidParams(method: string, error: ZodError): McpError {
    return new McpError(ErrorCode.InvalidParams, `Invalid params for ${method}: ${formatZodIssues(error)}`);
}

// ── Wire Projection ──────────────────────────────────────

function toWireInvocationResult(result: InvocationResult): InvokeInterceptorResult {
    return {
        ...(result.modifiedPayload !== undefined ? { modifiedPayload: result.modifiedPayload } : {}),
        ...(result.validationResults !== undefined ? { validationResults: [...result.validationResults] } : {}),
        ...(result.metadata !== undefined ? { metadata: { ...result.metadata } } : {}),
    };
}

function toWireChainResult(result: ChainResult): ExecuteChainResult {
    const metadata = Object.entries(result.metadata);
    return {
        ...(result.modifiedPayload !== undefined ? { modifiedPayload: result.modifiedPayload } : {}),
        allValidationResults: [...result.allValidationResults],
        ...(metadata.length > 0
            ? { metadata: Object.fromEntries(metadata.map(([id, meta]) => [id, { ...meta }])) }
            : {}),
    };
}

// ── Request Extra Helpers ────────────────────────────────

function isMcpExtra(extra: unknown): extra is McpRequestExtra {
    return (
        typeof extra === 'object' &&
        extra !== null &&
        'sendNotification' in extra &&
        typeof extra.sendNotification === 'function'
    );
}

function extractSignal(extra: unknown): AbortSignal | undefined {
    return isMcpExtra(extra) ? extra.signal : undefined;
}

/** Session id from the SDK, or from the Streamable HTTP `mcp-session-id` header. */
function extractSessionId(extra: unknown): string | undefined {
    if (typeof extra !== 'object' || extra === null) return undefined;
    if ('sessionId' in extra && typeof extra.sessionId === 'string') return extra.sessionId;
    if ('headers' in extra && typeof extra.headers === 'object' && extra.headers !== null) {
        const header: unknown = Reflect.get(extra.headers, 'mcp-session-id');
        if (typeof header === 'string') return header;
    }
    return undefined;
}

/**
 * Build a sink forwarding progress as `notifications/progress`.
 * Returns `undefined` when the request carries no progress token.
 */
function createProgressSink(
    extra: unknown,
    paramsToken: string | number | undefined,
    debug?: DebugObserverFn,
): ProgressSink | undefined {
    if (!isMcpExtra(extra)) return undefined;

    const token = paramsToken ?? extra._meta?.progressToken;
    if (token === undefined) return undefined;

    const sendNotification = extra.sendNotification;

    return (event: ProgressEvent): void => {
        sendNotification({
            method: 'notifications/progress',
            params: {
                progressToken: token,
                progress: event.percent,
                total: 100,
                message: event.message,
            },
        }).catch((err: unknown) => reportNotifyFailure(debug, err));
    };
}

function reportNotifyFailure(debug: DebugObserverFn | undefined, err: unknown): void {
    debug?.({
        type: 'error',
        interceptor: '?',
        code: 'NOTIFICATION_FAILED',
        error: describeCause(err),
        step: 'notify',
        timestamp: Date.now(),
    });
}

function scopeFor(
    server: McpServerLike,
    extra: unknown,
    progressToken: string | number | undefined,
    debug?: DebugObserverFn,
): RequestScope {
    const signal = extractSignal(extra);
    const sessionId = extractSessionId(extra);
    const progressSink = createProgressSink(extra, progressToken, debug);
    return {
        ...(signal ? { signal } : {}),
        session: { ...(sessionId !== undefined ? { sessionId } : {}), server },
        ...(progressSink ? { progressSink } : {}),
    };
}

// ── Public API ───────────────────────────────────────────

/**
 * Attach an interceptor engine to an MCP server.
 *
 * @param server - Server or McpServer instance (duck-typed)
 * @param engine - Usually an {@link InterceptorEngine}
 * @returns A function that detaches the handlers again
 *
 * @example
 * ```typescript
 * const server = new Server({ name: 'gateway', version: '1.0.0' }, { capabilities: {} });
 * const detach = attachInterceptors(server, engine);
 * await server.connect(transport);
 * ```
 */
export function attachInterceptors(
    server: unknown,
    engine: EngineDelegate,
    options: AttachOptions = {},
): DetachFn {
    const resolved = resolveServer(server);
    const { debug, advertiseCapabilities = true } = options;

    if (advertiseCapabilities && typeof resolved.registerCapabilities === 'function') {
        resolved.registerCapabilities({ experimental: { interceptors: { listChanged: true } } });
    }

    // interceptors/list
    resolved.setRequestHandler(ListInterceptorsRequestSchema, async (
        request: { params?: unknown },
    ): Promise<ListInterceptorsResult> => {
        const params = ListInterceptorsParamsSchema.safeParse(request.params);
        if (!params.success) throw invalidParams(InterceptorMethods.List, params.error);
        try {
            const page = await engine.list(params.data?.cursor);
            return {
                interceptors: page.interceptors.map(toWireInterceptor),
                ...(page.nextCursor !== undefined ? { nextCursor: page.nextCursor } : {}),
            };
        } catch (err) {
            throw toMcpError(err);
        }
    });

    // interceptors/invoke
    resolved.setRequestHandler(InvokeInterceptorRequestSchema, async (
        request: { params?: unknown },
        extra: unknown,
    ): Promise<InvokeInterceptorResult> => {
        const params = InvokeInterceptorParamsSchema.safeParse(request.params);
        if (!params.success) throw invalidParams(InterceptorMethods.Invoke, params.error);
        const { interceptorId, event, phase, payload, _meta } = params.data;
        const progressToken = _meta?.progressToken;
        try {
            const result = await engine.invoke(
                {
                    interceptorId,
                    event,
                    phase,
                    ...(payload !== undefined ? { payload } : {}),
                    ...(progressToken !== undefined ? { progressToken } : {}),
                },
                scopeFor(resolved, extra, progressToken, debug),
            );
            return toWireInvocationResult(result);
        } catch (err) {
            throw toMcpError(err);
        }
    });

    // interceptors/executeChain
    resolved.setRequestHandler(ExecuteChainRequestSchema, async (
        request: { params?: unknown },
        extra: unknown,
    ): Promise<ExecuteChainResult> => {
        const params = ExecuteChainParamsSchema.safeParse(request.params);
        if (!params.success) throw invalidParams(InterceptorMethods.ExecuteChain, params.error);
        const { interceptorIds, event, phase, payload, _meta } = params.data;
        const progressToken = _meta?.progressToken;
        try {
            const result = await engine.executeChain(
                {
                    interceptorIds,
                    event,
                    phase,
                    ...(payload !== undefined ? { payload } : {}),
                    ...(progressToken !== undefined ? { progressToken } : {}),
                },
                scopeFor(resolved, extra, progressToken, debug),
            );
            return toWireChainResult(result);
        } catch (err) {
            throw toMcpError(err);
        }
    });

    // notifications/interceptors/list_changed
    const notification = resolved.notification;
    if (typeof notification === 'function') {
        engine.setNotificationSink(() => {
            notification.call(resolved, { method: InterceptorMethods.ListChanged })
                .catch((err: unknown) => reportNotifyFailure(debug, err));
        });
    }

    return () => {
        engine.setNotificationSink(undefined);
        const detached = (): never => {
            throw new McpError(ErrorCode.MethodNotFound, 'Interceptor handlers have been detached');
        };
        resolved.setRequestHandler(ListInterceptorsRequestSchema, detached);
        resolved.setRequestHandler(InvokeInterceptorRequestSchema, detached);
        resolved.setRequestHandler(ExecuteChainRequestSchema, detached);
    };
}

/**
 * DebugObserver: Structured Debug Events for the Interceptor Engine
 *
 * Typed events emitted at each stage of registration, binding,
 * invocation and chain aggregation. Disabled by default: when no
 * observer is configured nothing is built or emitted.
 *
 * Design principles:
 * - Pure function observer (no class hierarchy)
 * - Discriminated union events (exhaustive switch possible)
 * - Immutable event payloads (readonly)
 *
 * @example
 * ```typescript
 * import { createDebugObserver, createInterceptorEngine } from 'mcp-interceptors';
 *
 * // Default: compact console.debug output
 * const engine = createInterceptorEngine({ debug: createDebugObserver() });
 *
 * // Custom handler (e.g. forward to a log pipeline)
 * const engine = createInterceptorEngine({
 *     debug: createDebugObserver((event) => logger.debug(event)),
 * });
 * ```
 *
 * @module
 */
import { type InterceptorKind, type InterceptorPhase } from '../domain/Interceptor.js';
import { type InterceptorErrorCode } from '../core/errors.js';

// ============================================================================
// Event Types (Discriminated Union)
// ============================================================================

/** Emitted when the registry's contents change. */
export interface RegistryEvent {
    readonly type: 'registry';
    readonly action: 'register' | 'unregister' | 'clear';
    /** Absent for `clear` */
    readonly interceptor?: string;
    /** Number of registered interceptors after the change */
    readonly size: number;
    readonly timestamp: number;
}

/** Emitted after argument binding for one invocation (pass or fail). */
export interface BindEvent {
    readonly type: 'bind';
    readonly interceptor: string;
    readonly ok: boolean;
    /** Binding error message if `ok` is false */
    readonly error?: string;
    readonly durationMs: number;
    readonly timestamp: number;
}

/** Emitted after an interceptor handler returned or threw. */
export interface InvokeEvent {
    readonly type: 'invoke';
    readonly interceptor: string;
    readonly kind: InterceptorKind;
    readonly isError: boolean;
    /** Milliseconds from binding start to normalized result */
    readonly durationMs: number;
    readonly timestamp: number;
}

/** Emitted when a returned value does not match the interceptor's kind and is dropped. */
export interface DiscardEvent {
    readonly type: 'discard';
    readonly interceptor: string;
    readonly kind: InterceptorKind;
    readonly reason: string;
    readonly timestamp: number;
}

/** Emitted once per chain, after aggregation. */
export interface ChainEvent {
    readonly type: 'chain';
    readonly event: string;
    readonly phase: InterceptorPhase;
    readonly mutations: number;
    readonly validations: number;
    readonly observers: number;
    /** Interceptors dropped because their phases exclude the requested one */
    readonly skipped: number;
    readonly outcome: 'ok' | 'mutation_failed' | 'rejected';
    readonly durationMs: number;
    readonly timestamp: number;
}

/** Emitted when a detached observability task settles. */
export interface ObserveEvent {
    readonly type: 'observe';
    readonly interceptor: string;
    readonly outcome: 'success' | 'failure';
    readonly error?: string;
    readonly durationMs: number;
    readonly timestamp: number;
}

/** Emitted for any failure surfaced or recovered by the engine. */
export interface ErrorEvent {
    readonly type: 'error';
    /** `?` when the failure is not tied to one interceptor */
    readonly interceptor: string;
    /** `NOTIFICATION_FAILED` when a progress or list-changed notification could not be sent */
    readonly code: InterceptorErrorCode | 'NOTIFICATION_FAILED';
    readonly error: string;
    /** The step where the error occurred */
    readonly step: 'resolve' | 'bind' | 'invoke' | 'validate' | 'mutate' | 'observe' | 'notify';
    readonly timestamp: number;
}

/** Emitted when the engine drains its detached tasks. */
export interface ShutdownEvent {
    readonly type: 'shutdown';
    readonly drained: number;
    readonly abandoned: number;
    readonly durationMs: number;
    readonly timestamp: number;
}

/**
 * Union of all debug event types.
 *
 * Use a `switch` on `event.type` for exhaustive handling.
 */
export type DebugEvent =
    | RegistryEvent
    | BindEvent
    | InvokeEvent
    | DiscardEvent
    | ChainEvent
    | ObserveEvent
    | ErrorEvent
    | ShutdownEvent;

/** Observer function that receives debug events. */
export type DebugObserverFn = (event: DebugEvent) => void;

// ============================================================================
// Factory
// ============================================================================

const PREFIX = '[mcp-interceptors]';

/**
 * Create a debug observer with compact console output.
 *
 * If a custom handler is provided, events are forwarded to it instead.
 *
 * ```
 * [mcp-interceptors] bind      email-redactor ✓ 0.1ms
 * [mcp-interceptors] invoke    email-redactor (mutation) ✓ 2.4ms
 * [mcp-interceptors] chain     tools/call@response m=1 v=1 o=1 ✓ 3.0ms
 * ```
 *
 * @param handler - Optional custom event handler. If omitted, uses `console.debug`.
 */
export function createDebugObserver(handler?: DebugObserverFn): DebugObserverFn {
    if (handler) return handler;

    return (event: DebugEvent): void => {
        switch (event.type) {
            case 'registry': {
                const target = event.interceptor ?? '*';
                console.debug(`${PREFIX} ${event.action.padEnd(9)} ${target} (size=${event.size})`);
                break;
            }

            case 'bind': {
                const status = event.ok ? '✓' : `✗ ${event.error ?? ''}`;
                console.debug(`${PREFIX} bind      ${event.interceptor} ${status} ${event.durationMs.toFixed(1)}ms`);
                break;
            }

            case 'invoke': {
                const icon = event.isError ? '✗' : '✓';
                console.debug(`${PREFIX} invoke    ${event.interceptor} (${event.kind}) ${icon} ${event.durationMs.toFixed(1)}ms`);
                break;
            }

            case 'discard':
                console.debug(`${PREFIX} discard   ${event.interceptor} (${event.kind}) ${event.reason}`);
                break;

            case 'chain': {
                const icon = event.outcome === 'ok' ? '✓' : `✗ ${event.outcome}`;
                console.debug(
                    `${PREFIX} chain     ${event.event}@${event.phase} ` +
                    `m=${event.mutations} v=${event.validations} o=${event.observers} ` +
                    `${icon} ${event.durationMs.toFixed(1)}ms`,
                );
                break;
            }

            case 'observe': {
                const status = event.outcome === 'success' ? '✓' : `✗ ${event.error ?? ''}`;
                console.debug(`${PREFIX} observe   ${event.interceptor} ${status} ${event.durationMs.toFixed(1)}ms`);
                break;
            }

            case 'error':
                console.debug(`${PREFIX} ERROR     ${event.interceptor} [${event.step}] ${event.code}: ${event.error}`);
                break;

            case 'shutdown':
                console.debug(
                    `${PREFIX} shutdown  drained=${event.drained} abandoned=${event.abandoned} ` +
                    `${event.durationMs.toFixed(1)}ms`,
                );
                break;
        }
    };
}

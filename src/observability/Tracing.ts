/**
 * Tracing: OpenTelemetry-Compatible Tracing Abstraction
 *
 * Minimal interfaces structurally compatible with OpenTelemetry's
 * `Tracer` and `Span`, so `trace.getTracer('mcp-interceptors')` can be
 * passed straight to the engine without an adapter or a runtime
 * `@opentelemetry/*` dependency.
 *
 * Span layout:
 * - `mcp.interceptor.chain`: one per chain execution
 * - `mcp.interceptor.<id>`: one per interceptor invocation
 *
 * @example
 * ```typescript
 * import { trace } from '@opentelemetry/api';
 *
 * const engine = createInterceptorEngine({
 *     tracing: trace.getTracer('mcp-interceptors'),
 * });
 * ```
 *
 * @module
 */

// ============================================================================
// Constants
// ============================================================================

/**
 * Span status codes matching OpenTelemetry's `SpanStatusCode` enum.
 *
 * - `UNSET` (0): caller-fixable failures (unknown id, bad payload)
 * - `OK` (1): successful execution
 * - `ERROR` (2): a handler threw, or a chain's mutation group failed
 */
export const SpanStatusCode = { UNSET: 0, OK: 1, ERROR: 2 } as const;

// ============================================================================
// Types
// ============================================================================

/** Attribute value type, matching OpenTelemetry's `SpanAttributeValue`. */
export type TraceAttributeValue =
    | string
    | number
    | boolean
    | ReadonlyArray<string>
    | ReadonlyArray<number>
    | ReadonlyArray<boolean>;

/** Minimal span interface, a structural subtype of OTel's `Span`. */
export interface InterceptorSpan {
    setAttribute(key: string, value: TraceAttributeValue): void;
    setStatus(status: { code: number; message?: string }): void;
    /** Optional: not every tracer supports events */
    addEvent?(name: string, attributes?: Record<string, TraceAttributeValue>): void;
    /** Must be called exactly once */
    end(): void;
    recordException(exception: Error | string): void;
}

/** Minimal tracer interface, a structural subtype of OTel's `Tracer`. */
export interface InterceptorTracer {
    startSpan(name: string, options?: {
        attributes?: Record<string, TraceAttributeValue>;
    }): InterceptorSpan;
}

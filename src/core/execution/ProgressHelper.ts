/**
 * ProgressHelper: Progress Reporting from Interceptor Handlers
 *
 * Interceptors report progress either by `yield`-ing from an async
 * generator handler or by calling an injected {@link ProgressEmitter}
 * (`p.context('progress')`). Both paths end in the same
 * {@link ProgressSink}.
 *
 * When the invoking party supplied no progress token the sink is absent
 * and every report is dropped silently.
 *
 * @example
 * ```typescript
 * handler: async function* ({ payload }) {
 *     yield progress(10, 'Scanning payload...');
 *     const issues = await scan(payload);
 *     yield progress(90, 'Collecting findings...');
 *     return findings(issues);
 * }
 * ```
 *
 * @module
 */

// ============================================================================
// Types
// ============================================================================

/**
 * A progress notification emitted by an interceptor.
 *
 * @see {@link progress} for the factory function
 */
export interface ProgressEvent {
    readonly __brand: 'ProgressEvent';
    /** Completion percentage (0–100) */
    readonly percent: number;
    /** Human-readable status message */
    readonly message: string;
}

/**
 * Callback receiving progress events for one invocation or chain.
 * The server attachment forwards them as `notifications/progress`.
 */
export type ProgressSink = (event: ProgressEvent) => void;

/** Handle injected into interceptors that declare `p.context('progress')`. */
export interface ProgressEmitter {
    /** Whether reports reach the invoking party (a progress token was supplied) */
    readonly active: boolean;
    report(percent: number, message?: string): void;
}

// ============================================================================
// Factories
// ============================================================================

/**
 * Create a progress event to yield from a generator handler.
 *
 * @param percent - Completion percentage (0–100)
 * @param message - Human-readable status message
 */
export function progress(percent: number, message: string = ''): ProgressEvent {
    return { __brand: 'ProgressEvent', percent, message };
}

/**
 * Type guard to check if a yielded value is a ProgressEvent.
 * @internal
 */
export function isProgressEvent(value: unknown): value is ProgressEvent {
    return (
        typeof value === 'object' &&
        value !== null &&
        '__brand' in value &&
        value.__brand === 'ProgressEvent'
    );
}

const NOOP_EMITTER: ProgressEmitter = {
    active: false,
    report(): void { /* no token, nothing to report to */ },
};

/**
 * Bind a {@link ProgressEmitter} to a sink.
 * Returns a shared no-op emitter when no sink is given.
 */
export function createProgressEmitter(sink?: ProgressSink): ProgressEmitter {
    if (!sink) return NOOP_EMITTER;
    return {
        active: true,
        report(percent: number, message?: string): void {
            sink(progress(percent, message));
        },
    };
}

/**
 * BackgroundTaskTracker: Owned Lifecycle for Detached Work
 *
 * Observability interceptors run detached from the chain that launched
 * them. The tracker keeps every in-flight task so the engine can drain
 * them on shutdown instead of dropping them mid-flight.
 *
 * Tasks receive the tracker's own signal, which aborts only when a
 * drain's grace period runs out. A caller cancelling its chain never
 * cancels an observer.
 *
 * @module
 */
import { InterceptorError } from '../errors.js';

/** Outcome of {@link BackgroundTaskTracker.drain}. */
export interface DrainReport {
    /** Tasks that settled within the grace period */
    readonly drained: number;
    /** Tasks still running when the grace period ended (aborted) */
    readonly abandoned: number;
}

export type BackgroundTask = (signal: AbortSignal) => Promise<void>;

export class BackgroundTaskTracker {
    private readonly _inFlight = new Set<Promise<void>>();
    private readonly _controller = new AbortController();
    private _accepting = true;

    /** Aborts when a drain gives up on the remaining tasks. */
    get signal(): AbortSignal {
        return this._controller.signal;
    }

    get accepting(): boolean {
        return this._accepting;
    }

    get size(): number {
        return this._inFlight.size;
    }

    /**
     * Start a detached task.
     *
     * The task must handle its own errors; a rejection is contained here
     * so it never surfaces as an unhandled rejection.
     *
     * @throws InterceptorError `ENGINE_SHUT_DOWN` once a drain has begun
     */
    start(task: BackgroundTask): void {
        if (!this._accepting) {
            throw new InterceptorError('ENGINE_SHUT_DOWN', 'The interceptor engine has been shut down.');
        }

        const running = Promise.resolve()
            .then(() => task(this._controller.signal))
            .catch(() => undefined)
            .finally(() => {
                this._inFlight.delete(running);
            });
        this._inFlight.add(running);
    }

    /**
     * Stop accepting tasks and wait up to `graceMs` for in-flight ones.
     * Whatever is still running afterwards is aborted and counted as
     * abandoned.
     */
    async drain(graceMs: number): Promise<DrainReport> {
        this._accepting = false;
        const pending = [...this._inFlight];
        if (pending.length === 0) return { drained: 0, abandoned: 0 };

        let timer: ReturnType<typeof setTimeout> | undefined;
        const deadline = new Promise<'timeout'>(resolve => {
            timer = setTimeout(() => resolve('timeout'), Math.max(0, graceMs));
        });

        try {
            const outcome = await Promise.race([
                Promise.allSettled(pending).then(() => 'settled' as const),
                deadline,
            ]);
            if (outcome === 'settled') return { drained: pending.length, abandoned: 0 };
        } finally {
            clearTimeout(timer);
        }

        const abandoned = pending.filter(task => this._inFlight.has(task)).length;
        this._controller.abort(new InterceptorError('ENGINE_SHUT_DOWN', 'Shutdown grace period elapsed.'));
        return { drained: pending.length - abandoned, abandoned };
    }
}

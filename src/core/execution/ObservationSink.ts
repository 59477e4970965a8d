/**
 * ObservationSink: Side Channel for Observability Results
 *
 * Detached observers never contribute to a chain's result. What they
 * return (or throw) lands here instead, keyed by interceptor id, so
 * hosts and tests can inspect it.
 *
 * Only the latest record per interceptor is kept.
 *
 * @module
 */
import { type InterceptorMetadata } from '../../domain/Interceptor.js';

export type Observation =
    | { readonly status: 'success'; readonly metadata?: InterceptorMetadata; readonly at: number }
    | { readonly status: 'failure'; readonly error: unknown; readonly at: number };

/** Listener notified after every record. */
export type ObservationListener = (interceptorId: string, observation: Observation) => void;

export class ObservationSink {
    private readonly _records = new Map<string, Observation>();
    private readonly _listeners = new Set<ObservationListener>();

    recordSuccess(interceptorId: string, metadata?: InterceptorMetadata): void {
        this.record(interceptorId, {
            status: 'success',
            ...(metadata !== undefined ? { metadata } : {}),
            at: Date.now(),
        });
    }

    recordFailure(interceptorId: string, error: unknown): void {
        this.record(interceptorId, { status: 'failure', error, at: Date.now() });
    }

    private record(interceptorId: string, observation: Observation): void {
        this._records.set(interceptorId, observation);
        for (const listener of this._listeners) listener(interceptorId, observation);
    }

    get(interceptorId: string): Observation | undefined {
        return this._records.get(interceptorId);
    }

    /** Copy of every record. */
    snapshot(): ReadonlyMap<string, Observation> {
        return new Map(this._records);
    }

    /** Return and forget every record. */
    take(): ReadonlyMap<string, Observation> {
        const records = new Map(this._records);
        this._records.clear();
        return records;
    }

    /** Subscribe; returns the unsubscribe function. */
    subscribe(listener: ObservationListener): () => void {
        this._listeners.add(listener);
        return () => {
            this._listeners.delete(listener);
        };
    }
}

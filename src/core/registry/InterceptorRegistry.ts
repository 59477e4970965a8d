/**
 * InterceptorRegistry: The Live Set of Interceptors
 *
 * The single place where interceptor definitions are registered and
 * where chains and `interceptors/list` look them up.
 *
 * - O(1) resolution by id via Map lookup
 * - Copy-on-write: every write swaps in a new immutable
 *   {@link RegistrySnapshot}; readers keep the snapshot they started
 *   with and never observe a half-applied write
 * - Stable, cursor-paginated listing sorted by id
 * - Lifecycle sync via `notifyChanged()`
 *   (→ `notifications/interceptors/list_changed`)
 *
 * @example
 * ```typescript
 * const registry = new InterceptorRegistry();
 * registry.registerAll(piiValidator, emailRedactor, auditTrail);
 *
 * registry.lookup('tools/call', 'Request');  // sorted by (priority, id)
 * await registry.list();                     // { interceptors, nextCursor? }
 * ```
 *
 * @module
 */
import {
    appliesToEvent,
    appliesToPhase,
    sortByPriority,
    type InterceptorDescriptor,
    type InterceptorPhase,
} from '../../domain/Interceptor.js';
import { createDescriptor, type InterceptorDefinition } from '../builder/defineInterceptor.js';
import { InterceptorError, duplicateId, unknownInterceptorId } from '../errors.js';
import { type Result, succeed, fail } from '../result.js';
import { type DebugObserverFn, type RegistryEvent } from '../../observability/DebugObserver.js';
import { CursorCodec, type CursorCodecOptions } from './CursorCodec.js';

// ── Types ────────────────────────────────────────────────

/**
 * Callback type for sending `notifications/interceptors/list_changed`.
 * Set by the server attachment.
 */
export type RegistryNotificationSink = () => void;

export interface InterceptorRegistryOptions {
    /** Entries per `list()` page (default 50) */
    readonly pageSize?: number;
    /** Coalescing window for list-changed notifications (default 100ms) */
    readonly notifyDebounceMs?: number;
    readonly cursor?: CursorCodecOptions;
    readonly debug?: DebugObserverFn;
}

/** One page of `list()`. */
export interface InterceptorPage {
    readonly interceptors: readonly InterceptorDescriptor[];
    /** Present when more entries follow */
    readonly nextCursor?: string;
}

// ── Snapshot ─────────────────────────────────────────────

/**
 * Immutable view of the registry at one point in time.
 *
 * Derived orderings are computed on first use and cached.
 */
export class RegistrySnapshot {
    private _byId?: readonly InterceptorDefinition[];

    constructor(
        private readonly _entries: ReadonlyMap<string, InterceptorDefinition>,
        /** Incremented on every write */
        readonly version: number,
    ) {}

    get size(): number {
        return this._entries.size;
    }

    has(id: string): boolean {
        return this._entries.has(id);
    }

    get(id: string): InterceptorDefinition | undefined {
        return this._entries.get(id);
    }

    /** Resolve an id, failing with `UNKNOWN_INTERCEPTOR_ID`. */
    resolve(id: string): Result<InterceptorDefinition> {
        const definition = this._entries.get(id);
        return definition ? succeed(definition) : fail(unknownInterceptorId(id));
    }

    entries(): IterableIterator<[string, InterceptorDefinition]> {
        return this._entries.entries();
    }

    /** Every definition, sorted by id (code-unit order). */
    sortedById(): readonly InterceptorDefinition[] {
        this._byId ??= Object.freeze(
            [...this._entries.values()].sort((a, b) => {
                const x = a.descriptor.id;
                const y = b.descriptor.id;
                return x < y ? -1 : x > y ? 1 : 0;
            }),
        );
        return this._byId;
    }
}

const EMPTY_SNAPSHOT = new RegistrySnapshot(new Map(), 0);

type RegistryChange = Omit<RegistryEvent, 'type' | 'timestamp'>;

/** Re-check a definition, which may come from an adapter rather than defineInterceptor(). */
function revalidate(definition: InterceptorDefinition): InterceptorDefinition {
    const source = definition.descriptor;
    const descriptor = createDescriptor(source.id, {
        kind: source.kind,
        name: source.name,
        ...(source.description !== undefined ? { description: source.description } : {}),
        priority: source.priority,
        events: source.applicableEvents,
        phases: source.applicablePhases,
    });
    if (typeof definition.handler !== 'function') {
        throw new InterceptorError(
            'INVALID_DEFINITION',
            `Interceptor "${descriptor.id}": handler must be a function.`,
            { interceptorId: descriptor.id },
        );
    }
    return Object.freeze({ ...definition, descriptor });
}

// ── Registry ─────────────────────────────────────────────

export class InterceptorRegistry {
    private _snapshot: RegistrySnapshot = EMPTY_SNAPSHOT;
    private readonly _pageSize: number;
    private readonly _debounceMs: number;
    private readonly _cursor: CursorCodec;
    private readonly _debug?: DebugObserverFn;
    private _notificationSink?: RegistryNotificationSink;
    private _notifyDebounceTimer: ReturnType<typeof setTimeout> | undefined;

    constructor(options: InterceptorRegistryOptions = {}) {
        this._pageSize = options.pageSize ?? 50;
        this._debounceMs = options.notifyDebounceMs ?? 100;
        this._cursor = new CursorCodec(options.cursor);
        if (options.debug) this._debug = options.debug;
        if (!Number.isSafeInteger(this._pageSize) || this._pageSize < 1) {
            throw new Error(`Registry page size must be a positive integer, got ${this._pageSize}.`);
        }
    }

    // ── Writes ───────────────────────────────────────────

    /**
     * Register one interceptor definition.
     *
     * @throws InterceptorError `DUPLICATE_ID` if the id is taken,
     *   `INVALID_DEFINITION` if the descriptor is malformed
     */
    register(definition: InterceptorDefinition): void {
        this.registerAll(definition);
    }

    /**
     * Register several definitions as one write.
     *
     * Every definition is checked before anything is committed: on the
     * first failure nothing is registered.
     *
     * @throws InterceptorError `DUPLICATE_ID` for an id already registered or
     *   repeated in the batch, `INVALID_DEFINITION` for a malformed descriptor
     */
    registerAll(...definitions: InterceptorDefinition[]): void {
        const current = this._snapshot;
        const next = new Map(current.entries());
        const changes: RegistryChange[] = [];

        for (const definition of definitions) {
            const checked = revalidate(definition);
            const id = checked.descriptor.id;
            if (next.has(id)) throw duplicateId(id);
            next.set(id, checked);
            changes.push({ action: 'register', interceptor: id, size: next.size });
        }

        if (changes.length > 0) this.commit(next, changes);
    }

    /** Remove one interceptor. Returns whether anything was removed. */
    unregister(id: string): boolean {
        const current = this._snapshot;
        if (!current.has(id)) return false;

        const next = new Map(current.entries());
        next.delete(id);
        this.commit(next, [{ action: 'unregister', interceptor: id, size: next.size }]);
        return true;
    }

    /** Remove every interceptor. */
    clear(): void {
        if (this._snapshot.size === 0) return;
        this.commit(new Map(), [{ action: 'clear', size: 0 }]);
    }

    /** Publish one new snapshot and schedule a single list-changed signal. */
    private commit(entries: Map<string, InterceptorDefinition>, changes: readonly RegistryChange[]): void {
        this._snapshot = new RegistrySnapshot(entries, this._snapshot.version + 1);
        for (const change of changes) {
            this._debug?.({ type: 'registry', ...change, timestamp: Date.now() });
        }
        this.notifyChanged();
    }

    // ── Reads ────────────────────────────────────────────

    /** The current immutable snapshot. */
    snapshot(): RegistrySnapshot {
        return this._snapshot;
    }

    get size(): number {
        return this._snapshot.size;
    }

    has(id: string): boolean {
        return this._snapshot.has(id);
    }

    /**
     * Resolve one id against the current snapshot.
     *
     * @throws InterceptorError `UNKNOWN_INTERCEPTOR_ID`
     */
    resolve(id: string): InterceptorDefinition {
        const result = this._snapshot.resolve(id);
        if (!result.ok) throw result.error;
        return result.value;
    }

    /**
     * Every descriptor applicable to `event` and `phase`, sorted by
     * `(priority, id)`.
     */
    lookup(event: string, phase: InterceptorPhase): InterceptorDescriptor[] {
        const matches = this._snapshot.sortedById()
            .map(definition => definition.descriptor)
            .filter(descriptor => appliesToEvent(descriptor, event) && appliesToPhase(descriptor, phase));
        return sortByPriority(matches);
    }

    /**
     * One page of descriptors sorted by id.
     *
     * The cursor names the last id of the previous page, so pages stay
     * consistent across concurrent registrations.
     *
     * @throws InterceptorError `INVALID_CURSOR` for a malformed or tampered cursor
     */
    async list(cursor?: string): Promise<InterceptorPage> {
        const all = this._snapshot.sortedById();

        let start = 0;
        if (cursor !== undefined) {
            const decoded = await this._cursor.decode(cursor);
            if (!decoded) {
                throw new InterceptorError('INVALID_CURSOR', 'The pagination cursor is invalid or has expired.');
            }
            const after = decoded.after;
            start = all.findIndex(definition => definition.descriptor.id > after);
            if (start === -1) start = all.length;
        }

        const page = all.slice(start, start + this._pageSize).map(definition => definition.descriptor);
        const last = page[page.length - 1];
        if (start + this._pageSize >= all.length || !last) {
            return { interceptors: page };
        }
        return { interceptors: page, nextCursor: await this._cursor.encode({ after: last.id }) };
    }

    // ── Lifecycle Sync ───────────────────────────────────

    /**
     * Set (or clear) the sink for `notifications/interceptors/list_changed`.
     *
     * @internal Called by the server attachment.
     */
    setNotificationSink(sink: RegistryNotificationSink | undefined): void {
        this._notificationSink = sink;
        if (!sink) this.cancelPendingNotification();
    }

    /**
     * Notify connected clients that the interceptor list changed.
     *
     * Called automatically after every write. Calls within the debounce
     * window are coalesced into one notification.
     */
    notifyChanged(): void {
        if (!this._notificationSink) return;

        if (this._notifyDebounceTimer !== undefined) {
            clearTimeout(this._notifyDebounceTimer);
        }

        const sink = this._notificationSink;
        this._notifyDebounceTimer = setTimeout(() => {
            this._notifyDebounceTimer = undefined;
            sink();
        }, this._debounceMs);
    }

    /** Drop a scheduled notification, if any. */
    cancelPendingNotification(): void {
        if (this._notifyDebounceTimer !== undefined) {
            clearTimeout(this._notifyDebounceTimer);
            this._notifyDebounceTimer = undefined;
        }
    }
}

/**
 * InterceptorRegistry.test.ts
 *
 * Registration, lookup ordering, cursor pagination, copy-on-write
 * snapshots and debounced list-changed notifications.
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { InterceptorRegistry } from '../../../src/core/registry/InterceptorRegistry.js';
import { CursorCodec } from '../../../src/core/registry/CursorCodec.js';
import { defineInterceptor } from '../../../src/core/builder/defineInterceptor.js';
import { isInterceptorError } from '../../../src/core/errors.js';
import { type InterceptorKind, type InterceptorPhase } from '../../../src/domain/Interceptor.js';
import { type DebugEvent } from '../../../src/observability/DebugObserver.js';

// ── Helpers ──────────────────────────────────────────────

function def(
    id: string,
    options: { kind?: InterceptorKind; priority?: number; events?: string[]; phases?: InterceptorPhase[] } = {},
) {
    return defineInterceptor(id, {
        kind: options.kind ?? 'Validation',
        priority: options.priority ?? 0,
        ...(options.events ? { events: options.events } : {}),
        ...(options.phases ? { phases: options.phases } : {}),
        handler: () => undefined,
    });
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
    try {
        await promise;
    } catch (err) {
        return err;
    }
    throw new Error('expected the promise to reject');
}

function ids(page: { interceptors: readonly { id: string }[] }): string[] {
    return page.interceptors.map(d => d.id);
}

afterEach(() => {
    vi.useRealTimers();
});

// ============================================================================
// Registration
// ============================================================================

describe('InterceptorRegistry: registration', () => {
    it('registers and resolves definitions', () => {
        const registry = new InterceptorRegistry();
        const pii = def('pii');
        registry.registerAll(pii, def('audit', { kind: 'Observability' }));

        expect(registry.size).toBe(2);
        expect(registry.has('pii')).toBe(true);
        expect(registry.resolve('pii').descriptor).toEqual(pii.descriptor);
        expect(registry.resolve('pii').handler).toBe(pii.handler);
    });

    it('rejects a duplicate id and keeps the first registration', () => {
        const registry = new InterceptorRegistry();
        const first = def('pii', { priority: 1 });
        registry.register(first);

        let caught: unknown;
        try {
            registry.register(def('pii', { priority: 2 }));
        } catch (err) {
            caught = err;
        }

        expect(isInterceptorError(caught, 'DUPLICATE_ID')).toBe(true);
        expect(caught).toHaveProperty('message', 'Interceptor "pii" is already registered.');
        expect(registry.resolve('pii').descriptor.priority).toBe(1);
    });

    it('registers nothing from a batch that contains a duplicate', () => {
        const registry = new InterceptorRegistry();
        registry.register(def('existing'));

        expect(() => registry.registerAll(def('a'), def('a'), def('b'))).toThrow('Interceptor "a" is already registered.');
        expect(() => registry.registerAll(def('c'), def('existing'))).toThrow('Interceptor "existing" is already registered.');
        expect(registry.snapshot().sortedById().map(d => d.descriptor.id)).toEqual(['existing']);
        expect(registry.snapshot().version).toBe(1);
    });

    it('commits a batch as one snapshot with one event per interceptor', () => {
        const events: DebugEvent[] = [];
        const registry = new InterceptorRegistry({ debug: e => events.push(e) });

        registry.registerAll(def('a'), def('b'));

        expect(registry.snapshot().version).toBe(1);
        expect(events.map(e => e.type === 'registry' ? [e.action, e.interceptor, e.size] : e.type)).toEqual([
            ['register', 'a', 1],
            ['register', 'b', 2],
        ]);
    });

    it('re-validates definitions built without defineInterceptor', () => {
        const registry = new InterceptorRegistry();
        const valid = def('x');
        const tampered = { ...valid, descriptor: { ...valid.descriptor, priority: 0.5 } };

        let caught: unknown;
        try {
            registry.register(tampered);
        } catch (err) {
            caught = err;
        }
        expect(isInterceptorError(caught, 'INVALID_DEFINITION')).toBe(true);
        expect(registry.size).toBe(0);
    });

    it('throws UNKNOWN_INTERCEPTOR_ID when resolving a missing id', () => {
        const registry = new InterceptorRegistry();
        expect(() => registry.resolve('ghost')).toThrow('Interceptor "ghost" does not exist.');
    });

    it('unregisters and clears', () => {
        const registry = new InterceptorRegistry();
        registry.registerAll(def('a'), def('b'));

        expect(registry.unregister('a')).toBe(true);
        expect(registry.unregister('a')).toBe(false);
        expect(registry.size).toBe(1);

        registry.clear();
        expect(registry.size).toBe(0);
    });

    it('rejects a non-positive page size', () => {
        expect(() => new InterceptorRegistry({ pageSize: 0 })).toThrow('Registry page size must be a positive integer, got 0.');
    });

    it('emits a registry debug event per write', () => {
        const events: DebugEvent[] = [];
        const registry = new InterceptorRegistry({ debug: e => events.push(e) });

        registry.register(def('a'));
        registry.unregister('a');
        registry.clear();

        expect(events.map(e => e.type === 'registry' ? [e.action, e.interceptor, e.size] : e.type)).toEqual([
            ['register', 'a', 1],
            ['unregister', 'a', 0],
        ]);
    });
});

// ============================================================================
// Snapshots
// ============================================================================

describe('InterceptorRegistry: snapshots', () => {
    it('keeps an earlier snapshot unchanged by later writes', () => {
        const registry = new InterceptorRegistry();
        registry.register(def('a'));
        const before = registry.snapshot();

        registry.register(def('b'));
        registry.unregister('a');

        expect(before.size).toBe(1);
        expect(before.has('a')).toBe(true);
        expect(before.has('b')).toBe(false);
        expect(registry.snapshot().version).toBe(before.version + 2);
    });

    it('resolves to a Result inside a snapshot', () => {
        const registry = new InterceptorRegistry();
        registry.register(def('a'));
        const snapshot = registry.snapshot();

        expect(snapshot.resolve('a').ok).toBe(true);
        const missing = snapshot.resolve('z');
        expect(missing.ok).toBe(false);
        if (!missing.ok) expect(missing.error.code).toBe('UNKNOWN_INTERCEPTOR_ID');
    });
});

// ============================================================================
// Lookup
// ============================================================================

describe('InterceptorRegistry: lookup', () => {
    it('returns applicable descriptors ordered by priority then id', () => {
        const registry = new InterceptorRegistry();
        registry.registerAll(
            def('zeta', { priority: 1 }),
            def('alpha', { priority: 5 }),
            def('beta', { priority: 1 }),
            def('early', { priority: -10 }),
        );

        expect(registry.lookup('tools/call', 'Request').map(d => d.id)).toEqual(['early', 'beta', 'zeta', 'alpha']);
    });

    it('filters by event and phase, treating empty lists as wildcards', () => {
        const registry = new InterceptorRegistry();
        registry.registerAll(
            def('any'),
            def('tools-only', { events: ['tools/call'] }),
            def('prompts-only', { events: ['prompts/get'] }),
            def('responses', { phases: ['Response'] }),
        );

        expect(registry.lookup('tools/call', 'Request').map(d => d.id)).toEqual(['any', 'tools-only']);
        expect(registry.lookup('prompts/get', 'Response').map(d => d.id)).toEqual(['any', 'prompts-only', 'responses']);
    });
});

// ============================================================================
// Pagination
// ============================================================================

describe('InterceptorRegistry: list', () => {
    it('returns everything in one page without a cursor when it fits', async () => {
        const registry = new InterceptorRegistry();
        registry.registerAll(def('b'), def('a'));

        const page = await registry.list();
        expect(ids(page)).toEqual(['a', 'b']);
        expect(page.nextCursor).toBeUndefined();
    });

    it('pages through entries sorted by id', async () => {
        const registry = new InterceptorRegistry({ pageSize: 2 });
        registry.registerAll(def('e'), def('c'), def('a'), def('d'), def('b'));

        const first = await registry.list();
        expect(ids(first)).toEqual(['a', 'b']);
        expect(first.nextCursor).toBeDefined();

        const second = await registry.list(first.nextCursor);
        expect(ids(second)).toEqual(['c', 'd']);

        const third = await registry.list(second.nextCursor);
        expect(ids(third)).toEqual(['e']);
        expect(third.nextCursor).toBeUndefined();
    });

    it('omits the cursor when the last page is exactly full', async () => {
        const registry = new InterceptorRegistry({ pageSize: 2 });
        registry.registerAll(def('a'), def('b'), def('c'), def('d'));

        const first = await registry.list();
        const second = await registry.list(first.nextCursor);

        expect(ids(second)).toEqual(['c', 'd']);
        expect(second.nextCursor).toBeUndefined();
    });

    it('continues after the last seen id across concurrent registrations', async () => {
        const registry = new InterceptorRegistry({ pageSize: 2 });
        registry.registerAll(def('a'), def('b'), def('c'));

        const first = await registry.list();
        registry.register(def('aa'));
        registry.unregister('c');
        registry.register(def('d'));

        const second = await registry.list(first.nextCursor);
        expect(ids(second)).toEqual(['d']);
    });

    it.each([
        ['no separator', 'garbage'],
        ['empty halves', '.'],
        ['too many parts', 'a.b.c'],
    ])('rejects a malformed cursor (%s)', async (_label, cursor) => {
        const registry = new InterceptorRegistry();
        const err = await rejection(registry.list(cursor));

        expect(isInterceptorError(err, 'INVALID_CURSOR')).toBe(true);
        expect(err).toHaveProperty('message', 'The pagination cursor is invalid or has expired.');
    });

    it('rejects a cursor whose payload was altered', async () => {
        const registry = new InterceptorRegistry({ pageSize: 1 });
        registry.registerAll(def('a'), def('b'));

        const { nextCursor } = await registry.list();
        const signature = nextCursor?.split('.')[1] ?? '';
        const forged = `${Buffer.from('{"after":"z"}').toString('base64url')}.${signature}`;

        expect(isInterceptorError(await rejection(registry.list(forged)), 'INVALID_CURSOR')).toBe(true);
    });

    it('rejects a cursor minted by a registry with another secret', async () => {
        const one = new InterceptorRegistry({ pageSize: 1 });
        const other = new InterceptorRegistry({ pageSize: 1 });
        one.registerAll(def('a'), def('b'));
        other.registerAll(def('a'), def('b'));

        const { nextCursor } = await one.list();
        expect(isInterceptorError(await rejection(other.list(nextCursor)), 'INVALID_CURSOR')).toBe(true);
    });

    it('accepts cursors across registries sharing a secret', async () => {
        const secret = 'test-secret-test-secret-test-sec';
        const one = new InterceptorRegistry({ pageSize: 1, cursor: { secret } });
        const other = new InterceptorRegistry({ pageSize: 1, cursor: { secret } });
        one.registerAll(def('a'), def('b'));
        other.registerAll(def('a'), def('b'));

        const { nextCursor } = await one.list();
        expect(ids(await other.list(nextCursor))).toEqual(['b']);
    });

    it('pages with encrypted cursors', async () => {
        const registry = new InterceptorRegistry({ pageSize: 1, cursor: { mode: 'encrypted' } });
        registry.registerAll(def('a'), def('b'));

        const first = await registry.list();
        expect(first.nextCursor).not.toContain(Buffer.from('{"after":"a"}').toString('base64url'));
        expect(ids(await registry.list(first.nextCursor))).toEqual(['b']);
    });
});

describe('CursorCodec', () => {
    it('round-trips a signed cursor with a readable payload', async () => {
        const codec = new CursorCodec();
        const cursor = await codec.encode({ after: 'pii' });

        expect(cursor.split('.')[0]).toBe(Buffer.from('{"after":"pii"}').toString('base64url'));
        expect(await codec.decode(cursor)).toEqual({ after: 'pii' });
    });

    it('rejects a secret of the wrong length', () => {
        expect(() => new CursorCodec({ secret: 'short' })).toThrow('Cursor secret must be exactly 32 bytes, got 5.');
    });

    it('returns undefined for a cursor from the other mode', async () => {
        const secret = 'test-secret-test-secret-test-sec';
        const signed = new CursorCodec({ secret });
        const encrypted = new CursorCodec({ secret, mode: 'encrypted' });

        expect(await encrypted.decode(await signed.encode({ after: 'a' }))).toBeUndefined();
    });
});

// ============================================================================
// Notifications
// ============================================================================

describe('InterceptorRegistry: list-changed notifications', () => {
    it('coalesces writes within the debounce window', () => {
        vi.useFakeTimers();
        const registry = new InterceptorRegistry();
        const sink = vi.fn();
        registry.setNotificationSink(sink);

        registry.register(def('a'));
        registry.register(def('b'));
        vi.advanceTimersByTime(50);
        registry.unregister('a');
        vi.advanceTimersByTime(99);
        expect(sink).not.toHaveBeenCalled();

        vi.advanceTimersByTime(1);
        expect(sink).toHaveBeenCalledTimes(1);
    });

    it('honours a custom debounce window', () => {
        vi.useFakeTimers();
        const registry = new InterceptorRegistry({ notifyDebounceMs: 10 });
        const sink = vi.fn();
        registry.setNotificationSink(sink);

        registry.register(def('a'));
        vi.advanceTimersByTime(10);
        expect(sink).toHaveBeenCalledTimes(1);
    });

    it('sends nothing without a sink', () => {
        vi.useFakeTimers();
        const registry = new InterceptorRegistry();
        registry.register(def('a'));

        const sink = vi.fn();
        registry.setNotificationSink(sink);
        vi.advanceTimersByTime(500);
        expect(sink).not.toHaveBeenCalled();
    });

    it('drops a pending notification when the sink is cleared', () => {
        vi.useFakeTimers();
        const registry = new InterceptorRegistry();
        const sink = vi.fn();
        registry.setNotificationSink(sink);

        registry.register(def('a'));
        registry.setNotificationSink(undefined);
        vi.advanceTimersByTime(500);
        expect(sink).not.toHaveBeenCalled();
    });
});

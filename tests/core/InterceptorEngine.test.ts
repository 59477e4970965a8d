/**
 * InterceptorEngine.test.ts
 *
 * End-to-end behavior of the engine facade: configuration, registry
 * delegation, invoke/executeChain, observations and shutdown.
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { z } from 'zod';
import { createInterceptorEngine, InterceptorEngine } from '../../src/core/InterceptorEngine.js';
import { defineInterceptor } from '../../src/core/builder/defineInterceptor.js';
import { p } from '../../src/core/binding/ParamDescriptors.js';
import { ServiceContainer, createServiceToken } from '../../src/core/binding/ServiceResolver.js';
import { ObservationSink } from '../../src/core/execution/ObservationSink.js';
import { isInterceptorError } from '../../src/core/errors.js';
import { error as errorFinding, metadata, modified } from '../../src/core/outcome.js';
import { type DebugEvent } from '../../src/observability/DebugObserver.js';

const Dictionary = createServiceToken<ReadonlySet<string>>('Dictionary');

async function rejection(promise: Promise<unknown>): Promise<unknown> {
    try {
        await promise;
    } catch (err) {
        return err;
    }
    throw new Error('expected the promise to reject');
}

afterEach(() => {
    vi.useRealTimers();
});

describe('InterceptorEngine: configuration', () => {
    it('applies defaults', () => {
        const engine = createInterceptorEngine();
        expect(engine).toBeInstanceOf(InterceptorEngine);
        expect(engine.config).toEqual({
            pageSize: 50,
            shutdownGraceMs: 5000,
            notifyDebounceMs: 100,
            cursor: { mode: 'signed' },
        });
    });

    it('rejects invalid settings at construction', () => {
        expect(() => createInterceptorEngine({ pageSize: 0 })).toThrow('Invalid interceptor engine configuration');
    });

    it('uses the configured page size for listing', async () => {
        const engine = createInterceptorEngine({ pageSize: 1 }).register(
            defineInterceptor('a', { kind: 'Validation', handler: () => undefined }),
            defineInterceptor('b', { kind: 'Validation', handler: () => undefined }),
        );

        const page = await engine.list();
        expect(page.interceptors.map(d => d.id)).toEqual(['a']);
        expect(page.nextCursor).toBeDefined();
    });
});

describe('InterceptorEngine: registry delegation', () => {
    it('registers, looks up and unregisters', () => {
        const engine = createInterceptorEngine().register(
            defineInterceptor('late', { kind: 'Validation', priority: 10, handler: () => undefined }),
            defineInterceptor('early', { kind: 'Mutation', priority: -1, handler: () => undefined }),
            defineInterceptor('resp', { kind: 'Validation', phases: ['Response'], handler: () => undefined }),
        );

        expect(engine.lookup('tools/call', 'Request').map(d => d.id)).toEqual(['early', 'late']);
        expect(engine.unregister('early')).toBe(true);
        expect(engine.registry.size).toBe(2);
    });
});

describe('InterceptorEngine: execution', () => {
    it('injects services into interceptors', async () => {
        const services = new ServiceContainer().addInstance(Dictionary, new Set(['secret']));
        const engine = createInterceptorEngine({ services }).register(defineInterceptor('banned-words', {
            kind: 'Validation',
            params: { text: z.string(), words: p.service(Dictionary) },
            handler: ({ text, words }) => text.split(' ')
                .filter(word => words.has(word))
                .map(word => errorFinding(`banned word "${word}"`, '$.text')),
        }));

        const result = await engine.invoke({
            interceptorId: 'banned-words',
            event: 'tools/call',
            phase: 'Request',
            payload: { text: 'the secret plan' },
        });

        expect(result).toEqual({
            validationResults: [{ severity: 'Error', message: 'banned word "secret"', path: '$.text' }],
        });
    });

    it('invokes an unknown id with UNKNOWN_INTERCEPTOR_ID and a resolve debug event', async () => {
        const events: DebugEvent[] = [];
        const engine = createInterceptorEngine({ debug: e => events.push(e) });

        const err = await rejection(engine.invoke({ interceptorId: 'nope', event: 'e', phase: 'Request' }));

        expect(isInterceptorError(err, 'UNKNOWN_INTERCEPTOR_ID')).toBe(true);
        expect(events).toEqual([expect.objectContaining({ type: 'error', step: 'resolve', interceptor: 'nope' })]);
    });

    it('runs a full chain and records observers in the shared sink', async () => {
        const observations = new ObservationSink();
        const engine = createInterceptorEngine({ observations }).register(
            defineInterceptor('trim', {
                kind: 'Mutation',
                params: { text: 'string' },
                handler: ({ text }) => modified({ text: text.trim() }),
            }),
            defineInterceptor('length', {
                kind: 'Validation',
                params: { text: 'string' },
                handler: ({ text }) => text.length > 5 ? errorFinding('too long') : undefined,
            }),
            defineInterceptor('audit', { kind: 'Observability', handler: () => metadata({ seen: true }) }),
        );

        const result = await engine.executeChain({
            interceptorIds: ['audit', 'length', 'trim'],
            event: 'tools/call',
            phase: 'Request',
            payload: { text: '  hello  ' },
        });
        await engine.shutdown();

        expect(result).toEqual({
            modifiedPayload: { text: 'hello' },
            allValidationResults: [{ severity: 'Error', message: 'too long' }],
            metadata: {},
        });
        expect(engine.observations).toBe(observations);
        expect(observations.get('audit')).toMatchObject({ status: 'success', metadata: { seen: true } });
    });
});

describe('InterceptorEngine: shutdown', () => {
    it('waits for in-flight observers and reports them', async () => {
        const events: DebugEvent[] = [];
        let release: () => void = () => undefined;
        const gate = new Promise<void>(resolve => { release = resolve; });
        const engine = createInterceptorEngine({ debug: e => events.push(e) }).register(
            defineInterceptor('slow', { kind: 'Observability', handler: async () => { await gate; } }),
        );

        await engine.executeChain({ interceptorIds: ['slow'], event: 'e', phase: 'Request' });
        expect(engine.pendingObservers).toBe(1);

        const shuttingDown = engine.shutdown();
        release();
        const report = await shuttingDown;

        expect(report).toEqual({ drained: 1, abandoned: 0 });
        expect(engine.isShutDown).toBe(true);
        expect(events.find(e => e.type === 'shutdown')).toMatchObject({ drained: 1, abandoned: 0 });
    });

    it('abandons observers that outlive the grace period', async () => {
        vi.useFakeTimers();
        const engine = createInterceptorEngine().register(defineInterceptor('stuck', {
            kind: 'Observability',
            params: { signal: p.context('signal') },
            handler: ({ signal }) => new Promise<void>(resolve => signal.addEventListener('abort', () => resolve())),
        }));

        await engine.executeChain({ interceptorIds: ['stuck'], event: 'e', phase: 'Request' });
        const shuttingDown = engine.shutdown(20);
        await vi.advanceTimersByTimeAsync(20);

        expect(await shuttingDown).toEqual({ drained: 0, abandoned: 1 });
    });

    it('refuses work after shutdown', async () => {
        const engine = createInterceptorEngine().register(
            defineInterceptor('v', { kind: 'Validation', handler: () => undefined }),
        );
        await engine.shutdown();

        const request = { event: 'e', phase: 'Request' as const };
        expect(isInterceptorError(await rejection(engine.invoke({ ...request, interceptorId: 'v' })), 'ENGINE_SHUT_DOWN')).toBe(true);
        expect(isInterceptorError(await rejection(engine.executeChain({ ...request, interceptorIds: ['v'] })), 'ENGINE_SHUT_DOWN')).toBe(true);
        expect(() => engine.register(defineInterceptor('w', { kind: 'Validation', handler: () => undefined })))
            .toThrow('The interceptor engine has been shut down.');
    });

    it('cancels a pending list-changed notification', async () => {
        vi.useFakeTimers();
        const notification = vi.fn(async () => undefined);
        const engine = createInterceptorEngine();
        engine.attachToServer({ setRequestHandler: vi.fn(), notification });

        engine.register(defineInterceptor('v', { kind: 'Validation', handler: () => undefined }));
        await engine.shutdown();
        vi.advanceTimersByTime(500);

        expect(notification).not.toHaveBeenCalled();
    });

    it('can be called twice', async () => {
        const engine = createInterceptorEngine();
        await engine.shutdown();
        await expect(engine.shutdown()).resolves.toEqual({ drained: 0, abandoned: 0 });
    });
});

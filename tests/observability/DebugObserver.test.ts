/**
 * DebugObserver.test.ts
 *
 * Console formatting of the default observer and pass-through of a
 * custom handler.
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { createDebugObserver, type DebugEvent } from '../../src/observability/DebugObserver.js';
import { createInterceptorEngine } from '../../src/core/InterceptorEngine.js';
import { defineInterceptor } from '../../src/core/builder/defineInterceptor.js';

afterEach(() => {
    vi.restoreAllMocks();
});

function captureConsole() {
    return vi.spyOn(console, 'debug').mockImplementation(() => undefined);
}

describe('createDebugObserver', () => {
    it('returns a custom handler unchanged', () => {
        const handler = (_event: DebugEvent): void => undefined;
        expect(createDebugObserver(handler)).toBe(handler);
    });

    it.each<[DebugEvent, string]>([
        [
            { type: 'registry', action: 'register', interceptor: 'pii', size: 1, timestamp: 0 },
            '[mcp-interceptors] register  pii (size=1)',
        ],
        [
            { type: 'registry', action: 'clear', size: 0, timestamp: 0 },
            '[mcp-interceptors] clear     * (size=0)',
        ],
        [
            { type: 'bind', interceptor: 'pii', ok: true, durationMs: 0.123, timestamp: 0 },
            '[mcp-interceptors] bind      pii ✓ 0.1ms',
        ],
        [
            { type: 'bind', interceptor: 'pii', ok: false, error: 'missing text', durationMs: 0, timestamp: 0 },
            '[mcp-interceptors] bind      pii ✗ missing text 0.0ms',
        ],
        [
            { type: 'invoke', interceptor: 'redact', kind: 'Mutation', isError: false, durationMs: 2.44, timestamp: 0 },
            '[mcp-interceptors] invoke    redact (Mutation) ✓ 2.4ms',
        ],
        [
            { type: 'discard', interceptor: 'audit', kind: 'Observability', reason: 'bare value', timestamp: 0 },
            '[mcp-interceptors] discard   audit (Observability) bare value',
        ],
        [
            {
                type: 'chain', event: 'tools/call', phase: 'Response',
                mutations: 1, validations: 2, observers: 0, skipped: 0,
                outcome: 'ok', durationMs: 3, timestamp: 0,
            },
            '[mcp-interceptors] chain     tools/call@Response m=1 v=2 o=0 ✓ 3.0ms',
        ],
        [
            {
                type: 'chain', event: 'tools/call', phase: 'Request',
                mutations: 1, validations: 0, observers: 0, skipped: 0,
                outcome: 'mutation_failed', durationMs: 1, timestamp: 0,
            },
            '[mcp-interceptors] chain     tools/call@Request m=1 v=0 o=0 ✗ mutation_failed 1.0ms',
        ],
        [
            { type: 'observe', interceptor: 'audit', outcome: 'failure', error: 'disk full', durationMs: 5, timestamp: 0 },
            '[mcp-interceptors] observe   audit ✗ disk full 5.0ms',
        ],
        [
            {
                type: 'error', interceptor: 'pii', code: 'MISSING_REQUIRED_PARAMETER',
                error: 'no text', step: 'bind', timestamp: 0,
            },
            '[mcp-interceptors] ERROR     pii [bind] MISSING_REQUIRED_PARAMETER: no text',
        ],
        [
            { type: 'shutdown', drained: 2, abandoned: 1, durationMs: 10, timestamp: 0 },
            '[mcp-interceptors] shutdown  drained=2 abandoned=1 10.0ms',
        ],
    ])('formats %o', (event, line) => {
        const spy = captureConsole();
        createDebugObserver()(event);
        expect(spy).toHaveBeenCalledWith(line);
    });

    it('logs through the engine when enabled', async () => {
        const spy = captureConsole();
        const engine = createInterceptorEngine({ debug: createDebugObserver() });
        engine.register(defineInterceptor('pii', { kind: 'Validation', handler: () => undefined }));

        await engine.invoke({ interceptorId: 'pii', event: 'e', phase: 'Request' });

        const lines = spy.mock.calls.map(call => String(call[0]));
        expect(lines[0]).toBe('[mcp-interceptors] register  pii (size=1)');
        expect(lines[1]).toMatch(/^\[mcp-interceptors\] bind {6}pii ✓ \d+\.\dms$/);
        expect(lines[2]).toMatch(/^\[mcp-interceptors\] invoke {4}pii \(Validation\) ✓ \d+\.\dms$/);
    });
});

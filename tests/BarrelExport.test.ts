import { describe, it, expect } from 'vitest';

// ============================================================================
// Barrel Export Verification
// Ensures all public API exports are accessible from the package entry point
// ============================================================================

describe('Barrel Export (src/index.ts)', () => {
    it('should export the domain enums and ordering helpers', async () => {
        const mod = await import('../src/index.js');

        expect(mod.InterceptorKind.Mutation).toBe('Mutation');
        expect(mod.InterceptorPhase.Response).toBe('Response');
        expect(mod.Severity.Error).toBe('Error');
        expect(mod.compareDescriptors).toBeTypeOf('function');
        expect(mod.sortByPriority).toBeTypeOf('function');
    });

    it('should export the definition helpers', async () => {
        const mod = await import('../src/index.js');

        expect(mod.defineInterceptor).toBeTypeOf('function');
        expect(mod.p.service).toBeTypeOf('function');
        expect(mod.ServiceContainer).toBeTypeOf('function');
        expect(mod.modified).toBeTypeOf('function');
        expect(mod.findings).toBeTypeOf('function');
        expect(mod.progress).toBeTypeOf('function');
    });

    it('should export the engine and its collaborators', async () => {
        const mod = await import('../src/index.js');

        expect(mod.createInterceptorEngine).toBeTypeOf('function');
        expect(mod.InterceptorRegistry).toBeTypeOf('function');
        expect(mod.ChainExecutor).toBeTypeOf('function');
        expect(mod.InvocationEngine).toBeTypeOf('function');
        expect(mod.BackgroundTaskTracker).toBeTypeOf('function');
        expect(mod.ObservationSink).toBeTypeOf('function');
        expect(mod.InterceptorError).toBeTypeOf('function');
        expect(mod.ChainMutationError).toBeTypeOf('function');
        expect(mod.loadEngineConfigFromEnv).toBeTypeOf('function');
    });

    it('should export the server integration and observability', async () => {
        const mod = await import('../src/index.js');

        expect(mod.attachInterceptors).toBeTypeOf('function');
        expect(mod.toMcpError).toBeTypeOf('function');
        expect(mod.InterceptorMethods.ExecuteChain).toBe('interceptors/executeChain');
        expect(mod.createDebugObserver).toBeTypeOf('function');
        expect(mod.SpanStatusCode.ERROR).toBe(2);
    });
});

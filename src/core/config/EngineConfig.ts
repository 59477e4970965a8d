/**
 * EngineConfig: Validated Engine Settings
 *
 * Every setting has a default, so `parseEngineConfig({})` is a complete
 * configuration. Environment variables are an optional overlay.
 *
 * | Variable | Setting |
 * |---|---|
 * | `MCP_INTERCEPTORS_PAGE_SIZE` | `pageSize` |
 * | `MCP_INTERCEPTORS_SHUTDOWN_GRACE_MS` | `shutdownGraceMs` |
 * | `MCP_INTERCEPTORS_NOTIFY_DEBOUNCE_MS` | `notifyDebounceMs` |
 * | `MCP_INTERCEPTORS_CURSOR_MODE` | `cursor.mode` |
 * | `MCP_INTERCEPTORS_CURSOR_SECRET` | `cursor.secret` |
 *
 * @module
 */
import { z } from 'zod';
import { formatZodIssues } from '../errors.js';

export const EngineConfigSchema = z.object({
    /** Entries per `interceptors/list` page */
    pageSize: z.number().int().min(1).max(1000).default(50),
    /** How long `shutdown()` waits for detached observers */
    shutdownGraceMs: z.number().int().min(0).default(5000),
    /** Coalescing window for list-changed notifications */
    notifyDebounceMs: z.number().int().min(0).default(100),
    cursor: z.object({
        mode: z.enum(['signed', 'encrypted']).default('signed'),
        /** 32 bytes; a random per-process key when absent */
        secret: z.string()
            .refine(value => Buffer.byteLength(value, 'utf8') === 32, 'must be exactly 32 bytes')
            .optional(),
    }).default({}),
});

export type EngineConfig = z.output<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

/**
 * Validate settings and fill in defaults.
 *
 * @throws Error listing every invalid setting
 */
export function parseEngineConfig(input: EngineConfigInput = {}): EngineConfig {
    const parsed = EngineConfigSchema.safeParse(input);
    if (!parsed.success) {
        throw new Error(`Invalid interceptor engine configuration: ${formatZodIssues(parsed.error)}`);
    }
    return parsed.data;
}

const IntegerFromEnv = z.string().trim().regex(/^\d+$/, 'must be a non-negative integer').transform(Number);

const EnvSchema = z.object({
    MCP_INTERCEPTORS_PAGE_SIZE: IntegerFromEnv.optional(),
    MCP_INTERCEPTORS_SHUTDOWN_GRACE_MS: IntegerFromEnv.optional(),
    MCP_INTERCEPTORS_NOTIFY_DEBOUNCE_MS: IntegerFromEnv.optional(),
    MCP_INTERCEPTORS_CURSOR_MODE: z.enum(['signed', 'encrypted']).optional(),
    MCP_INTERCEPTORS_CURSOR_SECRET: z.string().optional(),
});

/**
 * Read settings from environment variables, falling back to defaults.
 *
 * @param env - Defaults to `process.env`
 * @throws Error listing every invalid variable
 */
export function loadEngineConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EngineConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        throw new Error(`Invalid interceptor engine environment: ${formatZodIssues(parsed.error)}`);
    }
    const vars = parsed.data;

    return parseEngineConfig({
        ...(vars.MCP_INTERCEPTORS_PAGE_SIZE !== undefined ? { pageSize: vars.MCP_INTERCEPTORS_PAGE_SIZE } : {}),
        ...(vars.MCP_INTERCEPTORS_SHUTDOWN_GRACE_MS !== undefined
            ? { shutdownGraceMs: vars.MCP_INTERCEPTORS_SHUTDOWN_GRACE_MS }
            : {}),
        ...(vars.MCP_INTERCEPTORS_NOTIFY_DEBOUNCE_MS !== undefined
            ? { notifyDebounceMs: vars.MCP_INTERCEPTORS_NOTIFY_DEBOUNCE_MS }
            : {}),
        cursor: {
            ...(vars.MCP_INTERCEPTORS_CURSOR_MODE !== undefined ? { mode: vars.MCP_INTERCEPTORS_CURSOR_MODE } : {}),
            ...(vars.MCP_INTERCEPTORS_CURSOR_SECRET ? { secret: vars.MCP_INTERCEPTORS_CURSOR_SECRET } : {}),
        },
    });
}

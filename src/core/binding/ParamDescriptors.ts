/**
 * ParamDescriptors: Typed Argument Declarations for Interceptors
 *
 * An interceptor declares its arguments as a named map. Each entry says
 * where the value comes from:
 *
 * - `p.context(...)`: a well-known ambient value (signal, services, ...)
 * - `p.service(token)`: the service resolver, never the payload
 * - `p.field(schema)`, a Zod schema, or a shorthand string: a payload
 *   field of the same name, decoded with the schema
 *
 * The handler's argument type is inferred from the map.
 *
 * @example
 * ```typescript
 * params: {
 *     text:   'string',                                   // payload.text
 *     limit:  z.number().int().default(10),               // payload.limit
 *     log:    p.service(AuditLog),                        // resolver
 *     signal: p.context('signal'),                        // AbortSignal
 * }
 * // handler receives { text: string; limit: number; log: AuditLog; signal: AbortSignal }
 * ```
 *
 * @module
 */
import { z, type ZodTypeAny } from 'zod';
import { type ServiceKey, type ServiceResolver, type ServiceToken } from './ServiceResolver.js';
import { type SessionHandle } from './InvocationContext.js';
import { type ProgressEmitter } from '../execution/ProgressHelper.js';
import { type InvocationRequest } from '../../domain/Interceptor.js';

// ============================================================================
// Descriptor Types
// ============================================================================

/** Types of the well-known context values. */
export interface ContextValueMap {
    signal: AbortSignal;
    services: ServiceResolver;
    session: SessionHandle;
    progress: ProgressEmitter;
    request: InvocationRequest;
    payload: unknown;
}

export type ContextValue = keyof ContextValueMap;

export interface ContextParam<V extends ContextValue = ContextValue> {
    readonly source: 'context';
    readonly value: V;
}

export interface ServiceParam<T = unknown, TOptional extends boolean = boolean> {
    readonly source: 'service';
    readonly token: ServiceToken<T>;
    /** Resolve through a keyed registration instead of the bare token */
    readonly key?: ServiceKey;
    readonly optional: TOptional;
}

export interface FieldParam<S extends ZodTypeAny = ZodTypeAny> {
    readonly source: 'payload';
    readonly schema: S;
    /**
     * When the resolver reports it can satisfy this token, the value
     * comes from the resolver instead of the payload.
     */
    readonly serviceToken?: ServiceToken;
}

/** Shorthand payload field types */
export type ShorthandType = 'string' | 'number' | 'boolean' | 'json';

export type ParamDef = ContextParam | ServiceParam | FieldParam | ZodTypeAny | ShorthandType;

export type ParamsMap = Record<string, ParamDef>;

// ============================================================================
// Type Inference
// ============================================================================

type InferShorthand<T extends ShorthandType> =
    T extends 'string' ? string :
    T extends 'number' ? number :
    T extends 'boolean' ? boolean :
    unknown;

export type InferParam<P> =
    P extends ContextParam<infer V> ? ContextValueMap[V] :
    P extends ServiceParam<infer T, true> ? T | undefined :
    P extends ServiceParam<infer T, false> ? T :
    P extends FieldParam<infer S> ? z.output<S> :
    P extends ZodTypeAny ? z.output<P> :
    P extends ShorthandType ? InferShorthand<P> :
    never;

/** The bound argument object a handler receives. */
export type InferArgs<M extends ParamsMap> = { [K in keyof M]: InferParam<M[K]> };

// ============================================================================
// Builders
// ============================================================================

interface ServiceOptions {
    readonly key?: ServiceKey;
}

function context<V extends ContextValue>(value: V): ContextParam<V> {
    return { source: 'context', value };
}

function service<T>(token: ServiceToken<T>, options: ServiceOptions = {}): ServiceParam<T, false> {
    return { source: 'service', token, optional: false, ...(options.key !== undefined ? { key: options.key } : {}) };
}

function optionalService<T>(token: ServiceToken<T>, options: ServiceOptions = {}): ServiceParam<T, true> {
    return { source: 'service', token, optional: true, ...(options.key !== undefined ? { key: options.key } : {}) };
}

function field<S extends ZodTypeAny>(schema: S, options: { serviceToken?: ServiceToken } = {}): FieldParam<S> {
    return { source: 'payload', schema, ...(options.serviceToken ? { serviceToken: options.serviceToken } : {}) };
}

/** Parameter descriptor builders. */
export const p = { context, service, optionalService, field } as const;

// ============================================================================
// Runtime Normalization
// ============================================================================

/** A declaration after shorthand expansion. */
export type NormalizedParam =
    | (ContextParam & { readonly name: string })
    | (ServiceParam & { readonly name: string })
    | (FieldParam & { readonly name: string });

function shorthandToZod(value: ShorthandType): ZodTypeAny {
    switch (value) {
        case 'string': return z.string();
        case 'number': return z.number();
        case 'boolean': return z.boolean();
        case 'json': return z.unknown();
    }
}

function isZodType(value: unknown): value is ZodTypeAny {
    return value instanceof z.ZodType;
}

/**
 * Expand a params map into an ordered list of normalized declarations.
 *
 * @throws Error on a descriptor that is none of the known forms
 */
export function normalizeParams(params: ParamsMap | undefined): readonly NormalizedParam[] {
    if (!params) return [];
    const normalized: NormalizedParam[] = [];
    for (const [name, def] of Object.entries(params)) {
        if (typeof def === 'string') {
            normalized.push({ name, source: 'payload', schema: shorthandToZod(def) });
        } else if (isZodType(def)) {
            normalized.push({ name, source: 'payload', schema: def });
        } else if (def.source === 'context' || def.source === 'service' || def.source === 'payload') {
            normalized.push({ ...def, name });
        } else {
            throw new Error(`Unknown parameter descriptor for "${name}".`);
        }
    }
    return normalized;
}

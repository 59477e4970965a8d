/**
 * ProtocolSchemas: Zod Schemas for the Interceptor Wire Protocol
 *
 * Request envelopes carry a literal `method` so they can be passed to the
 * MCP SDK's `setRequestHandler()`, which routes on `schema.shape.method`.
 * Params are parsed separately.
 *
 * @module
 */
import { z } from 'zod';
import {
    InterceptorKind,
    InterceptorPhase,
    Severity,
    type Finding,
    type InterceptorDescriptor,
} from '../../domain/Interceptor.js';

// ── Method Names ─────────────────────────────────────────

export const InterceptorMethods = {
    List: 'interceptors/list',
    Invoke: 'interceptors/invoke',
    ExecuteChain: 'interceptors/executeChain',
    ListChanged: 'notifications/interceptors/list_changed',
} as const;

// ── Enums & Records ──────────────────────────────────────

export const SeveritySchema = z.enum([Severity.Info, Severity.Warning, Severity.Error]);
export const PhaseSchema = z.enum([InterceptorPhase.Request, InterceptorPhase.Response]);
export const KindSchema = z.enum([
    InterceptorKind.Validation,
    InterceptorKind.Mutation,
    InterceptorKind.Observability,
]);

export const FindingSchema = z.object({
    severity: SeveritySchema,
    message: z.string(),
    path: z.string().optional(),
}).strict();

export const FindingListSchema = z.array(FindingSchema);

const ProgressMetaSchema = z.object({
    progressToken: z.union([z.string(), z.number()]).optional(),
}).passthrough();

// ── Requests ─────────────────────────────────────────────

/**
 * Envelope handed to `setRequestHandler()`. Params are left unchecked
 * there so a malformed request surfaces as `InvalidParams` from our own
 * parse rather than as an internal error from the SDK's.
 */
function requestEnvelope<M extends string>(method: M) {
    return z.object({
        method: z.literal(method),
        params: z.unknown().optional(),
    });
}

export const ListInterceptorsRequestSchema = requestEnvelope(InterceptorMethods.List);
export const InvokeInterceptorRequestSchema = requestEnvelope(InterceptorMethods.Invoke);
export const ExecuteChainRequestSchema = requestEnvelope(InterceptorMethods.ExecuteChain);

export const ListInterceptorsParamsSchema = z.object({
    cursor: z.string().optional(),
    _meta: ProgressMetaSchema.optional(),
}).optional();

export const InvokeInterceptorParamsSchema = z.object({
    interceptorId: z.string().min(1),
    event: z.string().min(1),
    phase: PhaseSchema,
    payload: z.unknown().optional(),
    _meta: ProgressMetaSchema.optional(),
});

export const ExecuteChainParamsSchema = z.object({
    interceptorIds: z.array(z.string().min(1)),
    event: z.string().min(1),
    phase: PhaseSchema,
    payload: z.unknown().optional(),
    _meta: ProgressMetaSchema.optional(),
});

// ── Results ──────────────────────────────────────────────

/** Wire shape of one entry in `interceptors/list`. */
export interface WireInterceptor {
    id: string;
    name: string;
    description?: string;
    type: InterceptorKind;
    priority: number;
    applicableEvents?: string[];
    phases?: InterceptorPhase[];
}

export interface ListInterceptorsResult {
    interceptors: WireInterceptor[];
    nextCursor?: string;
}

export interface InvokeInterceptorResult {
    modifiedPayload?: unknown;
    validationResults?: Finding[];
    metadata?: Record<string, unknown>;
}

export interface ExecuteChainResult {
    modifiedPayload?: unknown;
    allValidationResults: Finding[];
    /** Omitted when no step returned metadata */
    metadata?: Record<string, Record<string, unknown>>;
}

/** Project a descriptor onto the wire, omitting empty optional sets. */
export function toWireInterceptor(descriptor: InterceptorDescriptor): WireInterceptor {
    return {
        id: descriptor.id,
        name: descriptor.name,
        ...(descriptor.description !== undefined ? { description: descriptor.description } : {}),
        type: descriptor.kind,
        priority: descriptor.priority,
        ...(descriptor.applicableEvents.length > 0 ? { applicableEvents: [...descriptor.applicableEvents] } : {}),
        ...(descriptor.applicablePhases.length > 0 ? { phases: [...descriptor.applicablePhases] } : {}),
    };
}

/**
 * Ambient per-request values available to parameter binding.
 *
 * @module
 */
import { type ServiceResolver } from './ServiceResolver.js';
import { type ProgressSink } from '../execution/ProgressHelper.js';

/** Identifies the server and session an invocation belongs to. */
export interface SessionHandle {
    readonly sessionId?: string;
    /** The MCP server instance, when invoked through an attachment */
    readonly server?: unknown;
}

export interface InvocationContext {
    readonly signal: AbortSignal;
    readonly services: ServiceResolver;
    readonly session: SessionHandle;
    /** Absent when the invoking party supplied no progress token */
    readonly progressSink?: ProgressSink;
}

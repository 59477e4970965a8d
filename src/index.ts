/**
 * @module
 * @description
 * Interceptor descriptors, findings and request/result shapes.
 */
// ── Domain ───────────────────────────────────────────────
/** @category Domain */
export {
    InterceptorKind,
    InterceptorPhase,
    Severity,
    compareDescriptors,
    sortByPriority,
    appliesToEvent,
    appliesToPhase,
    type InterceptorDescriptor,
    type Finding,
    type InterceptorMetadata,
    type InvocationRequest,
    type InvocationResult,
    type ChainRequest,
    type ChainResult,
} from './domain/Interceptor.js';

/**
 * @module
 * @description
 * Defining interceptors: typed parameters, services and outcomes.
 */
// ── Definition ───────────────────────────────────────────
/** @category Definition */
export {
    defineInterceptor,
    createDescriptor,
    type InterceptorConfig,
    type InterceptorDefinition,
    type TargetContext,
    type HandlerResult,
    type MutationReturn,
    type ValidationReturn,
    type ObservabilityReturn,
} from './core/builder/defineInterceptor.js';
/** @category Definition */
export {
    p,
    type ParamDef,
    type ParamsMap,
    type InferArgs,
    type ContextValueMap,
} from './core/binding/ParamDescriptors.js';
/** @category Definition */
export {
    ServiceContainer,
    createServiceToken,
    EMPTY_SERVICES,
    type ServiceResolver,
    type ServiceToken,
    type InjectionToken,
    type ServiceLookup,
    type ServiceKey,
} from './core/binding/ServiceResolver.js';
/** @category Definition */
export { type SessionHandle } from './core/binding/InvocationContext.js';
/** @category Definition */
export {
    modified, findings, metadata, finding, info, warning, error,
    type InterceptorOutcome,
    type ModifiedOutcome,
    type FindingsOutcome,
    type MetadataOutcome,
} from './core/outcome.js';
/** @category Definition */
export {
    progress,
    type ProgressEvent,
    type ProgressEmitter,
    type ProgressSink,
} from './core/execution/ProgressHelper.js';

/**
 * @module
 * @description
 * The engine, its registry and execution pipeline.
 */
// ── Engine ───────────────────────────────────────────────
/** @category Engine */
export {
    InterceptorEngine,
    createInterceptorEngine,
    type InterceptorEngineOptions,
    type InvocationOptions,
} from './core/InterceptorEngine.js';
/** @category Engine */
export {
    InterceptorRegistry,
    RegistrySnapshot,
    type InterceptorPage,
    type InterceptorRegistryOptions,
} from './core/registry/InterceptorRegistry.js';
/** @category Engine */
export { CursorCodec, type CursorMode, type CursorCodecOptions } from './core/registry/CursorCodec.js';
/** @category Engine */
export { InvocationEngine, normalizeOutcome } from './core/execution/InvocationEngine.js';
/** @category Engine */
export { ChainExecutor, planChain, type ChainExecutionOptions, type ChainPlan } from './core/execution/ChainExecutor.js';
/** @category Engine */
export { BackgroundTaskTracker, type DrainReport } from './core/execution/BackgroundTasks.js';
/** @category Engine */
export { ObservationSink, type Observation } from './core/execution/ObservationSink.js';
/** @category Engine */
export {
    EngineConfigSchema,
    parseEngineConfig,
    loadEngineConfigFromEnv,
    type EngineConfig,
    type EngineConfigInput,
} from './core/config/EngineConfig.js';
/** @category Engine */
export {
    InterceptorError,
    ChainMutationError,
    isInterceptorError,
    type InterceptorErrorCode,
} from './core/errors.js';
/** @category Engine */
export { type Result, succeed, fail } from './core/result.js';

/**
 * @module
 * @description
 * MCP server integration and wire schemas.
 */
// ── Server ───────────────────────────────────────────────
/** @category Server */
export {
    attachInterceptors,
    toMcpError,
    type AttachOptions,
    type DetachFn,
    type McpServerLike,
} from './server/ServerAttachment.js';
/** @category Server */
export {
    InterceptorMethods,
    FindingSchema,
    ListInterceptorsRequestSchema,
    InvokeInterceptorRequestSchema,
    ExecuteChainRequestSchema,
    toWireInterceptor,
    type WireInterceptor,
    type ListInterceptorsResult,
    type InvokeInterceptorResult,
    type ExecuteChainResult,
} from './core/schema/ProtocolSchemas.js';

/**
 * @module
 * @description
 * Debug events and tracing.
 */
// ── Observability ────────────────────────────────────────
/** @category Observability */
export {
    createDebugObserver,
    type DebugEvent,
    type DebugObserverFn,
} from './observability/DebugObserver.js';
/** @category Observability */
export {
    SpanStatusCode,
    type InterceptorTracer,
    type InterceptorSpan,
    type TraceAttributeValue,
} from './observability/Tracing.js';

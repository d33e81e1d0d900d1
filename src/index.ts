/**
 * opendata-mcp — Root Barrel Export
 *
 * Public API entry point: build tools, register them, serve them.
 *
 * Architecture:
 *   src/
 *   ├── core/          ← Builder, Registry, Execution, Schema, Responses
 *   ├── observability/ ← Debug Events, Log Sink
 *   ├── server/        ← JSON-RPC Dispatcher, stdio Transport
 *   ├── config/        ← Environment Configuration
 *   └── providers/     ← HTTP Fetch, SBB Dataset and Finance Screener Tools
 */

// ── Core ─────────────────────────────────────────────────
/** @category Core */
export {
    success, toonSuccess, render, toolError, image, resource, isToolResponse,
    type ToolResponse, type ContentBlock, type TextContent, type ImageContent,
    type EmbeddedResource, type ResourceContents, type RenderFormat, type ToolErrorOptions,
} from './core/response.js';
/** @category Core */
export {
    ToolCallError, UpstreamUnavailableError, UpstreamMalformedResponseError,
    RegistryError, ConfigError, classifyError,
    type ToolErrorKind, type HandlerErrorKind, type ToolFailure,
} from './core/errors.js';
/** @category Core */
export { succeed, fail, type Result, type Success, type Failure } from './core/result.js';
/** @category Core */
export {
    defineTool, TOOL_NAME_PATTERN,
    type ToolDefinition, type ToolDescriptor, type ToolConfig, type PreparedCall,
} from './core/builder/defineTool.js';
/** @category Core */
export { ToolRegistry } from './core/registry/ToolRegistry.js';
/** @category Core */
export { invokeHandler } from './core/execution/HandlerInvoker.js';
/** @category Core */
export {
    executeCall, resolveTool, prepareCall, buildEnvelope, type CallRequest,
} from './core/execution/ExecutionPipeline.js';

// ── Schema ───────────────────────────────────────────────
/** @category Schema */
export { param, coerceNumber, coerceBoolean, type NumberBounds, type StringConstraints } from './core/schema/params.js';
/** @category Schema */
export {
    validateArgs, summarizeValidation,
    type ValidationFailure, type FieldIssue, type IssueReason,
} from './core/schema/SchemaValidator.js';
/** @category Schema */
export { formatValidationIssues, VALIDATION_RECOVERY } from './core/schema/ValidationErrorFormatter.js';
/** @category Schema */
export { generateInputSchema, type InputJsonSchema } from './core/schema/SchemaGenerator.js';

// ── Observability ────────────────────────────────────────
/** @category Observability */
export {
    createEventSink, combineObservers,
    type DebugEvent, type DebugObserverFn, type EventSink, type RequestId, type ConnectionState,
    type RouteEvent, type ValidateEvent, type ExecuteEvent, type ErrorEvent,
    type ProtocolEvent, type LifecycleEvent,
} from './observability/DebugObserver.js';
/** @category Observability */
export {
    createLogObserver, formatEventPretty, formatEventJson, eventLevel,
    type LogLevel, type LogFormat, type LogStream, type LogObserverOptions,
} from './observability/LogObserver.js';

// ── Server ───────────────────────────────────────────────
/** @category Server */
export { Dispatcher, type DispatcherOptions, type ServerInfo } from './server/Dispatcher.js';
/** @category Server */
export {
    StdioTransport, type ServerTransport, type InputEndReason, type StdioTransportOptions,
} from './server/StdioTransport.js';
/** @category Server */
export {
    MalformedFrameError, FrameOverflowError, malformedFrame,
    type OutgoingMessage, type UncorrelatedError,
} from './server/protocol.js';
/** @category Server */
export { startServer, type StartServerOptions, type StartServerResult } from './server/startServer.js';

// ── Config ───────────────────────────────────────────────
/** @category Config */
export {
    loadConfig, DEFAULT_SBB_BASE_URL, DEFAULT_MAX_FRAME_BYTES, type ServerConfig,
} from './config/ServerConfig.js';

// ── Providers ────────────────────────────────────────────
/** @category Providers */
export { fetchJson, buildUrl, type FetchFn, type HttpClient, type QueryValue } from './providers/http.js';
/** @category Providers */
export * from './providers/sbb/index.js';
/** @category Providers */
export * from './providers/finance/index.js';

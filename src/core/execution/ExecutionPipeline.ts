/**
 * ExecutionPipeline — Orchestrates Tool Call Steps
 *
 * Breaks a `tools/call` into discrete, testable steps using the Result
 * monad for railway-oriented error handling. Each step either passes its
 * output on or short-circuits with a {@link ToolFailure}; nothing on this
 * path throws.
 *
 * Pipeline: resolveTool → prepareCall → invokeHandler → buildEnvelope
 */
import { type ToolResponse, toolError } from '../response.js';
import { type Result, succeed, fail } from '../result.js';
import { type ToolErrorKind, type ToolFailure } from '../errors.js';
import { type ToolDefinition, type PreparedCall } from '../builder/defineTool.js';
import { type ToolRegistry } from '../registry/ToolRegistry.js';
import { summarizeValidation } from '../schema/SchemaValidator.js';
import { formatValidationIssues, VALIDATION_RECOVERY } from '../schema/ValidationErrorFormatter.js';
import { invokeHandler } from './HandlerInvoker.js';
import { type EventSink, type RequestId } from '../../observability/DebugObserver.js';

// ── Types ────────────────────────────────────────────────

/** One decoded `tools/call` request. `arguments` is still untrusted. */
export interface CallRequest {
    readonly id: RequestId;
    readonly toolName: string;
    readonly arguments: unknown;
}

// ── Recovery Hints ───────────────────────────────────────

const RECOVERY: Partial<Record<ToolErrorKind, string>> = {
    UnknownTool: 'Choose a tool from available_tools and call it again.',
    UpstreamUnavailable: 'The data source did not answer successfully. Try again later or narrow the query.',
    UpstreamMalformedResponse: 'The data source returned an unexpected payload. Try different arguments or another tool.',
};

// ── Pipeline Steps (pure functions) ──────────────────────

/** Step 1: Resolve the tool by name — single map lookup */
export function resolveTool<TContext>(
    registry: ToolRegistry<TContext>,
    name: string,
): Result<ToolDefinition<TContext>> {
    const tool = registry.lookup(name);
    if (!tool) {
        return fail({
            kind: 'UnknownTool',
            message: `Tool "${name}" does not exist.`,
            availableTools: registry.names(),
        });
    }
    return succeed(tool);
}

/** Step 2: Validate arguments and bind them to the handler */
export function prepareCall<TContext>(
    tool: ToolDefinition<TContext>,
    rawArgs: unknown,
): Result<PreparedCall<TContext>> {
    const prepared = tool.prepare(rawArgs);
    if (prepared.ok) return prepared;
    return fail({
        kind: 'ValidationError',
        message: summarizeValidation(prepared.error),
        details: formatValidationIssues(prepared.error.issues, rawArgs),
        cause: prepared.error,
    });
}

/** Step 4: Turn the outcome into the wire payload */
export function buildEnvelope(outcome: Result<ToolResponse>): ToolResponse {
    if (outcome.ok) return outcome.value;
    const failure = outcome.error;
    const suggestion = failure.suggestion
        ?? (failure.kind === 'ValidationError' ? VALIDATION_RECOVERY : RECOVERY[failure.kind]);
    return toolError(failure.kind, {
        message: failure.message,
        ...(suggestion !== undefined ? { suggestion } : {}),
        ...(failure.availableTools ? { availableTools: failure.availableTools } : {}),
        ...(failure.details !== undefined ? { details: failure.details } : {}),
    });
}

// ── Orchestration ────────────────────────────────────────

/**
 * Run one call through the whole pipeline. Always resolves with exactly
 * one {@link ToolResponse}.
 */
export async function executeCall<TContext>(
    registry: ToolRegistry<TContext>,
    ctx: TContext,
    request: CallRequest,
    events: EventSink,
): Promise<ToolResponse> {
    const started = performance.now();
    const { toolName } = request;

    events.emit({ type: 'route', tool: toolName, requestId: request.id, timestamp: Date.now() });

    const resolved = resolveTool(registry, toolName);
    if (!resolved.ok) {
        events.emit({
            type: 'error',
            tool: toolName,
            kind: resolved.error.kind,
            error: resolved.error.message,
            step: 'route',
            timestamp: Date.now(),
        });
        return buildEnvelope(resolved);
    }
    const tool = resolved.value;

    const validateStart = performance.now();
    const prepared = prepareCall(tool, request.arguments);
    events.emit({
        type: 'validate',
        tool: toolName,
        valid: prepared.ok,
        ...(prepared.ok ? {} : { error: prepared.error.message }),
        durationMs: performance.now() - validateStart,
        timestamp: Date.now(),
    });
    if (!prepared.ok) return buildEnvelope(prepared);

    const outcome = await invokeHandler(tool, prepared.value, ctx, events);
    const response = buildEnvelope(outcome);

    events.emit({
        type: 'execute',
        tool: toolName,
        durationMs: performance.now() - started,
        isError: response.isError === true,
        timestamp: Date.now(),
    });
    return response;
}

/**
 * HandlerInvoker — Failure Boundary Around Tool Handlers
 *
 * Runs a prepared call exactly once and turns whatever happens into a
 * `Result`. Thrown errors never escape: they are classified (see
 * {@link classifyError}), reported to the event sink and returned as a
 * {@link ToolFailure}.
 *
 * @module
 */
import { type ToolResponse, isToolResponse, render } from '../response.js';
import { type Result, succeed, fail } from '../result.js';
import { type ToolFailure, classifyError } from '../errors.js';
import { type ToolDefinition, type PreparedCall } from '../builder/defineTool.js';
import { type EventSink } from '../../observability/DebugObserver.js';

/**
 * Invoke a validated call and render its result.
 *
 * A handler returning a {@link ToolResponse} passes through untouched;
 * anything else is rendered with the tool's `render` format. Rendering
 * failures (e.g. a `BigInt` in a JSON result) are classified like handler
 * failures.
 */
export async function invokeHandler<TContext>(
    tool: ToolDefinition<TContext>,
    call: PreparedCall<TContext>,
    ctx: TContext,
    events: EventSink,
): Promise<Result<ToolResponse, ToolFailure>> {
    try {
        const value = await call.run(ctx);
        return succeed(isToolResponse(value) ? value : render(value, tool.render));
    } catch (err) {
        const failure = classifyError(err);
        events.emit({
            type: 'error',
            tool: tool.descriptor.name,
            kind: failure.kind,
            error: failure.message,
            step: 'execute',
            timestamp: Date.now(),
        });
        return fail(failure);
    }
}

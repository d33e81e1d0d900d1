/**
 * startServer — One-Call Bootstrap
 *
 * Wires a sealed registry to a {@link Dispatcher} over a
 * {@link StdioTransport}:
 *   1. Wraps the observer in a safe event sink
 *   2. Seals the registry if the caller has not
 *   3. Connects the transport and starts reading
 *
 * @module
 */
import { type Readable, type Writable } from 'node:stream';
import { type ToolRegistry } from '../core/registry/ToolRegistry.js';
import { createEventSink, type DebugObserverFn, type EventSink } from '../observability/DebugObserver.js';
import { Dispatcher, type ServerInfo } from './Dispatcher.js';
import { StdioTransport } from './StdioTransport.js';
import { DEFAULT_MAX_FRAME_BYTES } from '../config/ServerConfig.js';

// ============================================================================
// Types
// ============================================================================

/** Options for `startServer`. */
export interface StartServerOptions<TContext> {
    readonly serverInfo: ServerInfo;
    /** The tool registry to expose. Sealed on start. */
    readonly registry: ToolRegistry<TContext>;
    /** Context handed to every handler. */
    readonly context: TContext;
    /** Receives every pipeline and connection event. */
    readonly observer?: DebugObserverFn;
    /** Defaults to `process.stdin`. */
    readonly input?: Readable;
    /** Defaults to `process.stdout`. */
    readonly output?: Writable;
    /** Longest accepted frame (default 4 MiB). */
    readonly maxFrameBytes?: number;
}

/** Result returned by `startServer`. */
export interface StartServerResult<TContext> {
    readonly dispatcher: Dispatcher<TContext>;
    readonly events: EventSink;
    /** Resolves once the input ended and every in-flight call settled. */
    readonly closed: Promise<void>;
}

// ============================================================================
// Implementation
// ============================================================================

/**
 * Start serving a registry over a stream pair.
 *
 * @example
 * ```typescript
 * const { closed } = await startServer({
 *     serverInfo: { name: 'opendata-mcp', version: '0.1.0' },
 *     registry,
 *     context,
 *     observer: createLogObserver(),
 * });
 * await closed;
 * ```
 */
export async function startServer<TContext>(
    options: StartServerOptions<TContext>,
): Promise<StartServerResult<TContext>> {
    const events = createEventSink(options.observer);
    options.registry.seal();

    const dispatcher = new Dispatcher<TContext>({
        registry: options.registry,
        context: options.context,
        serverInfo: options.serverInfo,
        events,
    });
    const transport = new StdioTransport({
        ...(options.input ? { input: options.input } : {}),
        ...(options.output ? { output: options.output } : {}),
        maxFrameBytes: options.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES,
    });
    await dispatcher.connect(transport);

    return { dispatcher, events, closed: dispatcher.closed };
}

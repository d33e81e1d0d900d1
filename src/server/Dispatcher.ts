/**
 * Dispatcher — JSON-RPC Method Dispatch over an MCP Transport
 *
 * Receives decoded messages from an SDK transport, routes requests by
 * method and writes exactly one response per request, tagged with the
 * request's id. Frames the transport cannot decode arrive on `onerror`
 * and are answered with `id: null`. `tools/call`
 * requests run concurrently; their responses are written as they
 * complete, so they may leave out of order.
 *
 * Connection lifecycle:
 *
 *   idle ──connect()──▶ open ──input ends──▶ draining ──last call settles──▶ closed
 *
 * While draining, calls already in flight finish and still write their
 * response if the output is writable; otherwise the response is dropped
 * and reported as a `protocol` event.
 *
 * @example
 * ```typescript
 * const dispatcher = new Dispatcher({ registry, context, serverInfo, events });
 * await dispatcher.connect(new StdioTransport({ maxFrameBytes: 4 * 1024 * 1024 }));
 * await dispatcher.closed;
 * ```
 *
 * @module
 */
import {
    type JSONRPCMessage,
    type JSONRPCRequest,
    type RequestId,
    type Result,
    CallToolRequestSchema,
    JSONRPCNotificationSchema,
    JSONRPCRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { type ToolRegistry } from '../core/registry/ToolRegistry.js';
import { executeCall } from '../core/execution/ExecutionPipeline.js';
import { type EventSink, type ConnectionState } from '../observability/DebugObserver.js';
import {
    type OutgoingMessage,
    ErrorCode,
    LATEST_PROTOCOL_VERSION,
    SUPPORTED_PROTOCOL_VERSIONS,
    MalformedFrameError,
    resultMessage,
    errorMessage,
    messageId,
} from './protocol.js';
import { type ServerTransport, type InputEndReason } from './StdioTransport.js';

// ============================================================================
// Types
// ============================================================================

/** Identity reported by `initialize`. */
export interface ServerInfo {
    readonly name: string;
    readonly version: string;
}

export interface DispatcherOptions<TContext> {
    /** Sealed tool registry */
    readonly registry: ToolRegistry<TContext>;
    /** Context handed to every handler */
    readonly context: TContext;
    readonly serverInfo: ServerInfo;
    readonly events: EventSink;
}

// ============================================================================
// Dispatcher
// ============================================================================

export class Dispatcher<TContext> {
    /** Fires once, when the connection reaches `closed`. */
    onclose?: () => void;

    /** Resolves when the connection reaches `closed`. */
    readonly closed: Promise<void>;

    private readonly _registry: ToolRegistry<TContext>;
    private readonly _context: TContext;
    private readonly _serverInfo: ServerInfo;
    private readonly _events: EventSink;
    private _transport?: ServerTransport;
    private _closing = false;
    private _state: ConnectionState = 'idle';
    private _inFlight = 0;
    private _resolveClosed: () => void = () => undefined;

    constructor(options: DispatcherOptions<TContext>) {
        this._registry = options.registry;
        this._context = options.context;
        this._serverInfo = options.serverInfo;
        this._events = options.events;
        this.closed = new Promise<void>((resolve) => {
            this._resolveClosed = resolve;
        });
    }

    get state(): ConnectionState {
        return this._state;
    }

    get inFlight(): number {
        return this._inFlight;
    }

    /**
     * Attach to a transport and start reading.
     *
     * @throws {Error} When already connected, or when the registry is not sealed
     */
    async connect(transport: ServerTransport): Promise<void> {
        if (this._state !== 'idle') {
            throw new Error(`Dispatcher cannot connect in state "${this._state}"`);
        }
        if (!this._registry.sealed) {
            throw new Error('Seal the tool registry before serving');
        }
        this._transport = transport;
        transport.onmessage = (message) => this.handleMessage(message);
        transport.oninputend = (reason, error) => this._onInputEnd(reason, error);
        transport.onerror = (error) => this._onTransportError(error);
        this._transition('open');
        await transport.start();
    }

    // ── Message Handling ─────────────────────────────────

    /** Handle one decoded message. Never throws. */
    handleMessage(message: JSONRPCMessage): void {
        const request = JSONRPCRequestSchema.safeParse(message);
        if (request.success) {
            this._dispatch(request.data);
            return;
        }
        // Notifications need no answer.
        if (JSONRPCNotificationSchema.safeParse(message).success) return;

        this._events.emit({
            type: 'protocol',
            code: 0,
            message: 'Ignored response frame from client',
            requestId: messageId(message),
            timestamp: Date.now(),
        });
    }

    private _dispatch(request: JSONRPCRequest): void {
        const { id } = request;
        switch (request.method) {
            case 'initialize':
                void this._send(resultMessage(id, this._initializeResult(request)));
                return;

            case 'ping':
                void this._send(resultMessage(id, {}));
                return;

            case 'tools/list':
                void this._send(resultMessage(id, { tools: this._registry.list() }));
                return;

            case 'tools/call': {
                const call = CallToolRequestSchema.safeParse(request);
                if (!call.success) {
                    const detail = call.error.issues
                        .map(i => `${i.path.map(String).join('.') || 'params'}: ${i.message}`)
                        .join('; ');
                    void this._reject(id, ErrorCode.InvalidParams, `Invalid params: ${detail}`);
                    return;
                }
                const { name, arguments: args } = call.data.params;
                this._startCall(id, name, args ?? {});
                return;
            }

            default:
                void this._reject(id, ErrorCode.MethodNotFound, `Method not found: ${request.method}`);
        }
    }

    private _initializeResult(request: JSONRPCRequest): Result {
        const requested = request.params?.['protocolVersion'];
        const protocolVersion = typeof requested === 'string' && SUPPORTED_PROTOCOL_VERSIONS.includes(requested)
            ? requested
            : LATEST_PROTOCOL_VERSION;
        return {
            protocolVersion,
            capabilities: { tools: { listChanged: false } },
            serverInfo: { name: this._serverInfo.name, version: this._serverInfo.version },
        };
    }

    // ── Tool Calls ───────────────────────────────────────

    private _startCall(id: RequestId, toolName: string, args: unknown): void {
        this._inFlight++;
        void this._runCall(id, toolName, args).finally(() => {
            this._inFlight--;
            this._settleIfDrained();
        });
    }

    private async _runCall(id: RequestId, toolName: string, args: unknown): Promise<void> {
        let result: Result;
        try {
            const response = await executeCall(
                this._registry,
                this._context,
                { id, toolName, arguments: args },
                this._events,
            );
            result = { ...response };
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            await this._reject(id, ErrorCode.InternalError, `Internal error: ${reason}`);
            return;
        }
        await this._send(resultMessage(id, result));
    }

    // ── Output ───────────────────────────────────────────

    private _reject(id: RequestId | null, code: number, message: string): Promise<void> {
        this._events.emit({ type: 'protocol', code, message, requestId: id, timestamp: Date.now() });
        return this._send(errorMessage(id, code, message));
    }

    /** Write one message; one that cannot be written is reported, never thrown. */
    private async _send(message: OutgoingMessage): Promise<void> {
        try {
            if (this._transport === undefined) throw new Error('Not connected');
            await this._transport.send(message);
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            this._events.emit({
                type: 'protocol',
                code: 0,
                message: `Response dropped: ${reason}`,
                requestId: messageId(message),
                timestamp: Date.now(),
            });
        }
    }

    // ── Lifecycle ────────────────────────────────────────

    private _onTransportError(error: Error): void {
        if (error instanceof MalformedFrameError) {
            void this._reject(null, error.code, error.message);
            return;
        }
        this._events.emit({
            type: 'protocol',
            code: ErrorCode.ConnectionClosed,
            message: `Transport error: ${error.message}`,
            timestamp: Date.now(),
        });
    }

    private _onInputEnd(reason: InputEndReason, error?: Error): void {
        if (this._state !== 'open') return;
        if (reason === 'overflow') {
            void this._reject(null, ErrorCode.ParseError, `Parse error: ${error?.message ?? 'frame too large'}`);
        }
        const detail = reason === 'end' ? 'input ended' : `input ${reason}: ${error?.message ?? 'unknown'}`;
        this._transition('draining', detail);
        this._settleIfDrained();
    }

    private _settleIfDrained(): void {
        if (this._state !== 'draining' || this._inFlight > 0 || this._closing) return;
        this._closing = true;
        void this._close();
    }

    private async _close(): Promise<void> {
        try {
            await this._transport?.close();
        } catch (err) {
            this._onTransportError(err instanceof Error ? err : new Error(String(err)));
        }
        this._transition('closed');
        this.onclose?.();
        this._resolveClosed();
    }

    private _transition(state: ConnectionState, detail?: string): void {
        this._state = state;
        this._events.emit({
            type: 'lifecycle',
            state,
            inFlight: this._inFlight,
            ...(detail !== undefined ? { detail } : {}),
            timestamp: Date.now(),
        });
    }
}

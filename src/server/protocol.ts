/**
 * Protocol — JSON-RPC 2.0 Message Shapes
 *
 * Message types, schemas, error codes and protocol versions come from the
 * MCP SDK so they track the published protocol. This module adds what the
 * SDK leaves out: an error answer for frames whose id could not be read,
 * and the errors a frame transport raises for input it cannot dispatch.
 *
 * @module
 */
import {
    type JSONRPCMessage,
    type RequestId,
    type Result,
    ErrorCode,
    JSONRPC_VERSION,
    LATEST_PROTOCOL_VERSION,
    SUPPORTED_PROTOCOL_VERSIONS,
} from '@modelcontextprotocol/sdk/types.js';

export { ErrorCode, JSONRPC_VERSION, LATEST_PROTOCOL_VERSION, SUPPORTED_PROTOCOL_VERSIONS };

// ── Outgoing ─────────────────────────────────────────────

/**
 * Error answer to a frame that carried no readable id. JSON-RPC requires
 * `id: null` here; the SDK's message types have no room for it.
 */
export interface UncorrelatedError {
    readonly jsonrpc: typeof JSONRPC_VERSION;
    readonly id: null;
    readonly error: {
        readonly code: number;
        readonly message: string;
    };
}

export type OutgoingMessage = JSONRPCMessage | UncorrelatedError;

export function resultMessage(id: RequestId, result: Result): JSONRPCMessage {
    return { jsonrpc: JSONRPC_VERSION, id, result };
}

export function errorMessage(id: RequestId | null, code: number, message: string): OutgoingMessage {
    if (id === null) return { jsonrpc: JSONRPC_VERSION, id: null, error: { code, message } };
    return { jsonrpc: JSONRPC_VERSION, id, error: { code, message } };
}

export function isUncorrelated(message: OutgoingMessage): message is UncorrelatedError {
    return 'id' in message && message.id === null;
}

/** The id a message answers or carries, `null` when it has none. */
export function messageId(message: OutgoingMessage): RequestId | null {
    return 'id' in message ? message.id ?? null : null;
}

// ── Transport Errors ─────────────────────────────────────

/**
 * A frame that could not be turned into a JSON-RPC message: either it is
 * not JSON (`ParseError`) or it is JSON of the wrong shape (`InvalidRequest`).
 */
export class MalformedFrameError extends Error {
    constructor(
        readonly code: ErrorCode.ParseError | ErrorCode.InvalidRequest,
        message: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = 'MalformedFrameError';
    }
}

/** Wrap a deserialization failure. `JSON.parse` throws `SyntaxError`; schema checks throw anything else. */
export function malformedFrame(err: unknown): MalformedFrameError {
    if (err instanceof SyntaxError) {
        return new MalformedFrameError(ErrorCode.ParseError, `Parse error: ${err.message}`, { cause: err });
    }
    return new MalformedFrameError(
        ErrorCode.InvalidRequest,
        'Invalid Request: not a JSON-RPC 2.0 message',
        { cause: err },
    );
}

/** The input grew past the frame limit without a newline. */
export class FrameOverflowError extends Error {
    constructor(readonly limit: number) {
        super(`Frame exceeds ${limit} bytes without a newline`);
        this.name = 'FrameOverflowError';
    }
}

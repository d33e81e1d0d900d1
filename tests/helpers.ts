/**
 * Shared test fixtures: an in-memory MCP transport, an event recorder,
 * a stubbed `fetch` and small response accessors.
 */
import { vi } from 'vitest';
import { type ToolResponse, isToolResponse } from '../src/core/response.js';
import { type DebugEvent, type EventSink, createEventSink } from '../src/observability/DebugObserver.js';
import { deserializeMessage } from '@modelcontextprotocol/sdk/shared/stdio.js';
import { type Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { type JSONRPCMessage } from '@modelcontextprotocol/sdk/types.js';
import { type ServerTransport, type InputEndReason } from '../src/server/StdioTransport.js';
import { type OutgoingMessage, malformedFrame } from '../src/server/protocol.js';
import { type FetchFn } from '../src/providers/http.js';

// ── Responses ────────────────────────────────────────────

/** Text of the first (and only) content block. */
export function textOf(response: ToolResponse): string {
    const block = response.content[0];
    if (block === undefined || block.type !== 'text') {
        throw new Error(`Expected a text block, got ${JSON.stringify(response.content)}`);
    }
    return block.text;
}

/** The `tools/call` result carried by a response frame. */
export function responseOf(frame: Record<string, unknown>): ToolResponse {
    const result = frame['result'];
    if (!isToolResponse(result)) {
        throw new Error(`Frame carries no tool result: ${JSON.stringify(frame)}`);
    }
    return result;
}

// ── Events ───────────────────────────────────────────────

export interface RecordedEvents {
    readonly sink: EventSink;
    readonly events: DebugEvent[];
    ofType<T extends DebugEvent['type']>(type: T): Extract<DebugEvent, { type: T }>[];
}

export function recordEvents(): RecordedEvents {
    const events: DebugEvent[] = [];
    return {
        sink: createEventSink((e) => events.push(e)),
        events,
        ofType<T extends DebugEvent['type']>(type: T) {
            return events.filter((e): e is Extract<DebugEvent, { type: T }> => e.type === type);
        },
    };
}

// ── Transport ────────────────────────────────────────────

/**
 * In-memory transport: `feed` lines in, read `sent` lines out. Lines are
 * decoded with the SDK's `deserializeMessage`, as on stdio.
 */
export class MemoryTransport implements ServerTransport {
    onmessage?: Transport['onmessage'];
    onerror?: (error: Error) => void;
    onclose?: () => void;
    oninputend?: (reason: InputEndReason, error?: Error) => void;

    readonly sent: string[] = [];
    writable = true;
    started = false;
    closedCalls = 0;

    async start(): Promise<void> {
        this.started = true;
    }

    async send(message: OutgoingMessage): Promise<void> {
        if (!this.writable) throw new Error('Output not writable');
        this.sent.push(JSON.stringify(message));
    }

    async close(): Promise<void> {
        this.closedCalls++;
        this.onclose?.();
    }

    /** Deliver one line; objects are serialized first. */
    feed(message: unknown): void {
        const line = typeof message === 'string' ? message : JSON.stringify(message);
        let decoded: JSONRPCMessage;
        try {
            decoded = deserializeMessage(line);
        } catch (err) {
            this.onerror?.(malformedFrame(err));
            return;
        }
        this.onmessage?.(decoded);
    }

    end(reason: InputEndReason = 'end', error?: Error): void {
        this.oninputend?.(reason, error);
    }

    /** Sent messages, parsed. */
    frames(): Array<Record<string, unknown>> {
        return this.sent.map((line) => {
            const parsed: unknown = JSON.parse(line);
            if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
                throw new Error(`Frame is not an object: ${line}`);
            }
            return { ...parsed };
        });
    }
}

// ── Upstream ─────────────────────────────────────────────

/** A `fetch` stub answering every request with `body` as JSON. */
export function stubFetch(body: unknown, status = 200) {
    return vi.fn<FetchFn>(async () => new Response(JSON.stringify(body), {
        status,
        headers: { 'content-type': 'application/json' },
    }));
}

/** A promise plus its resolver, for steering handler completion order. */
export function deferred<T = void>(): { promise: Promise<T>; resolve: (value: T) => void } {
    let resolve: (value: T) => void = () => undefined;
    const promise = new Promise<T>((r) => {
        resolve = r;
    });
    return { promise, resolve };
}

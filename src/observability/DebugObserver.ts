/**
 * DebugObserver — Typed Pipeline Events
 *
 * Every stage of a request emits a structured event. Observers are plain
 * functions; when none is configured the emitter is a no-op.
 *
 * Design principles:
 * - Pure function observer (no class hierarchy)
 * - Discriminated union events (exhaustive switch possible)
 * - Immutable event payloads (readonly)
 * - An observer that throws never affects the call that emitted the event
 *
 * @example
 * ```typescript
 * import { createEventSink, createLogObserver } from 'opendata-mcp';
 *
 * const events = createEventSink(createLogObserver({ level: 'debug' }));
 * events.emit({ type: 'route', tool: 'rail-traffic-info', requestId: 1, timestamp: Date.now() });
 * ```
 *
 * @module
 */
import { type ToolErrorKind } from '../core/errors.js';

// ============================================================================
// Event Types (Discriminated Union)
// ============================================================================

/** JSON-RPC request id as seen on the wire. */
export type RequestId = string | number;

/** Connection lifecycle states of the dispatch loop. */
export type ConnectionState = 'idle' | 'open' | 'draining' | 'closed';

/**
 * Emitted when a `tools/call` request is routed by name.
 * First event of every call, before any validation.
 */
export interface RouteEvent {
    readonly type: 'route';
    readonly tool: string;
    readonly requestId: RequestId;
    readonly timestamp: number;
}

/** Emitted after argument validation (pass or fail). */
export interface ValidateEvent {
    readonly type: 'validate';
    readonly tool: string;
    readonly valid: boolean;
    /** One-line summary when `valid` is false */
    readonly error?: string;
    readonly durationMs: number;
    readonly timestamp: number;
}

/** Emitted once the handler settled and its envelope is built. */
export interface ExecuteEvent {
    readonly type: 'execute';
    readonly tool: string;
    readonly durationMs: number;
    readonly isError: boolean;
    readonly timestamp: number;
}

/**
 * Emitted for every classified failure: unknown tools, rejected arguments
 * and handler errors.
 */
export interface ErrorEvent {
    readonly type: 'error';
    readonly tool: string;
    readonly kind: ToolErrorKind;
    readonly error: string;
    /** The pipeline step where the failure occurred */
    readonly step: 'route' | 'validate' | 'execute';
    readonly timestamp: number;
}

/**
 * Emitted for frames the dispatcher could not serve: malformed input,
 * unknown methods, and responses dropped because the output closed.
 */
export interface ProtocolEvent {
    readonly type: 'protocol';
    /** JSON-RPC error code, or 0 for a dropped response */
    readonly code: number;
    readonly message: string;
    readonly requestId?: RequestId | null;
    readonly timestamp: number;
}

/** Emitted on every connection state transition. */
export interface LifecycleEvent {
    readonly type: 'lifecycle';
    readonly state: ConnectionState;
    readonly inFlight: number;
    readonly detail?: string;
    readonly timestamp: number;
}

/**
 * Union of all debug event types.
 *
 * ```typescript
 * function handle(event: DebugEvent) {
 *     switch (event.type) {
 *         case 'route':     // RouteEvent
 *         case 'validate':  // ValidateEvent
 *         case 'execute':   // ExecuteEvent
 *         case 'error':     // ErrorEvent
 *         case 'protocol':  // ProtocolEvent
 *         case 'lifecycle': // LifecycleEvent
 *     }
 * }
 * ```
 */
export type DebugEvent =
    | RouteEvent
    | ValidateEvent
    | ExecuteEvent
    | ErrorEvent
    | ProtocolEvent
    | LifecycleEvent;

/** Observer function that receives debug events. */
export type DebugObserverFn = (event: DebugEvent) => void;

// ============================================================================
// Event Sink
// ============================================================================

/**
 * Emission side of an observer. `emit` never throws: an exception raised
 * by the observer is counted in `failures` and kept in `lastFailure`.
 */
export interface EventSink {
    emit(event: DebugEvent): void;
    readonly failures: number;
    readonly lastFailure: unknown;
}

/**
 * Wrap an observer so that emitting is always safe.
 * Without an observer the sink discards events.
 */
export function createEventSink(observer?: DebugObserverFn): EventSink {
    let failures = 0;
    let lastFailure: unknown;

    return {
        emit(event) {
            if (!observer) return;
            try {
                observer(event);
            } catch (err) {
                failures++;
                lastFailure = err;
            }
        },
        get failures() { return failures; },
        get lastFailure() { return lastFailure; },
    };
}

/**
 * Fan events out to several observers. Each observer is isolated: one
 * that throws does not stop the others, and the first error is rethrown
 * afterwards so the sink still counts it.
 */
export function combineObservers(...observers: DebugObserverFn[]): DebugObserverFn {
    return (event) => {
        let firstError: unknown;
        let failed = false;
        for (const observer of observers) {
            try {
                observer(event);
            } catch (err) {
                if (!failed) firstError = err;
                failed = true;
            }
        }
        if (failed) throw firstError;
    };
}

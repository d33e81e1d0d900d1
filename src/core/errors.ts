/**
 * Error Taxonomy
 *
 * Every failure a caller can observe carries one of the stable
 * {@link ToolErrorKind} tags. Handlers signal upstream trouble by throwing
 * the typed errors below; the invocation adapter maps anything else to
 * `InternalFault`.
 *
 * @module
 */

// ── Kinds ────────────────────────────────────────────────

/**
 * Stable error tags surfaced to callers.
 *
 * - `UnknownTool` / `ValidationError` — resolved before any handler runs
 * - `UpstreamUnavailable` / `UpstreamMalformedResponse` / `InternalFault` —
 *   raised inside a handler, classified by the invocation adapter
 * - `ProtocolFrameError` — the frame itself could not be understood
 */
export type ToolErrorKind =
    | 'UnknownTool'
    | 'ValidationError'
    | 'UpstreamUnavailable'
    | 'UpstreamMalformedResponse'
    | 'InternalFault'
    | 'ProtocolFrameError';

/** Kinds a handler failure can be classified into. */
export type HandlerErrorKind = Extract<
    ToolErrorKind,
    'UpstreamUnavailable' | 'UpstreamMalformedResponse' | 'InternalFault'
>;

// ── Handler-side Errors ──────────────────────────────────

/**
 * Base class for errors a handler throws on purpose.
 * The `kind` survives classification unchanged.
 */
export abstract class ToolCallError extends Error {
    abstract readonly kind: HandlerErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * The external data source answered with a non-success status or could not
 * be reached at all.
 */
export class UpstreamUnavailableError extends ToolCallError {
    readonly kind = 'UpstreamUnavailable' as const;

    constructor(
        message: string,
        readonly url: string,
        readonly status?: number,
        options?: { cause?: unknown },
    ) {
        super(message, options);
    }
}

/**
 * The external payload did not parse into the tool's expected result shape.
 */
export class UpstreamMalformedResponseError extends ToolCallError {
    readonly kind = 'UpstreamMalformedResponse' as const;

    constructor(
        message: string,
        readonly url: string,
        readonly issues: readonly string[] = [],
        options?: { cause?: unknown },
    ) {
        super(message, options);
    }
}

// ── Startup Errors ───────────────────────────────────────

/** Registry misconfiguration (duplicate or invalid names, late registration). */
export class RegistryError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'RegistryError';
    }
}

/** Invalid environment configuration. */
export class ConfigError extends Error {
    constructor(message: string, readonly problems: readonly string[]) {
        super(message);
        this.name = 'ConfigError';
    }
}

// ── Classification ───────────────────────────────────────

/** A handler failure after classification. */
export interface ToolFailure {
    readonly kind: ToolErrorKind;
    readonly message: string;
    readonly suggestion?: string;
    /** Valid names the caller may retry with (unknown tool) */
    readonly availableTools?: readonly string[];
    /** Preformatted XML detail lines (validation failures) */
    readonly details?: string;
    readonly cause?: unknown;
}

/**
 * Map anything a handler threw onto a {@link ToolFailure}.
 *
 * Non-`Error` throws (strings, plain objects) become `InternalFault` with
 * their string form as the message.
 */
export function classifyError(err: unknown): ToolFailure {
    if (err instanceof ToolCallError) {
        return { kind: err.kind, message: err.message, cause: err };
    }
    if (err instanceof Error) {
        return { kind: 'InternalFault', message: err.message || err.name, cause: err };
    }
    return { kind: 'InternalFault', message: String(err), cause: err };
}

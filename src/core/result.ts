/**
 * Result\<T, E\> — Railway-Oriented Steps
 *
 * A discriminated union for pipelines that must not throw: each step
 * returns either `Success<T>` or `Failure<E>` and the caller branches
 * on `ok`.
 *
 * @example
 * ```typescript
 * const resolved = resolveTool(registry, 'rail-traffic-info');
 * if (!resolved.ok) return buildEnvelope(resolved);  // UnknownTool
 * const tool = resolved.value;                        // narrowed
 * ```
 *
 * @module
 */
import { type ToolFailure } from './errors.js';

// ── Discriminated Union ──────────────────────────────────

/** Successful result containing a typed value. */
export interface Success<T> {
    readonly ok: true;
    readonly value: T;
}

/** Failed result carrying a classified error. */
export interface Failure<E = ToolFailure> {
    readonly ok: false;
    readonly error: E;
}

/** Either `Success<T>` or `Failure<E>`; check `ok` to narrow. */
export type Result<T, E = ToolFailure> = Success<T> | Failure<E>;

// ── Constructors ─────────────────────────────────────────

/** Create a successful result. */
export function succeed<T>(value: T): Success<T> {
    return { ok: true, value };
}

/** Create a failed result. */
export function fail<E = ToolFailure>(error: E): Failure<E> {
    return { ok: false, error };
}

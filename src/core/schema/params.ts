/**
 * Param Helpers — Chainable Input Field Declarations
 *
 * A tool's input is a plain object of Zod fields. These helpers build the
 * common field kinds with the lax scalar coercion LLM callers need:
 * numbers and booleans also accept their string spellings (`"5"`,
 * `"true"`). Chain `.default()`, `.optional()` and `.describe()` as usual.
 *
 * @example
 * ```typescript
 * import { param } from 'opendata-mcp';
 *
 * const input = {
 *     where:  param.string().optional().describe('ODSQL filter'),
 *     limit:  param.int({ min: 1, max: 100 }).default(10),
 *     lang:   param.enum(['de', 'fr', 'it', 'en']).optional(),
 *     links:  param.boolean().default(false),
 * };
 * ```
 *
 * @module
 */
import { z, type ZodEffects, type ZodNumber, type ZodBoolean, type ZodString, type ZodEnum } from 'zod';

// ── Coercion ─────────────────────────────────────────────

const NUMERIC = /^-?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i;

/** `"5"` → `5`; any other value passes through untouched. */
export function coerceNumber(value: unknown): unknown {
    if (typeof value === 'string' && NUMERIC.test(value.trim())) {
        return Number(value.trim());
    }
    return value;
}

/** `"true"` / `"false"` → boolean; any other value passes through untouched. */
export function coerceBoolean(value: unknown): unknown {
    if (value === 'true') return true;
    if (value === 'false') return false;
    return value;
}

// ── Field Builders ───────────────────────────────────────

/** Inclusive numeric bounds. */
export interface NumberBounds {
    readonly min?: number;
    readonly max?: number;
}

/** String length bounds and pattern. */
export interface StringConstraints {
    readonly min?: number;
    readonly max?: number;
    readonly regex?: RegExp;
}

function bounded(n: ZodNumber, bounds: NumberBounds): ZodNumber {
    let out = n;
    if (bounds.min !== undefined) out = out.min(bounds.min);
    if (bounds.max !== undefined) out = out.max(bounds.max);
    return out;
}

/** Integer field with inclusive bounds. */
function int(bounds: NumberBounds = {}): ZodEffects<ZodNumber, number, unknown> {
    return z.preprocess(coerceNumber, bounded(z.number().int(), bounds));
}

/** Number field with inclusive bounds. */
function number(bounds: NumberBounds = {}): ZodEffects<ZodNumber, number, unknown> {
    return z.preprocess(coerceNumber, bounded(z.number(), bounds));
}

/** Boolean field accepting `"true"` / `"false"`. */
function boolean(): ZodEffects<ZodBoolean, boolean, unknown> {
    return z.preprocess(coerceBoolean, z.boolean());
}

/** String field with optional length bounds and pattern. */
function string(constraints: StringConstraints = {}): ZodString {
    let s = z.string();
    if (constraints.min !== undefined) s = s.min(constraints.min);
    if (constraints.max !== undefined) s = s.max(constraints.max);
    if (constraints.regex !== undefined) s = s.regex(constraints.regex);
    return s;
}

/** Field restricted to a fixed set of strings. */
function enumOf<const V extends string>(values: readonly [V, ...V[]]): ZodEnum<[V, ...V[]]> {
    const [first, ...rest] = values;
    return z.enum([first, ...rest]);
}

/** Field builders, namespaced to keep call sites short. */
export const param = {
    int,
    number,
    boolean,
    string,
    enum: enumOf,
} as const;

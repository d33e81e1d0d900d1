/**
 * SchemaValidator — Argument Validation Against a Tool's Input Schema
 *
 * `validateArgs(schema, rawArgs)` is the only gate between a caller's raw
 * argument bag and a handler; its output is the handler's typed args.
 * Zod applies defaults, runs the coercing preprocessors from `params.ts`,
 * enforces bounds and enumerations, and strips unknown keys.
 *
 * Failures are reported as {@link FieldIssue}s with a closed set of
 * reasons, so a missing field is distinguishable from a malformed one.
 *
 * Pure-function module: no state, no side effects.
 *
 * @module
 */
import { type ZodIssue, type ZodTypeAny, type output } from 'zod';
import { type Result, succeed, fail } from '../result.js';

// ── Types ────────────────────────────────────────────────

/** Why a single field was rejected. */
export type IssueReason =
    | 'missing'
    | 'invalid_type'
    | 'too_small'
    | 'too_big'
    | 'invalid_enum'
    | 'invalid_value';

/** One rejected field. `field` is the dotted path, `'(root)'` for the bag itself. */
export interface FieldIssue {
    readonly field: string;
    readonly reason: IssueReason;
    readonly message: string;
    /** The violated bound, for `too_small` / `too_big` */
    readonly bound?: number;
    /** The accepted values, for `invalid_enum` */
    readonly allowed?: readonly string[];
    /** The expected type, for `invalid_type` */
    readonly expected?: string;
}

/** Validation failure for a whole argument bag. */
export interface ValidationFailure {
    readonly kind: 'ValidationError';
    /** First offending field, for one-line summaries */
    readonly field: string;
    readonly reason: IssueReason;
    readonly issues: readonly FieldIssue[];
    /** Zod's own issues, for the LLM-facing formatter */
    readonly zodIssues: readonly ZodIssue[];
}

// ── Public API ───────────────────────────────────────────

/**
 * Validate a raw argument bag against a tool's schema.
 *
 * @example
 * ```typescript
 * const result = validateArgs(schema, { limit: 500 });
 * if (!result.ok) {
 *     result.error.field;   // 'limit'
 *     result.error.reason;  // 'too_big'
 * }
 * ```
 */
export function validateArgs<TSchema extends ZodTypeAny>(
    schema: TSchema,
    rawArgs: unknown,
): Result<output<TSchema>, ValidationFailure> {
    const parsed = schema.safeParse(rawArgs);
    if (parsed.success) {
        return succeed(parsed.data);
    }

    const issues = parsed.error.issues.map(toFieldIssue);
    const first = issues[0] ?? { field: '(root)', reason: 'invalid_value' as const };
    return fail({
        kind: 'ValidationError',
        field: first.field,
        reason: first.reason,
        issues,
        zodIssues: parsed.error.issues,
    });
}

/**
 * One-line summary of a validation failure, used for logs and the
 * `<message>` element of the error envelope.
 *
 * @example
 * ```typescript
 * summarizeValidation(failure);
 * // 'Invalid arguments: limit must be <= 100'
 * ```
 */
export function summarizeValidation(failure: ValidationFailure): string {
    return `Invalid arguments: ${failure.issues.map(i => `${i.field} ${i.message}`).join('; ')}`;
}

// ── Issue Mapping ────────────────────────────────────────

function toFieldIssue(issue: ZodIssue): FieldIssue {
    const field = issue.path.length > 0 ? issue.path.join('.') : '(root)';

    switch (issue.code) {
        case 'invalid_type':
            if (issue.received === 'undefined') {
                return { field, reason: 'missing', message: 'is required' };
            }
            return {
                field,
                reason: 'invalid_type',
                message: `must be ${issue.expected}, got ${issue.received}`,
                expected: issue.expected,
            };

        case 'too_small': {
            const bound = Number(issue.minimum);
            const op = issue.inclusive ? '>=' : '>';
            const message = issue.type === 'string' || issue.type === 'array'
                ? `must have length ${op} ${bound}`
                : `must be ${op} ${bound}`;
            return { field, reason: 'too_small', message, bound };
        }

        case 'too_big': {
            const bound = Number(issue.maximum);
            const op = issue.inclusive ? '<=' : '<';
            const message = issue.type === 'string' || issue.type === 'array'
                ? `must have length ${op} ${bound}`
                : `must be ${op} ${bound}`;
            return { field, reason: 'too_big', message, bound };
        }

        case 'invalid_enum_value': {
            const allowed = issue.options.map(String);
            return {
                field,
                reason: 'invalid_enum',
                message: `must be one of ${allowed.map(o => `'${o}'`).join(', ')}`,
                allowed,
            };
        }

        default:
            return { field, reason: 'invalid_value', message: issue.message };
    }
}

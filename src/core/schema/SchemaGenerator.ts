/**
 * SchemaGenerator — JSON Schema for Capability Discovery
 *
 * Renders a tool's Zod input schema as the object-level JSON Schema that
 * `tools/list` advertises. Defaults, bounds and enumerations carry over,
 * so callers can check arguments before sending them.
 *
 * Pure-function module: no state, no side effects.
 */
import { type ZodTypeAny } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

/** Object-level JSON Schema as advertised in `tools/list`. */
export interface InputJsonSchema {
    readonly type: 'object';
    readonly properties: Record<string, object>;
    readonly required?: string[];
    readonly [key: string]: unknown;
}

/**
 * Generate the discovery schema for a tool's input.
 *
 * `additionalProperties` is omitted on purpose: unknown arguments are
 * ignored by the validator, not rejected.
 *
 * @example
 * ```typescript
 * generateInputSchema(z.object({ limit: z.number().min(1).max(100).default(10) }));
 * // { type: 'object', properties: { limit: { type: 'number', minimum: 1, maximum: 100, default: 10 } } }
 * ```
 */
export function generateInputSchema(schema: ZodTypeAny): InputJsonSchema {
    const json = zodToJsonSchema(schema, { target: 'jsonSchema7', $refStrategy: 'none' });

    const properties: Record<string, object> = {};
    let required: string[] | undefined;

    if ('properties' in json && isRecord(json.properties)) {
        for (const [key, value] of Object.entries(json.properties)) {
            if (isRecord(value)) properties[key] = value;
        }
    }
    if ('required' in json && Array.isArray(json.required)) {
        required = json.required.filter((k): k is string => typeof k === 'string');
    }

    return required && required.length > 0
        ? { type: 'object', properties, required }
        : { type: 'object', properties };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

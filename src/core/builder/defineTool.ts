/**
 * defineTool() — Declarative Tool Definition
 *
 * The entry point for building tools. A definition is a name, a
 * description, a Zod input shape and an async handler; the handler's
 * `args` are inferred from the shape, so validated values arrive fully
 * typed.
 *
 * @example
 * ```typescript
 * import { defineTool, param } from 'opendata-mcp';
 *
 * export const stations = defineTool('stations', {
 *     description: 'Search railway stations by name',
 *     input: {
 *         query: param.string({ min: 1 }),
 *         limit: param.int({ min: 1, max: 100 }).default(10),
 *     },
 *     render: 'toon',
 *     handler: async (ctx: AppContext, args) => ctx.stations.search(args.query, args.limit),
 * });
 * ```
 *
 * @see {@link ToolRegistry} for registering tools
 *
 * @module
 */
import { z, type ZodObject, type ZodRawShape, type output } from 'zod';
import { type RenderFormat } from '../response.js';
import { type Result, succeed, fail } from '../result.js';
import { validateArgs, type ValidationFailure } from '../schema/SchemaValidator.js';
import { generateInputSchema, type InputJsonSchema } from '../schema/SchemaGenerator.js';
import { RegistryError } from '../errors.js';

// ============================================================================
// Types
// ============================================================================

/** Tool names accepted by the registry and advertised on the wire. */
export const TOOL_NAME_PATTERN = /^[a-zA-Z0-9_.-]{1,64}$/;

/** What `tools/list` advertises for one tool. */
export interface ToolDescriptor {
    readonly name: string;
    readonly description: string;
    readonly inputSchema: InputJsonSchema;
}

/** Validated arguments bound to the handler, ready to run. */
export interface PreparedCall<TContext> {
    run(ctx: TContext): Promise<unknown>;
}

/**
 * A compiled tool. The handler's argument type is closed over by
 * `prepare`, so tools with different shapes share one registry.
 */
export interface ToolDefinition<TContext> {
    readonly descriptor: ToolDescriptor;
    readonly render: RenderFormat;
    /** Validate a raw argument bag and bind it to the handler. */
    prepare(rawArgs: unknown): Result<PreparedCall<TContext>, ValidationFailure>;
}

/** Config object accepted by {@link defineTool}. */
export interface ToolConfig<TContext, TShape extends ZodRawShape> {
    /** Human-readable description for the LLM */
    readonly description: string;
    /** Input fields; see `param.*` for the coercing builders */
    readonly input: TShape;
    /** How raw handler results are rendered (default `'json'`) */
    readonly render?: RenderFormat;
    /**
     * Returns raw data (rendered with `render`) or a ready
     * {@link ToolResponse}. Throw a `ToolCallError` to classify a failure.
     */
    readonly handler: (
        ctx: TContext,
        args: output<ZodObject<TShape, 'strip'>>,
    ) => Promise<unknown>;
}

// ============================================================================
// defineTool
// ============================================================================

/**
 * Compile a tool definition.
 *
 * The input shape is compiled once: its Zod object is kept for validation
 * and its JSON Schema is cached on the descriptor.
 *
 * @throws {RegistryError} When `name` does not match {@link TOOL_NAME_PATTERN}
 */
export function defineTool<TContext, TShape extends ZodRawShape>(
    name: string,
    config: ToolConfig<TContext, TShape>,
): ToolDefinition<TContext> {
    if (!TOOL_NAME_PATTERN.test(name)) {
        throw new RegistryError(
            `Invalid tool name "${name}": expected 1-64 characters of [a-zA-Z0-9_.-].`,
        );
    }

    const schema = z.object(config.input);
    const descriptor: ToolDescriptor = {
        name,
        description: config.description,
        inputSchema: generateInputSchema(schema),
    };
    const { handler } = config;

    return {
        descriptor,
        render: config.render ?? 'json',
        prepare(rawArgs) {
            const validated = validateArgs(schema, rawArgs);
            if (!validated.ok) return fail(validated.error);
            const args = validated.value;
            return succeed({ run: (ctx: TContext) => handler(ctx, args) });
        },
    };
}

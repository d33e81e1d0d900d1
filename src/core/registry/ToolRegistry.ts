/**
 * ToolRegistry — Tool Registration & Lookup
 *
 * The single table of callable tools. It has an explicit lifecycle:
 * open for registration at startup, then sealed before the server reads
 * its first frame. Once sealed it is read-only, so lookups on the request
 * path need no coordination.
 *
 * @example
 * ```typescript
 * import { ToolRegistry } from 'opendata-mcp';
 *
 * const registry = new ToolRegistry<AppContext>();
 *
 * registry.register(railTrafficInfo);
 * registry.registerAll(railwayLines, rollingStock);
 * registry.seal();
 *
 * registry.has('railway-lines');  // true
 * registry.size;                  // 3
 * ```
 *
 * @module
 */
import { type ToolDefinition, type ToolDescriptor, TOOL_NAME_PATTERN } from '../builder/defineTool.js';
import { RegistryError } from '../errors.js';

// ============================================================================
// ToolRegistry
// ============================================================================

/**
 * Ordered map of tool name → {@link ToolDefinition}.
 *
 * @typeParam TContext - Context type handed to every handler
 */
export class ToolRegistry<TContext = void> {
    private readonly _tools = new Map<string, ToolDefinition<TContext>>();
    private _sealed = false;

    /**
     * Register a single tool.
     *
     * @throws {RegistryError} On a duplicate or invalid name, or after {@link seal}
     */
    register(tool: ToolDefinition<TContext>): void {
        const { name } = tool.descriptor;
        if (this._sealed) {
            throw new RegistryError(`Cannot register "${name}": the registry is sealed.`);
        }
        if (!TOOL_NAME_PATTERN.test(name)) {
            throw new RegistryError(`Invalid tool name "${name}".`);
        }
        if (this._tools.has(name)) {
            throw new RegistryError(`Tool "${name}" is already registered.`);
        }
        this._tools.set(name, tool);
    }

    /** Register several tools in order. Stops at the first failure. */
    registerAll(...tools: ToolDefinition<TContext>[]): void {
        for (const tool of tools) this.register(tool);
    }

    /** Resolve a tool by name. */
    lookup(name: string): ToolDefinition<TContext> | undefined {
        return this._tools.get(name);
    }

    /** Descriptors in registration order, for `tools/list`. */
    list(): ToolDescriptor[] {
        return Array.from(this._tools.values(), t => t.descriptor);
    }

    /** Registered names in registration order. */
    names(): string[] {
        return Array.from(this._tools.keys());
    }

    has(name: string): boolean {
        return this._tools.has(name);
    }

    get size(): number {
        return this._tools.size;
    }

    /** Close the registry for registration. Idempotent. */
    seal(): this {
        this._sealed = true;
        return this;
    }

    get sealed(): boolean {
        return this._sealed;
    }
}

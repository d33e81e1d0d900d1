import { describe, it, expect, vi } from 'vitest';
import { executeCall, resolveTool, prepareCall, buildEnvelope } from '../../../src/core/execution/ExecutionPipeline.js';
import { defineTool } from '../../../src/core/builder/defineTool.js';
import { ToolRegistry } from '../../../src/core/registry/ToolRegistry.js';
import { param } from '../../../src/core/schema/params.js';
import { fail } from '../../../src/core/result.js';
import { UpstreamUnavailableError } from '../../../src/core/errors.js';
import { recordEvents, textOf } from '../../helpers.js';

interface Ctx {
    readonly prefix: string;
}

function setup() {
    const echo = vi.fn(async (ctx: Ctx, args: { limit: number; word?: string | undefined }) => ({
        said: `${ctx.prefix}${args.word ?? ''}`,
        limit: args.limit,
    }));
    const outage = vi.fn(async () => {
        throw new UpstreamUnavailableError('data.example answered 503', 'https://data.example', 503);
    });
    const crash = vi.fn(async () => {
        throw new Error('null dereference');
    });

    const registry = new ToolRegistry<Ctx>();
    registry.registerAll(
        defineTool('echo', {
            description: 'Echo a word',
            input: {
                limit: param.int({ min: 1, max: 100 }).default(10),
                word: param.string().optional(),
            },
            handler: echo,
        }),
        defineTool('outage', { description: 'Always down', input: {}, handler: outage }),
        defineTool('crash', { description: 'Always broken', input: {}, handler: crash }),
    );
    registry.seal();

    return { registry, echo, outage, crash, recorder: recordEvents() };
}

const ctx: Ctx = { prefix: '> ' };

// ============================================================================
// Steps
// ============================================================================

describe('pipeline steps', () => {
    it('resolveTool lists the available names on a miss', () => {
        const { registry } = setup();
        const result = resolveTool(registry, 'nope');
        expect(result.ok).toBe(false);
        expect(!result.ok && result.error).toEqual({
            kind: 'UnknownTool',
            message: 'Tool "nope" does not exist.',
            availableTools: ['echo', 'outage', 'crash'],
        });
    });

    it('prepareCall attaches formatted field details', () => {
        const { registry } = setup();
        const tool = registry.lookup('echo');
        if (!tool) throw new Error('echo missing');
        const result = prepareCall(tool, { limit: 0 });
        expect(!result.ok && result.error.details).toBe(
            '<field name="limit" reason="too_small">must be >= 1. You sent: 0.</field>',
        );
    });

    it('buildEnvelope keeps an explicit suggestion', () => {
        const response = buildEnvelope(fail({
            kind: 'UpstreamUnavailable', message: 'down', suggestion: 'Wait a minute.',
        }));
        expect(textOf(response)).toBe(
            '<tool_error code="UpstreamUnavailable">\n<message>down</message>\n<recovery>Wait a minute.</recovery>\n</tool_error>',
        );
    });
});

// ============================================================================
// executeCall
// ============================================================================

describe('executeCall', () => {
    it('runs the handler with validated arguments and context', async () => {
        const { registry, echo, recorder } = setup();

        const response = await executeCall(registry, ctx, { id: 1, toolName: 'echo', arguments: { word: 'hi', limit: '3' } }, recorder.sink);

        expect(response.isError).toBeUndefined();
        expect(JSON.parse(textOf(response))).toEqual({ said: '> hi', limit: 3 });
        expect(echo).toHaveBeenCalledWith(ctx, { word: 'hi', limit: 3 });
    });

    it('rejects out-of-range arguments without calling the handler', async () => {
        const { registry, echo, recorder } = setup();

        const response = await executeCall(registry, ctx, { id: 'a', toolName: 'echo', arguments: { limit: 500 } }, recorder.sink);

        expect(echo).not.toHaveBeenCalled();
        expect(response.isError).toBe(true);
        expect(textOf(response)).toBe([
            '<tool_error code="ValidationError">',
            '<message>Invalid arguments: limit must be &lt;= 100</message>',
            '<field name="limit" reason="too_big">must be &lt;= 100. You sent: 500.</field>',
            '<recovery>Fix the fields above and call the tool again.</recovery>',
            '</tool_error>',
        ].join('\n'));
    });

    it('answers unknown tools with the available names', async () => {
        const { registry, echo, recorder } = setup();

        const response = await executeCall(registry, ctx, { id: 2, toolName: 'ech', arguments: {} }, recorder.sink);

        expect(echo).not.toHaveBeenCalled();
        expect(textOf(response)).toBe([
            '<tool_error code="UnknownTool">',
            '<message>Tool "ech" does not exist.</message>',
            '<available_tools>echo, outage, crash</available_tools>',
            '<recovery>Choose a tool from available_tools and call it again.</recovery>',
            '</tool_error>',
        ].join('\n'));
        expect(response._meta).toEqual({ errorKind: 'UnknownTool' });
    });

    it('adds a retry hint to upstream outages', async () => {
        const { registry, recorder } = setup();

        const response = await executeCall(registry, ctx, { id: 3, toolName: 'outage', arguments: {} }, recorder.sink);

        expect(textOf(response)).toBe([
            '<tool_error code="UpstreamUnavailable">',
            '<message>data.example answered 503</message>',
            '<recovery>The data source did not answer successfully. Try again later or narrow the query.</recovery>',
            '</tool_error>',
        ].join('\n'));
    });

    it('reports internal faults without a recovery hint', async () => {
        const { registry, recorder } = setup();

        const response = await executeCall(registry, ctx, { id: 4, toolName: 'crash', arguments: {} }, recorder.sink);

        expect(textOf(response)).toBe(
            '<tool_error code="InternalFault">\n<message>null dereference</message>\n</tool_error>',
        );
    });
});

// ============================================================================
// Events
// ============================================================================

describe('executeCall — events', () => {
    it('emits route, validate, execute in order on success', async () => {
        const { registry, recorder } = setup();
        await executeCall(registry, ctx, { id: 7, toolName: 'echo', arguments: {} }, recorder.sink);

        expect(recorder.events.map(e => e.type)).toEqual(['route', 'validate', 'execute']);
        expect(recorder.ofType('route')[0]).toMatchObject({ tool: 'echo', requestId: 7 });
        expect(recorder.ofType('validate')[0]).toMatchObject({ tool: 'echo', valid: true });
        expect(recorder.ofType('execute')[0]).toMatchObject({ tool: 'echo', isError: false });
    });

    it('stops after route on an unknown tool', async () => {
        const { registry, recorder } = setup();
        await executeCall(registry, ctx, { id: 8, toolName: 'ghost', arguments: {} }, recorder.sink);

        expect(recorder.events.map(e => e.type)).toEqual(['route', 'error']);
        expect(recorder.ofType('error')[0]).toMatchObject({ kind: 'UnknownTool', step: 'route' });
    });

    it('stops after validate on bad arguments', async () => {
        const { registry, recorder } = setup();
        await executeCall(registry, ctx, { id: 9, toolName: 'echo', arguments: { limit: 'many' } }, recorder.sink);

        expect(recorder.events.map(e => e.type)).toEqual(['route', 'validate']);
        expect(recorder.ofType('validate')[0]).toMatchObject({
            valid: false,
            error: 'Invalid arguments: limit must be number, got string',
        });
    });

    it('reports handler failures before the execute event', async () => {
        const { registry, recorder } = setup();
        await executeCall(registry, ctx, { id: 10, toolName: 'crash', arguments: {} }, recorder.sink);

        expect(recorder.events.map(e => e.type)).toEqual(['route', 'validate', 'error', 'execute']);
        expect(recorder.ofType('execute')[0]).toMatchObject({ isError: true });
    });
});

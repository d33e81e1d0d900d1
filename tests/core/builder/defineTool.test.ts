import { describe, it, expect, vi } from 'vitest';
import { defineTool } from '../../../src/core/builder/defineTool.js';
import { param } from '../../../src/core/schema/params.js';
import { RegistryError } from '../../../src/core/errors.js';

const input = {
    query: param.string({ min: 1 }).describe('Search text'),
    limit: param.int({ min: 1, max: 100 }).default(10),
};

describe('defineTool', () => {
    it('compiles the descriptor once', () => {
        const tool = defineTool('search', {
            description: 'Search things',
            input,
            handler: async (_ctx: void, args) => args.query,
        });

        expect(tool.descriptor).toEqual({
            name: 'search',
            description: 'Search things',
            inputSchema: {
                type: 'object',
                properties: {
                    query: { type: 'string', minLength: 1, description: 'Search text' },
                    limit: { type: 'integer', minimum: 1, maximum: 100, default: 10 },
                },
                required: ['query'],
            },
        });
        expect(tool.render).toBe('json');
    });

    it('keeps the configured render format', () => {
        const tool = defineTool('rows', {
            description: 'Rows',
            input: {},
            render: 'toon',
            handler: async () => [],
        });
        expect(tool.render).toBe('toon');
    });

    it('hands validated, typed args to the handler', async () => {
        const handler = vi.fn(async (ctx: { prefix: string }, args: { query: string; limit: number }) =>
            `${ctx.prefix}${args.query}:${args.limit}`);
        const tool = defineTool('search', { description: 'Search', input, handler });

        const prepared = tool.prepare({ query: 'bern', limit: '3', unknown: true });
        expect(prepared.ok).toBe(true);
        if (!prepared.ok) return;

        await expect(prepared.value.run({ prefix: '>' })).resolves.toBe('>bern:3');
        expect(handler).toHaveBeenCalledWith({ prefix: '>' }, { query: 'bern', limit: 3 });
    });

    it('does not call the handler when validation fails', () => {
        const handler = vi.fn(async () => 'never');
        const tool = defineTool('search', { description: 'Search', input, handler });

        const prepared = tool.prepare({ query: 'bern', limit: 500 });
        expect(prepared.ok).toBe(false);
        if (prepared.ok) return;
        expect(prepared.error.field).toBe('limit');
        expect(handler).not.toHaveBeenCalled();
    });

    it('rejects invalid names', () => {
        const config = { description: 'x', input: {}, handler: async () => null };
        expect(() => defineTool('has space', config)).toThrow(RegistryError);
        expect(() => defineTool('', config)).toThrow(RegistryError);
        expect(() => defineTool('a'.repeat(65), config)).toThrow(RegistryError);
        expect(defineTool('a'.repeat(64), config).descriptor.name).toHaveLength(64);
        expect(defineTool('sbb.rail_info-v2', config).descriptor.name).toBe('sbb.rail_info-v2');
    });
});

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { generateInputSchema } from '../../../src/core/schema/SchemaGenerator.js';
import { param } from '../../../src/core/schema/params.js';

describe('generateInputSchema', () => {
    it('advertises bounds, defaults, enumerations and descriptions', () => {
        const schema = z.object({
            limit: param.int({ min: 1, max: 100 }).default(10),
            lang: param.enum(['de', 'fr']).optional(),
            where: param.string().optional().describe('ODSQL filter'),
            include_links: param.boolean().default(false),
            name: param.string(),
        });

        expect(generateInputSchema(schema)).toEqual({
            type: 'object',
            properties: {
                limit: { type: 'integer', minimum: 1, maximum: 100, default: 10 },
                lang: { type: 'string', enum: ['de', 'fr'] },
                where: { type: 'string', description: 'ODSQL filter' },
                include_links: { type: 'boolean', default: false },
                name: { type: 'string' },
            },
            required: ['name'],
        });
    });

    it('omits required when every field is optional', () => {
        const json = generateInputSchema(z.object({ limit: param.int().default(10) }));
        expect(json).toEqual({ type: 'object', properties: { limit: { type: 'integer', default: 10 } } });
        expect('required' in json).toBe(false);
    });

    it('does not forbid additional properties', () => {
        const json = generateInputSchema(z.object({ a: z.string() }));
        expect(json['additionalProperties']).toBeUndefined();
    });

    it('handles an empty input', () => {
        expect(generateInputSchema(z.object({}))).toEqual({ type: 'object', properties: {} });
    });
});

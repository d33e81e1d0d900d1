/**
 * SBB Explore API — Dataset Records Tools
 *
 * Every SBB dataset on data.sbb.ch is queried the same way:
 *
 *   GET {baseUrl}/catalog/datasets/{dataset}/records?select=…&where=…&limit=…
 *
 * and answers `{ total_count, results: [...] }`. {@link defineRecordsTool}
 * builds one tool per dataset from that shared query shape, the dataset
 * id, per-dataset hints and a Zod schema for a single record.
 *
 * @module
 */
import { z, type ZodRawShape, type ZodTypeAny } from 'zod';
import { defineTool, type ToolDefinition } from '../../core/builder/defineTool.js';
import { param } from '../../core/schema/params.js';
import { type RenderFormat } from '../../core/response.js';
import { fetchJson, type HttpClient, type QueryValue } from '../http.js';

// ============================================================================
// Context
// ============================================================================

/** What the SBB handlers need at call time. */
export interface ProviderContext {
    readonly http: HttpClient;
    /** Explore API v2.1 root, without trailing slash */
    readonly sbbBaseUrl: string;
}

// ============================================================================
// Shared Query Shape
// ============================================================================

/** Per-dataset examples woven into the field descriptions. */
export interface QueryHints {
    readonly subject: string;
    readonly select: string;
    readonly where: string;
    readonly groupBy: string;
    readonly orderBy: string;
}

/** ODSQL clauses and pagination accepted by every records endpoint. */
export function recordsQuery(hints: QueryHints) {
    return {
        select: param.string().optional()
            .describe(`Fields to select in the response. Example: ${hints.select}`),
        where: param.string().optional()
            .describe(`ODSQL filter. Example: ${hints.where}`),
        group_by: param.string().optional()
            .describe(`Group ${hints.subject} by fields. Example: ${hints.groupBy}`),
        order_by: param.string().optional()
            .describe(`Sort ${hints.subject}. Example: ${hints.orderBy}`),
        limit: param.int({ min: 1, max: 100 }).default(10)
            .describe(`Maximum number of ${hints.subject} to return (1-100)`),
        offset: param.int({ min: 0 }).default(0)
            .describe(`Number of ${hints.subject} to skip for pagination`),
    };
}

/** Facet and formatting options most datasets accept. */
export function facetQuery(examples: { readonly refine: string; readonly exclude: string }) {
    return {
        refine: param.string().optional()
            .describe(`Refine by facet values. Example: ${examples.refine}`),
        exclude: param.string().optional()
            .describe(`Exclude facet values. Example: ${examples.exclude}`),
        lang: param.enum(['de', 'fr', 'it', 'en']).optional()
            .describe('Language of the returned content'),
        include_links: param.boolean().default(false)
            .describe('Include related links in the response'),
        include_app_metas: param.boolean().default(false)
            .describe('Include application metadata'),
    };
}

/** `{ total_count, results }` envelope around a record schema. */
export function recordsResponse<TRecord extends ZodTypeAny>(record: TRecord) {
    return z.object({
        total_count: z.number().int().nonnegative(),
        results: z.array(record),
    });
}

/** Two-dimensional point as returned by the explore API. */
export const GeoPoint = z.object({ lon: z.number(), lat: z.number() }).passthrough();

// ============================================================================
// Tool Factory
// ============================================================================

export interface RecordsToolOptions {
    readonly name: string;
    readonly description: string;
    /** Explore API dataset identifier */
    readonly dataset: string;
    readonly hints: QueryHints;
    /** Fields beyond the shared query clauses */
    readonly input?: ZodRawShape;
    /** Schema of one entry of `results` */
    readonly record: ZodTypeAny;
    readonly render?: RenderFormat;
}

/** URL of a dataset's records endpoint. */
export function recordsUrl(baseUrl: string, dataset: string): string {
    return `${baseUrl}/catalog/datasets/${encodeURIComponent(dataset)}/records`;
}

/**
 * Convert validated arguments to query parameters. Absent optional
 * fields stay out of the URL; values of other types are not sent.
 */
export function toQuery(args: object): Record<string, QueryValue> {
    const query: Record<string, QueryValue> = {};
    for (const [key, value] of Object.entries(args)) {
        if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
            query[key] = value;
        }
    }
    return query;
}

/**
 * Build a tool that queries one dataset's records.
 *
 * @example
 * ```typescript
 * const railwayLines = defineRecordsTool({
 *     name: 'railway-lines',
 *     description: 'Fetch railway line information',
 *     dataset: 'linie',
 *     hints: { subject: 'railway lines', select: "'linie,linienname'", ... },
 *     record: RailwayLine,
 * });
 * ```
 */
export function defineRecordsTool(options: RecordsToolOptions): ToolDefinition<ProviderContext> {
    const response = recordsResponse(options.record);
    const { dataset } = options;

    return defineTool(options.name, {
        description: options.description,
        input: { ...recordsQuery(options.hints), ...options.input },
        ...(options.render !== undefined ? { render: options.render } : {}),
        handler: async (ctx: ProviderContext, args) =>
            fetchJson(ctx.http, recordsUrl(ctx.sbbBaseUrl, dataset), toQuery(args), response),
    });
}

/**
 * Finance Screeners — Predefined Stock and Fund Lists
 *
 * `stock-screendata` runs one of Yahoo Finance's predefined screeners
 * (day gainers, most shorted stocks, top mutual funds, ...) and answers
 * `{ count, quotes }`. The screener client is injected through
 * {@link FinanceContext}, so handlers never touch the network in tests.
 *
 * @module
 */
import { z } from 'zod';
import { defineTool, type ToolDefinition } from '../../core/builder/defineTool.js';
import { param } from '../../core/schema/params.js';
import {
    UpstreamUnavailableError,
    UpstreamMalformedResponseError,
} from '../../core/errors.js';

// ============================================================================
// Client Contract
// ============================================================================

/** Predefined screener ids, as Yahoo Finance names them. */
export const SCREENER_IDS = [
    'aggressive_small_caps',
    'day_gainers',
    'day_losers',
    'growth_technology_stocks',
    'most_actives',
    'most_shorted_stocks',
    'small_cap_gainers',
    'undervalued_growth_stocks',
    'undervalued_large_caps',
    'conservative_foreign_funds',
    'high_yield_bond',
    'portfolio_anchors',
    'solid_large_growth_funds',
    'solid_midcap_growth_funds',
    'top_mutual_funds',
] as const;

export type ScreenerId = (typeof SCREENER_IDS)[number];

export interface ScreenerQuery {
    readonly scrIds: ScreenerId;
    readonly count: number;
}

/** Runs a predefined screener and returns its raw, unvalidated result. */
export interface ScreenerClient {
    screener(query: ScreenerQuery): Promise<unknown>;
}

/** What the finance handlers need at call time. */
export interface FinanceContext {
    readonly finance: ScreenerClient;
}

const SCREENER_ENDPOINT = 'https://query1.finance.yahoo.com/v1/finance/screener/predefined/saved';

export function screenerUrl(query: ScreenerQuery): string {
    const url = new URL(SCREENER_ENDPOINT);
    url.searchParams.set('scrIds', query.scrIds);
    url.searchParams.set('count', String(query.count));
    return url.toString();
}

// ============================================================================
// Result Shape
// ============================================================================

/** One screener row. Known fields are nullish; the rest pass through. */
export const ScreenerQuote = z.object({
    symbol: z.string(),
    shortName: z.string().nullish(),
    longName: z.string().nullish(),
    quoteType: z.string().nullish(),
    currency: z.string().nullish(),
    exchange: z.string().nullish(),
    fullExchangeName: z.string().nullish(),
    marketState: z.string().nullish(),
    regularMarketPrice: z.number().nullish(),
    regularMarketChange: z.number().nullish(),
    regularMarketChangePercent: z.number().nullish(),
    regularMarketVolume: z.number().nullish(),
    regularMarketDayHigh: z.number().nullish(),
    regularMarketDayLow: z.number().nullish(),
    averageDailyVolume3Month: z.number().nullish(),
    marketCap: z.number().nullish(),
    fiftyTwoWeekHigh: z.number().nullish(),
    fiftyTwoWeekLow: z.number().nullish(),
    trailingPE: z.number().nullish(),
    forwardPE: z.number().nullish(),
}).passthrough();

export const ScreenerResponse = z.object({
    count: z.number().int(),
    quotes: z.array(ScreenerQuote),
});

export type ScreenerData = z.infer<typeof ScreenerResponse>;

// ============================================================================
// Tool
// ============================================================================

export const stockScreener = defineTool('stock-screendata', {
    description:
        'Stocks and funds returned by a predefined Yahoo Finance screener: '
        + 'day gainers and losers, most active or most shorted stocks, '
        + 'undervalued picks, growth funds and top mutual funds.',
    input: {
        screenerOptions: param.enum(SCREENER_IDS).default('day_gainers')
            .describe(`Screener to run, one of: ${SCREENER_IDS.join(', ')}`),
        count: param.int({ min: 1, max: 250 }).default(25)
            .describe('Maximum number of quotes to return (1-250)'),
    },
    handler: async (ctx: FinanceContext, args): Promise<ScreenerData> => {
        const query: ScreenerQuery = { scrIds: args.screenerOptions, count: args.count };
        const url = screenerUrl(query);

        let raw: unknown;
        try {
            raw = await ctx.finance.screener(query);
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            throw new UpstreamUnavailableError(
                `Yahoo Finance screener "${query.scrIds}" failed: ${reason}`,
                url,
                undefined,
                { cause: err },
            );
        }

        const parsed = ScreenerResponse.safeParse(raw);
        if (!parsed.success) {
            const issues = parsed.error.issues.map(
                i => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`,
            );
            throw new UpstreamMalformedResponseError(
                `Yahoo Finance screener "${query.scrIds}" returned an unexpected payload (${issues.slice(0, 3).join('; ')})`,
                url,
                issues,
            );
        }
        return { count: parsed.data.count, quotes: parsed.data.quotes };
    },
});

export const financeTools: readonly ToolDefinition<FinanceContext>[] = [stockScreener];

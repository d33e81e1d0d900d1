import { describe, it, expect, vi } from 'vitest';
import {
    SCREENER_IDS,
    financeTools,
    stockScreener,
    screenerUrl,
    type ScreenerClient,
    type FinanceContext,
} from '../../../src/providers/finance/index.js';
import { UpstreamUnavailableError, UpstreamMalformedResponseError } from '../../../src/core/errors.js';
import { ToolRegistry } from '../../../src/core/registry/ToolRegistry.js';
import { executeCall } from '../../../src/core/execution/ExecutionPipeline.js';
import { recordEvents } from '../../helpers.js';

function clientReturning(result: unknown) {
    return { screener: vi.fn<ScreenerClient['screener']>(async () => result) };
}

function clientFailing(error: Error) {
    return {
        screener: vi.fn<ScreenerClient['screener']>(async () => {
            throw error;
        }),
    };
}

async function run(args: unknown, ctx: FinanceContext): Promise<unknown> {
    const prepared = stockScreener.prepare(args);
    if (!prepared.ok) throw new Error('unexpected validation failure');
    return prepared.value.run(ctx);
}

const gainers = {
    id: 'day_gainers',
    title: 'Day Gainers',
    count: 2,
    quotes: [
        { symbol: 'AAA', regularMarketPrice: 12.5, regularMarketChangePercent: 8.1, displayName: 'Alpha' },
        { symbol: 'BBB', shortName: null, marketCap: 1000000 },
    ],
};

// ============================================================================
// Descriptor
// ============================================================================

describe('stock-screendata descriptor', () => {
    it('is the only finance tool', () => {
        expect(financeTools.map(t => t.descriptor.name)).toEqual(['stock-screendata']);
    });

    it('offers every predefined screener, defaulting to day gainers', () => {
        const { properties, required } = stockScreener.descriptor.inputSchema;
        expect(Object.keys(properties)).toEqual(['screenerOptions', 'count']);
        expect(properties['screenerOptions']).toMatchObject({
            type: 'string',
            enum: [...SCREENER_IDS],
            default: 'day_gainers',
        });
        expect(properties['count']).toMatchObject({ type: 'integer', minimum: 1, maximum: 250, default: 25 });
        expect(required).toBeUndefined();
        expect(SCREENER_IDS).toHaveLength(15);
    });

    it('builds the predefined screener URL', () => {
        expect(screenerUrl({ scrIds: 'most_actives', count: 25 }))
            .toBe('https://query1.finance.yahoo.com/v1/finance/screener/predefined/saved?scrIds=most_actives&count=25');
    });
});

// ============================================================================
// Handler
// ============================================================================

describe('stock-screendata handler', () => {
    it('runs the default screener and returns count and quotes', async () => {
        const finance = clientReturning(gainers);

        const data = await run({}, { finance });

        expect(finance.screener).toHaveBeenCalledWith({ scrIds: 'day_gainers', count: 25 });
        expect(data).toEqual({ count: 2, quotes: gainers.quotes });
    });

    it('passes the chosen screener and a coerced count', async () => {
        const finance = clientReturning({ count: 0, quotes: [] });

        await run({ screenerOptions: 'top_mutual_funds', count: '5' }, { finance });

        expect(finance.screener).toHaveBeenCalledWith({ scrIds: 'top_mutual_funds', count: 5 });
    });

    it('rejects screeners that are not predefined', () => {
        expect(stockScreener.prepare({ screenerOptions: 'penny_stocks' }).ok).toBe(false);
    });

    it('classifies client failures as an unavailable upstream', async () => {
        const finance = clientFailing(new Error('socket hang up'));

        const err = await run({ screenerOptions: 'most_actives' }, { finance }).catch((e: unknown) => e);

        expect(err).toBeInstanceOf(UpstreamUnavailableError);
        expect(err).toMatchObject({
            message: 'Yahoo Finance screener "most_actives" failed: socket hang up',
            url: 'https://query1.finance.yahoo.com/v1/finance/screener/predefined/saved?scrIds=most_actives&count=25',
        });
    });

    it('classifies a mis-shaped result as a malformed upstream response', async () => {
        const finance = clientReturning({ quotes: 'nope' });

        const err = await run({}, { finance }).catch((e: unknown) => e);

        expect(err).toBeInstanceOf(UpstreamMalformedResponseError);
        expect(err).toMatchObject({
            message: 'Yahoo Finance screener "day_gainers" returned an unexpected payload '
                + '(count: Required; quotes: Expected array, received string)',
            issues: ['count: Required', 'quotes: Expected array, received string'],
        });
    });

    it('reaches the caller as a classified tool error', async () => {
        const registry = new ToolRegistry<FinanceContext>();
        registry.registerAll(...financeTools);
        registry.seal();
        const recorder = recordEvents();

        const response = await executeCall(
            registry,
            { finance: clientFailing(new Error('HTTP 503')) },
            { id: 1, toolName: 'stock-screendata', arguments: {} },
            recorder.sink,
        );

        expect(response.isError).toBe(true);
        expect(response._meta).toEqual({ errorKind: 'UpstreamUnavailable' });
    });
});

/**
 * Yahoo Finance screener client backed by `yahoo-finance2`.
 *
 * Results are returned unvalidated; the tool checks them with its own
 * Zod schema so a shape change surfaces as a classified tool error.
 *
 * @module
 */
import yahooFinance from 'yahoo-finance2';
import { type ScreenerClient } from './screener.js';

export function createYahooScreenerClient(): ScreenerClient {
    // Notices are printed on stdout, which carries the protocol.
    yahooFinance.suppressNotices(['yahooSurvey']);
    return {
        screener: (query) => yahooFinance.screener(
            { scrIds: query.scrIds, count: query.count },
            { validateResult: false },
        ),
    };
}

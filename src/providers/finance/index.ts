export {
    SCREENER_IDS, ScreenerQuote, ScreenerResponse, stockScreener, financeTools, screenerUrl,
    type ScreenerId, type ScreenerQuery, type ScreenerClient, type ScreenerData, type FinanceContext,
} from './screener.js';
export { createYahooScreenerClient } from './client.js';

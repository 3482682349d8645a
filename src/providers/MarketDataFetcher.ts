import type { Settings } from '../config/settings.js';
import type { TextFetcher } from '../utils/http.js';
import { fetchYahooDaily, type SeriesClient } from './yahoo.js';
import { fetchFinvizFundamentals } from './finviz.js';
import type { FundamentalsResult, SeriesResult } from './types.js';

export interface MarketData {
  fetchSeries(symbol: string, signal?: AbortSignal): Promise<SeriesResult>;
  fetchFundamentals(symbol: string, signal?: AbortSignal): Promise<FundamentalsResult>;
}

export interface MarketDataDeps {
  seriesClient?: SeriesClient;
  fetcher?: TextFetcher;
  now?: () => Date;
}

/** Prices from Yahoo, fundamentals from Finviz. Single attempt each, nothing cached. */
export class MarketDataFetcher implements MarketData {
  constructor(
    private readonly settings: Pick<Settings, 'fetchTimeoutMs' | 'historyPeriodDays'>,
    private readonly deps: MarketDataDeps = {}
  ) {}

  fetchSeries(symbol: string, signal?: AbortSignal): Promise<SeriesResult> {
    return fetchYahooDaily(symbol, {
      periodDays: this.settings.historyPeriodDays,
      client: this.deps.seriesClient,
      now: this.deps.now?.(),
      signal,
    });
  }

  fetchFundamentals(symbol: string, signal?: AbortSignal): Promise<FundamentalsResult> {
    return fetchFinvizFundamentals(symbol, { timeoutMs: this.settings.fetchTimeoutMs, fetcher: this.deps.fetcher, signal });
  }
}

// Yahoo Finance daily bars through yahoo-finance2's chart() endpoint.

import { inspect } from 'util';
import yahooFinance from 'yahoo-finance2';
import { logger } from '../utils/logger.js';
import { FetchInvalidFormatError, FetchNotFoundError, FetchTransientError } from '../shared/errors.js';
import type { OhlcRow, SeriesResult } from './types.js';

export interface RawBar {
  date: Date;
  open: number | null;
  high: number | null;
  low: number | null;
  close: number | null;
  volume: number | null;
}

export interface ChartQuery { period1: Date; interval: '1d'; }

/** The slice of yahoo-finance2 this module depends on; tests pass a fake. */
export interface SeriesClient {
  chart(symbol: string, query: ChartQuery): Promise<RawBar[]>;
}

export const yahooSeriesClient: SeriesClient = {
  async chart(symbol, query) {
    const result = await yahooFinance.chart(symbol, { period1: query.period1, interval: query.interval });
    return result.quotes.map(q => ({
      date: q.date,
      open: q.open ?? null,
      high: q.high ?? null,
      low: q.low ?? null,
      close: q.close ?? null,
      volume: q.volume ?? null,
    }));
  }
};

function formatLibraryArgs(args: unknown[]) {
  return args
    .map(a => typeof a === 'string' ? a : a instanceof Error ? a.message : inspect(a, { depth: 3, breakLength: Infinity }))
    .join(' ');
}

/** yahoo-finance2's console output, sent through the app logger instead. */
export const yahooLibraryLogger = {
  info: (...args: unknown[]) => { logger.info({ source: 'yahoo-finance2', detail: formatLibraryArgs(args) }, 'yahoo_library_log'); },
  warn: (...args: unknown[]) => { logger.warn({ source: 'yahoo-finance2', detail: formatLibraryArgs(args) }, 'yahoo_library_log'); },
  error: (...args: unknown[]) => { logger.error({ source: 'yahoo-finance2', detail: formatLibraryArgs(args) }, 'yahoo_library_log'); },
  debug: (...args: unknown[]) => { logger.debug({ source: 'yahoo-finance2', detail: formatLibraryArgs(args) }, 'yahoo_library_log'); },
  dir: (...args: unknown[]) => { logger.debug({ source: 'yahoo-finance2', detail: formatLibraryArgs(args) }, 'yahoo_library_log'); },
};

export function routeYahooLogs() {
  try {
    yahooFinance.setGlobalConfig({ logger: yahooLibraryLogger });
    yahooFinance.suppressNotices(['yahooSurvey']);
  } catch (err) {
    logger.warn({ err }, 'yahoo_logger_config_failed');
  }
}

const NOT_FOUND_PATTERN = /no data found|not found|delisted|invalid symbol/i;

export function periodStart(days: number, now = new Date()): Date {
  return new Date(now.getTime() - days * 86400000);
}

/** Bars missing any OHLC value are dropped; duplicate dates keep the last bar. */
export function parseYahooDaily(bars: RawBar[]): OhlcRow[] {
  const byDate = new Map<string, OhlcRow>();
  for (const b of bars) {
    if (!(b.date instanceof Date) || Number.isNaN(b.date.getTime())) continue;
    const open = Number(b.open);
    const high = Number(b.high);
    const low = Number(b.low);
    const close = Number(b.close);
    if (b.open === null || b.high === null || b.low === null || b.close === null) continue;
    if (![open, high, low, close].every(n => Number.isFinite(n))) continue;
    const volume = Number(b.volume);
    const date = b.date.toISOString().slice(0, 10);
    byDate.set(date, { date, open, high, low, close, volume: Number.isFinite(volume) ? volume : 0 });
  }
  return Array.from(byDate.values()).sort((a, b) => a.date < b.date ? -1 : a.date > b.date ? 1 : 0);
}

export async function fetchYahooDaily(
  symbol: string,
  opts: { periodDays: number; client?: SeriesClient; now?: Date; signal?: AbortSignal }
): Promise<SeriesResult> {
  const client = opts.client ?? yahooSeriesClient;
  const sym = symbol.toUpperCase();
  opts.signal?.throwIfAborted();
  let bars: RawBar[];
  try {
    logger.info({ symbol: sym, periodDays: opts.periodDays }, 'yahoo_chart_fetch');
    bars = await client.chart(sym, { period1: periodStart(opts.periodDays, opts.now), interval: '1d' });
  } catch (err) {
    if (opts.signal?.aborted) throw err;
    const message = err instanceof Error ? err.message : String(err);
    if (NOT_FOUND_PATTERN.test(message)) {
      logger.warn({ symbol: sym, err }, 'yahoo_chart_not_found');
      return { ok: false, symbol: sym, error: new FetchNotFoundError(sym) };
    }
    logger.error({ err, symbol: sym }, 'yahoo_chart_failed');
    return { ok: false, symbol: sym, error: new FetchTransientError(sym, err) };
  }
  // yahoo-finance2 takes no signal, so a superseded request is dropped once it returns.
  opts.signal?.throwIfAborted();
  if (!bars.length) return { ok: false, symbol: sym, error: new FetchNotFoundError(sym) };
  const rows = parseYahooDaily(bars);
  if (!rows.length) {
    logger.warn({ symbol: sym, bars: bars.length }, 'yahoo_chart_missing_ohlc');
    return { ok: false, symbol: sym, error: new FetchInvalidFormatError(sym) };
  }
  return { ok: true, symbol: sym, rows };
}

import * as cheerio from 'cheerio';
import { logger } from '../utils/logger.js';
import { fetchText, type TextFetcher } from '../utils/http.js';
import { FundamentalsUnavailableError } from '../shared/errors.js';
import type { Fundamentals, FundamentalsResult, SnapshotField } from './types.js';

const QUOTE_URL = 'https://finviz.com/quote.ashx';

// Current quote layout first, the older table layout after.
const NAME_SELECTORS = ['h2.quote-header_ticker-wrapper_company', '.fullview-title a b', '.fullview-title b'];
const LINK_SELECTORS = ['.quote-links a.tab-link', 'td.fullview-links a.tab-link'];
const PROFILE_SELECTORS = ['.quote_profile-bio', 'td.fullview-profile'];

function clean(s: string) { return s.replace(/\s+/g, ' ').trim(); }

function firstText($: cheerio.CheerioAPI, selectors: string[]) {
  for (const sel of selectors) {
    const t = clean($(sel).first().text());
    if (t) return t;
  }
  return '';
}

export function finvizQuoteUrl(symbol: string) {
  return `${QUOTE_URL}?t=${encodeURIComponent(symbol.toUpperCase())}&p=d`;
}

/** Returns null when the page has no company name or no snapshot table. */
export function parseFinvizQuote(symbol: string, html: string): Fundamentals | null {
  const $ = cheerio.load(html);
  const name = firstText($, NAME_SELECTORS);

  let links: string[] = [];
  for (const sel of LINK_SELECTORS) {
    links = $(sel).toArray().map(a => clean($(a).text())).filter(Boolean);
    if (links.length) break;
  }

  const snapshot: SnapshotField[] = [];
  $('table.snapshot-table2 tr').each((_, tr) => {
    const cells = $(tr).find('td').toArray().map(td => clean($(td).text()));
    for (let i = 0; i + 1 < cells.length; i += 2) {
      if (cells[i]) snapshot.push({ label: cells[i], value: cells[i + 1] || '-' });
    }
  });

  if (!name || !snapshot.length) return null;
  return {
    symbol: symbol.toUpperCase(),
    name,
    meta: { sector: links[0] || '-', industry: links[1] || '-', country: links[2] || '-' },
    snapshot,
    description: firstText($, PROFILE_SELECTORS),
  };
}

export async function fetchFinvizFundamentals(
  symbol: string,
  opts: { timeoutMs: number; fetcher?: TextFetcher; signal?: AbortSignal }
): Promise<FundamentalsResult> {
  const sym = symbol.toUpperCase();
  const fetcher = opts.fetcher ?? fetchText;
  const url = finvizQuoteUrl(sym);
  try {
    logger.info({ symbol: sym }, 'finviz_fetch');
    const html = await fetcher(url, { timeoutMs: opts.timeoutMs, headers: { Referer: 'https://finviz.com/' }, signal: opts.signal });
    const data = parseFinvizQuote(sym, html);
    if (!data) {
      logger.warn({ symbol: sym, bytes: html.length }, 'finviz_parse_empty');
      return { ok: false, symbol: sym, error: new FundamentalsUnavailableError(sym) };
    }
    return { ok: true, symbol: sym, data };
  } catch (err) {
    if (opts.signal?.aborted) throw err;
    logger.error({ err, symbol: sym }, 'finviz_fetch_failed');
    return { ok: false, symbol: sym, error: new FundamentalsUnavailableError(sym, err) };
  }
}

import { describe, it, before, after, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { AppController, WELCOME_TEXT, type ChartRendererLike } from '../src/app/AppController.js';
import { NotificationCenter } from '../src/app/NotificationCenter.js';
import type { ChartRequest } from '../src/chart/ChartRenderer.js';
import { textRenderable, type ChartRenderable } from '../src/chart/types.js';
import { ConfigStore } from '../src/config/ConfigStore.js';
import type { MarketData } from '../src/providers/MarketDataFetcher.js';
import type { Fundamentals, FundamentalsResult, OhlcRow, SeriesResult } from '../src/providers/types.js';
import { FetchNotFoundError, FundamentalsUnavailableError } from '../src/shared/errors.js';
import { WatchlistService } from '../src/watchlist/WatchlistService.js';
import { configureLogger } from '../src/utils/logger.js';

configureLogger({ level: 'silent' });

const ROWS: OhlcRow[] = [
  { date: '2024-03-01', open: 10, high: 12, low: 9, close: 11, volume: 100 },
  { date: '2024-03-04', open: 11, high: 13, low: 10, close: 10, volume: 200 },
];

function fundamentals(symbol: string): Fundamentals {
  return { symbol, name: `${symbol} Corp`, meta: { sector: 'Tech', industry: 'Software', country: 'USA' }, snapshot: [], description: '' };
}

class FakeMarket implements MarketData {
  readonly seriesCalls: string[] = [];
  readonly seriesSignals: AbortSignal[] = [];
  readonly pending = new Map<string, Promise<SeriesResult>>();
  known = new Set(['AAPL', 'MSFT', 'A', 'B', 'C', 'FAST', 'SLOW']);
  fundamentalsOk = true;

  async fetchSeries(symbol: string, signal?: AbortSignal): Promise<SeriesResult> {
    this.seriesCalls.push(symbol);
    if (signal) this.seriesSignals.push(signal);
    const pending = this.pending.get(symbol);
    if (pending) return pending;
    if (!this.known.has(symbol)) return { ok: false, symbol, error: new FetchNotFoundError(symbol) };
    return { ok: true, symbol, rows: ROWS };
  }

  async fetchFundamentals(symbol: string): Promise<FundamentalsResult> {
    if (!this.fundamentalsOk) return { ok: false, symbol, error: new FundamentalsUnavailableError(symbol) };
    return { ok: true, symbol, data: fundamentals(symbol) };
  }
}

class FakeRenderer implements ChartRendererLike {
  readonly requests: ChartRequest[] = [];
  failWith: Error | null = null;

  async render(req: ChartRequest): Promise<ChartRenderable> {
    this.requests.push(req);
    if (this.failWith) throw this.failWith;
    return textRenderable(`${req.mode}:${req.symbol}:${req.rows ? req.rows.length : 0}`);
  }
}

function chartText(chart: ChartRenderable) {
  return chart.kind === 'text' ? chart.text : chart.caption;
}

describe('AppController', () => {
  let dir = '';
  let n = 0;
  let store: ConfigStore;
  let market: FakeMarket;
  let renderer: FakeRenderer;
  let notifications: NotificationCenter;
  let app: AppController;

  before(() => { dir = fs.mkdtempSync(path.join(os.tmpdir(), 'app-controller-test-')); });
  after(() => { fs.rmSync(dir, { recursive: true, force: true }); });

  beforeEach(() => {
    store = new ConfigStore(path.join(dir, `config-${++n}.json`));
    market = new FakeMarket();
    renderer = new FakeRenderer();
    notifications = new NotificationCenter(60000);
    app = new AppController({ watchlist: new WatchlistService(store), market, renderer, notifications });
  });

  afterEach(() => {
    app.stop();
    notifications.dispose();
  });

  it('starts on the welcome screen with the stored watchlist', async () => {
    await store.save({ history: ['A', 'B'] });
    await app.start();
    const s = app.snapshot();
    assert.deepStrictEqual(s.watchlist, { history: ['A', 'B'], pinned: [] });
    assert.strictEqual(s.selected, 0);
    assert.strictEqual(app.selectedSymbol(), 'B');
    assert.deepStrictEqual(s.chart, textRenderable(WELCOME_TEXT));
    assert.strictEqual(s.mode, 'image');
    assert.strictEqual(s.focus, 'input');
  });

  it('submits a ticker, records it and loads chart and fundamentals', async () => {
    await app.start();
    app.setInput('aapl');
    await app.submitInput();
    const s = app.snapshot();
    assert.deepStrictEqual(s.watchlist, { history: ['AAPL'], pinned: [] });
    assert.deepStrictEqual(market.seriesCalls, ['AAPL']);
    assert.strictEqual(s.input, 'AAPL');
    assert.strictEqual(s.symbol, 'AAPL');
    assert.deepStrictEqual(s.rows, ROWS);
    assert.strictEqual(s.fundamentals?.name, 'AAPL Corp');
    assert.strictEqual(chartText(s.chart), 'image:AAPL:2');
    assert.strictEqual(s.notification?.message, 'Fetching AAPL...');
    assert.deepStrictEqual(await store.load(), { history: ['AAPL'], pinned: [] });
  });

  it('reports an unknown ticker and keeps the previous chart', async () => {
    await app.start();
    app.setInput('ZZZZ');
    await app.submitInput();
    const s = app.snapshot();
    assert.deepStrictEqual(s.notification, { id: 2, message: "No data found for 'ZZZZ'", severity: 'error' });
    assert.strictEqual(s.rows, null);
    assert.deepStrictEqual(s.chart, textRenderable(WELCOME_TEXT));
    assert.deepStrictEqual(renderer.requests, []);
    assert.deepStrictEqual(s.watchlist.history, ['ZZZZ']);
  });

  it('rejects a malformed ticker before touching the watchlist', async () => {
    await app.start();
    app.setInput('A$B');
    await app.submitInput();
    assert.strictEqual(app.snapshot().notification?.message,
      'Invalid symbol: Symbol can only contain letters, numbers, dots, dashes, carets and equals signs');
    assert.deepStrictEqual(app.snapshot().watchlist.history, []);
    assert.deepStrictEqual(market.seriesCalls, []);
  });

  it('clears the field when a space is typed', () => {
    app.setInput('AAP');
    app.setInput('AAP ');
    assert.strictEqual(app.snapshot().input, '');
  });

  it('warns when fundamentals are unavailable', async () => {
    market.fundamentalsOk = false;
    await app.start();
    await app.fetchStockData('msft');
    const s = app.snapshot();
    assert.strictEqual(chartText(s.chart), 'image:MSFT:2');
    assert.strictEqual(s.fundamentals, null);
    assert.deepStrictEqual(s.notification, { id: 2, message: 'Fundamentals unavailable for MSFT', severity: 'warning' });
  });

  it('never applies a superseded fetch', async () => {
    await app.start();
    let release: (r: SeriesResult) => void = () => undefined;
    market.pending.set('SLOW', new Promise(resolve => { release = resolve; }));
    const slow = app.fetchStockData('SLOW');
    await app.fetchStockData('FAST');
    release({ ok: true, symbol: 'SLOW', rows: ROWS.slice(0, 1) });
    await slow;
    const s = app.snapshot();
    assert.strictEqual(s.symbol, 'FAST');
    assert.deepStrictEqual(s.rows, ROWS);
    assert.strictEqual(chartText(s.chart), 'image:FAST:2');
  });

  it('aborts the signal of a superseded fetch', async () => {
    await app.start();
    let release: (r: SeriesResult) => void = () => undefined;
    market.pending.set('SLOW', new Promise(resolve => { release = resolve; }));
    const slow = app.fetchStockData('SLOW');
    await app.fetchStockData('FAST');
    release({ ok: true, symbol: 'SLOW', rows: ROWS });
    await slow;
    assert.deepStrictEqual(market.seriesCalls, ['SLOW', 'FAST']);
    assert.strictEqual(market.seriesSignals.length, 2);
    assert.strictEqual(market.seriesSignals[0].aborted, true);
    assert.strictEqual(market.seriesSignals[1].aborted, false);
  });

  it('re-renders on mode changes and image toggles', async () => {
    await app.start();
    await app.setMode('block');
    assert.strictEqual(chartText(app.snapshot().chart), 'block::0');
    assert.strictEqual(app.snapshot().notification?.message, 'Switched to Block Mode');
    await app.toggleImageVisibility();
    assert.strictEqual(app.snapshot().showImage, false);
    assert.strictEqual(renderer.requests[renderer.requests.length - 1].showImage, false);
  });

  it('re-renders only when the chart area changes size', async () => {
    await app.start();
    await app.resize({ width: 60, height: 20 });
    await app.resize({ width: 60, height: 20 });
    assert.strictEqual(renderer.requests.length, 1);
    assert.strictEqual(renderer.requests[0].width, 60);
    assert.strictEqual(renderer.requests[0].height, 20);
  });

  it('shows render failures in the chart area', async () => {
    renderer.failWith = new Error('disk full');
    await app.start();
    await app.triggerRender();
    assert.deepStrictEqual(app.snapshot().chart, textRenderable('Render failed: disk full'));
  });

  it('edits the watchlist from the selected row', async () => {
    await store.save({ history: ['A', 'B', 'C'] });
    await app.start();
    app.toggleFocus();
    assert.strictEqual(app.snapshot().focus, 'watchlist');

    app.select(1);
    assert.strictEqual(app.selectedSymbol(), 'B');
    await app.moveSelected('up');
    assert.deepStrictEqual(app.snapshot().watchlist.history, ['A', 'C', 'B']);
    assert.strictEqual(app.snapshot().selected, 0);

    await app.moveSelected('up');
    assert.deepStrictEqual(app.snapshot().watchlist.history, ['A', 'C', 'B']);

    await app.togglePinSelected();
    assert.deepStrictEqual(app.snapshot().watchlist, { history: ['A', 'C', 'B'], pinned: ['B'] });

    await app.deleteSelected();
    assert.deepStrictEqual(app.snapshot().watchlist, { history: ['A', 'C'], pinned: [] });
    assert.strictEqual(app.selectedSymbol(), 'C');

    await app.jumpSelected(1);
    assert.deepStrictEqual(app.snapshot().watchlist.history, ['C', 'A']);
    assert.strictEqual(app.snapshot().selected, 1);
    assert.strictEqual(app.selectedSymbol(), 'C');

    app.select(5);
    assert.strictEqual(app.snapshot().selected, 1);
    app.select(-5);
    assert.strictEqual(app.snapshot().selected, 0);
  });

  it('moves a row down and clears the selection once the list is empty', async () => {
    await store.save({ history: ['A', 'B'] });
    await app.start();
    await app.moveSelected('down');
    assert.deepStrictEqual(app.snapshot().watchlist.history, ['B', 'A']);
    assert.strictEqual(app.snapshot().selected, 1);
    await app.deleteSelected();
    await app.deleteSelected();
    assert.strictEqual(app.snapshot().selected, null);
    assert.strictEqual(app.selectedSymbol(), null);
  });

  it('opens the selected row', async () => {
    await store.save({ history: ['A', 'B'] });
    await app.start();
    app.select(1);
    await app.openSelected();
    assert.deepStrictEqual(market.seriesCalls, ['A']);
    assert.strictEqual(app.snapshot().symbol, 'A');
  });

  it('steps through history from the ticker field', async () => {
    await store.save({ history: ['A', 'B', 'C'] });
    await app.start();
    await app.navigateInput('down');
    assert.strictEqual(app.snapshot().input, 'C');
    await app.navigateInput('down');
    assert.strictEqual(app.snapshot().input, 'B');
    await app.navigateInput('up');
    assert.strictEqual(app.snapshot().input, 'C');
    assert.deepStrictEqual(market.seriesCalls, ['C', 'B', 'C']);
  });

  it('switches the sidebar tab', () => {
    app.toggleTab();
    assert.strictEqual(app.snapshot().tab, 'info');
    app.toggleTab();
    assert.strictEqual(app.snapshot().tab, 'watchlist');
  });
});

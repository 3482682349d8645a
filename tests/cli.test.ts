import { describe, it, before, after, afterEach } from 'node:test';
import assert from 'node:assert';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { buildProgram, formatWatchlist } from '../src/cli.js';
import type { Settings } from '../src/config/settings.js';
import type { RawBar, SeriesClient } from '../src/providers/yahoo.js';
import type { TextFetcher } from '../src/utils/http.js';

const QUOTE_HTML = fs.readFileSync(new URL('./fixtures/finviz-quote.html', import.meta.url), 'utf8');

const BARS: RawBar[] = [
  { date: new Date('2024-03-01T14:30:00Z'), open: 10, high: 12, low: 9, close: 11, volume: 100 },
  { date: new Date('2024-03-04T14:30:00Z'), open: 11, high: 13, low: 10, close: 10, volume: 200 },
];

describe('cli', () => {
  let dir = '';
  let n = 0;
  let settings: Settings;
  let out: string[];

  const seriesClient: SeriesClient = { async chart(symbol) { return symbol === 'MSFT' ? BARS : []; } };
  const fetcher: TextFetcher = async () => QUOTE_HTML;

  const run = (...args: string[]) =>
    buildProgram({ settings, market: { seriesClient, fetcher }, print: line => { out.push(line); } })
      .parseAsync(args, { from: 'user' });

  before(() => { dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cli-test-')); });
  after(() => { fs.rmSync(dir, { recursive: true, force: true }); });

  const fresh = () => {
    out = [];
    settings = {
      configPath: path.join(dir, `config-${++n}.json`),
      logLevel: 'silent',
      logFile: path.join(dir, 'test.log'),
      fetchTimeoutMs: 100,
      historyPeriodDays: 30,
      graphicsProtocol: 'kitty',
    };
  };

  afterEach(() => { process.exitCode = 0; });

  it('formats the watchlist newest first with 1-based positions', () => {
    assert.deepStrictEqual(formatWatchlist({ history: ['A', 'MSFT'], pinned: ['MSFT'] }), [
      'WATCHLIST (2)',
      '  1. MSFT' + ' '.repeat(7) + '📌',
      '  2. A',
    ]);
  });

  it('adds, pins, moves and lists symbols', async () => {
    fresh();
    await run('add', 'aapl');
    await run('add', 'msft');
    await run('add', 'goog');
    await run('pin', 'aapl');
    await run('move', 'goog', 'older');
    out = [];
    await run('list');
    assert.deepStrictEqual(out, [
      'WATCHLIST (3)',
      '  1. AAPL' + ' '.repeat(7) + '📌',
      '  2. MSFT',
      '  3. GOOG',
    ]);
    assert.deepStrictEqual(JSON.parse(fs.readFileSync(settings.configPath, 'utf8')), {
      history: ['GOOG', 'MSFT', 'AAPL'],
      pinned: ['AAPL'],
    });
  });

  it('jumps to a 1-based position and deletes', async () => {
    fresh();
    await run('add', 'A');
    await run('add', 'B');
    await run('add', 'C');
    await run('jump', 'A', '1');
    out = [];
    await run('delete', 'B');
    assert.deepStrictEqual(out, ['WATCHLIST (2)', '  1. A', '  2. C']);
  });

  it('prints a block chart', async () => {
    fresh();
    await run('chart', 'msft', '--mode', 'block', '--width', '40', '--height', '10');
    assert.strictEqual(out.length, 1);
    assert.ok(out[0].includes('MSFT - Daily (Last 60 Days)'));
    assert.ok(out[0].includes('01/03/2024'));
  });

  it('fails for a symbol without data', async () => {
    fresh();
    await run('chart', 'nope');
    assert.strictEqual(process.exitCode, 1);
    assert.strictEqual(out.length, 1);
    assert.ok(out[0].includes("No data found for 'NOPE'"));
  });

  it('prints company fundamentals', async () => {
    fresh();
    await run('info', 'exwg');
    assert.strictEqual(out[0], 'Example Widgets Inc.');
    assert.strictEqual(out[1], 'Technology | Software - Infrastructure | USA');
  });
});

import os from 'os';
import path from 'path';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { loadSettings, type Settings } from './config/settings.js';
import { ConfigStore } from './config/ConfigStore.js';
import { WatchlistService } from './watchlist/WatchlistService.js';
import { displayEntries, headerLabel, rowLabel, type WatchlistState } from './watchlist/watchlist.js';
import { MarketDataFetcher, type MarketDataDeps } from './providers/MarketDataFetcher.js';
import { routeYahooLogs } from './providers/yahoo.js';
import { ChartRenderer } from './chart/ChartRenderer.js';
import { renderableToString } from './chart/graphics.js';
import { RENDER_MODES, type RenderMode } from './chart/types.js';
import { AppController } from './app/AppController.js';
import { NotificationCenter } from './app/NotificationCenter.js';
import { TerminalShell } from './ui/TerminalShell.js';
import { infoLines } from './ui/layout.js';
import { ValidationUtils } from './shared/utils/validation.utils.js';
import { configureLogger, fileSink, logger, stderrSink } from './utils/logger.js';

export interface CliDeps {
  settings?: Settings;
  market?: MarketDataDeps;
  print?: (line: string) => void;
}

function parseSymbol(value: string) {
  const v = ValidationUtils.validateSymbol(value);
  if (!v.isValid) throw new InvalidArgumentError(v.errors.join(', '));
  return ValidationUtils.normalizeSymbol(value);
}

function parsePositive(value: string) {
  const v = ValidationUtils.validateNumeric(value, 'value', 1);
  if (!v.isValid || !Number.isInteger(Number(value))) throw new InvalidArgumentError('must be a positive integer');
  return Number(value);
}

function parseMode(value: string): RenderMode {
  const mode = RENDER_MODES.find(m => m === value);
  if (!mode) throw new InvalidArgumentError(`expected one of ${RENDER_MODES.join(', ')}`);
  return mode;
}

export function formatWatchlist(state: WatchlistState): string[] {
  const rows = displayEntries(state);
  return [headerLabel(state), ...rows.map(r => `${String(r.displayIndex + 1).padStart(3)}. ${rowLabel(r)}`)];
}

export function buildProgram(deps: CliDeps = {}): Command {
  const settings = deps.settings ?? loadSettings();
  const print = deps.print ?? ((line: string) => { process.stdout.write(line + '\n'); });
  const store = new ConfigStore(settings.configPath);
  const watchlist = new WatchlistService(store);
  const market = () => new MarketDataFetcher(settings, deps.market);

  const showList = (state: WatchlistState) => { for (const line of formatWatchlist(state)) print(line); };

  const program = new Command();
  program
    .name('stock-terminal')
    .description('Terminal stock dashboard with candlestick charts and a pinned watchlist')
    .version('0.1.0')
    .hook('preAction', (_cmd, action) => {
      const interactive = action.name() === 'tui';
      configureLogger({ level: settings.logLevel, sink: interactive ? fileSink(settings.logFile) : stderrSink });
      routeYahooLogs();
    });

  program.command('tui', { isDefault: true })
    .description('open the interactive dashboard')
    .action(async () => {
      const notifications = new NotificationCenter();
      const renderer = new ChartRenderer({ protocol: settings.graphicsProtocol, color: true });
      const app = new AppController({ watchlist, market: market(), renderer, notifications });
      const shell = new TerminalShell(app);
      try {
        await shell.run();
      } finally {
        notifications.dispose();
        await renderer.dispose();
        await store.flush();
      }
    });

  program.command('list')
    .description('print the watchlist, newest first')
    .action(async () => { showList(await watchlist.load()); });

  program.command('add')
    .argument('<symbol>', 'ticker symbol', parseSymbol)
    .description('add a symbol to the history')
    .action(async (symbol: string) => { showList(await watchlist.submit(symbol)); });

  program.command('pin')
    .argument('<symbol>', 'ticker symbol', parseSymbol)
    .description('pin or unpin a symbol')
    .action(async (symbol: string) => { showList(await watchlist.togglePin(symbol)); });

  program.command('delete')
    .argument('<symbol>', 'ticker symbol', parseSymbol)
    .description('remove a symbol from the watchlist')
    .action(async (symbol: string) => { showList(await watchlist.delete(symbol)); });

  program.command('move')
    .argument('<symbol>', 'ticker symbol', parseSymbol)
    .argument('<direction>', 'older or newer', (v: string) => {
      if (v !== 'older' && v !== 'newer') throw new InvalidArgumentError('expected older or newer');
      return v;
    })
    .description('swap a symbol with its neighbour')
    .action(async (symbol: string, direction: 'older' | 'newer') => { showList(await watchlist.move(symbol, direction)); });

  program.command('jump')
    .argument('<symbol>', 'ticker symbol', parseSymbol)
    .argument('<position>', '1-based position in the list', parsePositive)
    .description('move a symbol to a position in the list')
    .action(async (symbol: string, position: number) => { showList(await watchlist.jumpToPosition(symbol, position - 1)); });

  program.command('chart')
    .argument('<symbol>', 'ticker symbol', parseSymbol)
    .option('-m, --mode <mode>', 'block, image or debug', parseMode, 'block')
    .option('-w, --width <cols>', 'chart width in columns', parsePositive, process.stdout.columns || 100)
    .option('-H, --height <rows>', 'chart height in rows', parsePositive, 28)
    .description('fetch and print one chart')
    .action(async (symbol: string, opts: { mode: RenderMode; width: number; height: number }) => {
      const result = await market().fetchSeries(symbol);
      if (!result.ok) {
        logger.error({ symbol, code: result.error.code }, 'chart_fetch_failed');
        print(chalk.red(result.error.message));
        process.exitCode = 1;
        return;
      }
      // kitty reads the picture after this process exits, so it goes to a shared directory.
      const renderer = new ChartRenderer({
        protocol: settings.graphicsProtocol,
        color: Boolean(process.stdout.isTTY),
        tmpDir: path.join(os.tmpdir(), 'stock-terminal'),
      });
      const chart = await renderer.render({ mode: opts.mode, symbol: result.symbol, rows: result.rows, width: opts.width, height: opts.height, showImage: true });
      print(renderableToString(chart));
    });

  program.command('info')
    .argument('<symbol>', 'ticker symbol', parseSymbol)
    .description('fetch and print company fundamentals')
    .action(async (symbol: string) => {
      const result = await market().fetchFundamentals(symbol);
      if (!result.ok) {
        print(chalk.yellow(result.error.message));
        process.exitCode = 1;
        return;
      }
      for (const line of infoLines(result.data, 80)) print(line);
    });

  return program;
}

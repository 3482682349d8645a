// Dashboard state and the actions behind every key binding.
// Whatever draws the screen subscribes and reads snapshot(); nothing here
// knows about the terminal.

import type { MarketData } from '../providers/MarketDataFetcher.js';
import type { Fundamentals, OhlcRow } from '../providers/types.js';
import type { WatchlistService } from '../watchlist/WatchlistService.js';
import type { NavigateDirection, WatchlistState } from '../watchlist/watchlist.js';
import type { ChartRequest } from '../chart/ChartRenderer.js';
import { textRenderable, type ChartRenderable, type RenderMode } from '../chart/types.js';
import { ValidationUtils } from '../shared/utils/validation.utils.js';
import { describeError } from '../shared/errors.js';
import { logger } from '../utils/logger.js';
import { ExclusiveWorker } from './ExclusiveWorker.js';
import type { Notification, NotificationCenter } from './NotificationCenter.js';

export type Focus = 'input' | 'watchlist';
export type SidebarTab = 'watchlist' | 'info';

export interface ChartSize { width: number; height: number; }

export interface AppSnapshot {
  input: string;
  focus: Focus;
  tab: SidebarTab;
  watchlist: WatchlistState;
  selected: number | null;
  symbol: string;
  rows: OhlcRow[] | null;
  fundamentals: Fundamentals | null;
  mode: RenderMode;
  showImage: boolean;
  size: ChartSize;
  chart: ChartRenderable;
  notification: Notification | null;
}

export interface ChartRendererLike {
  render(req: ChartRequest, signal?: AbortSignal): Promise<ChartRenderable>;
}

export interface AppControllerDeps {
  watchlist: WatchlistService;
  market: MarketData;
  renderer: ChartRendererLike;
  notifications: NotificationCenter;
}

type Listener = (s: AppSnapshot) => void;

export const WELCOME_TEXT = [
  'Welcome! Enter a stock symbol above.',
  '',
  'Controls:',
  ' - ENTER: Fetch data',
  ' - TAB: Switch between ticker field and watchlist',
  ' - CTRL+B: Switch to Block (Text) Mode',
  ' - CTRL+G: Switch to Image (High-Res) Mode',
  ' - CTRL+T: Test Terminal Graphics Support',
].join('\n');

const MODE_MESSAGES: Record<RenderMode, string> = {
  block: 'Switched to Block Mode',
  image: 'Switched to Image Mode',
  debug: 'Running Graphics Test...',
};

export class AppController {
  private state: AppSnapshot;
  private listeners = new Set<Listener>();
  private unsubscribers: Array<() => void> = [];
  readonly seriesWorker = new ExclusiveWorker('series');
  readonly infoWorker = new ExclusiveWorker('fundamentals');
  readonly renderWorker = new ExclusiveWorker('render');

  constructor(private readonly deps: AppControllerDeps) {
    this.state = {
      input: '',
      focus: 'input',
      tab: 'watchlist',
      watchlist: { history: [], pinned: [] },
      selected: null,
      symbol: '',
      rows: null,
      fundamentals: null,
      mode: 'image',
      showImage: true,
      size: { width: 0, height: 0 },
      chart: textRenderable(WELCOME_TEXT),
      notification: null,
    };
  }

  snapshot(): AppSnapshot { return { ...this.state }; }

  subscribe(fn: Listener) { this.listeners.add(fn); return () => { this.listeners.delete(fn); }; }

  async start() {
    this.unsubscribers.push(
      this.deps.watchlist.subscribe(w => this.set({ watchlist: w })),
      this.deps.notifications.subscribe(n => this.set({ notification: n })),
    );
    const watchlist = await this.deps.watchlist.load();
    this.set({ watchlist, selected: watchlist.history.length ? 0 : null });
  }

  stop() {
    for (const u of this.unsubscribers) u();
    this.unsubscribers = [];
    this.seriesWorker.cancel();
    this.infoWorker.cancel();
    this.renderWorker.cancel();
  }

  // ---- ticker field ----

  /** A space anywhere clears the field. */
  setInput(value: string) {
    this.set({ input: value.includes(' ') ? '' : value });
  }

  async submitInput() {
    const symbol = ValidationUtils.normalizeSymbol(this.state.input);
    if (!symbol) return;
    const v = ValidationUtils.validateSymbol(symbol);
    if (!v.isValid) {
      this.notify(`Invalid symbol: ${v.errors.join(', ')}`, 'error');
      return;
    }
    await this.deps.watchlist.submit(symbol);
    await this.fetchStockData(symbol);
  }

  async navigateInput(direction: NavigateDirection) {
    const next = await this.deps.watchlist.navigate(this.state.input, direction);
    if (!next) return;
    this.set({ input: next });
    await this.fetchStockData(next);
  }

  // ---- data ----

  async fetchStockData(symbol: string) {
    const sym = ValidationUtils.normalizeSymbol(symbol);
    if (this.state.input !== sym) this.set({ input: sym });
    this.notify(`Fetching ${sym}...`);
    let loaded = false;
    await this.seriesWorker.run(
      signal => this.deps.market.fetchSeries(sym, signal),
      result => {
        if (!result.ok) {
          this.notify(result.error.message, 'error');
          return;
        }
        loaded = true;
        this.set({ rows: result.rows, symbol: result.symbol });
      },
      err => {
        logger.error({ err, symbol: sym }, 'data_fetch_failed');
        this.notify(`Fetch Error: ${describeError(err)}`, 'error');
      }
    );
    if (!loaded) return;
    await Promise.all([this.triggerRender(), this.fetchExtraInfo(sym)]);
  }

  async fetchExtraInfo(symbol: string) {
    await this.infoWorker.run(
      signal => this.deps.market.fetchFundamentals(symbol, signal),
      result => {
        if (result.ok) this.set({ fundamentals: result.data });
        else this.notify(result.error.message, 'warning');
      },
      err => logger.error({ err, symbol }, 'fundamentals_fetch_failed')
    );
  }

  // ---- chart ----

  async setMode(mode: RenderMode) {
    this.set({ mode });
    this.notify(MODE_MESSAGES[mode]);
    await this.triggerRender();
  }

  async toggleImageVisibility() {
    this.set({ showImage: !this.state.showImage });
    await this.triggerRender();
  }

  async resize(size: ChartSize) {
    if (size.width === this.state.size.width && size.height === this.state.size.height) return;
    this.set({ size });
    await this.triggerRender();
  }

  async triggerRender() {
    this.set({ chart: textRenderable('Rendering...') });
    const { mode, symbol, rows, size, showImage } = this.state;
    await this.renderWorker.run(
      signal => this.deps.renderer.render({ mode, symbol, rows, width: size.width, height: size.height, showImage }, signal),
      chart => this.set({ chart }),
      err => {
        logger.error({ err }, 'render_failed');
        this.set({ chart: textRenderable(`Render failed: ${describeError(err)}`) });
      }
    );
  }

  // ---- sidebar ----

  toggleFocus() {
    this.set({ focus: this.state.focus === 'input' ? 'watchlist' : 'input' });
  }

  setFocus(focus: Focus) { this.set({ focus }); }

  toggleTab() {
    this.set({ tab: this.state.tab === 'watchlist' ? 'info' : 'watchlist' });
  }

  select(delta: number) {
    const len = this.state.watchlist.history.length;
    if (!len) {
      this.set({ selected: null });
      return;
    }
    const from = this.state.selected ?? 0;
    this.set({ selected: Math.min(len - 1, Math.max(0, from + delta)) });
  }

  selectedSymbol(): string | null {
    const i = this.state.selected;
    const history = this.state.watchlist.history;
    if (i === null || i < 0 || i >= history.length) return null;
    return history[history.length - 1 - i];
  }

  async openSelected() {
    const sym = this.selectedSymbol();
    if (sym) await this.fetchStockData(sym);
  }

  async deleteSelected() {
    const sym = this.selectedSymbol();
    const index = this.state.selected;
    if (!sym || index === null) return;
    const next = await this.deps.watchlist.delete(sym);
    this.set({ selected: next.history.length ? Math.min(index, next.history.length - 1) : null });
  }

  /** Up/down as seen on screen; up is towards the newest entry. */
  async moveSelected(direction: 'up' | 'down') {
    const sym = this.selectedSymbol();
    const index = this.state.selected;
    if (!sym || index === null) return;
    const len = this.state.watchlist.history.length;
    if (direction === 'up' && index > 0) {
      await this.deps.watchlist.move(sym, 'newer');
      this.set({ selected: index - 1 });
    } else if (direction === 'down' && index < len - 1) {
      await this.deps.watchlist.move(sym, 'older');
      this.set({ selected: index + 1 });
    }
  }

  async togglePinSelected() {
    const sym = this.selectedSymbol();
    if (sym) await this.deps.watchlist.togglePin(sym);
  }

  async jumpSelected(targetDisplayIndex: number) {
    const sym = this.selectedSymbol();
    const index = this.state.selected;
    if (!sym || index === null) return;
    if (targetDisplayIndex >= this.state.watchlist.history.length || targetDisplayIndex === index) return;
    await this.deps.watchlist.jumpToPosition(sym, targetDisplayIndex);
    this.set({ selected: targetDisplayIndex });
  }

  notify(message: string, severity: 'information' | 'warning' | 'error' = 'information') {
    this.deps.notifications.notify(message, severity);
  }

  private set(change: Partial<AppSnapshot>) {
    this.state = { ...this.state, ...change };
    const snap = this.snapshot();
    for (const l of Array.from(this.listeners)) {
      try { l(snap); } catch (err) { logger.warn({ err }, 'app_listener_failed'); }
    }
  }
}

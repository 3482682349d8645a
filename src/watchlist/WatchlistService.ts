import type { ConfigStore } from '../config/ConfigStore.js';
import { logger } from '../utils/logger.js';
import {
  jumpToPosition, move, navigateHistory, normalizeState, remove, statesEqual, submit, togglePin,
  type MoveDirection, type NavigateDirection, type WatchlistState
} from './watchlist.js';

type Listener = (state: WatchlistState, op: string) => void;

/**
 * Write-through watchlist. Each operation runs inside the store's atomic
 * update, so it always starts from what is on disk, and listeners hear about
 * the persisted result.
 */
export class WatchlistService {
  private listeners = new Set<Listener>();
  private last: WatchlistState = { history: [], pinned: [] };

  constructor(private readonly store: ConfigStore) {}

  /** Last state read or written by this service. */
  snapshot(): WatchlistState { return { history: this.last.history.slice(), pinned: this.last.pinned.slice() }; }

  subscribe(fn: Listener) { this.listeners.add(fn); return () => { this.listeners.delete(fn); }; }

  async load(): Promise<WatchlistState> {
    const doc = await this.store.load();
    this.last = normalizeState({ history: doc.history, pinned: doc.pinned });
    return this.snapshot();
  }

  submit(symbol: string) { return this.apply('submit', s => submit(s, symbol)); }
  togglePin(symbol: string) { return this.apply('pin', s => togglePin(s, symbol)); }
  move(symbol: string, direction: MoveDirection) { return this.apply('move', s => move(s, symbol, direction)); }
  jumpToPosition(symbol: string, targetDisplayIndex: number) { return this.apply('jump', s => jumpToPosition(s, symbol, targetDisplayIndex)); }
  delete(symbol: string) { return this.apply('delete', s => remove(s, symbol)); }

  async navigate(currentSymbol: string, direction: NavigateDirection): Promise<string | null> {
    const state = await this.load();
    return navigateHistory(state, currentSymbol, direction);
  }

  private async apply(op: string, fn: (s: WatchlistState) => WatchlistState): Promise<WatchlistState> {
    let changed = false;
    const doc = await this.store.update(current => {
      const before = normalizeState({ history: current.history, pinned: current.pinned });
      const after = fn(before);
      changed = !statesEqual(before, after);
      return { ...current, history: after.history, pinned: after.pinned };
    });
    this.last = { history: doc.history.slice(), pinned: doc.pinned.slice() };
    logger.debug({ op, changed, size: this.last.history.length }, 'watchlist_updated');
    this.emit(op);
    return this.snapshot();
  }

  private emit(op: string) {
    const snap = this.snapshot();
    for (const l of Array.from(this.listeners)) {
      try { l(snap, op); } catch (err) { logger.warn({ err, op }, 'watchlist_listener_failed'); }
    }
  }
}

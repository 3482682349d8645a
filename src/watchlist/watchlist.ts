// Watchlist ordering over the persisted history/pinned pair.
//
// Storage order is oldest first; the display shows it reversed, so the newest
// entry sits on top. Pinned symbols form a trailing block in storage (top of
// the display). Every function returns a fresh state and never mutates its input.

export const MAX_HISTORY = 100;

export interface WatchlistState {
  history: string[];
  pinned: string[];
}

export type MoveDirection = 'older' | 'newer';
export type NavigateDirection = 'up' | 'down';

export interface WatchlistRow {
  symbol: string;
  pinned: boolean;
  displayIndex: number;
}

const PIN_MARKER = '📌';
const LABEL_WIDTH = 10;

function normalize(s: string) { return String(s || '').trim().toUpperCase(); }

function dedupe(list: string[]) {
  const seen = new Set<string>();
  return list.filter(s => { if (!s || seen.has(s)) return false; seen.add(s); return true; });
}

/** Clean a state read from disk: uppercase, drop duplicates and pins without a history entry. */
export function normalizeState(state: WatchlistState): WatchlistState {
  const history = dedupe(state.history.map(normalize));
  const present = new Set(history);
  const pinned = dedupe(state.pinned.map(normalize)).filter(s => present.has(s));
  return { history, pinned };
}

/** Stable partition: unpinned entries first, pinned block after. */
export function restorePinnedBlock(history: string[], pinned: string[]): string[] {
  const isPinned = new Set(pinned);
  return [...history.filter(s => !isPinned.has(s)), ...history.filter(s => isPinned.has(s))];
}

function firstPinnedIndex(history: string[], pinned: string[]) {
  const isPinned = new Set(pinned);
  const idx = history.findIndex(s => isPinned.has(s));
  return idx === -1 ? history.length : idx;
}

// Eviction is positional only: a pinned entry at index 0 goes like any other,
// and its pin goes with it.
function withCap(history: string[], pinned: string[]): WatchlistState {
  if (history.length <= MAX_HISTORY) return { history, pinned };
  const kept = history.slice(history.length - MAX_HISTORY);
  const present = new Set(kept);
  return { history: kept, pinned: pinned.filter(s => present.has(s)) };
}

export function submit(state: WatchlistState, symbol: string): WatchlistState {
  const sym = normalize(symbol);
  if (!sym) return state;
  if (state.pinned.includes(sym) && state.history.includes(sym)) {
    return withCap(state.history.slice(), state.pinned.slice());
  }
  const pinned = state.pinned.filter(s => s !== sym);
  const history = restorePinnedBlock(state.history.filter(s => s !== sym), pinned);
  history.splice(firstPinnedIndex(history, pinned), 0, sym);
  return withCap(history, pinned);
}

/** Pin an unpinned symbol, unpin a pinned one. Either way it lands at the start of the pinned block. */
export function togglePin(state: WatchlistState, symbol: string): WatchlistState {
  const sym = normalize(symbol);
  if (!sym) return state;
  const pinned = state.pinned.includes(sym)
    ? state.pinned.filter(s => s !== sym)
    : [...state.pinned, sym];
  const history = restorePinnedBlock(state.history.filter(s => s !== sym), pinned);
  history.splice(firstPinnedIndex(history, pinned), 0, sym);
  return withCap(history, pinned);
}

/** Swap with the storage neighbour: `newer` is towards the end (top of the display). */
export function move(state: WatchlistState, symbol: string, direction: MoveDirection): WatchlistState {
  const idx = state.history.indexOf(normalize(symbol));
  if (idx === -1) return state;
  const target = direction === 'newer' ? idx + 1 : idx - 1;
  if (target < 0 || target >= state.history.length) return state;
  const history = state.history.slice();
  [history[idx], history[target]] = [history[target], history[idx]];
  return { history, pinned: state.pinned.slice() };
}

export function displayIndexOf(state: WatchlistState, symbol: string) {
  const idx = state.history.indexOf(normalize(symbol));
  return idx === -1 ? -1 : state.history.length - 1 - idx;
}

export function jumpToPosition(state: WatchlistState, symbol: string, targetDisplayIndex: number): WatchlistState {
  const current = displayIndexOf(state, symbol);
  const len = state.history.length;
  if (current === -1) return state;
  if (!Number.isInteger(targetDisplayIndex) || targetDisplayIndex < 0 || targetDisplayIndex >= len) return state;
  if (targetDisplayIndex === current) return state;
  const history = state.history.slice();
  const [sym] = history.splice(len - 1 - current, 1);
  history.splice(history.length - targetDisplayIndex, 0, sym);
  return { history, pinned: state.pinned.slice() };
}

/** Removes the symbol from history and from the pinned set. */
export function remove(state: WatchlistState, symbol: string): WatchlistState {
  const sym = normalize(symbol);
  if (!state.history.includes(sym) && !state.pinned.includes(sym)) return state;
  return {
    history: state.history.filter(s => s !== sym),
    pinned: state.pinned.filter(s => s !== sym),
  };
}

export function displayOrder(state: WatchlistState): string[] {
  return state.history.slice().reverse();
}

/**
 * Cycle through the display order. An absent symbol counts as position -1,
 * so `down` starts at the top and `up` starts one above the bottom.
 */
export function navigateHistory(state: WatchlistState, currentSymbol: string, direction: NavigateDirection): string | null {
  const visual = displayOrder(state);
  if (!visual.length) return null;
  const idx = visual.indexOf(normalize(currentSymbol));
  const step = direction === 'up' ? -1 : 1;
  const next = ((idx + step) % visual.length + visual.length) % visual.length;
  return visual[next];
}

export function displayEntries(state: WatchlistState): WatchlistRow[] {
  const pinned = new Set(state.pinned);
  return displayOrder(state).map((symbol, displayIndex) => ({ symbol, pinned: pinned.has(symbol), displayIndex }));
}

export function rowLabel(row: WatchlistRow) {
  return row.pinned ? `${row.symbol.padEnd(LABEL_WIDTH)} ${PIN_MARKER}` : row.symbol;
}

export function headerLabel(state: WatchlistState) {
  return `WATCHLIST (${state.history.length})`;
}

export function statesEqual(a: WatchlistState, b: WatchlistState) {
  return a.history.length === b.history.length && a.pinned.length === b.pinned.length
    && a.history.every((s, i) => s === b.history[i]) && a.pinned.every((s, i) => s === b.pinned[i]);
}

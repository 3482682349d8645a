import stringWidth from 'string-width';
import type { AppSnapshot, ChartSize } from '../app/AppController.js';
import type { Fundamentals } from '../providers/types.js';
import { displayEntries, headerLabel, rowLabel } from '../watchlist/watchlist.js';

export const SIDEBAR_WIDTH = 30;
export const TITLE = 'Stock Terminal';

/** Title, ticker bar and footer take three rows; the sidebar plus its border take SIDEBAR_WIDTH + 1 columns. */
export function chartArea(cols: number, rows: number): ChartSize {
  return { width: Math.max(10, cols - SIDEBAR_WIDTH - 1), height: Math.max(5, rows - 3) };
}

/** Pad or cut to exactly `width` terminal cells; wide glyphs such as emoji count as two. */
export function fit(text: string, width: number) {
  let out = '';
  let used = 0;
  for (const ch of text) {
    const w = stringWidth(ch);
    if (used + w > width) break;
    out += ch;
    used += w;
  }
  return out + ' '.repeat(Math.max(0, width - used));
}

export function wrap(text: string, width: number): string[] {
  const out: string[] = [];
  for (const para of text.split(/\n/)) {
    let line = '';
    for (const word of para.split(/\s+/).filter(Boolean)) {
      if (!line) line = word;
      else if (line.length + 1 + word.length <= width) line += ' ' + word;
      else { out.push(line); line = word; }
      while (line.length > width) { out.push(line.slice(0, width)); line = line.slice(width); }
    }
    out.push(line);
  }
  return out;
}

export function watchlistLines(s: Pick<AppSnapshot, 'watchlist' | 'selected' | 'focus'>): string[] {
  const lines = [headerLabel(s.watchlist)];
  for (const row of displayEntries(s.watchlist)) {
    const marker = row.displayIndex === s.selected ? (s.focus === 'watchlist' ? '>' : '-') : ' ';
    lines.push(`${marker} ${rowLabel(row)}`);
  }
  return lines;
}

export function infoLines(f: Fundamentals | null, width: number): string[] {
  if (!f) return ['INFO', '', 'No company data loaded.'];
  const labelWidth = Math.min(14, Math.max(0, ...f.snapshot.map(r => r.label.length)));
  const lines = [f.name, `${f.meta.sector} | ${f.meta.industry} | ${f.meta.country}`, ''];
  for (const r of f.snapshot) lines.push(`${r.label.padEnd(labelWidth)} ${r.value}`);
  lines.push('', 'Description', '');
  lines.push(...wrap(f.description || '-', width));
  return lines;
}

export function sidebarLines(s: AppSnapshot, width: number, height: number): string[] {
  const body = s.tab === 'watchlist' ? watchlistLines(s) : infoLines(s.fundamentals, width);
  const tabs = s.tab === 'watchlist' ? '[Watchlist]  Info ' : ' Watchlist  [Info]';
  const lines = [tabs, ...body].slice(0, height);
  while (lines.length < height) lines.push('');
  return lines.map(l => fit(l, width));
}

export function tickerBar(s: Pick<AppSnapshot, 'input' | 'notification'>, cols: number) {
  const field = `Ticker: ${s.input}`;
  const note = s.notification ? `  ${s.notification.message}` : '';
  return fit(field.padEnd(SIDEBAR_WIDTH + 12) + note, cols);
}

export function footer(s: Pick<AppSnapshot, 'focus' | 'mode'>, cols: number) {
  const keys = s.focus === 'input'
    ? 'ENTER fetch  ↑↓ history  TAB watchlist'
    : 'ENTER fetch  d delete  K/J move  p pin  1-9 jump  i info  ESC ticker';
  return fit(` ${keys}  ^B block  ^G image  ^T test  ^C quit  [${s.mode}]`, cols);
}

import { Chalk } from 'chalk';
import type { OhlcRow } from '../providers/types.js';

export const BLOCK_BARS = 60;

const BODY = '┃';
const WICK = '│';
const Y_LABEL_EVERY = 5;

export interface BlockChartOptions {
  symbol: string;
  width: number;
  height: number;
  color?: boolean;
}

/** 2024-03-05 -> 05/03/2024 */
export function formatDate(isoDate: string) {
  const [y, m, d] = isoDate.split('-');
  return `${d}/${m}/${y}`;
}

function formatPrice(v: number) { return v.toFixed(2); }

/**
 * Text candlestick chart of the last 60 bars: title, one row per price band,
 * an axis line and first/last date labels. One column per candle, with a
 * blank column between candles when the width allows it.
 */
export function renderBlockChart(rows: OhlcRow[], opts: BlockChartOptions): string {
  const c = new Chalk({ level: opts.color ? 1 : 0 });
  const title = `${opts.symbol} - Daily (Last ${BLOCK_BARS} Days)`;
  let bars = rows.slice(-BLOCK_BARS);
  if (!bars.length) return title;

  const plotHeight = Math.max(3, opts.height - 3);
  const max = Math.max(...bars.map(b => b.high));
  const min = Math.min(...bars.map(b => b.low));
  const labelWidth = Math.max(formatPrice(max).length, formatPrice(min).length);
  const available = Math.max(1, opts.width - labelWidth - 2);
  if (bars.length > available) bars = bars.slice(-available);
  const step = available >= bars.length * 2 ? 2 : 1;
  const plotWidth = bars.length * step;

  const span = max - min;
  const rowOf = (v: number) => span === 0
    ? Math.floor((plotHeight - 1) / 2)
    : Math.min(plotHeight - 1, Math.max(0, Math.round((max - v) / span * (plotHeight - 1))));

  const grid: string[][] = Array.from({ length: plotHeight }, () => Array.from({ length: plotWidth }, () => ' '));
  bars.forEach((b, i) => {
    const col = i * step;
    const paint = b.close >= b.open ? c.green : c.red;
    for (let r = rowOf(b.high); r <= rowOf(b.low); r++) grid[r][col] = paint(WICK);
    for (let r = rowOf(Math.max(b.open, b.close)); r <= rowOf(Math.min(b.open, b.close)); r++) grid[r][col] = paint(BODY);
  });

  const lines = [c.bold(title)];
  for (let r = 0; r < plotHeight; r++) {
    const showLabel = r === 0 || r === plotHeight - 1 || r % Y_LABEL_EVERY === 0;
    const value = span === 0 ? max : max - (span * r) / (plotHeight - 1);
    const label = showLabel ? formatPrice(value).padStart(labelWidth) : ' '.repeat(labelWidth);
    lines.push(`${c.gray(label)} ┤${grid[r].join('')}`.replace(/\s+$/, ''));
  }
  lines.push(`${' '.repeat(labelWidth)} └${'─'.repeat(plotWidth)}`);

  const first = formatDate(bars[0].date);
  const last = formatDate(bars[bars.length - 1].date);
  const gap = plotWidth - first.length - last.length;
  const dates = bars.length > 1 && gap >= 1 ? `${first}${' '.repeat(gap)}${last}` : first;
  lines.push(`${' '.repeat(labelWidth + 2)}${dates}`);
  return lines.join('\n');
}

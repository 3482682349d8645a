import { PNG } from 'pngjs';
import type { OhlcRow } from '../providers/types.js';

type Rgb = readonly [number, number, number];

export const COLORS: Record<'background' | 'grid' | 'up' | 'down' | 'white', Rgb> = {
  background: [0x0a, 0x0a, 0x23],
  grid: [0x3a, 0x3a, 0x55],
  up: [0x26, 0xa6, 0x9a],
  down: [0xef, 0x53, 0x50],
  white: [0xff, 0xff, 0xff],
};

/** Pixels per terminal cell used to size the figure from the chart area. */
export const PX_PER_COL = 12;
export const PX_PER_ROW = 25;

const PAD = 8;
const VOLUME_SHARE = 0.22;
const GRID_LINES = 4;

class Canvas {
  readonly png: PNG;
  constructor(readonly width: number, readonly height: number, bg: Rgb) {
    this.png = new PNG({ width, height });
    this.fillRect(0, 0, width, height, bg);
  }
  set(x: number, y: number, [r, g, b]: Rgb) {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return;
    const i = (this.width * y + x) << 2;
    this.png.data[i] = r;
    this.png.data[i + 1] = g;
    this.png.data[i + 2] = b;
    this.png.data[i + 3] = 255;
  }
  fillRect(x0: number, y0: number, w: number, h: number, color: Rgb) {
    for (let y = Math.max(0, y0); y < Math.min(this.height, y0 + h); y++) {
      for (let x = Math.max(0, x0); x < Math.min(this.width, x0 + w); x++) this.set(x, y, color);
    }
  }
  dottedHLine(y: number, x0: number, x1: number, color: Rgb) {
    for (let x = x0; x < x1; x += 3) this.set(x, y, color);
  }
  encode(): Buffer {
    return PNG.sync.write(this.png);
  }
}

/** Candlesticks over a volume panel, one slot per bar across the full width. */
export function renderCandlestickPng(rows: OhlcRow[], size: { width: number; height: number }): Buffer {
  const width = Math.max(40, Math.round(size.width));
  const height = Math.max(40, Math.round(size.height));
  const canvas = new Canvas(width, height, COLORS.background);
  if (!rows.length) return canvas.encode();

  const plotW = width - PAD * 2;
  const volH = Math.floor((height - PAD * 3) * VOLUME_SHARE);
  const priceH = height - PAD * 3 - volH;
  const priceTop = PAD;
  const volTop = priceTop + priceH + PAD;

  const max = Math.max(...rows.map(r => r.high));
  const min = Math.min(...rows.map(r => r.low));
  const span = max - min || 1;
  const maxVol = Math.max(...rows.map(r => r.volume)) || 1;
  const yOf = (v: number) => priceTop + Math.round((max - v) / span * (priceH - 1));

  for (let g = 0; g <= GRID_LINES; g++) {
    canvas.dottedHLine(priceTop + Math.round((priceH - 1) * g / GRID_LINES), PAD, PAD + plotW, COLORS.grid);
  }

  const slot = plotW / rows.length;
  const bodyW = Math.max(1, Math.floor(slot * 0.7));
  rows.forEach((r, i) => {
    const color = r.close >= r.open ? COLORS.up : COLORS.down;
    const left = PAD + Math.floor(i * slot + (slot - bodyW) / 2);
    const mid = left + Math.floor(bodyW / 2);
    const yHigh = yOf(r.high);
    canvas.fillRect(mid, yHigh, 1, yOf(r.low) - yHigh + 1, color);
    const yTop = yOf(Math.max(r.open, r.close));
    canvas.fillRect(left, yTop, bodyW, yOf(Math.min(r.open, r.close)) - yTop + 1, color);
    const vh = Math.round((r.volume / maxVol) * volH);
    canvas.fillRect(left, volTop + volH - vh, bodyW, vh, color);
  });
  return canvas.encode();
}

export function whiteSquarePng(side = 100): Buffer {
  return new Canvas(side, side, COLORS.white).encode();
}

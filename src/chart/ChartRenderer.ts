import fs from 'fs';
import os from 'os';
import path from 'path';
import type { GraphicsProtocol } from '../config/settings.js';
import type { OhlcRow } from '../providers/types.js';
import { logger } from '../utils/logger.js';
import { describeError } from '../shared/errors.js';
import { renderBlockChart } from './blockChart.js';
import { buildImageRenderable } from './graphics.js';
import { PX_PER_COL, PX_PER_ROW, renderCandlestickPng, whiteSquarePng } from './pngChart.js';
import { textRenderable, type ChartRenderable, type RenderMode } from './types.js';

export const DEFAULT_RESERVED_ROWS = 28;
const DEFAULT_COLS = 80;
const DEFAULT_ROWS = 24;

export interface ChartRequest {
  mode: RenderMode;
  symbol: string;
  rows: OhlcRow[] | null;
  /** Chart area in character cells; 0 while the area has no size yet. */
  width: number;
  height: number;
  showImage: boolean;
}

export interface ChartRendererOptions {
  protocol: GraphicsProtocol;
  color?: boolean;
  tmpDir?: string;
}

/**
 * Turns the current chart request into something the screen can print.
 * PNG output goes to a private temp directory; kitty reads the picture from
 * there, so the newest file is kept until the next image or dispose().
 */
export class ChartRenderer {
  private dir: Promise<string> | null = null;
  private current: { file: string; seq: number } | null = null;
  private seq = 0;

  constructor(private readonly opts: ChartRendererOptions) {}

  /** An aborted signal stops the render before it writes anything and rejects. */
  async render(req: ChartRequest, signal?: AbortSignal): Promise<ChartRenderable> {
    signal?.throwIfAborted();
    if (req.mode === 'debug') return this.renderDebug(req);
    if (req.mode === 'block') {
      if (!req.rows) return textRenderable('Enter a stock ticker to see the chart.');
      return textRenderable(renderBlockChart(req.rows, {
        symbol: req.symbol,
        width: req.width || 100,
        height: req.height || DEFAULT_RESERVED_ROWS,
        color: this.opts.color,
      }));
    }
    if (!req.rows) return textRenderable('No data loaded. Enter a ticker first.');
    return this.renderImage(req, req.rows, signal);
  }

  private reservedHeight(req: ChartRequest) {
    return req.height > 0 ? req.height : DEFAULT_RESERVED_ROWS;
  }

  private async renderImage(req: ChartRequest, rows: OhlcRow[], signal?: AbortSignal): Promise<ChartRenderable> {
    const cols = req.width || DEFAULT_COLS;
    const lines = req.height || DEFAULT_ROWS;
    try {
      const png = renderCandlestickPng(rows, { width: cols * PX_PER_COL, height: lines * PX_PER_ROW });
      signal?.throwIfAborted();
      const file = await this.writeChart(png);
      return buildImageRenderable(this.opts.protocol, { file, png, cols, rows: lines }, {
        height: this.reservedHeight(req),
        caption: `GRAPHIC: ${req.symbol} (${cols}x${lines})`,
        showImage: req.showImage,
      });
    } catch (err) {
      if (signal?.aborted) throw err;
      logger.error({ err, symbol: req.symbol }, 'chart_image_failed');
      return textRenderable(`Error generating image: ${describeError(err)}`);
    }
  }

  private async renderDebug(req: ChartRequest): Promise<ChartRenderable> {
    const png = whiteSquarePng(100);
    const file = path.join(await this.tmpDir(), 'test-image.png');
    await fs.promises.writeFile(file, png);
    return buildImageRenderable(this.opts.protocol, { file, png }, {
      height: this.reservedHeight(req),
      caption: 'DEBUG: 100x100 WHITE SQUARE',
      showImage: req.showImage,
    });
  }

  private async tmpDir() {
    if (this.opts.tmpDir) {
      await fs.promises.mkdir(this.opts.tmpDir, { recursive: true });
      return this.opts.tmpDir;
    }
    // Concurrent renders share the one pending mkdtemp.
    if (!this.dir) this.dir = fs.promises.mkdtemp(path.join(os.tmpdir(), 'stock-terminal-'));
    return this.dir;
  }

  // Writes can finish out of order; only the newest file is installed.
  private async writeChart(png: Buffer) {
    const seq = ++this.seq;
    const file = path.join(await this.tmpDir(), `chart-${seq}.png`);
    await fs.promises.writeFile(file, png);
    const previous = this.current;
    if (previous && previous.seq > seq) {
      await fs.promises.rm(file, { force: true });
      return file;
    }
    this.current = { file, seq };
    if (previous) await fs.promises.rm(previous.file, { force: true });
    return file;
  }

  /** The file behind the most recent image, if any. */
  currentFile() { return this.current?.file ?? null; }

  async dispose() {
    const current = this.current;
    const dir = this.dir;
    this.current = null;
    this.dir = null;
    if (current) await fs.promises.rm(current.file, { force: true });
    if (dir) await fs.promises.rm(await dir, { recursive: true, force: true });
  }
}

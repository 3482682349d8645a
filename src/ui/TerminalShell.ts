import readline from 'readline';
import type { AppController, AppSnapshot } from '../app/AppController.js';
import { mapKey, type Action, type KeyPress } from '../app/keymap.js';
import { KITTY_CLEAR, renderableToString } from '../chart/graphics.js';
import type { ChartRenderable } from '../chart/types.js';
import { logger } from '../utils/logger.js';
import { chartArea, footer, sidebarLines, SIDEBAR_WIDTH, tickerBar, TITLE } from './layout.js';

const CSI = '\x1b[';
const ALT_SCREEN_ON = `${CSI}?1049h`;
const ALT_SCREEN_OFF = `${CSI}?1049l`;
const HIDE_CURSOR = `${CSI}?25l`;
const SHOW_CURSOR = `${CSI}?25h`;

function at(row: number, col: number) { return `${CSI}${row};${col}H`; }

/** Places a multi-line block so every line starts in the same column. */
function block(row: number, col: number, text: string) {
  return at(row, col) + text.replace(/\n/g, `\n${CSI}${col}G`);
}

/**
 * Full-screen front end: raw keypresses in, ANSI frames out. Redraws the
 * chart area only when the chart itself or the screen size changed.
 */
export class TerminalShell {
  private lastChart: ChartRenderable | null = null;
  private lastSize = '';
  private closed = false;
  private resolveClosed: () => void = () => undefined;

  constructor(
    private readonly app: AppController,
    private readonly input: NodeJS.ReadStream = process.stdin,
    private readonly output: NodeJS.WriteStream = process.stdout,
  ) {}

  async run(): Promise<void> {
    const done = new Promise<void>(resolve => { this.resolveClosed = resolve; });
    readline.emitKeypressEvents(this.input);
    if (this.input.isTTY) this.input.setRawMode(true);
    this.output.write(ALT_SCREEN_ON + HIDE_CURSOR);

    const unsubscribe = this.app.subscribe(s => this.draw(s));
    const onKey = (_str: string | undefined, key: KeyPress | undefined) => this.handleKey(key ?? {});
    const onResize = () => { this.guard(this.app.resize(this.chartSize()), 'resize'); };
    this.input.on('keypress', onKey);
    this.output.on('resize', onResize);

    await this.app.start();
    await this.app.resize(this.chartSize());
    this.draw(this.app.snapshot());

    await done;
    this.input.off('keypress', onKey);
    this.output.off('resize', onResize);
    unsubscribe();
    if (this.input.isTTY) this.input.setRawMode(false);
    this.input.pause();
    this.output.write(KITTY_CLEAR + SHOW_CURSOR + ALT_SCREEN_OFF);
  }

  close() {
    if (this.closed) return;
    this.closed = true;
    this.app.stop();
    this.resolveClosed();
  }

  private chartSize() {
    return chartArea(this.output.columns || 80, this.output.rows || 24);
  }

  private handleKey(key: KeyPress) {
    const s = this.app.snapshot();
    const action = mapKey(key, s.focus);
    if (action) this.dispatch(action, s);
  }

  private dispatch(action: Action, s: AppSnapshot) {
    const app = this.app;
    switch (action.type) {
      case 'quit': return this.close();
      case 'mode': return this.guard(app.setMode(action.mode), action.type);
      case 'toggleImage': return this.guard(app.toggleImageVisibility(), action.type);
      case 'toggleFocus': return app.toggleFocus();
      case 'focusInput': return app.setFocus('input');
      case 'toggleTab': return app.toggleTab();
      case 'inputChar': return app.setInput(s.input + action.char);
      case 'inputBackspace': return app.setInput(s.input.slice(0, -1));
      case 'inputClear': return app.setInput('');
      case 'submit': return this.guard(app.submitInput(), action.type);
      case 'navigate': return this.guard(app.navigateInput(action.direction), action.type);
      case 'select': return app.select(action.delta);
      case 'open': return this.guard(app.openSelected(), action.type);
      case 'delete': return this.guard(app.deleteSelected(), action.type);
      case 'move': return this.guard(app.moveSelected(action.direction), action.type);
      case 'pin': return this.guard(app.togglePinSelected(), action.type);
      case 'jump': return this.guard(app.jumpSelected(action.index), action.type);
    }
  }

  private guard(p: Promise<unknown>, action: string) {
    p.catch(err => {
      logger.error({ err, action }, 'action_failed');
      this.app.notify(`Action failed: ${err instanceof Error ? err.message : String(err)}`, 'error');
    });
  }

  private draw(s: AppSnapshot) {
    if (this.closed) return;
    const cols = this.output.columns || 80;
    const rows = this.output.rows || 24;
    const area = chartArea(cols, rows);
    let out = HIDE_CURSOR;
    out += at(1, 1) + `${CSI}7m` + TITLE.padEnd(cols).slice(0, cols) + `${CSI}0m`;
    out += at(2, 1) + tickerBar(s, cols);

    const side = sidebarLines(s, SIDEBAR_WIDTH, area.height);
    side.forEach((line, i) => { out += at(3 + i, 1) + line + '│'; });

    const sizeKey = `${cols}x${rows}`;
    if (s.chart !== this.lastChart || sizeKey !== this.lastSize) {
      const col = SIDEBAR_WIDTH + 2;
      for (let r = 0; r < area.height; r++) out += at(3 + r, col) + `${CSI}K`;
      out += block(3, col, renderableToString(s.chart));
      this.lastChart = s.chart;
      this.lastSize = sizeKey;
    }

    out += at(rows, 1) + `${CSI}7m` + footer(s, cols) + `${CSI}0m`;
    if (s.focus === 'input') out += at(2, 9 + s.input.length) + SHOW_CURSOR;
    this.output.write(out);
  }
}

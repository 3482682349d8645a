import type { RenderMode } from '../chart/types.js';
import type { Focus } from './AppController.js';

/** Same shape as the key object readline hands to 'keypress' listeners. */
export interface KeyPress {
  name?: string;
  sequence?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
}

export type Action =
  | { type: 'quit' }
  | { type: 'mode'; mode: RenderMode }
  | { type: 'toggleImage' }
  | { type: 'toggleFocus' }
  | { type: 'focusInput' }
  | { type: 'toggleTab' }
  | { type: 'inputChar'; char: string }
  | { type: 'inputBackspace' }
  | { type: 'inputClear' }
  | { type: 'submit' }
  | { type: 'navigate'; direction: 'up' | 'down' }
  | { type: 'select'; delta: number }
  | { type: 'open' }
  | { type: 'delete' }
  | { type: 'move'; direction: 'up' | 'down' }
  | { type: 'pin' }
  | { type: 'jump'; index: number };

const CTRL_BINDINGS: Record<string, Action> = {
  c: { type: 'quit' },
  b: { type: 'mode', mode: 'block' },
  g: { type: 'mode', mode: 'image' },
  t: { type: 'mode', mode: 'debug' },
  o: { type: 'toggleImage' },
};

function printable(key: KeyPress) {
  const s = key.sequence || '';
  return !key.ctrl && !key.meta && s.length === 1 && s >= ' ' && s !== '\x7f' ? s : null;
}

/** Translate one keypress into an action for the focused pane; null when unbound. */
export function mapKey(key: KeyPress, focus: Focus): Action | null {
  const name = key.name || '';
  if (key.ctrl && CTRL_BINDINGS[name]) return CTRL_BINDINGS[name];
  if (name === 'tab') return { type: 'toggleFocus' };

  if (focus === 'input') {
    if (name === 'return' || name === 'enter') return { type: 'submit' };
    if (name === 'up' || name === 'down') return { type: 'navigate', direction: name };
    if (name === 'backspace') return { type: 'inputBackspace' };
    if (name === 'escape') return { type: 'inputClear' };
    const ch = printable(key);
    return ch ? { type: 'inputChar', char: ch } : null;
  }

  if (name === 'escape') return { type: 'focusInput' };
  if (name === 'return' || name === 'enter') return { type: 'open' };
  if (name === 'up' || name === 'down') {
    if (key.shift) return { type: 'move', direction: name };
    return { type: 'select', delta: name === 'up' ? -1 : 1 };
  }
  if (name === 'delete') return { type: 'delete' };
  const ch = printable(key);
  switch (ch) {
    case 'd': return { type: 'delete' };
    case 'K': return { type: 'move', direction: 'up' };
    case 'J': return { type: 'move', direction: 'down' };
    case 'k': return { type: 'select', delta: -1 };
    case 'j': return { type: 'select', delta: 1 };
    case 'p': return { type: 'pin' };
    case 'i': return { type: 'toggleTab' };
    default:
      if (ch && ch >= '1' && ch <= '9') return { type: 'jump', index: Number(ch) - 1 };
      return null;
  }
}

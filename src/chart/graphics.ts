// Terminal graphics escape sequences for the kitty and iTerm2 image protocols.

import type { GraphicsProtocol } from '../config/settings.js';
import type { ChartRenderable, ImageRenderable } from './types.js';

const ESC = '\x1b';
const BEL = '\x07';

/** Deletes every image kitty has placed on screen. */
export const KITTY_CLEAR = `${ESC}_Ga=d,d=a,q=2${ESC}\\`;

function b64(s: string | Buffer) {
  return (typeof s === 'string' ? Buffer.from(s, 'utf8') : s).toString('base64');
}

/** Transmit-and-display a PNG the terminal reads from `file`, scaled to cols x rows cells. */
export function kittyDisplayCode(file: string, cols?: number, rows?: number) {
  return `${ESC}_Gf=100,a=T,t=f,i=1,q=2,c=${cols ?? ''},r=${rows ?? ''};${b64(file)}${ESC}\\`;
}

export function itermInlineCode(png: Buffer) {
  return `${ESC}]1337;File=inline=1;width=auto;height=auto:${b64(png)}${BEL}`;
}

export interface ImageSource {
  file: string;
  png: Buffer;
  cols?: number;
  rows?: number;
}

export function buildImageRenderable(
  protocol: GraphicsProtocol,
  source: ImageSource,
  opts: { height: number; caption?: string; showImage?: boolean }
): ImageRenderable {
  const caption = opts.caption || '';
  if (protocol === 'iterm') {
    return { kind: 'image', protocol, code: itermInlineCode(source.png), clearCode: '', caption, height: opts.height };
  }
  if (opts.showImage === false) {
    return { kind: 'image', protocol, code: '', clearCode: KITTY_CLEAR, caption: `${caption} (IMAGE HIDDEN)`, height: opts.height };
  }
  return {
    kind: 'image',
    protocol,
    code: kittyDisplayCode(source.file, source.cols, source.rows),
    clearCode: KITTY_CLEAR,
    caption,
    height: opts.height,
  };
}

/**
 * The escape codes take no cells; the caption takes the first row and blank
 * rows fill the rest so the block is exactly `height` rows tall.
 */
export function imageToString(img: ImageRenderable): string {
  let out = img.clearCode + img.code;
  let start = 0;
  if (img.caption) {
    out += ` ${img.caption}\n`;
    start = 1;
  }
  for (let i = start; i < img.height; i++) {
    out += i < img.height - 1 ? '\n' : ' ';
  }
  return out;
}

export function renderableToString(r: ChartRenderable): string {
  return r.kind === 'text' ? r.text : imageToString(r);
}

import type { GraphicsProtocol } from '../config/settings.js';

export type RenderMode = 'block' | 'image' | 'debug';

export const RENDER_MODES: readonly RenderMode[] = ['block', 'image', 'debug'];

export interface TextRenderable {
  kind: 'text';
  text: string;
}

/** Opaque image block: escape sequences plus the rows reserved for the picture. */
export interface ImageRenderable {
  kind: 'image';
  protocol: GraphicsProtocol;
  code: string;
  clearCode: string;
  caption: string;
  height: number;
}

export type ChartRenderable = TextRenderable | ImageRenderable;

export function textRenderable(text: string): TextRenderable {
  return { kind: 'text', text };
}

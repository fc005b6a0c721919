import type { Rect } from './rect.js';

/** RGB color with channels in [0, 1]. */
export interface Rgb {
  readonly r: number;
  readonly g: number;
  readonly b: number;
}

export interface Drawing {
  readonly rect: Rect;
  readonly stroke: Rgb | null;
  readonly fill: Rgb | null;
}

export type ContentBlockKind = 'text' | 'image';

export interface ContentBlock {
  readonly kind: ContentBlockKind;
  readonly rect: Rect;
}

export interface PageContent {
  readonly index: number;
  readonly drawings: Drawing[];
  readonly blocks: ContentBlock[];
}

import {
  expandRect,
  intersectRects,
  isEmptyRect,
  unionRects,
  type Drawing,
  type PageContent,
  type Rect,
  type Rgb,
} from './models/index.js';

/** A color whose every channel is above this counts as white ink. */
export const WHITE_CHANNEL_THRESHOLD = 0.95;

/** Outward pad so strokes lying on the content edge survive the crop. */
export const CONTENT_PADDING = 1;

export function isVisibleColor(color: Rgb | null): boolean {
  if (!color) return false;
  return ![color.r, color.g, color.b].every((channel) => channel > WHITE_CHANNEL_THRESHOLD);
}

export function isVisibleDrawing(drawing: Drawing): boolean {
  return isVisibleColor(drawing.stroke) || isVisibleColor(drawing.fill);
}

/**
 * Smallest rectangle covering the visible drawings and every text or image
 * block on the page, padded by {@link CONTENT_PADDING} and clipped to the media
 * box. A page with nothing visible keeps its full media box.
 */
export function detectVisibleRegion(content: PageContent, mediaBox: Rect): Rect {
  const candidates: Rect[] = [
    ...content.drawings.filter(isVisibleDrawing).map((drawing) => drawing.rect),
    ...content.blocks.map((block) => block.rect),
  ];

  if (candidates.length === 0) {
    return mediaBox;
  }

  const union = candidates.reduce(unionRects);
  const clipped = intersectRects(expandRect(union, CONTENT_PADDING), mediaBox);

  // Content drawn entirely off the page leaves nothing to crop to
  if (!clipped || isEmptyRect(clipped)) {
    return mediaBox;
  }
  return clipped;
}

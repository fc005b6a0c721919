export type { Box, Rect } from './rect.js';
export {
  expandRect,
  intersectRects,
  isEmptyRect,
  makeRect,
  rectFromBox,
  rectFromPoints,
  rectHeight,
  rectToBox,
  rectWidth,
  unionRects,
} from './rect.js';
export type { ContentBlock, ContentBlockKind, Drawing, PageContent, Rgb } from './page-content.js';
export type { PageSize } from './page-size.js';
export { innerSize, isPositiveSize, POINTS_PER_INCH } from './page-size.js';

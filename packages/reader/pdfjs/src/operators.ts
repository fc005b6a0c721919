import { OPS } from 'pdfjs-dist/legacy/build/pdf.mjs';

export { OPS };

/** Coordinates consumed by each path segment inside a constructPath op. */
export const PATH_ARITY: ReadonlyMap<number, number> = new Map([
  [OPS.moveTo, 2],
  [OPS.lineTo, 2],
  [OPS.curveTo, 6],
  [OPS.curveTo2, 4],
  [OPS.curveTo3, 4],
  [OPS.closePath, 0],
  [OPS.rectangle, 4],
]);

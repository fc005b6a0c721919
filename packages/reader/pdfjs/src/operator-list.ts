import { rectFromPoints, type ContentBlock, type Drawing, type Rect, type Rgb } from '@trimfit/core';
import { OPS, PATH_ARITY } from './operators.js';

export interface PdfOperatorList {
  readonly fnArray: readonly number[];
  readonly argsArray: readonly unknown[];
}

/** 6-element affine transform [a, b, c, d, e, f] */
type Matrix = readonly [number, number, number, number, number, number];
type Point = readonly [number, number];

interface GraphicsState {
  ctm: Matrix;
  fill: Rgb;
  stroke: Rgb;
}

export interface PageGraphics {
  readonly drawings: Drawing[];
  readonly images: ContentBlock[];
}

const IDENTITY: Matrix = [1, 0, 0, 1, 0, 0];
const BLACK: Rgb = { r: 0, g: 0, b: 0 };
const UNIT_SQUARE: readonly Point[] = [
  [0, 0],
  [1, 0],
  [0, 1],
  [1, 1],
];

/**
 * Walk a pdfjs operator list and report every painted path with the colors it
 * was painted in, plus the placement of every image.
 *
 * Coordinates stay in PDF user space, the same space as the page's media box.
 * Path extents are taken from the path points and curve control points, which
 * can only over-cover a curve.
 */
export function interpretOperatorList(opList: PdfOperatorList): PageGraphics {
  const drawings: Drawing[] = [];
  const images: ContentBlock[] = [];

  let state: GraphicsState = { ctm: IDENTITY, fill: BLACK, stroke: BLACK };
  const stack: GraphicsState[] = [];
  let path: Point[] = [];

  const paint = (fill: boolean, stroke: boolean): void => {
    const rect = rectFromPoints(path.map((point) => applyTransform(point, state.ctm)));
    if (rect) {
      drawings.push({
        rect,
        fill: fill ? state.fill : null,
        stroke: stroke ? state.stroke : null,
      });
    }
    path = [];
  };

  for (let i = 0; i < opList.fnArray.length; i++) {
    const fn = opList.fnArray[i];
    const args = opList.argsArray[i];

    switch (fn) {
      case OPS.save:
        stack.push({ ...state });
        break;
      case OPS.restore:
        state = stack.pop() ?? state;
        break;
      case OPS.transform: {
        const matrix = toMatrix(args);
        if (matrix) state.ctm = concat(matrix, state.ctm);
        break;
      }
      case OPS.paintFormXObjectBegin: {
        stack.push({ ...state });
        const matrix = toMatrix(argAt(args, 0));
        if (matrix) state.ctm = concat(matrix, state.ctm);
        break;
      }
      case OPS.paintFormXObjectEnd:
        state = stack.pop() ?? state;
        break;

      case OPS.setFillRGBColor:
      case OPS.setFillGray:
      case OPS.setFillCMYKColor:
        state.fill = toRgb(args) ?? BLACK;
        break;
      case OPS.setStrokeRGBColor:
      case OPS.setStrokeGray:
      case OPS.setStrokeCMYKColor:
        state.stroke = toRgb(args) ?? BLACK;
        break;
      // Pattern and shading colors have no single value; they count as ink
      case OPS.setFillColorN:
        state.fill = toRgb(args) ?? BLACK;
        break;
      case OPS.setStrokeColorN:
        state.stroke = toRgb(args) ?? BLACK;
        break;

      case OPS.constructPath:
        path.push(...pathPoints(toNumbers(argAt(args, 0)), toNumbers(argAt(args, 1))));
        break;
      case OPS.moveTo:
      case OPS.lineTo:
      case OPS.curveTo:
      case OPS.curveTo2:
      case OPS.curveTo3:
      case OPS.closePath:
      case OPS.rectangle:
        path.push(...pathPoints([fn], toNumbers(args)));
        break;

      case OPS.stroke:
      case OPS.closeStroke:
        paint(false, true);
        break;
      case OPS.fill:
      case OPS.eoFill:
        paint(true, false);
        break;
      case OPS.fillStroke:
      case OPS.eoFillStroke:
      case OPS.closeFillStroke:
      case OPS.closeEOFillStroke:
        paint(true, true);
        break;
      case OPS.endPath:
        path = [];
        break;

      case OPS.paintImageXObject:
      case OPS.paintInlineImageXObject:
      case OPS.paintImageXObjectRepeat: {
        const rect = unitSquareRect(state.ctm);
        if (rect) images.push({ kind: 'image', rect });
        break;
      }
      // Stencil masks are painted in the current fill color
      case OPS.paintImageMaskXObject:
      case OPS.paintImageMaskXObjectRepeat:
      case OPS.paintSolidColorImageMask: {
        const rect = unitSquareRect(state.ctm);
        if (rect) drawings.push({ rect, fill: state.fill, stroke: null });
        break;
      }
    }
  }

  return { drawings, images };
}

/** Row-vector product: `first` applied before `second`. */
export function concat(first: Matrix, second: Matrix): Matrix {
  const [a1, b1, c1, d1, e1, f1] = first;
  const [a2, b2, c2, d2, e2, f2] = second;
  return [
    a1 * a2 + b1 * c2,
    a1 * b2 + b1 * d2,
    c1 * a2 + d1 * c2,
    c1 * b2 + d1 * d2,
    e1 * a2 + f1 * c2 + e2,
    e1 * b2 + f1 * d2 + f2,
  ];
}

function applyTransform([x, y]: Point, m: Matrix): Point {
  return [x * m[0] + y * m[2] + m[4], x * m[1] + y * m[3] + m[5]];
}

function unitSquareRect(ctm: Matrix): Rect | null {
  return rectFromPoints(UNIT_SQUARE.map((corner) => applyTransform(corner, ctm)));
}

function pathPoints(ops: readonly number[], coords: readonly number[]): Point[] {
  const points: Point[] = [];
  let offset = 0;

  for (const op of ops) {
    const arity = PATH_ARITY.get(op);
    if (arity === undefined) continue;

    const values = coords.slice(offset, offset + arity);
    offset += arity;
    if (values.length < arity) break;

    if (op === OPS.rectangle) {
      const [x, y, width, height] = values;
      points.push([x, y], [x + width, y], [x, y + height], [x + width, y + height]);
      continue;
    }
    for (let i = 0; i + 1 < values.length; i += 2) {
      points.push([values[i], values[i + 1]]);
    }
  }

  return points;
}

function argAt(args: unknown, index: number): unknown {
  return Array.isArray(args) ? args[index] : undefined;
}

function toNumbers(value: unknown): number[] {
  if (
    value instanceof Float32Array ||
    value instanceof Float64Array ||
    value instanceof Uint8ClampedArray ||
    value instanceof Uint8Array
  ) {
    return Array.from(value);
  }
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is number => typeof item === 'number');
}

function toMatrix(value: unknown): Matrix | null {
  const n = toNumbers(value);
  if (n.length < 6 || !n.slice(0, 6).every(Number.isFinite)) return null;
  return [n[0], n[1], n[2], n[3], n[4], n[5]];
}

/**
 * pdfjs converts every color space to device RGB before it reaches the
 * operator list: either a `#rrggbb` string or three 0-255 channel values.
 */
export function toRgb(args: unknown): Rgb | null {
  const first = argAt(args, 0);
  if (typeof first === 'string') {
    return parseHexColor(first);
  }

  const channels = toNumbers(first).length >= 3 ? toNumbers(first) : toNumbers(args);
  if (channels.length < 3) return null;

  const [r, g, b] = channels.map((channel) => clamp(channel / 255));
  return { r, g, b };
}

function parseHexColor(value: string): Rgb | null {
  const match = /^#?([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(value.trim());
  if (!match) return null;

  const [r, g, b] = match.slice(1, 4).map((hex) => Number.parseInt(hex, 16) / 255);
  return { r, g, b };
}

function clamp(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

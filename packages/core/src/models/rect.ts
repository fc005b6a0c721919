/** Axis-aligned rectangle in PDF user space (points, y grows upward). */
export interface Rect {
  readonly x0: number;
  readonly y0: number;
  readonly x1: number;
  readonly y1: number;
}

/** Origin-and-extent box, the shape pdf-lib uses for page boxes. */
export interface Box {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

export function makeRect(x0: number, y0: number, x1: number, y1: number): Rect {
  return {
    x0: Math.min(x0, x1),
    y0: Math.min(y0, y1),
    x1: Math.max(x0, x1),
    y1: Math.max(y0, y1),
  };
}

export function rectFromBox(box: Box): Rect {
  return makeRect(box.x, box.y, box.x + box.width, box.y + box.height);
}

export function rectToBox(rect: Rect): Box {
  return {
    x: rect.x0,
    y: rect.y0,
    width: rect.x1 - rect.x0,
    height: rect.y1 - rect.y0,
  };
}

export function rectFromPoints(points: readonly (readonly [number, number])[]): Rect | null {
  if (points.length === 0) return null;

  let x0 = Infinity;
  let y0 = Infinity;
  let x1 = -Infinity;
  let y1 = -Infinity;
  for (const [x, y] of points) {
    if (!Number.isFinite(x) || !Number.isFinite(y)) continue;
    x0 = Math.min(x0, x);
    y0 = Math.min(y0, y);
    x1 = Math.max(x1, x);
    y1 = Math.max(y1, y);
  }

  return x0 <= x1 && y0 <= y1 ? { x0, y0, x1, y1 } : null;
}

export function rectWidth(rect: Rect): number {
  return rect.x1 - rect.x0;
}

export function rectHeight(rect: Rect): number {
  return rect.y1 - rect.y0;
}

export function isEmptyRect(rect: Rect): boolean {
  return rectWidth(rect) <= 0 || rectHeight(rect) <= 0;
}

export function unionRects(a: Rect, b: Rect): Rect {
  return {
    x0: Math.min(a.x0, b.x0),
    y0: Math.min(a.y0, b.y0),
    x1: Math.max(a.x1, b.x1),
    y1: Math.max(a.y1, b.y1),
  };
}

/** Overlap of two rectangles, or null when they are disjoint. */
export function intersectRects(a: Rect, b: Rect): Rect | null {
  const x0 = Math.max(a.x0, b.x0);
  const y0 = Math.max(a.y0, b.y0);
  const x1 = Math.min(a.x1, b.x1);
  const y1 = Math.min(a.y1, b.y1);
  if (x0 > x1 || y0 > y1) return null;
  return { x0, y0, x1, y1 };
}

export function expandRect(rect: Rect, amount: number): Rect {
  return {
    x0: rect.x0 - amount,
    y0: rect.y0 - amount,
    x1: rect.x1 + amount,
    y1: rect.y1 + amount,
  };
}

import * as path from 'node:path';
import { InvalidSizeError, MarginTooLargeError } from './exceptions.js';
import type { Logger } from './logger.js';
import { innerSize, isPositiveSize, type PageSize } from './models/index.js';
import type { LayoutToolPort } from './ports/layout-tool.js';

/**
 * Checks that `size` is a real page and that `margin` leaves room for content.
 * Returns the inner canvas.
 */
export function validateCanvas(size: PageSize, margin: number): PageSize {
  if (!isPositiveSize(size)) {
    throw new InvalidSizeError(
      `Invalid size ${size.width}x${size.height}. Width and height must be positive`,
    );
  }
  if (!Number.isFinite(margin) || margin < 0) {
    throw new InvalidSizeError(`Invalid margin ${margin}. Margin must be zero or more inches`);
  }

  const inner = innerSize(size, margin);
  if (inner.width <= 0 || inner.height <= 0) {
    throw new MarginTooLargeError(margin, size.width, size.height);
  }
  return inner;
}

/**
 * Two-step page fit: scale the page into the inner canvas, then pad it onto the
 * outer canvas without scaling, which leaves at least `margin` on every side.
 */
export class Fitter {
  readonly inner: PageSize;

  constructor(
    private readonly tool: LayoutToolPort,
    readonly outer: PageSize,
    readonly margin: number,
    private readonly log: Logger,
  ) {
    this.inner = validateCanvas(outer, margin);
  }

  /** Returns the path of the padded single-page PDF written into `workDir`. */
  async fitPage(pagePath: string, workDir: string, pageIndex: number): Promise<string> {
    const scaledPath = path.join(workDir, `p${pageIndex}_fit.pdf`);
    const paddedPath = path.join(workDir, `p${pageIndex}_pad.pdf`);

    await this.tool.scaleToFit(pagePath, scaledPath, this.inner);
    await this.tool.padTo(scaledPath, paddedPath, this.outer);

    this.log.info(
      `Page ${pageIndex + 1}: scaled to ${this.inner.width}x${this.inner.height}in, padded to ${this.outer.width}x${this.outer.height}in`,
    );
    return paddedPath;
  }
}

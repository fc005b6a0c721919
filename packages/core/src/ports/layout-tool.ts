import type { PageSize } from '../models/index.js';

export interface LayoutToolPort {
  readonly name: string;
  /** Throws MissingToolError when the tool cannot be run */
  ensureAvailable(): Promise<void>;
  /** Rescale the page proportionally so it fills `size` */
  scaleToFit(inputPath: string, outputPath: string, size: PageSize): Promise<void>;
  /** Center the page on a `size` canvas without rescaling it */
  padTo(inputPath: string, outputPath: string, size: PageSize): Promise<void>;
}

export const POINTS_PER_INCH = 72;

/** Physical page size in inches. */
export interface PageSize {
  readonly width: number;
  readonly height: number;
}

export function isPositiveSize(size: PageSize): boolean {
  return (
    Number.isFinite(size.width) && Number.isFinite(size.height) && size.width > 0 && size.height > 0
  );
}

/** Size left for content once `margin` is taken from every side. */
export function innerSize(size: PageSize, margin: number): PageSize {
  return {
    width: size.width - 2 * margin,
    height: size.height - 2 * margin,
  };
}

import { ConflictingOptionsError, InvalidSizeError, UnknownPaperSizeError } from './exceptions.js';
import { POINTS_PER_INCH, type PageSize } from './models/index.js';
import { getPaperSizes } from './paper-sizes.js';

export interface OrientationFlags {
  readonly landscape?: boolean;
  readonly portrait?: boolean;
}

const PAPER_ALIASES: Readonly<Record<string, string>> = {
  tabloid: 'ledger',
};

/**
 * Resolve a size string to inches.
 *
 * Accepts a paper name (`letter`, `A4`, `tabloid`) or explicit `WIDTHxHEIGHT`
 * inches (`8.5x11`). Registry names are tried first, so names that contain an
 * `x` (`executive`, `card-4x6`) still resolve as paper.
 */
export function resolvePageSize(size: string, flags: OrientationFlags = {}): PageSize {
  if (flags.landscape && flags.portrait) {
    throw new ConflictingOptionsError('--landscape and --portrait cannot be used together');
  }

  const low = size.trim().toLowerCase();
  const name = PAPER_ALIASES[low] ?? low;
  const paper = getPaperSizes().get(name);

  if (paper) {
    return orient(paper, flags);
  }

  if (low.includes('x')) {
    const explicit = parseDimensions(size, low);
    if (flags.landscape || flags.portrait) {
      throw new ConflictingOptionsError(
        '--landscape/--portrait cannot be used with explicit WxH dimensions',
      );
    }
    return explicit;
  }

  throw new UnknownPaperSizeError(
    size,
    `Unknown paper size '${size}'. Use WIDTHxHEIGHT or a paper name (e.g., 'letter', 'a4')`,
  );
}

function parseDimensions(original: string, low: string): PageSize {
  const parts = low.split('x');
  const [width, height] = parts.map(parseDecimal);

  if (parts.length !== 2 || width === null || height === null) {
    throw new InvalidSizeError(
      `Invalid size '${original}'. Expected WIDTHxHEIGHT (e.g., '8.5x11') or a paper name (e.g., 'letter')`,
    );
  }
  if (width <= 0 || height <= 0) {
    throw new InvalidSizeError(`Invalid size '${original}'. Width and height must be positive`);
  }

  return { width, height };
}

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Reads a plain decimal number such as `8.5`, `.25` or `1e1`. Hex, octal and
 * binary literals are rejected, unlike `Number()`.
 */
export function parseDecimal(value: string): number | null {
  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

function orient(points: readonly [number, number], flags: OrientationFlags): PageSize {
  const short = Math.min(points[0], points[1]);
  const long = Math.max(points[0], points[1]);

  let [width, height] = points;
  if (flags.landscape) {
    [width, height] = [long, short];
  } else if (flags.portrait) {
    [width, height] = [short, long];
  }

  return { width: width / POINTS_PER_INCH, height: height / POINTS_PER_INCH };
}

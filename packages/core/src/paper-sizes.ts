import { readFileSync } from 'node:fs';

/** Portrait dimensions in points, keyed by lower-case paper name. */
export type PaperSizeRegistry = ReadonlyMap<string, readonly [number, number]>;

const PAPER_SIZES_URL = new URL('./paper-sizes.json', import.meta.url);

let registry: PaperSizeRegistry | null = null;

export function getPaperSizes(): PaperSizeRegistry {
  if (!registry) {
    registry = parseRegistry(JSON.parse(readFileSync(PAPER_SIZES_URL, 'utf8')));
  }
  return registry;
}

export function listPaperSizes(): string[] {
  return [...getPaperSizes().keys()];
}

function parseRegistry(raw: unknown): PaperSizeRegistry {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error('paper-sizes.json must contain an object');
  }

  const sizes = new Map<string, readonly [number, number]>();
  for (const [name, value] of Object.entries(raw)) {
    if (!isDimensionPair(value)) {
      throw new Error(`paper-sizes.json: invalid entry for "${name}"`);
    }
    sizes.set(name.toLowerCase(), [value[0], value[1]]);
  }
  return sizes;
}

function isDimensionPair(value: unknown): value is [number, number] {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    value.every((n) => typeof n === 'number' && Number.isFinite(n) && n > 0)
  );
}

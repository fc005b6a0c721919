export type TrimfitMode = 'trim' | 'fit' | 'trimfit';

export interface TrimfitConfig {
  readonly mode: TrimfitMode;
  /** Paper name or `WIDTHxHEIGHT` in inches */
  readonly size: string;
  readonly landscape: boolean;
  readonly portrait: boolean;
  /** Minimum margin in inches on every side */
  readonly margin: number;
  readonly tempPrefix: string;
  readonly layoutTool: string;
  readonly verbose: boolean;
}

export const DEFAULT_SIZE = 'letter';
export const DEFAULT_MARGIN = 0.5;
export const DEFAULT_OUTPUT = 'output.pdf';

export const DEFAULT_CONFIG: TrimfitConfig = {
  mode: 'trimfit',
  size: DEFAULT_SIZE,
  landscape: false,
  portrait: false,
  margin: DEFAULT_MARGIN,
  tempPrefix: 'pdf-trimfit-',
  layoutTool: 'pdfjam',
  verbose: false,
};

export function resolveConfig(overrides: Partial<TrimfitConfig> = {}): TrimfitConfig {
  return {
    mode: overrides.mode ?? DEFAULT_CONFIG.mode,
    size: overrides.size ?? DEFAULT_CONFIG.size,
    landscape: overrides.landscape ?? DEFAULT_CONFIG.landscape,
    portrait: overrides.portrait ?? DEFAULT_CONFIG.portrait,
    margin: overrides.margin ?? DEFAULT_CONFIG.margin,
    tempPrefix: overrides.tempPrefix ?? DEFAULT_CONFIG.tempPrefix,
    layoutTool: overrides.layoutTool ?? DEFAULT_CONFIG.layoutTool,
    verbose: overrides.verbose ?? DEFAULT_CONFIG.verbose,
  };
}

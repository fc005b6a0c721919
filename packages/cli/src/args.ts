import { parseArgs } from 'node:util';
import type { TrimfitConfig, TrimfitMode } from '@trimfit/core';
import { DEFAULT_OUTPUT, UsageError, parseDecimal } from '@trimfit/core';

export interface CliArgs {
  readonly help: boolean;
  readonly version: boolean;
  readonly input: string | null;
  readonly output: string;
  readonly config: Partial<TrimfitConfig>;
}

const OPTIONS = {
  trim: { type: 'boolean' },
  fit: { type: 'boolean' },
  size: { type: 'string' },
  landscape: { type: 'boolean' },
  portrait: { type: 'boolean' },
  margin: { type: 'string' },
  verbose: { type: 'boolean', short: 'v' },
  help: { type: 'boolean', short: 'h' },
  version: { type: 'boolean' },
} as const;

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const { values, positionals } = parseArgv(argv);
  const help = values.help ?? false;
  const version = values.version ?? false;

  if (help || version) {
    return { help, version, input: null, output: DEFAULT_OUTPUT, config: {} };
  }

  if (positionals.length === 0) {
    throw new UsageError('the following arguments are required: input');
  }
  if (positionals.length > 2) {
    throw new UsageError(`unrecognized arguments: ${positionals.slice(2).join(' ')}`);
  }
  if (values.trim && values.fit) {
    throw new UsageError('argument --fit: not allowed with argument --trim');
  }
  if (values.landscape && values.portrait) {
    throw new UsageError('argument --portrait: not allowed with argument --landscape');
  }

  const [input, output = DEFAULT_OUTPUT] = positionals;

  return {
    help,
    version,
    input,
    output,
    config: {
      mode: selectMode(values.trim, values.fit),
      size: values.size,
      landscape: values.landscape,
      portrait: values.portrait,
      margin: values.margin === undefined ? undefined : parseMargin(values.margin),
      verbose: values.verbose,
    },
  };
}

function parseArgv(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: OPTIONS, allowPositionals: true, strict: true });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

function selectMode(trim: boolean | undefined, fit: boolean | undefined): TrimfitMode {
  if (trim) return 'trim';
  if (fit) return 'fit';
  return 'trimfit';
}

function parseMargin(value: string): number {
  const margin = parseDecimal(value);
  if (margin === null) {
    throw new UsageError(`argument --margin: invalid float value: '${value}'`);
  }
  if (margin < 0) {
    throw new UsageError(`argument --margin: must be zero or more inches, got ${value}`);
  }
  return margin;
}

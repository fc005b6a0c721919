import type { NormalizeRequest, NormalizeResult, TrimfitConfig } from '@trimfit/core';
import {
  createLogger,
  resolveConfig,
  resolvePageSize,
  TrimfitError,
  TrimfitService,
  UsageError,
} from '@trimfit/core';
import { PdfLibEditor } from '@trimfit/editor-pdf-lib';
import { ChildProcessRunner, PdfjamLayoutTool } from '@trimfit/layout-pdfjam';
import { PdfjsContentReader } from '@trimfit/reader-pdfjs';
import { parseCliArgs } from './args.js';
import { usage, VERSION } from './help.js';
import { NodeFileSystem } from './node-file-system.js';

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface Normalizer {
  normalize(request: NormalizeRequest): Promise<NormalizeResult>;
}

export type CreateNormalizer = (config: TrimfitConfig) => Normalizer;

const consoleIO: CliIO = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

/**
 * Runs one invocation and returns the process exit code: 0 on success, 1 for
 * any handled failure. Unexpected errors propagate to the caller.
 */
export async function run(
  argv: readonly string[],
  io: CliIO = consoleIO,
  createNormalizer: CreateNormalizer = createTrimfitService,
): Promise<number> {
  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      io.stdout(usage());
      return 0;
    }
    if (args.version) {
      io.stdout(VERSION);
      return 0;
    }
    if (!args.input) {
      throw new UsageError('the following arguments are required: input');
    }

    const config = resolveConfig(args.config);
    const request = buildRequest(args.input, args.output, config);
    const result = await createNormalizer(config).normalize(request);

    createLogger('Cli', config).info(
      `${result.mode}: ${result.pageCount} pages written to ${result.outputPath}`,
    );
    return 0;
  } catch (error) {
    if (!(error instanceof TrimfitError)) {
      throw error;
    }
    io.stderr(error.message);
    if (error instanceof UsageError) {
      io.stderr('Run trimfit --help for usage.');
    }
    return 1;
  }
}

/** Size and orientation are resolved here, before any file is touched, and only when fitting. */
export function buildRequest(
  inputPath: string,
  outputPath: string,
  config: TrimfitConfig,
): NormalizeRequest {
  if (config.mode === 'trim') {
    return { mode: 'trim', inputPath, outputPath };
  }

  return {
    mode: config.mode,
    inputPath,
    outputPath,
    size: resolvePageSize(config.size, config),
    margin: config.margin,
  };
}

export function createTrimfitService(config: TrimfitConfig): TrimfitService {
  return new TrimfitService(
    {
      reader: new PdfjsContentReader(),
      editor: new PdfLibEditor(),
      layoutTool: new PdfjamLayoutTool(new ChildProcessRunner(), {
        command: config.layoutTool,
        verbose: config.verbose,
      }),
      fileSystem: new NodeFileSystem(),
    },
    { tempPrefix: config.tempPrefix, verbose: config.verbose },
  );
}

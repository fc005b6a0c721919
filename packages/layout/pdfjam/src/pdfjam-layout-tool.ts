import type { CommandRunnerPort, LayoutToolPort, Logger, PageSize } from '@trimfit/core';
import { createLogger, ExternalToolError, MissingToolError } from '@trimfit/core';
import { locateExecutable, type LocateExecutableFn } from './locate-executable.js';

export const PDFJAM_INSTALL_HINT =
  'On Ubuntu/WSL you can install dependencies with:\n' +
  '  sudo apt update && sudo apt install -y texlive-extra-utils\n';

export interface PdfjamOptions {
  /** Executable name looked up on PATH */
  readonly command?: string;
  readonly locate?: LocateExecutableFn;
  readonly verbose?: boolean;
}

export class PdfjamLayoutTool implements LayoutToolPort {
  readonly name: string;
  private readonly locate: LocateExecutableFn;
  private readonly log: Logger;

  constructor(
    private readonly runner: CommandRunnerPort,
    options: PdfjamOptions = {},
  ) {
    this.name = options.command ?? 'pdfjam';
    this.locate = options.locate ?? ((name) => locateExecutable(name));
    this.log = createLogger('Tool', { verbose: options.verbose });
  }

  async ensureAvailable(): Promise<void> {
    const location = await this.locate(this.name);
    if (!location) {
      throw new MissingToolError(this.name, PDFJAM_INSTALL_HINT);
    }
    this.log.info(`Using ${this.name} at ${location}`);
  }

  scaleToFit(inputPath: string, outputPath: string, size: PageSize): Promise<void> {
    return this.exec([
      '--quiet',
      '--papersize',
      formatPaperSize(size),
      inputPath,
      '--outfile',
      outputPath,
    ]);
  }

  padTo(inputPath: string, outputPath: string, size: PageSize): Promise<void> {
    return this.exec([
      '--quiet',
      '--papersize',
      formatPaperSize(size),
      '--noautoscale',
      'true',
      inputPath,
      '--outfile',
      outputPath,
    ]);
  }

  private async exec(args: string[]): Promise<void> {
    this.log.info(`${this.name} ${args.join(' ')}`);
    const result = await this.runner.run(this.name, args);

    if (result.exitCode !== 0 || result.signal) {
      throw new ExternalToolError({
        command: this.name,
        args,
        exitCode: result.exitCode,
        signal: result.signal,
        stdout: result.stdout,
        stderr: result.stderr,
      });
    }
  }
}

/** pdfjam `--papersize` value, e.g. `{7.5in,10in}`. */
export function formatPaperSize(size: PageSize): string {
  return `{${formatInches(size.width)},${formatInches(size.height)}}`;
}

function formatInches(value: number): string {
  return `${Number(value.toFixed(4))}in`;
}

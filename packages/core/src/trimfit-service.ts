import * as path from 'node:path';
import { Cropper } from './cropper.js';
import { FileNotFoundError, InvalidInputError } from './exceptions.js';
import { Fitter } from './fitter.js';
import { createLogger, type Logger } from './logger.js';
import type { PageSize } from './models/index.js';
import type { PageContentReaderPort } from './ports/content-reader.js';
import type { FileSystemPort } from './ports/file-system.js';
import type { LayoutToolPort } from './ports/layout-tool.js';
import type { PdfEditorPort } from './ports/pdf-editor.js';
import type { TrimfitMode } from './config.js';

export interface TrimfitServiceDeps {
  readonly reader: PageContentReaderPort;
  readonly editor: PdfEditorPort;
  readonly layoutTool: LayoutToolPort;
  readonly fileSystem: FileSystemPort;
}

export interface TrimfitServiceOptions {
  readonly tempPrefix: string;
  readonly verbose?: boolean;
}

interface RequestPaths {
  readonly inputPath: string;
  readonly outputPath: string;
}

export interface TrimRequest extends RequestPaths {
  readonly mode: 'trim';
}

export interface FitRequest extends RequestPaths {
  readonly mode: 'fit' | 'trimfit';
  readonly size: PageSize;
  readonly margin: number;
}

export type NormalizeRequest = TrimRequest | FitRequest;

export interface NormalizeResult {
  readonly mode: TrimfitMode;
  readonly inputPath: string;
  readonly outputPath: string;
  readonly pageCount: number;
}

const PDF_EXTENSION = '.pdf';

export class TrimfitService {
  private readonly log: Logger;
  private readonly cropper: Cropper;

  constructor(
    private readonly deps: TrimfitServiceDeps,
    private readonly options: TrimfitServiceOptions,
  ) {
    this.log = createLogger('Pipeline', { verbose: options.verbose });
    this.cropper = new Cropper(
      deps.reader,
      deps.editor,
      deps.fileSystem,
      createLogger('Crop', options),
    );
  }

  async normalize(request: NormalizeRequest): Promise<NormalizeResult> {
    const inputPath = path.resolve(request.inputPath);
    const outputPath = path.resolve(request.outputPath);

    if (request.mode === 'trim') {
      await this.validateInput(inputPath);
      await this.prepareOutputDir(outputPath);
      return this.trim(inputPath, outputPath);
    }

    // The constructor validates size and margin, before any file is touched
    const fitter = new Fitter(
      this.deps.layoutTool,
      request.size,
      request.margin,
      createLogger('Fit', this.options),
    );
    await this.validateInput(inputPath);
    await this.prepareOutputDir(outputPath);
    await this.deps.layoutTool.ensureAvailable();

    return this.fit(request.mode, inputPath, outputPath, fitter);
  }

  private async validateInput(inputPath: string): Promise<void> {
    if (!(await this.deps.fileSystem.exists(inputPath))) {
      throw new FileNotFoundError(inputPath, `Input PDF not found: ${inputPath}`);
    }
    if (path.extname(inputPath).toLowerCase() !== PDF_EXTENSION) {
      throw new InvalidInputError(inputPath);
    }
  }

  private async prepareOutputDir(outputPath: string): Promise<void> {
    const dir = path.dirname(outputPath);
    try {
      await this.deps.fileSystem.mkdir(dir);
    } catch (error) {
      throw new FileNotFoundError(dir, `Cannot create output directory: ${dir}`, error);
    }
  }

  private async trim(inputPath: string, outputPath: string): Promise<NormalizeResult> {
    const cropped = await this.cropper.cropFile(inputPath, outputPath);

    this.log.info(`Trimmed ${cropped.cropBoxes.length} pages: ${outputPath}`);
    return { mode: 'trim', inputPath, outputPath, pageCount: cropped.cropBoxes.length };
  }

  private async fit(
    mode: 'fit' | 'trimfit',
    inputPath: string,
    outputPath: string,
    fitter: Fitter,
  ): Promise<NormalizeResult> {
    const workDir = await this.deps.fileSystem.makeTempDir(this.options.tempPrefix);
    this.log.info(`Scratch directory: ${workDir}`);

    try {
      const source = await this.loadSource(mode, inputPath, workDir);
      const pageCount = await this.fitPages(source, outputPath, workDir, fitter);

      this.log.info(`Wrote ${pageCount} pages: ${outputPath}`);
      return { mode, inputPath, outputPath, pageCount };
    } finally {
      await this.deps.fileSystem.remove(workDir).catch((error: unknown) => {
        this.log.error(`Could not remove scratch directory ${workDir}`, error);
      });
    }
  }

  private async loadSource(
    mode: 'fit' | 'trimfit',
    inputPath: string,
    workDir: string,
  ): Promise<Uint8Array> {
    if (mode === 'fit') {
      return this.deps.fileSystem.readFile(inputPath);
    }

    const cropped = await this.cropper.cropFile(inputPath, path.join(workDir, 'cropped.pdf'));
    return cropped.data;
  }

  private async fitPages(
    sourceData: Uint8Array,
    outputPath: string,
    workDir: string,
    fitter: Fitter,
  ): Promise<number> {
    const source = await this.deps.editor.load(sourceData);
    const result = await this.deps.editor.create();

    for (let pageIndex = 0; pageIndex < source.pageCount; pageIndex++) {
      const pagePath = path.join(workDir, `p${pageIndex}.pdf`);
      await this.deps.fileSystem.writeFile(pagePath, await source.extractPage(pageIndex));

      const paddedPath = await fitter.fitPage(pagePath, workDir, pageIndex);
      await result.appendDocument(await this.deps.fileSystem.readFile(paddedPath));
    }

    await this.deps.fileSystem.writeFile(outputPath, await result.save());
    return result.pageCount;
  }
}

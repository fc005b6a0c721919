import { PdfIoError } from './exceptions.js';
import type { Logger } from './logger.js';
import type { Rect } from './models/index.js';
import type { PageContentReaderPort } from './ports/content-reader.js';
import type { FileSystemPort } from './ports/file-system.js';
import type { PdfEditorPort } from './ports/pdf-editor.js';
import { detectVisibleRegion } from './visible-region.js';

export interface CroppedDocument {
  readonly data: Uint8Array;
  readonly cropBoxes: readonly Rect[];
}

/** Sets every page's crop box to its visible content; nothing else on the page changes. */
export class Cropper {
  constructor(
    private readonly reader: PageContentReaderPort,
    private readonly editor: PdfEditorPort,
    private readonly fileSystem: FileSystemPort,
    private readonly log: Logger,
  ) {}

  async cropFile(inputPath: string, outputPath: string): Promise<CroppedDocument> {
    const cropped = await this.crop(await this.fileSystem.readFile(inputPath));
    await this.fileSystem.writeFile(outputPath, cropped.data);
    return cropped;
  }

  async crop(data: Uint8Array): Promise<CroppedDocument> {
    const contents = await this.reader.readPages(data);
    const document = await this.editor.load(data);

    if (contents.length !== document.pageCount) {
      throw new PdfIoError(
        'read',
        `content reader saw ${contents.length} pages, document has ${document.pageCount}`,
      );
    }

    const cropBoxes: Rect[] = [];
    for (const content of contents) {
      const region = detectVisibleRegion(content, document.getMediaBox(content.index));
      document.setCropBox(content.index, region);
      cropBoxes.push(region);
      this.log.info(`Page ${content.index + 1}: crop box ${formatRect(region)}`);
    }

    return { data: await document.save(), cropBoxes };
  }
}

function formatRect(rect: Rect): string {
  return `(${[rect.x0, rect.y0, rect.x1, rect.y1].map((n) => n.toFixed(2)).join(', ')})`;
}

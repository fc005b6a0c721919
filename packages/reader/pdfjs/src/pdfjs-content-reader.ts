import type { PageContent, PageContentReaderPort } from '@trimfit/core';
import { createLogger, PdfIoError } from '@trimfit/core';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { interpretOperatorList, type PdfOperatorList } from './operator-list.js';
import { collectTextBlocks, type PdfTextContent } from './text-blocks.js';

interface PdfPage {
  getOperatorList(): Promise<PdfOperatorList>;
  getTextContent(): Promise<PdfTextContent>;
  cleanup?(): unknown;
}

interface PdfDocument {
  readonly numPages: number;
  getPage(pageNumber: number): Promise<PdfPage>;
  cleanup?(): unknown;
  destroy?(): Promise<void>;
}

interface PdfLoadingTask {
  readonly promise: Promise<PdfDocument>;
  destroy?(): unknown;
}

type LoadPdfFn = (data: Uint8Array) => PdfLoadingTask;

const log = createLogger('Read');

export class PdfjsContentReader implements PageContentReaderPort {
  constructor(private readonly loadPdf: LoadPdfFn = loadPdfDocument) {}

  async readPages(data: Uint8Array): Promise<PageContent[]> {
    const document = await this.loadDocument(data);

    try {
      const pages: PageContent[] = [];
      for (let pageNumber = 1; pageNumber <= document.numPages; pageNumber++) {
        pages.push(await this.readPage(document, pageNumber));
      }
      return pages;
    } finally {
      await this.cleanupDocument(document);
    }
  }

  private async loadDocument(data: Uint8Array): Promise<PdfDocument> {
    let task: PdfLoadingTask;
    try {
      // pdfjs may detach the buffer it is given
      task = this.loadPdf(new Uint8Array(data));
    } catch (error) {
      throw new PdfIoError('load', 'cannot open PDF', error);
    }

    try {
      return await task.promise;
    } catch (error) {
      task.destroy?.();
      throw new PdfIoError('load', 'cannot open PDF', error);
    }
  }

  private async readPage(document: PdfDocument, pageNumber: number): Promise<PageContent> {
    try {
      const page = await document.getPage(pageNumber);
      const graphics = interpretOperatorList(await page.getOperatorList());
      const textBlocks = collectTextBlocks(await page.getTextContent());
      page.cleanup?.();

      return {
        index: pageNumber - 1,
        drawings: graphics.drawings,
        blocks: [...textBlocks, ...graphics.images],
      };
    } catch (error) {
      throw new PdfIoError('read', `page ${pageNumber}`, error);
    }
  }

  private async cleanupDocument(document: PdfDocument): Promise<void> {
    try {
      document.cleanup?.();
      await document.destroy?.();
    } catch (error) {
      log.error('Failed to release PDF document', error);
    }
  }
}

function loadPdfDocument(data: Uint8Array): PdfLoadingTask {
  return getDocument({
    data,
    useWorkerFetch: false,
    isEvalSupported: false,
    verbosity: 0,
  }) as PdfLoadingTask;
}

import type { PdfDocumentHandle, PdfEditorPort, Rect } from '@trimfit/core';
import { PdfIoError, rectFromBox, rectToBox } from '@trimfit/core';
import { PDFDocument, type PDFPage } from 'pdf-lib';

export class PdfLibEditor implements PdfEditorPort {
  async load(data: Uint8Array): Promise<PdfDocumentHandle> {
    return new PdfLibDocument(await loadDocument(data));
  }

  async create(): Promise<PdfDocumentHandle> {
    return new PdfLibDocument(await PDFDocument.create({ updateMetadata: false }));
  }
}

class PdfLibDocument implements PdfDocumentHandle {
  constructor(private readonly document: PDFDocument) {}

  get pageCount(): number {
    return this.document.getPageCount();
  }

  getMediaBox(pageIndex: number): Rect {
    return rectFromBox(this.page(pageIndex).getMediaBox());
  }

  getCropBox(pageIndex: number): Rect {
    return rectFromBox(this.page(pageIndex).getCropBox());
  }

  setCropBox(pageIndex: number, rect: Rect): void {
    const box = rectToBox(rect);
    this.page(pageIndex).setCropBox(box.x, box.y, box.width, box.height);
  }

  async extractPage(pageIndex: number): Promise<Uint8Array> {
    this.page(pageIndex);

    try {
      const single = await PDFDocument.create({ updateMetadata: false });
      const [copy] = await single.copyPages(this.document, [pageIndex]);
      single.addPage(copy);
      return await single.save();
    } catch (error) {
      throw new PdfIoError('edit', `extract page ${pageIndex + 1}`, error);
    }
  }

  async appendDocument(data: Uint8Array): Promise<void> {
    const source = await loadDocument(data);

    try {
      const copies = await this.document.copyPages(source, source.getPageIndices());
      for (const copy of copies) {
        this.document.addPage(copy);
      }
    } catch (error) {
      throw new PdfIoError('edit', 'append pages', error);
    }
  }

  async save(): Promise<Uint8Array> {
    try {
      return await this.document.save();
    } catch (error) {
      throw new PdfIoError('save', `${this.pageCount} pages`, error);
    }
  }

  private page(pageIndex: number): PDFPage {
    if (!Number.isInteger(pageIndex) || pageIndex < 0 || pageIndex >= this.pageCount) {
      throw new PdfIoError('edit', `page ${pageIndex + 1} of ${this.pageCount} does not exist`);
    }
    return this.document.getPage(pageIndex);
  }
}

async function loadDocument(data: Uint8Array): Promise<PDFDocument> {
  try {
    return await PDFDocument.load(data, { updateMetadata: false });
  } catch (error) {
    throw new PdfIoError('load', `${data.byteLength} bytes`, error);
  }
}

import type { Rect } from '../models/index.js';

export interface PdfDocumentHandle {
  readonly pageCount: number;
  getMediaBox(pageIndex: number): Rect;
  getCropBox(pageIndex: number): Rect;
  setCropBox(pageIndex: number, rect: Rect): void;
  /** Copy one page into a new single-page document and return its bytes */
  extractPage(pageIndex: number): Promise<Uint8Array>;
  /** Append every page of another document, in order */
  appendDocument(data: Uint8Array): Promise<void>;
  save(): Promise<Uint8Array>;
}

export interface PdfEditorPort {
  load(data: Uint8Array): Promise<PdfDocumentHandle>;
  create(): Promise<PdfDocumentHandle>;
}

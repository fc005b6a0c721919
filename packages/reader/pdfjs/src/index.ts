export { PdfjsContentReader } from './pdfjs-content-reader.js';
export { interpretOperatorList } from './operator-list.js';
export type { PageGraphics, PdfOperatorList } from './operator-list.js';
export { collectTextBlocks } from './text-blocks.js';
export type { PdfTextContent, PdfTextItem, PdfTextStyle } from './text-blocks.js';

export { PdfLibEditor } from './pdf-lib-editor.js';

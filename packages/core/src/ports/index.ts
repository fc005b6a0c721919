export type { CommandResult, CommandRunnerPort } from './command-runner.js';
export type { PageContentReaderPort } from './content-reader.js';
export type { FileSystemPort } from './file-system.js';
export type { LayoutToolPort } from './layout-tool.js';
export type { PdfDocumentHandle, PdfEditorPort } from './pdf-editor.js';

import type { PageContent } from '../models/index.js';

export interface PageContentReaderPort {
  /** Read the drawings and text/image blocks of every page, in page order */
  readPages(data: Uint8Array): Promise<PageContent[]>;
}

import { vi } from 'vitest';
import { FileSystemError } from '../src/exceptions.js';
import type { PageContent, Rect } from '../src/models/index.js';
import type { PageContentReaderPort } from '../src/ports/content-reader.js';
import type { FileSystemPort } from '../src/ports/file-system.js';
import type { LayoutToolPort } from '../src/ports/layout-tool.js';
import type { PdfDocumentHandle, PdfEditorPort } from '../src/ports/pdf-editor.js';

export const LETTER_MEDIA_BOX: Rect = { x0: 0, y0: 0, x1: 612, y1: 792 };

/** Fake "PDF" bytes: a JSON list of page labels. */
export function encodePages(labels: readonly string[]): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(labels));
}

export function decodePages(data: Uint8Array): string[] {
  const parsed: unknown = JSON.parse(new TextDecoder().decode(data));
  if (!Array.isArray(parsed)) {
    throw new Error('fake PDF must be a JSON array');
  }
  return parsed.map(String);
}

export class MemoryFileSystem implements FileSystemPort {
  readonly files = new Map<string, Uint8Array>();
  readonly dirs = new Set<string>();
  readonly writes: string[] = [];
  readonly removed: string[] = [];
  private tempCounter = 0;

  async exists(path: string): Promise<boolean> {
    return this.files.has(path) || this.dirs.has(path);
  }

  async readFile(path: string): Promise<Uint8Array> {
    const data = this.files.get(path);
    if (!data) throw new FileSystemError('read', path);
    return data;
  }

  async writeFile(path: string, data: Uint8Array): Promise<void> {
    this.files.set(path, data);
    this.writes.push(path);
  }

  async mkdir(path: string): Promise<void> {
    this.dirs.add(path);
  }

  async makeTempDir(prefix: string): Promise<string> {
    this.tempCounter += 1;
    const dir = `/tmp/${prefix}${this.tempCounter}`;
    this.dirs.add(dir);
    return dir;
  }

  async remove(path: string): Promise<void> {
    this.removed.push(path);
    this.dirs.delete(path);
    for (const file of [...this.files.keys()]) {
      if (file.startsWith(`${path}/`)) this.files.delete(file);
    }
  }
}

export class FakePdfDocument implements PdfDocumentHandle {
  readonly cropBoxes = new Map<number, Rect>();

  constructor(
    readonly labels: string[],
    private readonly mediaBox: Rect = LETTER_MEDIA_BOX,
  ) {}

  get pageCount(): number {
    return this.labels.length;
  }

  getMediaBox(): Rect {
    return this.mediaBox;
  }

  getCropBox(pageIndex: number): Rect {
    return this.cropBoxes.get(pageIndex) ?? this.mediaBox;
  }

  setCropBox(pageIndex: number, rect: Rect): void {
    this.cropBoxes.set(pageIndex, rect);
    this.labels[pageIndex] = `${this.labels[pageIndex]}+crop`;
  }

  async extractPage(pageIndex: number): Promise<Uint8Array> {
    return encodePages([this.labels[pageIndex]]);
  }

  async appendDocument(data: Uint8Array): Promise<void> {
    this.labels.push(...decodePages(data));
  }

  async save(): Promise<Uint8Array> {
    return encodePages(this.labels);
  }
}

export function createFakeEditor(): PdfEditorPort {
  return {
    load: vi.fn(async (data: Uint8Array) => new FakePdfDocument(decodePages(data))),
    create: vi.fn(async () => new FakePdfDocument([])),
  };
}

/** Reports every page as blank unless `contents` says otherwise. */
export function createFakeReader(
  contents: Partial<Record<number, Omit<PageContent, 'index'>>> = {},
): PageContentReaderPort {
  return {
    readPages: vi.fn(async (data: Uint8Array) =>
      decodePages(data).map((_, index) => ({
        index,
        drawings: contents[index]?.drawings ?? [],
        blocks: contents[index]?.blocks ?? [],
      })),
    ),
  };
}

/** Layout tool that tags each page label with the step that touched it. */
export function createFakeLayoutTool(fs: MemoryFileSystem): LayoutToolPort {
  const tag = async (input: string, output: string, suffix: string): Promise<void> => {
    const labels = decodePages(await fs.readFile(input));
    fs.files.set(
      output,
      encodePages(labels.map((label) => `${label}|${suffix}`)),
    );
  };

  return {
    name: 'fake-jam',
    ensureAvailable: vi.fn(async () => {}),
    scaleToFit: vi.fn(async (input: string, output: string) => tag(input, output, 'scaled')),
    padTo: vi.fn(async (input: string, output: string) => tag(input, output, 'padded')),
  };
}

import { beforeEach, describe, it, expect, vi } from 'vitest';
import { TrimfitService, type FitRequest } from '../src/trimfit-service.js';
import {
  ExternalToolError,
  FileNotFoundError,
  FileSystemError,
  InvalidInputError,
  MarginTooLargeError,
  MissingToolError,
} from '../src/exceptions.js';
import type { LayoutToolPort } from '../src/ports/layout-tool.js';
import type { PageContentReaderPort } from '../src/ports/content-reader.js';
import type { PdfEditorPort } from '../src/ports/pdf-editor.js';
import {
  MemoryFileSystem,
  createFakeEditor,
  createFakeLayoutTool,
  createFakeReader,
  decodePages,
  encodePages,
} from './helpers.js';

const INPUT = '/docs/in.pdf';
const OUTPUT = '/out/result.pdf';
const WORK_DIR = '/tmp/pdf-trimfit-1';

const LETTER = { width: 8.5, height: 11 };

function fitRequest(overrides: Partial<FitRequest> = {}): FitRequest {
  return {
    mode: 'fit',
    inputPath: INPUT,
    outputPath: OUTPUT,
    size: LETTER,
    margin: 0.5,
    ...overrides,
  };
}

describe('TrimfitService', () => {
  let fileSystem: MemoryFileSystem;
  let reader: PageContentReaderPort;
  let editor: PdfEditorPort;
  let layoutTool: LayoutToolPort;
  let service: TrimfitService;

  beforeEach(() => {
    fileSystem = new MemoryFileSystem();
    fileSystem.files.set(INPUT, encodePages(['a', 'b', 'c']));
    reader = createFakeReader();
    editor = createFakeEditor();
    layoutTool = createFakeLayoutTool(fileSystem);
    service = new TrimfitService(
      { reader, editor, layoutTool, fileSystem },
      { tempPrefix: 'pdf-trimfit-' },
    );
  });

  function output(): string[] {
    const data = fileSystem.files.get(OUTPUT);
    if (!data) throw new Error(`nothing written to ${OUTPUT}`);
    return decodePages(data);
  }

  describe('trim', () => {
    it('crops every page in place without a layout tool', async () => {
      const result = await service.normalize({
        mode: 'trim',
        inputPath: INPUT,
        outputPath: OUTPUT,
      });

      expect(result).toEqual({ mode: 'trim', inputPath: INPUT, outputPath: OUTPUT, pageCount: 3 });
      expect(output()).toEqual(['a+crop', 'b+crop', 'c+crop']);
      expect(layoutTool.ensureAvailable).not.toHaveBeenCalled();
      expect(fileSystem.dirs.has(WORK_DIR)).toBe(false);
      expect(fileSystem.dirs.has('/out')).toBe(true);
    });

    it('succeeds when the layout tool is missing', async () => {
      vi.mocked(layoutTool.ensureAvailable).mockRejectedValue(
        new MissingToolError('fake-jam', 'install it'),
      );

      const result = await service.normalize({
        mode: 'trim',
        inputPath: INPUT,
        outputPath: OUTPUT,
      });

      expect(result.pageCount).toBe(3);
    });
  });

  describe('fit', () => {
    it('scales and pads every page and keeps page order', async () => {
      const result = await service.normalize(fitRequest());

      expect(result).toEqual({ mode: 'fit', inputPath: INPUT, outputPath: OUTPUT, pageCount: 3 });
      expect(output()).toEqual(['a|scaled|padded', 'b|scaled|padded', 'c|scaled|padded']);
      expect(reader.readPages).not.toHaveBeenCalled();
    });

    it('passes the inner size to scaling and the outer size to padding', async () => {
      await service.normalize(fitRequest());

      expect(layoutTool.scaleToFit).toHaveBeenNthCalledWith(
        2,
        `${WORK_DIR}/p1.pdf`,
        `${WORK_DIR}/p1_fit.pdf`,
        { width: 7.5, height: 10 },
      );
      expect(layoutTool.padTo).toHaveBeenNthCalledWith(
        2,
        `${WORK_DIR}/p1_fit.pdf`,
        `${WORK_DIR}/p1_pad.pdf`,
        LETTER,
      );
    });

    it('removes the scratch directory', async () => {
      await service.normalize(fitRequest());

      expect(fileSystem.removed).toEqual([WORK_DIR]);
      expect([...fileSystem.files.keys()]).toEqual([INPUT, OUTPUT]);
    });

    it('fails before any page work when the layout tool is missing', async () => {
      vi.mocked(layoutTool.ensureAvailable).mockRejectedValue(
        new MissingToolError('fake-jam', 'install it'),
      );

      await expect(service.normalize(fitRequest())).rejects.toThrow(MissingToolError);
      expect(layoutTool.scaleToFit).not.toHaveBeenCalled();
      expect(fileSystem.dirs.has(WORK_DIR)).toBe(false);
      expect(fileSystem.files.has(OUTPUT)).toBe(false);
    });

    it('removes the scratch directory and writes nothing when a page fails', async () => {
      const failure = new ExternalToolError({
        command: 'fake-jam',
        args: [],
        exitCode: 1,
        stdout: '',
        stderr: 'bad page',
      });
      vi.mocked(layoutTool.padTo)
        .mockImplementationOnce(async (input, outputPath) => {
          fileSystem.files.set(outputPath, await fileSystem.readFile(input));
        })
        .mockRejectedValueOnce(failure);

      await expect(service.normalize(fitRequest())).rejects.toBe(failure);
      expect(fileSystem.removed).toEqual([WORK_DIR]);
      expect(fileSystem.files.has(OUTPUT)).toBe(false);
    });

    it('logs a cleanup failure without failing the run', async () => {
      vi.spyOn(fileSystem, 'remove').mockRejectedValue(new FileSystemError('delete', WORK_DIR));
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

      const result = await service.normalize(fitRequest());

      expect(result.pageCount).toBe(3);
      expect(errorSpy).toHaveBeenCalledWith(
        `[Trimfit:Pipeline] Could not remove scratch directory ${WORK_DIR}`,
        expect.any(FileSystemError),
      );
      errorSpy.mockRestore();
    });
  });

  describe('trimfit', () => {
    it('crops, then fits the cropped pages', async () => {
      const result = await service.normalize(fitRequest({ mode: 'trimfit' }));

      expect(result.pageCount).toBe(3);
      expect(output()).toEqual([
        'a+crop|scaled|padded',
        'b+crop|scaled|padded',
        'c+crop|scaled|padded',
      ]);
      expect(reader.readPages).toHaveBeenCalledOnce();
      expect(fileSystem.writes).toContain(`${WORK_DIR}/cropped.pdf`);
    });
  });

  describe('validation', () => {
    it('rejects a margin that leaves no room before touching files', async () => {
      const exists = vi.spyOn(fileSystem, 'exists');

      await expect(
        service.normalize(fitRequest({ size: { width: 1, height: 1 }, margin: 0.6 })),
      ).rejects.toThrow(MarginTooLargeError);
      expect(exists).not.toHaveBeenCalled();
      expect(layoutTool.ensureAvailable).not.toHaveBeenCalled();
    });

    it('rejects a negative margin before looking for the layout tool', async () => {
      await expect(service.normalize(fitRequest({ margin: -0.25 }))).rejects.toThrow(
        'Invalid margin -0.25. Margin must be zero or more inches',
      );
      expect(layoutTool.ensureAvailable).not.toHaveBeenCalled();
      expect(fileSystem.writes).toEqual([]);
    });

    it('rejects a missing input', async () => {
      await expect(
        service.normalize(fitRequest({ inputPath: '/docs/missing.pdf' })),
      ).rejects.toThrow(FileNotFoundError);
      await expect(
        service.normalize(fitRequest({ inputPath: '/docs/missing.pdf' })),
      ).rejects.toThrow('Input PDF not found: /docs/missing.pdf');
    });

    it('rejects an input without a .pdf extension', async () => {
      fileSystem.files.set('/docs/in.txt', encodePages(['a']));

      await expect(
        service.normalize({ mode: 'trim', inputPath: '/docs/in.txt', outputPath: OUTPUT }),
      ).rejects.toThrow(InvalidInputError);
    });

    it('accepts an upper-case extension', async () => {
      fileSystem.files.set('/docs/IN.PDF', encodePages(['a']));

      const result = await service.normalize({
        mode: 'trim',
        inputPath: '/docs/IN.PDF',
        outputPath: OUTPUT,
      });

      expect(result.pageCount).toBe(1);
    });

    it('reports an output directory that cannot be created', async () => {
      vi.spyOn(fileSystem, 'mkdir').mockRejectedValue(new FileSystemError('mkdir', '/out'));

      await expect(service.normalize(fitRequest())).rejects.toThrow(
        'Cannot create output directory: /out',
      );
      expect(layoutTool.ensureAvailable).not.toHaveBeenCalled();
    });
  });
});

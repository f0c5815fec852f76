import { mkdir, readdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import { findCoverFiles, runMockupBatch } from './batch';
import { ResourceNotFoundError } from './errors';
import { createTemplatePalette } from './template-palette';
import { encodeImage } from './encode';
import { SMALL_QUAD, makeTempDir, removeDir, solidImage, solidMask, writeBmp, writePng } from './test-fixtures';

describe('findCoverFiles', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await makeTempDir('mockup-find');
    await writeFile(join(dir, 'b.jpg'), '');
    await writeFile(join(dir, 'a.PNG'), '');
    await writeFile(join(dir, 'c.bmp'), '');
    await writeFile(join(dir, 'notes.txt'), '');
    await mkdir(join(dir, 'nested.png'));
  });

  afterAll(async () => {
    await removeDir(dir);
  });

  it('lists image files by name, ignoring case, other files and directories', async () => {
    expect(await findCoverFiles(dir)).toEqual([join(dir, 'a.PNG'), join(dir, 'b.jpg'), join(dir, 'c.bmp')]);
  });

  it('reports a missing directory', async () => {
    const missing = join(dir, 'absent');
    await expect(findCoverFiles(missing)).rejects.toBeInstanceOf(ResourceNotFoundError);
    await expect(findCoverFiles(missing)).rejects.toThrow(`Covers directory not found: ${missing}`);
  });
});

describe('runMockupBatch', () => {
  let dir: string;
  let coversDir: string;
  let maskPath: string;
  let palette: ReturnType<typeof createTemplatePalette>;

  beforeAll(async () => {
    dir = await makeTempDir('mockup-batch');
    coversDir = join(dir, 'covers');
    const templatesDir = join(dir, 'templates');
    await mkdir(coversDir);
    await mkdir(templatesDir);

    await writePng(join(templatesDir, 'red.png'), solidImage(60, 80, [240, 230, 220]));
    maskPath = await writePng(join(dir, 'mask.png'), solidMask(60, 80, 255));
    palette = createTemplatePalette(templatesDir, [{ name: 'red', color: [180, 60, 60], file: 'red.png' }]);

    await writePng(join(coversDir, 'a.png'), solidImage(20, 20, [180, 60, 60]));
    await writePng(join(coversDir, 'b.png'), solidImage(30, 40, [150, 40, 40]));
    await writeFile(join(coversDir, 'c.png'), 'this is not a png');
    await writeFile(join(coversDir, 'readme.txt'), 'ignored');
  });

  afterAll(async () => {
    await removeDir(dir);
  });

  it('keeps going past a corrupt cover and counts both outcomes', async () => {
    const outputDir = join(dir, 'out-serial');
    const summary = await runMockupBatch({ coversDir, outputDir, palette, maskPath, quad: SMALL_QUAD });

    expect(summary.total).toBe(3);
    expect(summary.successful).toBe(2);
    expect(summary.failed).toBe(1);
    expect(summary.outputs).toEqual([join(outputDir, 'a_book.png'), join(outputDir, 'b_book.png')]);
    expect(summary.failures).toEqual([
      {
        coverPath: join(coversDir, 'c.png'),
        message: `Cover ${join(coversDir, 'c.png')} could not be decoded`,
        code: 'INVALID_IMAGE',
      },
    ]);
    expect(await readdir(outputDir)).toEqual(['a_book.png', 'b_book.png']);
  });

  it('produces the same result with several workers and reports progress', async () => {
    const outputDir = join(dir, 'out-parallel');
    const onProgress = vi.fn();
    const summary = await runMockupBatch({
      coversDir,
      outputDir,
      palette,
      maskPath,
      quad: SMALL_QUAD,
      concurrency: 3,
      onProgress,
    });

    expect(summary.successful).toBe(2);
    expect(summary.failed).toBe(1);
    expect(summary.outputs).toEqual([join(outputDir, 'a_book.png'), join(outputDir, 'b_book.png')]);
    expect(onProgress).toHaveBeenCalledTimes(3);
    expect(onProgress).toHaveBeenLastCalledWith(3, 3);
  });

  it('returns an empty summary for a directory without covers', async () => {
    const emptyDir = join(dir, 'empty');
    await mkdir(emptyDir);

    const summary = await runMockupBatch({ coversDir: emptyDir, outputDir: join(dir, 'out-empty'), palette, maskPath });
    expect(summary).toEqual({
      total: 0,
      successful: 0,
      failed: 0,
      outputs: [],
      failures: [],
      duplicateNames: [],
    });
  });

  it('renders a BMP cover', async () => {
    const bmpDir = join(dir, 'bmp-covers');
    await mkdir(bmpDir);
    await writeBmp(join(bmpDir, 'scan.bmp'), solidImage(20, 20, [180, 60, 60]));

    const outputDir = join(dir, 'out-bmp');
    const summary = await runMockupBatch({ coversDir: bmpDir, outputDir, palette, maskPath, quad: SMALL_QUAD });

    expect(summary.successful).toBe(1);
    expect(summary.failed).toBe(0);
    expect(summary.outputs).toEqual([join(outputDir, 'scan_book.png')]);
    expect(await readdir(outputDir)).toEqual(['scan_book.png']);
  });

  it('warns about covers that share a base name', async () => {
    const clashDir = join(dir, 'clashing');
    await mkdir(clashDir);
    await writePng(join(clashDir, 'a.png'), solidImage(20, 20, [180, 60, 60]));
    await writeFile(join(clashDir, 'a.jpg'), await encodeImage(solidImage(20, 20, [180, 60, 60]), 'jpeg'));
    await writePng(join(clashDir, 'b.png'), solidImage(20, 20, [180, 60, 60]));

    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const outputDir = join(dir, 'out-clash');
    try {
      const summary = await runMockupBatch({ coversDir: clashDir, outputDir, palette, maskPath, quad: SMALL_QUAD });

      expect(summary.total).toBe(3);
      expect(summary.successful).toBe(3);
      expect(summary.duplicateNames).toEqual(['a']);
      expect(warn).toHaveBeenCalledWith(
        'Covers share the base name "a" and write the same mockup:',
        [join(clashDir, 'a.jpg'), join(clashDir, 'a.png')]
      );
      expect(await readdir(outputDir)).toEqual(['a_book.png', 'b_book.png']);
    } finally {
      warn.mockRestore();
    }
  });
});

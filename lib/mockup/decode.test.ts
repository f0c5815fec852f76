import { writeFile } from 'fs/promises';
import { join } from 'path';
import sharp from 'sharp';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { decodeImage, loadCoverImage, loadMaskImage, prepareCover, readImageFile } from './decode';
import { encodeImage, imageFormatFromPath } from './encode';
import { InvalidImageError, ResourceNotFoundError } from './errors';
import { assertValidRaster, createRaster, flattenOnto, hasTranslucency, luma, toGrayscale, toRgba } from './raster';
import { makeTempDir, pixelAt, removeDir, solidImage, writeBmp, writePng } from './test-fixtures';

describe('raster helpers', () => {
  it('flattens translucent pixels onto a background', () => {
    const image = solidImage(3, 1, [0, 0, 0], 255);
    image.data.set([0, 0, 0, 0], 0);
    image.data.set([0, 0, 0, 128], 4);
    image.data.set([200, 100, 50, 255], 8);

    const flat = flattenOnto(image, [255, 255, 255]);
    expect(pixelAt(flat, 0, 0)).toEqual([255, 255, 255, 255]);
    expect(pixelAt(flat, 1, 0)).toEqual([127, 127, 127, 255]);
    expect(pixelAt(flat, 2, 0)).toEqual([200, 100, 50, 255]);
  });

  it('detects translucency only in four-channel images', () => {
    expect(hasTranslucency(solidImage(2, 2, [1, 2, 3]))).toBe(false);
    expect(hasTranslucency(solidImage(2, 2, [1, 2, 3], 254))).toBe(true);
    expect(hasTranslucency(createRaster(2, 2, 3))).toBe(false);
  });

  it('converts between channel layouts', () => {
    expect(luma(255, 255, 255)).toBe(255);
    expect(Array.from(toGrayscale(solidImage(1, 1, [0, 255, 0])).data)).toEqual([150]);

    const gray = { width: 1, height: 1, channels: 1 as const, data: new Uint8ClampedArray([42]) };
    expect(Array.from(toRgba(gray).data)).toEqual([42, 42, 42, 255]);
  });

  it('rejects impossible rasters', () => {
    expect(() => createRaster(0, 5)).toThrow(InvalidImageError);
    expect(() => createRaster(2.5, 5)).toThrow('Invalid raster dimensions: 2.5x5');
    expect(() =>
      assertValidRaster({ width: 2, height: 2, channels: 4, data: new Uint8ClampedArray(3) }, 'Template')
    ).toThrow('Template buffer holds 3 bytes, expected 16');
  });
});

describe('decodeImage', () => {
  it('decodes PNG bytes to RGBA', async () => {
    const source = solidImage(3, 2, [10, 20, 30]);
    source.data.set([250, 0, 5, 255], 4);

    const decoded = await decodeImage(await encodeImage(source, 'png'));
    expect(decoded.width).toBe(3);
    expect(decoded.height).toBe(2);
    expect(decoded.channels).toBe(4);
    expect(Array.from(decoded.data)).toEqual(Array.from(source.data));
  });

  it('decodes WebP', async () => {
    const webp = await sharp(Buffer.alloc(5 * 4 * 3, 90), { raw: { width: 5, height: 4, channels: 3 } })
      .webp({ lossless: true })
      .toBuffer();

    const decoded = await decodeImage(webp);
    expect(decoded.width).toBe(5);
    expect(decoded.height).toBe(4);
    expect(pixelAt(decoded, 2, 2)).toEqual([90, 90, 90, 255]);
  });

  it('rejects empty input', async () => {
    await expect(decodeImage(new Uint8Array(0), 'Cover')).rejects.toThrow('Cover is empty');
  });

  it('rejects bytes that no decoder understands', async () => {
    const error = await decodeImage(Buffer.from('not an image'), 'Cover').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(InvalidImageError);
    expect(error).toHaveProperty('message', 'Cover could not be decoded');
  });
});

describe('encode', () => {
  it('picks the format from the extension', () => {
    expect(imageFormatFromPath('/t/blue.JPG')).toBe('jpeg');
    expect(imageFormatFromPath('/t/blue.jpeg')).toBe('jpeg');
    expect(imageFormatFromPath('/t/blue.png')).toBe('png');
    expect(imageFormatFromPath('/t/blue')).toBe('png');
  });

  it('writes PNG and JPEG signatures', async () => {
    const image = solidImage(4, 4, [1, 2, 3]);
    expect(Array.from((await encodeImage(image, 'png')).subarray(0, 4))).toEqual([0x89, 0x50, 0x4e, 0x47]);
    expect(Array.from((await encodeImage(image, 'jpeg')).subarray(0, 2))).toEqual([0xff, 0xd8]);
  });
});

describe('image files', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await makeTempDir('mockup-decode');
  });

  afterAll(async () => {
    await removeDir(dir);
  });

  it('reports a missing file as a missing resource', async () => {
    const path = join(dir, 'missing.png');
    const error = await readImageFile(path, 'Template').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ResourceNotFoundError);
    expect(error).toHaveProperty('message', `Template not found: ${path}`);
    expect(error).toHaveProperty('code', 'RESOURCE_NOT_FOUND');
  });

  it('names the file when its contents are corrupt', async () => {
    const path = join(dir, 'corrupt.png');
    await writeFile(path, 'not an image');
    await expect(readImageFile(path, 'Cover')).rejects.toThrow(`Cover ${path} could not be decoded`);
  });

  it('decodes a 24-bit BMP as opaque RGBA', async () => {
    // Three pixels wide, so every row carries padding.
    const source = solidImage(3, 2, [10, 20, 30]);
    source.data.set([250, 0, 5, 255], 4);
    source.data.set([1, 128, 254, 255], 20);
    const path = await writeBmp(join(dir, 'cover.bmp'), source);

    const decoded = await readImageFile(path, 'Cover');
    expect(decoded.width).toBe(3);
    expect(decoded.height).toBe(2);
    expect(decoded.channels).toBe(4);
    expect(Array.from(decoded.data)).toEqual(Array.from(source.data));
  });

  it('flattens a translucent cover onto white', async () => {
    const path = await writePng(join(dir, 'translucent.png'), solidImage(4, 4, [0, 0, 0], 0));
    const cover = await loadCoverImage(path);
    expect(pixelAt(cover, 1, 1)).toEqual([255, 255, 255, 255]);
  });

  it('leaves an opaque cover untouched', () => {
    const cover = solidImage(2, 2, [9, 8, 7]);
    expect(prepareCover(cover)).toBe(cover);
  });

  it('loads a mask as one luma channel', async () => {
    const path = await writePng(join(dir, 'mask.png'), solidImage(3, 3, [255, 255, 255]));
    const mask = await loadMaskImage(path);
    expect(mask.channels).toBe(1);
    expect(Array.from(mask.data)).toEqual(new Array(9).fill(255));
  });
});

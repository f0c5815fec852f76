import bmp from 'bmp-js';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { encodeImage } from './encode';
import type { Mask, QuadRegion, RasterImage, RGB } from './types';

// Small face used where a full-size template would only slow tests down.
export const SMALL_QUAD: QuadRegion = {
  tl: [10, 10],
  tr: [50, 8],
  br: [50, 72],
  bl: [10, 68],
};

export function solidImage(width: number, height: number, [r, g, b]: RGB, alpha = 255): RasterImage {
  const data = new Uint8ClampedArray(width * height * 4);
  for (let i = 0; i < data.length; i += 4) {
    data[i] = r;
    data[i + 1] = g;
    data[i + 2] = b;
    data[i + 3] = alpha;
  }
  return { width, height, channels: 4, data };
}

export function solidMask(width: number, height: number, value: number): Mask {
  return { width, height, channels: 1, data: new Uint8ClampedArray(width * height).fill(value) };
}

export function fillRect(
  image: RasterImage,
  x0: number,
  y0: number,
  x1: number,
  y1: number,
  values: readonly number[]
): void {
  for (let y = y0; y < y1; y++) {
    for (let x = x0; x < x1; x++) {
      const idx = (y * image.width + x) * image.channels;
      for (let c = 0; c < image.channels; c++) {
        image.data[idx + c] = values[c];
      }
    }
  }
}

export function pixelAt(image: RasterImage, x: number, y: number): number[] {
  const idx = (y * image.width + x) * image.channels;
  return Array.from(image.data.subarray(idx, idx + image.channels));
}

export async function writePng(path: string, image: RasterImage): Promise<string> {
  await writeFile(path, await encodeImage(image, 'png'));
  return path;
}

// 24-bit BMP; bmp-js takes pixels as A, B, G, R.
export async function writeBmp(path: string, image: RasterImage): Promise<string> {
  const data = Buffer.alloc(image.width * image.height * 4);
  for (let i = 0; i < data.length; i += 4) {
    data[i] = 255;
    data[i + 1] = image.data[i + 2];
    data[i + 2] = image.data[i + 1];
    data[i + 3] = image.data[i];
  }
  await writeFile(path, bmp.encode({ data, width: image.width, height: image.height }).data);
  return path;
}

export async function makeTempDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `${prefix}-`));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

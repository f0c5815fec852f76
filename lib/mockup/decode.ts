/**
 * Decode stage: bytes or file → RasterImage (RGBA).
 * - PNG/JPEG/TIFF: imagescript.
 * - Anything imagescript rejects (WebP, GIF, AVIF) gets a second attempt through sharp.
 * - BMP, which neither reads, goes through bmp-js.
 */

import { readFile } from 'fs/promises';
import bmp from 'bmp-js';
import { Image } from 'imagescript';
import sharp from 'sharp';
import { InvalidImageError, ResourceNotFoundError, isMissingFileError } from './errors';
import { assertValidRaster, flattenOnto, hasTranslucency, toGrayscale } from './raster';
import type { Mask, RasterImage, RGB } from './types';

const WHITE: RGB = [255, 255, 255];

async function decodeWithImageScript(bytes: Uint8Array): Promise<RasterImage> {
  const img = await Image.decode(bytes);
  return {
    width: img.width,
    height: img.height,
    channels: 4,
    data: new Uint8ClampedArray(img.bitmap),
  };
}

async function decodeWithSharp(bytes: Uint8Array): Promise<RasterImage> {
  const { data, info } = await sharp(bytes, { failOn: 'error' })
    .ensureAlpha()
    .raw()
    .toBuffer({ resolveWithObject: true });
  if (info.channels !== 4) {
    throw new Error(`Unexpected channel count from sharp: ${info.channels}`);
  }
  return {
    width: info.width,
    height: info.height,
    channels: 4,
    data: new Uint8ClampedArray(data),
  };
}

// bmp-js hands back ABGR, with A left at 0 for 24-bit files; alpha is forced opaque.
async function decodeWithBmp(bytes: Uint8Array): Promise<RasterImage> {
  const input = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  if (input.toString('latin1', 0, 2) !== 'BM') {
    throw new Error('Missing BMP signature');
  }
  const decoded = bmp.decode(input);
  const data = new Uint8ClampedArray(decoded.width * decoded.height * 4);
  for (let i = 0; i < data.length; i += 4) {
    data[i] = decoded.data[i + 3];
    data[i + 1] = decoded.data[i + 2];
    data[i + 2] = decoded.data[i + 1];
    data[i + 3] = 255;
  }
  return { width: decoded.width, height: decoded.height, channels: 4, data };
}

const DECODERS = [decodeWithImageScript, decodeWithSharp, decodeWithBmp];

export async function decodeImage(bytes: Uint8Array, label = 'Image'): Promise<RasterImage> {
  if (bytes.length === 0) {
    throw new InvalidImageError(`${label} is empty`);
  }

  const failures: unknown[] = [];
  for (const decode of DECODERS) {
    let frame: RasterImage;
    try {
      frame = await decode(bytes);
    } catch (error) {
      failures.push(error);
      continue;
    }
    assertValidRaster(frame, label);
    return frame;
  }

  throw new InvalidImageError(`${label} could not be decoded`, {
    cause: new AggregateError(failures),
  });
}

export async function readImageFile(path: string, what = 'Image'): Promise<RasterImage> {
  let bytes: Buffer;
  try {
    bytes = await readFile(path);
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new ResourceNotFoundError(path, what);
    }
    throw error;
  }
  return decodeImage(bytes, `${what} ${path}`);
}

/**
 * Translucent covers are flattened onto white so sampling and warping only
 * ever see solid colors.
 */
export function prepareCover(cover: RasterImage, label = 'Cover'): RasterImage {
  if (hasTranslucency(cover)) {
    console.log('Cover has transparency, flattening onto white:', label);
    return flattenOnto(cover, WHITE);
  }
  return cover;
}

export async function loadCoverImage(path: string): Promise<RasterImage> {
  return prepareCover(await readImageFile(path, 'Cover'), path);
}

export async function loadMaskImage(path: string): Promise<Mask> {
  const mask = await readImageFile(path, 'Mask');
  return toGrayscale(mask);
}

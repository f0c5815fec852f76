import sharp from 'sharp';
import { InvalidImageError } from './errors';
import { assertValidRaster, toGrayscale, toRgb, toRgba } from './raster';
import type { RasterImage } from './types';

/**
 * Resize with sharp's lanczos3 kernel, stretching to the exact target size.
 * The channel count of the input is kept. sharp premultiplies alpha while
 * resizing, so transparent pixels do not bleed their RGB into neighbours.
 */
export async function resampleImage(
  image: RasterImage,
  width: number,
  height: number
): Promise<RasterImage> {
  assertValidRaster(image, 'Resample input');
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new InvalidImageError(`Invalid resample target: ${width}x${height}`);
  }

  const input = Buffer.from(image.data.buffer, image.data.byteOffset, image.data.byteLength);
  const { data, info } = await sharp(input, {
    raw: { width: image.width, height: image.height, channels: image.channels },
  })
    .resize(width, height, { kernel: 'lanczos3', fit: 'fill' })
    .raw()
    .toBuffer({ resolveWithObject: true });

  if (info.channels !== 1 && info.channels !== 3 && info.channels !== 4) {
    throw new InvalidImageError(`Unexpected channel count after resize: ${info.channels}`);
  }

  const resized: RasterImage = {
    width: info.width,
    height: info.height,
    channels: info.channels,
    data: new Uint8ClampedArray(data),
  };

  // libvips may promote a single band; bring it back to what the caller passed in.
  if (resized.channels === image.channels) return resized;
  if (image.channels === 1) return toGrayscale(resized);
  if (image.channels === 3) return toRgb(resized);
  return toRgba(resized);
}

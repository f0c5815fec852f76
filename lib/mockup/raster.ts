import { InvalidImageError } from './errors';
import type { ChannelCount, Mask, RasterImage, RGB } from './types';

export function createRaster(
  width: number,
  height: number,
  channels: ChannelCount = 4
): RasterImage {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new InvalidImageError(`Invalid raster dimensions: ${width}x${height}`);
  }
  return {
    width,
    height,
    channels,
    data: new Uint8ClampedArray(width * height * channels),
  };
}

/**
 * Throws InvalidImageError unless the image has positive dimensions and a
 * buffer that matches them.
 */
export function assertValidRaster(image: RasterImage, label = 'Image'): void {
  const { width, height, channels, data } = image;
  if (!width || !height || width < 0 || height < 0) {
    throw new InvalidImageError(`${label} has no pixels (${width}x${height})`);
  }
  if (data.length !== width * height * channels) {
    throw new InvalidImageError(
      `${label} buffer holds ${data.length} bytes, expected ${width * height * channels}`
    );
  }
}

/** Coerce 1-, 3- or 4-channel pixels to RGBA. Returns the input when already RGBA. */
export function toRgba(image: RasterImage): RasterImage {
  if (image.channels === 4) return image;

  const { width, height, channels, data } = image;
  const out = new Uint8ClampedArray(width * height * 4);
  for (let i = 0, src = 0; i < width * height; i++, src += channels) {
    const dst = i * 4;
    if (channels === 1) {
      out[dst] = data[src];
      out[dst + 1] = data[src];
      out[dst + 2] = data[src];
    } else {
      out[dst] = data[src];
      out[dst + 1] = data[src + 1];
      out[dst + 2] = data[src + 2];
    }
    out[dst + 3] = 255;
  }
  return { width, height, channels: 4, data: out };
}

export function toRgb(image: RasterImage): RasterImage {
  if (image.channels === 3) return image;

  const { width, height, channels, data } = image;
  const out = new Uint8ClampedArray(width * height * 3);
  for (let i = 0, src = 0; i < width * height; i++, src += channels) {
    const dst = i * 3;
    out[dst] = data[src];
    out[dst + 1] = channels === 1 ? data[src] : data[src + 1];
    out[dst + 2] = channels === 1 ? data[src] : data[src + 2];
  }
  return { width, height, channels: 3, data: out };
}

/** ITU-R 601 luma. */
export function luma(r: number, g: number, b: number): number {
  return Math.round((r * 299 + g * 587 + b * 114) / 1000);
}

export function toGrayscale(image: RasterImage): Mask {
  const { width, height, channels, data } = image;
  const out = new Uint8ClampedArray(width * height);
  if (channels === 1) {
    out.set(data);
  } else {
    for (let i = 0, src = 0; i < out.length; i++, src += channels) {
      out[i] = luma(data[src], data[src + 1], data[src + 2]);
    }
  }
  return { width, height, channels: 1, data: out };
}

/**
 * Composite a possibly translucent image over a solid background.
 * The result is RGBA and fully opaque.
 */
export function flattenOnto(image: RasterImage, background: RGB): RasterImage {
  const rgba = toRgba(image);
  const { width, height, data } = rgba;
  const out = new Uint8ClampedArray(data.length);
  for (let i = 0; i < data.length; i += 4) {
    const a = data[i + 3] / 255;
    out[i] = Math.round(data[i] * a + background[0] * (1 - a));
    out[i + 1] = Math.round(data[i + 1] * a + background[1] * (1 - a));
    out[i + 2] = Math.round(data[i + 2] * a + background[2] * (1 - a));
    out[i + 3] = 255;
  }
  return { width, height, channels: 4, data: out };
}

export function hasTranslucency(image: RasterImage): boolean {
  if (image.channels !== 4) return false;
  const { data } = image;
  for (let i = 3; i < data.length; i += 4) {
    if (data[i] < 255) return true;
  }
  return false;
}

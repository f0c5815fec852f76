import { NEAR_WHITE_THRESHOLD, SAMPLE_GRID_SIZE } from './config';
import { InvalidImageError } from './errors';
import { assertValidRaster } from './raster';
import type { ColorSample, RasterImage } from './types';

export interface ColorSampleOptions {
  gridSize?: number;
  nearWhiteThreshold?: number;
}

/**
 * Nearest-neighbour reduction to a gridSize x gridSize set of RGB triples.
 * Blending filters would invent colors that never occur in the cover,
 * which defeats counting exact values.
 */
function sampleGrid(image: RasterImage, gridSize: number): Array<[number, number, number]> {
  const { width, height, channels, data } = image;
  const pixels: Array<[number, number, number]> = [];

  for (let gy = 0; gy < gridSize; gy++) {
    const y = Math.min(height - 1, Math.floor(((gy + 0.5) * height) / gridSize));
    for (let gx = 0; gx < gridSize; gx++) {
      const x = Math.min(width - 1, Math.floor(((gx + 0.5) * width) / gridSize));
      const idx = (y * width + x) * channels;
      if (channels === 1) {
        pixels.push([data[idx], data[idx], data[idx]]);
      } else {
        pixels.push([data[idx], data[idx + 1], data[idx + 2]]);
      }
    }
  }

  return pixels;
}

/**
 * Most frequent color of the cover, ignoring near-white margins.
 * Falls back to every sampled pixel when the cover is entirely near-white.
 * Ties go to the color seen first in row-major order.
 */
export function sampleDominantColor(image: RasterImage, options: ColorSampleOptions = {}): ColorSample {
  if (!image.width || !image.height || image.data.length === 0) {
    throw new InvalidImageError(`Cannot sample color from an empty image (${image.width}x${image.height})`);
  }
  assertValidRaster(image, 'Cover');

  const gridSize = options.gridSize ?? SAMPLE_GRID_SIZE;
  const threshold = options.nearWhiteThreshold ?? NEAR_WHITE_THRESHOLD;

  const pixels = sampleGrid(image, gridSize);
  const filtered = pixels.filter(([r, g, b]) => r + g + b < threshold);
  const candidates = filtered.length > 0 ? filtered : pixels;

  // Map keeps insertion order, so a strict > below keeps the first-seen color on ties.
  const counts = new Map<number, number>();
  for (const [r, g, b] of candidates) {
    const key = (r << 16) | (g << 8) | b;
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }

  let bestKey = 0;
  let bestCount = 0;
  for (const [key, count] of counts) {
    if (count > bestCount) {
      bestCount = count;
      bestKey = key;
    }
  }

  return [(bestKey >> 16) & 0xff, (bestKey >> 8) & 0xff, bestKey & 0xff];
}

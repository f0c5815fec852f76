/**
 * Mask compositing: template + warped cover layer + grayscale mask → final frame.
 */

import { CompositingFailureError } from './errors';
import { assertValidRaster, toGrayscale, toRgba } from './raster';
import { resampleImage } from './resample';
import type { Mask, RasterImage } from './types';

/** Single channel at exactly width x height. */
export async function normalizeMask(mask: RasterImage, width: number, height: number): Promise<Mask> {
  assertValidRaster(mask, 'Mask');
  const gray = toGrayscale(mask);
  if (gray.width === width && gray.height === height) return gray;

  console.log('Resizing mask to template size:', {
    from: `${gray.width}x${gray.height}`,
    to: `${width}x${height}`,
  });
  return toGrayscale(await resampleImage(gray, width, height));
}

/**
 * Per-pixel blend weighted by mask value and layer alpha:
 *   w = (mask / 255) * (layerAlpha / 255)
 *   out = template * (1 - w) + layer * w
 * A zero mask keeps the template; a full mask over an opaque layer keeps the
 * layer; transparent layer pixels keep the template.
 */
export function blendWithMask(template: RasterImage, layer: RasterImage, mask: Mask): RasterImage {
  const { width, height } = template;
  if (layer.width !== width || layer.height !== height) {
    throw new CompositingFailureError(
      `Cover layer is ${layer.width}x${layer.height} but template is ${width}x${height}`
    );
  }
  if (mask.width !== width || mask.height !== height || mask.channels !== 1) {
    throw new CompositingFailureError(
      `Mask must be single-channel ${width}x${height}, got ${mask.width}x${mask.height}x${mask.channels}`
    );
  }

  const base = toRgba(template).data;
  const top = toRgba(layer).data;
  const m = mask.data;
  const out = new Uint8ClampedArray(width * height * 4);

  for (let i = 0; i < m.length; i++) {
    const idx = i * 4;
    const w = (m[i] * top[idx + 3]) / (255 * 255);

    if (w === 0) {
      out[idx] = base[idx];
      out[idx + 1] = base[idx + 1];
      out[idx + 2] = base[idx + 2];
      out[idx + 3] = base[idx + 3];
      continue;
    }

    out[idx] = Math.round(base[idx] * (1 - w) + top[idx] * w);
    out[idx + 1] = Math.round(base[idx + 1] * (1 - w) + top[idx + 1] * w);
    out[idx + 2] = Math.round(base[idx + 2] * (1 - w) + top[idx + 2] * w);
    out[idx + 3] = Math.round(base[idx + 3] * (1 - w) + top[idx + 3] * w);
  }

  return { width, height, channels: 4, data: out };
}

export async function compositeWithMask(
  template: RasterImage,
  layer: RasterImage,
  mask: RasterImage
): Promise<RasterImage> {
  assertValidRaster(template, 'Template');
  assertValidRaster(layer, 'Cover layer');
  const normalized = await normalizeMask(mask, template.width, template.height);
  return blendWithMask(template, layer, normalized);
}

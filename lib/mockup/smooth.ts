import { SMOOTHING_SCALE } from './config';
import { resampleImage } from './resample';
import type { RasterImage } from './types';

/**
 * Soften splat edges with a lanczos round trip: up to `scale` times the size,
 * then back down. Output dimensions always equal the input's.
 */
export async function smoothWarpedLayer(
  layer: RasterImage,
  scale: number = SMOOTHING_SCALE
): Promise<RasterImage> {
  const upscaled = await resampleImage(layer, layer.width * scale, layer.height * scale);
  return resampleImage(upscaled, layer.width, layer.height);
}

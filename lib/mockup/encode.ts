import { extname } from 'path';
import { Image } from 'imagescript';
import { JPEG_QUALITY } from './config';
import { assertValidRaster, toRgba } from './raster';
import type { RasterImage } from './types';

export type ImageFormat = 'png' | 'jpeg';

export const CONTENT_TYPES: Record<ImageFormat, string> = {
  png: 'image/png',
  jpeg: 'image/jpeg',
};

export function imageFormatFromPath(path: string): ImageFormat {
  const ext = extname(path).toLowerCase();
  return ext === '.jpg' || ext === '.jpeg' ? 'jpeg' : 'png';
}

export async function encodeImage(image: RasterImage, format: ImageFormat = 'png'): Promise<Uint8Array> {
  assertValidRaster(image, 'Output image');
  const rgba = toRgba(image);

  const output = new Image(rgba.width, rgba.height);
  output.bitmap.set(rgba.data);

  return format === 'jpeg' ? output.encodeJPEG(JPEG_QUALITY) : output.encode();
}

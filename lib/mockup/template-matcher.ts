import { NoTemplatesAvailableError } from './errors';
import type { ColorSample, RGB, TemplateEntry } from './types';

export function colorDistance(a: RGB, b: RGB): number {
  const dr = a[0] - b[0];
  const dg = a[1] - b[1];
  const db = a[2] - b[2];
  return Math.sqrt(dr * dr + dg * dg + db * db);
}

/**
 * Nearest template by Euclidean RGB distance.
 * On equal distances the earlier palette entry wins.
 */
export function matchTemplate(sample: ColorSample, palette: readonly TemplateEntry[]): TemplateEntry {
  if (palette.length === 0) {
    throw new NoTemplatesAvailableError();
  }

  let best = palette[0];
  let bestDistance = colorDistance(sample, best.color);

  for (let i = 1; i < palette.length; i++) {
    const distance = colorDistance(sample, palette[i].color);
    if (distance < bestDistance) {
      bestDistance = distance;
      best = palette[i];
    }
  }

  return best;
}

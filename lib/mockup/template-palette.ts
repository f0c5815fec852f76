import { join } from 'path';
import type { ColorSample, TemplateEntry } from './types';

export interface TemplateColor {
  readonly name: string;
  readonly color: ColorSample;
  readonly file: string;
}

// Representative cover color of each photographed blank book.
export const DEFAULT_TEMPLATE_COLORS: readonly TemplateColor[] = [
  { name: 'black', color: [30, 30, 30], file: 'black.png' },
  { name: 'blue', color: [70, 130, 180], file: 'blue.png' },
  { name: 'green', color: [60, 120, 60], file: 'green.png' },
  { name: 'red', color: [180, 60, 60], file: 'red.png' },
  { name: 'grey', color: [120, 120, 120], file: 'grey.png' },
  { name: 'white', color: [240, 240, 240], file: 'white.png' },
];

/**
 * Resolve the template table against a directory. The returned palette is
 * frozen; declaration order is kept because the matcher breaks ties with it.
 */
export function createTemplatePalette(
  templatesDir: string,
  colors: readonly TemplateColor[] = DEFAULT_TEMPLATE_COLORS
): readonly TemplateEntry[] {
  const seen = new Set<string>();
  const entries: TemplateEntry[] = [];

  for (const { name, color, file } of colors) {
    if (seen.has(name)) {
      throw new Error(`Duplicate book template name: ${name}`);
    }
    seen.add(name);
    entries.push(Object.freeze({ name, color, path: join(templatesDir, file) }));
  }

  return Object.freeze(entries);
}

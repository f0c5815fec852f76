/**
 * Pipeline data formats.
 * Pixels are row-major and interleaved, the same layout as ImageData.data
 * when `channels` is 4.
 */

export type ChannelCount = 1 | 3 | 4;

export interface RasterImage {
  width: number;
  height: number;
  channels: ChannelCount;
  data: Uint8ClampedArray;
}

/** Single-channel opacity map: 0 keeps the template, 255 shows the cover. */
export type Mask = RasterImage & { channels: 1 };

export type RGB = readonly [number, number, number];

/** Dominant color of one cover. */
export type ColorSample = RGB;

export interface TemplateEntry {
  readonly name: string;
  /** Canonical color used for matching. */
  readonly color: ColorSample;
  /** Absolute or cwd-relative path of the template image. */
  readonly path: string;
}

export type Point = readonly [number, number];

/** Destination face of the book in template pixel coordinates. */
export interface QuadRegion {
  readonly tl: Point;
  readonly tr: Point;
  readonly br: Point;
  readonly bl: Point;
}

export interface WarpOptions {
  /** Fraction trimmed from each side of the source before mapping (default 0.02). */
  edgeExpansion?: number;
  /** Fixed splat radius in pixels; derived from the sampling step when omitted. */
  splatRadius?: number;
}

export interface CompositeResult {
  image: RasterImage;
  template: TemplateEntry;
  dominantColor: ColorSample;
  /** Fraction of pixels inside the quad that the warp filled. */
  coverage: number;
  outputPath?: string;
}

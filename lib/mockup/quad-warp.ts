/**
 * Quad warp stage: forward-maps every cover pixel onto the book face.
 *
 * Mapping is two-stage bilinear: a point is interpolated along the top and
 * bottom edges with the x ratio, then between those two points with the y
 * ratio. That handles a face whose right edge is taller than its left, which an
 * affine transform cannot.
 *
 * Forward mapping leaves holes when the cover is coarser than the face, so each
 * source pixel is splatted over a small box sized from the destination step.
 */

import { WARP_EDGE_EXPANSION } from './config';
import { assertValidRaster, createRaster } from './raster';
import type { Point, QuadRegion, RasterImage, WarpOptions } from './types';

export interface SplatRadius {
  x: number;
  y: number;
}

/**
 * Trim `expansion` from each side of the unit interval and stretch the rest
 * back to [0, 1], so the outermost cover pixels land on the quad's edges.
 */
export function expandRatio(ratio: number, expansion: number = WARP_EDGE_EXPANSION): number {
  const expanded = (ratio - expansion) / (1 - 2 * expansion);
  return Math.max(0, Math.min(1, expanded));
}

/** Bilinear point inside the quad for u, v in [0, 1]. */
export function quadPoint(quad: QuadRegion, u: number, v: number): [number, number] {
  const { tl, tr, br, bl } = quad;

  const topX = tl[0] + u * (tr[0] - tl[0]);
  const topY = tl[1] + u * (tr[1] - tl[1]);
  const bottomX = bl[0] + u * (br[0] - bl[0]);
  const bottomY = bl[1] + u * (br[1] - bl[1]);

  return [topX + v * (bottomX - topX), topY + v * (bottomY - topY)];
}

/** Destination pixel for a source position given as ratios of the cover size. */
export function mapRatioToQuad(
  xRatio: number,
  yRatio: number,
  quad: QuadRegion,
  expansion: number = WARP_EDGE_EXPANSION
): [number, number] {
  const [x, y] = quadPoint(quad, expandRatio(xRatio, expansion), expandRatio(yRatio, expansion));
  return [Math.trunc(x), Math.trunc(y)];
}

/**
 * Splat half-extent per axis. Adjacent source columns land at most
 * `colStep` apart and adjacent rows at most `rowStep` apart, so a box of
 * half their sum around every landing point leaves no hole inside the quad.
 * A cover at least as dense as the face gets the minimum radius of 1.
 */
export function computeSplatRadius(
  quad: QuadRegion,
  sourceWidth: number,
  sourceHeight: number,
  expansion: number = WARP_EDGE_EXPANSION
): SplatRadius {
  const { tl, tr, br, bl } = quad;
  const stretch = 1 / (1 - 2 * expansion);

  const colStepX = (Math.max(Math.abs(tr[0] - tl[0]), Math.abs(br[0] - bl[0])) * stretch) / sourceWidth;
  const colStepY = (Math.max(Math.abs(tr[1] - tl[1]), Math.abs(br[1] - bl[1])) * stretch) / sourceWidth;
  const rowStepX = (Math.max(Math.abs(bl[0] - tl[0]), Math.abs(br[0] - tr[0])) * stretch) / sourceHeight;
  const rowStepY = (Math.max(Math.abs(bl[1] - tl[1]), Math.abs(br[1] - tr[1])) * stretch) / sourceHeight;

  return {
    x: Math.max(1, Math.ceil((colStepX + rowStepX) / 2)),
    y: Math.max(1, Math.ceil((colStepY + rowStepY) / 2)),
  };
}

export function isDegenerateQuad(quad: QuadRegion): boolean {
  const xs = [quad.tl[0], quad.tr[0], quad.br[0], quad.bl[0]];
  const ys = [quad.tl[1], quad.tr[1], quad.br[1], quad.bl[1]];
  return Math.max(...xs) === Math.min(...xs) || Math.max(...ys) === Math.min(...ys);
}

// Point-in-quad via the sign of the cross product against each edge.
export function isPointInQuad(x: number, y: number, quad: QuadRegion): boolean {
  const sign = (p1: Point, p2: Point, p3: Point) => {
    return (p1[0] - p3[0]) * (p2[1] - p3[1]) - (p2[0] - p3[0]) * (p1[1] - p3[1]);
  };

  const pt: Point = [x, y];
  const d1 = sign(pt, quad.tl, quad.tr);
  const d2 = sign(pt, quad.tr, quad.br);
  const d3 = sign(pt, quad.br, quad.bl);
  const d4 = sign(pt, quad.bl, quad.tl);

  const hasNeg = d1 < 0 || d2 < 0 || d3 < 0 || d4 < 0;
  const hasPos = d1 > 0 || d2 > 0 || d3 > 0 || d4 > 0;

  return !(hasNeg && hasPos);
}

/** Fraction of canvas pixels inside the quad that hold any opacity. */
export function measureQuadCoverage(layer: RasterImage, quad: QuadRegion): number {
  const xs = [quad.tl[0], quad.tr[0], quad.br[0], quad.bl[0]];
  const ys = [quad.tl[1], quad.tr[1], quad.br[1], quad.bl[1]];
  const minX = Math.max(0, Math.floor(Math.min(...xs)));
  const maxX = Math.min(layer.width - 1, Math.ceil(Math.max(...xs)));
  const minY = Math.max(0, Math.floor(Math.min(...ys)));
  const maxY = Math.min(layer.height - 1, Math.ceil(Math.max(...ys)));

  let inside = 0;
  let filled = 0;
  for (let y = minY; y <= maxY; y++) {
    for (let x = minX; x <= maxX; x++) {
      if (!isPointInQuad(x, y, quad)) continue;
      inside++;
      if (layer.data[(y * layer.width + x) * layer.channels + (layer.channels - 1)] > 0) {
        filled++;
      }
    }
  }

  return inside === 0 ? 0 : filled / inside;
}

/**
 * Warp the cover into `quad` on a transparent canvas of the given size.
 * Landing points outside the canvas are skipped, and every splat write is
 * bounds-checked. A quad with no width or no height yields an empty canvas.
 */
export function warpCoverToQuad(
  cover: RasterImage,
  quad: QuadRegion,
  canvasWidth: number,
  canvasHeight: number,
  options: WarpOptions = {}
): RasterImage {
  assertValidRaster(cover, 'Cover');
  const layer = createRaster(canvasWidth, canvasHeight, 4);

  if (isDegenerateQuad(quad)) {
    console.log('Quad has no area, skipping warp:', quad);
    return layer;
  }

  const expansion = options.edgeExpansion ?? WARP_EDGE_EXPANSION;
  if (!(expansion >= 0 && expansion < 0.5)) {
    throw new Error(`edgeExpansion must be in [0, 0.5), got ${expansion}`);
  }

  const pinned = options.splatRadius;
  if (pinned !== undefined && !(Number.isFinite(pinned) && pinned >= 0)) {
    throw new Error(`splatRadius must be a finite number >= 0, got ${pinned}`);
  }
  const radius: SplatRadius =
    pinned !== undefined
      ? { x: Math.floor(pinned), y: Math.floor(pinned) }
      : computeSplatRadius(quad, cover.width, cover.height, expansion);

  const { width: srcWidth, height: srcHeight, channels, data: src } = cover;
  const out = layer.data;

  for (let sy = 0; sy < srcHeight; sy++) {
    for (let sx = 0; sx < srcWidth; sx++) {
      const [destX, destY] = mapRatioToQuad(sx / srcWidth, sy / srcHeight, quad, expansion);
      if (destX < 0 || destX >= canvasWidth || destY < 0 || destY >= canvasHeight) continue;

      const srcIdx = (sy * srcWidth + sx) * channels;
      const r = src[srcIdx];
      const g = channels === 1 ? r : src[srcIdx + 1];
      const b = channels === 1 ? r : src[srcIdx + 2];

      for (let oy = -radius.y; oy <= radius.y; oy++) {
        const y = destY + oy;
        if (y < 0 || y >= canvasHeight) continue;
        const rowBase = y * canvasWidth;

        for (let ox = -radius.x; ox <= radius.x; ox++) {
          const x = destX + ox;
          if (x < 0 || x >= canvasWidth) continue;

          const dst = (rowBase + x) * 4;
          out[dst] = r;
          out[dst + 1] = g;
          out[dst + 2] = b;
          out[dst + 3] = 255; // opaque regardless of the source alpha
        }
      }
    }
  }

  return layer;
}

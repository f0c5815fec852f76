import type { QuadRegion } from './types';

// Color sampling
export const SAMPLE_GRID_SIZE = 50;
export const NEAR_WHITE_THRESHOLD = 700; // R+G+B at or above this is treated as margin

// Warping - both values are empirical and tunable
export const WARP_EDGE_EXPANSION = 0.02;

// Smoothing: upscale factor for the lanczos round trip
export const SMOOTHING_SCALE = 2;

export const JPEG_QUALITY = 92;
export const DEFAULT_OUTPUT_SUFFIX = '_book';

/**
 * Front face of the book, measured on the reference template.
 * The right edge is taller than the left: the book is photographed at an angle,
 * so bottom-right sits 130px lower than bottom-left.
 */
export const BOOK_FACE_QUAD: QuadRegion = {
  tl: [614, 374],
  tr: [1200, 286],
  br: [1200, 1860],
  bl: [614, 1730],
};

const DEFAULT_CONCURRENCY = 2;
const MAX_CONCURRENCY = 16;

export interface MockupConfig {
  templatesDir: string;
  maskPath: string;
  outputSuffix: string;
  concurrency: number;
  storageBucket: string;
}

function resolveConcurrency(raw: string | undefined): number {
  const parsed = Number(raw);
  if (!raw || !Number.isFinite(parsed) || parsed < 1) return DEFAULT_CONCURRENCY;
  return Math.min(MAX_CONCURRENCY, Math.floor(parsed));
}

export function loadMockupConfig(env: NodeJS.ProcessEnv = process.env): MockupConfig {
  return {
    templatesDir: env.MOCKUP_TEMPLATES_DIR || 'assets/mockup/templates',
    maskPath: env.MOCKUP_MASK_PATH || 'assets/mockup/cover-mask.png',
    outputSuffix: env.MOCKUP_OUTPUT_SUFFIX ?? DEFAULT_OUTPUT_SUFFIX,
    concurrency: resolveConcurrency(env.MOCKUP_CONCURRENCY),
    storageBucket: env.MOCKUP_STORAGE_BUCKET || 'mockup-outputs',
  };
}

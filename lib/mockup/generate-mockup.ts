/**
 * Orchestrator: cover → dominant color → template → warp → smooth → composite → write.
 * Each call owns every buffer it creates; nothing is shared between covers
 * except the read-only palette and the asset loader's decoded templates.
 */

import { mkdir, rename, unlink, writeFile } from 'fs/promises';
import { basename, dirname, extname, join } from 'path';
import { sampleDominantColor } from './color-sampler';
import { compositeWithMask } from './composite';
import { BOOK_FACE_QUAD, DEFAULT_OUTPUT_SUFFIX } from './config';
import { loadCoverImage, loadMaskImage, readImageFile } from './decode';
import { CONTENT_TYPES, encodeImage, imageFormatFromPath, type ImageFormat } from './encode';
import { CompositingFailureError, errorMessage, isMissingFileError, isMockupError } from './errors';
import { measureQuadCoverage, warpCoverToQuad } from './quad-warp';
import { smoothWarpedLayer } from './smooth';
import { matchTemplate } from './template-matcher';
import type {
  ColorSample,
  CompositeResult,
  Mask,
  QuadRegion,
  RasterImage,
  TemplateEntry,
  WarpOptions,
} from './types';

export interface TemplateSelection {
  dominantColor: ColorSample;
  template: TemplateEntry;
}

export function selectTemplate(cover: RasterImage, palette: readonly TemplateEntry[]): TemplateSelection {
  const dominantColor = sampleDominantColor(cover);
  const template = matchTemplate(dominantColor, palette);
  return { dominantColor, template };
}

/**
 * Pure compositing for an already-chosen template: no file access.
 * The warp is laid out on a canvas the size of the template.
 */
export async function composeMockup(
  cover: RasterImage,
  template: RasterImage,
  mask: RasterImage,
  quad: QuadRegion = BOOK_FACE_QUAD,
  options: WarpOptions = {}
): Promise<{ image: RasterImage; coverage: number }> {
  const warped = warpCoverToQuad(cover, quad, template.width, template.height, options);
  const coverage = measureQuadCoverage(warped, quad);
  const smoothed = await smoothWarpedLayer(warped);
  const image = await compositeWithMask(template, smoothed, mask);
  return { image, coverage };
}

export interface AssetLoader {
  loadTemplate(entry: TemplateEntry): Promise<RasterImage>;
  loadMask(path: string): Promise<Mask>;
}

// A failed load is forgotten, so a file that appears later is picked up.
function loadOnce<T>(cache: Map<string, Promise<T>>, key: string, load: () => Promise<T>): Promise<T> {
  const cached = cache.get(key);
  if (cached) return cached;

  const pending = load();
  cache.set(key, pending);
  pending.catch(() => {
    if (cache.get(key) === pending) cache.delete(key);
  });
  return pending;
}

/** Decodes each template and mask once; later callers get the same promise. */
export function createAssetLoader(): AssetLoader {
  const templates = new Map<string, Promise<RasterImage>>();
  const masks = new Map<string, Promise<Mask>>();

  return {
    loadTemplate(entry) {
      return loadOnce(templates, entry.path, () => readImageFile(entry.path, 'Template'));
    },
    loadMask(path) {
      return loadOnce(masks, path, () => loadMaskImage(path));
    },
  };
}

export function resolveOutputPath(
  coverPath: string,
  outputDir: string,
  suffix: string,
  template: TemplateEntry
): string {
  const coverName = basename(coverPath, extname(coverPath));
  const ext = extname(template.path) || '.png';
  return join(outputDir, `${coverName}${suffix}${ext}`);
}

async function writeFileAtomic(path: string, bytes: Uint8Array): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tempPath = `${path}.${process.pid}.${Date.now()}.tmp`;
  try {
    await writeFile(tempPath, bytes);
    await rename(tempPath, path);
  } catch (error) {
    await unlink(tempPath).catch((cleanupError: unknown) => {
      if (!isMissingFileError(cleanupError)) {
        console.warn('Could not remove temporary file:', tempPath, cleanupError);
      }
    });
    throw error;
  }
}

export interface RenderOptions {
  palette: readonly TemplateEntry[];
  maskPath: string;
  quad?: QuadRegion;
  warp?: WarpOptions;
  assets?: AssetLoader;
}

export interface RenderedMockup extends CompositeResult {
  bytes: Uint8Array;
  format: ImageFormat;
  contentType: string;
}

/**
 * Run every stage for one decoded cover and encode the result in the
 * selected template's format. Nothing is written.
 */
export async function renderBookMockup(cover: RasterImage, options: RenderOptions): Promise<RenderedMockup> {
  const assets = options.assets ?? createAssetLoader();
  const quad = options.quad ?? BOOK_FACE_QUAD;

  console.log('Cover size:', cover.width, 'x', cover.height);

  const { dominantColor, template } = selectTemplate(cover, options.palette);
  console.log('Selected book template:', { template: template.name, dominantColor });

  const [templateImage, mask] = await Promise.all([
    assets.loadTemplate(template),
    assets.loadMask(options.maskPath),
  ]);
  console.log('Template size:', templateImage.width, 'x', templateImage.height);

  try {
    const { image, coverage } = await composeMockup(cover, templateImage, mask, quad, options.warp);
    console.log('Cover warp complete:', { coverage: `${(coverage * 100).toFixed(1)}%` });

    const format = imageFormatFromPath(template.path);
    const bytes = await encodeImage(image, format);

    return {
      image,
      template,
      dominantColor,
      coverage,
      bytes,
      format,
      contentType: CONTENT_TYPES[format],
    };
  } catch (error) {
    if (isMockupError(error)) throw error;
    throw new CompositingFailureError(`Compositing failed: ${errorMessage(error)}`, { cause: error });
  }
}

export interface GenerateMockupRequest extends RenderOptions {
  coverPath: string;
  outputDir: string;
  outputSuffix?: string;
}

/**
 * Produce one mockup file for one cover. The output is written only after
 * every stage has succeeded, and never left half-written.
 */
export async function generateBookMockup(request: GenerateMockupRequest): Promise<CompositeResult> {
  console.log('Generating mockup...', { cover: request.coverPath });

  const cover = await loadCoverImage(request.coverPath);
  const rendered = await renderBookMockup(cover, request);

  const outputPath = resolveOutputPath(
    request.coverPath,
    request.outputDir,
    request.outputSuffix ?? DEFAULT_OUTPUT_SUFFIX,
    rendered.template
  );

  try {
    await writeFileAtomic(outputPath, rendered.bytes);
  } catch (error) {
    throw new CompositingFailureError(`Failed to write mockup ${outputPath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  console.log('Mockup written:', outputPath);

  return {
    image: rendered.image,
    template: rendered.template,
    dominantColor: rendered.dominantColor,
    coverage: rendered.coverage,
    outputPath,
  };
}

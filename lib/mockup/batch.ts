import type { Dirent } from 'fs';
import { mkdir, readdir } from 'fs/promises';
import { basename, extname, join } from 'path';
import { DEFAULT_OUTPUT_SUFFIX } from './config';
import { ResourceNotFoundError, errorMessage, isMissingFileError } from './errors';
import { createAssetLoader, generateBookMockup, type AssetLoader } from './generate-mockup';
import type { QuadRegion, TemplateEntry, WarpOptions } from './types';

export const COVER_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.bmp', '.webp', '.tif', '.tiff', '.gif'];

export async function findCoverFiles(coversDir: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(coversDir, { withFileTypes: true });
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new ResourceNotFoundError(coversDir, 'Covers directory');
    }
    throw error;
  }

  return entries
    .filter((entry) => entry.isFile() && COVER_EXTENSIONS.includes(extname(entry.name).toLowerCase()))
    .map((entry) => entry.name)
    .sort()
    .map((name) => join(coversDir, name));
}

export interface BatchFailure {
  coverPath: string;
  message: string;
  code?: string;
}

export interface BatchSummary {
  total: number;
  successful: number;
  failed: number;
  outputs: string[];
  failures: BatchFailure[];
  /** Base names shared by several covers, whose mockups overwrite each other. */
  duplicateNames: string[];
}

export interface BatchOptions {
  coversDir: string;
  outputDir: string;
  palette: readonly TemplateEntry[];
  maskPath: string;
  quad?: QuadRegion;
  warp?: WarpOptions;
  outputSuffix?: string;
  concurrency?: number;
  assets?: AssetLoader;
  onProgress?: (processed: number, total: number) => void;
}

function findDuplicateNames(covers: readonly string[]): Map<string, string[]> {
  const byName = new Map<string, string[]>();
  for (const cover of covers) {
    const name = basename(cover, extname(cover));
    byName.set(name, [...(byName.get(name) ?? []), cover]);
  }
  return new Map([...byName].filter(([, paths]) => paths.length > 1));
}

/**
 * Generate a mockup for every cover in a directory.
 * Covers run through a small worker queue; a failing cover is logged and
 * counted, and the rest of the batch carries on.
 */
export async function runMockupBatch(options: BatchOptions): Promise<BatchSummary> {
  const covers = await findCoverFiles(options.coversDir);
  const summary: BatchSummary = {
    total: covers.length,
    successful: 0,
    failed: 0,
    outputs: [],
    failures: [],
    duplicateNames: [],
  };

  if (covers.length === 0) {
    console.log(`No cover files found in ${options.coversDir}`);
    return summary;
  }

  await mkdir(options.outputDir, { recursive: true });

  console.log(`Found ${covers.length} cover files to process:`);
  for (const cover of covers) {
    console.log(`  - ${basename(cover)}`);
  }

  for (const [name, paths] of findDuplicateNames(covers)) {
    summary.duplicateNames.push(name);
    console.warn(`Covers share the base name "${name}" and write the same mockup:`, paths);
  }

  const assets = options.assets ?? createAssetLoader();
  const queue = covers.slice();
  const workerCount = Math.max(1, Math.min(options.concurrency ?? 1, queue.length));
  let processed = 0;

  const workers = Array.from({ length: workerCount }, async () => {
    while (queue.length > 0) {
      const coverPath = queue.shift();
      if (!coverPath) continue;

      try {
        const result = await generateBookMockup({
          coverPath,
          outputDir: options.outputDir,
          outputSuffix: options.outputSuffix ?? DEFAULT_OUTPUT_SUFFIX,
          palette: options.palette,
          maskPath: options.maskPath,
          quad: options.quad,
          warp: options.warp,
          assets,
        });
        summary.successful += 1;
        if (result.outputPath) summary.outputs.push(result.outputPath);
        console.log(`✅ Successfully generated: ${result.outputPath}`);
      } catch (error) {
        summary.failed += 1;
        summary.failures.push({
          coverPath,
          message: errorMessage(error),
          code: error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined,
        });
        console.error(`❌ Failed to process ${coverPath}:`, errorMessage(error));
      } finally {
        processed += 1;
        options.onProgress?.(processed, covers.length);
      }
    }
  });

  await Promise.all(workers);

  summary.outputs.sort();
  console.log('BATCH PROCESSING COMPLETE', {
    successful: summary.successful,
    failed: summary.failed,
    duplicateNames: summary.duplicateNames.length,
    outputDir: options.outputDir,
  });

  return summary;
}

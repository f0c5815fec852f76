/**
 * Generate a book mockup for every cover in a directory.
 *
 *   npm run batch -- [coversDir] [outputDir]
 *
 * Templates, mask, suffix and concurrency come from MOCKUP_* environment variables.
 */

import { runMockupBatch } from '../lib/mockup/batch';
import { loadMockupConfig } from '../lib/mockup/config';
import { errorMessage } from '../lib/mockup/errors';
import { createTemplatePalette } from '../lib/mockup/template-palette';

const DEFAULT_COVERS_DIR = 'covers';
const DEFAULT_OUTPUT_DIR = 'generated_books';

async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const [coversDir = DEFAULT_COVERS_DIR, outputDir = DEFAULT_OUTPUT_DIR] = argv;
  const config = loadMockupConfig();

  console.log('Starting batch mockup generation', {
    coversDir,
    outputDir,
    templatesDir: config.templatesDir,
    maskPath: config.maskPath,
    concurrency: config.concurrency,
  });

  const summary = await runMockupBatch({
    coversDir,
    outputDir,
    palette: createTemplatePalette(config.templatesDir),
    maskPath: config.maskPath,
    outputSuffix: config.outputSuffix,
    concurrency: config.concurrency,
  });

  console.log(`Successfully processed: ${summary.successful}`);
  console.log(`Failed: ${summary.failed}`);
  for (const failure of summary.failures) {
    console.log(`  - ${failure.coverPath}: ${failure.message}`);
  }

  return summary.failed > 0 ? 1 : 0;
}

main()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error('Batch processing failed:', errorMessage(error));
    process.exitCode = 1;
  });

/**
 * One-shot Batch Runner
 *
 * Classifies every file below the input folder (argv[2] or INPUT_FOLDER)
 * sequentially, without Redis, and logs per-category counts at the end.
 */

import fs from 'fs';
import {
  config,
  logger,
  getCorrelationId,
  runWithContextAsync,
  RecognitionOrchestrator,
} from '@triage/shared';
import { SharpImageSource } from './lib/image-source';
import { TesseractEngine } from './lib/tesseract';
import { ensureCategoryFolders } from './lib/filing';
import { processDirectory } from './lib/process-document';

async function runBatch(inputFolder: string): Promise<void> {
  if (!fs.existsSync(inputFolder)) {
    throw new Error(`Input folder not found: ${inputFolder}`);
  }

  ensureCategoryFolders(config.uploadFolder);
  logger.info('Processing files', { inputFolder, uploadFolder: config.uploadFolder });

  const { results, counts } = await processDirectory(inputFolder, {
    classifier: new RecognitionOrchestrator({
      imageSource: new SharpImageSource(),
      engine: new TesseractEngine(),
    }),
    filing: { uploadRoot: config.uploadFolder },
  });

  logger.info('Batch completed', {
    total: results.length,
    counts: Object.fromEntries(counts.map(({ category, count }) => [category, count])),
  });
}

runWithContextAsync({ correlationId: getCorrelationId() }, () =>
  runBatch(process.argv[2] || config.inputFolder)
)
  .then(() => process.exit(0))
  .catch((error) => {
    logger.error('Batch failed', error);
    process.exit(1);
  });

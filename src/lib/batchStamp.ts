import type { StampResolution } from '@/types/stamp';
import { createPlacementStore } from '@/store/placementStore';
import { autoOutputPath, validateConfig, type StampConfig } from './config';
import { ConfigError, type DegradedResolution } from './errors';
import { createLogger } from './logger';
import { fileExists, writeOutputAtomically } from './outputFile';
import { splicePage } from './pageSplice';
import { PdfLibEngine, type PagedDocumentEngine } from './pdfManipulation';
import { prepareStampJob } from './stampJob';

const log = createLogger('BATCH');

export interface StampPdfResult {
  outputPath: string;
  pageNumber: number;
  resolution: StampResolution;
  diagnostic: DegradedResolution | null;
}

export interface StampPdfDeps {
  engine?: PagedDocumentEngine;
}

/**
 * Decide where the output goes. Without an explicit output an existing file at the
 * default path is never replaced unless `overwrite` is set.
 */
export async function resolveOutputPath(config: StampConfig): Promise<string> {
  if (config.output) return config.output;
  const outputPath = autoOutputPath(config.input);
  if (!config.overwrite && (await fileExists(outputPath))) {
    throw new ConfigError(`No output given. Not overriding ${outputPath}`);
  }
  return outputPath;
}

/** Non-interactive run: stamp the configured page and write the result. */
export async function stampPdf(config: StampConfig, deps: StampPdfDeps = {}): Promise<StampPdfResult> {
  validateConfig(config);
  const engine = deps.engine ?? new PdfLibEngine();
  const outputPath = await resolveOutputPath(config);

  const job = await prepareStampJob(config, engine);
  const placement = createPlacementStore({
    positionMM: { x: config.x, y: config.y },
    scale: config.scale,
  });

  const bytes = await splicePage({
    engine,
    document: job.document,
    pageNumber: job.pageNumber,
    numPages: job.numPages,
    geometry: job.geometry,
    placement,
    resolution: job.resolution,
    stamp: job.stamp,
  });
  await writeOutputAtomically(outputPath, bytes);
  log.info(`Stamped page ${job.pageNumber} of ${job.numPages}`);

  return {
    outputPath,
    pageNumber: job.pageNumber,
    resolution: job.resolution,
    diagnostic: job.diagnostic,
  };
}

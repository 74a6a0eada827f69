import type { PageGeometry, StampImage, StampResolution } from '@/types/stamp';
import type { StampConfig } from './config';
import { ResourceError, describeCause, type DegradedResolution } from './errors';
import { decodeStamp } from './imageMetadata';
import { createLogger } from './logger';
import { readInputFile } from './outputFile';
import { resolvePageIndex } from './pageSplice';
import type { PagedDocumentEngine } from './pdfManipulation';
import { resolveStampDensity } from './stampResolution';

const log = createLogger('JOB');

/** Everything read once at startup and immutable afterwards. */
export interface StampJob {
  document: Uint8Array;
  stamp: StampImage;
  resolution: StampResolution;
  diagnostic: DegradedResolution | null;
  numPages: number;
  pageNumber: number;
  geometry: PageGeometry;
}

/**
 * Load the document and stamp named by `config` and resolve everything the splice
 * needs. Fails with ResourceError or ConfigError before anything is written.
 */
export async function prepareStampJob(config: StampConfig, engine: PagedDocumentEngine): Promise<StampJob> {
  const document = await readInputFile(config.input, 'PDF input');
  const stampBytes = await readInputFile(config.stamp, 'stamp image');

  const stamp = await decodeStamp(stampBytes);
  const { resolution, diagnostic } = resolveStampDensity(stampBytes, { densityOverride: config.stampDpi });

  let numPages: number;
  try {
    numPages = await engine.pageCount(document);
  } catch (error) {
    throw new ResourceError(`Cannot read PDF "${config.input}": ${describeCause(error)}`, { cause: error });
  }
  if (numPages < 1) {
    throw new ResourceError(`PDF "${config.input}" is empty`);
  }

  const pageNumber = resolvePageIndex(config.page, numPages);
  const geometry = await engine.pageGeometry(document, pageNumber);
  log.info(`PDF page size is W ${geometry.widthMM.toFixed(1)} mm, H ${geometry.heightMM.toFixed(1)} mm`, {
    pageNumber,
    numPages,
  });

  return { document, stamp, resolution, diagnostic, numPages, pageNumber, geometry };
}

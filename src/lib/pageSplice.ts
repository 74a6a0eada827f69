import type { PageGeometry, StampImage, StampResolution } from '@/types/stamp';
import type { PlacementStoreApi } from '@/store/placementStore';
import { CollaboratorError, ConfigError, StateLockedError, type SpliceStep } from './errors';
import { createLogger } from './logger';
import type { PagedDocumentEngine } from './pdfManipulation';
import { overlayRect } from './stampOverlay';

const log = createLogger('SPLICE');

/**
 * Resolve a user page number to a 1-based page.
 *
 * Negative numbers count from the end as `numPages - |page|`, so `-1` is the
 * second-to-last page. Zero and pages outside the document are rejected.
 */
export function resolvePageIndex(page: number, numPages: number): number {
  if (!Number.isInteger(page) || page === 0) {
    throw new ConfigError(`Page must be a non-zero integer, got ${page}`);
  }
  const pageNumber = page > 0 ? page : numPages - Math.abs(page);
  if (pageNumber < 1 || pageNumber > numPages) {
    throw new ConfigError(`Page ${page} is outside the document (${numPages} pages)`);
  }
  return pageNumber;
}

export interface SplicePageParams {
  engine: PagedDocumentEngine;
  document: Uint8Array;
  /** 1-based page number, already resolved */
  pageNumber: number;
  numPages: number;
  geometry: PageGeometry;
  placement: PlacementStoreApi;
  resolution: StampResolution;
  stamp: StampImage;
}

async function step<T>(name: SpliceStep, run: () => Promise<T>): Promise<T> {
  log.debug(`Running ${name}`);
  try {
    return await run();
  } catch (error) {
    throw new CollaboratorError(name, error);
  }
}

/**
 * Replace one page of `document` with a stamped copy and return the full document.
 *
 * The placement is read once as a snapshot and the store stays locked until the splice
 * finishes, so input arriving meanwhile cannot change what gets written.
 */
export async function splicePage(params: SplicePageParams): Promise<Uint8Array> {
  const { engine, document, pageNumber, numPages, geometry, placement, resolution, stamp } = params;

  if (placement.getState().locked) {
    throw new StateLockedError('A splice is already in progress');
  }
  placement.getState().lock();

  try {
    const snapshot = placement.getState().snapshot();
    const rect = overlayRect(snapshot, resolution, stamp, geometry);
    log.debug('Stamp rectangle', { pageNumber, ...rect });

    const target = await step('extract-target', () => engine.extractRange(document, pageNumber, pageNumber));
    const overlay = await step('draw-overlay', () => engine.drawImageOverlay(geometry, stamp, rect));
    const stamped = await step('merge-overlay', () => engine.mergeOverlay(target, overlay));

    if (numPages === 1) {
      return stamped;
    }

    const parts: Uint8Array[] = [];
    if (pageNumber > 1) {
      parts.push(await step('extract-before', () => engine.extractRange(document, 1, pageNumber - 1)));
    }
    parts.push(stamped);
    if (pageNumber < numPages) {
      parts.push(await step('extract-after', () => engine.extractRange(document, pageNumber + 1, numPages)));
    }

    return await step('concatenate', () => engine.concatenate(parts));
  } finally {
    placement.getState().unlock();
  }
}

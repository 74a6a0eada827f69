import { PDFDict, PDFDocument, PDFName } from 'pdf-lib';
import { describe, expect, it, vi } from 'vitest';
import type { StampImage, StampResolution } from '@/types/stamp';
import { createPlacementStore } from '@/store/placementStore';
import { pixelAt } from '@/test/canvas';
import { makeMarkedPdf, makePdf, makePng, pageContents, pageWidths, type MarkedPage } from '@/test/fixtures';
import { CollaboratorError, ConfigError, StateLockedError } from './errors';
import { resolvePageIndex, splicePage } from './pageSplice';
import { PdfjsPreviewRenderer } from './pdfLoader';
import { PdfLibEngine } from './pdfManipulation';
import { pageGeometryFromBox } from './units';

const stamp: StampImage = { bytes: makePng({ width: 4, height: 4 }), format: 'png', pixelWidth: 4, pixelHeight: 4 };
const resolution: StampResolution = { densityPerInch: 72, source: 'explicit' };

async function stampedPages(bytes: Uint8Array): Promise<boolean[]> {
  const pdfDoc = await PDFDocument.load(bytes);
  return pdfDoc
    .getPages()
    .map(page => page.node.Resources()?.lookupMaybe(PDFName.of('XObject'), PDFDict) !== undefined);
}

async function spliceParams(widths: number[], pageNumber: number) {
  const document = await makePdf(widths.map((width): [number, number] => [width, 200]));
  return {
    engine: new PdfLibEngine(),
    document,
    pageNumber,
    numPages: widths.length,
    geometry: pageGeometryFromBox({ x: 0, y: 0, width: widths[pageNumber - 1], height: 200 }),
    placement: createPlacementStore({ positionMM: { x: 10, y: 10 } }),
    resolution,
    stamp,
  };
}

describe('resolvePageIndex', () => {
  it('passes positive pages through', () => {
    expect(resolvePageIndex(1, 5)).toBe(1);
    expect(resolvePageIndex(5, 5)).toBe(5);
  });

  it('counts negative pages back from the page count', () => {
    expect(resolvePageIndex(-1, 5)).toBe(4);
    expect(resolvePageIndex(-4, 5)).toBe(1);
  });

  it('rejects zero and pages outside the document', () => {
    expect(() => resolvePageIndex(0, 5)).toThrow(ConfigError);
    expect(() => resolvePageIndex(6, 5)).toThrow('Page 6 is outside the document (5 pages)');
    expect(() => resolvePageIndex(-5, 5)).toThrow(ConfigError);
    expect(() => resolvePageIndex(-1, 1)).toThrow(ConfigError);
    expect(() => resolvePageIndex(1.5, 5)).toThrow('Page must be a non-zero integer, got 1.5');
  });
});

describe('splicePage', () => {
  it('stamps a middle page and keeps every other page in order', async () => {
    const params = await spliceParams([100, 110, 120, 130, 140], 3);
    const result = await splicePage(params);

    expect(await pageWidths(result)).toEqual([100, 110, 120, 130, 140]);
    expect(await stampedPages(result)).toEqual([false, false, true, false, false]);
  });

  it('leaves the content of every other page untouched', async () => {
    const widths = [100, 110, 120, 130, 140];
    const document = await makeMarkedPdf(
      widths.map((width, i): MarkedPage => ({ width, height: 200, mark: [10 + i * 10, 10, 5, 5] }))
    );
    const engine = new PdfLibEngine();
    const result = await splicePage({
      engine,
      document,
      pageNumber: 3,
      numPages: 5,
      geometry: await engine.pageGeometry(document, 3),
      placement: createPlacementStore({ positionMM: { x: 10, y: 10 } }),
      resolution,
      stamp,
    });

    const before = await pageContents(document);
    const after = await pageContents(result);
    expect(after).toHaveLength(5);
    for (const index of [0, 1, 3, 4]) {
      expect(after[index]).toBe(before[index]);
    }
    expect(after[2]).not.toBe(before[2]);
    expect(after[2]).toContain(before[2]);
  });

  it('draws the stamp where the placement puts it', async () => {
    const document = await makeMarkedPdf([100, 110, 120].map(width => ({ width, height: 200 })));
    const engine = new PdfLibEngine();
    const geometry = await engine.pageGeometry(document, 3);
    const redSquare: StampImage = {
      bytes: makePng({ width: 36, height: 36 }),
      format: 'png',
      pixelWidth: 36,
      pixelHeight: 36,
    };

    const result = await splicePage({
      engine,
      document,
      pageNumber: 3,
      numPages: 3,
      geometry,
      placement: createPlacementStore({ positionMM: { x: 25.4, y: 25.4 } }),
      resolution,
      stamp: redSquare,
    });
    // one inch from the top-left corner, half an inch wide
    const raster = await new PdfjsPreviewRenderer().renderPageToRaster(result, 3, 72, geometry);

    expect(await pixelAt(raster.png, 90, 90)).toEqual([255, 0, 0, 255]);
    expect(await pixelAt(raster.png, 50, 50)).toEqual([255, 255, 255, 255]);
    expect(await pixelAt(raster.png, 90, 120)).toEqual([255, 255, 255, 255]);
  });

  it('stamps the first and last pages', async () => {
    const first = await splicePage(await spliceParams([100, 110, 120], 1));
    expect(await pageWidths(first)).toEqual([100, 110, 120]);
    expect(await stampedPages(first)).toEqual([true, false, false]);

    const last = await splicePage(await spliceParams([100, 110, 120], 3));
    expect(await pageWidths(last)).toEqual([100, 110, 120]);
    expect(await stampedPages(last)).toEqual([false, false, true]);
  });

  it('returns the stamped page directly for a single-page document', async () => {
    const params = await spliceParams([150], 1);
    const concatenate = vi.spyOn(params.engine, 'concatenate');
    const extractRange = vi.spyOn(params.engine, 'extractRange');

    const result = await splicePage(params);

    expect(concatenate).not.toHaveBeenCalled();
    expect(extractRange).toHaveBeenCalledTimes(1);
    expect(await pageWidths(result)).toEqual([150]);
    expect(await stampedPages(result)).toEqual([true]);
  });

  it('locks the placement while running and unlocks afterwards', async () => {
    const params = await spliceParams([100, 110], 2);
    const lockedDuringMerge: boolean[] = [];
    const merge = params.engine.mergeOverlay.bind(params.engine);
    vi.spyOn(params.engine, 'mergeOverlay').mockImplementation(async (base, overlay) => {
      lockedDuringMerge.push(params.placement.getState().locked);
      expect(() => params.placement.getState().setPosition(50, 50)).toThrow(StateLockedError);
      return merge(base, overlay);
    });

    await splicePage(params);

    expect(lockedDuringMerge).toEqual([true]);
    expect(params.placement.getState().locked).toBe(false);
    expect(params.placement.getState().positionMM).toEqual({ x: 10, y: 10 });
  });

  it('refuses to start while another splice holds the lock', async () => {
    const params = await spliceParams([100], 1);
    params.placement.getState().lock();
    await expect(splicePage(params)).rejects.toBeInstanceOf(StateLockedError);
    expect(params.placement.getState().locked).toBe(true);
  });

  it('names the failing step and releases the lock', async () => {
    const params = await spliceParams([100, 110, 120], 2);
    vi.spyOn(params.engine, 'mergeOverlay').mockRejectedValue(new Error('broken xref'));
    const concatenate = vi.spyOn(params.engine, 'concatenate');

    const failure = await splicePage(params).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(CollaboratorError);
    expect(failure).toMatchObject({ step: 'merge-overlay', message: 'Splice step "merge-overlay" failed: broken xref' });
    expect(concatenate).not.toHaveBeenCalled();
    expect(params.placement.getState().locked).toBe(false);
  });
});

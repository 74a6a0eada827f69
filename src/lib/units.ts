import type { PageGeometry, Point, Size } from '@/types/stamp';

export const MM_PER_INCH = 25.4;

// Page-space units: the PDF user unit, 72 per inch
export const PU_PER_INCH = 72;

/**
 * Guard for every density entering a conversion. A non-positive density is a
 * programming error, not user input, so this throws a plain Error.
 */
export function assertDensity(densityPerInch: number, label: string = 'density'): void {
  if (!Number.isFinite(densityPerInch) || densityPerInch <= 0) {
    throw new Error(`${label} must be a finite positive number, got ${densityPerInch}`);
  }
}

export function mmToPU(mm: number): number {
  return (mm / MM_PER_INCH) * PU_PER_INCH;
}

export function puToMM(pu: number): number {
  return (pu / PU_PER_INCH) * MM_PER_INCH;
}

/**
 * Convert a length in millimeters to pixels at the given density.
 *
 * @param mm - Length in millimeters
 * @param densityPerInch - Pixels per inch of the target surface
 */
export function mmToPixels(mm: number, densityPerInch: number): number {
  assertDensity(densityPerInch);
  return (mm / MM_PER_INCH) * densityPerInch;
}

/**
 * Convert a length in pixels at the given density back to millimeters.
 */
export function pixelsToMM(px: number, densityPerInch: number): number {
  assertDensity(densityPerInch);
  return (px / densityPerInch) * MM_PER_INCH;
}

export function pointMMToPixels(point: Point, densityPerInch: number): Point {
  return {
    x: mmToPixels(point.x, densityPerInch),
    y: mmToPixels(point.y, densityPerInch),
  };
}

export function pointPixelsToMM(point: Point, densityPerInch: number): Point {
  return {
    x: pixelsToMM(point.x, densityPerInch),
    y: pixelsToMM(point.y, densityPerInch),
  };
}

/**
 * Build a PageGeometry from a MediaBox (lower-left corner plus size, in page-space units).
 */
export function pageGeometryFromBox(box: { x: number; y: number; width: number; height: number }): PageGeometry {
  return {
    width: box.width,
    height: box.height,
    originX: box.x,
    originY: box.y,
    widthMM: puToMM(box.width),
    heightMM: puToMM(box.height),
  };
}

/**
 * Largest whole density (at least 1) at which the page fits into `fill` of the viewport.
 * Used to size the interactive preview.
 */
export function fitPreviewDensity(geometry: PageGeometry, viewport: Size, fill: number = 0.8): number {
  const densityW = (viewport.width * fill) / (geometry.widthMM / MM_PER_INCH);
  const densityH = (viewport.height * fill) / (geometry.heightMM / MM_PER_INCH);
  return Math.max(1, Math.floor(Math.min(densityW, densityH)));
}

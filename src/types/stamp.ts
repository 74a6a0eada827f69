export interface Point {
  x: number;
  y: number;
}

export interface Offset {
  dx: number;
  dy: number;
}

export interface Size {
  width: number;
  height: number;
}

/**
 * Geometry of one page, read once per run.
 * `width`/`height` and the origin are page-space units (72 per inch); the origin is the
 * lower-left corner of the page's MediaBox relative to the document origin.
 */
export interface PageGeometry {
  width: number;
  height: number;
  originX: number;
  originY: number;
  widthMM: number;
  heightMM: number;
}

export interface PlacementState {
  positionMM: Point;
  scale: number;
  dragOffsetMM: Offset;
  dragging: boolean;
  locked: boolean; // a splice is reading this snapshot
}

export type ResolutionSource = 'explicit' | 'metadata' | 'fallback';

export interface StampResolution {
  densityPerInch: number;
  source: ResolutionSource;
}

/** A canvas to draw onto. Built per render call and discarded afterwards. */
export interface RenderTarget {
  densityPerInch: number;
  originOffset: Point;
}

export type StampFormat = 'png' | 'jpeg';

export interface StampImage {
  bytes: Uint8Array;
  format: StampFormat;
  pixelWidth: number;
  pixelHeight: number;
}

/** Canvas-style matrix: x' = a*x + c*y + e, y' = b*x + d*y + f. */
export interface AffineTransform {
  a: number;
  b: number;
  c: number;
  d: number;
  e: number;
  f: number;
}

/** Axis-aligned rectangle in PDF user space (lower-left origin, y up). */
export interface PdfRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Raster {
  width: number;
  height: number;
  densityPerInch: number;
  png: Uint8Array;
}

export type InvocationFlag =
  | '--input'
  | '--stamp'
  | '--stamp-dpi'
  | '--page'
  | '--x'
  | '--y'
  | '--scale'
  | '--output';

export type Invocation = ReadonlyArray<readonly [flag: InvocationFlag, value: string]>;

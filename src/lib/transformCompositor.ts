import type { AffineTransform, PageGeometry, PlacementState, Point, RenderTarget, Size, StampImage, StampResolution } from '@/types/stamp';
import { foldPosition } from '@/store/placementStore';
import { PU_PER_INCH, assertDensity, mmToPixels } from './units';

/**
 * Single transform from stamp pixels to target-canvas pixels.
 *
 * Translate to the stamp's position on the target, then scale uniformly by
 * `scale * targetDensity / stampDensity`. The live preview and the final page use this
 * same derivation; only the target's density and origin differ between them.
 */
export function computeTransform(
  state: PlacementState,
  target: RenderTarget,
  resolution: StampResolution
): AffineTransform {
  assertDensity(target.densityPerInch, 'target density');
  assertDensity(resolution.densityPerInch, 'stamp density');

  const drawScale = (state.scale * target.densityPerInch) / resolution.densityPerInch;
  const position = foldPosition(state);

  return {
    a: drawScale,
    b: 0,
    c: 0,
    d: drawScale,
    e: mmToPixels(position.x, target.densityPerInch) + target.originOffset.x,
    f: mmToPixels(position.y, target.densityPerInch) + target.originOffset.y,
  };
}

export function applyTransform(transform: AffineTransform, point: Point): Point {
  const { a, b, c, d, e, f } = transform;
  return {
    x: a * point.x + c * point.y + e,
    y: b * point.x + d * point.y + f,
  };
}

export function invertTransform(transform: AffineTransform): AffineTransform {
  const { a, b, c, d, e, f } = transform;
  const det = a * d - b * c;
  if (det === 0) {
    throw new Error('Transform is not invertible');
  }
  return {
    a: d / det,
    b: -b / det,
    c: -c / det,
    d: a / det,
    e: (c * f - d * e) / det,
    f: (b * e - a * f) / det,
  };
}

/** Top-left corner and size the stamp covers on the target canvas. */
export function stampBounds(transform: AffineTransform, stamp: Pick<StampImage, 'pixelWidth' | 'pixelHeight'>): Point & Size {
  return {
    x: transform.e,
    y: transform.f,
    width: transform.a * stamp.pixelWidth,
    height: transform.d * stamp.pixelHeight,
  };
}

export function previewTarget(densityPerInch: number): RenderTarget {
  return { densityPerInch, originOffset: { x: 0, y: 0 } };
}

/**
 * Target for the overlay page. Its canvas is page-space (72 per inch), y pointing down
 * from the top of a `height`-tall surface; shifting by the MediaBox origin lands the
 * stamp where the page's own corner is.
 */
export function pageTarget(geometry: PageGeometry): RenderTarget {
  return {
    densityPerInch: PU_PER_INCH,
    originOffset: { x: geometry.originX, y: -geometry.originY },
  };
}

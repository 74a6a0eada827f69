import type { AffineTransform, PageGeometry, PdfRect, PlacementState, StampImage, StampResolution } from '@/types/stamp';
import { computeTransform, pageTarget, stampBounds } from './transformCompositor';

/**
 * Flip the stamp's box on the page canvas (y down from the top edge) into PDF user
 * space (y up).
 */
export function canvasBoundsToPdfRect(
  transform: AffineTransform,
  stamp: Pick<StampImage, 'pixelWidth' | 'pixelHeight'>,
  geometry: PageGeometry
): PdfRect {
  const bounds = stampBounds(transform, stamp);
  return {
    x: bounds.x,
    y: geometry.height - (bounds.y + bounds.height),
    width: bounds.width,
    height: bounds.height,
  };
}

/** Where the stamp lands on the page, in PDF user space. */
export function overlayRect(
  state: PlacementState,
  resolution: StampResolution,
  stamp: Pick<StampImage, 'pixelWidth' | 'pixelHeight'>,
  geometry: PageGeometry
): PdfRect {
  const transform = computeTransform(state, pageTarget(geometry), resolution);
  return canvasBoundsToPdfRect(transform, stamp, geometry);
}

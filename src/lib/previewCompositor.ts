import { createCanvas, loadImage } from '@napi-rs/canvas';
import type { AffineTransform, Raster, StampImage } from '@/types/stamp';

function toBuffer(bytes: Uint8Array): Buffer {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/**
 * Draw the stamp over a rendered page through the given transform and return the
 * combined raster.
 */
export async function compositePreview(page: Raster, stamp: StampImage, transform: AffineTransform): Promise<Raster> {
  const canvas = createCanvas(page.width, page.height);
  const context = canvas.getContext('2d');

  const base = await loadImage(toBuffer(page.png));
  context.drawImage(base, 0, 0);

  const image = await loadImage(toBuffer(stamp.bytes));
  context.imageSmoothingEnabled = true;
  context.imageSmoothingQuality = 'high';
  context.setTransform(transform.a, transform.b, transform.c, transform.d, transform.e, transform.f);
  context.drawImage(image, 0, 0);
  context.setTransform(1, 0, 0, 1, 0, 0);

  return { ...page, png: canvas.toBuffer('image/png') };
}

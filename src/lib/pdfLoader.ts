import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { createCanvas } from '@napi-rs/canvas';
import type { PageGeometry, Raster } from '@/types/stamp';
import { PU_PER_INCH, assertDensity } from './units';

export interface PreviewRenderer {
  /**
   * Rasterize the `mediaBox` area of one page, its top-left corner at pixel (0, 0).
   *
   * @param document - The PDF file bytes
   * @param pageNumber - 1-based page number
   * @param densityPerInch - Pixels per inch of the raster
   * @param mediaBox - Geometry the stamp position is measured against
   */
  renderPageToRaster(
    document: Uint8Array,
    pageNumber: number,
    densityPerInch: number,
    mediaBox: PageGeometry
  ): Promise<Raster>;
}

/**
 * Rasterizes a page with pdf.js onto an @napi-rs/canvas surface.
 *
 * pdf.js lays its viewport out on the CropBox. The viewport is shifted so the MediaBox
 * fills the canvas instead, matching the page the stamp is written onto.
 */
export class PdfjsPreviewRenderer implements PreviewRenderer {
  async renderPageToRaster(
    document: Uint8Array,
    pageNumber: number,
    densityPerInch: number,
    mediaBox: PageGeometry
  ): Promise<Raster> {
    assertDensity(densityPerInch, 'preview density');

    // pdf.js transfers the buffer it is given; hand it a copy so the caller's bytes survive
    const loadingTask = getDocument({ data: document.slice(), isEvalSupported: false });
    const pdf = await loadingTask.promise;

    try {
      const page = await pdf.getPage(pageNumber);
      const scale = densityPerInch / PU_PER_INCH;
      const [viewLeft, , , viewTop] = page.view;
      // placement ignores /Rotate, so the preview does too
      const viewport = page.getViewport({
        scale,
        rotation: 0,
        offsetX: (viewLeft - mediaBox.originX) * scale,
        offsetY: (mediaBox.originY + mediaBox.height - viewTop) * scale,
      });
      const width = Math.ceil(mediaBox.width * scale);
      const height = Math.ceil(mediaBox.height * scale);

      const canvas = createCanvas(width, height);
      const context = canvas.getContext('2d');
      context.fillStyle = '#fff';
      context.fillRect(0, 0, width, height);

      // @napi-rs/canvas implements the 2D context pdf.js draws through, but not the DOM
      // canvas types its parameters are declared with
      type RenderParameters = Parameters<typeof page.render>[0];
      const renderParams = { canvas, canvasContext: context, viewport } as unknown as RenderParameters;
      await page.render(renderParams).promise;

      return { width, height, densityPerInch, png: canvas.toBuffer('image/png') };
    } finally {
      await pdf.destroy();
    }
  }
}

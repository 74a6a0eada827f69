import { PDFDocument } from 'pdf-lib';
import type { PageGeometry, PdfRect, StampImage } from '@/types/stamp';
import { pageGeometryFromBox } from './units';

/**
 * Page-range operations the splice is built from. Documents travel as PDF bytes;
 * page numbers are 1-based and ranges inclusive.
 */
export interface PagedDocumentEngine {
  pageCount(document: Uint8Array): Promise<number>;
  pageGeometry(document: Uint8Array, pageNumber: number): Promise<PageGeometry>;
  extractRange(document: Uint8Array, firstPage: number, lastPage: number): Promise<Uint8Array>;
  concatenate(documents: Uint8Array[]): Promise<Uint8Array>;
  mergeOverlay(base: Uint8Array, overlay: Uint8Array): Promise<Uint8Array>;
  drawImageOverlay(geometry: PageGeometry, stamp: StampImage, rect: PdfRect): Promise<Uint8Array>;
}

function assertRange(first: number, last: number, total: number): void {
  if (!Number.isInteger(first) || !Number.isInteger(last) || first < 1 || last > total || first > last) {
    throw new RangeError(`Page range ${first}-${last} is outside 1-${total}`);
  }
}

/**
 * PagedDocumentEngine on top of pdf-lib. Every call loads its inputs afresh and returns
 * newly saved bytes, so no document object outlives a call.
 */
export class PdfLibEngine implements PagedDocumentEngine {
  /**
   * Get the page count from a PDF document.
   *
   * @param document - The PDF file bytes
   */
  async pageCount(document: Uint8Array): Promise<number> {
    const pdfDoc = await PDFDocument.load(document);
    return pdfDoc.getPageCount();
  }

  /**
   * Read the MediaBox of one page.
   *
   * @param document - The PDF file bytes
   * @param pageNumber - 1-based page number
   */
  async pageGeometry(document: Uint8Array, pageNumber: number): Promise<PageGeometry> {
    const pdfDoc = await PDFDocument.load(document);
    assertRange(pageNumber, pageNumber, pdfDoc.getPageCount());
    const page = pdfDoc.getPage(pageNumber - 1);
    return pageGeometryFromBox(page.getMediaBox());
  }

  /**
   * Extract an inclusive page range to a new PDF document.
   *
   * @param document - The source PDF file bytes
   * @param firstPage - 1-based first page
   * @param lastPage - 1-based last page
   * @returns The new PDF bytes containing only the extracted pages
   */
  async extractRange(document: Uint8Array, firstPage: number, lastPage: number): Promise<Uint8Array> {
    const sourceDoc = await PDFDocument.load(document);
    assertRange(firstPage, lastPage, sourceDoc.getPageCount());

    const indices = Array.from({ length: lastPage - firstPage + 1 }, (_, i) => firstPage - 1 + i);
    const newDoc = await PDFDocument.create();
    const copiedPages = await newDoc.copyPages(sourceDoc, indices);
    copiedPages.forEach(page => {
      newDoc.addPage(page);
    });

    return newDoc.save();
  }

  /**
   * Join documents in the given order into one.
   */
  async concatenate(documents: Uint8Array[]): Promise<Uint8Array> {
    if (documents.length === 0) {
      throw new RangeError('Nothing to concatenate');
    }
    const target = await PDFDocument.create();

    for (const bytes of documents) {
      const sourceDoc = await PDFDocument.load(bytes);
      const copiedPages = await target.copyPages(sourceDoc, sourceDoc.getPageIndices());
      copiedPages.forEach(page => {
        target.addPage(page);
      });
    }

    return target.save();
  }

  /**
   * Draw the first page of `overlay` over every page of `base`.
   * The overlay is placed by its own MediaBox, so an overlay built from a page's
   * geometry lines up with that page.
   */
  async mergeOverlay(base: Uint8Array, overlay: Uint8Array): Promise<Uint8Array> {
    const baseDoc = await PDFDocument.load(base);
    const overlayDoc = await PDFDocument.load(overlay);
    const overlayPage = overlayDoc.getPage(0);
    const box = overlayPage.getMediaBox();

    const embedded = await baseDoc.embedPage(overlayPage, {
      left: box.x,
      bottom: box.y,
      right: box.x + box.width,
      top: box.y + box.height,
    });

    for (const page of baseDoc.getPages()) {
      page.drawPage(embedded, { x: box.x, y: box.y });
    }

    return baseDoc.save();
  }

  /**
   * Build a blank single-page document with the given geometry carrying one image.
   *
   * @param geometry - Page geometry the overlay must match
   * @param stamp - Decoded stamp image
   * @param rect - Where to draw the image, in PDF user space
   */
  async drawImageOverlay(geometry: PageGeometry, stamp: StampImage, rect: PdfRect): Promise<Uint8Array> {
    const pdfDoc = await PDFDocument.create();
    const page = pdfDoc.addPage([geometry.width, geometry.height]);
    page.setMediaBox(geometry.originX, geometry.originY, geometry.width, geometry.height);

    const image = stamp.format === 'png'
      ? await pdfDoc.embedPng(stamp.bytes)
      : await pdfDoc.embedJpg(stamp.bytes);

    page.drawImage(image, {
      x: rect.x,
      y: rect.y,
      width: rect.width,
      height: rect.height,
    });

    return pdfDoc.save();
  }
}

import { deflateSync } from 'node:zlib';
import { PDFArray, PDFDocument, PDFRawStream, decodePDFRawStream, rgb, type PDFObject } from 'pdf-lib';

const CRC_TABLE = (() => {
  const table = new Uint32Array(256);
  for (let n = 0; n < 256; n++) {
    let c = n;
    for (let k = 0; k < 8; k++) {
      c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
    }
    table[n] = c >>> 0;
  }
  return table;
})();

function crc32(bytes: Uint8Array): number {
  let c = 0xffffffff;
  for (const b of bytes) {
    c = CRC_TABLE[(c ^ b) & 0xff] ^ (c >>> 8);
  }
  return (c ^ 0xffffffff) >>> 0;
}

function uint32(value: number): number[] {
  return [(value >>> 24) & 0xff, (value >>> 16) & 0xff, (value >>> 8) & 0xff, value & 0xff];
}

function uint16(value: number): number[] {
  return [(value >>> 8) & 0xff, value & 0xff];
}

function pngChunk(type: string, data: Uint8Array): number[] {
  const typeBytes = Array.from(type, ch => ch.charCodeAt(0));
  const body = new Uint8Array([...typeBytes, ...data]);
  return [...uint32(data.length), ...body, ...uint32(crc32(body))];
}

export interface PngOptions {
  width: number;
  height: number;
  rgba?: [number, number, number, number];
  /** Adds a pHYs chunk with this many pixels per unit on both axes */
  pixelsPerUnit?: number;
  /** pHYs unit byte: 1 = meter, 0 = aspect ratio only */
  physUnit?: number;
}

/** A valid 8-bit RGBA PNG filled with one color. */
export function makePng(options: PngOptions): Uint8Array {
  const { width, height, rgba = [255, 0, 0, 255], pixelsPerUnit, physUnit = 1 } = options;

  const header = new Uint8Array([...uint32(width), ...uint32(height), 8, 6, 0, 0, 0]);
  const raw = new Uint8Array(height * (1 + width * 4));
  for (let row = 0; row < height; row++) {
    const start = row * (1 + width * 4);
    raw[start] = 0;
    for (let col = 0; col < width; col++) {
      raw.set(rgba, start + 1 + col * 4);
    }
  }

  const bytes: number[] = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
  bytes.push(...pngChunk('IHDR', header));
  if (pixelsPerUnit !== undefined) {
    bytes.push(...pngChunk('pHYs', new Uint8Array([...uint32(pixelsPerUnit), ...uint32(pixelsPerUnit), physUnit])));
  }
  bytes.push(...pngChunk('IDAT', new Uint8Array(deflateSync(raw))));
  bytes.push(...pngChunk('IEND', new Uint8Array(0)));
  return new Uint8Array(bytes);
}

export interface JpegOptions {
  width: number;
  height: number;
  /** JFIF units byte: 0 none, 1 dots per inch, 2 dots per cm. Omit for no APP0 segment. */
  units?: number;
  density?: number;
}

/**
 * Header-only JPEG: SOI, optional JFIF APP0, SOF0, EOI. Enough for header readers and
 * pdf-lib's embedder, which never decodes scan data.
 */
export function makeJpeg(options: JpegOptions): Uint8Array {
  const { width, height, units, density = 72 } = options;
  const bytes: number[] = [0xff, 0xd8];

  if (units !== undefined) {
    const jfif = [0x4a, 0x46, 0x49, 0x46, 0x00, 1, 1, units, ...uint16(density), ...uint16(density), 0, 0];
    bytes.push(0xff, 0xe0, ...uint16(jfif.length + 2), ...jfif);
  }

  const sof = [8, ...uint16(height), ...uint16(width), 3, 1, 0x11, 0, 2, 0x11, 0, 3, 0x11, 0];
  bytes.push(0xff, 0xc0, ...uint16(sof.length + 2), ...sof);
  bytes.push(0xff, 0xd9);
  return new Uint8Array(bytes);
}

/** A PDF with one blank page per size; `origin` shifts every MediaBox. */
export async function makePdf(sizes: Array<[number, number]>, origin: [number, number] = [0, 0]): Promise<Uint8Array> {
  const pdfDoc = await PDFDocument.create();
  for (const [width, height] of sizes) {
    const page = pdfDoc.addPage([width, height]);
    page.setMediaBox(origin[0], origin[1], width, height);
  }
  return pdfDoc.save();
}

export async function pageWidths(bytes: Uint8Array): Promise<number[]> {
  const pdfDoc = await PDFDocument.load(bytes);
  return pdfDoc.getPages().map(page => page.getMediaBox().width);
}

export interface MarkedPage {
  width: number;
  height: number;
  /** MediaBox lower-left corner */
  origin?: [number, number];
  /** x, y, width, height */
  cropBox?: [number, number, number, number];
  /** A solid red rectangle in PDF user space: x, y, width, height */
  mark?: [number, number, number, number];
}

/** A PDF whose pages carry drawn content, so pages can be told apart after a splice. */
export async function makeMarkedPdf(pages: MarkedPage[]): Promise<Uint8Array> {
  const pdfDoc = await PDFDocument.create();
  for (const spec of pages) {
    const [x, y] = spec.origin ?? [0, 0];
    const page = pdfDoc.addPage([spec.width, spec.height]);
    page.setMediaBox(x, y, spec.width, spec.height);
    if (spec.cropBox) {
      page.setCropBox(...spec.cropBox);
    }
    if (spec.mark) {
      const [markX, markY, markWidth, markHeight] = spec.mark;
      page.drawRectangle({ x: markX, y: markY, width: markWidth, height: markHeight, color: rgb(1, 0, 0) });
    }
  }
  return pdfDoc.save();
}

/** Decoded content stream text of every page. */
export async function pageContents(bytes: Uint8Array): Promise<string[]> {
  const pdfDoc = await PDFDocument.load(bytes);
  return pdfDoc.getPages().map(page => {
    const contents = page.node.Contents();
    const objects: Array<PDFObject | undefined> =
      contents instanceof PDFArray ? contents.asArray().map(ref => pdfDoc.context.lookup(ref)) : [contents];
    const streams = objects.filter((object): object is PDFRawStream => object instanceof PDFRawStream);
    return streams.map(stream => Buffer.from(decodePDFRawStream(stream).decode()).toString('latin1')).join('\n');
  });
}

import { PDFDocument } from 'pdf-lib';
import type { StampFormat, StampImage } from '@/types/stamp';
import { ResourceError, describeCause } from './errors';

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const METERS_PER_INCH = 0.0254;
const CM_PER_INCH = 2.54;

export function sniffStampFormat(bytes: Uint8Array): StampFormat | null {
  if (bytes.length >= 8 && PNG_SIGNATURE.every((b, i) => bytes[i] === b)) return 'png';
  if (bytes.length >= 3 && bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff) return 'jpeg';
  return null;
}

function readUint32(bytes: Uint8Array, offset: number): number {
  return ((bytes[offset] << 24) | (bytes[offset + 1] << 16) | (bytes[offset + 2] << 8) | bytes[offset + 3]) >>> 0;
}

function readUint16(bytes: Uint8Array, offset: number): number {
  return (bytes[offset] << 8) | bytes[offset + 1];
}

function chunkType(bytes: Uint8Array, offset: number): string {
  return String.fromCharCode(bytes[offset], bytes[offset + 1], bytes[offset + 2], bytes[offset + 3]);
}

// pHYs must precede the first IDAT, so the scan stops there
function probePngDensity(bytes: Uint8Array): number | null {
  let offset = PNG_SIGNATURE.length;
  while (offset + 8 <= bytes.length) {
    const length = readUint32(bytes, offset);
    const type = chunkType(bytes, offset + 4);
    const dataStart = offset + 8;
    if (dataStart + length > bytes.length) return null;

    if (type === 'pHYs') {
      if (length !== 9) return null;
      const pixelsPerUnitX = readUint32(bytes, dataStart);
      const unit = bytes[dataStart + 8];
      // unit 0 only states an aspect ratio
      if (unit !== 1 || pixelsPerUnitX === 0) return null;
      return pixelsPerUnitX * METERS_PER_INCH;
    }
    if (type === 'IDAT' || type === 'IEND') return null;

    offset = dataStart + length + 4; // skip CRC
  }
  return null;
}

function probeJpegDensity(bytes: Uint8Array): number | null {
  let offset = 2;
  while (offset + 4 <= bytes.length) {
    if (bytes[offset] !== 0xff) return null;
    const marker = bytes[offset + 1];
    // start of scan: no more header segments
    if (marker === 0xda || marker === 0xd9) return null;
    const length = readUint16(bytes, offset + 2);
    const dataStart = offset + 4;
    if (length < 2 || offset + 2 + length > bytes.length) return null;

    if (marker === 0xe0 && length >= 16) {
      const id = String.fromCharCode(...bytes.subarray(dataStart, dataStart + 5));
      if (id === 'JFIF\0') {
        const units = bytes[dataStart + 7];
        const densityX = readUint16(bytes, dataStart + 8);
        if (densityX === 0) return null;
        if (units === 1) return densityX;
        if (units === 2) return densityX * CM_PER_INCH;
        return null;
      }
    }
    offset += 2 + length;
  }
  return null;
}

/**
 * Read the horizontal resolution stored in the image header, in pixels per inch.
 * Absent, unit-less or malformed metadata all yield `null`; this never throws.
 */
export function probeDensityMetadata(bytes: Uint8Array): number | null {
  const format = sniffStampFormat(bytes);
  const density = format === 'png' ? probePngDensity(bytes) : format === 'jpeg' ? probeJpegDensity(bytes) : null;
  if (density === null || !Number.isFinite(density) || density <= 0) return null;
  return density;
}

/**
 * Decode the stamp far enough to know its pixel size. pdf-lib's embedders parse the
 * image the same way they will when the stamp is drawn into the overlay, so a stamp
 * that passes here also embeds.
 */
export async function decodeStamp(bytes: Uint8Array): Promise<StampImage> {
  const format = sniffStampFormat(bytes);
  if (!format) {
    throw new ResourceError('Stamp image is neither PNG nor JPEG');
  }

  let pixelWidth: number;
  let pixelHeight: number;
  try {
    const scratch = await PDFDocument.create();
    const image = format === 'png' ? await scratch.embedPng(bytes) : await scratch.embedJpg(bytes);
    pixelWidth = image.width;
    pixelHeight = image.height;
  } catch (error) {
    throw new ResourceError(`Stamp image could not be decoded: ${describeCause(error)}`, { cause: error });
  }

  if (pixelWidth <= 0 || pixelHeight <= 0) {
    throw new ResourceError(`Stamp image is empty (${pixelWidth}x${pixelHeight})`);
  }

  return { bytes, format, pixelWidth, pixelHeight };
}

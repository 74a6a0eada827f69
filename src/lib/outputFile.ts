import { access, readFile, rename, rm, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { ResourceError, describeCause } from './errors';
import { createLogger } from './logger';

const log = createLogger('OUTPUT');

export async function readInputFile(filePath: string, what: string): Promise<Uint8Array> {
  try {
    const buffer = await readFile(filePath);
    // pdf-lib reads images through their backing buffer, so hand it one that starts at 0
    return new Uint8Array(buffer);
  } catch (error) {
    throw new ResourceError(`Cannot read ${what} "${filePath}": ${describeCause(error)}`, { cause: error });
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Write `bytes` to `filePath` without ever leaving a truncated file there: the data
 * goes to a sibling temp file first and is renamed into place once complete. The temp
 * file is removed on failure.
 */
export async function writeOutputAtomically(filePath: string, bytes: Uint8Array): Promise<void> {
  const dir = path.dirname(filePath);
  const tempPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`);

  try {
    await writeFile(tempPath, bytes);
    await rename(tempPath, filePath);
    log.info(`Saved to ${filePath}`, { bytes: bytes.byteLength });
  } catch (error) {
    await rm(tempPath, { force: true });
    throw new ResourceError(`Cannot write output "${filePath}": ${describeCause(error)}`, { cause: error });
  }
}

import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { PDFDict, PDFDocument, PDFName } from 'pdf-lib';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { makePdf, makePng, pageWidths } from '@/test/fixtures';
import { resolveOutputPath, stampPdf } from './batchStamp';
import { DEFAULT_CONFIG, type StampConfig } from './config';
import { ConfigError, ResourceError } from './errors';

let dir: string;
let config: StampConfig;

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), 'pdf-stamp-batch-'));
  const input = path.join(dir, 'contract.pdf');
  const stamp = path.join(dir, 'sig.png');
  await writeFile(input, await makePdf([[100, 200], [110, 200], [120, 200]]));
  await writeFile(stamp, makePng({ width: 20, height: 10, pixelsPerUnit: 11811 }));
  config = { ...DEFAULT_CONFIG, input, stamp };
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function stampedPages(file: string): Promise<boolean[]> {
  const pdfDoc = await PDFDocument.load(await readFile(file));
  return pdfDoc
    .getPages()
    .map(page => page.node.Resources()?.lookupMaybe(PDFName.of('XObject'), PDFDict) !== undefined);
}

describe('resolveOutputPath', () => {
  it('prefers the explicit output', async () => {
    expect(await resolveOutputPath({ ...config, output: 'elsewhere.pdf' })).toBe('elsewhere.pdf');
  });

  it('derives the default name beside the input', async () => {
    expect(await resolveOutputPath(config)).toBe(path.join(dir, 'contract_sig.pdf'));
  });

  it('refuses to replace an existing default output unless overwrite is set', async () => {
    const existing = path.join(dir, 'contract_sig.pdf');
    await writeFile(existing, 'old');
    await expect(resolveOutputPath(config)).rejects.toThrow(`No output given. Not overriding ${existing}`);
    expect(await resolveOutputPath({ ...config, overwrite: true })).toBe(existing);
  });
});

describe('stampPdf', () => {
  it('stamps the requested page and writes the default output', async () => {
    const result = await stampPdf({ ...config, page: 2, x: 10, y: 10 });

    expect(result.outputPath).toBe(path.join(dir, 'contract_sig.pdf'));
    expect(result.pageNumber).toBe(2);
    expect(result.resolution.source).toBe('metadata');
    expect(result.diagnostic).toBeNull();
    expect(await pageWidths(await readFile(result.outputPath))).toEqual([100, 110, 120]);
    expect(await stampedPages(result.outputPath)).toEqual([false, true, false]);
  });

  it('resolves a negative page from the end', async () => {
    const output = path.join(dir, 'out.pdf');
    const result = await stampPdf({ ...config, page: -1, output });
    expect(result.pageNumber).toBe(2);
    expect(await stampedPages(output)).toEqual([false, true, false]);
  });

  it('reports the fallback density when the stamp has no metadata', async () => {
    await writeFile(config.stamp, makePng({ width: 20, height: 10 }));
    const result = await stampPdf({ ...config, output: path.join(dir, 'out.pdf') });
    expect(result.resolution).toEqual({ densityPerInch: 72, source: 'fallback' });
    expect(result.diagnostic?.kind).toBe('degraded-resolution');
  });

  it('writes nothing when the page is outside the document', async () => {
    await expect(stampPdf({ ...config, page: 4 })).rejects.toBeInstanceOf(ConfigError);
    expect((await readdir(dir)).sort()).toEqual(['contract.pdf', 'sig.png']);
  });

  it('fails with a ResourceError for a missing or unreadable input', async () => {
    await expect(stampPdf({ ...config, input: path.join(dir, 'nope.pdf'), output: 'x.pdf' })).rejects.toBeInstanceOf(
      ResourceError
    );

    const notPdf = path.join(dir, 'notes.pdf');
    await writeFile(notPdf, 'plain text');
    await expect(stampPdf({ ...config, input: notPdf })).rejects.toBeInstanceOf(ResourceError);
  });

  it('fails with a ResourceError when the stamp is not an image', async () => {
    await writeFile(config.stamp, 'not an image');
    await expect(stampPdf(config)).rejects.toBeInstanceOf(ResourceError);
  });
});

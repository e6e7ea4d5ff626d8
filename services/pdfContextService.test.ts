/**
 * Tests page rasterization and raw document reads against small PDFs
 * written to a temporary directory.
 */

import assert from 'node:assert';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import test from 'node:test';
import { DocumentAccessError } from './errors.js';
import { readDocumentBytes, renderPageImages } from './pdfContextService.js';

// Two blank pages, 200x100 and 50x80 points; the xref table is rebuilt by the parser.
const TWO_PAGE_PDF = [
  '%PDF-1.4',
  '1 0 obj <</Type /Catalog /Pages 2 0 R>> endobj',
  '2 0 obj <</Type /Pages /Kids [3 0 R 4 0 R] /Count 2>> endobj',
  '3 0 obj <</Type /Page /Parent 2 0 R /MediaBox [0 0 200 100]>> endobj',
  '4 0 obj <</Type /Page /Parent 2 0 R /MediaBox [0 0 50 80]>> endobj',
  'trailer <</Root 1 0 R>>',
  '%%EOF',
].join('\n');

const pngSize = (base64: string) => {
  const png = Buffer.from(base64, 'base64');
  return { signature: png.subarray(1, 4).toString('ascii'), width: png.readUInt32BE(16), height: png.readUInt32BE(20) };
};

const withTempDir = async (run: (dir: string) => Promise<void>) => {
  const dir = await mkdtemp(path.join(tmpdir(), 'reader-companion-'));
  try {
    await run(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
};

test('readDocumentBytes returns the file unchanged', async () => {
  await withTempDir(async dir => {
    const file = path.join(dir, 'doc.pdf');
    await writeFile(file, TWO_PAGE_PDF);

    const bytes = await readDocumentBytes(file);
    assert.deepStrictEqual(Buffer.from(bytes), Buffer.from(TWO_PAGE_PDF));
  });
});

test('readDocumentBytes reports a missing file as document access error', async () => {
  await withTempDir(async dir => {
    const file = path.join(dir, 'missing.pdf');
    await assert.rejects(
      readDocumentBytes(file),
      (error: unknown) => error instanceof DocumentAccessError && error.path === file,
    );
  });
});

test('renderPageImages renders one png per page at native size', async () => {
  await withTempDir(async dir => {
    const file = path.join(dir, 'doc.pdf');
    await writeFile(file, TWO_PAGE_PDF);

    const images = await renderPageImages(file);
    assert.deepStrictEqual(images.map(pngSize), [
      { signature: 'PNG', width: 200, height: 100 },
      { signature: 'PNG', width: 50, height: 80 },
    ]);
  });
});

test('renderPageImages rejects files that are not PDFs', async () => {
  await withTempDir(async dir => {
    const file = path.join(dir, 'notes.pdf');
    await writeFile(file, 'just some text, no pdf here');

    await assert.rejects(renderPageImages(file), (error: unknown) => error instanceof DocumentAccessError);
  });
});

import { readFile } from 'node:fs/promises';
import { createCanvas } from '@napi-rs/canvas';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { DocumentAccessError } from './errors.js';

export interface ContextExtractor {
  /** One base64 PNG per page, in page order. */
  renderPageImages(path: string): Promise<string[]>;
  readDocumentBytes(path: string): Promise<Uint8Array>;
}

export const readDocumentBytes = async (path: string): Promise<Uint8Array> => {
  try {
    return new Uint8Array(await readFile(path));
  } catch (error) {
    throw new DocumentAccessError(path, error);
  }
};

export const renderPageImages = async (path: string): Promise<string[]> => {
  const data = await readDocumentBytes(path);

  const doc = await getDocument({ data, isEvalSupported: false, verbosity: 0 }).promise.catch((error: unknown) => {
    throw new DocumentAccessError(path, error);
  });

  const images: string[] = [];
  try {
    for (let pageNumber = 1; pageNumber <= doc.numPages; pageNumber++) {
      const page = await doc.getPage(pageNumber);
      // Scale 1 is the page's own size in PDF points.
      const viewport = page.getViewport({ scale: 1 });
      const canvas = createCanvas(Math.ceil(viewport.width), Math.ceil(viewport.height));
      const renderParams = { canvas, canvasContext: canvas.getContext('2d'), viewport };
      await page.render(renderParams).promise;
      images.push(canvas.toBuffer('image/png').toString('base64'));
      page.cleanup();
    }
  } catch (error) {
    throw new DocumentAccessError(path, error);
  } finally {
    await doc.destroy();
  }
  return images;
};

export const pdfContextService: ContextExtractor = {
  renderPageImages,
  readDocumentBytes,
};

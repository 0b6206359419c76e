import { performance } from 'node:perf_hooks';
import { createCanvas } from '@napi-rs/canvas';
import type { PDFDocumentProxy, PDFPageProxy } from 'pdfjs-dist';
import sharp from 'sharp';
import { PageIndex, PageRenderer, RasterImage } from '../converter/types.js';
import { log } from '../shared/logging.js';

type CanvasContext = Parameters<PDFPageProxy['render']>[0]['canvasContext'];

/**
 * Draws a page onto a Skia canvas and hands back a single-channel PNG. Grayscale
 * input keeps recognition stable across colour scans.
 */
export class PdfJsPageRenderer implements PageRenderer<PDFDocumentProxy> {
  async render(handle: PDFDocumentProxy, index: PageIndex, scale: number): Promise<RasterImage> {
    const start = performance.now();
    const page = await handle.getPage(index + 1);

    try {
      const viewport = page.getViewport({ scale });
      const width = Math.ceil(viewport.width);
      const height = Math.ceil(viewport.height);
      const canvas = createCanvas(width, height);
      const context = canvas.getContext('2d');
      context.fillStyle = '#ffffff';
      context.fillRect(0, 0, width, height);

      // The Skia context implements the 2D canvas API pdf.js draws with; its
      // declared type is the DOM one.
      await page.render({ canvasContext: context as unknown as CanvasContext, viewport }).promise;

      const png = await canvas.encode('png');
      const data = await sharp(png).grayscale().png().toBuffer();

      log({
        scope: 'render',
        level: 'debug',
        message: 'rendered page',
        data: { page: index + 1, width, height, durationMs: Math.round(performance.now() - start) },
      });
      return { data, width, height };
    } finally {
      page.cleanup();
    }
  }
}

import { readFile } from 'node:fs/promises';
import { createRequire } from 'node:module';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import type { PDFDocumentProxy, PDFPageProxy } from 'pdfjs-dist';
import { throwIfCancelled } from '../converter/backends/document-scope.js';
import { DocumentSource, PageIndex, PasswordError, TextLayerReader } from '../converter/types.js';

type PdfJsModule = typeof import('pdfjs-dist');
type TextContentItem = Awaited<ReturnType<PDFPageProxy['getTextContent']>>['items'][number];
type TextItem = Extract<TextContentItem, { str: string }>;

/** Values of pdf.js `PasswordResponses` */
const NEED_PASSWORD = 1;
const INCORRECT_PASSWORD = 2;

/** Form feed closes every page, the same break the text layer uses between pages */
export const PAGE_BREAK = '\f';

let pdfjs: Promise<PdfJsModule> | null = null;

/**
 * Load the legacy build once. It runs on Node without DOM globals and, with no
 * real worker available, falls back to parsing on the calling thread.
 */
export function loadPdfJs(): Promise<PdfJsModule> {
  if (pdfjs) return pdfjs;

  pdfjs = import('pdfjs-dist/legacy/build/pdf.mjs').then((loaded: PdfJsModule) => {
    const require = createRequire(import.meta.url);
    const workerPath = require.resolve('pdfjs-dist/legacy/build/pdf.worker.mjs');
    loaded.GlobalWorkerOptions.workerSrc = pathToFileURL(workerPath).href;
    return loaded;
  });
  return pdfjs;
}

function standardFontDataPath(): string {
  const require = createRequire(import.meta.url);
  const packageRoot = path.dirname(require.resolve('pdfjs-dist/package.json'));
  return `${path.join(packageRoot, 'standard_fonts')}${path.sep}`;
}

function passwordResponse(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if (!('name' in error) || error.name !== 'PasswordException') return undefined;
  return 'code' in error && typeof error.code === 'number' ? error.code : NEED_PASSWORD;
}

export function toPasswordError(error: unknown): PasswordError | undefined {
  const code = passwordResponse(error);
  if (code === undefined) return undefined;
  return code === INCORRECT_PASSWORD
    ? new PasswordError('Incorrect password for encrypted PDF', 'PASSWORD_INCORRECT')
    : new PasswordError('PDF is encrypted and needs a password', 'PASSWORD_REQUIRED');
}

/** Every call opens an independent document, so concurrent units never share a handle */
export class PdfJsDocumentSource implements DocumentSource<PDFDocumentProxy> {
  async open(documentPath: string, credential?: string): Promise<PDFDocumentProxy> {
    const { getDocument } = await loadPdfJs();
    const data = new Uint8Array(await readFile(documentPath));
    const loadingTask = getDocument({
      data,
      password: credential,
      standardFontDataUrl: standardFontDataPath(),
      isEvalSupported: false,
      verbosity: 0,
    });

    try {
      return await loadingTask.promise;
    } catch (error) {
      await loadingTask.destroy();
      throw toPasswordError(error) ?? error;
    }
  }

  pageCount(handle: PDFDocumentProxy): number {
    return handle.numPages;
  }

  async close(handle: PDFDocumentProxy): Promise<void> {
    await handle.destroy();
  }
}

function isTextItem(item: TextContentItem): item is TextItem {
  return 'str' in item;
}

export class PdfJsTextReader implements TextLayerReader<PDFDocumentProxy> {
  async readText(handle: PDFDocumentProxy, indices: readonly PageIndex[], signal?: AbortSignal): Promise<string> {
    const pages: string[] = [];

    for (const index of indices) {
      throwIfCancelled(signal);
      const page = await handle.getPage(index + 1);
      try {
        const textContent = await page.getTextContent();
        const text = textContent.items
          .filter(isTextItem)
          .map((item) => (item.hasEOL ? `${item.str}\n` : item.str))
          .join('');
        pages.push(formatPageText(text));
      } finally {
        page.cleanup();
      }
    }

    return pages.join('');
  }
}

/** Each page ends its last line with a newline and is closed by a form feed */
export function formatPageText(text: string): string {
  if (text === '') return PAGE_BREAK;
  return text.endsWith('\n') ? `${text}${PAGE_BREAK}` : `${text}\n${PAGE_BREAK}`;
}

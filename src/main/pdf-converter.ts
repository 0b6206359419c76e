import { Converter } from '../converter/converter.js';
import { ConversionError, ExtractionBackend, describeError } from '../converter/types.js';
import { RecognitionBackend, TextLayerBackend } from '../converter/backends/index.js';
import { PdfJsDocumentSource, PdfJsTextReader } from './pdf-document.js';

export interface PdfConverterOptions {
  /** Rendering resolution for recognition, default 200 */
  dpi?: number;
}

async function loadRecognitionBackend(source: PdfJsDocumentSource, dpi?: number): Promise<ExtractionBackend> {
  try {
    const [{ PdfJsPageRenderer }, { createRecognizer }] = await Promise.all([
      import('./pdf-renderer.js'),
      import('./recognizer.js'),
    ]);
    return new RecognitionBackend({ source, renderer: new PdfJsPageRenderer(), createRecognizer, dpi });
  } catch (error) {
    throw new ConversionError(
      `Recognition dependencies could not be loaded: ${describeError(error)}`,
      'RECOGNIZER_UNAVAILABLE',
      { cause: error }
    );
  }
}

/** Converter wired to pdf.js; rendering and recognition load only when a conversion needs them */
export function createPdfConverter(options: PdfConverterOptions = {}): Converter {
  const source = new PdfJsDocumentSource();
  return new Converter({
    textLayer: new TextLayerBackend({ source, reader: new PdfJsTextReader() }),
    recognition: () => loadRecognitionBackend(source, options.dpi),
  });
}

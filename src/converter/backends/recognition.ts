/**
 * Recognition Backend
 *
 * Renders each page to a grayscale raster and runs text recognition on it.
 * Rendered pages carry no break markers of their own, so page texts are
 * separated by a blank line.
 */

import {
  DocumentSource,
  ExtractionBackend,
  ExtractionError,
  ExtractionParams,
  PageRenderer,
  RecognizerFactory,
  WorkUnit,
  describeError,
  pageIndices,
} from '../types.js';
import { countDocumentPages, throwIfCancelled, toExtractionError, withDocument } from './document-scope.js';

/** PDF user space is 72 units per inch */
export const PDF_NATIVE_DPI = 72;
export const DEFAULT_RECOGNITION_DPI = 200;

export const PAGE_SEPARATOR = '\n\n';

export interface RecognitionBackendOptions<THandle> {
  source: DocumentSource<THandle>;
  renderer: PageRenderer<THandle>;
  createRecognizer: RecognizerFactory;
  dpi?: number;
}

export class RecognitionBackend<THandle> implements ExtractionBackend {
  readonly id = 'recognition' as const;

  readonly scale: number;

  constructor(private readonly options: RecognitionBackendOptions<THandle>) {
    this.scale = (options.dpi ?? DEFAULT_RECOGNITION_DPI) / PDF_NATIVE_DPI;
  }

  countPages(documentPath: string, params: ExtractionParams, signal?: AbortSignal): Promise<number> {
    return countDocumentPages(this.options.source, documentPath, params.credential, signal);
  }

  async extract(unit: WorkUnit, signal?: AbortSignal): Promise<string> {
    const { source, renderer, createRecognizer } = this.options;
    const { language, toolPath, dataPath, credential } = unit.params;

    try {
      return await withDocument(source, unit.documentPath, credential, signal, async (handle) => {
        const recognizer = await createRecognizer({ language, toolPath, dataPath });
        try {
          const chunks: string[] = [];
          for (const index of pageIndices(unit.range)) {
            throwIfCancelled(signal);
            let pageText: string;
            try {
              const image = await renderer.render(handle, index, this.scale);
              pageText = await recognizer.recognize(image, language);
            } catch (error) {
              throw new ExtractionError(
                `Recognition failed on page ${index + 1}: ${describeError(error)}`,
                unit.range,
                error
              );
            }
            chunks.push(pageText.trimEnd());
          }
          throwIfCancelled(signal);
          return chunks.join(PAGE_SEPARATOR);
        } finally {
          await recognizer.terminate();
        }
      });
    } catch (error) {
      throw toExtractionError(error, unit.range, 'Recognition');
    }
  }

  assemble(unitTexts: readonly string[]): string {
    return `${unitTexts.join(PAGE_SEPARATOR)}\n`;
  }
}

/**
 * Text Layer Backend
 *
 * Reads the document's embedded text. The reader's output already carries
 * line and page breaks, so unit texts are concatenated as they are.
 */

import {
  DocumentSource,
  ExtractionBackend,
  ExtractionParams,
  TextLayerReader,
  WorkUnit,
  pageIndices,
} from '../types.js';
import { countDocumentPages, throwIfCancelled, toExtractionError, withDocument } from './document-scope.js';

export interface TextLayerBackendOptions<THandle> {
  source: DocumentSource<THandle>;
  reader: TextLayerReader<THandle>;
}

export class TextLayerBackend<THandle> implements ExtractionBackend {
  readonly id = 'text-layer' as const;

  constructor(private readonly options: TextLayerBackendOptions<THandle>) {}

  countPages(documentPath: string, params: ExtractionParams, signal?: AbortSignal): Promise<number> {
    return countDocumentPages(this.options.source, documentPath, params.credential, signal);
  }

  async extract(unit: WorkUnit, signal?: AbortSignal): Promise<string> {
    const { source, reader } = this.options;
    try {
      return await withDocument(source, unit.documentPath, unit.params.credential, signal, async (handle) => {
        const text = await reader.readText(handle, pageIndices(unit.range), signal);
        throwIfCancelled(signal);
        return text;
      });
    } catch (error) {
      throw toExtractionError(error, unit.range, 'Text extraction');
    }
  }

  assemble(unitTexts: readonly string[]): string {
    return unitTexts.join('');
  }
}

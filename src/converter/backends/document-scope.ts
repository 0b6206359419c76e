import {
  CancellationError,
  ConversionError,
  DocumentError,
  DocumentSource,
  ExtractionError,
  PageRange,
  describeError,
  formatRange,
} from '../types.js';

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancellationError();
  }
}

/**
 * Open a document, hand the handle to `fn` and close it on every exit path.
 * Handles are never shared: each caller opens its own.
 */
export async function withDocument<THandle, T>(
  source: DocumentSource<THandle>,
  documentPath: string,
  credential: string | undefined,
  signal: AbortSignal | undefined,
  fn: (handle: THandle) => Promise<T> | T
): Promise<T> {
  throwIfCancelled(signal);
  const handle = await source.open(documentPath, credential);
  try {
    return await fn(handle);
  } finally {
    await source.close(handle);
  }
}

export async function countDocumentPages<THandle>(
  source: DocumentSource<THandle>,
  documentPath: string,
  credential: string | undefined,
  signal: AbortSignal | undefined
): Promise<number> {
  try {
    return await withDocument(source, documentPath, credential, signal, (handle) => source.pageCount(handle));
  } catch (error) {
    if (error instanceof CancellationError) throw error;
    throw new DocumentError(`Failed to open ${documentPath}: ${describeError(error)}`, documentPath, error);
  }
}

/** Cancellations and already-wrapped failures pass through untouched */
export function toExtractionError(error: unknown, range: PageRange, label: string): ConversionError {
  if (error instanceof CancellationError || error instanceof ExtractionError) {
    return error;
  }
  return new ExtractionError(`${label} failed for ${formatRange(range)}: ${describeError(error)}`, range, error);
}

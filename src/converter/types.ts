/**
 * Converter - Canonical Types
 *
 * These types describe the units of work the converter partitions a document
 * into, the capabilities it calls out to, and the errors it raises.
 */

import type { ProgressListener } from '../shared/types.js';

// ============================================================================
// Pages and work units
// ============================================================================

/** Zero-based page index */
export type PageIndex = number;

/** Contiguous, non-empty run of pages. `end` is exclusive. */
export interface PageRange {
  readonly start: PageIndex;
  readonly end: PageIndex;
}

export type ExtractionMode = 'never' | 'auto' | 'always';

export const EXTRACTION_MODES: readonly ExtractionMode[] = ['never', 'auto', 'always'];

export interface ExtractionParams {
  /** Password for encrypted documents */
  readonly credential?: string;
  /** Recognition language(s), e.g. 'eng' or 'eng+deu' */
  readonly language: string;
  /** Path to an external recognition executable */
  readonly toolPath?: string;
  /** Directory holding `<lang>.traineddata` files */
  readonly dataPath?: string;
}

export interface WorkUnit {
  readonly documentPath: string;
  readonly range: PageRange;
  readonly params: ExtractionParams;
}

export interface WorkResult {
  readonly startPageIndex: PageIndex;
  readonly text: string;
}

export function pageIndices(range: PageRange): PageIndex[] {
  const indices: PageIndex[] = [];
  for (let i = range.start; i < range.end; i += 1) {
    indices.push(i);
  }
  return indices;
}

export function rangeSize(range: PageRange): number {
  return Math.max(0, range.end - range.start);
}

/** 1-based, inclusive label used in messages, e.g. "pages 3-5" */
export function formatRange(range: PageRange): string {
  const first = range.start + 1;
  const last = range.end;
  return first === last ? `page ${first}` : `pages ${first}-${last}`;
}

// ============================================================================
// External capabilities
// ============================================================================

export interface DocumentSource<THandle> {
  open(documentPath: string, credential?: string): Promise<THandle>;
  pageCount(handle: THandle): number;
  close(handle: THandle): Promise<void>;
}

export interface TextLayerReader<THandle> {
  /**
   * Text of exactly these pages, in the given order, self-delimited. Stops
   * between pages once the signal is aborted.
   */
  readText(handle: THandle, indices: readonly PageIndex[], signal?: AbortSignal): Promise<string>;
}

export interface RasterImage {
  /** Encoded image bytes (PNG) */
  data: Buffer;
  width: number;
  height: number;
}

export interface PageRenderer<THandle> {
  render(handle: THandle, index: PageIndex, scale: number): Promise<RasterImage>;
}

export interface Recognizer {
  recognize(image: RasterImage, language: string): Promise<string>;
  /** Release the engine; safe to call more than once */
  terminate(): Promise<void>;
}

export interface RecognizerOptions {
  language: string;
  toolPath?: string;
  dataPath?: string;
}

export type RecognizerFactory = (options: RecognizerOptions) => Promise<Recognizer>;

export interface OutputSink {
  write(text: string, target: string): Promise<void>;
}

// ============================================================================
// Backends
// ============================================================================

export type BackendId = 'text-layer' | 'recognition';

export interface ExtractionBackend {
  readonly id: BackendId;

  /** Open the document once to learn its page count */
  countPages(documentPath: string, params: ExtractionParams, signal?: AbortSignal): Promise<number>;

  /** Extract exactly the unit's pages, in page order */
  extract(unit: WorkUnit, signal?: AbortSignal): Promise<string>;

  /** Join unit texts, already in ascending page order, into the final text */
  assemble(unitTexts: readonly string[]): string;
}

// ============================================================================
// Conversion
// ============================================================================

export interface ConvertOptions {
  documentPath: string;
  credential?: string;
  mode: ExtractionMode;
  language: string;
  toolPath?: string;
  dataPath?: string;
  workerCount: number;
  /** Raise StrategyExhaustedError instead of returning blank text */
  failOnEmpty: boolean;
  signal?: AbortSignal;
  onProgress?: ProgressListener;
}

export interface ConversionResult {
  text: string;
  /** Backend whose output was returned */
  strategy: BackendId;
  pages: number;
  /** Number of dispatch passes run (2 when auto mode fell back) */
  passes: number;
  durationMs: number;
}

// ============================================================================
// Errors
// ============================================================================

export class ConversionError extends Error {
  constructor(
    message: string,
    public code: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ConversionError';
  }
}

export class PartitionInputError extends ConversionError {
  constructor(
    message: string,
    public total: number,
    public parts: number
  ) {
    super(message, 'PARTITION_INPUT');
    this.name = 'PartitionInputError';
  }
}

export class ExtractionError extends ConversionError {
  constructor(
    message: string,
    public pageRange: PageRange,
    cause: unknown
  ) {
    super(message, 'EXTRACTION_FAILED', { cause });
    this.name = 'ExtractionError';
  }
}

export class DocumentError extends ConversionError {
  constructor(
    message: string,
    public documentPath: string,
    cause: unknown
  ) {
    super(message, 'DOCUMENT_OPEN_FAILED', { cause });
    this.name = 'DocumentError';
  }
}

export class PasswordError extends ConversionError {
  constructor(message: string, code: 'PASSWORD_REQUIRED' | 'PASSWORD_INCORRECT') {
    super(message, code);
    this.name = 'PasswordError';
  }
}

export class CancellationError extends ConversionError {
  constructor(message = 'Conversion was cancelled') {
    super(message, 'CANCELLED');
    this.name = 'CancellationError';
  }
}

export class StrategyExhaustedError extends ConversionError {
  constructor(public mode: ExtractionMode) {
    super(`No text could be extracted (mode: ${mode})`, 'STRATEGY_EXHAUSTED');
    this.name = 'StrategyExhaustedError';
  }
}

export class InputValidationError extends ConversionError {
  constructor(
    message: string,
    public issues: string[] = []
  ) {
    super(message, 'INVALID_INPUT');
    this.name = 'InputValidationError';
  }
}

export class OutputError extends ConversionError {
  constructor(
    message: string,
    public target: string,
    cause: unknown
  ) {
    super(message, 'OUTPUT_FAILED', { cause });
    this.name = 'OutputError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * flatpage - PDF to flat text
 *
 * Library entry point. The CLI lives in `main/index.ts`.
 */

export * from './converter/index.js';
export { createPdfConverter } from './main/pdf-converter.js';
export type { PdfConverterOptions } from './main/pdf-converter.js';
export { PdfJsDocumentSource, PdfJsTextReader, PAGE_BREAK } from './main/pdf-document.js';
export { FileSink, determineOutputPath, validatePaths } from './main/output.js';
export { runCli } from './main/cli.js';
export { log, setLogLevel } from './shared/logging.js';
export type { LogLevel, LogEntry } from './shared/logging.js';
export type { ProgressEvent, ProgressEventType, ProgressListener } from './shared/types.js';

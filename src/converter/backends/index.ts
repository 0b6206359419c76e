/**
 * Extraction Backends Index
 */

export { TextLayerBackend } from './text-layer.js';
export type { TextLayerBackendOptions } from './text-layer.js';
export { RecognitionBackend, DEFAULT_RECOGNITION_DPI, PDF_NATIVE_DPI, PAGE_SEPARATOR } from './recognition.js';
export type { RecognitionBackendOptions } from './recognition.js';
export { withDocument, throwIfCancelled } from './document-scope.js';

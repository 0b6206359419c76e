/**
 * Converter - Main Entry Point
 *
 * Partitions a document into page ranges, extracts them concurrently and
 * reassembles the text in page order.
 */

export { Converter } from './converter.js';
export type { ConverterBackends } from './converter.js';
export { DEFAULT_CONVERT_CONFIG, convertOptionsSchema, resolveConvertOptions } from './config.js';
export type { ConvertInput } from './config.js';
export { dispatch, planRanges } from './dispatcher.js';
export type { DispatchRequest } from './dispatcher.js';
export { partition } from './partition.js';
export { StrategySelector, isBlank } from './strategy.js';
export type { StrategyState, StrategyOutcome, BackendProvider } from './strategy.js';
export * from './types.js';
export * from './backends/index.js';

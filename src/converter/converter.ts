/**
 * Converter
 *
 * Entry point of the conversion core: validates options, lets the strategy
 * selector pick backends and runs each chosen backend through the dispatcher.
 */

import { performance } from 'node:perf_hooks';
import { log } from '../shared/logging.js';
import { ConvertInput, resolveConvertOptions } from './config.js';
import { dispatch } from './dispatcher.js';
import { createEmitter } from './progress.js';
import { StrategySelector, isBlank } from './strategy.js';
import {
  ConversionResult,
  ExtractionBackend,
  ExtractionParams,
  OutputSink,
  StrategyExhaustedError,
} from './types.js';

export interface ConverterBackends {
  textLayer: ExtractionBackend;
  /** Loaded on first use, so text-only conversions never touch recognition dependencies */
  recognition: () => Promise<ExtractionBackend>;
}

export class Converter {
  private recognition: Promise<ExtractionBackend> | null = null;

  constructor(private readonly backends: ConverterBackends) {}

  async convert(input: ConvertInput): Promise<ConversionResult> {
    const options = resolveConvertOptions(input);
    const { documentPath, mode, workerCount, signal, onProgress } = options;
    const params: ExtractionParams = {
      credential: options.credential,
      language: options.language,
      toolPath: options.toolPath,
      dataPath: options.dataPath,
    };
    const emit = createEmitter(onProgress);
    const start = performance.now();
    let pages = 0;

    log({ scope: 'converter', message: 'conversion started', data: { documentPath, mode, workerCount } });

    const selector = new StrategySelector(
      mode,
      {
        textLayer: () => this.backends.textLayer,
        recognition: () => this.loadRecognition(),
      },
      emit
    );

    const outcome = await selector.run(async (backend) => {
      const totalPages = await backend.countPages(documentPath, params, signal);
      pages = totalPages;
      return dispatch({ documentPath, totalPages, params, workerCount, backend, signal, onProgress });
    });

    if (options.failOnEmpty && isBlank(outcome.text)) {
      throw new StrategyExhaustedError(mode);
    }
    if (isBlank(outcome.text)) {
      log({ scope: 'converter', level: 'warn', message: 'no text extracted', data: { mode, strategy: outcome.strategy } });
    }

    const durationMs = Math.round(performance.now() - start);
    emit({ type: 'done', backend: outcome.strategy, pages, durationMs });
    log({
      scope: 'converter',
      message: 'conversion complete',
      data: { strategy: outcome.strategy, passes: outcome.passes, pages, durationMs },
    });

    return { text: outcome.text, strategy: outcome.strategy, pages, passes: outcome.passes, durationMs };
  }

  async convertToText(input: ConvertInput): Promise<string> {
    const result = await this.convert(input);
    return result.text;
  }

  /** The sink is only reached once the whole conversion has succeeded */
  async convertToSink(input: ConvertInput, sink: OutputSink, target: string): Promise<ConversionResult> {
    const result = await this.convert(input);
    await sink.write(result.text, target);
    return result;
  }

  private loadRecognition(): Promise<ExtractionBackend> {
    if (!this.recognition) {
      this.recognition = this.backends.recognition().catch((error: unknown) => {
        this.recognition = null;
        throw error;
      });
    }
    return this.recognition;
  }
}

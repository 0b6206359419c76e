/**
 * Parallel Dispatcher
 *
 * Fans the page ranges of one document out to a backend, collects results as
 * they arrive and reassembles them in page order. Every unit opens its own
 * document handle; the only thing shared between units is the abort signal.
 */

import { performance } from 'node:perf_hooks';
import { log } from '../shared/logging.js';
import type { ProgressListener } from '../shared/types.js';
import { throwIfCancelled } from './backends/document-scope.js';
import { partition } from './partition.js';
import { createEmitter, Emit } from './progress.js';
import {
  CancellationError,
  ConversionError,
  ExtractionBackend,
  ExtractionParams,
  PageRange,
  WorkResult,
  WorkUnit,
  describeError,
} from './types.js';

export interface DispatchRequest {
  documentPath: string;
  totalPages: number;
  params: ExtractionParams;
  workerCount: number;
  backend: ExtractionBackend;
  signal?: AbortSignal;
  onProgress?: ProgressListener;
}

export function planRanges(totalPages: number, workerCount: number): PageRange[] {
  if (totalPages <= 0) return [];
  if (workerCount <= 1 || totalPages === 1) {
    return [{ start: 0, end: totalPages }];
  }
  return partition(totalPages, workerCount);
}

export async function dispatch(request: DispatchRequest): Promise<string> {
  const { documentPath, totalPages, params, workerCount, backend, signal } = request;
  if (totalPages <= 0) return '';
  throwIfCancelled(signal);

  const emit = createEmitter(request.onProgress);
  const units: WorkUnit[] = planRanges(totalPages, workerCount).map((range) => ({ documentPath, range, params }));
  const start = performance.now();

  log({
    scope: 'dispatch',
    message: 'dispatching units',
    data: { backend: backend.id, pages: totalPages, units: units.length, workers: workerCount },
  });
  emit({ type: 'start', backend: backend.id, pages: totalPages, units: units.length });

  const results = await runUnits(units, backend, signal, emit);
  const text = backend.assemble(results.map((result) => result.text));

  const durationMs = Math.round(performance.now() - start);
  log({ scope: 'dispatch', message: 'dispatch complete', data: { backend: backend.id, durationMs, chars: text.length } });
  return text;
}

/**
 * Start every unit at once. Results are written into a buffer slot per range
 * position, so arrival order never affects output order. The first failure,
 * or an external abort, aborts the rest and returns without waiting for units
 * still in flight; they observe the aborted signal and release their handles
 * on their own.
 */
async function runUnits(
  units: readonly WorkUnit[],
  backend: ExtractionBackend,
  signal: AbortSignal | undefined,
  emit: Emit
): Promise<WorkResult[]> {
  const controller = new AbortController();
  const forwardAbort = () => controller.abort();
  signal?.addEventListener('abort', forwardAbort, { once: true });

  const buffer: Array<WorkResult | undefined> = units.map(() => undefined);
  let failure: unknown;

  const runUnit = async (unit: WorkUnit, position: number): Promise<void> => {
    const unitStart = performance.now();
    const firstPage = unit.range.start + 1;
    const lastPage = unit.range.end;
    emit({ type: 'unit-start', backend: backend.id, firstPage, lastPage });
    log({ scope: 'dispatch', level: 'debug', message: 'unit started', data: { firstPage, lastPage } });

    try {
      const text = await backend.extract(unit, controller.signal);
      buffer[position] = { startPageIndex: unit.range.start, text };
      const durationMs = Math.round(performance.now() - unitStart);
      emit({ type: 'unit-done', backend: backend.id, firstPage, lastPage, durationMs });
      log({ scope: 'dispatch', level: 'debug', message: 'unit finished', data: { firstPage, lastPage, durationMs } });
    } catch (error) {
      if (controller.signal.aborted) {
        log({ scope: 'dispatch', level: 'debug', message: 'unit stopped after abort', data: { firstPage, lastPage } });
        return;
      }
      failure = error;
      controller.abort();
      emit({ type: 'unit-error', backend: backend.id, firstPage, lastPage, error: describeError(error) });
      log({ scope: 'dispatch', level: 'error', message: 'unit failed', data: { firstPage, lastPage, error: describeError(error) } });
    }
  };

  const aborted = new Promise<void>((resolve) => {
    if (controller.signal.aborted) resolve();
    else controller.signal.addEventListener('abort', () => resolve(), { once: true });
  });

  try {
    // runUnit never rejects, so units left behind by the race cannot surface as unhandled rejections
    await Promise.race([Promise.all(units.map((unit, position) => runUnit(unit, position))), aborted]);
  } finally {
    signal?.removeEventListener('abort', forwardAbort);
  }

  if (signal?.aborted) {
    throw new CancellationError();
  }
  if (failure !== undefined) {
    throw failure;
  }

  const results = buffer.filter((result): result is WorkResult => result !== undefined);
  if (results.length !== units.length) {
    throw new ConversionError(`Only ${results.length} of ${units.length} units produced a result`, 'INCOMPLETE_DISPATCH');
  }
  return results;
}

import type { ProgressEvent, ProgressListener } from '../shared/types.js';
import { log } from '../shared/logging.js';
import { describeError } from './types.js';

export type Emit = (event: ProgressEvent) => void;

/** Listener failures are logged and never reach the conversion */
export const createEmitter = (listener?: ProgressListener): Emit => {
  if (!listener) return () => undefined;
  return (event) => {
    try {
      listener(event);
    } catch (error) {
      log({ scope: 'progress', level: 'warn', message: 'progress listener threw', data: { event: event.type, error: describeError(error) } });
    }
  };
};

export type ProgressEventType =
  | 'start'
  | 'unit-start'
  | 'unit-done'
  | 'unit-error'
  | 'fallback'
  | 'done';

export interface ProgressEvent {
  type: ProgressEventType;
  backend?: 'text-layer' | 'recognition';
  /** Total pages in the document */
  pages?: number;
  /** Number of work units dispatched */
  units?: number;
  /** 1-based first and last page of the unit */
  firstPage?: number;
  lastPage?: number;
  durationMs?: number;
  message?: string;
  error?: string;
}

export type ProgressListener = (event: ProgressEvent) => void;

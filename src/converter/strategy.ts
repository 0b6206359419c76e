import { log } from '../shared/logging.js';
import type { Emit } from './progress.js';
import { BackendId, ConversionError, ExtractionBackend, ExtractionMode } from './types.js';

export type StrategyState = 'start' | BackendId | 'done';

/**
 * Valid transitions. `start` picks the first backend from the mode; the only
 * way to visit both backends is `text-layer` → `recognition` in auto mode.
 */
const TRANSITIONS: ReadonlyMap<StrategyState, readonly StrategyState[]> = new Map<StrategyState, readonly StrategyState[]>([
  ['start', ['text-layer', 'recognition']],
  ['text-layer', ['recognition', 'done']],
  ['recognition', ['done']],
  ['done', []],
]);

export function isBlank(text: string): boolean {
  return text.trim() === '';
}

export interface BackendProvider {
  textLayer(): ExtractionBackend;
  /** Resolved at most once, and only when recognition is actually needed */
  recognition(): Promise<ExtractionBackend>;
}

export interface StrategyOutcome {
  text: string;
  strategy: BackendId;
  passes: number;
}

export type RunBackend = (backend: ExtractionBackend) => Promise<string>;

/**
 * Picks between the text layer and recognition for one conversion. Instances
 * are single use.
 */
export class StrategySelector {
  private state: StrategyState = 'start';
  private passes = 0;

  constructor(
    private readonly mode: ExtractionMode,
    private readonly backends: BackendProvider,
    private readonly emit: Emit = () => undefined
  ) {}

  get current(): StrategyState {
    return this.state;
  }

  async run(runBackend: RunBackend): Promise<StrategyOutcome> {
    if (this.state !== 'start') {
      throw new ConversionError(`Strategy already ${this.state === 'done' ? 'finished' : 'running'}`, 'STRATEGY_REENTERED');
    }

    if (this.mode === 'always') {
      this.transition('recognition');
      return this.finish(await this.pass(runBackend, await this.backends.recognition()), 'recognition');
    }

    this.transition('text-layer');
    const text = await this.pass(runBackend, this.backends.textLayer());
    if (this.mode === 'never' || !isBlank(text)) {
      return this.finish(text, 'text-layer');
    }

    log({ scope: 'strategy', message: 'text layer is empty, falling back to recognition' });
    this.emit({ type: 'fallback', backend: 'recognition', message: 'text layer is empty' });
    this.transition('recognition');
    return this.finish(await this.pass(runBackend, await this.backends.recognition()), 'recognition');
  }

  private async pass(runBackend: RunBackend, backend: ExtractionBackend): Promise<string> {
    this.passes += 1;
    return runBackend(backend);
  }

  private finish(text: string, strategy: BackendId): StrategyOutcome {
    this.transition('done');
    return { text, strategy, passes: this.passes };
  }

  private transition(next: StrategyState): void {
    const allowed = TRANSITIONS.get(this.state) ?? [];
    if (!allowed.includes(next)) {
      throw new ConversionError(`Invalid strategy transition: ${this.state} → ${next}`, 'STRATEGY_TRANSITION');
    }
    log({ scope: 'strategy', level: 'debug', message: 'transition', data: { from: this.state, to: next, mode: this.mode } });
    this.state = next;
  }
}

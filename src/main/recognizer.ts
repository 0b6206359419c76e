/**
 * Recognizers
 *
 * Pages are piped through the `tesseract` executable by default, found on
 * PATH unless a tool path is configured. Given a directory of language data
 * and no tool path, tesseract.js runs the engine in-process and reads the
 * `<lang>.traineddata` files from that directory; it never fetches them.
 */

import { spawn } from 'node:child_process';
import type { Worker } from 'tesseract.js';
import { ConversionError, RasterImage, Recognizer, RecognizerOptions, describeError } from '../converter/types.js';
import { log } from '../shared/logging.js';

export const DEFAULT_TESSERACT_EXECUTABLE = 'tesseract';

export class TesseractJsRecognizer implements Recognizer {
  private terminated = false;

  private constructor(
    private readonly worker: Worker,
    private language: string
  ) {}

  /**
   * Always call terminate() when done; workers hold the wasm engine and the
   * language data in memory.
   */
  static async create(language: string, dataPath: string): Promise<TesseractJsRecognizer> {
    // Dynamic import keeps tesseract.js out of text-only runs
    const { createWorker, OEM } = await import('tesseract.js');
    const worker = await createWorker(language, OEM.LSTM_ONLY, {
      langPath: dataPath,
      gzip: false,
      cacheMethod: 'none',
    });
    return new TesseractJsRecognizer(worker, language);
  }

  async recognize(image: RasterImage, language: string): Promise<string> {
    if (language !== this.language) {
      await this.worker.reinitialize(language);
      this.language = language;
    }
    const result = await this.worker.recognize(image.data);
    return result.data.text;
  }

  async terminate(): Promise<void> {
    if (this.terminated) return;
    this.terminated = true;
    await this.worker.terminate();
  }
}

export class TesseractCliRecognizer implements Recognizer {
  constructor(
    private readonly executable: string = DEFAULT_TESSERACT_EXECUTABLE,
    private readonly dataPath?: string
  ) {}

  recognize(image: RasterImage, language: string): Promise<string> {
    const args = ['stdin', 'stdout', '-l', language];
    if (this.dataPath) args.push('--tessdata-dir', this.dataPath);

    return new Promise((resolve, reject) => {
      const child = spawn(this.executable, args, {
        stdio: ['pipe', 'pipe', 'pipe'],
      });
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];

      child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
      child.on('error', (error) => {
        reject(new ConversionError(`Could not run ${this.executable}: ${describeError(error)}`, 'RECOGNIZER_UNAVAILABLE', { cause: error }));
      });
      child.on('close', (code) => {
        if (code === 0) {
          resolve(Buffer.concat(stdout).toString('utf8'));
          return;
        }
        const detail = Buffer.concat(stderr).toString('utf8').trim();
        reject(new ConversionError(`${this.executable} exited with code ${code}: ${detail}`, 'RECOGNIZER_FAILED'));
      });

      child.stdin.on('error', (error) => {
        log({ scope: 'recognizer', level: 'debug', message: 'stdin closed early', data: { error: describeError(error) } });
      });
      child.stdin.end(image.data);
    });
  }

  async terminate(): Promise<void> {
    // One process per page; nothing stays running between calls
  }
}

export async function createRecognizer({ language, toolPath, dataPath }: RecognizerOptions): Promise<Recognizer> {
  if (dataPath && !toolPath) {
    log({ scope: 'recognizer', level: 'debug', message: 'using tesseract.js', data: { dataPath } });
    return TesseractJsRecognizer.create(language, dataPath);
  }
  const executable = toolPath ?? DEFAULT_TESSERACT_EXECUTABLE;
  log({ scope: 'recognizer', level: 'debug', message: 'using tesseract executable', data: { executable, dataPath } });
  return new TesseractCliRecognizer(executable, dataPath);
}

import path from 'node:path';
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import type { Converter } from '../converter/converter.js';
import {
  CancellationError,
  ConversionResult,
  EXTRACTION_MODES,
  ExtractionMode,
  InputValidationError,
  OutputSink,
  describeError,
} from '../converter/types.js';
import { log, setLogLevel } from '../shared/logging.js';
import type { ProgressEvent } from '../shared/types.js';
import { FileSink, determineOutputPath, validateInput, validatePaths } from './output.js';
import { PdfConverterOptions, createPdfConverter } from './pdf-converter.js';

export const EXIT_OK = 0;
export const EXIT_INVALID_INPUT = 2;
export const EXIT_FAILURE = 3;
export const EXIT_INTERRUPTED = 130;

interface CliOptions {
  output?: string;
  overwrite: boolean;
  password?: string;
  ocr: ExtractionMode;
  ocrLang: string;
  tesseractPath?: string;
  tessdata?: string;
  workers: number;
  dpi: number;
  stdout: boolean;
  failOnEmpty: boolean;
  verbose: boolean;
  quiet: boolean;
}

export interface CliDependencies {
  createConverter: (options: PdfConverterOptions) => Converter;
  sink: OutputSink;
  writeOut: (text: string) => void;
  writeErr: (text: string) => void;
  /** Aborting it has the same effect as Ctrl+C */
  signal?: AbortSignal;
}

const defaultDependencies: CliDependencies = {
  createConverter: createPdfConverter,
  sink: new FileSink(),
  writeOut: (text) => process.stdout.write(text),
  writeErr: (text) => process.stderr.write(text),
};

const parseInteger = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
};

const parsePositive = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Not a positive number.');
  }
  return parsed;
};

export function buildProgram(deps: Pick<CliDependencies, 'writeOut' | 'writeErr'>): Command {
  return new Command()
    .name('flatpage')
    .description('Convert a PDF to a single TXT file (text only, no images).')
    .argument('<input>', 'path to the input PDF file')
    .option('-o, --output <path>', "output file or directory; defaults to '<input name>.txt' beside the input")
    .option('--overwrite', 'allow overwriting an existing output file', false)
    .option('--password <password>', 'password for encrypted PDFs')
    .addOption(
      new Option('--ocr <mode>', "'never' uses embedded text only, 'auto' falls back to OCR when no text is found, 'always' forces OCR")
        .choices(EXTRACTION_MODES)
        .default('never')
    )
    .addOption(new Option('--ocr-lang <lang>', "tesseract language(s), e.g. 'eng' or 'eng+hin'").default('eng').env('FLATPAGE_OCR_LANG'))
    .addOption(new Option('--tesseract-path <path>', "tesseract executable; defaults to 'tesseract' on PATH").env('TESSERACT_PATH'))
    .addOption(
      new Option('--tessdata <dir>', 'directory of <lang>.traineddata files; without --tesseract-path, OCR runs in-process with tesseract.js').env(
        'FLATPAGE_TESSDATA'
      )
    )
    .addOption(
      new Option('-w, --workers <n>', 'parallel workers; pages are split across them and joined in order')
        .argParser(parseInteger)
        .default(1)
        .env('FLATPAGE_WORKERS')
    )
    .addOption(new Option('--dpi <dpi>', 'render resolution for OCR').argParser(parsePositive).default(200))
    .option('--stdout', 'print the text instead of writing a file', false)
    .option('--fail-on-empty', 'exit with an error when no text could be extracted', false)
    .option('--verbose', 'log debug details', false)
    .option('--quiet', 'only log errors', false)
    .exitOverride()
    .configureOutput({ writeOut: deps.writeOut, writeErr: deps.writeErr });
}

const logProgress = (event: ProgressEvent): void => {
  if (event.type === 'fallback') {
    log({ scope: 'cli', level: 'warn', message: 'no embedded text found, running OCR' });
  } else if (event.type === 'unit-done') {
    log({ scope: 'cli', level: 'debug', message: 'pages done', data: { firstPage: event.firstPage, lastPage: event.lastPage } });
  }
};

export async function runCli(argv: readonly string[], overrides: Partial<CliDependencies> = {}): Promise<number> {
  const deps: CliDependencies = { ...defaultDependencies, ...overrides };
  const program = buildProgram(deps);

  try {
    program.parse([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_OK : EXIT_INVALID_INPUT;
    }
    throw error;
  }

  const opts = program.opts<CliOptions>();
  const [input] = program.args;
  if (!input) {
    deps.writeErr('Error: missing input PDF\n');
    return EXIT_INVALID_INPUT;
  }
  if (opts.verbose) setLogLevel('debug');
  if (opts.quiet) setLogLevel('error');

  const inputPdf = path.resolve(input);
  let outputTxt: string | undefined;
  try {
    if (opts.stdout) {
      await validateInput(inputPdf);
    } else {
      outputTxt = await determineOutputPath(inputPdf, opts.output);
      await validatePaths(inputPdf, outputTxt, opts.overwrite);
    }
  } catch (error) {
    deps.writeErr(`Error: ${describeError(error)}\n`);
    return EXIT_INVALID_INPUT;
  }

  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once('SIGINT', onInterrupt);
  deps.signal?.addEventListener('abort', onInterrupt, { once: true });
  if (deps.signal?.aborted) controller.abort();

  try {
    const converter = deps.createConverter({ dpi: opts.dpi });
    const request = {
      documentPath: inputPdf,
      credential: opts.password,
      mode: opts.ocr,
      language: opts.ocrLang,
      toolPath: opts.tesseractPath,
      dataPath: opts.tessdata,
      workerCount: opts.workers,
      failOnEmpty: opts.failOnEmpty,
      signal: controller.signal,
      onProgress: logProgress,
    };

    let result: ConversionResult;
    if (outputTxt === undefined) {
      result = await converter.convert(request);
      deps.writeOut(result.text);
    } else {
      result = await converter.convertToSink(request, deps.sink, outputTxt);
      deps.writeOut(`Success: Wrote text to ${outputTxt}\n`);
    }
    log({ scope: 'cli', level: 'debug', message: 'finished', data: { strategy: result.strategy, pages: result.pages } });
    return EXIT_OK;
  } catch (error) {
    if (error instanceof CancellationError) {
      deps.writeErr('Interrupted by user (Ctrl+C).\n');
      return EXIT_INTERRUPTED;
    }
    deps.writeErr(`Error: ${describeError(error)}\n`);
    return error instanceof InputValidationError ? EXIT_INVALID_INPUT : EXIT_FAILURE;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
    deps.signal?.removeEventListener('abort', onInterrupt);
  }
}


/**
 * Process entry point. Sets `process.exitCode` rather than exiting, so text
 * still buffered for a piped stdout is written out before the process ends.
 */
export async function main(argv: readonly string[], overrides: Partial<CliDependencies> = {}): Promise<void> {
  process.exitCode = await runCli(argv, overrides);
}

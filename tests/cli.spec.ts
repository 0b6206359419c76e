import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Converter } from '../src/converter/converter.js';
import { ExtractionBackend } from '../src/converter/types.js';
import { EXIT_FAILURE, EXIT_INTERRUPTED, EXIT_INVALID_INPUT, EXIT_OK, main, runCli } from '../src/main/cli.js';
import { PdfConverterOptions } from '../src/main/pdf-converter.js';
import { setLogLevel } from '../src/shared/logging.js';
import { MemorySink, StubBackend } from './fakes.js';

let dir: string;
let input: string;

beforeEach(async () => {
  setLogLevel('error');
  dir = await mkdtemp(path.join(tmpdir(), 'flatpage-cli-'));
  input = path.join(dir, 'scan.pdf');
  await writeFile(input, '%PDF-1.4');
});

afterEach(async () => {
  setLogLevel('info');
  await rm(dir, { recursive: true, force: true });
});

class FailingBackend extends StubBackend {
  async extract(): Promise<string> {
    throw new Error('broken xref table');
  }
}

function harness(textLayer: ExtractionBackend = new StubBackend('text-layer', 'hello\n')) {
  const out: string[] = [];
  const err: string[] = [];
  const converterOptions: PdfConverterOptions[] = [];
  const recognition = new StubBackend('recognition', 'ocr text');
  const deps = {
    createConverter: (options: PdfConverterOptions) => {
      converterOptions.push(options);
      return new Converter({ textLayer, recognition: async () => recognition });
    },
    writeOut: (text: string) => {
      out.push(text);
    },
    writeErr: (text: string) => {
      err.push(text);
    },
  };
  return { deps, out, err, converterOptions, recognition };
}

describe('runCli', () => {
  it('writes <input>.txt beside the input and reports success', async () => {
    const { deps, out } = harness();
    const code = await runCli([input], deps);

    const output = path.join(dir, 'scan.txt');
    expect(code).toBe(EXIT_OK);
    expect(out).toEqual([`Success: Wrote text to ${output}\n`]);
    await expect(readFile(output, 'utf8')).resolves.toBe(process.platform === 'win32' ? 'hello\r\n' : 'hello\n');
  });

  it('prints the text with --stdout', async () => {
    const { deps, out } = harness();
    await expect(runCli([input, '--stdout'], deps)).resolves.toBe(EXIT_OK);
    expect(out).toEqual(['hello\n']);
  });

  it('passes OCR options to the converter', async () => {
    const sink = new MemorySink();
    const { deps, recognition, converterOptions } = harness(new StubBackend('text-layer', ''));
    const code = await runCli([input, '--ocr', 'auto', '--ocr-lang', 'eng+hin', '-w', '4', '--dpi', '300', '-o', path.join(dir, 'result')], {
      ...deps,
      sink,
    });

    expect(code).toBe(EXIT_OK);
    expect(recognition.extractCalls).toBe(1);
    expect(converterOptions).toEqual([{ dpi: 300 }]);
    expect(sink.writes).toEqual([{ text: 'ocr text', target: path.join(dir, 'result.txt') }]);
  });

  it('refuses to replace an existing output without --overwrite', async () => {
    const output = path.join(dir, 'scan.txt');
    await writeFile(output, 'old');
    const { deps, err } = harness();

    await expect(runCli([input], deps)).resolves.toBe(EXIT_INVALID_INPUT);
    expect(err).toEqual([`Error: Output file already exists: ${output}. Use --overwrite to replace it.\n`]);
    await expect(readFile(output, 'utf8')).resolves.toBe('old');

    await expect(runCli([input, '--overwrite'], harness().deps)).resolves.toBe(EXIT_OK);
  });

  it('rejects a non-pdf input', async () => {
    const notes = path.join(dir, 'notes.txt');
    await writeFile(notes, 'x');
    const { deps, err } = harness();

    await expect(runCli([notes, '--stdout'], deps)).resolves.toBe(EXIT_INVALID_INPUT);
    expect(err).toEqual([`Error: Input file must be a .pdf: ${notes}\n`]);
  });

  it('rejects malformed arguments', async () => {
    const { deps } = harness();
    await expect(runCli([input, '--workers', 'many'], deps)).resolves.toBe(EXIT_INVALID_INPUT);
    await expect(runCli([input, '--ocr', 'sometimes'], harness().deps)).resolves.toBe(EXIT_INVALID_INPUT);
    await expect(runCli([], harness().deps)).resolves.toBe(EXIT_INVALID_INPUT);
  });

  it('exits with 3 and writes nothing when extraction fails', async () => {
    const sink = new MemorySink();
    const { deps, err } = harness(new FailingBackend('text-layer', ''));

    await expect(runCli([input], { ...deps, sink })).resolves.toBe(EXIT_FAILURE);
    expect(err).toEqual(['Error: broken xref table\n']);
    expect(sink.writes).toEqual([]);
  });

  it('exits with 130 when interrupted', async () => {
    const sink = new MemorySink();
    const controller = new AbortController();
    controller.abort();
    const { deps, err } = harness();

    await expect(runCli([input], { ...deps, sink, signal: controller.signal })).resolves.toBe(EXIT_INTERRUPTED);
    expect(err).toEqual(['Interrupted by user (Ctrl+C).\n']);
    expect(sink.writes).toEqual([]);
  });

  it('exits with 3 when --fail-on-empty finds no text', async () => {
    const { deps, err } = harness(new StubBackend('text-layer', '  '));
    await expect(runCli([input, '--stdout', '--fail-on-empty'], deps)).resolves.toBe(EXIT_FAILURE);
    expect(err).toEqual(['Error: No text could be extracted (mode: never)\n']);
  });
});

describe('main', () => {
  afterEach(() => {
    process.exitCode = undefined;
    vi.restoreAllMocks();
  });

  it('sets the exit code and leaves the process running so stdout can drain', async () => {
    const exit = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
    const { deps, out } = harness();

    await main([input, '--stdout'], deps);
    expect(process.exitCode).toBe(EXIT_OK);
    expect(out).toEqual(['hello\n']);

    await main([path.join(dir, 'missing.pdf'), '--stdout'], harness().deps);
    expect(process.exitCode).toBe(EXIT_INVALID_INPUT);
    expect(exit).not.toHaveBeenCalled();
  });
});

import { stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { InputValidationError, OutputError, OutputSink, describeError } from '../converter/types.js';

async function statOrNull(target: string) {
  try {
    return await stat(target);
  } catch (error) {
    if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * No option: `<input>.txt` beside the input. A directory: `<dir>/<input stem>.txt`.
 * Anything else is a file path, given a `.txt` extension when it lacks one.
 */
export async function determineOutputPath(inputPdf: string, output?: string): Promise<string> {
  const stem = path.basename(inputPdf, path.extname(inputPdf));
  if (output === undefined || output.trim() === '') {
    return path.join(path.dirname(inputPdf), `${stem}.txt`);
  }

  const resolved = path.resolve(output);
  const existing = await statOrNull(resolved);
  if (existing?.isDirectory()) {
    return path.join(resolved, `${stem}.txt`);
  }
  if (path.extname(resolved).toLowerCase() !== '.txt') {
    return `${resolved.slice(0, resolved.length - path.extname(resolved).length)}.txt`;
  }
  return resolved;
}

export async function validateInput(inputPdf: string): Promise<void> {
  const input = await statOrNull(inputPdf);
  if (!input) {
    throw new InputValidationError(`Input PDF not found: ${inputPdf}`);
  }
  if (!input.isFile()) {
    throw new InputValidationError(`Input path is not a file: ${inputPdf}`);
  }
  if (path.extname(inputPdf).toLowerCase() !== '.pdf') {
    throw new InputValidationError(`Input file must be a .pdf: ${inputPdf}`);
  }
}

export async function validateOutput(outputTxt: string, overwrite: boolean): Promise<void> {
  const outputDir = path.dirname(outputTxt);
  const dir = await statOrNull(outputDir);
  if (!dir?.isDirectory()) {
    throw new InputValidationError(`Output directory does not exist: ${outputDir}`);
  }
  if ((await statOrNull(outputTxt)) && !overwrite) {
    throw new InputValidationError(`Output file already exists: ${outputTxt}. Use --overwrite to replace it.`);
  }
}

export async function validatePaths(inputPdf: string, outputTxt: string, overwrite: boolean): Promise<void> {
  await validateInput(inputPdf);
  await validateOutput(outputTxt, overwrite);
}

export function normalizeLineEndings(text: string, platform: NodeJS.Platform = process.platform): string {
  return platform === 'win32' ? text.replace(/\r?\n/g, '\r\n') : text;
}

export class FileSink implements OutputSink {
  constructor(private readonly platform: NodeJS.Platform = process.platform) {}

  async write(text: string, target: string): Promise<void> {
    try {
      await writeFile(target, normalizeLineEndings(text, this.platform), 'utf8');
    } catch (error) {
      throw new OutputError(`Failed to write output file: ${target}: ${describeError(error)}`, target, error);
    }
  }
}

import { z } from 'zod';
import { ConvertOptions, InputValidationError } from './types.js';

export const DEFAULT_CONVERT_CONFIG = {
  mode: 'never',
  language: 'eng',
  workerCount: 1,
  failOnEmpty: false,
} satisfies Pick<ConvertOptions, 'mode' | 'language' | 'workerCount' | 'failOnEmpty'>;

/** Tesseract style language list: `eng`, `eng+deu`, `chi_sim` */
const LANGUAGE_PATTERN = /^[A-Za-z0-9_]+(\+[A-Za-z0-9_]+)*$/;

export const convertOptionsSchema = z.object({
  documentPath: z.string().min(1, 'document path is required'),
  credential: z.string().optional(),
  mode: z.enum(['never', 'auto', 'always']),
  language: z.string().regex(LANGUAGE_PATTERN, 'expected language codes joined by "+", e.g. eng+deu'),
  toolPath: z.string().min(1).optional(),
  dataPath: z.string().min(1).optional(),
  workerCount: z.number().int('worker count must be a whole number'),
  failOnEmpty: z.boolean(),
});

export type ConvertInput = Pick<ConvertOptions, 'documentPath'> & Partial<Omit<ConvertOptions, 'documentPath'>>;

export function resolveConvertOptions(input: ConvertInput): ConvertOptions {
  const parsed = convertOptionsSchema.safeParse({
    documentPath: input.documentPath,
    credential: input.credential,
    mode: input.mode ?? DEFAULT_CONVERT_CONFIG.mode,
    language: input.language ?? DEFAULT_CONVERT_CONFIG.language,
    toolPath: input.toolPath,
    dataPath: input.dataPath,
    workerCount: input.workerCount ?? DEFAULT_CONVERT_CONFIG.workerCount,
    failOnEmpty: input.failOnEmpty ?? DEFAULT_CONVERT_CONFIG.failOnEmpty,
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`);
    throw new InputValidationError(`Invalid conversion options: ${issues.join('; ')}`, issues);
  }

  return { ...parsed.data, signal: input.signal, onProgress: input.onProgress };
}

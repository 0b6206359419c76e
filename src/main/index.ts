#!/usr/bin/env node
import { argv } from 'node:process';
import { describeError } from '../converter/types.js';
import { log } from '../shared/logging.js';
import { EXIT_FAILURE, main } from './cli.js';

main(argv.slice(2)).catch((error: unknown) => {
  log({ scope: 'cli', level: 'error', message: 'unexpected failure', data: { error: describeError(error) } });
  process.exitCode = EXIT_FAILURE;
});

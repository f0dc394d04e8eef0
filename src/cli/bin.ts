#!/usr/bin/env node
/**
 * Executable entry point for the fluentpipe CLI.
 *
 * @module cli/bin
 */

import { describeError } from '../core/errors.js';
import { main } from './index.js';

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(`Error: ${describeError(error)}`);
    process.exitCode = 1;
  });

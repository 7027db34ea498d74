#!/usr/bin/env node
import { buildProgram } from './program.js';
import { formatCliError } from './shared/exitCode.js';

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(formatCliError(error));
    process.exitCode = 1;
  });

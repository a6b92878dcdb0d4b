#!/usr/bin/env node
import { createProgram } from './program.js';
import { reportFailure } from './diagnostics.js';

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    reportFailure(err);
  });

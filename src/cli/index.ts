#!/usr/bin/env node
import { describeFailure } from './format';
import { createProgram } from './program';

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(`\n${describeFailure(err)}\n`);
    process.exitCode = 1;
  });

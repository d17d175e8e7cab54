#!/usr/bin/env node
import { describeError } from '@bessie/core';

import { runCli } from '../src/runner.js';

runCli(process.argv).catch((error: unknown) => {
  // `runCli` reports its own failures; this only sees errors thrown before it could.
  console.error(describeError(error));
  process.exitCode = 1;
});

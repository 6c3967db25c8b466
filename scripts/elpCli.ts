#!/usr/bin/env node
// scripts/elpCli.ts
// Entry point for the build-elp-data command.

import { errorMessage, logError } from '../engine/logger';
import { createProgram } from './buildElpData';

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    logError('cli_failed', { error: errorMessage(err) });
    process.exitCode = 1;
  });

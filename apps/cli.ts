#!/usr/bin/env node
/**
 * multiarch-build entry point
 */

import { exit, argv } from 'node:process';
import { runCli } from '../src/cli/cli';
import { renderError } from '../src/lib/errors';
import { ExitCode } from '../src/domain/types/errors';

void runCli(argv.slice(2)).then(
  (code) => exit(code),
  (error: unknown) => {
    console.error(renderError(error));
    exit(ExitCode.UNKNOWN);
  },
);

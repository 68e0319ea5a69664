#!/usr/bin/env node

import { runCli } from './cli/runCli';
import { defaultLogger } from './common/logger';
import { errorMessage } from './common/errors';

runCli()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    defaultLogger.error('Unexpected failure', { error: errorMessage(error) });
    process.stderr.write(`scylla-ami-configure: ${errorMessage(error)}\n`);
    process.exitCode = 1;
  });

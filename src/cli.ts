#!/usr/bin/env node
import 'dotenv/config';

import { serializeError } from './errors.js';
import { run } from './runner.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('cli');

// ─── Entry Point ───────────────────────────────────────

run(process.argv.slice(2))
  .then((report) => {
    process.stdout.write(`${report}\n`);
  })
  .catch((err: unknown) => {
    log.fatal({ error: serializeError(err) }, 'Backtest failed');
    process.exitCode = 1;
  });

#!/usr/bin/env node
/**
 * block-inspector entry point
 */

import { runCli } from './commands.js';

const controller = new AbortController();
process.once('SIGINT', () => {
  process.stderr.write('\nStopping...\n');
  controller.abort();
});

process.exitCode = await runCli(process.argv.slice(2), { signal: controller.signal });
process.removeAllListeners('SIGINT');

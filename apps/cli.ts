#!/usr/bin/env node
/**
 * Organization Dependency Scanner CLI entry point
 */

import { main, readPackageVersion } from '../src/cli/cli.js';
import { createLogger } from '../src/lib/logger.js';

const version = readPackageVersion(__dirname);

process.on('unhandledRejection', (reason) => {
  createLogger({ name: 'cli' }).fatal({ reason }, 'Unhandled rejection in CLI');
  console.error('❌ Unhandled rejection:', reason);
  process.exit(1);
});

main(process.argv, version).catch((error: unknown) => {
  createLogger({ name: 'cli' }).fatal({ error }, 'Uncaught error in CLI');
  console.error('❌ Uncaught error:', error);
  process.exit(1);
});

#!/usr/bin/env node
/**
 * binship CLI
 * Cut a release when the version changes and publish a binary for every target
 */

import { runCLI } from './cli/index.js';

// Run the CLI
runCLI().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});

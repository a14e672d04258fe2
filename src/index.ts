#!/usr/bin/env node
/**
 * Project Pulse CLI
 * Rule-driven project health analysis
 */

import { runCLI } from './cli/index.js';

// Run the CLI
runCLI().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});

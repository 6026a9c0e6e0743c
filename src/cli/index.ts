#!/usr/bin/env node
/**
 * kg-reasoner CLI - vstupní bod.
 */

import { run } from './cli.js';

run().catch((err: unknown) => {
  console.error('Fatal error:', err);
  process.exit(1);
});

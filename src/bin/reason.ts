#!/usr/bin/env node
/**
 * REASON CLI entry point
 *
 * Compiled to dist/bin/reason.js by TypeScript.
 * Registered as the `reason` binary in package.json.
 */

import { ReasonCLI } from '../cli/cli.js';

const cli = new ReasonCLI();
cli.run(process.argv).catch((err) => {
  console.error('Fatal error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});

#!/usr/bin/env node
/**
 * hostsync CLI entry point
 *
 * Compiled to dist/bin/hostsync.js by TypeScript.
 * Registered as the `hostsync` binary in package.json.
 */

import 'dotenv/config';
import { HostSyncCLI } from '../cli/cli.js';

const cli = new HostSyncCLI();
cli.run(process.argv).catch((err) => {
  console.error('Fatal error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});

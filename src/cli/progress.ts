/**
 * hostsync ProgressReporter
 *
 * Structured console output for sync runs and CLI commands.
 */

import type { SyncReporter } from '../sync/types.js';

export class ProgressReporter implements SyncReporter {
  startTask(name: string): void {
    console.log(`⏳ ${name}...`);
  }

  completeTask(name: string): void {
    console.log(`✅ ${name}`);
  }

  failTask(name: string, err: Error): void {
    console.error(`❌ ${name}: ${err.message}`);
  }

  logInfo(message: string): void {
    console.log(`ℹ️  ${message}`);
  }

  warn(message: string): void {
    console.warn(`⚠️  ${message}`);
  }
}

/** Reporter that prints nothing; the default for library callers. */
export class SilentReporter extends ProgressReporter {
  override startTask(_name: string): void {}
  override completeTask(_name: string): void {}
  override failTask(_name?: string, _err?: Error): void {}
  override logInfo(_message?: string): void {}
  override warn(_message?: string): void {}
}

/**
 * Barrel export for the CLI layer.
 */

export { HostSyncCLI } from './cli.js';
export type { AccountService, CliServices } from './cli.js';
export { OutputFormatter } from './formatter.js';
export type { AccountStatus } from './formatter.js';
export { ProgressReporter, SilentReporter } from './progress.js';

/**
 * hostsync - sync SSH connections between ~/.ssh/config and a remote account
 *
 * Main entry point for the library.
 */

// Connection model
export * from './model/index.js';

// SSH config text <-> model
export { SshConfigParser, parseSshConfig } from './parser/ssh-config-parser.js';
export type { ParseWarning, ParsedConfig } from './parser/types.js';
export { GROUP_MARKER_PREFIX, formatGroupMarker, matchGroupMarker } from './parser/markers.js';
export { SshConfigSerializer, serializeSshConfig } from './serializer/ssh-config-serializer.js';

// Reconciliation and export/import pipelines
export * from './sync/index.js';

// Account API
export { AccountClient, toConnectionWire, fromConnectionWire } from './cloud/client.js';
export { DEFAULT_API_URL } from './cloud/types.js';
export type { AccountClientOptions, AccountInfo } from './cloud/types.js';

// Local files
export { LocalFileStore } from './storage/file-store.js';
export type { LocalFileStoreOptions } from './storage/file-store.js';

// Configuration
export { ConfigManager, expandHome } from './config/config.js';
export type { HostSyncConfig } from './config/config.js';

// Errors
export * from './errors/index.js';

// CLI building blocks
export { ProgressReporter, SilentReporter } from './cli/progress.js';

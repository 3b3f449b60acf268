/**
 * Basic Usage Example
 *
 * Pushes the connections in ~/.ssh/config to a hostsync account, then
 * previews what an import back into a scratch file would change.
 */

import dotenv from 'dotenv';
import {
  AccountClient,
  ConfigManager,
  LocalFileStore,
  ProgressReporter,
  runExport,
  runImport,
} from '../src/index.js';

dotenv.config();

async function main() {
  // 1. Resolve settings (file + HOSTSYNC_* env vars)
  const config = new ConfigManager().loadWithEnvOverrides();
  const credentials = ConfigManager.credentials(config);

  // 2. Wire the collaborators
  const deps = {
    account: new AccountClient({ apiUrl: config.account.apiUrl, timeoutMs: config.sync.timeoutMs }),
    files: new LocalFileStore(),
    reporter: new ProgressReporter(),
  };

  // 3. Export (local wins)
  const exported = await runExport(ConfigManager.sshConfigPath(config), credentials, deps);
  console.log(`Created ${exported.report.created}, updated ${exported.report.updated}`);

  // 4. Dry-run import into another file (remote wins)
  const preview = await runImport('/tmp/hostsync-preview', credentials, deps, { dryRun: true });
  for (const change of preview.report.changes) {
    console.log(`${change.action.padEnd(9)} ${[...change.groupPath, change.label].join('/')}`);
  }
}

main().catch(console.error);

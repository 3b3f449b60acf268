/**
 * SyncRunner — the export/import pipelines.
 *
 *   export: read file → parse → fetch remote → plan (local wins) → push
 *   import: read file → parse → fetch remote → plan (remote wins) → serialize → atomic write
 *
 * A run is all-or-nothing on the local file: nothing is written until the
 * remote fetch succeeded and the merged model serialized, and the write
 * itself replaces the file atomically.
 *
 * Usage:
 *   const runner = new SyncRunner({ account, files });
 *   const { report } = await runner.runExport('~/.ssh/config', credentials);
 */

import { ParseError, FileNotFoundError } from '../errors/hostsync-error.js';
import { SshConfigParser } from '../parser/ssh-config-parser.js';
import type { ParsedConfig } from '../parser/types.js';
import { SshConfigSerializer } from '../serializer/ssh-config-serializer.js';
import { Reconciler } from './reconciler.js';
import type {
  AccountCredentials,
  ChangeReport,
  FileStore,
  RemoteAccount,
  RemoteConnectionSet,
  SyncOptions,
  SyncOutcome,
  SyncReporter,
} from './types.js';

const silentReporter: SyncReporter = {
  startTask: () => undefined,
  completeTask: () => undefined,
  logInfo: () => undefined,
};

export interface SyncDependencies {
  account: RemoteAccount;
  files: FileStore;
  /** Default: silent */
  reporter?: SyncReporter;
}

export class SyncRunner {
  private readonly account: RemoteAccount;
  private readonly files: FileStore;
  private readonly reporter: SyncReporter;
  private readonly reconciler = new Reconciler();

  constructor(deps: SyncDependencies) {
    this.account = deps.account;
    this.files = deps.files;
    this.reporter = deps.reporter ?? silentReporter;
  }

  /** Push local connections to the remote account. */
  async runExport(
    localPath: string,
    credentials: AccountCredentials,
    options: SyncOptions = {}
  ): Promise<SyncOutcome> {
    const dryRun = options.dryRun ?? false;
    const parsed = this.parse(await this.files.readText(localPath), localPath);

    const { remote, skipped } = await this.fetchRemote(credentials);

    const plan = this.reconciler.planExport(parsed.model, remote);
    const warnings = [...this.formatParseWarnings(parsed, localPath), ...skipped, ...plan.warnings];

    if (dryRun || plan.mutations.length === 0) {
      return { direction: 'export', report: plan.report, warnings, dryRun };
    }

    this.reporter.startTask(`Pushing ${plan.mutations.length} change(s)`);
    const pushed = await this.account.pushConnections(credentials, plan.mutations);
    this.reporter.completeTask('Remote account updated');

    return { direction: 'export', report: SyncRunner.mergeReports(plan.report, pushed), warnings, dryRun };
  }

  /** Pull remote connections into the local SSH config. */
  async runImport(
    localPath: string,
    credentials: AccountCredentials,
    options: SyncOptions = {}
  ): Promise<SyncOutcome> {
    const dryRun = options.dryRun ?? false;
    const parsed = this.parse(await this.readOrEmpty(localPath), localPath);

    const { remote, skipped } = await this.fetchRemote(credentials);

    const plan = this.reconciler.planImport(parsed.model, remote);
    const warnings = [...this.formatParseWarnings(parsed, localPath), ...skipped, ...plan.warnings];

    if (dryRun || plan.report.created + plan.report.updated === 0) {
      return { direction: 'import', report: plan.report, warnings, dryRun };
    }

    const text = SshConfigSerializer.serialize(plan.model);
    await this.files.atomicWriteText(localPath, text);
    this.reporter.completeTask(`Wrote ${localPath}`);

    return { direction: 'import', report: plan.report, warnings, dryRun };
  }

  /**
   * Combine the planned report with what the remote side actually applied:
   * unchanged entities come from the plan, everything else from the push.
   */
  static mergeReports(planned: ChangeReport, pushed: ChangeReport): ChangeReport {
    return {
      created: pushed.created,
      updated: pushed.updated,
      unchanged: planned.unchanged + pushed.unchanged,
      conflicts: pushed.conflicts,
      changes: [...planned.changes.filter((c) => c.action === 'unchanged'), ...pushed.changes],
    };
  }

  // ─── Internals ─────────────────────────────────────────────────────────────

  /** Fetch the remote set; unreadable records become warnings instead of failing the run. */
  private async fetchRemote(
    credentials: AccountCredentials
  ): Promise<{ remote: RemoteConnectionSet; skipped: string[] }> {
    this.reporter.startTask('Fetching remote connections');
    const result = await this.account.fetchConnections(credentials);
    this.reporter.completeTask(`Fetched ${result.connections.length} remote connection(s)`);
    return {
      remote: result.connections,
      skipped: result.skipped.map((record) => `Remote connection ${record.id} skipped: ${record.reason}`),
    };
  }

  private parse(text: string, localPath: string): ParsedConfig {
    try {
      return SshConfigParser.parse(text);
    } catch (err) {
      if (err instanceof ParseError) {
        throw err.withPath(localPath);
      }
      throw err;
    }
  }

  /** A missing file on import is an empty config that the run will create. */
  private async readOrEmpty(localPath: string): Promise<string> {
    try {
      return await this.files.readText(localPath);
    } catch (err) {
      if (err instanceof FileNotFoundError) {
        this.reporter.logInfo(`${localPath} does not exist yet; it will be created`);
        return '';
      }
      throw err;
    }
  }

  private formatParseWarnings(parsed: ParsedConfig, localPath: string): string[] {
    return parsed.warnings.map((w) => `${localPath}:${w.lineNumber}: ${w.message}`);
  }
}

export function runExport(
  localPath: string,
  credentials: AccountCredentials,
  deps: SyncDependencies,
  options?: SyncOptions
): Promise<SyncOutcome> {
  return new SyncRunner(deps).runExport(localPath, credentials, options);
}

export function runImport(
  localPath: string,
  credentials: AccountCredentials,
  deps: SyncDependencies,
  options?: SyncOptions
): Promise<SyncOutcome> {
  return new SyncRunner(deps).runImport(localPath, credentials, options);
}

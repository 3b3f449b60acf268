/**
 * hostsync CLI
 *
 * Commands:
 *   hostsync export [--file <path>] [--dry-run] [--verbose]
 *   hostsync import [--file <path>] [--dry-run] [--verbose]
 *   hostsync list [--file <path>]
 *   hostsync status
 *   hostsync config get [key] | set <key> <value> | validate | reset
 */

import { Command } from 'commander';
import {
  ConfigManager,
  getConfigValue,
  isConfigKey,
  redactConfig,
  setConfigValue,
  CONFIG_KEYS,
  type HostSyncConfig,
} from '../config/config.js';
import { AccountClient } from '../cloud/client.js';
import type { AccountInfo } from '../cloud/types.js';
import { ConfigurationError, ParseError, RemoteAuthError } from '../errors/hostsync-error.js';
import { ErrorHandler } from '../errors/error-handler.js';
import { SshConfigParser } from '../parser/ssh-config-parser.js';
import type { ParsedConfig } from '../parser/types.js';
import { LocalFileStore } from '../storage/file-store.js';
import { SyncRunner } from '../sync/sync-runner.js';
import type { AccountCredentials, FileStore, RemoteAccount, SyncOutcome } from '../sync/types.js';
import { OutputFormatter, type AccountStatus } from './formatter.js';
import { ProgressReporter, SilentReporter } from './progress.js';

/** Remote account as the CLI needs it: sync plus a credential check. */
export interface AccountService extends RemoteAccount {
  verifyCredentials(credentials: AccountCredentials): Promise<AccountInfo>;
}

export interface CliServices {
  createAccount(config: HostSyncConfig): AccountService;
  files: FileStore;
}

interface SyncCommandOptions {
  file?: string;
  dryRun?: boolean;
  verbose?: boolean;
}

const defaultServices: CliServices = {
  createAccount: (config) =>
    new AccountClient({ apiUrl: config.account.apiUrl, timeoutMs: config.sync.timeoutMs }),
  files: new LocalFileStore(),
};

// Spinner factory — lazily imported so tests can run without a real TTY.
async function spinner(text: string): Promise<{ stop: (symbol?: string, text?: string) => void }> {
  try {
    const { default: ora } = await import('ora');
    const s = ora(text).start();
    return {
      stop: (symbol?: string, text?: string) => {
        if (symbol === '✓') {
          s.succeed(text);
        } else if (symbol === '✗') {
          s.fail(text);
        } else {
          s.stop();
        }
      },
    };
  } catch {
    // Fallback for environments without ora
    process.stdout.write(`${text}...\n`);
    return { stop: () => {} };
  }
}

export class HostSyncCLI {
  private readonly program: Command;
  private readonly formatter: OutputFormatter;
  private readonly configManager: ConfigManager;
  private readonly services: CliServices;

  constructor(
    configManager: ConfigManager = new ConfigManager(),
    formatter: OutputFormatter = new OutputFormatter(),
    services: CliServices = defaultServices
  ) {
    this.configManager = configManager;
    this.formatter = formatter;
    this.services = services;
    this.program = this.buildProgram();
  }

  /** Parse argv and execute the matching command. */
  async run(argv: string[]): Promise<void> {
    await this.program.parseAsync(argv);
  }

  // ─── Program builder ──────────────────────────────────────────────────────

  private buildProgram(): Command {
    const program = new Command('hostsync')
      .version('0.1.0', '-V, --version', 'Print version')
      .description('Sync SSH connections between ~/.ssh/config and your hostsync account');

    // ── export ─────────────────────────────────────────────────────────────
    program
      .command('export')
      .description('Push local SSH connections to the account (local wins)')
      .option('-f, --file <path>', 'SSH config file (default: ssh.configPath)')
      .option('-n, --dry-run', 'Show what would change without pushing')
      .option('-v, --verbose', 'Print each pipeline step')
      .action(async (opts: SyncCommandOptions) => {
        await this.runSync('export', opts);
      });

    // ── import ─────────────────────────────────────────────────────────────
    program
      .command('import')
      .description('Merge account connections into the local SSH config (remote wins)')
      .option('-f, --file <path>', 'SSH config file (default: ssh.configPath)')
      .option('-n, --dry-run', 'Show what would change without writing')
      .option('-v, --verbose', 'Print each pipeline step')
      .action(async (opts: SyncCommandOptions) => {
        await this.runSync('import', opts);
      });

    // ── list ───────────────────────────────────────────────────────────────
    program
      .command('list')
      .description('List the connections in the local SSH config')
      .option('-f, --file <path>', 'SSH config file (default: ssh.configPath)')
      .action(async (opts: { file?: string }) => {
        try {
          const config = this.loadConfig();
          const file = opts.file ?? ConfigManager.sshConfigPath(config);
          const { model, warnings } = this.parseFile(file, await this.services.files.readText(file));
          console.log(this.formatter.formatConnectionList(model));
          if (warnings.length) {
            console.warn(this.formatter.formatWarnings(warnings.map((w) => `${file}:${w.lineNumber}: ${w.message}`)));
          }
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    // ── status ─────────────────────────────────────────────────────────────
    program
      .command('status')
      .description('Show configuration and check the account credentials')
      .action(async () => {
        try {
          const config = this.loadConfig();
          console.log(this.formatter.formatStatus(await this.getStatus(config)));
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    program.addCommand(this.buildConfigCommand());
    return program;
  }

  private buildConfigCommand(): Command {
    const cmd = new Command('config').description('Manage hostsync configuration');

    // config get [key]
    cmd
      .command('get [key]')
      .description(`Show full config or one key (${CONFIG_KEYS.join(', ')})`)
      .action((key?: string) => {
        try {
          const config = redactConfig(this.configManager.loadWithEnvOverrides());
          if (key === undefined) {
            console.log(JSON.stringify(config, null, 2));
            return;
          }
          if (!isConfigKey(key)) {
            throw new ConfigurationError(`Unknown config key: ${key}`, { key });
          }
          const value = getConfigValue(config, key);
          console.log(value === undefined ? '(not set)' : String(value));
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    // config set <key> <value>
    cmd
      .command('set <key> <value>')
      .description('Set a configuration key')
      .action((key: string, value: string) => {
        try {
          if (!isConfigKey(key)) {
            throw new ConfigurationError(`Unknown config key: ${key}`, { key });
          }
          const config = this.configManager.load();
          setConfigValue(config, key, value);
          const { valid, errors } = this.configManager.validate(config);
          if (!valid) {
            throw new ConfigurationError(errors.join('; '), { key });
          }
          this.configManager.save(config);
          console.log(`✅ Set ${key}`);
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    // config validate
    cmd
      .command('validate')
      .description('Validate the current configuration')
      .option('--require-credentials', 'Also require account.username and account.apiKey')
      .action((opts: { requireCredentials?: boolean }) => {
        try {
          const config = this.configManager.loadWithEnvOverrides();
          const { valid, errors } = this.configManager.validate(config, opts.requireCredentials ?? false);
          if (valid) {
            console.log('✅ Configuration is valid');
          } else {
            console.error('❌ Configuration has errors:');
            for (const e of errors) {
              console.error(`  - ${e}`);
            }
            process.exitCode = 1;
          }
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    // config reset
    cmd
      .command('reset')
      .description('Reset configuration to defaults')
      .action(() => {
        try {
          this.configManager.save(ConfigManager.defaults());
          console.log('✅ Configuration reset to defaults');
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    return cmd;
  }

  // ─── Command bodies ───────────────────────────────────────────────────────

  private async runSync(direction: 'export' | 'import', opts: SyncCommandOptions): Promise<void> {
    const verbose = opts.verbose ?? false;
    const reporter = verbose ? new ProgressReporter() : new SilentReporter();
    const spin = verbose ? { stop: () => {} } : await spinner(direction === 'export' ? 'Exporting' : 'Importing');
    try {
      const config = this.loadConfig();
      const credentials = ConfigManager.credentials(config);
      const file = opts.file ?? ConfigManager.sshConfigPath(config);
      const runner = new SyncRunner({
        account: this.services.createAccount(config),
        files: this.services.files,
        reporter,
      });
      const options = { dryRun: opts.dryRun ?? false };
      const outcome: SyncOutcome =
        direction === 'export'
          ? await runner.runExport(file, credentials, options)
          : await runner.runImport(file, credentials, options);
      spin.stop('✓', 'Done');
      console.log(this.formatter.formatChangeReport(outcome));
      if (outcome.report.conflicts.length) {
        process.exitCode = 1;
      }
    } catch (err) {
      spin.stop('✗', 'Failed');
      if (err instanceof Error) {
        reporter.failTask(direction === 'export' ? 'Export' : 'Import', err);
      }
      console.error(this.formatter.formatError(err));
      process.exitCode = 1;
    }
  }

  /** Config with env overrides applied, rejected if any value is out of range. */
  private loadConfig(): HostSyncConfig {
    const config = this.configManager.loadWithEnvOverrides();
    const { valid, errors } = this.configManager.validate(config);
    if (!valid) {
      throw new ConfigurationError(errors.join('; '));
    }
    return config;
  }

  private parseFile(file: string, text: string): ParsedConfig {
    try {
      return SshConfigParser.parse(text);
    } catch (err) {
      if (err instanceof ParseError) {
        throw err.withPath(file);
      }
      throw err;
    }
  }

  private async getStatus(config: HostSyncConfig): Promise<AccountStatus> {
    const status: AccountStatus = {
      configFile: this.configManager.path,
      sshConfigPath: ConfigManager.sshConfigPath(config),
      apiUrl: config.account.apiUrl,
      username: config.account.username,
    };
    if (!config.account.username || !config.account.apiKey) {
      return status;
    }
    const spin = await spinner('Checking credentials');
    const result = await ErrorHandler.wrap(
      () => this.services.createAccount(config).verifyCredentials(ConfigManager.credentials(config)),
      { command: 'status' }
    );
    if (result.error === undefined) {
      spin.stop('✓', 'Credentials accepted');
      return { ...status, authenticated: true, remoteConnections: result.data.connectionCount };
    }
    if (result.error instanceof RemoteAuthError) {
      spin.stop('✗', 'Credentials rejected');
      return { ...status, authenticated: false };
    }
    spin.stop();
    throw result.error;
  }
}

/**
 * hostsync configuration
 *
 * Manages the config file at ~/.hostsync/config.json.
 * Supports environment variable overrides.
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import { z } from 'zod';
import { ConfigurationError } from '../errors/hostsync-error.js';
import { DEFAULT_API_URL } from '../cloud/types.js';
import type { AccountCredentials } from '../sync/types.js';

export interface HostSyncConfig {
  account: {
    /** Default: https://api.hostsync.dev */
    apiUrl: string;
    username?: string;
    /** Stored as plaintext. Use HOSTSYNC_API_KEY env var to keep it out of the file. */
    apiKey?: string;
  };
  ssh: {
    /** Default: ~/.ssh/config */
    configPath: string;
  };
  sync: {
    /** Account API request timeout. Default: 30000 */
    timeoutMs: number;
  };
}

const partialConfigSchema = z.object({
  account: z
    .object({
      apiUrl: z.string().optional(),
      username: z.string().optional(),
      apiKey: z.string().optional(),
    })
    .optional(),
  ssh: z.object({ configPath: z.string().optional() }).optional(),
  sync: z.object({ timeoutMs: z.number().optional() }).optional(),
});

type PartialConfig = z.infer<typeof partialConfigSchema>;

/** Expand a leading `~` to the home directory. */
export function expandHome(value: string, home: string = os.homedir()): string {
  if (value === '~') return home;
  if (value.startsWith('~/') || value.startsWith('~\\')) {
    return path.join(home, value.slice(2));
  }
  return value;
}

export class ConfigManager {
  private readonly configPath: string;

  constructor(configPath?: string) {
    this.configPath = configPath ?? path.join(os.homedir(), '.hostsync', 'config.json');
  }

  get path(): string {
    return this.configPath;
  }

  /**
   * Load config from disk. Returns defaults if file doesn't exist.
   */
  load(): HostSyncConfig {
    if (!fs.existsSync(this.configPath)) {
      return ConfigManager.defaults();
    }
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigurationError(`Failed to read config at ${this.configPath}: ${err instanceof Error ? err.message : String(err)}`);
    }
    const parsed = partialConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ConfigurationError(
        `Failed to read config at ${this.configPath}: ${issue.path.join('.')} ${issue.message}`
      );
    }
    return this.merge(ConfigManager.defaults(), parsed.data);
  }

  /**
   * Save config to disk, creating parent directories as needed.
   */
  save(config: HostSyncConfig): void {
    const dir = path.dirname(this.configPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
    }
    fs.writeFileSync(this.configPath, JSON.stringify(config, null, 2) + '\n', { encoding: 'utf-8', mode: 0o600 });
  }

  /**
   * Validate a config object. Returns errors array — empty means valid.
   * Credentials are only checked when `requireCredentials` is set.
   */
  validate(
    config: HostSyncConfig,
    requireCredentials = false
  ): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    if (!/^https?:\/\/\S+$/.test(config.account.apiUrl)) {
      errors.push(`account.apiUrl must be an http(s) URL, got: ${config.account.apiUrl}`);
    }

    if (requireCredentials) {
      if (!config.account.username) {
        errors.push('account.username is required (or set HOSTSYNC_USERNAME)');
      }
      if (!config.account.apiKey) {
        errors.push('account.apiKey is required (or set HOSTSYNC_API_KEY)');
      }
    }

    if (!config.ssh.configPath) {
      errors.push('ssh.configPath must not be empty');
    }

    if (!Number.isInteger(config.sync.timeoutMs) || config.sync.timeoutMs <= 0) {
      errors.push(`sync.timeoutMs must be a positive integer, got: ${config.sync.timeoutMs}`);
    }

    return { valid: errors.length === 0, errors };
  }

  /**
   * Load config, then apply environment variable overrides.
   * A malformed HOSTSYNC_TIMEOUT_MS raises ConfigurationError.
   *
   * Supported env vars:
   *   HOSTSYNC_API_URL, HOSTSYNC_USERNAME, HOSTSYNC_API_KEY,
   *   HOSTSYNC_SSH_CONFIG, HOSTSYNC_TIMEOUT_MS
   */
  loadWithEnvOverrides(): HostSyncConfig {
    const config = this.load();

    if (process.env.HOSTSYNC_API_URL) config.account.apiUrl = process.env.HOSTSYNC_API_URL;
    if (process.env.HOSTSYNC_USERNAME) config.account.username = process.env.HOSTSYNC_USERNAME;
    if (process.env.HOSTSYNC_API_KEY) config.account.apiKey = process.env.HOSTSYNC_API_KEY;
    if (process.env.HOSTSYNC_SSH_CONFIG) config.ssh.configPath = process.env.HOSTSYNC_SSH_CONFIG;
    const timeout = process.env.HOSTSYNC_TIMEOUT_MS;
    if (timeout) {
      if (!/^\d+$/.test(timeout.trim())) {
        throw new ConfigurationError(`HOSTSYNC_TIMEOUT_MS must be a positive integer, got: ${timeout}`, {
          key: 'HOSTSYNC_TIMEOUT_MS',
        });
      }
      config.sync.timeoutMs = parseInt(timeout, 10);
    }

    return config;
  }

  /**
   * Credentials for the account API.
   *
   * @throws ConfigurationError when the username or API key is missing
   */
  static credentials(config: HostSyncConfig): AccountCredentials {
    const { username, apiKey } = config.account;
    if (!username || !apiKey) {
      throw new ConfigurationError(
        'Account credentials are not configured. Run `hostsync config set account.username <name>` and `hostsync config set account.apiKey <key>`.'
      );
    }
    return { username, apiKey };
  }

  /** Absolute path of the SSH config file, `~` expanded. */
  static sshConfigPath(config: HostSyncConfig): string {
    return path.resolve(expandHome(config.ssh.configPath));
  }

  /**
   * Return a default configuration with safe fallback values.
   */
  static defaults(): HostSyncConfig {
    return {
      account: {
        apiUrl: DEFAULT_API_URL,
      },
      ssh: {
        configPath: path.join(os.homedir(), '.ssh', 'config'),
      },
      sync: {
        timeoutMs: 30_000,
      },
    };
  }

  /** Deep-merge source into target (non-destructive). */
  private merge(target: HostSyncConfig, source: PartialConfig): HostSyncConfig {
    const result = { ...target };
    if (source.account) {
      result.account = { ...target.account };
      if (source.account.apiUrl !== undefined) result.account.apiUrl = source.account.apiUrl;
      if (source.account.username !== undefined) result.account.username = source.account.username;
      if (source.account.apiKey !== undefined) result.account.apiKey = source.account.apiKey;
    }
    if (source.ssh?.configPath !== undefined) result.ssh = { configPath: source.ssh.configPath };
    if (source.sync?.timeoutMs !== undefined) result.sync = { timeoutMs: source.sync.timeoutMs };
    return result;
  }
}

// ─── Dotted-key access (`hostsync config get|set`) ──────────────────────────

export const CONFIG_KEYS = [
  'account.apiUrl',
  'account.username',
  'account.apiKey',
  'ssh.configPath',
  'sync.timeoutMs',
] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

export function isConfigKey(key: string): key is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(key);
}

export function getConfigValue(config: HostSyncConfig, key: ConfigKey): string | number | undefined {
  switch (key) {
    case 'account.apiUrl':
      return config.account.apiUrl;
    case 'account.username':
      return config.account.username;
    case 'account.apiKey':
      return config.account.apiKey;
    case 'ssh.configPath':
      return config.ssh.configPath;
    case 'sync.timeoutMs':
      return config.sync.timeoutMs;
  }
}

/**
 * Set a key from its command-line string form. Numeric keys are parsed;
 * an empty string clears an optional key.
 */
export function setConfigValue(config: HostSyncConfig, key: ConfigKey, value: string): void {
  switch (key) {
    case 'account.apiUrl':
      config.account.apiUrl = value;
      break;
    case 'account.username':
      config.account.username = value === '' ? undefined : value;
      break;
    case 'account.apiKey':
      config.account.apiKey = value === '' ? undefined : value;
      break;
    case 'ssh.configPath':
      config.ssh.configPath = value;
      break;
    case 'sync.timeoutMs': {
      const n = Number(value);
      if (!Number.isInteger(n) || n <= 0) {
        throw new ConfigurationError(`sync.timeoutMs must be a positive integer, got: ${value}`);
      }
      config.sync.timeoutMs = n;
      break;
    }
  }
}

/** Copy of `config` safe to print: the API key is masked. */
export function redactConfig(config: HostSyncConfig): HostSyncConfig {
  return {
    ...config,
    account: {
      ...config.account,
      ...(config.account.apiKey !== undefined ? { apiKey: '********' } : {}),
    },
  };
}

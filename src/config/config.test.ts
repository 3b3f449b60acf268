/**
 * Configuration tests
 *
 * ConfigManager — load / save / validate / env overrides
 * Dotted-key helpers used by `hostsync config get|set`
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import os from 'os';
import path from 'path';
import fs from 'fs';
import {
  ConfigManager,
  expandHome,
  getConfigValue,
  isConfigKey,
  redactConfig,
  setConfigValue,
} from './config.js';
import type { HostSyncConfig } from './config.js';
import { ConfigurationError } from '../errors/hostsync-error.js';

// ─── Fixtures ─────────────────────────────────────────────────────────────────

let tmpDir: string;

function tmpConfigPath(): string {
  return path.join(tmpDir, 'config.json');
}

function makeConfig(overrides: Partial<HostSyncConfig> = {}): HostSyncConfig {
  return {
    account: { apiUrl: 'https://sync.test', username: 'alice', apiKey: 'test-secret' },
    ssh: { configPath: '/tmp/ssh_config' },
    sync: { timeoutMs: 10_000 },
    ...overrides,
  };
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'hostsync-config-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

// ─── ConfigManager.load ───────────────────────────────────────────────────────

describe('ConfigManager.load', () => {
  it('returns defaults when config file does not exist', () => {
    const manager = new ConfigManager(tmpConfigPath());
    expect(manager.load()).toEqual(ConfigManager.defaults());
  });

  it('merges a partial file over the defaults', () => {
    const p = tmpConfigPath();
    fs.writeFileSync(p, JSON.stringify({ account: { username: 'alice' } }));

    const config = new ConfigManager(p).load();
    expect(config.account).toEqual({ apiUrl: 'https://api.hostsync.dev', username: 'alice' });
    expect(config.sync.timeoutMs).toBe(30_000);
  });

  it('throws ConfigurationError on malformed JSON', () => {
    const p = tmpConfigPath();
    fs.writeFileSync(p, '{ not json');
    expect(() => new ConfigManager(p).load()).toThrow(ConfigurationError);
  });

  it('throws ConfigurationError on a wrongly typed field', () => {
    const p = tmpConfigPath();
    fs.writeFileSync(p, JSON.stringify({ sync: { timeoutMs: 'soon' } }));
    expect(() => new ConfigManager(p).load()).toThrow(/sync\.timeoutMs/);
  });
});

// ─── ConfigManager.save ───────────────────────────────────────────────────────

describe('ConfigManager.save', () => {
  it('writes config JSON to disk and re-reads it', () => {
    const manager = new ConfigManager(tmpConfigPath());
    const config = makeConfig();
    manager.save(config);
    expect(manager.load()).toEqual(config);
  });

  it('creates the parent directory and keeps the file private', () => {
    const p = path.join(tmpDir, 'nested', 'config.json');
    new ConfigManager(p).save(makeConfig());
    expect(fs.statSync(p).mode & 0o777).toBe(0o600);
  });
});

// ─── ConfigManager.validate ───────────────────────────────────────────────────

describe('ConfigManager.validate', () => {
  const manager = new ConfigManager('/nonexistent/config.json');

  it('returns valid for a complete config', () => {
    expect(manager.validate(makeConfig(), true)).toEqual({ valid: true, errors: [] });
  });

  it('rejects a non-http API URL', () => {
    const config = makeConfig({ account: { apiUrl: 'ftp://sync.test' } });
    expect(manager.validate(config).errors).toEqual(['account.apiUrl must be an http(s) URL, got: ftp://sync.test']);
  });

  it('only requires credentials when asked', () => {
    const config = makeConfig({ account: { apiUrl: 'https://sync.test' } });
    expect(manager.validate(config).valid).toBe(true);
    expect(manager.validate(config, true).errors).toEqual([
      'account.username is required (or set HOSTSYNC_USERNAME)',
      'account.apiKey is required (or set HOSTSYNC_API_KEY)',
    ]);
  });

  it('rejects a non-positive timeout', () => {
    const config = makeConfig({ sync: { timeoutMs: 0 } });
    expect(manager.validate(config).errors).toEqual(['sync.timeoutMs must be a positive integer, got: 0']);
  });
});

// ─── ConfigManager.loadWithEnvOverrides ───────────────────────────────────────

describe('ConfigManager.loadWithEnvOverrides', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('env vars override file values', () => {
    const p = tmpConfigPath();
    new ConfigManager(p).save(makeConfig());
    vi.stubEnv('HOSTSYNC_API_URL', 'http://localhost:8080');
    vi.stubEnv('HOSTSYNC_USERNAME', 'bob');
    vi.stubEnv('HOSTSYNC_API_KEY', 'test-key');
    vi.stubEnv('HOSTSYNC_SSH_CONFIG', '/tmp/other_config');
    vi.stubEnv('HOSTSYNC_TIMEOUT_MS', '2500');

    expect(new ConfigManager(p).loadWithEnvOverrides()).toEqual({
      account: { apiUrl: 'http://localhost:8080', username: 'bob', apiKey: 'test-key' },
      ssh: { configPath: '/tmp/other_config' },
      sync: { timeoutMs: 2500 },
    });
  });

  it('rejects a timeout that is not a number', () => {
    const p = tmpConfigPath();
    new ConfigManager(p).save(makeConfig());
    vi.stubEnv('HOSTSYNC_TIMEOUT_MS', 'soon');

    expect(() => new ConfigManager(p).loadWithEnvOverrides()).toThrow(
      new ConfigurationError('HOSTSYNC_TIMEOUT_MS must be a positive integer, got: soon')
    );
  });
});

// ─── Static helpers ───────────────────────────────────────────────────────────

describe('ConfigManager static helpers', () => {
  it('credentials() returns username and key', () => {
    expect(ConfigManager.credentials(makeConfig())).toEqual({ username: 'alice', apiKey: 'test-secret' });
  });

  it('credentials() throws when the key is missing', () => {
    const config = makeConfig({ account: { apiUrl: 'https://sync.test', username: 'alice' } });
    expect(() => ConfigManager.credentials(config)).toThrow(ConfigurationError);
  });

  it('sshConfigPath() expands ~', () => {
    const config = makeConfig({ ssh: { configPath: '~/.ssh/config' } });
    expect(ConfigManager.sshConfigPath(config)).toBe(path.join(os.homedir(), '.ssh', 'config'));
  });

  it('defaults() points at ~/.ssh/config', () => {
    const defaults = ConfigManager.defaults();
    expect(defaults.ssh.configPath).toBe(path.join(os.homedir(), '.ssh', 'config'));
    expect(defaults.account.username).toBeUndefined();
  });

  it('expandHome leaves other paths alone', () => {
    expect(expandHome('~', '/home/alice')).toBe('/home/alice');
    expect(expandHome('~/x', '/home/alice')).toBe(path.join('/home/alice', 'x'));
    expect(expandHome('/etc/ssh/ssh_config', '/home/alice')).toBe('/etc/ssh/ssh_config');
  });
});

// ─── Dotted keys ──────────────────────────────────────────────────────────────

describe('config keys', () => {
  it('recognizes known keys only', () => {
    expect(isConfigKey('account.username')).toBe(true);
    expect(isConfigKey('account.password')).toBe(false);
  });

  it('reads and writes values', () => {
    const config = makeConfig();
    setConfigValue(config, 'ssh.configPath', '/srv/ssh_config');
    setConfigValue(config, 'sync.timeoutMs', '1500');
    expect(getConfigValue(config, 'ssh.configPath')).toBe('/srv/ssh_config');
    expect(getConfigValue(config, 'sync.timeoutMs')).toBe(1500);
  });

  it('clears optional keys with an empty value', () => {
    const config = makeConfig();
    setConfigValue(config, 'account.apiKey', '');
    expect(config.account.apiKey).toBeUndefined();
  });

  it('rejects a non-numeric timeout', () => {
    expect(() => setConfigValue(makeConfig(), 'sync.timeoutMs', 'soon')).toThrow(ConfigurationError);
  });

  it('redactConfig masks the API key', () => {
    const config = makeConfig();
    expect(redactConfig(config).account.apiKey).toBe('********');
    expect(config.account.apiKey).toBe('test-secret');
  });
});

/**
 * LocalFileStore tests — run against a real temporary directory.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { LocalFileStore } from './file-store.js';
import { FileNotFoundError, HostSyncError } from '../errors/hostsync-error.js';

describe('LocalFileStore', () => {
  let tempDir: string;
  let store: LocalFileStore;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'hostsync-store-'));
    store = new LocalFileStore();
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('reads UTF-8 text', async () => {
    const file = path.join(tempDir, 'config');
    await fs.writeFile(file, 'Host café\n', 'utf8');
    expect(await store.readText(file)).toBe('Host café\n');
  });

  it('throws FileNotFoundError for a missing file', async () => {
    const file = path.join(tempDir, 'missing');
    const err = await store.readText(file).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(FileNotFoundError);
    expect(err instanceof FileNotFoundError && err.path).toBe(file);
  });

  it('wraps other read failures as IO_ERROR', async () => {
    const err = await store.readText(tempDir).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(HostSyncError);
    expect(err instanceof HostSyncError && err.code).toBe('IO_ERROR');
  });

  it('creates missing parent directories and a private file', async () => {
    const file = path.join(tempDir, '.ssh', 'config');
    await store.atomicWriteText(file, 'Host a\n    HostName h\n');

    expect(await fs.readFile(file, 'utf8')).toBe('Host a\n    HostName h\n');
    expect((await fs.stat(file)).mode & 0o777).toBe(0o600);
  });

  it('replaces an existing file and keeps its mode', async () => {
    const file = path.join(tempDir, 'config');
    await fs.writeFile(file, 'old\n', 'utf8');
    await fs.chmod(file, 0o640);

    await store.atomicWriteText(file, 'new\n');

    expect(await fs.readFile(file, 'utf8')).toBe('new\n');
    expect((await fs.stat(file)).mode & 0o777).toBe(0o640);
  });

  it('leaves no temporary files behind', async () => {
    const file = path.join(tempDir, 'config');
    await store.atomicWriteText(file, 'one\n');
    await store.atomicWriteText(file, 'two\n');
    expect(await fs.readdir(tempDir)).toEqual(['config']);
  });

  it('reports whether a file exists', async () => {
    const file = path.join(tempDir, 'config');
    expect(await store.exists(file)).toBe(false);
    await fs.writeFile(file, '', 'utf8');
    expect(await store.exists(file)).toBe(true);
  });
});

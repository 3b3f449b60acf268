/**
 * Local file store for the SSH config.
 *
 * Reads are plain UTF-8; writes go through write-file-atomic (temp file in
 * the same directory, then rename) so a failed run can never leave a
 * truncated config behind.
 */

import { readFile, mkdir, access } from 'fs/promises';
import { dirname } from 'path';
import writeFileAtomic from 'write-file-atomic';
import {
  DiskFullError,
  FileNotFoundError,
  HostSyncError,
  PermissionError,
} from '../errors/hostsync-error.js';
import type { FileStore } from '../sync/types.js';

export interface LocalFileStoreOptions {
  /** Mode for newly created files. Default: 0o600 (ssh refuses group/world-writable configs) */
  fileMode?: number;
  /** Mode for newly created parent directories. Default: 0o700 */
  dirMode?: number;
}

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

function translate(err: unknown, path: string, operation: 'read' | 'write'): HostSyncError {
  const code = errnoCode(err);
  const cause = err instanceof Error ? err.message : String(err);
  switch (code) {
    case 'ENOENT':
      return new FileNotFoundError(path, { operation, cause });
    case 'EACCES':
    case 'EPERM':
    case 'EROFS':
      return new PermissionError(path, { operation, cause });
    case 'ENOSPC':
    case 'EDQUOT':
      return new DiskFullError(path, { operation, cause });
    default:
      return new HostSyncError(`Failed to ${operation} ${path}: ${cause}`, 'IO_ERROR', { operation, code });
  }
}

export class LocalFileStore implements FileStore {
  private readonly fileMode: number;
  private readonly dirMode: number;

  constructor(options: LocalFileStoreOptions = {}) {
    this.fileMode = options.fileMode ?? 0o600;
    this.dirMode = options.dirMode ?? 0o700;
  }

  async readText(path: string): Promise<string> {
    try {
      return await readFile(path, 'utf-8');
    } catch (err) {
      throw translate(err, path, 'read');
    }
  }

  /**
   * Replace `path` with `content`. An existing file keeps its mode; a new
   * one gets `fileMode`. Parent directories are created on demand.
   */
  async atomicWriteText(path: string, content: string): Promise<void> {
    try {
      const isNew = !(await this.exists(path));
      await mkdir(dirname(path), { recursive: true, mode: this.dirMode });
      await writeFileAtomic(path, content, isNew ? { encoding: 'utf8', mode: this.fileMode } : { encoding: 'utf8' });
    } catch (err) {
      throw translate(err, path, 'write');
    }
  }

  async exists(path: string): Promise<boolean> {
    try {
      await access(path);
      return true;
    } catch {
      return false;
    }
  }
}

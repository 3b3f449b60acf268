/**
 * hostsync error handler
 *
 * Converts thrown values to user-facing messages, determines retryability,
 * and wraps async functions with structured error handling.
 */

import {
  HostSyncError,
  ParseError,
  RemoteAuthError,
  RemoteUnavailableError,
  RemoteConflictError,
  FileNotFoundError,
  PermissionError,
  DiskFullError,
} from './hostsync-error.js';

export { HostSyncError } from './hostsync-error.js';

export type Wrapped<T> = { data: T; error?: undefined } | { data?: undefined; error: HostSyncError };

export class ErrorHandler {
  /**
   * Convert any thrown value to a friendly user-facing message.
   */
  static toUserMessage(err: unknown): string {
    if (err instanceof ParseError) {
      const path = typeof err.context?.path === 'string' ? `${err.context.path}:` : 'line ';
      return `Could not parse SSH config at ${path}${err.lineNumber}: ${err.reason}`;
    }
    if (err instanceof RemoteAuthError) {
      return 'The account rejected your credentials. Run `hostsync config set account.apiKey <key>` to update them.';
    }
    if (err instanceof RemoteUnavailableError) {
      const status = err.statusCode != null ? ` (HTTP ${err.statusCode})` : '';
      return `The account service is unavailable${status}. Nothing was changed.`;
    }
    if (err instanceof RemoteConflictError) {
      return `The account rejected the update: ${err.message}`;
    }
    if (err instanceof FileNotFoundError) {
      return `SSH config not found at ${err.path}. Pass --file to point at another one.`;
    }
    if (err instanceof PermissionError) {
      return `Permission denied for ${err.path}.`;
    }
    if (err instanceof DiskFullError) {
      return `Not enough disk space to write ${err.path}. The original file is unchanged.`;
    }
    if (err instanceof HostSyncError) {
      return `${err.message} (${err.code})`;
    }
    if (err instanceof Error) {
      return err.message;
    }
    return 'An unexpected error occurred.';
  }

  /**
   * Returns true if the error is transient and worth retrying.
   */
  static isRetryable(err: unknown): boolean {
    return err instanceof RemoteUnavailableError;
  }

  /**
   * Wrap an async function with structured error handling.
   * Never throws — failures are returned as { error }.
   */
  static async wrap<T>(fn: () => Promise<T>, context?: Record<string, unknown>): Promise<Wrapped<T>> {
    try {
      const data = await fn();
      return { data };
    } catch (err) {
      if (err instanceof HostSyncError) {
        return { error: err };
      }
      const wrapped = new HostSyncError(
        err instanceof Error ? err.message : String(err),
        'UNKNOWN_ERROR',
        context
      );
      return { error: wrapped };
    }
  }
}

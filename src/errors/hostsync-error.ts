/**
 * hostsync typed error hierarchy
 *
 * Structured error classes with machine-readable codes and optional context.
 */

export class HostSyncError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'HostSyncError';
    // Maintain proper prototype chain for instanceof checks in transpiled JS
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ─── Local config text ───────────────────────────────────────────────────────

export class ParseError extends HostSyncError {
  constructor(
    public readonly lineNumber: number,
    public readonly reason: string,
    context?: Record<string, unknown>
  ) {
    super(`Line ${lineNumber}: ${reason}`, 'PARSE_ERROR', context);
    this.name = 'ParseError';
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** Same error, annotated with the file it came from. */
  withPath(path: string): ParseError {
    return new ParseError(this.lineNumber, this.reason, { ...this.context, path });
  }
}

export class SerializeError extends HostSyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'SERIALIZE_ERROR', context);
    this.name = 'SerializeError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ─── Model invariants ────────────────────────────────────────────────────────

export class DuplicateNameError extends HostSyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'DUPLICATE_NAME', context);
    this.name = 'DuplicateNameError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotFoundError extends HostSyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'NOT_FOUND', context);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidConnectionError extends HostSyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INVALID_CONNECTION', context);
    this.name = 'InvalidConnectionError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ─── Remote account ──────────────────────────────────────────────────────────

export class RemoteAuthError extends HostSyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'REMOTE_AUTH', context);
    this.name = 'RemoteAuthError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class RemoteUnavailableError extends HostSyncError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    context?: Record<string, unknown>
  ) {
    super(message, 'REMOTE_UNAVAILABLE', context);
    this.name = 'RemoteUnavailableError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class RemoteConflictError extends HostSyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'REMOTE_CONFLICT', context);
    this.name = 'RemoteConflictError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ─── Local file system ───────────────────────────────────────────────────────

export class FileNotFoundError extends HostSyncError {
  constructor(public readonly path: string, context?: Record<string, unknown>) {
    super(`File not found: ${path}`, 'FILE_NOT_FOUND', context);
    this.name = 'FileNotFoundError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class PermissionError extends HostSyncError {
  constructor(public readonly path: string, context?: Record<string, unknown>) {
    super(`Permission denied: ${path}`, 'PERMISSION_DENIED', context);
    this.name = 'PermissionError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DiskFullError extends HostSyncError {
  constructor(public readonly path: string, context?: Record<string, unknown>) {
    super(`No space left to write ${path}`, 'DISK_FULL', context);
    this.name = 'DiskFullError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigurationError extends HostSyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Barrel export for the typed error hierarchy and error handler.
 */

export {
  HostSyncError,
  ParseError,
  SerializeError,
  DuplicateNameError,
  NotFoundError,
  InvalidConnectionError,
  RemoteAuthError,
  RemoteUnavailableError,
  RemoteConflictError,
  FileNotFoundError,
  PermissionError,
  DiskFullError,
  ConfigurationError,
} from './hostsync-error.js';

export { ErrorHandler, type Wrapped } from './error-handler.js';

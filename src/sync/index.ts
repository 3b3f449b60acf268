export { Reconciler, emptyReport, toLocalConnection } from './reconciler.js';
export type { ExportPlan, ImportPlan } from './reconciler.js';
export { SyncRunner, runExport, runImport } from './sync-runner.js';
export type { SyncDependencies } from './sync-runner.js';
export type {
  AccountCredentials,
  ChangeAction,
  ChangeReport,
  ConflictEntry,
  EntityChange,
  FileStore,
  Mutation,
  RemoteAccount,
  RemoteConnection,
  RemoteConnectionSet,
  RemoteFetchResult,
  SkippedRecord,
  SyncDirection,
  SyncOptions,
  SyncOutcome,
  SyncReporter,
} from './types.js';

/**
 * Type definitions for reconciliation and the export/import pipeline.
 */

import type { Connection, GroupPath } from '../model/types.js';

export type SyncDirection = 'export' | 'import';

export interface AccountCredentials {
  username: string;
  apiKey: string;
}

/** A connection as stored in the remote account. `id` is opaque and never part of identity. */
export interface RemoteConnection extends Connection {
  id: string;
}

export type RemoteConnectionSet = RemoteConnection[];

/** A remote record that could not be read as a connection. */
export interface SkippedRecord {
  id: string;
  reason: string;
}

/** What the account returned: usable connections plus the records left out. */
export interface RemoteFetchResult {
  connections: RemoteConnectionSet;
  skipped: SkippedRecord[];
}

export type Mutation =
  | { action: 'create'; connection: Connection }
  | { action: 'update'; id: string; connection: Connection };

export type ChangeAction = 'create' | 'update' | 'unchanged';

export interface EntityChange {
  action: ChangeAction;
  groupPath: GroupPath;
  label: string;
}

export interface ConflictEntry {
  groupPath: GroupPath;
  label: string;
  reason: string;
}

export interface ChangeReport {
  created: number;
  updated: number;
  unchanged: number;
  /** Entities the remote side refused; the rest of the run still completed */
  conflicts: ConflictEntry[];
  changes: EntityChange[];
}

/** Remote account collaborator. */
export interface RemoteAccount {
  fetchConnections(credentials: AccountCredentials): Promise<RemoteFetchResult>;
  pushConnections(credentials: AccountCredentials, mutations: Mutation[]): Promise<ChangeReport>;
}

/** Local file collaborator. Writes must replace the target atomically. */
export interface FileStore {
  readText(path: string): Promise<string>;
  atomicWriteText(path: string, content: string): Promise<void>;
}

/** Step-wise progress of a run. The CLI shows it on the console. */
export interface SyncReporter {
  startTask(name: string): void;
  completeTask(message: string): void;
  logInfo(message: string): void;
}

export interface SyncOptions {
  /** Compute the report without pushing or writing anything */
  dryRun?: boolean;
}

export interface SyncOutcome {
  direction: SyncDirection;
  report: ChangeReport;
  /** Non-fatal notes from parsing and reconciliation */
  warnings: string[];
  dryRun: boolean;
}

/**
 * Reconciler — merges a local ConfigModel with a remote connection set.
 *
 * Entities are matched on `(groupPath, label)`; remote ids only address
 * updates. The side being pushed from is authoritative:
 *
 *   source only             → create on the destination
 *   destination only        → left untouched (nothing is ever deleted)
 *   both, fields differ     → source fields and options replace the destination's
 *   both, fields identical  → no-op, so a repeated run changes nothing
 */

import type { ConfigModel } from '../model/config-model.js';
import { connectionKey, formatConnectionPath, sameConnectionFields } from '../model/config-model.js';
import type { Connection } from '../model/types.js';
import type {
  ChangeAction,
  ChangeReport,
  Mutation,
  RemoteConnection,
  RemoteConnectionSet,
} from './types.js';

export interface ExportPlan {
  mutations: Mutation[];
  report: ChangeReport;
  warnings: string[];
}

export interface ImportPlan {
  /** A new model; the local input is not modified */
  model: ConfigModel;
  report: ChangeReport;
  warnings: string[];
}

export function emptyReport(): ChangeReport {
  return { created: 0, updated: 0, unchanged: 0, conflicts: [], changes: [] };
}

/** Strip the remote id, keeping only the synchronized fields. */
export function toLocalConnection(remote: RemoteConnection): Connection {
  const connection: Connection = {
    label: remote.label,
    hostname: remote.hostname,
    port: remote.port,
    extraOptions: { ...remote.extraOptions },
    groupPath: [...remote.groupPath],
  };
  if (remote.username !== undefined) connection.username = remote.username;
  if (remote.identityFile !== undefined) connection.identityFile = remote.identityFile;
  if (remote.proxyCommand !== undefined) connection.proxyCommand = remote.proxyCommand;
  return connection;
}

function copyConnection(connection: Readonly<Connection>): Connection {
  return { ...connection, extraOptions: { ...connection.extraOptions }, groupPath: [...connection.groupPath] };
}

function record(report: ChangeReport, action: ChangeAction, connection: Readonly<Connection>): void {
  if (action === 'create') report.created++;
  else if (action === 'update') report.updated++;
  else report.unchanged++;
  report.changes.push({ action, groupPath: [...connection.groupPath], label: connection.label });
}

export class Reconciler {
  /**
   * Decide what happens to one entity on the destination side.
   */
  static decide(source: Readonly<Connection>, destination: Readonly<Connection> | undefined): ChangeAction {
    if (!destination) return 'create';
    return sameConnectionFields(source, destination) ? 'unchanged' : 'update';
  }

  /** Local is authoritative: compute the writes the remote account needs. */
  planExport(local: ConfigModel, remote: RemoteConnectionSet): ExportPlan {
    const warnings: string[] = [];
    const index = this.indexRemote(remote, warnings);
    const mutations: Mutation[] = [];
    const report = emptyReport();

    for (const { connection } of local.listAll()) {
      const existing = index.get(connectionKey(connection.groupPath, connection.label));
      const action = Reconciler.decide(connection, existing);
      if (action === 'create') {
        mutations.push({ action: 'create', connection: copyConnection(connection) });
      } else if (action === 'update' && existing) {
        mutations.push({ action: 'update', id: existing.id, connection: copyConnection(connection) });
      }
      record(report, action, connection);
    }

    return { mutations, report, warnings };
  }

  /** Remote is authoritative: merge the remote set into a copy of the local model. */
  planImport(local: ConfigModel, remote: RemoteConnectionSet): ImportPlan {
    const warnings: string[] = [];
    const index = this.indexRemote(remote, warnings);
    const model = local.clone();
    const report = emptyReport();

    for (const remoteConnection of index.values()) {
      const incoming = toLocalConnection(remoteConnection);
      const existing = model.has(incoming.groupPath, incoming.label)
        ? model.find(incoming.groupPath, incoming.label)
        : undefined;
      const action = Reconciler.decide(incoming, existing);
      if (action === 'create') {
        model.addConnection(incoming);
      } else if (action === 'update') {
        model.replaceConnection(incoming);
      }
      record(report, action, incoming);
    }

    return { model, report, warnings };
  }

  /**
   * Index remote connections by identity. When the remote side holds the
   * same identity twice, the first one is matched and the rest are ignored.
   */
  private indexRemote(remote: RemoteConnectionSet, warnings: string[]): Map<string, RemoteConnection> {
    const index = new Map<string, RemoteConnection>();
    for (const connection of remote) {
      const key = connectionKey(connection.groupPath, connection.label);
      const first = index.get(key);
      if (first) {
        warnings.push(
          `Remote account holds "${formatConnectionPath(connection.groupPath, connection.label)}" more than once; using ${first.id}, ignoring ${connection.id}`
        );
        continue;
      }
      index.set(key, connection);
    }
    return index;
  }
}

/**
 * hostsync account API client
 *
 * Fetches and pushes connection records for one account.
 *
 *   GET  /v1/account/            → account info (credential check)
 *   GET  /v1/connections/        → { connections: [...] }
 *   POST /v1/connections/bulk/   → { results: [...] }, one result per mutation
 *
 * Every request carries `Authorization: Token <username>:<apiKey>`.
 * A rejected mutation comes back as a `conflict` result and is reported per
 * entity; the rest of the batch still applies.
 */

import axios, { AxiosError, type AxiosInstance } from 'axios';
import type { ZodType, ZodTypeDef } from 'zod';
import { createConnection } from '../model/config-model.js';
import type { Connection } from '../model/types.js';
import {
  HostSyncError,
  InvalidConnectionError,
  RemoteAuthError,
  RemoteConflictError,
  RemoteUnavailableError,
} from '../errors/hostsync-error.js';
import type {
  AccountCredentials,
  ChangeReport,
  Mutation,
  RemoteAccount,
  RemoteConnection,
  RemoteFetchResult,
} from '../sync/types.js';
import {
  DEFAULT_API_URL,
  accountInfoSchema,
  bulkResponseSchema,
  connectionListSchema,
  type AccountClientOptions,
  type AccountInfo,
  type ConnectionWire,
  type MutationWire,
  type RemoteConnectionWire,
} from './types.js';

const USER_AGENT = 'hostsync/0.1.0';

export function toConnectionWire(connection: Readonly<Connection>): ConnectionWire {
  return {
    label: connection.label,
    hostname: connection.hostname,
    port: connection.port,
    username: connection.username ?? null,
    identity_file: connection.identityFile ?? null,
    proxy_command: connection.proxyCommand ?? null,
    extra_options: { ...connection.extraOptions },
    group_path: [...connection.groupPath],
  };
}

export function fromConnectionWire(wire: RemoteConnectionWire): RemoteConnection {
  try {
    const connection = createConnection({
      label: wire.label,
      hostname: wire.hostname,
      port: wire.port ?? undefined,
      username: wire.username ?? undefined,
      identityFile: wire.identity_file ?? undefined,
      proxyCommand: wire.proxy_command ?? undefined,
      extraOptions: wire.extra_options ?? {},
      groupPath: wire.group_path ?? [],
    });
    return { ...connection, id: wire.id };
  } catch (err) {
    if (err instanceof InvalidConnectionError) {
      throw new InvalidConnectionError(`Remote connection ${wire.id}: ${err.message}`, {
        id: wire.id,
        reason: err.message,
      });
    }
    throw err;
  }
}

export class AccountClient implements RemoteAccount {
  private readonly httpClient: AxiosInstance;

  constructor(options: AccountClientOptions = {}) {
    this.httpClient = axios.create({
      baseURL: options.apiUrl ?? DEFAULT_API_URL,
      timeout: options.timeoutMs ?? 30_000,
      headers: {
        'User-Agent': USER_AGENT,
        Accept: 'application/json',
      },
    });
  }

  /**
   * Check the credentials and return the account they belong to.
   */
  async verifyCredentials(credentials: AccountCredentials): Promise<AccountInfo> {
    const data = await this.request('Account lookup', () =>
      this.httpClient.get('/v1/account/', { headers: this.authHeaders(credentials) })
    );
    const info = this.validate('Account lookup', accountInfoSchema, data);
    return {
      username: info.username,
      ...(info.connection_count != null ? { connectionCount: info.connection_count } : {}),
    };
  }

  /**
   * List every connection stored in the account.
   *
   * @throws RemoteAuthError when the credentials are rejected
   * @throws RemoteUnavailableError on network failures, 5xx or malformed responses
   */
  async fetchConnections(credentials: AccountCredentials): Promise<RemoteFetchResult> {
    const data = await this.request('Fetching connections', () =>
      this.httpClient.get('/v1/connections/', { headers: this.authHeaders(credentials) })
    );
    const { connections } = this.validate('Fetching connections', connectionListSchema, data);

    // A record the model rejects is left out; the rest of the set stays usable.
    const result: RemoteFetchResult = { connections: [], skipped: [] };
    for (const wire of connections) {
      try {
        result.connections.push(fromConnectionWire(wire));
      } catch (err) {
        if (!(err instanceof InvalidConnectionError)) throw err;
        const reason = err.context?.reason;
        result.skipped.push({ id: wire.id, reason: typeof reason === 'string' ? reason : err.message });
      }
    }
    return result;
  }

  /**
   * Apply creates and updates in one bulk request.
   *
   * @throws RemoteConflictError when the whole batch is refused (HTTP 409)
   */
  async pushConnections(credentials: AccountCredentials, mutations: Mutation[]): Promise<ChangeReport> {
    const report: ChangeReport = { created: 0, updated: 0, unchanged: 0, conflicts: [], changes: [] };
    if (mutations.length === 0) {
      return report;
    }

    const body: { mutations: MutationWire[] } = {
      mutations: mutations.map((m) =>
        m.action === 'create'
          ? { action: 'create', connection: toConnectionWire(m.connection) }
          : { action: 'update', id: m.id, connection: toConnectionWire(m.connection) }
      ),
    };

    const data = await this.request('Pushing connections', () =>
      this.httpClient.post('/v1/connections/bulk/', body, {
        headers: { ...this.authHeaders(credentials), 'Content-Type': 'application/json' },
      })
    );
    const { results } = this.validate('Pushing connections', bulkResponseSchema, data);

    for (const result of results) {
      const groupPath = result.group_path ?? [];
      switch (result.status) {
        case 'created':
          report.created++;
          report.changes.push({ action: 'create', groupPath, label: result.label });
          break;
        case 'updated':
          report.updated++;
          report.changes.push({ action: 'update', groupPath, label: result.label });
          break;
        case 'conflict':
          report.conflicts.push({
            groupPath,
            label: result.label,
            reason: result.reason ?? 'rejected by the account service',
          });
          break;
      }
    }
    return report;
  }

  // ─── Internals ─────────────────────────────────────────────────────────────

  private authHeaders(credentials: AccountCredentials): Record<string, string> {
    return { Authorization: `Token ${credentials.username}:${credentials.apiKey}` };
  }

  private async request(operation: string, send: () => Promise<{ data: unknown }>): Promise<unknown> {
    try {
      const response = await send();
      return response.data;
    } catch (error) {
      throw this.translate(operation, error);
    }
  }

  private validate<T>(operation: string, schema: ZodType<T, ZodTypeDef, unknown>, data: unknown): T {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw new RemoteUnavailableError(
        `${operation} failed: unexpected response${where}: ${issue?.message ?? 'invalid payload'}`
      );
    }
    return parsed.data;
  }

  private translate(operation: string, error: unknown): HostSyncError {
    if (error instanceof HostSyncError) {
      return error;
    }
    if (error instanceof AxiosError) {
      const status = error.response?.status;
      if (status === 401 || status === 403) {
        return new RemoteAuthError(`${operation} failed: credentials were rejected`, { status });
      }
      if (status === 409) {
        return new RemoteConflictError(`${operation} failed: the account changed concurrently`, { status });
      }
      return new RemoteUnavailableError(`${operation} failed: ${error.message}`, status);
    }
    return new RemoteUnavailableError(
      `${operation} failed: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }
}

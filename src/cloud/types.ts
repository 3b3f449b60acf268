/**
 * Wire format of the hostsync account API.
 *
 * The API speaks snake_case JSON; every response is validated before it is
 * mapped onto the connection model.
 */

import { z } from 'zod';

export const DEFAULT_API_URL = 'https://api.hostsync.dev';

export interface AccountClientOptions {
  /** Base URL of the account API. Default: https://api.hostsync.dev */
  apiUrl?: string;
  /** Request timeout (ms). Default: 30000 */
  timeoutMs?: number;
}

const remoteId = z.union([z.string().min(1), z.number().int()]).transform(String);

export const connectionWireSchema = z.object({
  label: z.string(),
  hostname: z.string(),
  port: z.number().int().nullish(),
  username: z.string().nullish(),
  identity_file: z.string().nullish(),
  proxy_command: z.string().nullish(),
  extra_options: z.record(z.string()).nullish(),
  group_path: z.array(z.string()).nullish(),
});

export const remoteConnectionWireSchema = connectionWireSchema.extend({ id: remoteId });

export const connectionListSchema = z.object({
  connections: z.array(remoteConnectionWireSchema),
});

export const bulkResultSchema = z.object({
  label: z.string(),
  group_path: z.array(z.string()).nullish(),
  status: z.enum(['created', 'updated', 'conflict']),
  id: remoteId.nullish(),
  reason: z.string().nullish(),
});

export const bulkResponseSchema = z.object({
  results: z.array(bulkResultSchema),
});

export const accountInfoSchema = z.object({
  username: z.string(),
  connection_count: z.number().int().nullish(),
});

export type ConnectionWire = z.input<typeof connectionWireSchema>;
export type RemoteConnectionWire = z.output<typeof remoteConnectionWireSchema>;
export type BulkResult = z.output<typeof bulkResultSchema>;

export interface MutationWire {
  action: 'create' | 'update';
  id?: string;
  connection: ConnectionWire;
}

export interface AccountInfo {
  username: string;
  connectionCount?: number;
}

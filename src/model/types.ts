/**
 * Type definitions for the connection model shared by the parser,
 * serializer and reconciler.
 */

/** Ordered group names from the root to the immediate parent. Empty = top level. */
export type GroupPath = readonly string[];

/**
 * A single host entry. `extraOptions` holds every directive without a
 * dedicated field, keyed by its original casing. A directive that appears
 * more than once keeps all its values joined by `\n`.
 */
export interface Connection {
  label: string;
  hostname: string;
  /** Default: 22 */
  port: number;
  username?: string;
  identityFile?: string;
  proxyCommand?: string;
  extraOptions: Record<string, string>;
  groupPath: GroupPath;
}

/** Fields a caller may leave out when building a connection. */
export type ConnectionInput = Pick<Connection, 'label' | 'hostname'> &
  Partial<Omit<Connection, 'label' | 'hostname'>>;

/**
 * A `Host` block that describes defaults rather than one concrete host
 * (wildcards, several patterns, or a `Match` block). Kept for the local file
 * only, at its position among the blocks of its group; never synchronized.
 */
export interface PatternBlock {
  keyword: 'Host' | 'Match';
  pattern: string;
  /** Directives in file order, original key casing. */
  directives: Array<[key: string, value: string]>;
  groupPath: GroupPath;
}

export interface Group {
  name: string;
  parentPath: GroupPath;
}

export interface ConnectionEntry {
  connection: Readonly<Connection>;
  /** Full path of the connection: its group path followed by its label. */
  path: readonly string[];
}

/** One block of a group, in file order. */
export type ConfigBlock =
  | { kind: 'connection'; connection: Readonly<Connection> }
  | { kind: 'pattern'; block: PatternBlock };

/** Directives with a first-class field on Connection, keyed by lower-case name. */
export const MODELED_DIRECTIVES = {
  hostname: 'HostName',
  port: 'Port',
  user: 'User',
  identityfile: 'IdentityFile',
  proxycommand: 'ProxyCommand',
} as const;

export type ModeledDirective = keyof typeof MODELED_DIRECTIVES;

export const DEFAULT_SSH_PORT = 22;

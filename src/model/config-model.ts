/**
 * ConfigModel — in-memory tree of groups, connections and pattern blocks.
 *
 * Groups have no identity beyond their path; a group node exists as soon as
 * a connection references it or it is declared explicitly. Connections are
 * unique by `(groupPath, label)`. Each group keeps its connections and
 * pattern blocks in one ordered sequence.
 */

import {
  DuplicateNameError,
  InvalidConnectionError,
  NotFoundError,
} from '../errors/hostsync-error.js';
import {
  DEFAULT_SSH_PORT,
  MODELED_DIRECTIVES,
  type Connection,
  type ConfigBlock,
  type ConnectionEntry,
  type ConnectionInput,
  type Group,
  type GroupPath,
  type PatternBlock,
} from './types.js';

const OPTION_KEY_RE = /^[A-Za-z][A-Za-z0-9]*$/;
const RESERVED_OPTION_KEYS = new Set<string>([...Object.keys(MODELED_DIRECTIVES), 'host', 'match']);
const HOST_PATTERN_RE = /[*?!\s]/;

type GroupItem = { kind: 'connection'; key: string } | { kind: 'pattern'; block: PatternBlock };

interface GroupNode {
  name: string;
  path: string[];
  /** Connections (by key) and pattern blocks in insertion order */
  items: GroupItem[];
  children: Map<string, GroupNode>;
}

/** Stable identity of a connection: its group path plus its label. */
export function connectionKey(groupPath: GroupPath, label: string): string {
  return JSON.stringify([...groupPath, label]);
}

/** True for `Host` patterns that match more than one concrete host. */
export function isHostPattern(pattern: string): boolean {
  return HOST_PATTERN_RE.test(pattern);
}

export function formatConnectionPath(groupPath: GroupPath, label: string): string {
  return [...groupPath, label].join('/');
}

// ─── Validation ──────────────────────────────────────────────────────────────

function isSingleLineToken(value: string): boolean {
  return value.length > 0 && value === value.trim() && !/[\r\n]/.test(value);
}

/**
 * Why `value` cannot be written as a directive value and read back
 * unchanged, or undefined when it can. ssh strips a leading `=` and reads
 * `#` as a comment; `quotes` says whether balanced double quotes may pass
 * through as written.
 */
function valueProblem(value: string, quotes: boolean): string | undefined {
  if (!isSingleLineToken(value)) return 'must be a single line without surrounding whitespace';
  if (value.startsWith('=')) return 'must not start with "="';
  if (value.includes('#')) return 'must not contain "#"';
  if (value.endsWith('\\')) return 'must not end with a backslash';
  const quoteCount = value.split('"').length - 1;
  if (!quotes && quoteCount > 0) return 'must not contain double quotes';
  if (quoteCount % 2 !== 0) return 'has an unbalanced double quote';
  return undefined;
}

function invalid(label: string, reason: string): InvalidConnectionError {
  return new InvalidConnectionError(`Invalid connection "${label}": ${reason}`, { label });
}

export function validateGroupPath(groupPath: GroupPath): void {
  for (const name of groupPath) {
    if (!isSingleLineToken(name) || name.includes('/')) {
      throw new InvalidConnectionError(
        `Invalid group name ${JSON.stringify(name)}: names must be non-empty, single-line and contain no "/"`,
        { groupPath: [...groupPath] }
      );
    }
  }
}

function optionalField(
  label: string,
  field: string,
  value: string | undefined,
  quotes = false
): string | undefined {
  if (value === undefined || value === '') return undefined;
  const problem = valueProblem(value, quotes);
  if (problem) {
    throw invalid(label, `${field} ${problem}`);
  }
  return value;
}

function validateExtraOptions(label: string, options: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};
  const seen = new Set<string>();
  for (const [key, value] of Object.entries(options)) {
    const lower = key.toLowerCase();
    if (!OPTION_KEY_RE.test(key)) {
      throw invalid(label, `option key ${JSON.stringify(key)} is not a valid directive name`);
    }
    if (RESERVED_OPTION_KEYS.has(lower)) {
      throw invalid(label, `option ${key} must use its dedicated field`);
    }
    if (seen.has(lower)) {
      throw invalid(label, `option ${key} is listed twice`);
    }
    for (const part of value.split('\n')) {
      const problem = valueProblem(part, true);
      if (problem) {
        throw invalid(label, `option ${key} ${problem}`);
      }
    }
    seen.add(lower);
    result[key] = value;
  }
  return result;
}

/**
 * Build a normalized connection: defaults filled in, empty optional fields
 * dropped, every invariant checked.
 */
export function createConnection(input: ConnectionInput): Connection {
  const { label, hostname } = input;
  // Labels may contain spaces; the serializer quotes them.
  if (valueProblem(label, false) !== undefined) {
    throw new InvalidConnectionError(`Invalid connection label ${JSON.stringify(label)}`, { label });
  }
  if (valueProblem(hostname, false) !== undefined || /\s/.test(hostname)) {
    throw invalid(label, 'hostname must be a non-empty word');
  }
  const port = input.port ?? DEFAULT_SSH_PORT;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw invalid(label, `port ${port} is outside 1-65535`);
  }
  const groupPath = [...(input.groupPath ?? [])];
  validateGroupPath(groupPath);

  const connection: Connection = {
    label,
    hostname,
    port,
    extraOptions: validateExtraOptions(label, input.extraOptions ?? {}),
    groupPath,
  };
  const username = optionalField(label, 'username', input.username);
  const identityFile = optionalField(label, 'identityFile', input.identityFile);
  const proxyCommand = optionalField(label, 'proxyCommand', input.proxyCommand, true);
  if (username !== undefined) connection.username = username;
  if (identityFile !== undefined) connection.identityFile = identityFile;
  if (proxyCommand !== undefined) connection.proxyCommand = proxyCommand;
  return connection;
}

// ─── Comparison ──────────────────────────────────────────────────────────────

function sameScalars(a: Readonly<Connection>, b: Readonly<Connection>): boolean {
  return (
    a.hostname === b.hostname &&
    a.port === b.port &&
    a.username === b.username &&
    a.identityFile === b.identityFile &&
    a.proxyCommand === b.proxyCommand
  );
}

function samePath(a: GroupPath, b: GroupPath): boolean {
  return a.length === b.length && a.every((name, i) => name === b[i]);
}

/**
 * Field-for-field equality of two connections' synchronized values
 * (first-class fields and options). Option order is ignored unless
 * `orderedOptions` is set.
 */
export function sameConnectionFields(
  a: Readonly<Connection>,
  b: Readonly<Connection>,
  orderedOptions = false
): boolean {
  if (!sameScalars(a, b)) return false;
  const aEntries = Object.entries(a.extraOptions);
  const bEntries = Object.entries(b.extraOptions);
  if (aEntries.length !== bEntries.length) return false;
  if (orderedOptions) {
    return aEntries.every(([key, value], i) => key === bEntries[i][0] && value === bEntries[i][1]);
  }
  return aEntries.every(([key, value]) => b.extraOptions[key] === value);
}

function samePatternBlock(a: PatternBlock, b: PatternBlock): boolean {
  return (
    a.keyword === b.keyword &&
    a.pattern === b.pattern &&
    samePath(a.groupPath, b.groupPath) &&
    a.directives.length === b.directives.length &&
    a.directives.every(([key, value], i) => key === b.directives[i][0] && value === b.directives[i][1])
  );
}

// ─── Model ───────────────────────────────────────────────────────────────────

function copyPatternBlock(block: PatternBlock): PatternBlock {
  return {
    keyword: block.keyword,
    pattern: block.pattern,
    directives: block.directives.map(([key, value]): [string, string] => [key, value]),
    groupPath: [...block.groupPath],
  };
}

export class ConfigModel {
  private readonly root: GroupNode = { name: '', path: [], items: [], children: new Map() };
  private readonly connections = new Map<string, Connection>();

  get size(): number {
    return this.connections.size;
  }

  /** Add a connection; its group (and every ancestor) is created on demand. */
  addConnection(input: ConnectionInput): Readonly<Connection> {
    const connection = createConnection(input);
    const key = connectionKey(connection.groupPath, connection.label);
    if (this.connections.has(key)) {
      throw new DuplicateNameError(
        `Connection "${formatConnectionPath(connection.groupPath, connection.label)}" already exists`,
        { groupPath: [...connection.groupPath], label: connection.label }
      );
    }
    this.ensureGroup(connection.groupPath).items.push({ kind: 'connection', key });
    this.connections.set(key, connection);
    return connection;
  }

  /** Overwrite the connection with the same key, keeping its position. */
  replaceConnection(input: ConnectionInput): Readonly<Connection> {
    const connection = createConnection(input);
    const key = connectionKey(connection.groupPath, connection.label);
    if (!this.connections.has(key)) {
      throw this.notFound(connection.groupPath, connection.label);
    }
    this.connections.set(key, connection);
    return connection;
  }

  find(groupPath: GroupPath, label: string): Readonly<Connection> {
    const connection = this.connections.get(connectionKey(groupPath, label));
    if (!connection) {
      throw this.notFound(groupPath, label);
    }
    return connection;
  }

  has(groupPath: GroupPath, label: string): boolean {
    return this.connections.has(connectionKey(groupPath, label));
  }

  /** Record a group, even when no connection references it yet. */
  declareGroup(path: GroupPath): void {
    validateGroupPath(path);
    this.ensureGroup(path);
  }

  /** Append a pattern block after the blocks already in its group. */
  addPatternBlock(block: PatternBlock): void {
    validateGroupPath(block.groupPath);
    const patternProblem = valueProblem(block.pattern, true);
    if (patternProblem) {
      throw new InvalidConnectionError(`Invalid ${block.keyword} pattern ${JSON.stringify(block.pattern)}: ${patternProblem}`);
    }
    // A single wildcard with a HostName is a connection; several patterns may share one.
    const setsHostName = block.directives.some(([key]) => key.toLowerCase() === 'hostname');
    if (
      block.keyword === 'Host' &&
      (!isHostPattern(block.pattern) || (setsHostName && !/\s/.test(block.pattern)))
    ) {
      throw new InvalidConnectionError(
        `Host "${block.pattern}" names a single host; add it as a connection instead`,
        { pattern: block.pattern }
      );
    }
    for (const [key, value] of block.directives) {
      if (!OPTION_KEY_RE.test(key) || valueProblem(value, true) !== undefined) {
        throw new InvalidConnectionError(`Invalid directive "${key}" in ${block.keyword} ${block.pattern}`);
      }
    }
    this.ensureGroup(block.groupPath).items.push({ kind: 'pattern', block: copyPatternBlock(block) });
  }

  /** Every pattern block, in the order `blocks` visits them. */
  patternBlocks(): PatternBlock[] {
    const result: PatternBlock[] = [];
    for (const item of this.blocks()) {
      if (item.kind === 'pattern') result.push(item.block);
    }
    return result;
  }

  /** The connections and pattern blocks of one group, in file order, without its child groups. */
  blocksIn(groupPath: GroupPath): ConfigBlock[] {
    const node = this.findGroup(groupPath);
    return node ? this.ownBlocks(node) : [];
  }

  /** Every block, depth-first: a group's own blocks first, then its child groups. */
  blocks(): Iterable<ConfigBlock> {
    return { [Symbol.iterator]: () => this.walkBlocks(this.root) };
  }

  /**
   * Every connection with its full path, depth-first: a group's own
   * connections first, then its child groups in first-appearance order.
   * The returned iterable can be walked any number of times.
   */
  listAll(): Iterable<ConnectionEntry> {
    return { [Symbol.iterator]: () => this.walk() };
  }

  /** Every group, depth-first, in the order `listAll` visits them. */
  groups(): Group[] {
    const result: Group[] = [];
    const visit = (node: GroupNode): void => {
      for (const child of node.children.values()) {
        result.push({ name: child.name, parentPath: node.path });
        visit(child);
      }
    };
    visit(this.root);
    return result;
  }

  /** Deep copy preserving group and block order. */
  clone(): ConfigModel {
    const copy = new ConfigModel();
    for (const group of this.groups()) {
      copy.declareGroup([...group.parentPath, group.name]);
    }
    for (const item of this.blocks()) {
      if (item.kind === 'connection') {
        copy.addConnection({ ...item.connection, extraOptions: { ...item.connection.extraOptions } });
      } else {
        copy.addPatternBlock(item.block);
      }
    }
    return copy;
  }

  /** Structural equality, including the order of groups, blocks and options. */
  equals(other: ConfigModel): boolean {
    const groupsA = this.groups();
    const groupsB = other.groups();
    if (groupsA.length !== groupsB.length) return false;
    for (let i = 0; i < groupsA.length; i++) {
      if (groupsA[i].name !== groupsB[i].name || !samePath(groupsA[i].parentPath, groupsB[i].parentPath)) {
        return false;
      }
    }

    const blocksA = [...this.blocks()];
    const blocksB = [...other.blocks()];
    if (blocksA.length !== blocksB.length) return false;
    return blocksA.every((a, i) => {
      const b = blocksB[i];
      if (a.kind === 'connection' && b.kind === 'connection') {
        return (
          a.connection.label === b.connection.label &&
          samePath(a.connection.groupPath, b.connection.groupPath) &&
          sameConnectionFields(a.connection, b.connection, true)
        );
      }
      if (a.kind === 'pattern' && b.kind === 'pattern') {
        return samePatternBlock(a.block, b.block);
      }
      return false;
    });
  }

  // ─── Internals ─────────────────────────────────────────────────────────────

  private ownBlocks(node: GroupNode): ConfigBlock[] {
    const result: ConfigBlock[] = [];
    for (const item of node.items) {
      if (item.kind === 'pattern') {
        result.push({ kind: 'pattern', block: item.block });
        continue;
      }
      const connection = this.connections.get(item.key);
      if (connection) {
        result.push({ kind: 'connection', connection });
      }
    }
    return result;
  }

  private *walkBlocks(node: GroupNode): Generator<ConfigBlock> {
    yield* this.ownBlocks(node);
    for (const child of node.children.values()) {
      yield* this.walkBlocks(child);
    }
  }

  private *walk(): Generator<ConnectionEntry> {
    for (const item of this.walkBlocks(this.root)) {
      if (item.kind === 'connection') {
        const { connection } = item;
        yield { connection, path: [...connection.groupPath, connection.label] };
      }
    }
  }

  private findGroup(path: GroupPath): GroupNode | undefined {
    let node: GroupNode | undefined = this.root;
    for (const name of path) {
      node = node.children.get(name);
      if (!node) return undefined;
    }
    return node;
  }

  private ensureGroup(path: GroupPath): GroupNode {
    let node = this.root;
    for (const name of path) {
      let child = node.children.get(name);
      if (!child) {
        child = { name, path: [...node.path, name], items: [], children: new Map() };
        node.children.set(name, child);
      }
      node = child;
    }
    return node;
  }

  private notFound(groupPath: GroupPath, label: string): NotFoundError {
    return new NotFoundError(`Connection "${formatConnectionPath(groupPath, label)}" not found`, {
      groupPath: [...groupPath],
      label,
    });
  }
}

/**
 * SSH config serializer
 *
 * Renders a ConfigModel as ssh_config text the parser reads back to an
 * equal model. Layout:
 *
 *   - top-level blocks first, then each group depth-first behind its
 *     `# hostsync:group` marker (empty groups get a bare marker)
 *   - within a group, connections and pattern blocks keep their order, so a
 *     leading `Host *` still applies before the hosts after it
 *   - every connection as `Host <label>` with directives in canonical order:
 *     HostName, Port, User, IdentityFile, ProxyCommand, then extra options
 *     in insertion order
 */

import type { ConfigModel } from '../model/config-model.js';
import {
  DEFAULT_SSH_PORT,
  type ConfigBlock,
  type Connection,
  type GroupPath,
  type PatternBlock,
} from '../model/types.js';
import { SerializeError } from '../errors/hostsync-error.js';
import { formatGroupMarker } from '../parser/markers.js';

const INDENT = '    ';

function samePath(a: GroupPath, b: GroupPath): boolean {
  return a.length === b.length && a.every((name, i) => name === b[i]);
}

function directive(key: string, value: string): string {
  if (value === '' || /[\r\n]/.test(value)) {
    throw new SerializeError(`Directive ${key} has an empty or multi-line value`, { key });
  }
  return `${INDENT}${key} ${value}`;
}

/** Quote a single-word value that contains whitespace. */
function word(value: string): string {
  return /\s/.test(value) ? `"${value}"` : value;
}

export class SshConfigSerializer {
  /**
   * Render the model. An empty model yields an empty string.
   *
   * @throws SerializeError if a value cannot be written as a single directive
   */
  static serialize(model: ConfigModel): string {
    const blocks: string[] = model.blocksIn([]).map(SshConfigSerializer.renderBlock);

    const groups = model.groups();
    groups.forEach((group, i) => {
      const path = [...group.parentPath, group.name];
      const own = model.blocksIn(path);
      const next = groups[i + 1];
      const hasChildren = next !== undefined && samePath(next.parentPath, path);
      // A parent without blocks of its own is implied by its first child's marker.
      if (own.length === 0 && hasChildren) return;

      blocks.push(formatGroupMarker(path));
      for (const block of own) {
        blocks.push(SshConfigSerializer.renderBlock(block));
      }
    });

    return blocks.length === 0 ? '' : `${blocks.join('\n\n')}\n`;
  }

  static renderBlock(this: void, block: ConfigBlock): string {
    return block.kind === 'connection'
      ? SshConfigSerializer.renderConnection(block.connection)
      : SshConfigSerializer.renderPatternBlock(block.block);
  }

  /** Render a single connection as a `Host` block, without trailing newline. */
  static renderConnection(connection: Readonly<Connection>): string {
    if (connection.hostname === '' || !Number.isInteger(connection.port)) {
      throw new SerializeError(`Connection "${connection.label}" is missing a hostname or port`, {
        label: connection.label,
      });
    }
    const lines = [`Host ${word(connection.label)}`, directive('HostName', connection.hostname)];
    if (connection.port !== DEFAULT_SSH_PORT) lines.push(directive('Port', String(connection.port)));
    if (connection.username !== undefined) lines.push(directive('User', word(connection.username)));
    if (connection.identityFile !== undefined) lines.push(directive('IdentityFile', word(connection.identityFile)));
    if (connection.proxyCommand !== undefined) lines.push(directive('ProxyCommand', connection.proxyCommand));
    for (const [key, value] of Object.entries(connection.extraOptions)) {
      for (const part of value.split('\n')) {
        lines.push(directive(key, part));
      }
    }
    return lines.join('\n');
  }

  static renderPatternBlock(block: PatternBlock): string {
    const lines = [`${block.keyword} ${block.pattern}`];
    for (const [key, value] of block.directives) {
      lines.push(directive(key, value));
    }
    return lines.join('\n');
  }
}

/** Render a ConfigModel as SSH config text. */
export function serializeSshConfig(model: ConfigModel): string {
  return SshConfigSerializer.serialize(model);
}

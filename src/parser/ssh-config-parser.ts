/**
 * SSH config parser
 *
 * Tokenizes ssh_config text with `ssh-config` and turns its line objects
 * into a ConfigModel.
 *
 * - `Key Value` and `Key=Value` lines; keys are case-insensitive
 * - `Host <pattern>` and `Match <criteria>` open a block; every directive
 *   until the next header belongs to it
 * - `# hostsync:group <path>` markers on their own line set the group of
 *   the blocks that follow
 * - blank lines and other comments are skipped
 *
 * A `Host` block without `HostName` connects to its own label, unless the
 * pattern is a wildcard, in which case the block is kept as a pattern block
 * (defaults) and never synchronized. So is a block naming several patterns.
 */

import SSHConfig from 'ssh-config';
import { ConfigModel, formatConnectionPath } from '../model/config-model.js';
import { DEFAULT_SSH_PORT, MODELED_DIRECTIVES, type ConnectionInput, type GroupPath } from '../model/types.js';
import { InvalidConnectionError, ParseError } from '../errors/hostsync-error.js';
import { matchGroupMarker } from './markers.js';
import type { ParsedConfig, ParseWarning, RawBlock, ValueToken } from './types.js';

type ConfigLine = SSHConfig[number];

/**
 * How a value is turned back into text:
 * - `bare`: a single quoted word loses its quotes (labels, modeled fields)
 * - `word`: quotes stay only around words that contain whitespace
 * - `command`: quotes stay as written (ProxyCommand)
 */
type ValueMode = 'bare' | 'word' | 'command';

const KEY_RE = /^[A-Za-z][A-Za-z0-9]*$/;
const WILDCARD_RE = /[*?!]/;

function isModeled(key: string): key is keyof typeof MODELED_DIRECTIVES {
  return Object.prototype.hasOwnProperty.call(MODELED_DIRECTIVES, key);
}

function isTokenLike(value: unknown): value is { val: unknown; separator: unknown; quoted?: unknown } {
  return typeof value === 'object' && value !== null && 'val' in value && 'separator' in value;
}

/** Normalize the library's string-or-token-list value into tokens. */
function toTokens(value: unknown, quoted: boolean): ValueToken[] {
  if (typeof value === 'string') {
    const val = value.trim();
    return val === '' ? [] : [{ val, separator: '', quoted }];
  }
  if (!Array.isArray(value)) return [];
  const tokens: ValueToken[] = [];
  for (const item of value) {
    if (typeof item === 'string') {
      tokens.push({ val: item, separator: ' ', quoted: false });
    } else if (isTokenLike(item) && typeof item.val === 'string' && typeof item.separator === 'string') {
      tokens.push({ val: item.val, separator: item.separator, quoted: item.quoted === true });
    }
  }
  return tokens;
}

function renderValue(tokens: ValueToken[], mode: ValueMode): string {
  if (mode === 'bare' && tokens.length === 1) {
    return tokens[0].val;
  }
  return tokens
    .map(({ val, separator, quoted }) => {
      const keep = quoted && (mode === 'command' || /\s/.test(val));
      return `${separator}${keep ? `"${val}"` : val}`;
    })
    .join('')
    .trimStart();
}

function wordCount(tokens: ValueToken[]): number {
  if (tokens.length === 1 && !tokens[0].quoted) {
    return tokens[0].val.split(/\s+/).length;
  }
  return tokens.length;
}

/** `Match` criteria as `key value` text, for when the line carries no plain value. */
function criteriaText(criteria: unknown): string {
  if (typeof criteria !== 'object' || criteria === null) return '';
  return Object.entries(criteria)
    .map(([key, value]) => {
      const text = toTokens(value, false).map((t) => t.val).join(',');
      return text === '' ? key : `${key} ${text}`;
    })
    .join(' ');
}

function* flatten(lines: Iterable<ConfigLine>): Generator<ConfigLine> {
  for (const line of lines) {
    yield line;
    if (line.type === SSHConfig.DIRECTIVE && 'config' in line) {
      yield* flatten(line.config);
    }
  }
}

/**
 * Maps library lines back onto 1-based source lines. Lines come out of
 * `ssh-config` in file order; a comment after a value on the same line
 * shares that line.
 */
class LineLocator {
  private cursor = 0;
  private directiveIndex = -1;
  private inlineTaken = false;

  constructor(private readonly lines: string[]) {}

  directive(): number {
    const index = this.next((trimmed) => !trimmed.startsWith('#'));
    this.directiveIndex = index;
    this.inlineTaken = false;
    return index + 1;
  }

  comment(content: string): { lineNumber: number; inline: boolean } {
    const text = content.trim();
    if (this.directiveIndex >= 0 && !this.inlineTaken && this.lines[this.directiveIndex].trimEnd().endsWith(text)) {
      this.inlineTaken = true;
      return { lineNumber: this.directiveIndex + 1, inline: true };
    }
    const index = this.next((trimmed) => trimmed.startsWith('#'));
    this.directiveIndex = -1;
    return { lineNumber: index + 1, inline: false };
  }

  private next(accept: (trimmed: string) => boolean): number {
    for (let i = this.cursor; i < this.lines.length; i++) {
      const trimmed = this.lines[i].trim();
      if (trimmed !== '' && accept(trimmed)) {
        this.cursor = i + 1;
        return i;
      }
    }
    return Math.max(0, Math.min(this.cursor, this.lines.length - 1));
  }
}

export class SshConfigParser {
  /**
   * Parse raw SSH config text.
   *
   * @throws ParseError on a malformed directive, a directive before any
   *   header, an invalid Port, an unclosed quote, or a malformed group marker
   */
  static parse(text: string): ParsedConfig {
    const source = text.replace(/^\uFEFF/, '');
    const lines = source.split(/\r\n|\r|\n/);
    const config = SshConfigParser.tokenize(source, lines);

    const model = new ConfigModel();
    const warnings: ParseWarning[] = [];
    const locator = new LineLocator(lines);

    let groupPath: string[] = [];
    let current: RawBlock | null = null;

    for (const line of flatten(config)) {
      if (line.type === SSHConfig.COMMENT) {
        const { lineNumber, inline } = locator.comment(line.content);
        const marker = inline ? null : matchGroupMarker(line.content.trim());
        if (marker?.kind === 'invalid') {
          throw new ParseError(lineNumber, marker.reason);
        }
        if (marker) {
          groupPath = marker.path;
          const path = groupPath;
          SshConfigParser.guard(lineNumber, () => model.declareGroup(path));
        }
        continue;
      }
      if (line.type !== SSHConfig.DIRECTIVE) continue;

      const lineNumber = locator.directive();
      const key = line.param;
      if (!KEY_RE.test(key)) {
        throw new ParseError(lineNumber, `"${key}" is not a valid directive name`);
      }
      let tokens = toTokens(line.value, 'quoted' in line && line.quoted === true);
      const keyword = key.toLowerCase();

      if (keyword === 'match' && tokens.length === 0 && 'criteria' in line) {
        const criteria = criteriaText(line.criteria);
        tokens = criteria === '' ? [] : [{ val: criteria, separator: '', quoted: false }];
      }
      if (tokens.length === 0 || tokens.every((t) => t.val === '')) {
        throw new ParseError(lineNumber, `Directive "${key}" has no value`);
      }

      if (keyword === 'host' || keyword === 'match') {
        if (current) {
          SshConfigParser.finishBlock(model, current, warnings);
        }
        current = {
          keyword: keyword === 'host' ? 'Host' : 'Match',
          tokens,
          lineNumber,
          groupPath,
          directives: [],
        };
        continue;
      }

      if (!current) {
        throw new ParseError(lineNumber, `Directive "${key}" appears before any Host header`);
      }
      current.directives.push({ key, tokens, lineNumber });
    }

    if (current) {
      SshConfigParser.finishBlock(model, current, warnings);
    }

    return { model, warnings };
  }

  // ─── Lines ─────────────────────────────────────────────────────────────────

  private static tokenize(source: string, lines: string[]): SSHConfig {
    try {
      return SSHConfig.parse(source);
    } catch (err) {
      const open = lines.findIndex((l) => !l.trim().startsWith('#') && (l.split('"').length - 1) % 2 === 1);
      if (open >= 0) {
        throw new ParseError(open + 1, 'Quoted value is not closed');
      }
      throw new ParseError(1, `Unreadable SSH config: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  // ─── Blocks ────────────────────────────────────────────────────────────────

  private static finishBlock(model: ConfigModel, block: RawBlock, warnings: ParseWarning[]): void {
    const hasHostName = block.directives.some((d) => d.key.toLowerCase() === 'hostname');
    const patternText = renderValue(block.tokens, 'word');
    const isPattern =
      block.keyword === 'Match' ||
      wordCount(block.tokens) > 1 ||
      (!hasHostName && WILDCARD_RE.test(patternText));

    if (isPattern) {
      SshConfigParser.guard(block.lineNumber, () => model.addPatternBlock({
        keyword: block.keyword,
        pattern: patternText,
        directives: block.directives.map((d): [string, string] => [
          d.key,
          renderValue(d.tokens, d.key.toLowerCase() === 'proxycommand' ? 'command' : 'word'),
        ]),
        groupPath: block.groupPath,
      }));
      SshConfigParser.checkPlacement(model, block, patternText, warnings);
      return;
    }

    const label = renderValue(block.tokens, 'bare');
    const input = SshConfigParser.toConnection(block, label, warnings);
    if (model.has(block.groupPath, label)) {
      warnings.push({
        lineNumber: block.lineNumber,
        message: `Duplicate Host "${formatConnectionPath(block.groupPath, label)}"; this block replaces the earlier one`,
      });
      SshConfigParser.guard(block.lineNumber, () => model.replaceConnection(input));
    } else {
      SshConfigParser.guard(block.lineNumber, () => model.addConnection(input));
      SshConfigParser.checkPlacement(model, block, label, warnings);
    }
  }

  /**
   * Warn when a block just added is not the last one the serializer writes,
   * i.e. it follows blocks of a group that is written after its own.
   */
  private static checkPlacement(
    model: ConfigModel,
    block: RawBlock,
    name: string,
    warnings: ParseWarning[]
  ): void {
    let last: { groupPath: GroupPath } | undefined;
    for (const item of model.blocks()) {
      last = item.kind === 'connection' ? item.connection : item.block;
    }
    const samePath =
      last !== undefined &&
      last.groupPath.length === block.groupPath.length &&
      last.groupPath.every((n, i) => n === block.groupPath[i]);
    if (!samePath) {
      warnings.push({
        lineNumber: block.lineNumber,
        message: `${block.keyword} "${name}" follows blocks of a group written after its own; rewriting the file moves it ahead of them`,
      });
    }
  }

  /** Re-throw model validation failures as parse errors on the block's line. */
  private static guard(lineNumber: number, fn: () => unknown): void {
    try {
      fn();
    } catch (err) {
      if (err instanceof InvalidConnectionError) {
        throw new ParseError(lineNumber, err.message);
      }
      throw err;
    }
  }

  private static toConnection(block: RawBlock, label: string, warnings: ParseWarning[]): ConnectionInput {
    const input: ConnectionInput = {
      label,
      hostname: label,
      port: DEFAULT_SSH_PORT,
      groupPath: block.groupPath,
      extraOptions: {},
    };
    const extra: Record<string, string> = {};
    const extraKeys = new Map<string, string>();
    const seen = new Set<string>();

    for (const { key, tokens, lineNumber } of block.directives) {
      const lower = key.toLowerCase();

      if (isModeled(lower)) {
        // ssh uses the first value it obtains for each parameter
        if (seen.has(lower)) {
          warnings.push({
            lineNumber,
            message: `${MODELED_DIRECTIVES[lower]} is set more than once for "${label}"; the first value is kept`,
          });
          continue;
        }
        seen.add(lower);
        const value = renderValue(tokens, lower === 'proxycommand' ? 'command' : 'bare');
        switch (lower) {
          case 'hostname':
            input.hostname = value;
            break;
          case 'port':
            input.port = SshConfigParser.parsePort(value, lineNumber);
            break;
          case 'user':
            input.username = value;
            break;
          case 'identityfile':
            input.identityFile = value;
            break;
          case 'proxycommand':
            input.proxyCommand = value;
            break;
        }
        continue;
      }

      const value = renderValue(tokens, 'word');
      const existingKey = extraKeys.get(lower);
      if (existingKey !== undefined) {
        extra[existingKey] = `${extra[existingKey]}\n${value}`;
      } else {
        extraKeys.set(lower, key);
        extra[key] = value;
      }
    }

    input.extraOptions = extra;
    return input;
  }

  private static parsePort(value: string, lineNumber: number): number {
    if (!/^\d+$/.test(value)) {
      throw new ParseError(lineNumber, `Port "${value}" is not a number`);
    }
    const port = parseInt(value, 10);
    if (port < 1 || port > 65535) {
      throw new ParseError(lineNumber, `Port ${port} is outside 1-65535`);
    }
    return port;
  }
}

/** Parse raw SSH config text into a ConfigModel plus non-fatal warnings. */
export function parseSshConfig(text: string): ParsedConfig {
  return SshConfigParser.parse(text);
}

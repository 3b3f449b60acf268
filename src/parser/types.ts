/**
 * Type definitions for SSH config parsing.
 */

import type { ConfigModel } from '../model/config-model.js';

export interface ParseWarning {
  /** 1-based line the warning refers to */
  lineNumber: number;
  message: string;
}

export interface ParsedConfig {
  model: ConfigModel;
  warnings: ParseWarning[];
}

/** One value word of a directive, as tokenized by ssh-config. */
export interface ValueToken {
  val: string;
  /** Whitespace (or `=`) that preceded the word */
  separator: string;
  quoted: boolean;
}

/** A `Key Value` line as read from the file. */
export interface Directive {
  key: string;
  tokens: ValueToken[];
  lineNumber: number;
}

/** A `Host` or `Match` block before it is classified. */
export interface RawBlock {
  keyword: 'Host' | 'Match';
  tokens: ValueToken[];
  lineNumber: number;
  groupPath: string[];
  directives: Directive[];
}

/**
 * hostsync output formatter
 *
 * Formats change reports, connection listings and errors into
 * human-readable strings for CLI output.
 */

import type { ConfigModel } from '../model/config-model.js';
import type { Connection } from '../model/types.js';
import type { SyncOutcome } from '../sync/types.js';
import { ErrorHandler } from '../errors/error-handler.js';

/** Account overview passed to formatStatus. */
export interface AccountStatus {
  configFile: string;
  sshConfigPath: string;
  apiUrl: string;
  username?: string;
  /** undefined when credentials were not checked */
  authenticated?: boolean;
  remoteConnections?: number;
}

const LINE = '─'.repeat(60);
const DIM = '\x1b[2m';
const BOLD = '\x1b[1m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const RED = '\x1b[31m';
const CYAN = '\x1b[36m';
const RESET = '\x1b[0m';

function header(title: string): string {
  return `\n${BOLD}${title}${RESET}\n${LINE}`;
}

function field(label: string, value: string | number | undefined): string {
  if (value === undefined) return '';
  return `  ${DIM}${label.padEnd(22)}${RESET}${value}`;
}

function describeTarget(c: Connection): string {
  const user = c.username ? `${c.username}@` : '';
  const port = c.port !== 22 ? `:${c.port}` : '';
  return `${user}${c.hostname}${port}`;
}

export class OutputFormatter {
  /**
   * Format the outcome of an export or import run.
   */
  formatChangeReport(outcome: SyncOutcome): string {
    const { report } = outcome;
    const title = outcome.direction === 'export' ? 'Export' : 'Import';
    const lines: string[] = [header(`${title}${outcome.dryRun ? ' (dry run)' : ''}`)];

    lines.push(field('Created', `${GREEN}${report.created}${RESET}`));
    lines.push(field('Updated', `${CYAN}${report.updated}${RESET}`));
    lines.push(field('Unchanged', report.unchanged));
    if (report.conflicts.length) {
      lines.push(field('Conflicts', `${RED}${report.conflicts.length}${RESET}`));
    }

    const changed = report.changes.filter((c) => c.action !== 'unchanged');
    if (changed.length) {
      lines.push('');
      for (const change of changed) {
        const mark = change.action === 'create' ? `${GREEN}+${RESET}` : `${CYAN}~${RESET}`;
        lines.push(`  ${mark} ${[...change.groupPath, change.label].join('/')}`);
      }
    }
    for (const conflict of report.conflicts) {
      lines.push(`  ${RED}!${RESET} ${[...conflict.groupPath, conflict.label].join('/')} ${DIM}${conflict.reason}${RESET}`);
    }
    if (outcome.warnings.length) {
      lines.push(this.formatWarnings(outcome.warnings));
    }

    return lines.filter(Boolean).join('\n');
  }

  /**
   * Format the connections of a model as an indented tree.
   */
  formatConnectionList(model: ConfigModel): string {
    if (model.size === 0 && model.groups().length === 0 && model.patternBlocks().length === 0) {
      return `${YELLOW}No connections found.${RESET}`;
    }
    const lines: string[] = [header(`Connections (${model.size})`)];

    const byGroup = new Map<string, Connection[]>();
    for (const { connection } of model.listAll()) {
      const key = connection.groupPath.join('/');
      byGroup.set(key, [...(byGroup.get(key) ?? []), connection]);
    }
    const printConnections = (key: string, depth: number): void => {
      for (const c of byGroup.get(key) ?? []) {
        lines.push(`${'  '.repeat(depth + 1)}${BOLD}${c.label}${RESET} ${DIM}${describeTarget(c)}${RESET}`);
      }
    };

    printConnections('', 0);
    for (const group of model.groups()) {
      const path = [...group.parentPath, group.name];
      lines.push(`${'  '.repeat(path.length)}📁 ${group.name}`);
      printConnections(path.join('/'), path.length);
    }

    const patterns = model.patternBlocks();
    if (patterns.length) {
      lines.push(`\n  ${DIM}Pattern blocks (local only):${RESET}`);
      for (const block of patterns) {
        const scope = block.groupPath.length ? ` ${DIM}[${block.groupPath.join('/')}]${RESET}` : '';
        lines.push(`    ${block.keyword} ${block.pattern}${scope}`);
      }
    }
    return lines.join('\n');
  }

  formatWarnings(warnings: string[]): string {
    return warnings.map((w) => `${YELLOW}⚠️  ${w}${RESET}`).join('\n');
  }

  /**
   * Format the account and file overview.
   */
  formatStatus(status: AccountStatus): string {
    const lines: string[] = [header('hostsync Status')];
    lines.push(field('Config file', status.configFile));
    lines.push(field('SSH config', status.sshConfigPath));
    lines.push(field('Account API', status.apiUrl));
    lines.push(field('Username', status.username ?? `${YELLOW}not set${RESET}`));
    if (status.authenticated !== undefined) {
      const s = status.authenticated ? `${GREEN}✓ accepted${RESET}` : `${RED}✗ rejected${RESET}`;
      lines.push(field('Credentials', s));
    }
    lines.push(field('Remote connections', status.remoteConnections));
    return lines.filter(Boolean).join('\n');
  }

  /**
   * Format an error into a friendly, actionable message.
   */
  formatError(error: unknown): string {
    const message = `\n${RED}${BOLD}Error:${RESET} ${ErrorHandler.toUserMessage(error)}`;
    return ErrorHandler.isRetryable(error) ? `${message}\n${DIM}This is usually temporary; run the command again.${RESET}` : message;
  }
}

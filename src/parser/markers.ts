/**
 * Group marker comments.
 *
 * Groups are not an SSH concept, so they are written as a structured
 * comment that scopes every block after it until the next marker:
 *
 *   # hostsync:group work/prod
 *   Host db
 *       HostName 10.0.0.5
 *
 * A bare `# hostsync:group` returns to the top level.
 */

import type { GroupPath } from '../model/types.js';

export const GROUP_MARKER_PREFIX = 'hostsync:group';

const MARKER_RE = /^#\s*hostsync:group(?:\s+(.*))?$/i;

export type MarkerMatch =
  | { kind: 'group'; path: string[] }
  | { kind: 'invalid'; reason: string };

/**
 * Recognize a trimmed comment line as a group marker.
 * Returns null for ordinary comments.
 */
export function matchGroupMarker(line: string): MarkerMatch | null {
  const match = MARKER_RE.exec(line);
  if (!match) return null;

  const rawPath = (match[1] ?? '').trim();
  if (rawPath === '') {
    return { kind: 'group', path: [] };
  }

  const path = rawPath.split('/').map((name) => name.trim());
  if (path.some((name) => name === '')) {
    return { kind: 'invalid', reason: `Group marker has an empty group name: "${rawPath}"` };
  }
  return { kind: 'group', path };
}

export function formatGroupMarker(path: GroupPath): string {
  return path.length === 0 ? `# ${GROUP_MARKER_PREFIX}` : `# ${GROUP_MARKER_PREFIX} ${path.join('/')}`;
}

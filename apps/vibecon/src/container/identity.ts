import crypto from 'node:crypto';

export const CONTAINER_NAME_PREFIX = 'vibecon';

/**
 * Stable container name for a workspace: `vibecon-<sanitized-path>-<hash8>`.
 *
 * The path is used exactly as given. `/a/b` and `/a/b/` (or the same directory
 * reached through a symlinked parent) get different containers; callers that
 * want one container per directory must normalize first.
 */
export function nameFor(workspacePath: string): string {
  const hash8 = crypto.createHash('md5').update(workspacePath).digest('hex').slice(0, 8);
  const sanitized = workspacePath.replace(/^\//, '').replace(/[/_]/g, '-').toLowerCase();
  return `${CONTAINER_NAME_PREFIX}-${sanitized}-${hash8}`;
}

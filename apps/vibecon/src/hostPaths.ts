import os from 'node:os';
import path from 'node:path';

export const CONFIG_BASENAME = '.vibecon';
export const CONFIG_EXTENSIONS = ['.json', '.yaml', '.yml'] as const;
export const LAUNCHER_NAME = 'vibecon';

/** Replaces a leading `~` with the home directory, the way a shell would. */
export function expandHome(p: string, home: string = os.homedir()): string {
  if (p === '~') return home;
  if (p.startsWith('~/')) return path.join(home, p.slice(2));
  return p;
}

function configCandidates(dir: string): string[] {
  return CONFIG_EXTENSIONS.map((ext) => path.join(dir, `${CONFIG_BASENAME}${ext}`));
}

export function globalConfigCandidates(home: string = os.homedir()): string[] {
  return configCandidates(home);
}

export function projectConfigCandidates(projectRoot: string): string[] {
  return configCandidates(projectRoot);
}

export function launcherInstallDir(home: string = os.homedir()): string {
  return path.join(home, '.local', 'bin');
}

export function assistantConfigDir(home: string = os.homedir()): string {
  return path.join(home, '.claude');
}

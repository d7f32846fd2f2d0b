import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import chalk from 'chalk';

import { launcherInstallDir, LAUNCHER_NAME } from '../hostPaths';

export type ShellPathHint = {
  /** rc file, written with a leading `~` for display. */
  configFile: string;
  exportCommand: string;
};

/** Where and how to prepend `dirDisplay` to PATH for the given shell. */
export function shellPathHint(shellName: string, dirDisplay: string): ShellPathHint {
  switch (shellName) {
    case 'zsh':
      return { configFile: '~/.zshrc', exportCommand: `export PATH="${dirDisplay}:$PATH"` };
    case 'bash':
      return { configFile: '~/.bashrc', exportCommand: `export PATH="${dirDisplay}:$PATH"` };
    case 'fish':
      return { configFile: '~/.config/fish/config.fish', exportCommand: `set -gx PATH "${dirDisplay}" $PATH` };
    case 'tcsh':
    case 'csh':
      return { configFile: '~/.cshrc', exportCommand: `setenv PATH "${dirDisplay}:$PATH"` };
    default:
      return { configFile: '~/.profile', exportCommand: `export PATH="${dirDisplay}:$PATH"` };
  }
}

/** `/home/u/.local/bin` -> `$HOME/.local/bin`; paths outside home are unchanged. */
export function displayPath(dir: string, home: string): string {
  if (dir === home) return '$HOME';
  if (dir.startsWith(`${home}${path.sep}`)) return `$HOME${dir.slice(home.length)}`;
  return dir;
}

export type InstallOptions = {
  /** Script the launcher points at; resolved to its real path. */
  scriptPath: string;
  homeDir?: string;
  installDir?: string;
  env?: NodeJS.ProcessEnv;
  /** Print the PATH banner even when the install dir is already on PATH. */
  simulatePathMissing?: boolean;
  print?: (line: string) => void;
};

export type InstallResult = {
  launcher: string;
  target: string;
  alreadyInstalled: boolean;
  pathMissing: boolean;
};

export function installLauncher(opts: InstallOptions): InstallResult {
  const home = opts.homeDir ?? os.homedir();
  const env = opts.env ?? process.env;
  const print = opts.print ?? console.log;
  const installDir = opts.installDir ?? launcherInstallDir(home);
  const launcher = path.join(installDir, LAUNCHER_NAME);
  const target = fs.realpathSync(opts.scriptPath);

  fs.mkdirSync(installDir, { recursive: true });

  const alreadyInstalled = realpathOrNull(launcher) === target;
  if (alreadyInstalled) {
    print(`${chalk.green.bold('Already installed:')} ${chalk.cyan(launcher)} -> ${chalk.blue(target)}`);
  } else {
    fs.rmSync(launcher, { force: true });
    fs.symlinkSync(target, launcher);
    print(`${chalk.green('Installed:')} ${chalk.cyan(launcher)} -> ${chalk.blue(target)}`);
  }

  const onPath = String(env.PATH ?? '')
    .split(path.delimiter)
    .includes(installDir);
  const pathMissing = Boolean(opts.simulatePathMissing) || !onPath;

  if (pathMissing) {
    const shellName = env.SHELL ? path.basename(env.SHELL) : 'unknown';
    printPathBanner(print, shellName, displayPath(installDir, home));
  } else {
    print(`\n${chalk.green.bold('✓')} ${chalk.green('You can now use vibecon by its name:')} ${chalk.cyan.bold(LAUNCHER_NAME)}`);
  }

  return { launcher, target, alreadyInstalled, pathMissing };
}

function printPathBanner(print: (line: string) => void, shellName: string, dirDisplay: string): void {
  const hint = shellPathHint(shellName, dirDisplay);
  const rule = '='.repeat(70);
  const thin = '-'.repeat(70);

  print(chalk.red.bold(`\n${rule}\n  Warning: PATH CUSTOMIZATION REQUIRED\n${rule}`));
  print(`\n  ${chalk.yellow.bold(dirDisplay)} ${chalk.red.bold('is NOT in your PATH!')}\n`);
  print(`  You must add it to your PATH to use ${chalk.cyan.bold(`'${LAUNCHER_NAME}'`)} by name.`);
  print(chalk.blue(`\n${thin}`));
  print(`  ${chalk.magenta('Detected shell:')} ${chalk.bold(shellName)}`);
  print(chalk.blue(thin));
  print(`\n  Add to PATH ${chalk.green('permanently')}:`);
  print(chalk.green(`    echo '${hint.exportCommand}' >> ${hint.configFile}`));
  print(chalk.green(`    source ${hint.configFile}`));
  print(chalk.red.bold(`\n${rule}\n`));
}

export function uninstallLauncher(opts: { homeDir?: string; installDir?: string; print?: (line: string) => void } = {}): boolean {
  const print = opts.print ?? console.log;
  const launcher = path.join(opts.installDir ?? launcherInstallDir(opts.homeDir ?? os.homedir()), LAUNCHER_NAME);

  // lstat: a dangling symlink still counts as installed.
  if (!lstatOrNull(launcher)) {
    print(`Symlink not found: ${launcher}`);
    return false;
  }
  fs.unlinkSync(launcher);
  print(`Uninstalled: ${launcher}`);
  return true;
}

function realpathOrNull(p: string): string | null {
  try {
    return fs.realpathSync(p);
  } catch {
    return null;
  }
}

function lstatOrNull(p: string): fs.Stats | null {
  try {
    return fs.lstatSync(p);
  } catch {
    return null;
  }
}

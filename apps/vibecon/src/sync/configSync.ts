import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as tar from 'tar';

import { EngineClient } from '../docker/client';
import { errorMessage } from '../errors';
import { assistantConfigDir, expandHome } from '../hostPaths';
import { AppSettings, LogFn, vibeconLog } from '../settings';

const SETTINGS_FILE = 'settings.json';
const MEMORY_FILE = 'CLAUDE.md';
const COMMANDS_DIR = 'commands';
const STAGE_DIR = 'stage';

export type SyncReport = {
  /** Top-level names uploaded into the container config dir. */
  uploaded: string[];
  /** Steps that failed and were skipped. */
  warnings: string[];
};

/**
 * Projects a subset of the host assistant config into a running container:
 * the status line from settings.json (plus its script), CLAUDE.md and the
 * commands/ directory. Everything is best effort.
 */
export class ConfigSync {
  private engine: EngineClient;
  private settings: AppSettings;
  private hostConfigDir: string;
  private homeDir: string;
  private log: LogFn;

  constructor(opts: {
    engine: EngineClient;
    settings: AppSettings;
    homeDir?: string;
    hostConfigDir?: string;
    log?: LogFn;
  }) {
    this.engine = opts.engine;
    this.settings = opts.settings;
    this.homeDir = opts.homeDir ?? os.homedir();
    this.hostConfigDir = opts.hostConfigDir ?? assistantConfigDir(this.homeDir);
    this.log = opts.log ?? vibeconLog;
  }

  async syncInto(containerName: string): Promise<SyncReport> {
    const report: SyncReport = { uploaded: [], warnings: [] };
    const step = async (label: string, fn: () => Promise<void>): Promise<boolean> => {
      try {
        await fn();
        return true;
      } catch (error) {
        this.warn(report, `${label}: ${errorMessage(error)}`);
        return false;
      }
    };

    const containerDir = this.settings.containerConfigDir;
    const user = this.settings.containerUser;

    // Nothing touches the container until there is somewhere to stage into.
    let workDir: string;
    try {
      workDir = await createWorkDir();
    } catch (error) {
      this.warn(report, `Failed to create staging directory: ${errorMessage(error)}`);
      return report;
    }
    const stageDir = path.join(workDir, STAGE_DIR);

    try {
      const entries = new Set<string>();

      const statusLine = await this.readStatusLine(report);
      if (statusLine) {
        const scriptPath = statusLineScript(statusLine, this.homeDir);
        if (scriptPath && fs.existsSync(scriptPath)) {
          const name = path.basename(scriptPath);
          if (await step('Failed to stage status line script', () => stageFile(scriptPath, path.join(stageDir, name)))) {
            entries.add(name);
          }
        }
        const body = JSON.stringify({ statusLine }, null, 2);
        if (
          await step(`Failed to stage ${SETTINGS_FILE}`, () =>
            fs.promises.writeFile(path.join(stageDir, SETTINGS_FILE), `${body}\n`)
          )
        ) {
          entries.add(SETTINGS_FILE);
        }
      }

      await step('Failed to create config directory in container', () =>
        this.engine.execAs(containerName, user, ['mkdir', '-p', containerDir])
      );

      const memoryFile = path.join(this.hostConfigDir, MEMORY_FILE);
      if (fs.existsSync(memoryFile)) {
        if (await step(`Failed to stage ${MEMORY_FILE}`, () => stageFile(memoryFile, path.join(stageDir, MEMORY_FILE)))) {
          entries.add(MEMORY_FILE);
        }
      } else {
        await step(`Failed to remove stale ${MEMORY_FILE}`, () =>
          this.engine.execAs(containerName, user, ['rm', '-f', `${containerDir}/${MEMORY_FILE}`])
        );
      }

      // The container copy is replaced wholesale so deleted commands disappear too.
      await step('Failed to clear commands directory', () =>
        this.engine.execAs(containerName, user, ['rm', '-rf', `${containerDir}/${COMMANDS_DIR}`])
      );
      const commandsSource = resolveDirectory(path.join(this.hostConfigDir, COMMANDS_DIR));
      if (commandsSource) {
        const staged = await step('Failed to stage commands directory', () =>
          fs.promises.cp(commandsSource, path.join(stageDir, COMMANDS_DIR), { recursive: true, dereference: true })
        );
        if (staged) entries.add(COMMANDS_DIR);
      }

      if (entries.size > 0) {
        const names = [...entries].sort();
        const archivePath = path.join(workDir, 'config.tar');
        const uploaded = await step('Failed to copy config into container', async () => {
          await tar.create({ cwd: stageDir, file: archivePath, portable: true }, names);
          await this.engine.copyArchiveIn(containerName, containerDir, archivePath);
        });
        if (uploaded) report.uploaded = names;
      }

      await step('Failed to fix config ownership', () =>
        this.engine.execAs(containerName, 'root', ['chown', '-R', `${user}:${user}`, containerDir])
      );
    } finally {
      await step('Failed to remove staging directory', () => fs.promises.rm(workDir, { recursive: true, force: true }));
    }

    return report;
  }

  /** The `statusLine` block of the host settings.json, if any. */
  private async readStatusLine(report: SyncReport): Promise<Record<string, unknown> | null> {
    const settingsFile = path.join(this.hostConfigDir, SETTINGS_FILE);
    if (!fs.existsSync(settingsFile)) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(await fs.promises.readFile(settingsFile, 'utf-8'));
    } catch (error) {
      this.warn(report, `Failed to parse ${SETTINGS_FILE}: ${errorMessage(error)}`);
      return null;
    }

    if (!parsed || typeof parsed !== 'object' || !('statusLine' in parsed)) return null;
    const statusLine = parsed.statusLine;
    if (!statusLine || typeof statusLine !== 'object' || Array.isArray(statusLine)) return null;
    return { ...statusLine };
  }

  private warn(report: SyncReport, message: string): void {
    report.warnings.push(message);
    this.log('warn', message);
  }
}

export function statusLineScript(statusLine: Record<string, unknown>, homeDir: string): string | null {
  const command = statusLine.command;
  if (typeof command !== 'string' || !command.trim()) return null;
  return expandHome(command.trim(), homeDir);
}

/** Real path of `dirPath` when it is (or links to) a directory, else null. */
export function resolveDirectory(dirPath: string): string | null {
  try {
    const real = fs.realpathSync(dirPath);
    return fs.statSync(real).isDirectory() ? real : null;
  } catch {
    return null;
  }
}

async function createWorkDir(): Promise<string> {
  const workDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'vibecon-sync-'));
  try {
    await fs.promises.mkdir(path.join(workDir, STAGE_DIR));
  } catch (error) {
    await fs.promises.rm(workDir, { recursive: true, force: true });
    throw error;
  }
  return workDir;
}

async function stageFile(src: string, dest: string): Promise<void> {
  await fs.promises.copyFile(src, dest);
  const { mode } = await fs.promises.stat(src);
  await fs.promises.chmod(dest, mode & 0o7777);
}

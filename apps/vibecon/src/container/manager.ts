import chalk from 'chalk';

import { EngineClient } from '../docker/client';
import { errorMessage } from '../errors';
import { HostContext } from '../host/context';
import { compileMounts, MountCompileOptions, MountSpec } from '../mounts/compiler';
import { AppSettings, LogFn, vibeconLog } from '../settings';

export type ContainerState = 'absent' | 'stopped' | 'running';

export type EnsureRunningOptions = {
  workspacePath: string;
  containerName: string;
  image: string;
  mounts: readonly MountSpec[];
  /** Builds `image`; only called when the engine does not have it. */
  build: () => Promise<void>;
};

export type EnsureRunningResult = 'already-running' | 'restarted' | 'created';

export class ContainerManager {
  public engine: EngineClient;
  private settings: AppSettings;
  private host: HostContext;
  private log: LogFn;
  private mountOptions: MountCompileOptions;

  constructor(opts: {
    engine: EngineClient;
    settings: AppSettings;
    host: HostContext;
    log?: LogFn;
    mountOptions?: MountCompileOptions;
  }) {
    this.engine = opts.engine;
    this.settings = opts.settings;
    this.host = opts.host;
    this.log = opts.log ?? vibeconLog;
    this.mountOptions = { warn: (message) => this.log('warn', message), ...opts.mountOptions };
  }

  async inspectState(name: string): Promise<ContainerState> {
    if (await this.engine.isContainerRunning(name)) return 'running';
    if (await this.engine.containerExists(name)) return 'stopped';
    return 'absent';
  }

  /**
   * Drives the workspace container to "running" with as little disruption as
   * possible: a running container is left alone, a stopped one is restarted,
   * and only a missing (or unrestartable) one is recreated.
   */
  async ensureRunning(opts: EnsureRunningOptions): Promise<EnsureRunningResult> {
    const { containerName } = opts;
    const state = await this.inspectState(containerName);
    if (state === 'running') return 'already-running';

    if (state === 'stopped') {
      this.log('info', `Found stopped container '${containerName}', attempting to restart...`);
      try {
        await this.engine.startContainer(containerName);
        this.log('info', `Container '${containerName}' restarted successfully.`);
        return 'restarted';
      } catch (error) {
        this.log('warn', `Failed to restart container '${containerName}': ${errorMessage(error)}`);
        this.log('info', 'Restart failed, removing container and creating a new one...');
        await this.engine.removeContainer(containerName);
      }
    }

    await this.createContainer(opts);
    return 'created';
  }

  private async createContainer(opts: EnsureRunningOptions): Promise<void> {
    const { workspacePath, containerName, image } = opts;
    const volumeArgs = [
      '-v',
      `${workspacePath}:${this.settings.containerWorkspacePath}`,
      ...compileMounts(opts.mounts, workspacePath, containerName, this.mountOptions),
    ];

    if (!(await this.engine.imageExists(image))) {
      this.log('info', `Image '${image}' not found, building...`);
      await opts.build();
    }

    const timezone = await this.host.timezone();
    this.log('info', `Configuring timezone: ${timezone}`);
    const env = this.terminalEnv(timezone);
    const git = await this.host.gitIdentity();
    if (git.name) {
      this.log('info', `Configuring git user: ${git.name} <${git.email}>`);
      env.push(`GIT_USER_NAME=${git.name}`, `GIT_USER_EMAIL=${git.email}`);
    }

    this.log(
      'info',
      `Starting container ${chalk.cyan(containerName)} with ${workspacePath} mounted at ${this.settings.containerWorkspacePath}...`
    );
    await this.engine.runDetached({
      name: containerName,
      hostname: this.settings.containerHostname,
      env,
      volumeArgs,
      image,
    });
  }

  /** Terminal and timezone variables shared by `run` and `exec`. */
  private terminalEnv(timezone: string): string[] {
    return [`TERM=${this.host.term()}`, 'COLORTERM=truecolor', `TZ=${timezone}`];
  }

  async stop(name: string): Promise<boolean> {
    this.log('info', `Stopping container '${name}'...`);
    try {
      await this.engine.stopContainer(name);
    } catch (error) {
      this.log('info', `Container was not running (${errorMessage(error)}).`);
      return false;
    }
    this.log('info', 'Container stopped.');
    return true;
  }

  async destroy(name: string): Promise<boolean> {
    this.log('info', `Destroying container '${name}'...`);
    if (!(await this.engine.containerExists(name))) {
      this.log('info', 'No container to destroy.');
      return false;
    }
    await this.engine.removeContainer(name);
    this.log('info', 'Container destroyed.');
    return true;
  }

  async exec(name: string, command: string[]): Promise<number> {
    const env = this.terminalEnv(await this.host.timezone());
    return this.engine.execInteractive(name, env, command);
  }
}

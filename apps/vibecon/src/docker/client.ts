import Docker from 'dockerode';
import { spawn } from 'child_process';
import * as os from 'os';

import { EngineCommandError, isNotFoundError } from '../errors';

export interface ImageBuildOptions {
  /** Directory containing the Dockerfile. */
  context: string;
  buildArgs: Record<string, string>;
  tags: string[];
}

export interface RunDetachedOptions {
  name: string;
  hostname: string;
  /** `KEY=value` entries. */
  env: string[];
  /** Pre-compiled `-v` / `--mount` arguments, passed through in order. */
  volumeArgs: string[];
  image: string;
}

/**
 * Everything vibecon needs from the container engine. The reconciler and the
 * config sync only talk to this interface.
 */
export interface EngineClient {
  isContainerRunning(name: string): Promise<boolean>;
  containerExists(name: string): Promise<boolean>;
  startContainer(name: string): Promise<void>;
  stopContainer(name: string): Promise<void>;
  removeContainer(name: string): Promise<void>;
  imageExists(image: string): Promise<boolean>;
  buildImage(options: ImageBuildOptions): Promise<void>;
  runDetached(options: RunDetachedOptions): Promise<void>;
  /** Attaches the caller's terminal; resolves with the command's exit code. */
  execInteractive(name: string, env: string[], command: string[]): Promise<number>;
  /** Extracts a tar archive (file path, buffer or stream) into `destPath`. */
  copyArchiveIn(name: string, destPath: string, archive: string | Buffer | NodeJS.ReadableStream): Promise<void>;
  execAs(name: string, user: string, command: string[]): Promise<void>;
}

export class DockerClient implements EngineClient {
  private docker: Docker;

  constructor(docker?: Docker) {
    this.docker = docker ?? new Docker();
  }

  private async inspectContainer(name: string): Promise<Docker.ContainerInspectInfo | null> {
    try {
      return await this.docker.getContainer(name).inspect();
    } catch (err) {
      if (isNotFoundError(err)) return null;
      throw err;
    }
  }

  async isContainerRunning(name: string): Promise<boolean> {
    const info = await this.inspectContainer(name);
    return Boolean(info?.State?.Running);
  }

  async containerExists(name: string): Promise<boolean> {
    const info = await this.inspectContainer(name);
    return info !== null;
  }

  async startContainer(name: string): Promise<void> {
    await this.docker.getContainer(name).start();
  }

  async stopContainer(name: string): Promise<void> {
    await this.docker.getContainer(name).stop();
  }

  async removeContainer(name: string): Promise<void> {
    await this.docker.getContainer(name).remove({ force: true });
  }

  async imageExists(image: string): Promise<boolean> {
    try {
      await this.docker.getImage(image).inspect();
      return true;
    } catch (err) {
      if (isNotFoundError(err)) return false;
      throw err;
    }
  }

  async buildImage(options: ImageBuildOptions): Promise<void> {
    const args = ['build'];
    for (const [key, value] of Object.entries(options.buildArgs)) {
      args.push('--build-arg', `${key}=${value}`);
    }
    for (const tag of options.tags) {
      args.push('-t', tag);
    }
    args.push('.');
    // Build output goes straight to the user's terminal.
    await this.runDocker(args, { stdio: 'inherit', cwd: options.context });
  }

  async runDetached(options: RunDetachedOptions): Promise<void> {
    const args = ['run', '-d', '--name', options.name, '--hostname', options.hostname];
    for (const entry of options.env) {
      args.push('-e', entry);
    }
    args.push(...options.volumeArgs, options.image);
    await this.runDocker(args);
  }

  async execInteractive(name: string, env: string[], command: string[]): Promise<number> {
    const args = ['exec', '-it'];
    for (const entry of env) {
      args.push('-e', entry);
    }
    args.push(name, ...command);

    // `docker exec -it` handles the TTY; the Engine API would need a manual pty bridge.
    const proc = spawn('docker', args, { stdio: 'inherit' });
    return new Promise((resolve, reject) => {
      proc.once('error', (err: Error) => reject(err));
      proc.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
        if (code !== null) resolve(code);
        else resolve(signal ? 128 + os.constants.signals[signal] : 1);
      });
    });
  }

  async copyArchiveIn(name: string, destPath: string, archive: string | Buffer | NodeJS.ReadableStream): Promise<void> {
    await this.docker.getContainer(name).putArchive(archive, { path: destPath });
  }

  async execAs(name: string, user: string, command: string[]): Promise<void> {
    await this.runDocker(['exec', '-u', user, name, ...command]);
  }

  private async runDocker(
    args: string[],
    options?: { stdio?: 'inherit' | 'pipe'; cwd?: string }
  ): Promise<{ stdout: string; stderr: string }> {
    const stdio = options?.stdio || 'pipe';
    return new Promise((resolve, reject) => {
      const proc = spawn('docker', args, {
        cwd: options?.cwd,
        stdio: stdio === 'inherit' ? 'inherit' : ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      proc.stdout?.on('data', (chunk: Buffer) => (stdout += chunk.toString()));
      proc.stderr?.on('data', (chunk: Buffer) => (stderr += chunk.toString()));

      proc.on('error', (err) => reject(err));
      proc.on('exit', (code) => {
        if (code === 0) resolve({ stdout, stderr });
        else reject(new EngineCommandError({ args, exitCode: code, stderr: stderr || stdout }));
      });
    });
  }
}

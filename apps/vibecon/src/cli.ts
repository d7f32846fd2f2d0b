#!/usr/bin/env node

import { Command, Option } from 'commander';

import { ConfigLoader } from './config/loader';
import { nameFor } from './container/identity';
import { ContainerManager } from './container/manager';
import { DockerClient } from './docker/client';
import { errorMessage } from './errors';
import { systemHostContext } from './host/context';
import { ImageBuilder } from './image/builder';
import { installLauncher, uninstallLauncher } from './install/launcher';
import { loadSettings, loadVibeconEnv, vibeconLog } from './settings';
import { ConfigSync } from './sync/configSync';

type CliOptions = {
  install?: boolean;
  I?: boolean;
  uninstall?: boolean;
  stop?: boolean;
  destroy?: boolean;
  build?: boolean;
  forceBuild?: boolean;
};

// Allow piping output (e.g. to `head`) without crashing on broken pipe.
process.stdout.on('error', (err: NodeJS.ErrnoException) => {
  if (err.code === 'EPIPE') process.exit(0);
});

type ActionHandler<TArgs extends unknown[] = unknown[]> = (
  this: Command,
  ...args: TArgs
) => unknown | Promise<unknown>;

function safeAction<TArgs extends unknown[]>(fn: ActionHandler<TArgs>) {
  return async function (this: Command, ...args: TArgs): Promise<void> {
    try {
      await fn.apply(this, args);
    } catch (error) {
      vibeconLog('error', errorMessage(error));
      process.exit(1);
    }
  };
}

async function runWorkspace(command: string[]): Promise<number> {
  const settings = loadSettings();
  const engine = new DockerClient();
  const workspacePath = process.cwd();
  const containerName = nameFor(workspacePath);

  // Malformed config aborts here, before the engine is touched.
  const config = await ConfigLoader.loadMerged(workspacePath);
  const builder = new ImageBuilder({ engine, settings });
  const manager = new ContainerManager({ engine, settings, host: systemHostContext() });

  await manager.ensureRunning({
    workspacePath,
    containerName,
    image: settings.imageName,
    mounts: config.mounts,
    build: async () => {
      await builder.build();
    },
  });
  await new ConfigSync({ engine, settings }).syncInto(containerName);

  return manager.exec(containerName, command.length > 0 ? command : settings.defaultCommand);
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('vibecon')
    .description('Persistent Docker container per workspace for AI coding assistants')
    .argument('[command...]', 'command to run in the container (default: claude --dangerously-skip-permissions)')
    .option('-i, --install', 'install a vibecon symlink into ~/.local/bin')
    .addOption(new Option('-I', 'install, printing the PATH warning as if ~/.local/bin were missing').hideHelp())
    .option('-u, --uninstall', 'remove the vibecon symlink')
    .option('-k, --stop', 'stop the container for this workspace')
    .option('-K, --destroy', 'remove the container for this workspace')
    .option('-b, --build', 'rebuild the image if tool versions changed')
    .option('-B, --force-build', 'rebuild the image even if it is up to date')
    .passThroughOptions()
    .action(
      safeAction(async (command: string[], options: CliOptions) => {
        if (options.install || options.I) {
          installLauncher({ scriptPath: process.argv[1] ?? __filename, simulatePathMissing: Boolean(options.I) });
          return;
        }
        if (options.uninstall) {
          uninstallLauncher();
          return;
        }

        if (options.stop || options.destroy) {
          const settings = loadSettings();
          const manager = new ContainerManager({ engine: new DockerClient(), settings, host: systemHostContext() });
          const containerName = nameFor(process.cwd());
          if (options.destroy) await manager.destroy(containerName);
          else await manager.stop(containerName);
          return;
        }

        if (options.build || options.forceBuild) {
          const builder = new ImageBuilder({ engine: new DockerClient(), settings: loadSettings() });
          await builder.rebuildIfStale({ force: Boolean(options.forceBuild) });
          return;
        }

        process.exit(await runWorkspace(command));
      })
    );

  return program;
}

if (require.main === module) {
  loadVibeconEnv();
  createProgram()
    .parseAsync()
    .catch((error: unknown) => {
      vibeconLog('error', errorMessage(error));
      process.exit(1);
    });
}

import path from 'node:path';

import chalk from 'chalk';
import dotenv from 'dotenv';

export type AppSettings = {
  /** Tag the reconciler runs containers from. */
  imageName: string;
  /** Repository the composite (versioned) tag is attached to. */
  imageRepository: string;
  defaultCommand: string[];
  containerHostname: string;
  containerWorkspacePath: string;
  containerUser: string;
  containerConfigDir: string;
  /** Directory holding the Dockerfile used by `vibecon --build`. */
  buildContextDir: string;
};

export const DEFAULT_IMAGE_REPOSITORY = 'vibecon';
export const DEFAULT_COMMAND = ['claude', '--dangerously-skip-permissions'];

// Compiled layout:
//   apps/vibecon/dist/settings.js -> __dirname = apps/vibecon/dist
// Source layout (ts-jest):
//   apps/vibecon/src/settings.ts  -> __dirname = apps/vibecon/src
export function appRootDir(): string {
  return path.resolve(__dirname, '..');
}

let ENV_LOADED = false;
export function loadVibeconEnv(): void {
  if (ENV_LOADED) return;
  ENV_LOADED = true;

  // Never overrides variables already exported in the shell.
  const appRoot = appRootDir();
  for (const p of [path.join(appRoot, '.env.local'), path.join(appRoot, '.env')]) {
    dotenv.config({ path: p, override: false });
  }
}

function envString(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): AppSettings {
  const imageName = envString(env, 'VIBECON_IMAGE') ?? `${DEFAULT_IMAGE_REPOSITORY}:latest`;
  const commandRaw = envString(env, 'VIBECON_DEFAULT_COMMAND');
  const defaultCommand = commandRaw ? commandRaw.split(/\s+/).filter(Boolean) : [...DEFAULT_COMMAND];
  const buildContextDir = path.resolve(envString(env, 'VIBECON_BUILD_CONTEXT') ?? appRootDir());

  return {
    imageName,
    imageRepository: DEFAULT_IMAGE_REPOSITORY,
    defaultCommand,
    containerHostname: 'vibecon',
    containerWorkspacePath: '/workspace',
    containerUser: 'node',
    containerConfigDir: '/home/node/.claude',
    buildContextDir,
  };
}

export type LogLevel = 'info' | 'warn' | 'error';
export type LogFn = (level: LogLevel, message: string) => void;

export function vibeconLog(level: LogLevel, message: string): void {
  if (level === 'error') {
    console.error(chalk.red(`Error: ${message}`));
    return;
  }
  if (level === 'warn') {
    console.warn(chalk.yellow(`Warning: ${message}`));
    return;
  }
  if (process.env.VIBECON_QUIET === '1') return;
  console.log(message);
}

import { spawn } from 'node:child_process';
import fs from 'node:fs/promises';

export type GitIdentity = {
  name: string;
  email: string;
};

/** One step of a fallback chain; `null` means "no answer here, try the next". */
export type ValueResolver = () => Promise<string | null>;

export type CommandRunner = (cmd: string, args: string[]) => Promise<string>;

export async function runLocal(cmd: string, args: string[]): Promise<string> {
  return new Promise((resolve, reject) => {
    const proc = spawn(cmd, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';
    proc.stdout.on('data', (chunk: Buffer) => (stdout += chunk.toString()));
    proc.stderr.on('data', (chunk: Buffer) => (stderr += chunk.toString()));
    proc.on('error', (err) => reject(err));
    proc.on('exit', (code) => {
      if (code === 0) return resolve(stdout);
      const suffix = stderr.trim();
      reject(new Error(`${cmd} ${args.join(' ')} failed (exit ${code})${suffix ? `: ${suffix}` : ''}`));
    });
  });
}

function nonEmpty(raw: string | undefined | null): string | null {
  const s = String(raw ?? '').trim();
  return s ? s : null;
}

/** Runs resolvers in order and returns the first non-empty answer. */
export async function firstResolved(resolvers: readonly ValueResolver[], fallback: string): Promise<string> {
  for (const resolve of resolvers) {
    const value = nonEmpty(await resolve());
    if (value) return value;
  }
  return fallback;
}

export function timezoneFromEnv(env: NodeJS.ProcessEnv): ValueResolver {
  return async () => nonEmpty(env.TZ);
}

/** Debian/Ubuntu keep the zone name in a one-line file. Missing or unreadable: no answer. */
export function timezoneFromFile(filePath = '/etc/timezone'): ValueResolver {
  return async () => {
    try {
      return nonEmpty(await fs.readFile(filePath, 'utf-8'));
    } catch {
      return null;
    }
  };
}

/** systemd hosts. A missing binary or a non-zero exit: no answer. */
export function timezoneFromTimedatectl(run: CommandRunner = runLocal): ValueResolver {
  return async () => {
    try {
      return nonEmpty(await run('timedatectl', ['show', '-p', 'Timezone', '--value']));
    } catch {
      return null;
    }
  };
}

/** `/etc/localtime -> /usr/share/zoneinfo/Europe/Berlin` yields `Europe/Berlin`. */
export function timezoneFromLocaltimeLink(linkPath = '/etc/localtime'): ValueResolver {
  return async () => {
    let target: string;
    try {
      target = await fs.readlink(linkPath);
    } catch {
      return null;
    }
    return zoneFromZoneinfoPath(target);
  };
}

export function zoneFromZoneinfoPath(target: string): string | null {
  const parts = target.split('/');
  const idx = parts.indexOf('zoneinfo');
  if (idx === -1 || idx + 1 >= parts.length) return null;
  return nonEmpty(parts.slice(idx + 1).join('/'));
}

export const DEFAULT_TIMEZONE = 'UTC';

export function defaultTimezoneResolvers(env: NodeJS.ProcessEnv = process.env): ValueResolver[] {
  return [timezoneFromEnv(env), timezoneFromFile(), timezoneFromTimedatectl(), timezoneFromLocaltimeLink()];
}

export async function hostTimezone(resolvers: readonly ValueResolver[] = defaultTimezoneResolvers()): Promise<string> {
  return firstResolved(resolvers, DEFAULT_TIMEZONE);
}

async function gitConfigValue(run: CommandRunner, key: string): Promise<string> {
  try {
    return (await run('git', ['config', '--global', key])).trim();
  } catch {
    // Unset keys make git exit 1.
    return '';
  }
}

export async function gitIdentity(run: CommandRunner = runLocal): Promise<GitIdentity> {
  const name = await gitConfigValue(run, 'user.name');
  const email = await gitConfigValue(run, 'user.email');
  return { name, email };
}

export function hostTerm(env: NodeJS.ProcessEnv = process.env): string {
  return nonEmpty(env.TERM) ?? 'xterm-256color';
}

/** Host facts injected into the container environment. */
export interface HostContext {
  gitIdentity(): Promise<GitIdentity>;
  timezone(): Promise<string>;
  term(): string;
}

export function systemHostContext(env: NodeJS.ProcessEnv = process.env): HostContext {
  return {
    gitIdentity: () => gitIdentity(),
    timezone: () => hostTimezone(defaultTimezoneResolvers(env)),
    term: () => hostTerm(env),
  };
}

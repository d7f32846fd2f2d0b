export class InvalidMountSpecError extends Error {
  /** JSON rendering of the config value that failed validation. */
  fragment: string;

  constructor(message: string, raw: unknown) {
    super(message);
    this.name = 'InvalidMountSpecError';
    this.fragment = describeFragment(raw);
  }
}

export class ConfigError extends Error {
  filePath: string;

  constructor(message: string, filePath: string) {
    super(message);
    this.name = 'ConfigError';
    this.filePath = filePath;
  }
}

export class EngineCommandError extends Error {
  args: string[];
  exitCode: number | null;
  stderr: string;

  constructor(opts: { args: string[]; exitCode: number | null; stderr?: string; message?: string }) {
    const stderr = String(opts.stderr ?? '').trim();
    const cmd = ['docker', ...opts.args].map((a) => (/\s/.test(a) ? JSON.stringify(a) : a)).join(' ');
    const base = opts.message ?? `${cmd} failed (exit ${opts.exitCode ?? 'unknown'})`;
    super(stderr ? `${base}: ${stderr}` : base);
    this.name = 'EngineCommandError';
    this.args = opts.args;
    this.exitCode = opts.exitCode;
    this.stderr = stderr;
  }
}

export function isInvalidMountSpecError(err: unknown): err is InvalidMountSpecError {
  return err instanceof InvalidMountSpecError;
}

/** True for a 404 from the Docker Engine API (no such container / image). */
export function isNotFoundError(err: unknown): boolean {
  if (!err || typeof err !== 'object') return false;
  if ('statusCode' in err && err.statusCode === 404) return true;
  const message = 'message' in err ? String(err.message ?? '') : '';
  return /no such (container|image)/i.test(message);
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function describeFragment(raw: unknown): string {
  if (typeof raw === 'string') return JSON.stringify(raw);
  try {
    const json = JSON.stringify(raw);
    return json === undefined ? String(raw) : json;
  } catch {
    return String(raw);
  }
}

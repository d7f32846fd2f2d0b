import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { InvalidMountSpecError, describeFragment } from '../errors';
import { expandHome } from '../hostPaths';
import { vibeconLog } from '../settings';

export type SelinuxLabel = 'z' | 'Z';

type MountBase = {
  /** Absolute path inside the container. */
  target: string;
  readOnly: boolean;
  selinux?: SelinuxLabel;
};

export type BindMount = MountBase & {
  type: 'bind';
  /** Host path; `~` and project-relative paths are resolved at compile time. */
  source: string;
};

export type VolumeMount = MountBase & {
  type: 'volume';
  source: string;
  /** Shared across workspaces when true, namespaced by container name otherwise. */
  global: boolean;
  uid?: number;
  gid?: number;
};

export type AnonymousMount = MountBase & {
  type: 'anonymous';
  uid?: number;
  gid?: number;
};

export type MountSpec = BindMount | VolumeMount | AnonymousMount;
export type MountType = MountSpec['type'];

export type MountCompileOptions = {
  warn?: (message: string) => void;
  homeDir?: string;
  pathExists?: (p: string) => boolean;
};

const MOUNT_TYPES: readonly MountType[] = ['bind', 'volume', 'anonymous'];

function isMountType(value: unknown): value is MountType {
  return MOUNT_TYPES.some((t) => t === value);
}

function defaultWarn(message: string): void {
  vibeconLog('warn', message);
}

function label(index: number | undefined): string {
  return index === undefined ? 'mount' : `mounts[${index}]`;
}

function fail(raw: unknown, index: number | undefined, message: string): never {
  throw new InvalidMountSpecError(`Invalid ${label(index)}: ${message}: ${describeFragment(raw)}`, raw);
}

function optionalBoolean(obj: Record<string, unknown>, key: string, index: number | undefined): boolean {
  const value = obj[key];
  if (value == null) return false;
  if (typeof value !== 'boolean') fail(obj, index, `'${key}' must be a boolean`);
  return value;
}

function optionalId(obj: Record<string, unknown>, key: 'uid' | 'gid', index: number | undefined): number | undefined {
  const value = obj[key];
  if (value == null) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    fail(obj, index, `'${key}' must be a non-negative integer`);
  }
  return value;
}

function optionalSelinux(obj: Record<string, unknown>, index: number | undefined): SelinuxLabel | undefined {
  const value = obj.selinux;
  if (value == null) return undefined;
  if (value !== 'z' && value !== 'Z') fail(obj, index, `'selinux' must be "z" or "Z"`);
  return value;
}

function requiredString(
  obj: Record<string, unknown>,
  key: 'target' | 'source',
  index: number | undefined,
  what: string
): string {
  const value = obj[key];
  if (typeof value !== 'string' || !value.trim()) fail(obj, index, `${what} missing required '${key}' field`);
  return value;
}

/**
 * Validates one raw `mounts` entry from a config file.
 *
 * Bare strings are rejected: `"a:b"` could mean a bind mount or a named volume,
 * so every entry must say which kind it is.
 */
export function parseMountSpec(raw: unknown, index?: number, options?: MountCompileOptions): MountSpec {
  const warn = options?.warn ?? defaultWarn;

  if (typeof raw === 'string') {
    fail(raw, index, `mount must be an object with an explicit 'type' field, got a string`);
  }
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
    fail(raw, index, `mount must be an object, got ${Array.isArray(raw) ? 'array' : raw === null ? 'null' : typeof raw}`);
  }
  const obj: Record<string, unknown> = { ...raw };

  const type = obj.type;
  if (type == null || type === '') fail(obj, index, `mount missing required 'type' field`);
  if (!isMountType(type)) {
    fail(obj, index, `unknown mount type '${String(type)}', expected 'bind', 'volume' or 'anonymous'`);
  }

  const target = requiredString(obj, 'target', index, 'mount');
  const readOnly = optionalBoolean(obj, 'read_only', index);
  const selinux = optionalSelinux(obj, index);
  const base: MountBase = selinux ? { target, readOnly, selinux } : { target, readOnly };

  switch (type) {
    case 'bind': {
      const source = requiredString(obj, 'source', index, 'bind mount');
      if (obj.uid != null || obj.gid != null) {
        warn(`uid/gid options ignored for bind mount ${target} (bind mounts cannot remap ownership)`);
      }
      return { type: 'bind', source, ...base };
    }
    case 'volume': {
      const source = requiredString(obj, 'source', index, 'volume mount');
      const global = optionalBoolean(obj, 'global', index);
      const uid = optionalId(obj, 'uid', index);
      const gid = optionalId(obj, 'gid', index);
      return { type: 'volume', source, global, ...base, ...ownership(uid, gid) };
    }
    case 'anonymous': {
      const uid = optionalId(obj, 'uid', index);
      const gid = optionalId(obj, 'gid', index);
      return { type: 'anonymous', ...base, ...ownership(uid, gid) };
    }
  }
}

function ownership(uid: number | undefined, gid: number | undefined): { uid?: number; gid?: number } {
  const out: { uid?: number; gid?: number } = {};
  if (uid !== undefined) out.uid = uid;
  if (gid !== undefined) out.gid = gid;
  return out;
}

export function resolveVolumeName(spec: VolumeMount, containerName: string): string {
  return spec.global ? spec.source : `${containerName}_${spec.source}`;
}

export function resolveBindSource(source: string, projectRoot: string, homeDir: string = os.homedir()): string {
  const expanded = expandHome(source, homeDir);
  return path.normalize(path.isAbsolute(expanded) ? expanded : path.join(projectRoot, expanded));
}

/** `-v` form: `src:target` plus `:ro`, `:z` or `:ro,z` when set. */
function shortForm(source: string, spec: MountBase): string[] {
  const suffix: string[] = [];
  if (spec.readOnly) suffix.push('ro');
  if (spec.selinux) suffix.push(spec.selinux);

  let arg = `${source}:${spec.target}`;
  if (suffix.length > 0) arg += `:${suffix.join(',')}`;
  return ['-v', arg];
}

/**
 * `--mount` form backed by a tmpfs volume driver, the only way to hand
 * uid/gid to the volume. The driver option is quoted because it contains
 * commas of its own.
 */
function ownedVolumeForm(source: string | undefined, spec: VolumeMount | AnonymousMount): string[] {
  const ids: string[] = [];
  if (spec.uid !== undefined) ids.push(`uid=${spec.uid}`);
  if (spec.gid !== undefined) ids.push(`gid=${spec.gid}`);

  const parts = ['type=volume'];
  if (source !== undefined) parts.push(`source=${source}`);
  parts.push(
    `target=${spec.target}`,
    'volume-opt=type=tmpfs',
    'volume-opt=device=tmpfs',
    `"volume-opt=o=${ids.join(',')}"`
  );
  if (spec.readOnly) parts.push('readonly');
  return ['--mount', parts.join(',')];
}

function hasOwnership(spec: VolumeMount | AnonymousMount): boolean {
  return spec.uid !== undefined || spec.gid !== undefined;
}

export function compileMount(
  spec: MountSpec,
  projectRoot: string,
  containerName: string,
  options?: MountCompileOptions
): string[] {
  switch (spec.type) {
    case 'anonymous':
      // A bare `-v <path>` takes no options.
      return hasOwnership(spec) ? ownedVolumeForm(undefined, spec) : ['-v', spec.target];
    case 'bind': {
      const resolved = resolveBindSource(spec.source, projectRoot, options?.homeDir);
      const exists = options?.pathExists ?? fs.existsSync;
      if (!exists(resolved)) {
        (options?.warn ?? defaultWarn)(`bind mount source does not exist: ${resolved}`);
      }
      return shortForm(resolved, spec);
    }
    case 'volume': {
      const volumeName = resolveVolumeName(spec, containerName);
      return hasOwnership(spec) ? ownedVolumeForm(volumeName, spec) : shortForm(volumeName, spec);
    }
  }
}

/** Validates and compiles a single raw config entry. */
export function compile(raw: unknown, projectRoot: string, containerName: string, options?: MountCompileOptions): string[] {
  return compileMount(parseMountSpec(raw, undefined, options), projectRoot, containerName, options);
}

/** Compiles already-validated specs in declaration order; nothing is deduplicated. */
export function compileMounts(
  specs: readonly MountSpec[],
  projectRoot: string,
  containerName: string,
  options?: MountCompileOptions
): string[] {
  return specs.flatMap((spec) => compileMount(spec, projectRoot, containerName, options));
}

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as yaml from 'js-yaml';

import { ConfigError, errorMessage, isInvalidMountSpecError } from '../errors';
import { globalConfigCandidates, projectConfigCandidates } from '../hostPaths';
import { MountCompileOptions, MountSpec, parseMountSpec } from '../mounts/compiler';

export interface VibeconConfig {
  mounts: MountSpec[];
}

export type LoadedConfig = VibeconConfig & {
  /** Files that contributed, in merge order. */
  sources: string[];
};

export class ConfigLoader {
  private static ensureRecord(value: unknown, filePath: string): Record<string, unknown> {
    if (!value || typeof value !== 'object' || Array.isArray(value)) {
      throw new ConfigError(`Invalid config in ${filePath}: expected an object`, filePath);
    }
    return { ...value };
  }

  static async parseFile(filePath: string): Promise<unknown> {
    const content = await fs.promises.readFile(filePath, 'utf-8');
    const ext = path.extname(filePath).toLowerCase();

    try {
      if (ext === '.yaml' || ext === '.yml') {
        return yaml.load(content) ?? {};
      }
      if (ext === '.json') {
        return JSON.parse(content);
      }
    } catch (error) {
      const kind = ext === '.json' ? 'JSON' : 'YAML';
      throw new ConfigError(`Invalid ${kind} in ${filePath}: ${errorMessage(error)}`, filePath);
    }
    throw new ConfigError(`Unsupported config file format: ${ext}`, filePath);
  }

  static normalizeConfig(raw: unknown, filePath: string, options?: MountCompileOptions): VibeconConfig {
    const cfg = this.ensureRecord(raw, filePath);

    const mountsRaw = cfg.mounts;
    if (mountsRaw == null) return { mounts: [] };
    if (!Array.isArray(mountsRaw)) {
      throw new ConfigError(`Invalid mounts in ${filePath}: expected an array`, filePath);
    }

    const entries: unknown[] = mountsRaw;
    const mounts: MountSpec[] = [];
    for (let i = 0; i < entries.length; i++) {
      try {
        mounts.push(parseMountSpec(entries[i], i, options));
      } catch (error) {
        if (isInvalidMountSpecError(error)) error.message = `${filePath}: ${error.message}`;
        throw error;
      }
    }
    return { mounts };
  }

  /** First existing candidate wins; no candidate means an empty config. */
  static async loadFirst(candidates: string[], options?: MountCompileOptions): Promise<LoadedConfig> {
    for (const filePath of candidates) {
      if (!fs.existsSync(filePath)) continue;
      const raw = await this.parseFile(filePath);
      return { ...this.normalizeConfig(raw, filePath, options), sources: [filePath] };
    }
    return { mounts: [], sources: [] };
  }

  /** Global config first, then project: mounts are concatenated, never deduplicated or reordered. */
  static merge(globalCfg: LoadedConfig, projectCfg: LoadedConfig): LoadedConfig {
    return {
      mounts: [...globalCfg.mounts, ...projectCfg.mounts],
      sources: [...globalCfg.sources, ...projectCfg.sources],
    };
  }

  static async loadMerged(
    projectRoot: string,
    options?: MountCompileOptions & { homeDir?: string }
  ): Promise<LoadedConfig> {
    const home = options?.homeDir ?? os.homedir();
    const globalCfg = await this.loadFirst(globalConfigCandidates(home), options);
    // Running from the home directory would otherwise read the same file twice.
    const projectCandidates = projectConfigCandidates(projectRoot).filter((p) => !globalCfg.sources.includes(p));
    const projectCfg = await this.loadFirst(projectCandidates, options);
    return this.merge(globalCfg, projectCfg);
  }
}

import * as fs from 'fs';
import * as path from 'path';

import { EngineClient } from '../docker/client';
import { AppSettings, LogFn, vibeconLog } from '../settings';
import { DEFAULT_VERSIONS, discoverVersions, makeCompositeTag, VersionSet } from './versions';

export type RebuildResult = {
  built: boolean;
  versionedImage: string;
};

export class ImageBuilder {
  private engine: EngineClient;
  private settings: AppSettings;
  private log: LogFn;
  private discover: () => Promise<VersionSet>;

  constructor(opts: {
    engine: EngineClient;
    settings: AppSettings;
    log?: LogFn;
    discover?: () => Promise<VersionSet>;
  }) {
    this.engine = opts.engine;
    this.settings = opts.settings;
    this.log = opts.log ?? vibeconLog;
    this.discover = opts.discover ?? (() => discoverVersions(undefined, this.log));
  }

  versionedImage(versions: VersionSet): string {
    return `${this.settings.imageRepository}:${makeCompositeTag(versions)}`;
  }

  /** Builds and tags the image; returns the composite tag. Build failures propagate. */
  async build(versions: VersionSet = DEFAULT_VERSIONS): Promise<string> {
    const context = this.settings.buildContextDir;
    if (!fs.existsSync(path.join(context, 'Dockerfile'))) {
      throw new Error(`Could not find Dockerfile in ${context}`);
    }

    const compositeTag = makeCompositeTag(versions);
    const versioned = this.versionedImage(versions);
    this.log('info', `Building image with composite tag: ${compositeTag}`);
    this.log('info', `Tagging as: ${this.settings.imageName} and ${versioned}`);

    await this.engine.buildImage({
      context,
      buildArgs: {
        GEMINI_CLI_VERSION: versions.g,
        OPENAI_CODEX_VERSION: versions.oac,
        GO_VERSION: versions.go,
      },
      tags: [this.settings.imageName, versioned],
    });
    return compositeTag;
  }

  /** Rebuilds only when the image for the current tool versions is missing, or when forced. */
  async rebuildIfStale(opts: { force?: boolean } = {}): Promise<RebuildResult> {
    const versions = await this.discover();
    const versionedImage = this.versionedImage(versions);
    const exists = await this.engine.imageExists(versionedImage);

    if (exists && !opts.force) {
      this.log('info', `\nImage already exists: ${versionedImage}`);
      this.log('info', 'No rebuild needed - all versions are up to date.');
      this.log('info', 'Use -B/--force-build to rebuild anyway.');
      return { built: false, versionedImage };
    }

    this.log('info', exists ? '\nForce rebuild requested...' : '\nNew versions detected, building image...');
    await this.build(versions);
    this.log('info', '\nBuild complete! Image tagged as:');
    this.log('info', `  - ${this.settings.imageName}`);
    this.log('info', `  - ${versionedImage}`);
    return { built: true, versionedImage };
  }
}

import { errorMessage } from '../errors';
import { LogFn, vibeconLog } from '../settings';

/** Versions baked into the image, keyed by the short names used in the composite tag. */
export type VersionSet = {
  g: string;
  oac: string;
  go: string;
};

export type VersionKey = keyof VersionSet;

/** npm dist-tag used when a version could not be determined. */
export const LATEST = 'latest';
export const GO_FALLBACK_VERSION = '1.24.2';

export const DEFAULT_VERSIONS: VersionSet = { g: LATEST, oac: LATEST, go: GO_FALLBACK_VERSION };

export type FetchLike = (url: string) => Promise<{ ok: boolean; status: number; json(): Promise<unknown> }>;

export type VersionSource = {
  key: VersionKey;
  display: string;
  fallback: string;
  /** Label printed next to the fallback value when the lookup fails. */
  fallbackNote: string;
  lookup: () => Promise<string>;
};

async function getJson(fetchFn: FetchLike, url: string): Promise<unknown> {
  const res = await fetchFn(url);
  if (!res.ok) throw new Error(`GET ${url} failed with HTTP ${res.status}`);
  return res.json();
}

export async function npmLatestVersion(packageName: string, fetchFn: FetchLike = fetch): Promise<string> {
  const body = await getJson(fetchFn, `https://registry.npmjs.org/${packageName}/latest`);
  const version = body && typeof body === 'object' && 'version' in body ? body.version : undefined;
  if (typeof version !== 'string' || !version.trim()) {
    throw new Error(`registry response for ${packageName} has no version`);
  }
  return version.trim();
}

/** First release flagged `stable` in the Go download index, without the `go` prefix. */
export async function goLatestStableVersion(fetchFn: FetchLike = fetch): Promise<string> {
  const body = await getJson(fetchFn, 'https://go.dev/dl/?mode=json');
  if (!Array.isArray(body)) throw new Error('unexpected Go release index format');
  const releases: unknown[] = body;
  for (const release of releases) {
    if (!release || typeof release !== 'object') continue;
    if (!('stable' in release) || release.stable !== true) continue;
    const version = 'version' in release ? release.version : undefined;
    if (typeof version === 'string' && version.trim()) return version.trim().replace(/^go/, '');
  }
  throw new Error('no stable Go release found');
}

export function defaultVersionSources(fetchFn: FetchLike = fetch): VersionSource[] {
  return [
    {
      key: 'g',
      display: 'Gemini CLI',
      fallback: LATEST,
      fallbackNote: 'failed to fetch',
      lookup: () => npmLatestVersion('@google/gemini-cli', fetchFn),
    },
    {
      key: 'oac',
      display: 'OpenAI Codex',
      fallback: LATEST,
      fallbackNote: 'failed to fetch',
      lookup: () => npmLatestVersion('@openai/codex', fetchFn),
    },
    {
      key: 'go',
      display: 'Go',
      fallback: GO_FALLBACK_VERSION,
      fallbackNote: 'failed to fetch, using fallback',
      lookup: () => goLatestStableVersion(fetchFn),
    },
  ];
}

type VersionOutcome = { source: VersionSource; version: string } | { source: VersionSource; error: unknown };

/**
 * Queries every source at once and waits for all of them. A failing source
 * only costs its own slot, which falls back to `source.fallback`.
 */
export async function discoverVersions(
  sources: readonly VersionSource[] = defaultVersionSources(),
  log: LogFn = vibeconLog
): Promise<VersionSet> {
  log('info', 'Checking latest versions...');

  const outcomes = await Promise.all(
    sources.map(async (source): Promise<VersionOutcome> => {
      try {
        return { source, version: await source.lookup() };
      } catch (error) {
        return { source, error };
      }
    })
  );

  const versions: VersionSet = { ...DEFAULT_VERSIONS };
  for (const outcome of outcomes) {
    const { source } = outcome;
    if ('version' in outcome) {
      versions[source.key] = outcome.version;
      log('info', `  ${source.display}: ${outcome.version}`);
    } else {
      versions[source.key] = source.fallback;
      log('info', `  ${source.display}: ${source.fallback} (${source.fallbackNote})`);
      log('warn', `Failed to get ${source.display} version: ${errorMessage(outcome.error)}`);
    }
  }
  return versions;
}

export function makeCompositeTag(versions: VersionSet): string {
  return `g${versions.g}_oac${versions.oac}_go${versions.go}`;
}

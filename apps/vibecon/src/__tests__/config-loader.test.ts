import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { ConfigLoader } from '../config/loader';
import { ConfigError } from '../errors';

describe('ConfigLoader', () => {
  let tempRoot = '';
  let home = '';
  let project = '';

  beforeEach(() => {
    tempRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'vibecon-config-'));
    home = path.join(tempRoot, 'home');
    project = path.join(tempRoot, 'project');
    fs.mkdirSync(home);
    fs.mkdirSync(project);
  });

  afterEach(() => {
    if (tempRoot) fs.rmSync(tempRoot, { recursive: true, force: true });
  });

  test('no config files means no mounts', async () => {
    await expect(ConfigLoader.loadMerged(project, { homeDir: home })).resolves.toEqual({ mounts: [], sources: [] });
  });

  test('merges global JSON before project YAML', async () => {
    const globalFile = path.join(home, '.vibecon.json');
    const projectFile = path.join(project, '.vibecon.yaml');
    fs.writeFileSync(
      globalFile,
      JSON.stringify({ mounts: [{ type: 'volume', source: 'gocache', target: '/home/node/go', global: true }] })
    );
    fs.writeFileSync(
      projectFile,
      ['mounts:', '  - type: anonymous', '    target: /workspace/node_modules', '    uid: 1000', ''].join('\n')
    );

    const cfg = await ConfigLoader.loadMerged(project, { homeDir: home });

    expect(cfg.sources).toEqual([globalFile, projectFile]);
    expect(cfg.mounts).toEqual([
      { type: 'volume', source: 'gocache', target: '/home/node/go', global: true, readOnly: false },
      { type: 'anonymous', target: '/workspace/node_modules', readOnly: false, uid: 1000 },
    ]);
  });

  test('JSON wins over YAML in the same directory', async () => {
    fs.writeFileSync(path.join(project, '.vibecon.json'), JSON.stringify({ mounts: [] }));
    fs.writeFileSync(path.join(project, '.vibecon.yml'), 'mounts: [oops');

    const cfg = await ConfigLoader.loadMerged(project, { homeDir: home });

    expect(cfg.sources).toEqual([path.join(project, '.vibecon.json')]);
  });

  test('does not load the same file twice when run from the home directory', async () => {
    const file = path.join(home, '.vibecon.json');
    fs.writeFileSync(file, JSON.stringify({ mounts: [{ type: 'anonymous', target: '/x' }] }));

    const cfg = await ConfigLoader.loadMerged(home, { homeDir: home });

    expect(cfg.sources).toEqual([file]);
    expect(cfg.mounts).toHaveLength(1);
  });

  test('an empty YAML file is an empty config', async () => {
    fs.writeFileSync(path.join(project, '.vibecon.yaml'), '');
    await expect(ConfigLoader.loadMerged(project, { homeDir: home })).resolves.toEqual({
      mounts: [],
      sources: [path.join(project, '.vibecon.yaml')],
    });
  });

  test('malformed JSON is a ConfigError', async () => {
    const file = path.join(project, '.vibecon.json');
    fs.writeFileSync(file, '{ "mounts": [');

    const load = ConfigLoader.loadMerged(project, { homeDir: home });
    await expect(load).rejects.toThrow(ConfigError);
    await expect(ConfigLoader.loadMerged(project, { homeDir: home })).rejects.toThrow(`Invalid JSON in ${file}: `);
  });

  test('mounts must be an array', async () => {
    const file = path.join(project, '.vibecon.json');
    fs.writeFileSync(file, JSON.stringify({ mounts: { type: 'anonymous' } }));

    await expect(ConfigLoader.loadMerged(project, { homeDir: home })).rejects.toThrow(
      `Invalid mounts in ${file}: expected an array`
    );
  });

  test('a top-level array is rejected', async () => {
    const file = path.join(project, '.vibecon.json');
    fs.writeFileSync(file, '[]');

    await expect(ConfigLoader.loadMerged(project, { homeDir: home })).rejects.toThrow(
      `Invalid config in ${file}: expected an object`
    );
  });

  test('mount errors name the file and the entry', async () => {
    const file = path.join(project, '.vibecon.json');
    fs.writeFileSync(file, JSON.stringify({ mounts: [{ type: 'anonymous', target: '/ok' }, '/a:/b'] }));

    await expect(ConfigLoader.loadMerged(project, { homeDir: home })).rejects.toThrow(
      `${file}: Invalid mounts[1]: mount must be an object with an explicit 'type' field, got a string: "/a:/b"`
    );
  });

  test('merge concatenates without deduplicating', () => {
    const a = { mounts: [{ type: 'anonymous' as const, target: '/x', readOnly: false }], sources: ['a'] };
    expect(ConfigLoader.merge(a, a)).toEqual({ mounts: [...a.mounts, ...a.mounts], sources: ['a', 'a'] });
  });
});

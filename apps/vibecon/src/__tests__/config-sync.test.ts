import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { loadSettings } from '../settings';
import { ConfigSync, resolveDirectory, statusLineScript } from '../sync/configSync';
import { FakeEngine } from './helpers/fakeEngine';

const CONTAINER = 'vibecon-home-u-proj-0badc0de';
const CONTAINER_DIR = '/home/node/.claude';

describe('ConfigSync.syncInto', () => {
  let tempRoot = '';
  let home = '';
  let claudeDir = '';
  let containerFs = '';

  beforeEach(() => {
    tempRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'vibecon-sync-test-'));
    home = path.join(tempRoot, 'home');
    claudeDir = path.join(home, '.claude');
    containerFs = path.join(tempRoot, 'container');
    fs.mkdirSync(claudeDir, { recursive: true });
    fs.mkdirSync(containerFs);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    if (tempRoot) fs.rmSync(tempRoot, { recursive: true, force: true });
  });

  function setup() {
    const engine = new FakeEngine(containerFs);
    const log = jest.fn();
    const sync = new ConfigSync({ engine, settings: loadSettings({}), homeDir: home, log });
    return { engine, sync, log };
  }

  function inContainer(...parts: string[]): string {
    return path.join(containerFs, CONTAINER_DIR, ...parts);
  }

  test('uploads status line, CLAUDE.md and commands in one archive', async () => {
    fs.writeFileSync(
      path.join(claudeDir, 'settings.json'),
      JSON.stringify({ statusLine: { type: 'command', command: '~/.claude/statusline.sh' }, theme: 'dark' })
    );
    fs.writeFileSync(path.join(claudeDir, 'statusline.sh'), '#!/bin/sh\necho ok\n', { mode: 0o755 });
    fs.writeFileSync(path.join(claudeDir, 'CLAUDE.md'), '# Notes\n');
    fs.mkdirSync(path.join(claudeDir, 'commands', 'sub'), { recursive: true });
    fs.writeFileSync(path.join(claudeDir, 'commands', 'review.md'), 'review');
    fs.writeFileSync(path.join(claudeDir, 'commands', 'sub', 'deep.md'), 'deep');

    const { engine, sync } = setup();
    const report = await sync.syncInto(CONTAINER);

    expect(report).toEqual({ uploaded: ['CLAUDE.md', 'commands', 'settings.json', 'statusline.sh'], warnings: [] });
    expect(engine.callsOf('copyArchiveIn')).toEqual([[CONTAINER, CONTAINER_DIR]]);

    expect(JSON.parse(fs.readFileSync(inContainer('settings.json'), 'utf-8'))).toEqual({
      statusLine: { type: 'command', command: '~/.claude/statusline.sh' },
    });
    expect(fs.readFileSync(inContainer('CLAUDE.md'), 'utf-8')).toBe('# Notes\n');
    expect(fs.readFileSync(inContainer('commands', 'review.md'), 'utf-8')).toBe('review');
    expect(fs.readFileSync(inContainer('commands', 'sub', 'deep.md'), 'utf-8')).toBe('deep');
    expect(fs.statSync(inContainer('statusline.sh')).mode & 0o111).not.toBe(0);

    expect(engine.callsOf('execAs')).toEqual([
      [CONTAINER, 'node', ['mkdir', '-p', CONTAINER_DIR]],
      [CONTAINER, 'node', ['rm', '-rf', `${CONTAINER_DIR}/commands`]],
      [CONTAINER, 'root', ['chown', '-R', 'node:node', CONTAINER_DIR]],
    ]);
  });

  test('removes stale container copies when the host has none', async () => {
    const { engine, sync } = setup();
    const report = await sync.syncInto(CONTAINER);

    expect(report).toEqual({ uploaded: [], warnings: [] });
    expect(engine.callsOf('copyArchiveIn')).toHaveLength(0);
    expect(engine.callsOf('execAs')).toEqual([
      [CONTAINER, 'node', ['mkdir', '-p', CONTAINER_DIR]],
      [CONTAINER, 'node', ['rm', '-f', `${CONTAINER_DIR}/CLAUDE.md`]],
      [CONTAINER, 'node', ['rm', '-rf', `${CONTAINER_DIR}/commands`]],
      [CONTAINER, 'root', ['chown', '-R', 'node:node', CONTAINER_DIR]],
    ]);
  });

  test('follows a symlinked commands directory', async () => {
    const shared = path.join(tempRoot, 'shared-commands');
    fs.mkdirSync(shared);
    fs.writeFileSync(path.join(shared, 'ship.md'), 'ship');
    fs.symlinkSync(shared, path.join(claudeDir, 'commands'));

    const { sync } = setup();
    const report = await sync.syncInto(CONTAINER);

    expect(report.uploaded).toEqual(['commands']);
    expect(fs.readFileSync(inContainer('commands', 'ship.md'), 'utf-8')).toBe('ship');
  });

  test('settings without statusLine are not projected', async () => {
    fs.writeFileSync(path.join(claudeDir, 'settings.json'), JSON.stringify({ theme: 'dark' }));

    const { sync } = setup();
    const report = await sync.syncInto(CONTAINER);

    expect(report.uploaded).toEqual([]);
    expect(fs.existsSync(inContainer('settings.json'))).toBe(false);
  });

  test('invalid settings.json and failing steps are warnings', async () => {
    fs.writeFileSync(path.join(claudeDir, 'settings.json'), '{ nope');
    fs.writeFileSync(path.join(claudeDir, 'CLAUDE.md'), 'memo');

    const { engine, sync, log } = setup();
    engine.execError = (_user, command) => (command[0] === 'mkdir' ? new Error('boom') : null);
    const report = await sync.syncInto(CONTAINER);

    expect(report.uploaded).toEqual(['CLAUDE.md']);
    expect(report.warnings).toHaveLength(2);
    expect(report.warnings[0]).toMatch(/^Failed to parse settings\.json: /);
    expect(report.warnings[1]).toBe('Failed to create config directory in container: boom');
    expect(log).toHaveBeenCalledWith('warn', 'Failed to create config directory in container: boom');
    expect(engine.callsOf('execAs').at(-1)).toEqual([CONTAINER, 'root', ['chown', '-R', 'node:node', CONTAINER_DIR]]);
  });

  test('a host without room for the staging directory still resolves', async () => {
    fs.writeFileSync(path.join(claudeDir, 'CLAUDE.md'), 'memo');
    jest
      .spyOn(fs.promises, 'mkdtemp')
      .mockRejectedValueOnce(Object.assign(new Error('ENOSPC: no space left on device'), { code: 'ENOSPC' }));

    const { engine, sync, log } = setup();
    const report = await sync.syncInto(CONTAINER);

    expect(report).toEqual({
      uploaded: [],
      warnings: ['Failed to create staging directory: ENOSPC: no space left on device'],
    });
    expect(log).toHaveBeenCalledWith('warn', 'Failed to create staging directory: ENOSPC: no space left on device');
    expect(engine.ops()).toEqual([]);
  });

  test('a settings.json that cannot be staged is skipped', async () => {
    fs.writeFileSync(path.join(claudeDir, 'settings.json'), JSON.stringify({ statusLine: { type: 'static' } }));
    jest.spyOn(fs.promises, 'writeFile').mockRejectedValueOnce(new Error('EACCES: permission denied'));

    const { engine, sync } = setup();
    const report = await sync.syncInto(CONTAINER);

    expect(report).toEqual({ uploaded: [], warnings: ['Failed to stage settings.json: EACCES: permission denied'] });
    expect(engine.callsOf('copyArchiveIn')).toEqual([]);
    expect(engine.callsOf('execAs').at(-1)).toEqual([CONTAINER, 'root', ['chown', '-R', 'node:node', CONTAINER_DIR]]);
  });
});

describe('sync helpers', () => {
  test('statusLineScript expands ~ and ignores non-string commands', () => {
    expect(statusLineScript({ command: '~/.claude/line.sh' }, '/home/u')).toBe('/home/u/.claude/line.sh');
    expect(statusLineScript({ command: '/opt/line.sh' }, '/home/u')).toBe('/opt/line.sh');
    expect(statusLineScript({ command: 42 }, '/home/u')).toBeNull();
    expect(statusLineScript({}, '/home/u')).toBeNull();
  });

  test('resolveDirectory rejects files and missing paths', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'vibecon-resolve-'));
    try {
      const file = path.join(dir, 'f');
      fs.writeFileSync(file, '');
      expect(resolveDirectory(dir)).toBe(fs.realpathSync(dir));
      expect(resolveDirectory(file)).toBeNull();
      expect(resolveDirectory(path.join(dir, 'missing'))).toBeNull();
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

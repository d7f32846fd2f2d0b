import { ConfigError, describeFragment, EngineCommandError, isNotFoundError } from '../errors';
import { expandHome } from '../hostPaths';
import { DEFAULT_COMMAND, loadSettings } from '../settings';

describe('loadSettings', () => {
  test('defaults', () => {
    const settings = loadSettings({});
    expect(settings.imageName).toBe('vibecon:latest');
    expect(settings.imageRepository).toBe('vibecon');
    expect(settings.defaultCommand).toEqual(DEFAULT_COMMAND);
    expect(settings.containerWorkspacePath).toBe('/workspace');
    expect(settings.containerConfigDir).toBe('/home/node/.claude');
  });

  test('environment overrides', () => {
    const settings = loadSettings({
      VIBECON_IMAGE: 'vibecon:dev',
      VIBECON_DEFAULT_COMMAND: '  zsh   -l ',
      VIBECON_BUILD_CONTEXT: '/srv/vibecon',
    });
    expect(settings.imageName).toBe('vibecon:dev');
    expect(settings.defaultCommand).toEqual(['zsh', '-l']);
    expect(settings.buildContextDir).toBe('/srv/vibecon');
  });
});

describe('errors', () => {
  test('EngineCommandError renders the docker command and stderr', () => {
    const err = new EngineCommandError({ args: ['run', '-d', '--name', 'x'], exitCode: 125, stderr: 'Conflict\n' });
    expect(err.message).toBe('docker run -d --name x failed (exit 125): Conflict');
    expect(err.stderr).toBe('Conflict');
    expect(new EngineCommandError({ args: ['exec', 'x', 'sh', '-c', 'a b'], exitCode: null }).message).toBe(
      'docker exec x sh -c "a b" failed (exit unknown)'
    );
  });

  test('isNotFoundError', () => {
    expect(isNotFoundError({ statusCode: 404 })).toBe(true);
    expect(isNotFoundError(new Error('No such container: x'))).toBe(true);
    expect(isNotFoundError(new Error('connect ENOENT /var/run/docker.sock'))).toBe(false);
    expect(isNotFoundError(null)).toBe(false);
  });

  test('ConfigError keeps the file path', () => {
    const err = new ConfigError('bad', '/p/.vibecon.json');
    expect(err.name).toBe('ConfigError');
    expect(err.filePath).toBe('/p/.vibecon.json');
  });

  test('describeFragment', () => {
    expect(describeFragment('a:b')).toBe('"a:b"');
    expect(describeFragment({ type: 'bind' })).toBe('{"type":"bind"}');
    expect(describeFragment(undefined)).toBe('undefined');
  });
});

describe('expandHome', () => {
  test('expands only a leading ~', () => {
    expect(expandHome('~', '/home/u')).toBe('/home/u');
    expect(expandHome('~/x', '/home/u')).toBe('/home/u/x');
    expect(expandHome('~other/x', '/home/u')).toBe('~other/x');
    expect(expandHome('/a/~/b', '/home/u')).toBe('/a/~/b');
  });
});

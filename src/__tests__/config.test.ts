import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { defaultConfigPath, loadConfig, parseLogLevel } from '../core/config';
import { ConfigError, UsageError } from '../core/errors';

describe('loadConfig', () => {
  let xdgHome: string;

  function writeConfig(content: string): string {
    const dir = path.join(xdgHome, 'beamer');
    fs.mkdirSync(dir, { recursive: true });
    const file = path.join(dir, 'config.json');
    fs.writeFileSync(file, content);
    return file;
  }

  beforeEach(() => {
    xdgHome = fs.mkdtempSync(path.join(os.tmpdir(), 'beamer-config-'));
  });

  afterEach(() => {
    fs.rmSync(xdgHome, { recursive: true, force: true });
  });

  it('should use defaults when nothing is configured', () => {
    expect(loadConfig({}, { XDG_CONFIG_HOME: xdgHome }, false)).toEqual({
      binary: 'xrandr',
      logLevel: 'warn',
      color: false,
      dryRun: false
    });
  });

  it('should default color to whether stdout is a terminal', () => {
    expect(loadConfig({}, { XDG_CONFIG_HOME: xdgHome }, true).color).toBe(true);
  });

  it('should read the config file under XDG_CONFIG_HOME', () => {
    writeConfig(JSON.stringify({ binary: '/usr/local/bin/xrandr', dryRun: true, logLevel: 'debug' }));

    expect(loadConfig({}, { XDG_CONFIG_HOME: xdgHome }, false)).toEqual({
      binary: '/usr/local/bin/xrandr',
      logLevel: 'debug',
      color: false,
      dryRun: true
    });
  });

  it('should let the environment override the file and the command line override both', () => {
    writeConfig(JSON.stringify({ binary: '/from/file', logLevel: 'debug', color: true }));
    const env = { XDG_CONFIG_HOME: xdgHome, BEAMER_XRANDR: '/from/env', BEAMER_LOG_LEVEL: 'error', NO_COLOR: '1' };

    expect(loadConfig({}, env, true)).toEqual({
      binary: '/from/env',
      logLevel: 'error',
      color: false,
      dryRun: false
    });
    expect(loadConfig({ xrandr: '/from/cli', logLevel: 'info', color: true, dryRun: true }, env, true)).toEqual({
      binary: '/from/cli',
      logLevel: 'info',
      color: true,
      dryRun: true
    });
  });

  it('should read an explicit --config path', () => {
    const file = path.join(xdgHome, 'custom.json');
    fs.writeFileSync(file, '{"binary": "xrandr-1.5"}');

    expect(loadConfig({ config: file }, {}, false).binary).toBe('xrandr-1.5');
  });

  it('should fail when an explicit --config path does not exist', () => {
    const file = path.join(xdgHome, 'missing.json');
    expect(() => loadConfig({ config: file }, {}, false)).toThrow(`Invalid config file "${file}": file not found`);
  });

  it('should reject malformed JSON', () => {
    writeConfig('{ binary: ');
    expect(() => loadConfig({}, { XDG_CONFIG_HOME: xdgHome }, false)).toThrow(ConfigError);
  });

  it.each([
    ['a wrong type', '{"binary": 3}'],
    ['an unknown key', '{"outputs": ["eDP-1"]}'],
    ['an unknown log level', '{"logLevel": "loud"}']
  ])('should reject a file with %s', (_label, content) => {
    writeConfig(content);

    try {
      loadConfig({}, { XDG_CONFIG_HOME: xdgHome }, false);
      throw new Error('expected loadConfig to throw');
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigError);
      if (e instanceof ConfigError) {
        expect(e.code).toBe('CONFIG_ERROR');
        expect(e.exitCode).toBe(2);
      }
    }
  });

  it('should reject an invalid log level from the command line', () => {
    expect(() => loadConfig({ logLevel: 'loud' }, { XDG_CONFIG_HOME: xdgHome }, false)).toThrow(UsageError);
  });
});

describe('parseLogLevel', () => {
  it('should accept pino levels', () => {
    expect(parseLogLevel('trace', 'test')).toBe('trace');
    expect(parseLogLevel('silent', 'test')).toBe('silent');
  });

  it('should name the source of a bad value', () => {
    expect(() => parseLogLevel('verbose', 'BEAMER_LOG_LEVEL'))
      .toThrow('Invalid log level "verbose" from BEAMER_LOG_LEVEL');
  });
});

describe('defaultConfigPath', () => {
  it('should prefer XDG_CONFIG_HOME', () => {
    expect(defaultConfigPath({ XDG_CONFIG_HOME: '/home/test/.cfg' })).toBe(path.join('/home/test/.cfg', 'beamer', 'config.json'));
  });

  it('should fall back to ~/.config', () => {
    expect(defaultConfigPath({})).toBe(path.join(os.homedir(), '.config', 'beamer', 'config.json'));
  });
});

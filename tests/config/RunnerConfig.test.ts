import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  CONFIG_FILE_NAME,
  DEFAULT_TIMEOUT_MS,
  loadRunnerConfig,
  parseRunnerConfig,
} from '../../src/config/RunnerConfig.js';
import { ConfigurationError } from '../../src/errors/ErrorHandling.js';

describe('RunnerConfig', () => {
  let cwd: string;

  beforeEach(() => {
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'config-test-'));
  });

  afterEach(() => {
    fs.rmSync(cwd, { recursive: true, force: true });
    jest.restoreAllMocks();
  });

  it('uses defaults without a config file or env', () => {
    expect(loadRunnerConfig({}, cwd)).toEqual({
      compiler: './p4c-of',
      timeoutMs: DEFAULT_TIMEOUT_MS,
      scratch: false,
      scratchParent: os.tmpdir(),
      fileExtension: '.p4',
    });
    expect(DEFAULT_TIMEOUT_MS).toBe(600000);
  });

  it('reads the config file', () => {
    fs.writeFileSync(
      path.join(cwd, CONFIG_FILE_NAME),
      JSON.stringify({ compiler: '/opt/p4c/p4c-of', timeoutMs: 1000, scratch: true }),
    );

    const config = loadRunnerConfig({}, cwd);

    expect(config.compiler).toBe('/opt/p4c/p4c-of');
    expect(config.timeoutMs).toBe(1000);
    expect(config.scratch).toBe(true);
  });

  it('lets env override the config file', () => {
    fs.writeFileSync(
      path.join(cwd, CONFIG_FILE_NAME),
      JSON.stringify({ compiler: '/opt/p4c/p4c-of', timeoutMs: 1000 }),
    );

    const config = loadRunnerConfig(
      {
        P4TEST_COMPILER: './build/p4c-of',
        P4TEST_TIMEOUT_MS: '2500',
        P4TEST_SCRATCH: 'true',
        P4TEST_SCRATCH_DIR: '/var/tmp/p4',
      },
      cwd,
    );

    expect(config).toEqual({
      compiler: './build/p4c-of',
      timeoutMs: 2500,
      scratch: true,
      scratchParent: '/var/tmp/p4',
      fileExtension: '.p4',
    });
  });

  it.each([
    ['1', true],
    ['TRUE', true],
    ['0', false],
    ['false', false],
  ])('parses P4TEST_SCRATCH=%s', (value, expected) => {
    expect(loadRunnerConfig({ P4TEST_SCRATCH: value }, cwd).scratch).toBe(expected);
  });

  it('rejects an unrecognized boolean', () => {
    expect(() => loadRunnerConfig({ P4TEST_SCRATCH: 'yes' }, cwd)).toThrow(ConfigurationError);
  });

  it('rejects a non-numeric timeout', () => {
    expect(() => loadRunnerConfig({ P4TEST_TIMEOUT_MS: 'soon' }, cwd)).toThrow(
      'P4TEST_TIMEOUT_MS must be an integer (got "soon")',
    );
  });

  it.each(['0', '-5'])('rejects a non-positive timeout %s', (value) => {
    expect(() => loadRunnerConfig({ P4TEST_TIMEOUT_MS: value }, cwd)).toThrow(
      /^Invalid runner configuration: timeoutMs: /,
    );
  });

  it('ignores a malformed config file with a warning', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    fs.writeFileSync(path.join(cwd, CONFIG_FILE_NAME), '{ not json');

    expect(loadRunnerConfig({}, cwd).compiler).toBe('./p4c-of');
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('ignores a config file that is not an object', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    fs.writeFileSync(path.join(cwd, CONFIG_FILE_NAME), '[1, 2]');

    expect(loadRunnerConfig({}, cwd).timeoutMs).toBe(DEFAULT_TIMEOUT_MS);
    expect(warn).toHaveBeenCalledWith(`Ignoring ${CONFIG_FILE_NAME}: expected a JSON object`);
  });

  it('reports every schema problem', () => {
    try {
      parseRunnerConfig({ compiler: '', timeoutMs: 1.5 });
      throw new Error('expected parseRunnerConfig to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      const message = (error as ConfigurationError).message;
      expect(message).toMatch(/compiler: /);
      expect(message).toMatch(/timeoutMs: /);
    }
  });
});

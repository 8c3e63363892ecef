import { describe, expect, it, vi, afterEach, beforeEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createDefaultConfig } from '@strata/config/testing/defaultConfig';
import type { ConfigObject } from '@strata/config';
import { buildProgram, toCliArgs } from './cli';

const originalEnv = { ...process.env };

const resetEnv = () => {
  for (const key of Object.keys(process.env)) {
    if (!(key in originalEnv)) {
      delete process.env[key];
    }
  }
  Object.assign(process.env, originalEnv);
};

describe('CLI', () => {
  let dir: string;
  let userdir: string;

  const writeConfig = (changes: ConfigObject = {}) => {
    const file = join(dir, 'config.json');
    writeFileSync(file, JSON.stringify({ ...createDefaultConfig(), ...changes }));
    return file;
  };

  beforeEach(() => {
    process.env.LOG_LEVEL = 'silent';
    dir = mkdtempSync(join(tmpdir(), 'strata-cli-'));
    userdir = join(dir, 'user_data');
    mkdirSync(userdir);
  });

  afterEach(() => {
    resetEnv();
    vi.restoreAllMocks();
    process.exitCode = undefined;
    rmSync(dir, { recursive: true, force: true });
  });

  it('validates a config file', async () => {
    const file = writeConfig();
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await buildProgram().parseAsync(['node', 'cli', 'config', 'validate', '-c', file, '--userdir', userdir]);

    expect(logSpy).toHaveBeenCalledWith(`Configuration OK (${file})`);
    expect(process.exitCode).toBeUndefined();
  });

  it('takes the config path from the environment', async () => {
    process.env.STRATA_CONFIG_PATH = writeConfig();
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await buildProgram().parseAsync(['node', 'cli', 'config', 'validate', '--userdir', userdir]);

    expect(logSpy).toHaveBeenCalledWith(`Configuration OK (${join(dir, 'config.json')})`);
  });

  it('reports an invalid config without crashing', async () => {
    const file = writeConfig({ stoploss: 0 });
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    await buildProgram().parseAsync(['node', 'cli', 'config', 'validate', '-c', file, '--userdir', userdir]);

    expect(errorSpy).toHaveBeenCalledWith(
      'Configuration invalid:',
      'The config stoploss needs to be different from 0 to avoid problems with sell orders.'
    );
    expect(process.exitCode).toBe(1);
  });

  it('prints the resolved config as JSON', async () => {
    const file = writeConfig();
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await buildProgram().parseAsync([
      'node',
      'cli',
      'config',
      'print',
      '--json',
      '-c',
      file,
      '--userdir',
      userdir,
      '--max-open-trades=-1',
      '--strategy',
      'MyStrategy'
    ]);

    expect(logSpy).toHaveBeenCalledTimes(1);
    const printed = JSON.parse(String(logSpy.mock.calls[0][0]));
    expect(printed.max_open_trades).toBe(-1);
    expect(printed.strategy).toBe('MyStrategy');
    expect(printed.runmode).toBe('dry_run');
    expect(printed.datadir).toBe(join(userdir, 'data', 'bittrex'));
    expect(printed.original_config.max_open_trades).toBe(1);
  });

  it('applies the run mode option', async () => {
    const file = writeConfig();
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await buildProgram().parseAsync([
      'node',
      'cli',
      'config',
      'print',
      '--json',
      '--mode',
      'backtest',
      '-c',
      file,
      '--userdir',
      userdir
    ]);

    const printed = JSON.parse(String(logSpy.mock.calls[0][0]));
    expect(printed.runmode).toBe('backtest');
    expect(printed.exchange.key).toBe('');
  });

  it('creates a user data directory', async () => {
    const target = join(dir, 'fresh');
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await buildProgram().parseAsync(['node', 'cli', 'create-userdir', '--userdir', target]);

    expect(existsSync(join(target, 'strategies'))).toBe(true);
    expect(logSpy).toHaveBeenCalledWith(`User data directory ready at ${target}`);
  });
});

describe('toCliArgs', () => {
  it('maps commander keys to flag names and drops resolver options', () => {
    expect(
      toCliArgs({
        config: ['config.json'],
        mode: 'live',
        maxOpenTrades: 3,
        dryRun: false,
        pairs: ['ETH/BTC'],
        disableMaxMarketPositions: true,
        strategy: undefined
      })
    ).toEqual({
      'max-open-trades': 3,
      'dry-run': false,
      pairs: ['ETH/BTC'],
      'disable-max-market-positions': true
    });
  });
});

#!/usr/bin/env tsx
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { Command, InvalidArgumentError } from 'commander';
import { config as loadEnv } from 'dotenv';
import { DEFAULT_CONFIG_FILENAME, RunMode, parseRunMode } from '@strata/core/constants';
import { isOperationalError } from '@strata/core/errors';
import { createLogger, createPinoSink } from '@strata/observability';
import {
  createFsDirectoryService,
  formatConfig,
  resolveConfiguration,
  toConfigValue,
  type CliArgs,
  type ConfigValue
} from '@strata/config';

loadEnv();

// commander keys that select what to resolve rather than override a setting
const RESOLVER_KEYS = new Set(['config', 'mode', 'json']);

const parseMode = (value: string): RunMode => {
  try {
    return parseRunMode(value);
  } catch (error) {
    throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
  }
};

const parseInteger = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Not an integer: ${value}`);
  }
  return parsed;
};

const parseNumber = (value: string): number => {
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError(`Not a number: ${value}`);
  }
  return parsed;
};

const parseStakeAmount = (value: string): number | string =>
  value === 'unlimited' ? value : parseNumber(value);

const increaseVerbosity = (_value: string, previous: number | undefined) => (previous ?? 0) + 1;

const toFlagName = (key: string) => key.replace(/[A-Z]/g, (char) => `-${char.toLowerCase()}`);

/** Turns commander option values into the flag-keyed mapping the resolver takes. */
export const toCliArgs = (opts: Record<string, unknown>): CliArgs => {
  const args: Record<string, ConfigValue> = {};
  for (const [key, value] of Object.entries(opts)) {
    if (value === undefined || RESOLVER_KEYS.has(key)) continue;
    args[toFlagName(key)] = toConfigValue(value, key);
  }
  return args;
};

const configFiles = (opts: Record<string, unknown>): string[] => {
  const given = opts.config;
  if (Array.isArray(given)) {
    return given.filter((file): file is string => typeof file === 'string');
  }
  const fromEnv = process.env.STRATA_CONFIG_PATH;
  if (fromEnv) return [fromEnv];
  const fallback = resolve(DEFAULT_CONFIG_FILENAME);
  return existsSync(fallback) ? [fallback] : [];
};

const withResolverOptions = (command: Command): Command =>
  command
    .option('-c, --config <path...>', 'Config file(s); later files override earlier ones. Use - for stdin')
    .option('--mode <mode>', `Run mode (${Object.values(RunMode).join('|')})`, parseMode)
    .option('-v, --verbose', 'Increase verbosity (repeatable)', increaseVerbosity)
    .option('--logfile <file>', 'Log to the given file')
    .option('-s, --strategy <name>', 'Strategy class name')
    .option('--strategy-path <path>', 'Additional strategy lookup path')
    .option('--db-url <url>', 'Database URL override')
    .option('--dry-run', 'Force dry run')
    .option('--no-dry-run', 'Force live trading')
    .option('--max-open-trades <n>', 'Maximum open trades (-1 for unlimited)', parseInteger)
    .option('--stake-amount <amount>', 'Stake amount or "unlimited"', parseStakeAmount)
    .option('-i, --ticker-interval <interval>', 'Ticker interval, e.g. 5m')
    .option('-d, --datadir <path>', 'Data directory')
    .option('--userdir <path>', 'User data directory')
    .option('--timerange <range>', 'Time range to use')
    .option('--export <type>', 'Export backtest results')
    .option('--export-filename <file>', 'Backtest export file')
    .option('--strategy-list <names...>', 'Strategies to backtest')
    .option('-e, --epochs <n>', 'Hyperopt epochs', parseInteger)
    .option('--spaces <spaces...>', 'Hyperopt spaces')
    .option('--hyperopt <name>', 'Hyperopt class name')
    .option('--hyperopt-loss <name>', 'Hyperopt loss function')
    .option('--fee <ratio>', 'Fee ratio', parseNumber)
    .option('--exchange <name>', 'Exchange name')
    .option('-p, --pairs <pairs...>', 'Pairs to use')
    .option('--pairs-file <file>', 'JSON file with the pairs to use')
    .option('--disable-max-market-positions', 'Do not cap the number of open trades')
    .option('--enable-position-stacking', 'Allow several trades on the same pair')
    .option('--enable-sandbox', 'Use the exchange sandbox')
    .option('--disable-sell-signal', 'Ignore strategy sell signals')
    .option('--enable-sd-notify', 'Notify systemd')
    .option('-r, --refresh-pairs-cached', 'Refresh cached pair data (deprecated)');

const resolveFromOptions = (opts: Record<string, unknown>) => {
  const sink = createPinoSink(createLogger('config'));
  const files = configFiles(opts);
  const config = resolveConfiguration({
    files,
    args: toCliArgs(opts),
    runmode: Object.values(RunMode).find((mode) => mode === opts.mode),
    sink
  });
  return { config, files };
};

const reportFailure = (error: unknown) => {
  if (!isOperationalError(error)) throw error;
  console.error('Configuration invalid:', error.message);
  process.exitCode = 1;
};

export const buildProgram = () => {
  const program = new Command();
  program.name('strata').description('Resolve and inspect trading bot configuration');

  const configCommand = program.command('config').description('Inspect configuration');

  withResolverOptions(configCommand.command('print'))
    .description('Print the effective configuration')
    .option('--json', 'Output JSON only')
    .action((opts: Record<string, unknown>) => {
      try {
        const { config, files } = resolveFromOptions(opts);
        if (opts.json) {
          console.log(formatConfig(config));
          return;
        }
        console.log(`Configuration files: ${files.length ? files.join(', ') : '(none, minimal config)'}`);
        console.log(`Run mode: ${config.runmode}`);
        console.log('Effective config:');
        console.dir(config, { depth: null, colors: true });
      } catch (error) {
        reportFailure(error);
      }
    });

  withResolverOptions(configCommand.command('validate'))
    .description('Resolve and validate the configuration')
    .action((opts: Record<string, unknown>) => {
      try {
        const { files } = resolveFromOptions(opts);
        const fileLabel = files.length ? ` (${files.join(', ')})` : '';
        console.log(`Configuration OK${fileLabel}`);
      } catch (error) {
        reportFailure(error);
      }
    });

  program
    .command('create-userdir')
    .description('Create the user data directory and its subdirectories')
    .requiredOption('--userdir <path>', 'Directory to create')
    .action((opts: { userdir: string }) => {
      const sink = createPinoSink(createLogger('config'));
      const dir = createFsDirectoryService(sink).ensureUserDataDir(resolve(opts.userdir), true);
      console.log(`User data directory ready at ${dir}`);
    });

  return program;
};

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  buildProgram().parse(process.argv);
}

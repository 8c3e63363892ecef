import { UNLIMITED_OPEN_TRADES } from '@strata/core/constants';
import type { LogSink } from '@strata/observability/logSink';
import { setAtPath, type ConfigObject, type ConfigValue } from './tree';

/** Parsed command line, keyed by long flag name without leading dashes. */
export type CliArgs = Readonly<Record<string, ConfigValue | undefined>>;

type OverrideKind = 'value' | 'switch';

export interface OverrideRule {
  flag: string;
  kind: OverrideKind;
  /** Writes the override into `cfg` and returns the log line describing it. */
  apply: (cfg: ConfigObject, value: ConfigValue) => string;
  deprecation?: string;
}

export const formatArgValue = (value: ConfigValue): string => {
  if (Array.isArray(value)) return value.map(formatArgValue).join(', ');
  if (typeof value === 'string') return value;
  return JSON.stringify(value);
};

const valueFlag = (
  flag: string,
  path: readonly string[],
  message: (value: ConfigValue) => string,
  deprecation?: string
): OverrideRule => ({
  flag,
  kind: 'value',
  apply: (cfg, value) => {
    setAtPath(cfg, path, value);
    return message(value);
  },
  deprecation
});

const switchFlag = (
  flag: string,
  path: readonly string[],
  setTo: boolean,
  message: string,
  deprecation?: string
): OverrideRule => ({
  flag,
  kind: 'switch',
  apply: (cfg) => {
    setAtPath(cfg, path, setTo);
    return message;
  },
  deprecation
});

export const OVERRIDE_RULES: readonly OverrideRule[] = [
  valueFlag('verbose', ['verbosity'], (v) => `Verbosity set to ${formatArgValue(v)}`),
  valueFlag('logfile', ['logfile'], (v) => `Parameter --logfile detected, logging to: ${formatArgValue(v)}`),
  valueFlag('strategy', ['strategy'], (v) => `Using strategy ${formatArgValue(v)}`),
  valueFlag('strategy-path', ['strategy_path'], (v) => `Using additional Strategy lookup path: ${formatArgValue(v)}`),
  valueFlag('db-url', ['db_url'], () => 'Parameter --db-url detected ...'),
  valueFlag(
    'dry-run',
    ['dry_run'],
    (v) => `Parameter --dry-run detected, overriding dry_run to: ${formatArgValue(v)} ...`
  ),
  valueFlag(
    'max-open-trades',
    ['max_open_trades'],
    (v) => `Parameter --max-open-trades detected, overriding max_open_trades to: ${formatArgValue(v)} ...`
  ),
  {
    flag: 'disable-max-market-positions',
    kind: 'switch',
    apply: (cfg) => {
      cfg.use_max_market_positions = false;
      cfg.max_open_trades = UNLIMITED_OPEN_TRADES;
      return 'Parameter --disable-max-market-positions detected, max_open_trades set to unlimited ...';
    }
  },
  valueFlag(
    'stake-amount',
    ['stake_amount'],
    (v) => `Parameter --stake-amount detected, overriding stake_amount to: ${formatArgValue(v)} ...`
  ),
  valueFlag(
    'ticker-interval',
    ['ticker_interval'],
    (v) => `Parameter -i/--ticker-interval detected ... Using ticker_interval: ${formatArgValue(v)} ...`
  ),
  valueFlag('datadir', ['datadir'], (v) => `Parameter --datadir detected: ${formatArgValue(v)} ...`),
  valueFlag('userdir', ['user_data_dir'], (v) => `Parameter --userdir detected: ${formatArgValue(v)} ...`),
  switchFlag(
    'enable-position-stacking',
    ['position_stacking'],
    true,
    'Parameter --enable-position-stacking detected ...'
  ),
  switchFlag('enable-sandbox', ['exchange', 'sandbox'], true, 'Parameter --enable-sandbox detected, using the exchange sandbox ...'),
  switchFlag(
    'disable-sell-signal',
    ['ask_strategy', 'use_sell_signal'],
    false,
    'Parameter --disable-sell-signal detected, sell signals disabled ...'
  ),
  switchFlag('enable-sd-notify', ['internals', 'sd_notify'], true, 'Parameter --enable-sd-notify detected ...'),
  valueFlag('timerange', ['timerange'], (v) => `Parameter --timerange detected: ${formatArgValue(v)} ...`),
  switchFlag(
    'refresh-pairs-cached',
    ['refresh_pairs'],
    true,
    'Parameter -r/--refresh-pairs-cached detected ...',
    'DEPRECATED: The -r/--refresh-pairs-cached parameter is deprecated and will be removed in a future release. Please use the download-data command instead.'
  ),
  valueFlag('export', ['export'], (v) => `Parameter --export detected: ${formatArgValue(v)} ...`),
  valueFlag('export-filename', ['export_filename'], (v) => `Storing backtest results to ${formatArgValue(v)} ...`),
  valueFlag(
    'strategy-list',
    ['strategy_list'],
    (v) => `Using strategy list of ${Array.isArray(v) ? v.length : 1} strategies`
  ),
  valueFlag(
    'epochs',
    ['epochs'],
    (v) => `Parameter --epochs detected ... Will run Hyperopt with for ${formatArgValue(v)} epochs ...`
  ),
  valueFlag('spaces', ['spaces'], (v) => `Parameter -s/--spaces detected: ${formatArgValue(v)}`),
  valueFlag('hyperopt', ['hyperopt'], (v) => `Using Hyperopt class name: ${formatArgValue(v)}`),
  valueFlag('hyperopt-loss', ['hyperopt_loss'], (v) => `Using loss function: ${formatArgValue(v)}`),
  valueFlag('fee', ['fee'], (v) => `Parameter --fee detected, setting fee to: ${formatArgValue(v)} ...`),
  valueFlag('exchange', ['exchange', 'name'], (v) => `Parameter --exchange detected, using exchange: ${formatArgValue(v)}`),
  valueFlag('pairs', ['pairs'], (v) => `Parameter --pairs detected: ${formatArgValue(v)}`)
];

const isApplicable = (rule: OverrideRule, value: ConfigValue | undefined): value is ConfigValue =>
  rule.kind === 'switch' ? value === true : value !== undefined && value !== null;

/**
 * Overlays command line values onto `cfg` in place. Every applied flag emits
 * one info record. Unknown flags are ignored.
 */
export const applyOverrides = (
  cfg: ConfigObject,
  args: CliArgs,
  sink: LogSink,
  rules: readonly OverrideRule[] = OVERRIDE_RULES
): ConfigObject => {
  for (const rule of rules) {
    const value = args[rule.flag];
    if (!isApplicable(rule, value)) continue;
    sink.record('info', rule.apply(cfg, value));
    if (rule.deprecation) {
      sink.record('warn', rule.deprecation);
    }
  }
  return cfg;
};

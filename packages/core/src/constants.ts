const toLookup = <T extends string>(values: readonly T[]) =>
  values.reduce<Record<string, T>>((acc, value) => {
    acc[value.toLowerCase()] = value;
    return acc;
  }, {});

const parseEnumValue = <T extends string>(
  raw: string,
  lookup: Record<string, T>,
  label: string
): T => {
  const normalized = raw.trim().toLowerCase();
  const value = lookup[normalized];
  if (!value) {
    throw new Error(`Unsupported ${label}: "${raw}"`);
  }
  return value;
};

export enum RunMode {
  Live = 'live',
  DryRun = 'dry_run',
  Backtest = 'backtest',
  Edge = 'edge',
  Hyperopt = 'hyperopt',
  UtilExchange = 'util_exchange',
  UtilNoExchange = 'util_no_exchange',
  Plot = 'plot',
  Other = 'other'
}

export enum PairlistMethod {
  Static = 'StaticPairList',
  Volume = 'VolumePairList'
}

export const UTILITY_MODES: readonly RunMode[] = [
  RunMode.Other,
  RunMode.Plot,
  RunMode.UtilExchange,
  RunMode.UtilNoExchange
];
// modes that may run without any exchange configured
export const NO_EXCHANGE_MODES: readonly RunMode[] = [RunMode.Plot, RunMode.UtilNoExchange, RunMode.Other];

export const isUtilityMode = (mode: RunMode) => UTILITY_MODES.includes(mode);

export const DEFAULT_CONFIG_FILENAME = 'config.json';
export const DEFAULT_STRATEGY = 'DefaultStrategy';
export const DEFAULT_DB_PROD_URL = 'sqlite:///tradesv3.sqlite';
export const DEFAULT_DB_DRYRUN_URL = 'sqlite://';
export const DEFAULT_USER_DATA_DIRNAME = 'user_data';
export const PROCESS_THROTTLE_SECS = 5;
export const DRY_RUN_WALLET = 999.9;
export const DEFAULT_AMOUNT_RESERVE_PERCENT = 0.05;
export const DEFAULT_TRADABLE_BALANCE_RATIO = 0.99;
export const MIN_STAKE_AMOUNT = 0.0005;

export const UNLIMITED_STAKE_AMOUNT = 'unlimited';
// document value for "no cap" on open trades; resolved to UNLIMITED_OPEN_TRADES
export const UNLIMITED_OPEN_TRADES_INPUT = -1;
export const UNLIMITED_OPEN_TRADES = Number.POSITIVE_INFINITY;

export const PAIR_PATTERN = /^[0-9A-Z]+\/[0-9A-Z]+$/;

export const TICKER_INTERVALS = [
  '1m', '3m', '5m', '15m', '30m',
  '1h', '2h', '4h', '6h', '8h', '12h',
  '1d', '3d', '1w'
] as const;

export const STAKE_CURRENCIES = ['BTC', 'XBT', 'ETH', 'USDT', 'EUR', 'USD'] as const;

export const SUPPORTED_FIAT = [
  'AUD', 'BRL', 'CAD', 'CHF', 'CLP', 'CNY', 'CZK', 'DKK',
  'EUR', 'GBP', 'HKD', 'HUF', 'IDR', 'ILS', 'INR', 'JPY',
  'KRW', 'MXN', 'MYR', 'NOK', 'NZD', 'PHP', 'PKR', 'PLN',
  'RUB', 'SEK', 'SGD', 'THB', 'TRY', 'TWD', 'ZAR', 'USD',
  'BTC', 'XBT', 'ETH', 'XRP', 'LTC', 'BCH', 'USDT'
] as const;

export const ORDERTYPE_POSSIBILITIES = ['limit', 'market'] as const;
export const ORDERTIF_POSSIBILITIES = ['gtc', 'fok', 'ioc'] as const;
export const HYPEROPT_SPACES = ['all', 'buy', 'sell', 'roi', 'stoploss', 'default'] as const;

const RUN_MODE_LOOKUP = toLookup(Object.values(RunMode));

export const parseRunMode = (value: string): RunMode =>
  parseEnumValue(value, RUN_MODE_LOOKUP, 'run mode');

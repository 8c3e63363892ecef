import { z } from 'zod';
import {
  DEFAULT_AMOUNT_RESERVE_PERCENT,
  DEFAULT_STRATEGY,
  DEFAULT_TRADABLE_BALANCE_RATIO,
  DRY_RUN_WALLET,
  HYPEROPT_SPACES,
  MIN_STAKE_AMOUNT,
  ORDERTIF_POSSIBILITIES,
  ORDERTYPE_POSSIBILITIES,
  PAIR_PATTERN,
  PROCESS_THROTTLE_SECS,
  PairlistMethod,
  RunMode,
  STAKE_CURRENCIES,
  SUPPORTED_FIAT,
  TICKER_INTERVALS,
  UNLIMITED_OPEN_TRADES,
  UNLIMITED_STAKE_AMOUNT,
  isUtilityMode
} from '@strata/core/constants';
import { describeValue } from '@strata/core/validation';

const freeForm = z.record(z.unknown());

const pair = z.string().regex(PAIR_PATTERN, { message: "does not match '^[0-9A-Z]+/[0-9A-Z]+$'" });

const uniquePairs = z
  .array(pair)
  .refine((items) => new Set(items).size === items.length, { message: 'has non-unique elements' });

const ratio = z.number().min(0).max(1);

export const maxOpenTradesSchema = z.union(
  [z.number().int().min(-1), z.literal(UNLIMITED_OPEN_TRADES)],
  { errorMap: (_issue, ctx) => ({ message: `${describeValue(ctx.data)} is not of type 'integer'` }) }
);

export const stakeAmountSchema = z.union(
  [z.number().min(MIN_STAKE_AMOUNT), z.literal(UNLIMITED_STAKE_AMOUNT)],
  { errorMap: (_issue, ctx) => ({ message: `${describeValue(ctx.data)} does not match '${UNLIMITED_STAKE_AMOUNT}'` }) }
);

const minimalRoiSchema = z
  .record(z.string().regex(/^[0-9.]+$/, { message: "does not match '^[0-9.]+$'" }), z.number())
  .refine((roi) => Object.keys(roi).length >= 1, { message: 'does not have enough properties' });

const unfilledTimeoutSchema = z
  .object({
    buy: z.number().min(3).optional(),
    sell: z.number().min(10).optional()
  })
  .strict();

const bidStrategySchema = z
  .object({
    ask_last_balance: ratio,
    use_order_book: z.boolean().optional(),
    order_book_top: z.number().min(1).max(20).optional(),
    check_depth_of_market: z
      .object({
        enabled: z.boolean().optional(),
        bids_to_ask_delta: z.number().min(0).optional()
      })
      .strict()
      .optional()
  })
  .strict();

const askStrategySchema = z
  .object({
    use_order_book: z.boolean().optional(),
    order_book_min: z.number().min(1).optional(),
    order_book_max: z.number().min(1).max(50).optional(),
    use_sell_signal: z.boolean().optional(),
    sell_profit_only: z.boolean().optional(),
    ignore_roi_if_buy_signal: z.boolean().optional()
  })
  .strict();

const orderType = z.enum(ORDERTYPE_POSSIBILITIES);
const orderTimeInForce = z.enum(ORDERTIF_POSSIBILITIES);

const orderTypesSchema = z
  .object({
    buy: orderType,
    sell: orderType,
    emergencysell: orderType.optional(),
    stoploss: orderType,
    stoploss_on_exchange: z.boolean(),
    stoploss_on_exchange_interval: z.number().optional()
  })
  .strict();

const orderTimeInForceSchema = z.object({ buy: orderTimeInForce, sell: orderTimeInForce }).strict();

export const exchangeSchema = z
  .object({
    name: z.string(),
    sandbox: z.boolean().default(false),
    key: z.string().default(''),
    secret: z.string().default(''),
    password: z.string().default(''),
    uid: z.string().optional(),
    pair_whitelist: uniquePairs.optional(),
    pair_blacklist: uniquePairs.optional(),
    outdated_offset: z.number().int().min(1).optional(),
    markets_refresh_interval: z.number().int().optional(),
    ccxt_config: freeForm.optional(),
    ccxt_async_config: freeForm.optional()
  })
  .strict();

const edgeSchema = z
  .object({
    enabled: z.boolean().optional(),
    process_throttle_secs: z.number().int().min(600),
    calculate_since_number_of_days: z.number().int().optional(),
    allowed_risk: z.number(),
    capital_available_percentage: z.number().optional(),
    stoploss_range_min: z.number().optional(),
    stoploss_range_max: z.number().optional(),
    stoploss_range_step: z.number().optional(),
    minimum_winrate: z.number().optional(),
    minimum_expectancy: z.number().optional(),
    min_trade_number: z.number().optional(),
    max_trade_duration_minute: z.number().int().optional(),
    remove_pumps: z.boolean().optional()
  })
  .strict();

const experimentalSchema = z
  .object({
    use_sell_signal: z.boolean().optional(),
    sell_profit_only: z.boolean().optional(),
    ignore_roi_if_buy_signal: z.boolean().optional(),
    block_bad_exchanges: z.boolean().optional()
  })
  .strict();

const pairlistSchema = z
  .object({
    method: z.nativeEnum(PairlistMethod),
    config: freeForm.optional()
  })
  .strict();

const telegramSchema = z
  .object({
    enabled: z.boolean(),
    token: z.string(),
    chat_id: z.string()
  })
  .strict();

const webhookSchema = z
  .object({
    enabled: z.boolean().optional(),
    url: z.string().optional(),
    webhookbuy: freeForm.optional(),
    webhooksell: freeForm.optional(),
    webhookstatus: freeForm.optional()
  })
  .strict();

const apiServerSchema = z
  .object({
    enabled: z.boolean(),
    listen_ip_address: z.string().ip({ version: 'v4', message: "is not a 'ipv4' address" }),
    listen_port: z.number().int().min(1024).max(65535),
    username: z.string(),
    password: z.string()
  })
  .strict();

const internalsSchema = z
  .object({
    process_throttle_secs: z.number().default(PROCESS_THROTTLE_SECS),
    interval: z.number().int().optional(),
    sd_notify: z.boolean().optional()
  })
  .strict()
  .default({});

const requiredIf = <T extends z.ZodTypeAny>(required: boolean, schema: T) =>
  required ? schema : schema.optional();

/**
 * Top level keys are open, nested sections are closed. Trading and optimize
 * modes require the core keys; utility modes do not.
 */
const buildConfigSchema = (tradingMode: boolean) =>
  z
    .object({
      max_open_trades: requiredIf(tradingMode, maxOpenTradesSchema),
      ticker_interval: z.enum(TICKER_INTERVALS).optional(),
      stake_currency: requiredIf(tradingMode, z.enum(STAKE_CURRENCIES)),
      stake_amount: requiredIf(tradingMode, stakeAmountSchema),
      fiat_display_currency: z.enum(SUPPORTED_FIAT).optional(),
      dry_run: requiredIf(tradingMode, z.boolean()),
      dry_run_wallet: z.number().default(DRY_RUN_WALLET),
      process_only_new_candles: z.boolean().optional(),
      minimal_roi: minimalRoiSchema.optional(),
      amount_reserve_percent: z.number().min(0).max(0.5).default(DEFAULT_AMOUNT_RESERVE_PERCENT),
      tradable_balance_ratio: z.number().min(0.1).max(1).default(DEFAULT_TRADABLE_BALANCE_RATIO),
      // 0 is let through here; the consistency rules reject it
      stoploss: z.number().max(0).optional(),
      trailing_stop: z.boolean().optional(),
      trailing_stop_positive: ratio.optional(),
      trailing_stop_positive_offset: ratio.optional(),
      trailing_only_offset_is_reached: z.boolean().optional(),
      unfilledtimeout: requiredIf(tradingMode, unfilledTimeoutSchema),
      bid_strategy: requiredIf(tradingMode, bidStrategySchema),
      ask_strategy: askStrategySchema.optional(),
      order_types: orderTypesSchema.optional(),
      order_time_in_force: orderTimeInForceSchema.optional(),
      exchange: requiredIf(tradingMode, exchangeSchema),
      edge: edgeSchema.optional(),
      experimental: experimentalSchema.optional(),
      pairlist: pairlistSchema.optional(),
      telegram: telegramSchema.optional(),
      webhook: webhookSchema.optional(),
      api_server: apiServerSchema.optional(),
      db_url: z.string().optional(),
      initial_state: z.enum(['running', 'stopped']).optional(),
      forcebuy_enable: z.boolean().optional(),
      internals: internalsSchema,

      // written by command line overrides and by the resolver
      strategy: z.string().default(DEFAULT_STRATEGY),
      strategy_path: z.string().optional(),
      strategy_list: z.array(z.string()).optional(),
      verbosity: z.number().int().min(0).optional(),
      logfile: z.string().optional(),
      datadir: z.string().optional(),
      user_data_dir: z.string().optional(),
      timerange: z.string().optional(),
      export: z.string().optional(),
      export_filename: z.string().optional(),
      position_stacking: z.boolean().optional(),
      use_max_market_positions: z.boolean().optional(),
      epochs: z.number().int().min(1).optional(),
      spaces: z.array(z.enum(HYPEROPT_SPACES)).optional(),
      hyperopt: z.string().optional(),
      hyperopt_loss: z.string().optional(),
      fee: z.number().optional(),
      refresh_pairs: z.boolean().optional(),
      pairs: z.array(pair).optional(),
      runmode: z.nativeEnum(RunMode).optional(),
      original_config: freeForm.optional()
    })
    .passthrough();

export const TRADING_CONFIG_SCHEMA = buildConfigSchema(true);
export const UTILITY_CONFIG_SCHEMA = buildConfigSchema(false);

export const configSchemaFor = (runmode?: RunMode) =>
  runmode !== undefined && isUtilityMode(runmode) ? UTILITY_CONFIG_SCHEMA : TRADING_CONFIG_SCHEMA;

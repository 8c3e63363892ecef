import { describe, expect, it } from 'vitest';
import { RunMode } from '@strata/core/constants';
import { SchemaValidationError } from '@strata/core/errors';
import { createDefaultConfig } from './testing/defaultConfig';
import { validateConfigSchema } from './validator';
import type { ConfigObject } from './tree';

const withChanges = (changes: ConfigObject): ConfigObject => ({ ...createDefaultConfig(), ...changes });

describe('validateConfigSchema', () => {
  it('injects declared defaults into the config', () => {
    const cfg = createDefaultConfig();
    const result = validateConfigSchema(cfg, RunMode.DryRun);

    expect(result).toBe(cfg);
    expect(cfg).toEqual({
      ...createDefaultConfig(),
      dry_run_wallet: 999.9,
      amount_reserve_percent: 0.05,
      tradable_balance_ratio: 0.99,
      internals: { process_throttle_secs: 5 },
      strategy: 'DefaultStrategy',
      exchange: {
        name: 'bittrex',
        sandbox: false,
        key: 'test-key',
        secret: 'test-secret',
        password: '',
        pair_whitelist: ['ETH/BTC', 'LTC/BTC', 'XRP/BTC', 'NEO/BTC']
      }
    });
  });

  it('is idempotent', () => {
    const once = validateConfigSchema(createDefaultConfig(), RunMode.DryRun);
    const serialized = JSON.stringify(once);
    const twice = validateConfigSchema(once, RunMode.DryRun);

    expect(JSON.stringify(twice)).toBe(serialized);
  });

  it('tolerates unknown top level keys', () => {
    const cfg = validateConfigSchema(withChanges({ my_custom_setting: { a: 1 } }), RunMode.DryRun);
    expect(cfg.my_custom_setting).toEqual({ a: 1 });
  });

  it('rejects unknown keys inside nested sections', () => {
    const cfg = createDefaultConfig();
    cfg.exchange = { name: 'bittrex', enabled: true };
    expect(() => validateConfigSchema(cfg, RunMode.DryRun)).toThrow(
      "Invalid configuration at /exchange: Additional properties are not allowed ('enabled' was unexpected)"
    );
  });

  it('reports malformed pairs with their position', () => {
    const cfg = createDefaultConfig();
    cfg.exchange = {
      name: 'bittrex',
      pair_whitelist: ['ETH/BTC', 'LTC/BTC', 'XRP/BTC', 'NEO/BTC', 'ETH-BTC']
    };
    expect(() => validateConfigSchema(cfg, RunMode.DryRun)).toThrow(
      "Invalid configuration at /exchange/pair_whitelist/4: 'ETH-BTC' does not match '^[0-9A-Z]+/[0-9A-Z]+$'"
    );
  });

  it('rejects duplicate pairs', () => {
    const cfg = createDefaultConfig();
    cfg.exchange = { name: 'bittrex', pair_whitelist: ['ETH/BTC', 'ETH/BTC'] };
    expect(() => validateConfigSchema(cfg, RunMode.DryRun)).toThrow(
      'Invalid configuration at /exchange/pair_whitelist: ["ETH/BTC","ETH/BTC"] has non-unique elements'
    );
  });

  it('requires the exchange section in trading modes', () => {
    const cfg = createDefaultConfig();
    delete cfg.exchange;

    let caught: unknown;
    try {
      validateConfigSchema(cfg, RunMode.Live);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(SchemaValidationError);
    expect(caught instanceof SchemaValidationError && caught.message).toBe(
      "Invalid configuration at /: 'exchange' is a required property"
    );
    expect(caught instanceof SchemaValidationError && caught.constraint).toBe('required');
  });

  it('does not require trading keys in utility modes', () => {
    expect(validateConfigSchema({}, RunMode.UtilNoExchange)).toEqual({
      dry_run_wallet: 999.9,
      amount_reserve_percent: 0.05,
      tradable_balance_ratio: 0.99,
      internals: { process_throttle_secs: 5 },
      strategy: 'DefaultStrategy'
    });
  });

  it('accepts the unlimited stake amount and rejects other strings', () => {
    expect(validateConfigSchema(withChanges({ stake_amount: 'unlimited' })).stake_amount).toBe('unlimited');
    expect(() => validateConfigSchema(withChanges({ stake_amount: 'all' }))).toThrow(
      "Invalid configuration at /stake_amount: 'all' does not match 'unlimited'"
    );
    expect(() => validateConfigSchema(withChanges({ stake_amount: 0.0001 }))).toThrow(
      'Invalid configuration at /stake_amount: 0.0001 is less than the minimum of 0.0005'
    );
  });

  it('accepts -1, 0 and the unlimited sentinel for max_open_trades', () => {
    expect(validateConfigSchema(withChanges({ max_open_trades: -1 })).max_open_trades).toBe(-1);
    expect(validateConfigSchema(withChanges({ max_open_trades: 0 })).max_open_trades).toBe(0);
    expect(validateConfigSchema(withChanges({ max_open_trades: Number.POSITIVE_INFINITY })).max_open_trades).toBe(
      Number.POSITIVE_INFINITY
    );
  });

  it('rejects invalid max_open_trades values', () => {
    expect(() => validateConfigSchema(withChanges({ max_open_trades: -2 }))).toThrow(
      'Invalid configuration at /max_open_trades: -2 is less than the minimum of -1'
    );
    expect(() => validateConfigSchema(withChanges({ max_open_trades: 'many' }))).toThrow(
      "Invalid configuration at /max_open_trades: 'many' is not of type 'integer'"
    );
  });

  it('rejects values outside enumerations', () => {
    expect(() => validateConfigSchema(withChanges({ ticker_interval: '2m' }))).toThrow(
      /^Invalid configuration at \/ticker_interval: '2m' is not one of \['1m', '3m', '5m'/
    );
  });

  it('rejects positive stoploss values but lets 0 through', () => {
    expect(() => validateConfigSchema(withChanges({ stoploss: 0.1 }))).toThrow(
      'Invalid configuration at /stoploss: 0.1 is greater than the maximum of 0'
    );
    expect(validateConfigSchema(withChanges({ stoploss: 0 })).stoploss).toBe(0);
  });

  it('validates api server addresses', () => {
    const apiServer = {
      enabled: true,
      listen_ip_address: '127.0.0',
      listen_port: 8080,
      username: 'test-user',
      password: 'test-password'
    };
    expect(() => validateConfigSchema(withChanges({ api_server: apiServer }))).toThrow(
      "Invalid configuration at /api_server/listen_ip_address: '127.0.0' is not a 'ipv4' address"
    );
  });
});

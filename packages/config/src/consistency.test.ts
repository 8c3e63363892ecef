import { describe, expect, it } from 'vitest';
import { ConsistencyError } from '@strata/core/errors';
import { checkConsistency } from './consistency';
import { createDefaultConfig } from './testing/defaultConfig';
import type { ConfigObject } from './tree';

const withChanges = (changes: ConfigObject): ConfigObject => ({ ...createDefaultConfig(), ...changes });

const ruleOf = (cfg: ConfigObject): string | undefined => {
  try {
    checkConsistency(cfg);
  } catch (error) {
    if (error instanceof ConsistencyError) return error.rule;
    throw error;
  }
  return undefined;
};

describe('checkConsistency', () => {
  it('passes a consistent config', () => {
    const cfg = createDefaultConfig();
    expect(checkConsistency(cfg)).toBe(cfg);
  });

  it('rejects a stoploss of exactly 0', () => {
    expect(() => checkConsistency(withChanges({ stoploss: 0 }))).toThrow(
      'The config stoploss needs to be different from 0 to avoid problems with sell orders.'
    );
    expect(ruleOf(withChanges({ stoploss: -0.1 }))).toBeUndefined();
  });

  it('requires a positive offset when trading only past the offset', () => {
    const cfg = withChanges({
      trailing_stop: true,
      trailing_only_offset_is_reached: true,
      trailing_stop_positive_offset: 0
    });
    expect(() => checkConsistency(cfg)).toThrow(
      'The config trailing_only_offset_is_reached needs trailing_stop_positive_offset to be more than 0 in your config.'
    );
  });

  it('requires the offset to exceed trailing_stop_positive', () => {
    const base = { trailing_stop: true, trailing_stop_positive: 0.02 };
    expect(ruleOf(withChanges({ ...base, trailing_stop_positive_offset: 0.015 }))).toBe(
      'trailing-offset-above-positive'
    );
    expect(ruleOf(withChanges({ ...base, trailing_stop_positive_offset: 0.02 }))).toBe(
      'trailing-offset-above-positive'
    );
    expect(ruleOf(withChanges({ ...base, trailing_stop_positive_offset: 0.03 }))).toBeUndefined();
    expect(ruleOf(withChanges({ ...base, trailing_stop_positive_offset: 0 }))).toBeUndefined();
  });

  it('rejects a zero trailing_stop_positive unless only the offset triggers', () => {
    expect(() => checkConsistency(withChanges({ trailing_stop: true, trailing_stop_positive: 0 }))).toThrow(
      'The config trailing_stop_positive needs to be different from 0 to avoid problems with sell orders, unless trailing_only_offset_is_reached is enabled.'
    );
    expect(
      ruleOf(
        withChanges({
          trailing_stop: true,
          trailing_stop_positive: 0,
          trailing_only_offset_is_reached: true,
          trailing_stop_positive_offset: 0.01
        })
      )
    ).toBeUndefined();
  });

  it('ignores trailing settings while the trailing stop is off', () => {
    expect(
      ruleOf(withChanges({ trailing_stop: false, trailing_stop_positive: 0, trailing_only_offset_is_reached: true }))
    ).toBeUndefined();
  });

  it('rejects edge together with the volume pairlist', () => {
    const edge = { enabled: true, process_throttle_secs: 1800, allowed_risk: 0.01 };
    expect(() => checkConsistency(withChanges({ edge, pairlist: { method: 'VolumePairList' } }))).toThrow(
      'Edge and VolumePairList are incompatible, Edge will override whatever pairs VolumePairlist selects.'
    );
    expect(ruleOf(withChanges({ edge, pairlist: { method: 'StaticPairList' } }))).toBeUndefined();
  });

  it('requires a whitelist for the static pairlist', () => {
    const emptyWhitelist = withChanges({ exchange: { name: 'bittrex', pair_whitelist: [] } });
    expect(() => checkConsistency(emptyWhitelist)).toThrow('StaticPairList requires pair_whitelist to be set.');
    expect(ruleOf(withChanges({ exchange: { name: 'bittrex' } }))).toBe('static-pairlist-whitelist');
    expect(
      ruleOf(withChanges({ exchange: { name: 'bittrex' }, pairlist: { method: 'VolumePairList' } }))
    ).toBeUndefined();
  });

  it('skips the whitelist rule in utility modes', () => {
    expect(ruleOf(withChanges({ exchange: { name: 'bittrex' }, runmode: 'util_exchange' }))).toBeUndefined();
  });

  it('stops at the first violated rule', () => {
    const cfg = withChanges({ stoploss: 0, exchange: { name: 'bittrex' } });
    expect(ruleOf(cfg)).toBe('stoploss-nonzero');
  });
});

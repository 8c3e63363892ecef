import { describe, expect, it } from 'vitest';
import { PAIR_PATTERN, RunMode, isUtilityMode, parseRunMode } from './constants';

describe('parseRunMode', () => {
  it('accepts run modes case-insensitively', () => {
    expect(parseRunMode('BACKTEST')).toBe(RunMode.Backtest);
    expect(parseRunMode(' dry_run ')).toBe(RunMode.DryRun);
  });

  it('rejects unknown run modes', () => {
    expect(() => parseRunMode('papertrade')).toThrow('Unsupported run mode: "papertrade"');
  });
});

describe('run mode groups', () => {
  it('treats plotting and utility commands as utility modes', () => {
    expect(isUtilityMode(RunMode.Plot)).toBe(true);
    expect(isUtilityMode(RunMode.UtilExchange)).toBe(true);
    expect(isUtilityMode(RunMode.Live)).toBe(false);
    expect(isUtilityMode(RunMode.Hyperopt)).toBe(false);
  });
});

describe('PAIR_PATTERN', () => {
  it('requires uppercase BASE/QUOTE pairs', () => {
    expect(PAIR_PATTERN.test('ETH/BTC')).toBe(true);
    expect(PAIR_PATTERN.test('1INCH/USDT')).toBe(true);
    expect(PAIR_PATTERN.test('eth/btc')).toBe(false);
    expect(PAIR_PATTERN.test('ETH-BTC')).toBe(false);
  });
});

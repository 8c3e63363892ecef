import { PairlistMethod, RunMode, isUtilityMode } from '@strata/core/constants';
import { ConsistencyError } from '@strata/core/errors';
import { getSection, readBoolean, readNumber, readString, type ConfigObject } from './tree';

export interface ConsistencyRule {
  id: string;
  message: string;
  violated: (cfg: ConfigObject) => boolean;
}

const trailingStopEnabled = (cfg: ConfigObject) => readBoolean(cfg, 'trailing_stop') === true;

const pairlistMethod = (cfg: ConfigObject): string =>
  readString(getSection(cfg, 'pairlist'), 'method') ?? PairlistMethod.Static;

const runmodeOf = (cfg: ConfigObject): RunMode | undefined => {
  const value = readString(cfg, 'runmode');
  return Object.values(RunMode).find((mode) => mode === value);
};

export const CONSISTENCY_RULES: readonly ConsistencyRule[] = [
  {
    id: 'stoploss-nonzero',
    message: 'The config stoploss needs to be different from 0 to avoid problems with sell orders.',
    violated: (cfg) => readNumber(cfg, 'stoploss') === 0
  },
  {
    id: 'trailing-offset-required',
    message:
      'The config trailing_only_offset_is_reached needs trailing_stop_positive_offset to be more than 0 in your config.',
    violated: (cfg) =>
      trailingStopEnabled(cfg) &&
      readBoolean(cfg, 'trailing_only_offset_is_reached') === true &&
      (readNumber(cfg, 'trailing_stop_positive_offset') ?? 0) <= 0
  },
  {
    id: 'trailing-offset-above-positive',
    message:
      'The config trailing_stop_positive_offset needs to be greater than trailing_stop_positive in your config.',
    violated: (cfg) => {
      if (!trailingStopEnabled(cfg)) return false;
      const offset = readNumber(cfg, 'trailing_stop_positive_offset') ?? 0;
      const positive = readNumber(cfg, 'trailing_stop_positive') ?? 0;
      // an offset of 0 means "not set"
      return offset > 0 && positive > 0 && offset <= positive;
    }
  },
  {
    id: 'trailing-positive-nonzero',
    message:
      'The config trailing_stop_positive needs to be different from 0 to avoid problems with sell orders, unless trailing_only_offset_is_reached is enabled.',
    violated: (cfg) =>
      trailingStopEnabled(cfg) &&
      readNumber(cfg, 'trailing_stop_positive') === 0 &&
      readBoolean(cfg, 'trailing_only_offset_is_reached') !== true
  },
  {
    id: 'edge-volume-pairlist',
    message: 'Edge and VolumePairList are incompatible, Edge will override whatever pairs VolumePairlist selects.',
    violated: (cfg) =>
      readBoolean(getSection(cfg, 'edge'), 'enabled') === true && pairlistMethod(cfg) === PairlistMethod.Volume
  },
  {
    id: 'static-pairlist-whitelist',
    message: 'StaticPairList requires pair_whitelist to be set.',
    violated: (cfg) => {
      const mode = runmodeOf(cfg);
      if (mode !== undefined && isUtilityMode(mode)) return false;
      if (pairlistMethod(cfg) !== PairlistMethod.Static) return false;
      const whitelist = getSection(cfg, 'exchange')?.pair_whitelist;
      return !Array.isArray(whitelist) || whitelist.length === 0;
    }
  }
];

/** Runs the cross-field rules in order and throws on the first one violated. */
export const checkConsistency = (
  cfg: ConfigObject,
  rules: readonly ConsistencyRule[] = CONSISTENCY_RULES
): ConfigObject => {
  const broken = rules.find((rule) => rule.violated(cfg));
  if (broken) {
    throw new ConsistencyError(broken.message, broken.id);
  }
  return cfg;
};

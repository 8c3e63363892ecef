import { DeprecationConflictError, OperationalError } from '@strata/core/errors';
import type { LogSink } from '@strata/observability/logSink';
import { getSection, hasKey, isConfigObject, type ConfigObject, type ConfigValue } from './tree';

export interface DeprecationRule {
  kind: 'rename' | 'conflict';
  /** `null` addresses the top level of the config. */
  oldSection: string | null;
  oldKey: string;
  newSection: string | null;
  newKey: string;
  transform?: (value: ConfigValue) => ConfigValue;
}

const negate = (value: ConfigValue): ConfigValue => (typeof value === 'boolean' ? !value : value);

export const DEPRECATION_RULES: readonly DeprecationRule[] = [
  {
    kind: 'rename',
    oldSection: 'experimental',
    oldKey: 'use_sell_signal',
    newSection: 'ask_strategy',
    newKey: 'use_sell_signal'
  },
  {
    kind: 'rename',
    oldSection: 'experimental',
    oldKey: 'sell_profit_only',
    newSection: 'ask_strategy',
    newKey: 'sell_profit_only'
  },
  {
    kind: 'rename',
    oldSection: 'experimental',
    oldKey: 'ignore_roi_if_buy_signal',
    newSection: 'ask_strategy',
    newKey: 'ignore_roi_if_buy_signal'
  },
  {
    kind: 'rename',
    oldSection: 'experimental',
    oldKey: 'allow_bad_exchanges',
    newSection: 'experimental',
    newKey: 'block_bad_exchanges',
    transform: negate
  },
  {
    kind: 'conflict',
    oldSection: 'edge',
    oldKey: 'capital_available_percentage',
    newSection: null,
    newKey: 'tradable_balance_ratio'
  }
];

const settingName = (section: string | null, key: string) => (section === null ? key : `${section}.${key}`);

const sectionOf = (cfg: ConfigObject, section: string | null): ConfigObject | undefined => {
  if (section !== null && hasKey(cfg, section) && !isConfigObject(cfg[section])) {
    throw new OperationalError(`Configuration section \`${section}\` must be an object.`);
  }
  return getSection(cfg, section);
};

const conflictMessage = (rule: DeprecationRule) => {
  const current = settingName(rule.newSection, rule.newKey);
  const deprecated = settingName(rule.oldSection, rule.oldKey);
  return `Conflicting settings \`${current}\` and \`${deprecated}\` (DEPRECATED) detected in the configuration. Please delete it from your configuration and use the \`${current}\` setting instead.`;
};

const failOnConflict = (cfg: ConfigObject, rule: DeprecationRule): boolean => {
  const oldSection = sectionOf(cfg, rule.oldSection);
  const newSection = sectionOf(cfg, rule.newSection);
  const oldPresent = hasKey(oldSection, rule.oldKey);
  if (oldPresent && hasKey(newSection, rule.newKey)) {
    throw new DeprecationConflictError(
      conflictMessage(rule),
      settingName(rule.newSection, rule.newKey),
      settingName(rule.oldSection, rule.oldKey)
    );
  }
  return oldPresent;
};

/** Fails when both the current and the deprecated form are set. Never migrates. */
export const checkConflictingSettings = (cfg: ConfigObject, rule: DeprecationRule): void => {
  failOnConflict(cfg, rule);
};

/** Moves a deprecated setting to its current location, failing when both are set. */
export const processDeprecatedSetting = (cfg: ConfigObject, rule: DeprecationRule, sink: LogSink): void => {
  if (!failOnConflict(cfg, rule)) return;

  const oldSection = getSection(cfg, rule.oldSection);
  if (!oldSection) return;
  const value = oldSection[rule.oldKey];

  let newSection = getSection(cfg, rule.newSection);
  if (!newSection) {
    newSection = {};
    // a null section is the root, which always exists
    if (rule.newSection !== null) cfg[rule.newSection] = newSection;
  }
  newSection[rule.newKey] = rule.transform ? rule.transform(value) : value;
  delete oldSection[rule.oldKey];

  sink.record(
    'warn',
    `DEPRECATED: The \`${settingName(rule.oldSection, rule.oldKey)}\` setting is deprecated and will be removed in the next versions of the bot. Please use the \`${settingName(rule.newSection, rule.newKey)}\` setting in your configuration instead.`
  );
};

export const resolveDeprecated = (
  cfg: ConfigObject,
  sink: LogSink,
  rules: readonly DeprecationRule[] = DEPRECATION_RULES
): ConfigObject => {
  for (const rule of rules) {
    if (rule.kind === 'rename') {
      processDeprecatedSetting(cfg, rule, sink);
    } else {
      checkConflictingSettings(cfg, rule);
    }
  }
  return cfg;
};

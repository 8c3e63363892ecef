import { cloneValue, defineValue, isConfigObject, ownValue, type ConfigObject, type ConfigValue, type RawDocument } from './tree';

const mergeValue = (base: ConfigValue | undefined, next: ConfigValue): ConfigValue => {
  if (isConfigObject(base) && isConfigObject(next)) {
    return mergeInto(base, next);
  }
  return cloneValue(next);
};

// `target` always belongs to the accumulator
const mergeInto = (target: ConfigObject, source: ConfigObject): ConfigObject => {
  for (const [key, value] of Object.entries(source)) {
    defineValue(target, key, mergeValue(ownValue(target, key), value));
  }
  return target;
};

/**
 * Folds documents left to right. Objects merge by leaf path so sibling keys
 * from earlier documents survive; arrays and scalars replace wholesale. The
 * inputs are never mutated.
 */
export const mergeDocuments = (docs: readonly RawDocument[]): ConfigObject =>
  docs.reduce<ConfigObject>((acc, doc) => mergeInto(acc, doc), {});

export type ConfigScalar = string | number | boolean | null;
export type ConfigValue = ConfigScalar | ConfigValue[] | ConfigObject;
export interface ConfigObject {
  [key: string]: ConfigValue;
}

/** One parsed configuration source, before merging. */
export type RawDocument = ConfigObject;

export const isConfigObject = (value: unknown): value is ConfigObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isPlainObject = (value: object) => {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

// assigning these through `obj[key] = value` rewires the prototype
const RESERVED_KEYS = new Set(['__proto__']);

const isReservedKey = (key: string) => RESERVED_KEYS.has(key);

/** Own property lookup; never reads through the prototype chain. */
export const ownValue = (obj: ConfigObject, key: string): ConfigValue | undefined =>
  Object.prototype.hasOwnProperty.call(obj, key) ? obj[key] : undefined;

/** Defines `key` as a plain own property, whatever its name. */
export const defineValue = (obj: ConfigObject, key: string, value: ConfigValue): void => {
  Object.defineProperty(obj, key, { value, enumerable: true, writable: true, configurable: true });
};

/**
 * Narrows arbitrary parsed data into a configuration tree. Throws on values a
 * configuration document cannot hold (undefined, functions, NaN, class
 * instances) and on `__proto__` keys.
 */
export const toConfigValue = (value: unknown, path = ''): ConfigValue => {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    if (Number.isNaN(value)) throw new TypeError(`NaN is not a configuration value at "${path || '/'}"`);
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item, index) => toConfigValue(item, `${path}/${index}`));
  }
  if (typeof value === 'object' && isPlainObject(value)) {
    const result: ConfigObject = {};
    for (const [key, item] of Object.entries(value)) {
      if (isReservedKey(key)) {
        throw new TypeError(`Reserved key "${key}" is not allowed at "${path || '/'}"`);
      }
      result[key] = toConfigValue(item, `${path}/${key}`);
    }
    return result;
  }
  throw new TypeError(`Unsupported configuration value (${typeof value}) at "${path || '/'}"`);
};

export const cloneValue = <T extends ConfigValue>(value: T): T => structuredClone(value);

export const getSection = (cfg: ConfigObject, section: string | null): ConfigObject | undefined => {
  if (section === null) return cfg;
  const value = cfg[section];
  return isConfigObject(value) ? value : undefined;
};

export const hasKey = (obj: ConfigObject | undefined, key: string): boolean =>
  obj !== undefined && Object.prototype.hasOwnProperty.call(obj, key);

export const readNumber = (obj: ConfigObject | undefined, key: string): number | undefined => {
  const value = obj?.[key];
  return typeof value === 'number' ? value : undefined;
};

export const readBoolean = (obj: ConfigObject | undefined, key: string): boolean | undefined => {
  const value = obj?.[key];
  return typeof value === 'boolean' ? value : undefined;
};

export const readString = (obj: ConfigObject | undefined, key: string): string | undefined => {
  const value = obj?.[key];
  return typeof value === 'string' ? value : undefined;
};

/** Writes `value` at `path`, creating (or replacing non-object) intermediate sections. */
export const setAtPath = (cfg: ConfigObject, path: readonly string[], value: ConfigValue): void => {
  if (!path.length) {
    throw new Error('Cannot set a configuration value at an empty path');
  }
  let cursor = cfg;
  for (const segment of path.slice(0, -1)) {
    const next = cursor[segment];
    if (isConfigObject(next)) {
      cursor = next;
    } else {
      const created: ConfigObject = {};
      cursor[segment] = created;
      cursor = created;
    }
  }
  cursor[path[path.length - 1]] = value;
};

export const deepFreeze = <T>(value: T): Readonly<T> => {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const item of Object.values(value)) {
      deepFreeze(item);
    }
  }
  return value;
};

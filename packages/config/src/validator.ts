import type { RunMode } from '@strata/core/constants';
import { safeParse } from '@strata/core/validation';
import { configSchemaFor } from './schema';
import { toConfigValue, type ConfigObject } from './tree';

/**
 * Validates `cfg` against the schema for `runmode` and writes declared
 * defaults back into it. Throws `SchemaValidationError` on the first issue.
 */
export const validateConfigSchema = (cfg: ConfigObject, runmode?: RunMode): ConfigObject => {
  const parsed = safeParse(configSchemaFor(runmode), cfg);
  for (const [key, value] of Object.entries(parsed)) {
    if (value === undefined) continue;
    cfg[key] = toConfigValue(value, `/${key}`);
  }
  return cfg;
};

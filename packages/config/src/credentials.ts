import { getSection, type ConfigObject } from './tree';

const CREDENTIAL_KEYS = ['key', 'secret', 'password', 'uid'] as const;

/** Blanks exchange credentials and forces dry run. Mutates `cfg`. */
export const removeCredentials = (cfg: ConfigObject): ConfigObject => {
  const exchange = getSection(cfg, 'exchange');
  if (exchange) {
    for (const key of CREDENTIAL_KEYS) {
      exchange[key] = '';
    }
  }
  cfg.dry_run = true;
  return cfg;
};

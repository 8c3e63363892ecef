import fs from 'node:fs';
import path from 'node:path';
import { OperationalError } from '@strata/core/errors';
import type { LogSink } from '@strata/observability/logSink';
import { loadPairsFile } from './loader';
import { getSection, hasKey, readString, type ConfigObject } from './tree';

export interface PairsSource {
  /** Path given through `--pairs-file`. */
  pairsFile?: string;
  /** Whether the config came from files rather than the built-in minimal config. */
  fromConfigFiles: boolean;
}

const sorted = (pairs: string[]) => [...pairs].sort();

/**
 * Fills `cfg.pairs` when no `--pairs` override set it: from the pairs file,
 * else from the exchange whitelist, else from `<datadir>/pairs.json`.
 */
export const resolvePairs = (cfg: ConfigObject, source: PairsSource, sink: LogSink): ConfigObject => {
  if (hasKey(cfg, 'pairs')) return cfg;

  if (source.pairsFile) {
    sink.record('info', `Reading pairs file "${source.pairsFile}".`);
    if (!fs.existsSync(source.pairsFile)) {
      throw new OperationalError(`No pairs file found with path "${source.pairsFile}".`);
    }
    cfg.pairs = sorted(loadPairsFile(source.pairsFile));
    return cfg;
  }

  if (source.fromConfigFiles) {
    sink.record('info', 'Using pairlist from configuration.');
    const whitelist = getSection(cfg, 'exchange')?.pair_whitelist;
    if (Array.isArray(whitelist)) cfg.pairs = [...whitelist];
    return cfg;
  }

  const datadir = readString(cfg, 'datadir');
  if (datadir) {
    const fallback = path.join(datadir, 'pairs.json');
    if (fs.existsSync(fallback)) {
      cfg.pairs = sorted(loadPairsFile(fallback));
    }
  }
  return cfg;
};

import path from 'node:path';
import {
  DEFAULT_DB_DRYRUN_URL,
  DEFAULT_DB_PROD_URL,
  DEFAULT_USER_DATA_DIRNAME,
  RunMode,
  UNLIMITED_OPEN_TRADES,
  UNLIMITED_OPEN_TRADES_INPUT
} from '@strata/core/constants';
import { silentSink, type LogSink } from '@strata/observability/logSink';
import { checkConsistency } from './consistency';
import { removeCredentials } from './credentials';
import { resolveDeprecated } from './deprecations';
import { createFsDirectoryService, type DirectoryService } from './directories';
import { DEFAULT_EXCHANGE_CATALOG, checkExchange, type ExchangeCatalog } from './exchange';
import { loadConfigDocument } from './loader';
import { mergeDocuments } from './merge';
import { applyOverrides, type CliArgs } from './overrides';
import { resolvePairs } from './pairs';
import {
  cloneValue,
  deepFreeze,
  getSection,
  readBoolean,
  readNumber,
  readString,
  type ConfigObject
} from './tree';
import { validateConfigSchema } from './validator';

export interface ResolveOptions {
  /** Config documents, merged in the given order. `-` reads stdin. */
  files?: readonly string[];
  args?: CliArgs;
  /** Forces the mode; otherwise derived from `dry_run`. */
  runmode?: RunMode;
  sink?: LogSink;
  directories?: DirectoryService;
  exchanges?: ExchangeCatalog;
  cwd?: string;
}

export interface ResolvedConfig extends ConfigObject {
  runmode: RunMode;
  datadir: string;
  user_data_dir: string;
  db_url: string;
  original_config: ConfigObject;
}

const TRADING_MODES: readonly RunMode[] = [RunMode.Live, RunMode.DryRun];

/** Used when no config file is given, for commands that do not trade. */
export const createMinimalConfig = (): ConfigObject => ({
  dry_run: true,
  exchange: {
    name: '',
    key: '',
    secret: '',
    pair_whitelist: [],
    ccxt_async_config: { enableRateLimit: true }
  }
});

const resolveRunmode = (cfg: ConfigObject, explicit: RunMode | undefined, sink: LogSink): RunMode => {
  const runmode = explicit ?? (readBoolean(cfg, 'dry_run') === false ? RunMode.Live : RunMode.DryRun);
  sink.record('info', `Runmode set to ${runmode}.`);
  return runmode;
};

const processTradingOptions = (cfg: ConfigObject, runmode: RunMode, sink: LogSink): string => {
  if (!TRADING_MODES.includes(runmode)) {
    removeCredentials(cfg);
  }

  const configured = readString(cfg, 'db_url');
  let dbUrl: string;
  if (readBoolean(cfg, 'dry_run') === true) {
    sink.record('info', 'Dry run is enabled');
    dbUrl = configured === undefined || configured === DEFAULT_DB_PROD_URL ? DEFAULT_DB_DRYRUN_URL : configured;
  } else {
    dbUrl = configured || DEFAULT_DB_PROD_URL;
    sink.record('info', 'Dry run is disabled');
  }
  cfg.db_url = dbUrl;
  sink.record('info', `Using DB: "${dbUrl}"`);

  if (readBoolean(cfg, 'forcebuy_enable') === true) {
    sink.record('warn', '`forcebuy` RPC message enabled.');
  }

  if (readNumber(cfg, 'max_open_trades') === UNLIMITED_OPEN_TRADES_INPUT) {
    cfg.max_open_trades = UNLIMITED_OPEN_TRADES;
    sink.record('info', 'max_open_trades set to unlimited ...');
  }
  return dbUrl;
};

const processDirectories = (
  cfg: ConfigObject,
  cwd: string,
  directories: DirectoryService,
  sink: LogSink
): { userDataDir: string; datadir: string } => {
  const userDataDir = directories.ensureUserDataDir(
    readString(cfg, 'user_data_dir') ?? path.join(cwd, DEFAULT_USER_DATA_DIRNAME),
    false
  );
  cfg.user_data_dir = userDataDir;
  sink.record('info', `Using user-data directory: ${userDataDir} ...`);

  const exchangeName = (readString(getSection(cfg, 'exchange'), 'name') ?? '').toLowerCase();
  const datadir = directories.ensureDataDir(
    readString(cfg, 'datadir') ?? path.join(userDataDir, 'data', exchangeName)
  );
  cfg.datadir = datadir;
  sink.record('info', `Using data directory: ${datadir} ...`);

  return { userDataDir, datadir };
};

/**
 * Loads, merges, overlays, migrates, validates and checks a configuration.
 * Throws an `OperationalError` subclass on any user-facing problem. The
 * result is deep-frozen; every call builds a fresh object.
 */
export const resolveConfiguration = (options: ResolveOptions = {}): Readonly<ResolvedConfig> => {
  const sink = options.sink ?? silentSink;
  const files = options.files ?? [];
  const args = options.args ?? {};
  const directories = options.directories ?? createFsDirectoryService(sink);

  const documents = files.map((file) => {
    sink.record('info', `Using config: ${file} ...`);
    return loadConfigDocument(file);
  });
  const cfg = documents.length ? mergeDocuments(documents) : createMinimalConfig();
  const originalConfig = cloneValue(cfg);

  applyOverrides(cfg, args, sink);
  resolveDeprecated(cfg, sink);

  const runmode = resolveRunmode(cfg, options.runmode, sink);
  cfg.runmode = runmode;

  sink.record('info', 'Validating configuration ...');
  validateConfigSchema(cfg, runmode);

  const dbUrl = processTradingOptions(cfg, runmode, sink);
  const { userDataDir, datadir } = processDirectories(cfg, options.cwd ?? process.cwd(), directories, sink);

  const pairsFile = args['pairs-file'];
  resolvePairs(
    cfg,
    { pairsFile: typeof pairsFile === 'string' ? pairsFile : undefined, fromConfigFiles: files.length > 0 },
    sink
  );

  const blockBadExchanges = readBoolean(getSection(cfg, 'experimental'), 'block_bad_exchanges') ?? true;
  checkExchange(cfg, sink, options.exchanges ?? DEFAULT_EXCHANGE_CATALOG, blockBadExchanges);
  checkConsistency(cfg);

  const resolved: ResolvedConfig = {
    ...cfg,
    runmode,
    datadir,
    user_data_dir: userDataDir,
    db_url: dbUrl,
    original_config: originalConfig
  };
  return deepFreeze(resolved);
};

/** Renders a config as JSON, writing the unlimited sentinel back as `-1`. */
export const formatConfig = (cfg: Readonly<ConfigObject>): string =>
  JSON.stringify(
    cfg,
    (_key, value: unknown) => (value === UNLIMITED_OPEN_TRADES ? UNLIMITED_OPEN_TRADES_INPUT : value),
    2
  );

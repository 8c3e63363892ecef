import { z } from 'zod';
import { NO_EXCHANGE_MODES } from '@strata/core/constants';
import { OperationalError } from '@strata/core/errors';
import { safeParse } from '@strata/core/validation';
import type { LogSink } from '@strata/observability/logSink';
import exchangeData from './data/exchanges.json';
import { getSection, readString, type ConfigObject } from './tree';

/** What the bot knows about the exchanges its connectivity library offers. */
export interface ExchangeCatalog {
  /** Exchanges the connectivity library can talk to. */
  available: readonly string[];
  /** Exchanges tested and supported by the bot. */
  supported: readonly string[];
  /** Exchanges known not to work, with the reason. */
  bad: Readonly<Record<string, string>>;
}

const catalogSchema = z.object({
  available: z.array(z.string()),
  supported: z.array(z.string()),
  bad: z.record(z.string())
});

export const DEFAULT_EXCHANGE_CATALOG: ExchangeCatalog = safeParse(catalogSchema, exchangeData);

export const isExchangeAvailable = (name: string, catalog: ExchangeCatalog) => catalog.available.includes(name);

export const isExchangeOfficiallySupported = (name: string, catalog: ExchangeCatalog) =>
  catalog.supported.includes(name);

export const getExchangeBadReason = (name: string, catalog: ExchangeCatalog): string | undefined =>
  Object.prototype.hasOwnProperty.call(catalog.bad, name) ? catalog.bad[name] : undefined;

const availableList = (catalog: ExchangeCatalog) => catalog.available.join(', ');

/**
 * Confirms the configured exchange can be used. Lowercases the name in place.
 * Unsupported but available exchanges pass with a warning.
 */
export const checkExchange = (
  cfg: ConfigObject,
  sink: LogSink,
  catalog: ExchangeCatalog = DEFAULT_EXCHANGE_CATALOG,
  checkForBad = true
): boolean => {
  const runmode = readString(cfg, 'runmode');
  const exchange = getSection(cfg, 'exchange');
  const configured = readString(exchange, 'name');

  if (NO_EXCHANGE_MODES.some((mode) => mode === runmode) && !configured) {
    return true;
  }
  sink.record('info', 'Checking exchange...');

  const name = (configured ?? '').toLowerCase();
  if (!name) {
    throw new OperationalError(
      'This command requires a configured exchange. You should either use ' +
        '`--exchange <exchange_name>` or specify a configuration file via `--config`.\n' +
        `The following exchanges are available: ${availableList(catalog)}`
    );
  }

  if (!isExchangeAvailable(name, catalog)) {
    throw new OperationalError(
      `Exchange "${name}" is not known to the exchange connectivity library ` +
        'and therefore not available for the bot.\n' +
        `The following exchanges are available: ${availableList(catalog)}`
    );
  }

  const badReason = getExchangeBadReason(name, catalog);
  if (checkForBad && badReason !== undefined) {
    throw new OperationalError(`Exchange "${name}" is known to not work with the bot yet. Reason: ${badReason}`);
  }

  if (exchange) exchange.name = name;

  if (isExchangeOfficiallySupported(name, catalog)) {
    sink.record('info', `Exchange "${name}" is officially supported by the bot.`);
  } else {
    sink.record(
      'warn',
      `Exchange "${name}" is known to the exchange connectivity library, available for the bot, ` +
        'but not officially supported. It may work flawlessly (please report back) or have serious issues. ' +
        'Use it at your own discretion.'
    );
  }
  return true;
};

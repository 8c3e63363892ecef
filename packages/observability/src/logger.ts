import pino from 'pino';
import type { DestinationStream, LoggerOptions, Logger } from 'pino';

export type { Logger };

export const createLogger = (
  name: string,
  options: LoggerOptions = {},
  destination?: DestinationStream
): Logger => {
  const base: LoggerOptions = {
    name,
    level: process.env.LOG_LEVEL ?? 'info',
    ...options
  };
  if (destination) {
    return pino(base, destination);
  }
  return pino({
    ...base,
    transport: process.env.NODE_ENV === 'development' ? { target: 'pino-pretty' } : undefined
  });
};

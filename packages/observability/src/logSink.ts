import type { Logger } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Where configuration resolution reports what it did. Resolution code never
 * touches a process-wide logger; callers hand in a sink.
 */
export interface LogSink {
  record: (level: LogLevel, message: string) => void;
}

export interface LogRecord {
  level: LogLevel;
  message: string;
}

export interface MemorySink extends LogSink {
  readonly records: readonly LogRecord[];
  has: (message: string, level?: LogLevel) => boolean;
  matches: (pattern: RegExp, level?: LogLevel) => boolean;
  count: (predicate: (record: LogRecord) => boolean) => number;
  clear: () => void;
}

export const createPinoSink = (logger: Logger): LogSink => ({
  record: (level, message) => {
    logger[level](message);
  }
});

export const silentSink: LogSink = {
  record: () => {}
};

export const createMemorySink = (): MemorySink => {
  let records: LogRecord[] = [];
  const levelMatches = (record: LogRecord, level?: LogLevel) => level === undefined || record.level === level;
  return {
    get records() {
      return records;
    },
    record: (level, message) => {
      records.push({ level, message });
    },
    has: (message, level) => records.some((record) => record.message === message && levelMatches(record, level)),
    matches: (pattern, level) => records.some((record) => pattern.test(record.message) && levelMatches(record, level)),
    count: (predicate) => records.filter(predicate).length,
    clear: () => {
      records = [];
    }
  };
};

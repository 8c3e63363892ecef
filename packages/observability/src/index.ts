export * from './logger';
export * from './logSink';

import fs from 'node:fs';
import path from 'node:path';
import { DirectoryNotFoundError } from '@strata/core/errors';
import type { LogSink } from '@strata/observability/logSink';

export interface DirectoryService {
  ensureDataDir: (dir: string) => string;
  ensureUserDataDir: (dir: string, createIfMissing: boolean) => string;
}

export const USER_DATA_SUBDIRS = [
  'backtest_results',
  'data',
  'hyperopts',
  'hyperopt_results',
  'plot',
  'strategies'
] as const;

const isDirectory = (dir: string) => fs.existsSync(dir) && fs.statSync(dir).isDirectory();

export const createFsDirectoryService = (sink: LogSink): DirectoryService => ({
  ensureDataDir: (dir) => {
    if (!isDirectory(dir)) {
      fs.mkdirSync(dir, { recursive: true });
      sink.record('info', `Created data directory: ${dir}`);
    }
    return dir;
  },
  ensureUserDataDir: (dir, createIfMissing) => {
    if (!isDirectory(dir)) {
      if (!createIfMissing) {
        throw new DirectoryNotFoundError(
          `Directory \`${dir}\` does not exist. Please use \`strata create-userdir\` to create a user directory`,
          dir
        );
      }
      fs.mkdirSync(dir, { recursive: true });
      sink.record('info', `Created user-data directory: ${dir}`);
    }
    for (const sub of USER_DATA_SUBDIRS) {
      const subdir = path.join(dir, sub);
      if (!isDirectory(subdir)) fs.mkdirSync(subdir);
    }
    return dir;
  }
});

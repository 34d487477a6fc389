import * as path from 'path';
import { LogLevelString } from 'bunyan';
import { Exceptions } from './Exceptions';

export const DEFAULT_DATABASE_PATH = path.join(__dirname, 'financeiro.db');

const LOG_LEVELS: LogLevelString[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

export interface LedgerConfig {
  databasePath: string;
  logLevel: LogLevelString | null;
}

function parseLogLevel(value: string | undefined): LogLevelString | null {
  if (!value) {
    return null;
  }
  const level = LOG_LEVELS.find(l => l === value.toLowerCase());
  if (!level) {
    throw new Exceptions.InvalidConfigException('LEDGER_LOG_LEVEL', value);
  }
  return level;
}

export function resolveDatabasePath(env: NodeJS.ProcessEnv = process.env): string {
  return env.LEDGER_DB_PATH || DEFAULT_DATABASE_PATH;
}

/**
 * Reads the ledger settings from the environment.
 *
 * `LEDGER_DB_PATH` overrides the database file next to this module and
 * `LEDGER_LOG_LEVEL` turns on logging to stderr.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
  return {
    databasePath: resolveDatabasePath(env),
    logLevel: parseLogLevel(env.LEDGER_LOG_LEVEL),
  };
}

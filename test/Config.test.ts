import * as path from 'path';
import { DEFAULT_DATABASE_PATH, loadConfig, resolveDatabasePath } from '../src/Config';
import { Exceptions } from '../src/Exceptions';

describe('The ledger configuration', () => {

  it('defaults to the database file beside the module and no logging', () => {
    const config = loadConfig({});
    expect(config.databasePath).toBe(DEFAULT_DATABASE_PATH);
    expect(path.basename(config.databasePath)).toBe('financeiro.db');
    expect(config.logLevel).toBeNull();
  });

  it('reads the database path and log level from the environment', () => {
    const config = loadConfig({ LEDGER_DB_PATH: '/tmp/ledger-test.db', LEDGER_LOG_LEVEL: 'DEBUG' });
    expect(config.databasePath).toBe('/tmp/ledger-test.db');
    expect(config.logLevel).toBe('debug');
  });

  it('throws for an unknown log level', () => {
    expect(() => loadConfig({ LEDGER_LOG_LEVEL: 'loud' })).toThrow(Exceptions.InvalidConfigException);
  });

  it('resolves the database path without reading the log level', () => {
    expect(resolveDatabasePath({ LEDGER_LOG_LEVEL: 'loud' })).toBe(DEFAULT_DATABASE_PATH);
    expect(resolveDatabasePath({ LEDGER_DB_PATH: '/tmp/other.db', LEDGER_LOG_LEVEL: 'loud' })).toBe('/tmp/other.db');
  });
});

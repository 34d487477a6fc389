import * as bunyan from 'bunyan';

export type LedgerLogger = ReturnType<typeof bunyan.createLogger>;

export class Logger {

  public static getLogger(area: string): LedgerLogger {
    if (area === 'main') {
      return this.main;
    }
    let logger = this.loggerMap[area];
    if (logger) {
      return logger;
    }
    logger = this.main.child({ area });
    this.loggerMap[area] = logger;
    return logger;
  }

  // Child loggers copy their streams on creation, so they are dropped and rebuilt lazily.
  public static configure(level: bunyan.LogLevelString | null) {
    this.main = this.createMain(level);
    this.loggerMap = {};
  }

  private static createMain(level: bunyan.LogLevelString | null): LedgerLogger {
    return bunyan.createLogger({
      name: 'ledger',
      level: level || 'info',
      streams: level ? [{ level, stream: process.stderr }] : [],
    });
  }

  private static main: LedgerLogger = Logger.createMain(null);

  private static loggerMap: { [area: string]: LedgerLogger } = {};
}

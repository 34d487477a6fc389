import { CommandParser } from './CommandParser';
import { LedgerConfig, loadConfig } from './Config';
import { Logger } from './Logger';
import { TransactionRecord } from './TransactionRecord';
import { TransactionStore } from './TransactionStore';

/**
 * Composition root: owns the store and feeds it the commands it understands.
 */
export class Ledger {

  public static open(config: LedgerConfig = loadConfig()): Ledger {
    if (config.logLevel) {
      Logger.configure(config.logLevel);
    }
    return new Ledger(TransactionStore.open(config.databasePath));
  }

  private parser = new CommandParser();

  constructor(public readonly store: TransactionStore) {
  }

  private get log() {
    return Logger.getLogger('main');
  }

  /**
   * Stores the transaction described by `text` and returns it. Text without a
   * command is left alone and yields null.
   */
  public record(text: string): TransactionRecord | null {
    const record = this.parser.extract(text);
    if (!record) {
      return null;
    }
    this.store.insert(record);
    this.log.info({ date: record.date, kind: record.kind, amount: record.amount }, 'Recorded transaction');
    return record;
  }

  public close() {
    this.store.close();
  }
}

export function withLedger<T>(config: LedgerConfig, fn: (ledger: Ledger) => T): T {
  const ledger = Ledger.open(config);
  try {
    return fn(ledger);
  } finally {
    ledger.close();
  }
}

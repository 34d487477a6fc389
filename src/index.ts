export { CommandParser, extract } from './CommandParser';
export { DEFAULT_DATABASE_PATH, LedgerConfig, loadConfig, resolveDatabasePath } from './Config';
export { Exceptions } from './Exceptions';
export { Ledger, withLedger } from './Ledger';
export { Logger } from './Logger';
export { TransactionKind } from './TransactionKind';
export { DescriptionTotal, KindTotals, StoredTransaction, TransactionRecord } from './TransactionRecord';
export { DateBound, TransactionStore, withTransactionStore } from './TransactionStore';

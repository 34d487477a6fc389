import { Database } from 'node-sqlite3-wasm';
import { resolveDatabasePath } from './Config';
import { Exceptions } from './Exceptions';
import { Helper } from './Helper';
import { Logger } from './Logger';
import { TransactionKind, toTransactionKind } from './TransactionKind';
import { DescriptionTotal, KindTotals, StoredTransaction, TransactionRecord } from './TransactionRecord';

const DDL = `
CREATE TABLE IF NOT EXISTS transacoes (
    id        INTEGER PRIMARY KEY AUTOINCREMENT,
    data      TEXT    NOT NULL,
    tipo      TEXT    NOT NULL CHECK (tipo IN ('revenue','expense')),
    valor     REAL    NOT NULL,
    descricao TEXT
);
`;

const INDEX_SQL = 'CREATE INDEX IF NOT EXISTS idx_tipo_data ON transacoes (tipo, data);';

// An ISO calendar date, or a Date whose UTC day is used.
export type DateBound = string | Date;

type Row = Record<string, unknown>;

interface DateFilter {
  conditions: string[];
  params: string[];
}

function buildDateFilter(dateFrom?: DateBound, dateTo?: DateBound): DateFilter {
  const filter: DateFilter = { conditions: [], params: [] };
  if (dateFrom) {
    filter.conditions.push('date(data) >= ?');
    filter.params.push(toIsoBound(dateFrom));
  }
  if (dateTo) {
    filter.conditions.push('date(data) <= ?');
    filter.params.push(toIsoBound(dateTo));
  }
  return filter;
}

function toIsoBound(bound: DateBound) {
  return bound instanceof Date ? Helper.convertDateToIsoFormat(bound) : bound;
}

function toKind(tipo: string): TransactionKind {
  const kind = toTransactionKind(tipo);
  if (!kind) {
    throw new Exceptions.InvalidKindException(tipo);
  }
  return kind;
}

function readText(row: Row, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') {
    throw new Exceptions.UnexpectedColumnValueException(column, String(value));
  }
  return value;
}

function readNullableText(row: Row, column: string): string | null {
  return row[column] === null ? null : readText(row, column);
}

function readNumber(row: Row, column: string): number {
  const value = row[column];
  if (typeof value === 'bigint') {
    return Number(value);
  }
  if (typeof value !== 'number') {
    throw new Exceptions.UnexpectedColumnValueException(column, String(value));
  }
  return value;
}

/**
 * Handle on one SQLite ledger file. Every call runs synchronously and each
 * write commits on its own; errors raised by SQLite reach the caller as they are.
 *
 * The WebAssembly build has no shared-memory wal-index, so the write-ahead log
 * runs with an exclusive lock held by this handle until it is closed.
 */
export class TransactionStore {

  public static open(path: string = resolveDatabasePath()): TransactionStore {
    const db = new Database(path);
    db.exec('PRAGMA locking_mode = EXCLUSIVE;');
    db.exec('PRAGMA journal_mode = WAL;');
    db.exec(DDL);
    db.exec(INDEX_SQL);
    Logger.getLogger('store').debug({ path }, 'Opened transaction store');
    return new TransactionStore(db, path);
  }

  private get log() {
    return Logger.getLogger('store');
  }

  constructor(private db: Database, public readonly path: string) {
  }

  public isOpen() {
    return this.db.isOpen;
  }

  public close() {
    if (!this.db.isOpen) {
      return;
    }
    this.db.close();
    this.log.debug({ path: this.path }, 'Closed transaction store');
  }

  // 'wal' for a file, 'memory' for ':memory:'.
  public journalMode(): string {
    const row = this.connection().get('PRAGMA journal_mode');
    return row ? readText(row, 'journal_mode') : '';
  }

  public insert(record: TransactionRecord): void {
    const result = this.connection().run(
      'INSERT INTO transacoes (data, tipo, valor, descricao) VALUES (?,?,?,?)',
      [record.date, record.kind, record.amount, record.description],
    );
    this.log.debug({ id: Number(result.lastInsertRowid), kind: record.kind }, 'Inserted transaction');
  }

  public delete(id: number): boolean {
    const result = this.connection().run('DELETE FROM transacoes WHERE id = ?', [id]);
    this.log.debug({ id, deleted: result.changes > 0 }, 'Deleted transaction');
    return result.changes > 0;
  }

  public totals(dateFrom?: DateBound, dateTo?: DateBound): KindTotals {
    const filter = buildDateFilter(dateFrom, dateTo);
    let query = 'SELECT tipo, SUM(valor) AS total FROM transacoes';
    if (filter.conditions.length > 0) {
      query += ' WHERE ' + filter.conditions.join(' AND ');
    }
    query += ' GROUP BY tipo';

    const result: KindTotals = {};
    this.connection().all(query, filter.params).forEach(row => {
      // SUM over a NOT NULL column is never null; kept for parity with the stored schema.
      result[toKind(readText(row, 'tipo'))] = row.total === null ? 0 : readNumber(row, 'total');
    });
    return result;
  }

  public listTransactions(dateFrom?: DateBound, dateTo?: DateBound): StoredTransaction[] {
    const filter = buildDateFilter(dateFrom, dateTo);
    let query = `
        SELECT id, data, tipo, valor,
               COALESCE(descricao,'') AS descricao
        FROM transacoes`;
    if (filter.conditions.length > 0) {
      query += ' WHERE ' + filter.conditions.join(' AND ');
    }
    query += ' ORDER BY date(data) DESC, id DESC';

    return this.connection().all(query, filter.params).map(row => ({
      id: readNumber(row, 'id'),
      date: Helper.getJSDateFromStored(readText(row, 'data')),
      kind: toKind(readText(row, 'tipo')),
      amount: readNumber(row, 'valor'),
      description: readText(row, 'descricao'),
    }));
  }

  public revenueByDescription(dateFrom?: DateBound, dateTo?: DateBound): DescriptionTotal[] {
    const filter = buildDateFilter(dateFrom, dateTo);
    let query = `
        SELECT descricao, SUM(valor) AS total
        FROM transacoes
        WHERE tipo = ?`;
    if (filter.conditions.length > 0) {
      query += ' AND ' + filter.conditions.join(' AND ');
    }
    query += ' GROUP BY descricao ORDER BY total DESC';

    return this.connection()
      .all(query, [TransactionKind.REVENUE, ...filter.params])
      .map(row => ({ description: readNullableText(row, 'descricao'), total: readNumber(row, 'total') }));
  }

  private connection() {
    if (!this.db.isOpen) {
      throw new Exceptions.StoreClosedException();
    }
    return this.db;
  }
}

/**
 * Opens the store at `path`, hands it to `fn` and closes it afterwards, also
 * when `fn` throws.
 */
export function withTransactionStore<T>(path: string, fn: (store: TransactionStore) => T): T {
  const store = TransactionStore.open(path);
  try {
    return fn(store);
  } finally {
    store.close();
  }
}

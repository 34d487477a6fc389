import { TransactionKind } from './TransactionKind';

export class TransactionRecord {
  constructor(
    // ISO 8601 calendar date, YYYY-MM-DD
    public readonly date: string,
    public readonly kind: TransactionKind,
    public readonly amount: number,
    public readonly description: string | null = null,
  ) {
    Object.freeze(this);
  }
}

export interface StoredTransaction {
  id: number;
  date: Date;
  kind: TransactionKind;
  amount: number;
  // '' when the record was stored without one
  description: string;
}

export interface DescriptionTotal {
  description: string | null;
  total: number;
}

export type KindTotals = Partial<Record<TransactionKind, number>>;

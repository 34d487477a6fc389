export enum TransactionKind {
  REVENUE = 'revenue',
  EXPENSE = 'expense',
}

export function toTransactionKind(value: string): TransactionKind | null {
  switch (value.toLowerCase()) {
    case TransactionKind.REVENUE:
      return TransactionKind.REVENUE;
    case TransactionKind.EXPENSE:
      return TransactionKind.EXPENSE;
    default:
      return null;
  }
}

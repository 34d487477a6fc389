import { TransactionKind } from '../src/TransactionKind';
import { TransactionRecord } from '../src/TransactionRecord';
import { TransactionStore } from '../src/TransactionStore';

export function openMemoryStore() {
  return TransactionStore.open(':memory:');
}

export function revenue(date: string, amount: number, description: string | null = null) {
  return new TransactionRecord(date, TransactionKind.REVENUE, amount, description);
}

export function expense(date: string, amount: number, description: string | null = null) {
  return new TransactionRecord(date, TransactionKind.EXPENSE, amount, description);
}

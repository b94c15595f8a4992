import Decimal from 'decimal.js';

export enum TransactionSide {
  BUY = 'BUY',
  SELL = 'SELL',
}

// Immutable ledger entry. The log of these is the system of record;
// holdings and balance are caches that can be rebuilt from it.
export interface Transaction {
  id: string;                 // internal UUID
  sequence: number;           // log position, breaks timestamp ties
  portfolioId: string;        // may outlive its portfolio
  symbol: string;
  side: TransactionSide;
  quantity: number;
  price: Decimal;
  timestamp: Date;
}

export type NewTransaction = Omit<Transaction, 'id' | 'sequence'>;

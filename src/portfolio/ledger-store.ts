import Decimal from 'decimal.js';
import { Portfolio } from './entities/portfolio.entity';
import { Holding } from './entities/holding.entity';
import { NewTransaction, Transaction } from './entities/transaction.entity';
import { AccountBalance } from './entities/account-balance.entity';
import { NetWorthSnapshot } from './entities/net-worth-snapshot.entity';

/**
 * Persistence handle for the ledger tables: portfolios, transactions,
 * holdings, the cash balance and net-worth history.
 *
 * Doubles as the Nest injection token; bind an implementation with
 * `{ provide: LedgerStore, useClass: ... }`.
 */
export abstract class LedgerStore {
  /**
   * Runs `work` as one exclusive unit. Either every write inside it is kept
   * or none is. Nested calls join the outer unit. Faults that are not ledger
   * errors surface as PersistenceFailureException tagged with `operation`.
   */
  abstract runAtomically<T>(operation: string, work: () => T): T;

  abstract savePortfolio(portfolio: Portfolio): Portfolio;
  abstract findPortfolio(id: string): Portfolio | undefined;
  abstract findPortfolioByName(name: string): Portfolio | undefined;
  abstract getAllPortfolios(): Portfolio[];
  abstract deletePortfolio(id: string): void;

  /** Appends to the log, assigning id and sequence */
  abstract appendTransaction(transaction: NewTransaction): Transaction;
  /** Full log in append order */
  abstract getAllTransactions(): Transaction[];
  abstract getTransactionCount(): number;

  abstract findHolding(portfolioId: string, symbol: string): Holding | undefined;
  abstract saveHolding(holding: Holding): Holding;
  abstract deleteHolding(portfolioId: string, symbol: string): void;
  /** All holdings, or those of one portfolio */
  abstract getHoldings(portfolioId?: string): Holding[];
  /** @returns number of holdings removed */
  abstract deleteHoldingsForPortfolio(portfolioId: string): number;

  abstract getBalance(): AccountBalance;
  abstract setBalance(balance: Decimal, at: Date): AccountBalance;

  abstract appendSnapshot(snapshot: NetWorthSnapshot): NetWorthSnapshot;
  /** Latest `limit` snapshots (all when omitted, none when not positive), oldest first */
  abstract getSnapshots(limit?: number): NetWorthSnapshot[];
}

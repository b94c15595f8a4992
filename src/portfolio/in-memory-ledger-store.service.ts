import { HttpException, Inject, Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { v4 as uuidv4 } from 'uuid';
import { LedgerStore } from './ledger-store';
import { Portfolio } from './entities/portfolio.entity';
import { Holding, holdingKey } from './entities/holding.entity';
import { NewTransaction, Transaction } from './entities/transaction.entity';
import { AccountBalance } from './entities/account-balance.entity';
import { NetWorthSnapshot } from './entities/net-worth-snapshot.entity';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { toDecimal } from '../common/utils/decimal.util';
import { PersistenceFailureException } from '../common/exceptions/ledger.exceptions';

interface LedgerState {
  portfolios: Map<string, Portfolio>;
  transactions: Transaction[];
  holdings: Map<string, Holding>;
  balance: AccountBalance;
  snapshots: NetWorthSnapshot[];
  nextSequence: number;
}

// In-memory ledger tables with O(1) holding lookups.
// Records are copied on the way in and out, so a rollback only has to swap
// the table containers back.
@Injectable()
export class InMemoryLedgerStore extends LedgerStore {
  private readonly logger = new Logger(InMemoryLedgerStore.name);
  private state: LedgerState;
  private depth = 0;

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {
    super();
    this.state = this.emptyState();
  }

  runAtomically<T>(operation: string, work: () => T): T {
    if (this.depth > 0) {
      return work();
    }

    const before = this.copyState();
    this.depth++;
    try {
      return work();
    } catch (err) {
      this.state = before;
      this.logger.debug(`Rolled back ${operation}`);
      if (err instanceof HttpException) {
        throw err;
      }
      throw new PersistenceFailureException(operation, err);
    } finally {
      this.depth--;
    }
  }

  savePortfolio(portfolio: Portfolio): Portfolio {
    this.state.portfolios.set(portfolio.id, { ...portfolio });
    return { ...portfolio };
  }

  findPortfolio(id: string): Portfolio | undefined {
    const portfolio = this.state.portfolios.get(id);
    return portfolio && { ...portfolio };
  }

  findPortfolioByName(name: string): Portfolio | undefined {
    const portfolio = Array.from(this.state.portfolios.values()).find((p) => p.name === name);
    return portfolio && { ...portfolio };
  }

  getAllPortfolios(): Portfolio[] {
    return Array.from(this.state.portfolios.values(), (p) => ({ ...p }));
  }

  deletePortfolio(id: string): void {
    this.state.portfolios.delete(id);
  }

  appendTransaction(transaction: NewTransaction): Transaction {
    const recorded: Transaction = {
      ...transaction,
      id: uuidv4(),
      sequence: this.state.nextSequence++,
    };
    this.state.transactions.push(recorded);
    return { ...recorded };
  }

  /** Returns copies to prevent external mutation */
  getAllTransactions(): Transaction[] {
    return this.state.transactions.map((t) => ({ ...t }));
  }

  getTransactionCount(): number {
    return this.state.transactions.length;
  }

  findHolding(portfolioId: string, symbol: string): Holding | undefined {
    const holding = this.state.holdings.get(holdingKey(portfolioId, symbol));
    return holding && { ...holding };
  }

  saveHolding(holding: Holding): Holding {
    this.state.holdings.set(holdingKey(holding.portfolioId, holding.symbol), { ...holding });
    return { ...holding };
  }

  deleteHolding(portfolioId: string, symbol: string): void {
    this.state.holdings.delete(holdingKey(portfolioId, symbol));
  }

  getHoldings(portfolioId?: string): Holding[] {
    const holdings = Array.from(this.state.holdings.values(), (h) => ({ ...h }));
    return portfolioId === undefined ? holdings : holdings.filter((h) => h.portfolioId === portfolioId);
  }

  deleteHoldingsForPortfolio(portfolioId: string): number {
    let removed = 0;
    for (const [key, holding] of this.state.holdings) {
      if (holding.portfolioId === portfolioId) {
        this.state.holdings.delete(key);
        removed++;
      }
    }
    return removed;
  }

  getBalance(): AccountBalance {
    return { ...this.state.balance };
  }

  setBalance(balance: Decimal, at: Date): AccountBalance {
    this.state.balance = { balance, lastUpdated: at };
    return { ...this.state.balance };
  }

  appendSnapshot(snapshot: NetWorthSnapshot): NetWorthSnapshot {
    this.state.snapshots.push({ ...snapshot });
    return { ...snapshot };
  }

  getSnapshots(limit?: number): NetWorthSnapshot[] {
    if (limit !== undefined && limit <= 0) {
      return [];
    }
    const rows = limit === undefined ? this.state.snapshots : this.state.snapshots.slice(-limit);
    return rows.map((s) => ({ ...s }));
  }

  /** Nukes all tables and restores the opening balance - test harness only */
  clearAllData(): void {
    this.state = this.emptyState();
  }

  private emptyState(): LedgerState {
    return {
      portfolios: new Map(),
      transactions: [],
      holdings: new Map(),
      balance: { balance: toDecimal(this.config.initialBalance), lastUpdated: new Date() },
      snapshots: [],
      nextSequence: 1,
    };
  }

  private copyState(): LedgerState {
    return {
      portfolios: new Map(this.state.portfolios),
      transactions: [...this.state.transactions],
      holdings: new Map(this.state.holdings),
      balance: { ...this.state.balance },
      snapshots: [...this.state.snapshots],
      nextSequence: this.state.nextSequence,
    };
  }
}

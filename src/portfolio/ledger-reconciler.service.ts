import { Inject, Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { LedgerStore } from './ledger-store';
import { Holding, holdingKey } from './entities/holding.entity';
import { Transaction, TransactionSide } from './entities/transaction.entity';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { toDecimal } from '../common/utils/decimal.util';

export interface ReconciliationAnomaly {
  transactionId: string;
  portfolioId: string;
  symbol: string;
  requested: number;
  available: number;
}

export interface ReconciliationReport {
  transactionsReplayed: number;
  holdingsRepaired: number;
  holdingsRemoved: number;
  anomalies: ReconciliationAnomaly[];   // sells that exceeded the replayed position
  balanceBefore: Decimal;
  balanceAfter: Decimal;
}

function sameHolding(a: Holding, b: Holding): boolean {
  return a.quantity === b.quantity && a.averageBuyPrice.equals(b.averageBuyPrice);
}

/**
 * Rebuilds the holdings cache and the cash balance from the transaction log.
 * The log is ground truth; whatever differs is overwritten.
 */
@Injectable()
export class LedgerReconcilerService {
  private readonly logger = new Logger(LedgerReconcilerService.name);

  constructor(
    private readonly store: LedgerStore,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  reconcile(): ReconciliationReport {
    return this.store.runAtomically('reconcile', () => {
      const transactions = this.store
        .getAllTransactions()
        .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime() || a.sequence - b.sequence);

      const { holdings, anomalies } = this.replayHoldings(transactions);
      const { repaired, removed } = this.writeHoldings(holdings);

      const balanceBefore = this.store.getBalance().balance;
      const balanceAfter = transactions.reduce((balance, t) => {
        const amount = t.price.times(t.quantity);
        return t.side === TransactionSide.BUY ? balance.minus(amount) : balance.plus(amount);
      }, toDecimal(this.config.initialBalance));

      if (!balanceAfter.equals(balanceBefore)) {
        this.store.setBalance(balanceAfter, new Date());
      }

      anomalies.forEach((a) =>
        this.logger.warn(
          `Transaction ${a.transactionId} sells ${a.requested} ${a.symbol} but only ${a.available} were held`,
        ),
      );
      this.logger.log(
        `Reconciled ${transactions.length} transactions: ${repaired} holdings repaired, ${removed} removed`,
      );

      return {
        transactionsReplayed: transactions.length,
        holdingsRepaired: repaired,
        holdingsRemoved: removed,
        anomalies,
        balanceBefore,
        balanceAfter,
      };
    });
  }

  // Weighted-average replay for portfolios that still exist
  private replayHoldings(transactions: Transaction[]): {
    holdings: Map<string, Holding>;
    anomalies: ReconciliationAnomaly[];
  } {
    const holdings = new Map<string, Holding>();
    const anomalies: ReconciliationAnomaly[] = [];

    for (const t of transactions) {
      if (!this.store.findPortfolio(t.portfolioId)) continue;

      const key = holdingKey(t.portfolioId, t.symbol);
      const current = holdings.get(key);

      if (t.side === TransactionSide.BUY) {
        const quantity = (current?.quantity ?? 0) + t.quantity;
        const cost = current ? current.averageBuyPrice.times(current.quantity) : toDecimal(0);
        holdings.set(key, {
          portfolioId: t.portfolioId,
          symbol: t.symbol,
          quantity,
          averageBuyPrice: cost.plus(t.price.times(t.quantity)).dividedBy(quantity),
        });
        continue;
      }

      const available = current?.quantity ?? 0;
      if (available < t.quantity) {
        anomalies.push({
          transactionId: t.id,
          portfolioId: t.portfolioId,
          symbol: t.symbol,
          requested: t.quantity,
          available,
        });
      }

      const remaining = Math.max(available - t.quantity, 0);
      if (current && remaining > 0) {
        holdings.set(key, { ...current, quantity: remaining });
      } else {
        holdings.delete(key);
      }
    }

    return { holdings, anomalies };
  }

  private writeHoldings(expected: Map<string, Holding>): { repaired: number; removed: number } {
    let repaired = 0;
    let removed = 0;

    for (const holding of this.store.getHoldings()) {
      if (!expected.has(holdingKey(holding.portfolioId, holding.symbol))) {
        this.store.deleteHolding(holding.portfolioId, holding.symbol);
        removed++;
      }
    }

    for (const holding of expected.values()) {
      const actual = this.store.findHolding(holding.portfolioId, holding.symbol);
      if (!actual || !sameHolding(actual, holding)) {
        this.store.saveHolding(holding);
        repaired++;
      }
    }

    return { repaired, removed };
  }
}

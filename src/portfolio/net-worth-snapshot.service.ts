import { Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { LedgerStore } from './ledger-store';
import { Holding } from './entities/holding.entity';
import { NetWorthSnapshot } from './entities/net-worth-snapshot.entity';
import { PriceCatalogService } from '../price-catalog/price-catalog.service';
import { ZERO } from '../common/utils/decimal.util';

/**
 * Appends a net-worth row after every trade.
 * The history is an event log driven by trade frequency, not a daily job.
 */
@Injectable()
export class NetWorthSnapshotService {
  private readonly logger = new Logger(NetWorthSnapshotService.name);

  constructor(
    private readonly store: LedgerStore,
    private readonly catalog: PriceCatalogService,
  ) {}

  /** Market price, or the average buy price when the catalog has none */
  marketPriceOf(holding: Holding): Decimal {
    return this.catalog.currentPrice(holding.symbol) ?? holding.averageBuyPrice;
  }

  /** Σ quantity × current price, across all portfolios or just one */
  getPortfolioValue(portfolioId?: string): Decimal {
    return this.store
      .getHoldings(portfolioId)
      .reduce((total, holding) => total.plus(this.marketPriceOf(holding).times(holding.quantity)), ZERO);
  }

  snapshot(at: Date = new Date()): NetWorthSnapshot {
    const { balance } = this.store.getBalance();
    const portfolioValue = this.getPortfolioValue();

    const snapshot = this.store.appendSnapshot({
      date: at.toISOString().slice(0, 10),
      accountBalance: balance,
      portfolioValue,
      totalNetWorth: balance.plus(portfolioValue),
      timestamp: at,
    });

    this.logger.debug(`Net worth ${snapshot.totalNetWorth.toFixed(2)} recorded for ${snapshot.date}`);
    return snapshot;
  }

  /** Latest `limit` rows in chronological order */
  getHistory(limit: number): NetWorthSnapshot[] {
    return this.store.getSnapshots(limit);
  }
}

import { Inject, Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { LedgerStore } from './ledger-store';
import { NetWorthSnapshotService } from './net-worth-snapshot.service';
import { calculateRealizedPnl } from './realized-pnl.calculator';
import { Holding } from './entities/holding.entity';
import { Portfolio } from './entities/portfolio.entity';
import { Transaction } from './entities/transaction.entity';
import { RealizedPnlSummary } from './entities/realized-pnl-record.entity';
import { RealizedPnlResponseDto, UnrealizedPnlResponseDto } from './dto/pnl-response.dto';
import { PortfolioDetailDto, PortfolioHoldingDto, PortfolioSummaryDto } from './dto/portfolio.dto';
import { TransactionResponseDto } from './dto/transaction-response.dto';
import { AccountBalanceDto, NetWorthSnapshotDto, toNetWorthSnapshotDto } from './dto/net-worth-response.dto';
import { DashboardResponseDto } from './dto/dashboard-response.dto';
import { StockDetailDto, StockHoldingDto, StockSummaryDto } from './dto/stock-position.dto';
import { toStockResponse } from '../price-catalog/dto/stock-response.dto';
import { PriceCatalogService } from '../price-catalog/price-catalog.service';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { percentageOf, toMoney, toNumber, ZERO } from '../common/utils/decimal.util';
import { PortfolioNotFoundException } from '../common/exceptions/ledger.exceptions';

export interface TransactionFilter {
  portfolioId?: string;
  symbol?: string;
  limit?: number;
}

interface UnrealizedTotals {
  costBasis: Decimal;
  currentValue: Decimal;
  amount: Decimal;
}

const PORTFOLIO_DETAIL_TRANSACTIONS = 20;
const DASHBOARD_RECENT_TRANSACTIONS = 10;
const STOCK_DETAIL_TRANSACTIONS = 20;

function newestFirst(a: Transaction, b: Transaction): number {
  return b.timestamp.getTime() - a.timestamp.getTime() || b.sequence - a.sequence;
}

// Read-only views over the ledger.
// Queries separated from mutations; nothing here writes to the store.
@Injectable()
export class PortfolioQueryService {
  private readonly logger = new Logger(PortfolioQueryService.name);

  constructor(
    private readonly store: LedgerStore,
    private readonly catalog: PriceCatalogService,
    private readonly snapshotter: NetWorthSnapshotService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  /**
   * FIFO realized P&L, replayed from the full transaction log on every call.
   */
  getRealizedPnl(): RealizedPnlResponseDto {
    const summary = this.realizedSummary();

    return {
      amount: toMoney(summary.amount),
      percentage: toNumber(summary.percentage),
      totalSoldValue: toMoney(summary.totalSoldValue),
      totalSoldCostBasis: toMoney(summary.totalSoldCostBasis),
      uncoveredQuantity: summary.uncoveredQuantity,
      bySymbol: summary.bySymbol.map((s) => ({
        symbol: s.symbol,
        realizedPnl: toMoney(s.realizedPnl),
        soldQuantity: s.soldQuantity,
        soldValue: toMoney(s.soldValue),
        costBasis: toMoney(s.costBasis),
      })),
    };
  }

  /**
   * Paper P&L of open holdings at weighted-average cost vs market price.
   * @param portfolioId - Optional; aggregates over every portfolio when omitted
   */
  getUnrealizedPnl(portfolioId?: string): UnrealizedPnlResponseDto {
    if (portfolioId !== undefined) {
      this.requirePortfolio(portfolioId);
    }

    const holdings = this.store.getHoldings(portfolioId);
    const totals = this.unrealizedTotals(holdings);

    return {
      portfolioId: portfolioId ?? null,
      costBasis: toMoney(totals.costBasis),
      currentValue: toMoney(totals.currentValue),
      amount: toMoney(totals.amount),
      percentage: toNumber(percentageOf(totals.amount, totals.costBasis)),
      holdings: holdings.map((holding) => {
        const currentPrice = this.snapshotter.marketPriceOf(holding);
        const costBasis = holding.averageBuyPrice.times(holding.quantity);
        const currentValue = currentPrice.times(holding.quantity);

        return {
          portfolioId: holding.portfolioId,
          symbol: holding.symbol,
          quantity: holding.quantity,
          averageBuyPrice: toNumber(holding.averageBuyPrice),
          currentPrice: toNumber(currentPrice),
          costBasis: toMoney(costBasis),
          currentValue: toMoney(currentValue),
          unrealizedPnl: toMoney(currentValue.minus(costBasis)),
        };
      }),
    };
  }

  /** Latest `limit` snapshots, oldest first */
  getNetWorthHistory(limit: number = this.config.netWorthHistoryLimit): NetWorthSnapshotDto[] {
    return this.snapshotter.getHistory(limit).map(toNetWorthSnapshotDto);
  }

  getBalance(): AccountBalanceDto {
    const { balance, lastUpdated } = this.store.getBalance();
    return { balance: toMoney(balance), lastUpdated: lastUpdated.toISOString() };
  }

  /** Newest first, optionally filtered by portfolio and/or symbol */
  getTransactions(filter: TransactionFilter = {}): TransactionResponseDto[] {
    const limit = filter.limit ?? this.config.transactionHistoryLimit;
    const symbol = filter.symbol && PriceCatalogService.normalizeSymbol(filter.symbol);

    return this.store
      .getAllTransactions()
      .filter((t) => filter.portfolioId === undefined || t.portfolioId === filter.portfolioId)
      .filter((t) => !symbol || t.symbol === symbol)
      .sort(newestFirst)
      .slice(0, limit)
      .map((t) => this.toTransactionResponse(t));
  }

  /** Ordered by name */
  getPortfolioSummaries(): PortfolioSummaryDto[] {
    return this.store
      .getAllPortfolios()
      .sort((a, b) => a.name.localeCompare(b.name))
      .map((p) => this.toSummary(p));
  }

  getPortfolioDetail(portfolioId: string): PortfolioDetailDto {
    const portfolio = this.requirePortfolio(portfolioId);

    const holdings: PortfolioHoldingDto[] = this.store
      .getHoldings(portfolioId)
      .map((holding) => {
        const currentPrice = this.snapshotter.marketPriceOf(holding);
        const currentValue = currentPrice.times(holding.quantity);
        return {
          symbol: holding.symbol,
          name: this.catalog.findStock(holding.symbol)?.name ?? null,
          quantity: holding.quantity,
          averageBuyPrice: toNumber(holding.averageBuyPrice),
          currentPrice: toNumber(currentPrice),
          currentValue: toMoney(currentValue),
          profitLoss: toMoney(currentPrice.minus(holding.averageBuyPrice).times(holding.quantity)),
        };
      })
      .sort((a, b) => b.currentValue - a.currentValue);

    return {
      portfolio: this.toSummary(portfolio),
      holdings,
      transactions: this.getTransactions({ portfolioId, limit: PORTFOLIO_DETAIL_TRANSACTIONS }),
    };
  }

  getPortfolioValue(portfolioId: string): { portfolioId: string; value: number } {
    this.requirePortfolio(portfolioId);
    return { portfolioId, value: toMoney(this.snapshotter.getPortfolioValue(portfolioId)) };
  }

  /** Every catalog stock with the shares held across all portfolios */
  getStockSummaries(): StockSummaryDto[] {
    const holdings = this.store.getHoldings();

    return this.catalog.getAllStocks().map((stock) => {
      const sharesHeld = holdings
        .filter((h) => h.symbol === stock.symbol)
        .reduce((total, h) => total + h.quantity, 0);

      return {
        ...toStockResponse(stock),
        totalSharesHeld: sharesHeld,
        totalValueHeld: toMoney(stock.currentPrice.times(sharesHeld)),
      };
    });
  }

  /**
   * One stock with its holding in each portfolio and its latest transactions.
   * @throws StockNotFoundException for a symbol the catalog does not list
   */
  getStockDetail(symbol: string): StockDetailDto {
    const stock = this.catalog.getStock(symbol);

    const holdings: StockHoldingDto[] = [];
    for (const holding of this.store.getHoldings()) {
      const portfolio = holding.symbol === stock.symbol ? this.store.findPortfolio(holding.portfolioId) : undefined;
      if (!portfolio) continue;

      holdings.push({
        portfolioId: portfolio.id,
        portfolioName: portfolio.name,
        quantity: holding.quantity,
        averageBuyPrice: toNumber(holding.averageBuyPrice),
        currentValue: toMoney(stock.currentPrice.times(holding.quantity)),
        profitLoss: toMoney(stock.currentPrice.minus(holding.averageBuyPrice).times(holding.quantity)),
      });
    }

    return {
      stock: toStockResponse(stock),
      holdings: holdings.sort((a, b) => a.portfolioName.localeCompare(b.portfolioName)),
      transactions: this.getTransactions({ symbol: stock.symbol, limit: STOCK_DETAIL_TRANSACTIONS }),
    };
  }

  /**
   * Headline figures: unrealized (weighted average), realized (FIFO), and
   * their sum over total invested (open cost basis + sold cost basis).
   */
  getDashboard(): DashboardResponseDto {
    const holdings = this.store.getHoldings();
    const unrealized = this.unrealizedTotals(holdings);
    const realized = this.realizedSummary();

    const totalInvested = unrealized.costBasis.plus(realized.totalSoldCostBasis);
    const totalPnl = unrealized.amount.plus(realized.amount);

    return {
      portfolios: this.getPortfolioSummaries().sort((a, b) => b.totalValue - a.totalValue),
      totalValue: toMoney(unrealized.currentValue),
      unrealizedPnl: {
        amount: toMoney(unrealized.amount),
        percentage: toNumber(percentageOf(unrealized.amount, unrealized.costBasis)),
        costBasis: toMoney(unrealized.costBasis),
      },
      realizedPnl: {
        amount: toMoney(realized.amount),
        percentage: toNumber(realized.percentage),
      },
      totalPnl: {
        amount: toMoney(totalPnl),
        percentage: toNumber(percentageOf(totalPnl, totalInvested)),
      },
      accountBalance: toMoney(this.store.getBalance().balance),
      totalInvested: toMoney(totalInvested),
      totalHoldings: holdings.length,
      recentTransactions: this.getTransactions({ limit: DASHBOARD_RECENT_TRANSACTIONS }),
    };
  }

  private realizedSummary(): RealizedPnlSummary {
    const summary = calculateRealizedPnl(this.store.getAllTransactions());
    if (summary.uncoveredQuantity > 0) {
      this.logger.warn(`${summary.uncoveredQuantity} sold shares have no matching lot; counted at zero cost`);
    }
    return summary;
  }

  private unrealizedTotals(holdings: Holding[]): UnrealizedTotals {
    const costBasis = holdings.reduce((total, h) => total.plus(h.averageBuyPrice.times(h.quantity)), ZERO);
    const currentValue = holdings.reduce(
      (total, h) => total.plus(this.snapshotter.marketPriceOf(h).times(h.quantity)),
      ZERO,
    );
    return { costBasis, currentValue, amount: currentValue.minus(costBasis) };
  }

  private requirePortfolio(portfolioId: string): Portfolio {
    const portfolio = this.store.findPortfolio(portfolioId);
    if (!portfolio) {
      throw new PortfolioNotFoundException(portfolioId);
    }
    return portfolio;
  }

  private toSummary(portfolio: Portfolio): PortfolioSummaryDto {
    return {
      id: portfolio.id,
      name: portfolio.name,
      description: portfolio.description,
      holdingsCount: this.store.getHoldings(portfolio.id).length,
      totalValue: toMoney(this.snapshotter.getPortfolioValue(portfolio.id)),
      createdAt: portfolio.createdAt.toISOString(),
    };
  }

  private toTransactionResponse(transaction: Transaction): TransactionResponseDto {
    return {
      id: transaction.id,
      side: transaction.side,
      symbol: transaction.symbol,
      stockName: this.catalog.findStock(transaction.symbol)?.name ?? null,
      portfolioId: transaction.portfolioId,
      portfolioName: this.store.findPortfolio(transaction.portfolioId)?.name ?? null,
      quantity: transaction.quantity,
      price: toNumber(transaction.price),
      total: toMoney(transaction.price.times(transaction.quantity)),
      timestamp: transaction.timestamp.toISOString(),
    };
  }
}

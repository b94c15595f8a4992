import { Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { LedgerStore } from './ledger-store';
import { HoldingsAccumulatorService } from './holdings-accumulator.service';
import { NetWorthSnapshotService } from './net-worth-snapshot.service';
import { TradeLifecycle, TradeStage } from './trade-lifecycle';
import { Transaction, TransactionSide } from './entities/transaction.entity';
import { Holding } from './entities/holding.entity';
import { Portfolio } from './entities/portfolio.entity';
import { NetWorthSnapshot } from './entities/net-worth-snapshot.entity';
import { Stock } from '../price-catalog/entities/stock.entity';
import { PriceCatalogService } from '../price-catalog/price-catalog.service';
import { toDecimal } from '../common/utils/decimal.util';
import {
  InsufficientBalanceException,
  InvalidInputException,
  PortfolioNotFoundException,
} from '../common/exceptions/ledger.exceptions';

export interface TradeRequest {
  portfolioId: string;
  symbol: string;
  quantity: number;
  price: number;              // execution price, already resolved by the caller
}

export interface TradeResult {
  transaction: Transaction;
  totalAmount: Decimal;       // cost of a buy, proceeds of a sell
  balance: Decimal;
  holding: Holding | null;
  holdingRemoved: boolean;
  snapshot: NetWorthSnapshot;
  stages: readonly TradeStage[];
}

interface ValidatedTrade {
  portfolio: Portfolio;
  stock: Stock;
  quantity: number;
  price: Decimal;
}

/**
 * Executes buys and sells against the ledger.
 *
 * Everything runs in one unit of work on the store: validation first, then
 * the log append, the holding update, the balance update and the net-worth
 * snapshot. The log is always written before the holding so it never misses
 * an event the holdings cache reflects. A rejected trade changes nothing.
 */
@Injectable()
export class TradeExecutorService {
  private readonly logger = new Logger(TradeExecutorService.name);

  constructor(
    private readonly store: LedgerStore,
    private readonly catalog: PriceCatalogService,
    private readonly accumulator: HoldingsAccumulatorService,
    private readonly snapshotter: NetWorthSnapshotService,
  ) {}

  buy(request: TradeRequest): TradeResult {
    return this.execute(TransactionSide.BUY, request);
  }

  sell(request: TradeRequest): TradeResult {
    return this.execute(TransactionSide.SELL, request);
  }

  private execute(side: TransactionSide, request: TradeRequest): TradeResult {
    const lifecycle = new TradeLifecycle();
    const label = `${side} ${request.quantity} ${request.symbol} @ ${request.price}`;

    try {
      const result = this.store.runAtomically(side.toLowerCase(), () =>
        side === TransactionSide.BUY ? this.settleBuy(request, lifecycle) : this.settleSell(request, lifecycle),
      );
      this.logger.log(`${label} done, transaction ${result.transaction.id}, balance ${result.balance.toFixed(2)}`);
      return result;
    } catch (err) {
      lifecycle.reject();
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.warn(`${label} rejected during ${lifecycle.rejectedAt ?? TradeStage.VALIDATING}: ${reason}`);
      throw err;
    }
  }

  private settleBuy(request: TradeRequest, lifecycle: TradeLifecycle): TradeResult {
    const { portfolio, stock, quantity, price } = this.validate(request);
    const totalCost = price.times(quantity);
    const { balance } = this.store.getBalance();

    if (totalCost.greaterThan(balance)) {
      throw new InsufficientBalanceException(totalCost, balance);
    }
    // must fail before anything is recorded
    this.accumulator.assertCanBuy(portfolio.id, stock.symbol, quantity);

    const now = new Date();
    lifecycle.advance(TradeStage.RECORDING);
    const transaction = this.store.appendTransaction({
      portfolioId: portfolio.id,
      symbol: stock.symbol,
      side: TransactionSide.BUY,
      quantity,
      price,
      timestamp: now,
    });

    lifecycle.advance(TradeStage.UPDATING);
    const holding = this.accumulator.applyBuy(portfolio.id, stock.symbol, quantity, price);

    lifecycle.advance(TradeStage.SETTLING);
    const account = this.store.setBalance(balance.minus(totalCost), now);
    const snapshot = this.snapshotter.snapshot(now);

    lifecycle.advance(TradeStage.DONE);
    return {
      transaction,
      totalAmount: totalCost,
      balance: account.balance,
      holding,
      holdingRemoved: false,
      snapshot,
      stages: lifecycle.stages,
    };
  }

  private settleSell(request: TradeRequest, lifecycle: TradeLifecycle): TradeResult {
    const { portfolio, stock, quantity, price } = this.validate(request);
    // must fail before anything is recorded
    this.accumulator.assertCanSell(portfolio.id, stock.symbol, quantity);

    const proceeds = price.times(quantity);
    const { balance } = this.store.getBalance();
    const now = new Date();

    lifecycle.advance(TradeStage.RECORDING);
    const transaction = this.store.appendTransaction({
      portfolioId: portfolio.id,
      symbol: stock.symbol,
      side: TransactionSide.SELL,
      quantity,
      price,
      timestamp: now,
    });

    lifecycle.advance(TradeStage.UPDATING);
    const { holding, removed } = this.accumulator.applySell(portfolio.id, stock.symbol, quantity);

    lifecycle.advance(TradeStage.SETTLING);
    const account = this.store.setBalance(balance.plus(proceeds), now);
    const snapshot = this.snapshotter.snapshot(now);

    lifecycle.advance(TradeStage.DONE);
    return {
      transaction,
      totalAmount: proceeds,
      balance: account.balance,
      holding,
      holdingRemoved: removed,
      snapshot,
      stages: lifecycle.stages,
    };
  }

  private validate(request: TradeRequest): ValidatedTrade {
    if (!request.portfolioId) {
      throw new InvalidInputException('portfolioId', 'Portfolio id is required');
    }
    if (!request.symbol || !request.symbol.trim()) {
      throw new InvalidInputException('symbol', 'Symbol is required');
    }
    if (!Number.isSafeInteger(request.quantity) || request.quantity <= 0) {
      throw new InvalidInputException(
        'quantity',
        `Quantity must be a positive whole number, got ${request.quantity}`,
      );
    }
    if (!Number.isFinite(request.price) || request.price <= 0) {
      throw new InvalidInputException('price', `Price must be positive, got ${request.price}`);
    }

    const portfolio = this.store.findPortfolio(request.portfolioId);
    if (!portfolio) {
      throw new PortfolioNotFoundException(request.portfolioId);
    }

    return {
      portfolio,
      stock: this.catalog.getStock(request.symbol),
      quantity: request.quantity,
      price: toDecimal(request.price),
    };
  }
}

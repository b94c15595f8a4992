import { Test, TestingModule } from '@nestjs/testing';
import { TradeExecutorService } from './trade-executor.service';
import { HoldingsAccumulatorService } from './holdings-accumulator.service';
import { NetWorthSnapshotService } from './net-worth-snapshot.service';
import { PortfolioService } from './portfolio.service';
import { PortfolioQueryService } from './portfolio-query.service';
import { InMemoryLedgerStore } from './in-memory-ledger-store.service';
import { LedgerStore } from './ledger-store';
import { TradeStage } from './trade-lifecycle';
import { Holding } from './entities/holding.entity';
import { TransactionSide } from './entities/transaction.entity';
import { PriceCatalogService } from '../price-catalog/price-catalog.service';
import { APP_CONFIG, AppConfig, loadConfig } from '../config/app.config';
import {
  InsufficientBalanceException,
  InsufficientSharesException,
  InvalidInputException,
  PersistenceFailureException,
  PortfolioNotFoundException,
  StockNotFoundException,
} from '../common/exceptions/ledger.exceptions';

// Store whose holding writes can be made to fail mid-trade
class FaultyLedgerStore extends InMemoryLedgerStore {
  failHoldingWrites = false;

  saveHolding(holding: Holding): Holding {
    if (this.failHoldingWrites) {
      throw new Error('disk full');
    }
    return super.saveHolding(holding);
  }
}

describe('TradeExecutorService', () => {
  let executor: TradeExecutorService;
  let store: FaultyLedgerStore;
  let queries: PortfolioQueryService;
  let portfolioId: string;

  beforeEach(async () => {
    const config: AppConfig = loadConfig({});

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        { provide: APP_CONFIG, useValue: config },
        { provide: LedgerStore, useValue: new FaultyLedgerStore(config) },
        PriceCatalogService,
        HoldingsAccumulatorService,
        NetWorthSnapshotService,
        TradeExecutorService,
        PortfolioService,
        PortfolioQueryService,
      ],
    }).compile();

    executor = module.get<TradeExecutorService>(TradeExecutorService);
    store = module.get<LedgerStore, FaultyLedgerStore>(LedgerStore);
    queries = module.get<PortfolioQueryService>(PortfolioQueryService);
    portfolioId = module.get<PortfolioService>(PortfolioService).createPortfolio('Tech Growth').id;
  });

  function expectUntouched(transactions: number, balance: string, snapshots: number): void {
    expect(store.getTransactionCount()).toBe(transactions);
    expect(store.getBalance().balance.toFixed(2)).toBe(balance);
    expect(store.getSnapshots()).toHaveLength(snapshots);
  }

  describe('buy', () => {
    it('should debit cash and open a holding', () => {
      const result = executor.buy({ portfolioId, symbol: 'AAPL', quantity: 10, price: 175.43 });

      expect(result.totalAmount.toFixed(2)).toBe('1754.30');
      expect(result.balance.toFixed(2)).toBe('98245.70');
      expect(result.holding?.quantity).toBe(10);
      expect(result.holding?.averageBuyPrice.toString()).toBe('175.43');
      expect(result.holdingRemoved).toBe(false);
      expect(result.transaction).toMatchObject({
        portfolioId,
        symbol: 'AAPL',
        side: TransactionSide.BUY,
        quantity: 10,
        sequence: 1,
      });
    });

    it('should walk every stage of the trade lifecycle', () => {
      const result = executor.buy({ portfolioId, symbol: 'AAPL', quantity: 1, price: 100 });

      expect(result.stages).toEqual([
        TradeStage.VALIDATING,
        TradeStage.RECORDING,
        TradeStage.UPDATING,
        TradeStage.SETTLING,
        TradeStage.DONE,
      ]);
    });

    it('should record the normalised symbol', () => {
      const result = executor.buy({ portfolioId, symbol: ' msft ', quantity: 1, price: 300 });

      expect(result.transaction.symbol).toBe('MSFT');
      expect(store.findHolding(portfolioId, 'MSFT')?.quantity).toBe(1);
    });

    it('should allow spending the whole balance', () => {
      const result = executor.buy({ portfolioId, symbol: 'AMZN', quantity: 1000, price: 100 });

      expect(result.balance.toFixed(2)).toBe('0.00');
    });

    it('should reject a buy the balance cannot cover and change nothing', () => {
      let error: unknown;
      try {
        executor.buy({ portfolioId, symbol: 'GOOGL', quantity: 1000, price: 2750.12 });
      } catch (err) {
        error = err;
      }

      expect(error).toBeInstanceOf(InsufficientBalanceException);
      expect(error).toMatchObject({ message: 'Insufficient balance. You need $2750120.00 but only have $100000.00' });
      expect(store.getHoldings()).toHaveLength(0);
      expectUntouched(0, '100000.00', 0);
    });

    it('should write the log before the holding', () => {
      const appendSpy = jest.spyOn(store, 'appendTransaction');
      const holdingSpy = jest.spyOn(store, 'saveHolding');

      executor.buy({ portfolioId, symbol: 'AAPL', quantity: 1, price: 100 });

      expect(appendSpy.mock.invocationCallOrder[0]).toBeLessThan(holdingSpy.mock.invocationCallOrder[0]);
    });
  });

  describe('sell', () => {
    beforeEach(() => {
      executor.buy({ portfolioId, symbol: 'AAPL', quantity: 10, price: 175.43 });
    });

    it('should credit proceeds and keep the average buy price', () => {
      const result = executor.sell({ portfolioId, symbol: 'AAPL', quantity: 5, price: 180 });

      expect(result.totalAmount.toFixed(2)).toBe('900.00');
      expect(result.balance.toFixed(2)).toBe('99145.70');
      expect(result.holding?.quantity).toBe(5);
      expect(result.holding?.averageBuyPrice.toString()).toBe('175.43');
      expect(queries.getRealizedPnl().amount).toBe(22.85);
    });

    it('should close the holding when everything is sold', () => {
      const result = executor.sell({ portfolioId, symbol: 'AAPL', quantity: 10, price: 170 });

      expect(result.holding).toBeNull();
      expect(result.holdingRemoved).toBe(true);
      expect(store.getHoldings(portfolioId)).toHaveLength(0);
    });

    it('should reject selling more than is held and change nothing', () => {
      expect(() => executor.sell({ portfolioId, symbol: 'AAPL', quantity: 11, price: 180 })).toThrow(
        InsufficientSharesException,
      );
      expect(store.findHolding(portfolioId, 'AAPL')?.quantity).toBe(10);
      expectUntouched(1, '98245.70', 1);
    });

    it('should reject selling a stock that is not held', () => {
      expect(() => executor.sell({ portfolioId, symbol: 'MSFT', quantity: 1, price: 300 })).toThrow(
        'Insufficient shares of MSFT. Available: 0, Requested: 1',
      );
      expectUntouched(1, '98245.70', 1);
    });
  });

  describe('validation', () => {
    it.each([
      ['a zero quantity', { quantity: 0, price: 10 }],
      ['a fractional quantity', { quantity: 2.5, price: 10 }],
      ['a zero price', { quantity: 1, price: 0 }],
      ['a negative price', { quantity: 1, price: -5 }],
      ['a price that is not a number', { quantity: 1, price: Number.NaN }],
    ])('should reject %s', (_label, fields) => {
      expect(() => executor.buy({ portfolioId, symbol: 'AAPL', ...fields })).toThrow(InvalidInputException);
      expectUntouched(0, '100000.00', 0);
    });

    it('should reject a quantity beyond the exact integer range', () => {
      expect(() => executor.buy({ portfolioId, symbol: 'AAPL', quantity: 2 ** 53, price: 1e-12 })).toThrow(
        InvalidInputException,
      );
      expectUntouched(0, '100000.00', 0);
    });

    it('should refuse a buy that would take the holding past the exact integer range', () => {
      executor.buy({ portfolioId, symbol: 'AAPL', quantity: Number.MAX_SAFE_INTEGER, price: 1e-12 });

      expect(() => executor.buy({ portfolioId, symbol: 'AAPL', quantity: 1, price: 1e-12 })).toThrow(
        'Holding of AAPL would exceed 9007199254740991 shares',
      );
      expect(store.findHolding(portfolioId, 'AAPL')?.quantity).toBe(Number.MAX_SAFE_INTEGER);
      expectUntouched(1, '90992.80', 1);
    });

    it('should reject a missing portfolio id', () => {
      expect(() => executor.buy({ portfolioId: '', symbol: 'AAPL', quantity: 1, price: 10 })).toThrow(
        'Portfolio id is required',
      );
    });

    it('should reject an unknown portfolio', () => {
      expect(() =>
        executor.buy({ portfolioId: '00000000-0000-4000-8000-000000000000', symbol: 'AAPL', quantity: 1, price: 10 }),
      ).toThrow(PortfolioNotFoundException);
    });

    it('should reject a symbol the catalog does not list', () => {
      expect(() => executor.buy({ portfolioId, symbol: 'DOGE', quantity: 1, price: 10 })).toThrow(
        StockNotFoundException,
      );
      expectUntouched(0, '100000.00', 0);
    });
  });

  describe('net-worth snapshots', () => {
    it('should append one snapshot per trade', () => {
      executor.buy({ portfolioId, symbol: 'AAPL', quantity: 10, price: 175.43 });
      executor.sell({ portfolioId, symbol: 'AAPL', quantity: 5, price: 180 });

      const [afterBuy, afterSell] = store.getSnapshots();

      expect(store.getSnapshots()).toHaveLength(2);
      expect(afterBuy.accountBalance.toFixed(2)).toBe('98245.70');
      expect(afterBuy.portfolioValue.toFixed(2)).toBe('1754.30');
      expect(afterBuy.totalNetWorth.toFixed(2)).toBe('100000.00');
      // 5 shares still valued at the catalog price of 175.43
      expect(afterSell.totalNetWorth.toFixed(2)).toBe('100022.85');
      expect(afterSell.totalNetWorth.equals(afterSell.accountBalance.plus(afterSell.portfolioValue))).toBe(true);
    });

    it('should date the snapshot with the trade timestamp', () => {
      const result = executor.buy({ portfolioId, symbol: 'AAPL', quantity: 1, price: 100 });

      expect(result.snapshot.timestamp).toEqual(result.transaction.timestamp);
      expect(result.snapshot.date).toBe(result.transaction.timestamp.toISOString().slice(0, 10));
    });
  });

  describe('storage faults', () => {
    it('should roll back the whole trade when a write fails', () => {
      store.failHoldingWrites = true;

      expect(() => executor.buy({ portfolioId, symbol: 'AAPL', quantity: 10, price: 175.43 })).toThrow(
        PersistenceFailureException,
      );
      expect(store.getHoldings()).toHaveLength(0);
      expectUntouched(0, '100000.00', 0);
    });

    it('should name the failed operation', () => {
      executor.buy({ portfolioId, symbol: 'AAPL', quantity: 10, price: 175.43 });
      store.failHoldingWrites = true;

      expect(() => executor.sell({ portfolioId, symbol: 'AAPL', quantity: 4, price: 180 })).toThrow(
        'Persistence failure during sell',
      );
      expect(store.findHolding(portfolioId, 'AAPL')?.quantity).toBe(10);
      expectUntouched(1, '98245.70', 1);
    });
  });

  it('should keep the weighted average on the holding while realized P&L uses FIFO', () => {
    executor.buy({ portfolioId, symbol: 'AMD', quantity: 10, price: 10 });
    executor.buy({ portfolioId, symbol: 'AMD', quantity: 10, price: 20 });
    const result = executor.sell({ portfolioId, symbol: 'AMD', quantity: 15, price: 30 });

    expect(result.holding?.averageBuyPrice.toString()).toBe('15');
    expect(queries.getRealizedPnl().amount).toBe(250);
  });
});

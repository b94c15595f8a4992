import { Test, TestingModule } from '@nestjs/testing';
import Decimal from 'decimal.js';
import { NetWorthSnapshotService } from './net-worth-snapshot.service';
import { InMemoryLedgerStore } from './in-memory-ledger-store.service';
import { LedgerStore } from './ledger-store';
import { PriceCatalogService } from '../price-catalog/price-catalog.service';
import { APP_CONFIG, loadConfig } from '../config/app.config';

describe('NetWorthSnapshotService', () => {
  let service: NetWorthSnapshotService;
  let store: LedgerStore;
  let catalog: PriceCatalogService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        { provide: APP_CONFIG, useValue: loadConfig({}) },
        { provide: LedgerStore, useClass: InMemoryLedgerStore },
        PriceCatalogService,
        NetWorthSnapshotService,
      ],
    }).compile();

    service = module.get<NetWorthSnapshotService>(NetWorthSnapshotService);
    store = module.get<LedgerStore>(LedgerStore);
    catalog = module.get<PriceCatalogService>(PriceCatalogService);
  });

  afterEach(() => {
    catalog.reset();
  });

  describe('getPortfolioValue', () => {
    beforeEach(() => {
      store.saveHolding({ portfolioId: 'p1', symbol: 'AAPL', quantity: 10, averageBuyPrice: new Decimal(150) });
      store.saveHolding({ portfolioId: 'p2', symbol: 'INTC', quantity: 4, averageBuyPrice: new Decimal(60) });
    });

    it('should value holdings at catalog prices', () => {
      // 10 × 175.43 + 4 × 55.78
      expect(service.getPortfolioValue().toFixed(2)).toBe('1977.42');
    });

    it('should value a single portfolio', () => {
      expect(service.getPortfolioValue('p2').toFixed(2)).toBe('223.12');
    });

    it('should follow catalog price updates', () => {
      catalog.updatePrice('AAPL', 200);

      expect(service.getPortfolioValue('p1').toFixed(2)).toBe('2000.00');
    });

    it('should fall back to the average buy price for symbols the catalog lacks', () => {
      store.saveHolding({ portfolioId: 'p3', symbol: 'XYZ', quantity: 2, averageBuyPrice: new Decimal('12.5') });

      expect(service.getPortfolioValue('p3').toFixed(2)).toBe('25.00');
    });

    it('should be zero without holdings', () => {
      expect(service.getPortfolioValue('nobody').toString()).toBe('0');
    });
  });

  describe('snapshot', () => {
    it('should record balance plus holdings value', () => {
      store.saveHolding({ portfolioId: 'p1', symbol: 'AAPL', quantity: 10, averageBuyPrice: new Decimal(150) });
      store.setBalance(new Decimal('98500'), new Date());

      const snapshot = service.snapshot(new Date('2024-03-05T23:30:00.000Z'));

      expect(snapshot.date).toBe('2024-03-05');
      expect(snapshot.accountBalance.toFixed(2)).toBe('98500.00');
      expect(snapshot.portfolioValue.toFixed(2)).toBe('1754.30');
      expect(snapshot.totalNetWorth.toFixed(2)).toBe('100254.30');
      expect(store.getSnapshots()).toHaveLength(1);
    });

    it('should keep every snapshot of the same day', () => {
      service.snapshot(new Date('2024-03-05T09:00:00.000Z'));
      service.snapshot(new Date('2024-03-05T17:00:00.000Z'));

      expect(service.getHistory(50).map((s) => s.date)).toEqual(['2024-03-05', '2024-03-05']);
    });
  });

  describe('getHistory', () => {
    it('should return the latest rows in chronological order', () => {
      ['2024-03-01', '2024-03-02', '2024-03-03'].forEach((day) => service.snapshot(new Date(`${day}T12:00:00.000Z`)));

      expect(service.getHistory(2).map((s) => s.date)).toEqual(['2024-03-02', '2024-03-03']);
    });
  });
});

import { Module } from '@nestjs/common';
import { PortfolioController } from './portfolio.controller';
import { TradeController } from './trade.controller';
import { StockController } from './stock.controller';
import { PortfolioService } from './portfolio.service';
import { PortfolioQueryService } from './portfolio-query.service';
import { TradeExecutorService } from './trade-executor.service';
import { HoldingsAccumulatorService } from './holdings-accumulator.service';
import { NetWorthSnapshotService } from './net-worth-snapshot.service';
import { LedgerReconcilerService } from './ledger-reconciler.service';
import { LedgerStore } from './ledger-store';
import { InMemoryLedgerStore } from './in-memory-ledger-store.service';
import { PriceCatalogModule } from '../price-catalog/price-catalog.module';

@Module({
  imports: [PriceCatalogModule], // Import to access PriceCatalogService
  controllers: [PortfolioController, TradeController, StockController],
  providers: [
    { provide: LedgerStore, useClass: InMemoryLedgerStore },
    HoldingsAccumulatorService,
    NetWorthSnapshotService,
    TradeExecutorService,    // Mutations: buy, sell
    PortfolioService,        // Mutations: create/delete portfolio
    LedgerReconcilerService,
    PortfolioQueryService,   // Queries: P&L, history, dashboard
  ],
  exports: [LedgerStore],
})
export class PortfolioModule {}

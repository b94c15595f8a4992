import { Controller, Get } from '@nestjs/common';
import { HealthResponse } from './common/interfaces/health.interface';
import { LedgerStore } from './portfolio/ledger-store';

@Controller()
export class AppController {
  constructor(private readonly store: LedgerStore) {}

  /**
   * Health check for load balancers and monitoring.
   *
   * GET /health
   */
  @Get('health')
  getHealth(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      service: 'portfolio-ledger',
      ledger: {
        portfolios: this.store.getAllPortfolios().length,
        transactions: this.store.getTransactionCount(),
      },
    };
  }

  /**
   * API root - returns service info and the main endpoints.
   *
   * GET /
   */
  @Get()
  getRoot() {
    return {
      message: 'Portfolio Ledger API',
      version: '1.0.0',
      endpoints: {
        health: '/health',
        stocks: '/stocks',
        portfolios: '/portfolios',
        buy: '/stocks/:symbol/buy',
        sell: '/stocks/:symbol/sell',
        transactions: '/transactions',
        realizedPnl: '/pnl/realized',
        unrealizedPnl: '/pnl/unrealized',
        netWorthHistory: '/net-worth/history',
        dashboard: '/dashboard',
      },
    };
  }
}

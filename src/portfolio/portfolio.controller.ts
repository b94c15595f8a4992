import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
} from '@nestjs/common';
import { PortfolioService } from './portfolio.service';
import { PortfolioQueryService } from './portfolio-query.service';
import { LedgerReconcilerService } from './ledger-reconciler.service';
import { CreatePortfolioDto, PortfolioDetailDto, PortfolioSummaryDto } from './dto/portfolio.dto';
import { RealizedPnlResponseDto, UnrealizedPnlQueryDto, UnrealizedPnlResponseDto } from './dto/pnl-response.dto';
import { AccountBalanceDto, HistoryQueryDto, NetWorthSnapshotDto } from './dto/net-worth-response.dto';
import { DashboardResponseDto } from './dto/dashboard-response.dto';
import { ReconciliationResponseDto, toReconciliationResponse } from './dto/reconciliation-response.dto';
import { APP_CONFIG, AppConfig } from '../config/app.config';

@Controller()
export class PortfolioController {
  constructor(
    private readonly portfolioService: PortfolioService,
    private readonly queryService: PortfolioQueryService,
    private readonly reconciler: LedgerReconcilerService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  /**
   * GET /portfolios
   */
  @Get('portfolios')
  getPortfolios(): PortfolioSummaryDto[] {
    return this.queryService.getPortfolioSummaries();
  }

  /**
   * POST /portfolios
   * @returns 201, or 409 if the name is taken
   */
  @Post('portfolios')
  @HttpCode(HttpStatus.CREATED)
  createPortfolio(@Body() dto: CreatePortfolioDto) {
    const portfolio = this.portfolioService.createPortfolio(dto.name, dto.description);
    return {
      message: 'Portfolio created successfully',
      portfolio: {
        id: portfolio.id,
        name: portfolio.name,
        description: portfolio.description,
      },
    };
  }

  /**
   * Holdings with market value plus the last 20 transactions.
   *
   * GET /portfolios/:id
   */
  @Get('portfolios/:id')
  getPortfolio(@Param('id', ParseUUIDPipe) id: string): PortfolioDetailDto {
    return this.queryService.getPortfolioDetail(id);
  }

  /**
   * Removes the portfolio and its holdings; transactions are kept.
   *
   * DELETE /portfolios/:id
   */
  @Delete('portfolios/:id')
  @HttpCode(HttpStatus.OK)
  deletePortfolio(@Param('id', ParseUUIDPipe) id: string) {
    const { portfolio, holdingsRemoved } = this.portfolioService.deletePortfolio(id);
    return {
      message: `Portfolio "${portfolio.name}" deleted successfully`,
      holdingsRemoved,
    };
  }

  /**
   * GET /portfolios/:id/value
   */
  @Get('portfolios/:id/value')
  getPortfolioValue(@Param('id', ParseUUIDPipe) id: string) {
    return this.queryService.getPortfolioValue(id);
  }

  /**
   * FIFO realized P&L over the whole transaction log.
   *
   * GET /pnl/realized
   */
  @Get('pnl/realized')
  getRealizedPnl(): RealizedPnlResponseDto {
    return this.queryService.getRealizedPnl();
  }

  /**
   * GET /pnl/unrealized?portfolioId=...
   * @param portfolioId - Optional filter for a single portfolio
   */
  @Get('pnl/unrealized')
  getUnrealizedPnl(@Query() query: UnrealizedPnlQueryDto): UnrealizedPnlResponseDto {
    return this.queryService.getUnrealizedPnl(query.portfolioId);
  }

  /**
   * Chronological net-worth rows, one per trade.
   *
   * GET /net-worth/history?limit=50
   */
  @Get('net-worth/history')
  getNetWorthHistory(@Query() query: HistoryQueryDto): NetWorthSnapshotDto[] {
    return this.queryService.getNetWorthHistory(query.limit ?? this.config.netWorthHistoryLimit);
  }

  /**
   * GET /account/balance
   */
  @Get('account/balance')
  getBalance(): AccountBalanceDto {
    return this.queryService.getBalance();
  }

  /**
   * GET /dashboard
   */
  @Get('dashboard')
  getDashboard(): DashboardResponseDto {
    return this.queryService.getDashboard();
  }

  /**
   * Rebuilds holdings and balance from the transaction log.
   *
   * POST /ledger/reconcile
   */
  @Post('ledger/reconcile')
  @HttpCode(HttpStatus.OK)
  reconcile(): ReconciliationResponseDto {
    return toReconciliationResponse(this.reconciler.reconcile());
  }
}

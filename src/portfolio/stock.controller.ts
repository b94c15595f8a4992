import { Controller, Get, Param } from '@nestjs/common';
import { PortfolioQueryService } from './portfolio-query.service';
import { StockDetailDto, StockSummaryDto } from './dto/stock-position.dto';

@Controller()
export class StockController {
  constructor(private readonly queryService: PortfolioQueryService) {}

  /**
   * Every tracked stock ordered by symbol, with the shares held across portfolios.
   *
   * GET /stocks
   */
  @Get('stocks')
  getStocks(): StockSummaryDto[] {
    return this.queryService.getStockSummaries();
  }

  /**
   * Holdings per portfolio and the last 20 transactions for one stock.
   *
   * GET /stocks/:symbol
   */
  @Get('stocks/:symbol')
  getStock(@Param('symbol') symbol: string): StockDetailDto {
    return this.queryService.getStockDetail(symbol);
  }
}

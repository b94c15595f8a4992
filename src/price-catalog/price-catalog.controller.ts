import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, Post } from '@nestjs/common';
import { PriceCatalogService } from './price-catalog.service';
import { BulkUpdatePricesDto, UpdatePriceDto } from './dto/update-price.dto';
import { MarketPricesResponseDto, StockResponseDto, toStockResponse } from './dto/stock-response.dto';

// Price and watchlist maintenance. The stock list and detail views join
// ledger holdings, so they are served by StockController in PortfolioModule.
@Controller()
export class PriceCatalogController {
  constructor(private readonly catalog: PriceCatalogService) {}

  /**
   * GET /stocks/prices
   */
  @Get('stocks/prices')
  getPrices(): MarketPricesResponseDto {
    return {
      prices: this.catalog.getAllPrices(),
      lastUpdated: this.catalog.getLastUpdateTime().toISOString(),
    };
  }

  /**
   * Batch updates market prices. Either every price is applied or none.
   *
   * POST /stocks/prices
   */
  @Post('stocks/prices')
  @HttpCode(HttpStatus.OK)
  bulkUpdatePrices(@Body() dto: BulkUpdatePricesDto) {
    const updated = this.catalog.updatePrices(dto.prices);
    return {
      message: 'Market prices updated',
      updatedSymbols: updated.map((stock) => stock.symbol),
      prices: this.catalog.getAllPrices(),
    };
  }

  /**
   * POST /stocks/:symbol/price
   */
  @Post('stocks/:symbol/price')
  @HttpCode(HttpStatus.OK)
  updatePrice(@Param('symbol') symbol: string, @Body() dto: UpdatePriceDto) {
    const stock = this.catalog.updatePrice(symbol, dto.price);
    return {
      message: `Price updated for ${stock.symbol}`,
      stock: toStockResponse(stock),
    };
  }

  /**
   * GET /watchlist
   */
  @Get('watchlist')
  getWatchlist(): StockResponseDto[] {
    return this.catalog.getWatchlist().map(toStockResponse);
  }

  /**
   * POST /stocks/:symbol/watchlist
   */
  @Post('stocks/:symbol/watchlist')
  @HttpCode(HttpStatus.OK)
  addToWatchlist(@Param('symbol') symbol: string) {
    const stock = this.catalog.setWatchlist(symbol, true);
    return { message: `${stock.symbol} added to watchlist successfully` };
  }

  /**
   * DELETE /stocks/:symbol/watchlist
   */
  @Delete('stocks/:symbol/watchlist')
  @HttpCode(HttpStatus.OK)
  removeFromWatchlist(@Param('symbol') symbol: string) {
    const stock = this.catalog.setWatchlist(symbol, false);
    return { message: `${stock.symbol} removed from watchlist successfully` };
  }
}

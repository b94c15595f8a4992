import { Stock } from '../entities/stock.entity';
import { toNumber } from '../../common/utils/decimal.util';

export interface StockResponseDto {
  symbol: string;
  name: string;
  currentPrice: number;
  watchlist: boolean;
  priceUpdatedAt: string;
}

// Current market prices for all tracked symbols
export interface MarketPricesResponseDto {
  prices: Record<string, number>;  // { "AAPL": 175.43, "MSFT": 338.85 }
  lastUpdated: string;
}

export function toStockResponse(stock: Stock): StockResponseDto {
  return {
    symbol: stock.symbol,
    name: stock.name,
    currentPrice: toNumber(stock.currentPrice),
    watchlist: stock.watchlist,
    priceUpdatedAt: stock.priceUpdatedAt.toISOString(),
  };
}

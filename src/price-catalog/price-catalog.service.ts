import { Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { Stock } from './entities/stock.entity';
import { DEFAULT_STOCKS } from './default-stocks';
import { toDecimal } from '../common/utils/decimal.util';
import { InvalidInputException, StockNotFoundException } from '../common/exceptions/ledger.exceptions';

/**
 * Symbol → stock lookup with the latest market price.
 * Prices are pushed in through the API; there is no live feed here.
 * The ledger only reads from it, so trades never wait on price refreshes.
 */
@Injectable()
export class PriceCatalogService {
  private readonly logger = new Logger(PriceCatalogService.name);
  private stocks: Map<string, Stock> = new Map();
  private lastPriceUpdate: Date = new Date();

  constructor() {
    this.seedDefaultStocks();
  }

  /** Seeds the default large caps */
  private seedDefaultStocks(): void {
    const now = new Date();
    DEFAULT_STOCKS.forEach(({ symbol, name, price }) => {
      this.stocks.set(symbol, {
        symbol,
        name,
        currentPrice: toDecimal(price),
        watchlist: false,
        priceUpdatedAt: now,
      });
    });
  }

  static normalizeSymbol(symbol: string): string {
    return symbol.trim().toUpperCase();
  }

  /** Returns undefined if symbol not tracked */
  currentPrice(symbol: string): Decimal | undefined {
    return this.findStock(symbol)?.currentPrice;
  }

  findStock(symbol: string): Stock | undefined {
    return this.stocks.get(PriceCatalogService.normalizeSymbol(symbol));
  }

  /** @throws StockNotFoundException */
  getStock(symbol: string): Stock {
    const stock = this.findStock(symbol);
    if (!stock) {
      throw new StockNotFoundException(PriceCatalogService.normalizeSymbol(symbol));
    }
    return stock;
  }

  hasStock(symbol: string): boolean {
    return this.findStock(symbol) !== undefined;
  }

  /** Ordered by symbol */
  getAllStocks(): Stock[] {
    return Array.from(this.stocks.values()).sort((a, b) => a.symbol.localeCompare(b.symbol));
  }

  getAllPrices(): Record<string, number> {
    const prices: Record<string, number> = {};
    this.getAllStocks().forEach((stock) => {
      prices[stock.symbol] = stock.currentPrice.toNumber();
    });
    return prices;
  }

  /**
   * Updates a single symbol's price.
   * @throws InvalidInputException if price <= 0
   * @throws StockNotFoundException for an unknown symbol
   */
  updatePrice(symbol: string, price: number): Stock {
    this.assertPositivePrice(symbol, price);
    const stock = this.getStock(symbol);
    const updated: Stock = { ...stock, currentPrice: toDecimal(price), priceUpdatedAt: new Date() };

    this.stocks.set(updated.symbol, updated);
    this.lastPriceUpdate = updated.priceUpdatedAt;
    return updated;
  }

  /**
   * Batch price updates. Validates every entry before applying any,
   * so a bad entry leaves all prices as they were.
   */
  updatePrices(prices: Record<string, number>): Stock[] {
    const entries = Object.entries(prices);
    entries.forEach(([symbol, price]) => {
      this.assertPositivePrice(symbol, price);
      this.getStock(symbol);
    });

    const now = new Date();
    const updated = entries.map(([symbol, price]) => {
      const stock: Stock = { ...this.getStock(symbol), currentPrice: toDecimal(price), priceUpdatedAt: now };
      this.stocks.set(stock.symbol, stock);
      return stock;
    });

    this.lastPriceUpdate = now;
    this.logger.debug(`Updated prices for ${updated.length} symbols`);
    return updated;
  }

  setWatchlist(symbol: string, watchlist: boolean): Stock {
    const stock: Stock = { ...this.getStock(symbol), watchlist };
    this.stocks.set(stock.symbol, stock);
    return stock;
  }

  getWatchlist(): Stock[] {
    return this.getAllStocks().filter((stock) => stock.watchlist);
  }

  getLastUpdateTime(): Date {
    return this.lastPriceUpdate;
  }

  /** Resets to the seeded stocks - test harness only */
  reset(): void {
    this.stocks.clear();
    this.seedDefaultStocks();
    this.lastPriceUpdate = new Date();
  }

  private assertPositivePrice(symbol: string, price: number): void {
    if (!Number.isFinite(price) || price <= 0) {
      throw new InvalidInputException('price', `Price must be positive, got ${price} for ${symbol}`);
    }
  }
}

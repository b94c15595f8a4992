import Decimal from 'decimal.js';

// Tradable instrument. Symbol is the unique key (always upper case).
export interface Stock {
  symbol: string;
  name: string;
  currentPrice: Decimal;      // refreshed from outside the ledger
  watchlist: boolean;
  priceUpdatedAt: Date;
}

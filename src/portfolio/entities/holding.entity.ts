import Decimal from 'decimal.js';

// Open position for one stock in one portfolio.
// A derived cache of the transaction log; never stored with quantity 0.
export interface Holding {
  portfolioId: string;
  symbol: string;
  quantity: number;             // whole shares, >= 1
  averageBuyPrice: Decimal;     // weighted average of the backing BUY fills
}

export function holdingKey(portfolioId: string, symbol: string): string {
  return `${portfolioId}:${symbol}`;
}
